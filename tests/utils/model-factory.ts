import { createTypeModelFromSnapshot, InMemoryTypeModel } from '../../src/model';
import type { ModelSnapshotInput } from '../../src/model';

type DeclarationInput = ModelSnapshotInput['declarations'][number];

/**
 * Declarations most fixtures need: builtins, collections and function interfaces.
 */
export const STANDARD_DECLARATIONS: DeclarationInput[] = [
  { id: 'kotlin.String' },
  { id: 'kotlin.Int' },
  { id: 'kotlin.Long' },
  { id: 'kotlin.Boolean' },
  { id: 'kotlin.Unit' },
  { id: 'kotlin.Nothing' },
  { id: 'kotlin.collections.List', kind: 'interface' },
  { id: 'kotlin.collections.Map', kind: 'interface' },
  { id: 'kotlin.collections.MutableList', kind: 'interface' },
  { id: 'kotlin.collections.ArrayList' },
  { id: 'kotlinx.collections.immutable.ImmutableList', kind: 'interface' },
  { id: 'kotlinx.collections.immutable.ImmutableCollection', kind: 'interface' },
  { id: 'kotlin.Function0', kind: 'interface' },
  { id: 'kotlin.Function1', kind: 'interface' },
  { id: 'kotlin.coroutines.SuspendFunction0', kind: 'interface' },
];

export function createModel(snapshot: Partial<ModelSnapshotInput> = {}): InMemoryTypeModel {
  return createTypeModelFromSnapshot({
    declarations: [...STANDARD_DECLARATIONS, ...(snapshot.declarations ?? [])],
    aliases: snapshot.aliases,
    callables: snapshot.callables,
  });
}
