/**
 * Read-only facts about a nominal type graph, as supplied by the host type checker.
 *
 * Every value in this module is an immutable snapshot. The analyzer never mutates
 * a TypeRef or a declaration; it only queries them through {@link TypeModel}.
 */

export type ClassKind = 'class' | 'interface' | 'enum' | 'value_class' | 'unknown';

export type Modality = 'final' | 'open' | 'abstract' | 'sealed';

interface TypeRefBase {
  nullable: boolean;
  annotations: string[];
}

/**
 * Reference to a nominal class-like declaration, possibly parameterized.
 */
export interface ClassTypeRef extends TypeRefBase {
  kind: 'class';
  declarationId: string;
  typeArguments: TypeRef[];
}

/**
 * An unbound generic parameter such as `T`.
 */
export interface TypeParameterRef extends TypeRefBase {
  kind: 'parameter';
  name: string;
}

export interface FunctionTypeRef extends TypeRefBase {
  kind: 'function';
  suspending: boolean;
  receiverType?: TypeRef;
  parameterTypes: TypeRef[];
  returnType: TypeRef;
}

/**
 * Reference through a type alias; must be expanded before analysis.
 */
export interface AliasTypeRef extends TypeRefBase {
  kind: 'alias';
  aliasId: string;
  typeArguments: TypeRef[];
}

export type TypeRef = ClassTypeRef | TypeParameterRef | FunctionTypeRef | AliasTypeRef;

export interface PropertyDecl {
  name: string;
  type: TypeRef;
  /** `var`-like when true, `val`-like when false */
  mutable: boolean;
}

/**
 * Metadata a previous compilation of the declaring module left behind.
 * `parameters === 0` means the compiler inferred the class as stable.
 */
export interface InferredStabilityMetadata {
  parameters: number;
}

export interface ClassDecl {
  id: string;
  /** Absent when the host could not compute it (e.g. test sources) */
  qualifiedName?: string;
  simpleName: string;
  kind: ClassKind;
  modality: Modality;
  properties: PropertyDecl[];
  /** Direct supertypes in declaration order, universal root type excluded */
  supertypes: TypeRef[];
  annotations: string[];
  /** Value classes only */
  wrappedProperty?: PropertyDecl;
  inferredStability?: InferredStabilityMetadata;
}

/**
 * Read-only queries against the host's symbol table.
 * Implementations must be deterministic for a fixed snapshot.
 */
export interface TypeModel {
  resolve(type: ClassTypeRef): ClassDecl | undefined;
  /** Expands one or more alias levels. Non-alias input is returned unchanged. */
  expandAlias(type: TypeRef): TypeRef;
}

export type CallableId = string;

export type ReceiverKind = 'extension' | 'dispatch' | 'context';

export interface CallableParameterDecl {
  name: string;
  type: TypeRef;
}

export interface CallableReceiverDecl {
  kind: ReceiverKind;
  type: TypeRef;
}

export interface CallableDecl {
  id: CallableId;
  name: string;
  qualifiedName: string;
  parameters: CallableParameterDecl[];
  receivers: CallableReceiverDecl[];
  annotations: string[];
}

export interface CallableSource {
  resolveCallable(id: CallableId): CallableDecl | undefined;
}

/**
 * Statically resolvable call edges. Unresolvable calls are omitted, not reported.
 */
export interface CallGraphQuery {
  callees(id: CallableId): CallableId[] | Promise<CallableId[]>;
}
