export * from './types';
export * from './type-builders';
export { renderType } from './type-renderer';
export { InMemoryTypeModel, toTypeRef } from './in-memory-type-model';
export { createTypeModelFromSnapshot, loadSnapshotFile, SnapshotValidationError } from './snapshot-loader';
export type { ModelSnapshot, ModelSnapshotInput, TypeRefJson } from './snapshot-schema';
