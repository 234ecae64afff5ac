export * from './classification';
export { SignatureGuard, SymbolGuard, createAnalysisContext } from './cycle-guard';
export type { AnalysisContext, GuardEntry } from './cycle-guard';
export { StabilityClassifier, REASONS, MAX_ALIAS_EXPANSIONS } from './stability-classifier';
export { CallableAnalyzer } from './callable-analyzer';
export type {
  CallableStabilityInfo,
  CallableStabilityProvider,
  ParameterStabilityInfo,
  ReceiverStabilityInfo,
  TypeStabilityInfo,
} from './callable-analyzer';
export { createStabilityCatalog, getDefaultCatalog, CatalogLoadError } from './stability-catalog';
export type { StabilityCatalog, KnownTypesData } from './stability-catalog';
