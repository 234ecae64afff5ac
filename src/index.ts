/**
 * Type Stability Analyzer
 *
 * Classifies whether values of a type can be treated as unchanged unless replaced,
 * derives the skippable flag of UI callables from their parameters, and walks the
 * call graph below a callable to report which descendants can skip.
 */

export * from './model';
export * from './stability';
export * from './cascade';

export { TypePatternMatcher, globToRegExp, parsePatternLines } from './config/pattern-matcher';
export { createPolicy, policyFromConfig, DEFAULT_POLICY } from './config/stability-policy';
export type { StabilityPolicy, StabilityPolicyOptions } from './config/stability-policy';
export { loadStabilityConfigFile } from './config/stability-config-file';

export { logger, createComponentLogger } from './utils/logger';
export { config } from './utils/config';
