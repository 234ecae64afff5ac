import { config } from '../utils/config';
import { createComponentLogger } from '../utils/logger';
import { TypePatternMatcher } from './pattern-matcher';

const logger = createComponentLogger('stability-policy');

/**
 * Stability policy configuration
 */
export interface StabilityPolicyOptions {
  /** When false every type is treated as ignored, and therefore stable (default: true) */
  enabled: boolean;

  /** Glob patterns of qualified names excluded from analysis; matches classify as stable */
  ignoredTypePatterns: string[];

  /** Glob patterns of qualified names the user vouches for as stable */
  customStableTypePatterns: string[];

  /**
   * Treat non-stable inputs as identity-comparable when deriving the skippable flag
   * (strong skipping). Never changes a type's own classification. (default: false)
   */
  treatUnstableAsIdentityComparable: boolean;

  /** Maximum nesting of guarded classify calls before degrading to runtime (default: 64) */
  maxRecursionDepth: number;
}

/**
 * Immutable policy with pre-compiled pattern matchers
 */
export interface StabilityPolicy {
  readonly enabled: boolean;
  readonly ignoredTypePatterns: readonly string[];
  readonly customStableTypePatterns: readonly string[];
  readonly treatUnstableAsIdentityComparable: boolean;
  readonly maxRecursionDepth: number;
  isIgnored(qualifiedName: string | undefined): boolean;
  isCustomStable(qualifiedName: string | undefined): boolean;
}

/**
 * Default policy: analysis on, no patterns, strong skipping off
 */
export const DEFAULT_POLICY: StabilityPolicyOptions = {
  enabled: true,
  ignoredTypePatterns: [],
  customStableTypePatterns: [],
  treatUnstableAsIdentityComparable: false,
  maxRecursionDepth: 64,
};

export function createPolicy(options: Partial<StabilityPolicyOptions> = {}): StabilityPolicy {
  const merged: StabilityPolicyOptions = {
    ...DEFAULT_POLICY,
    ...options,
  };

  if (!Number.isInteger(merged.maxRecursionDepth) || merged.maxRecursionDepth < 1) {
    logger.warn('Invalid maxRecursionDepth, using default', {
      maxRecursionDepth: merged.maxRecursionDepth,
      default: DEFAULT_POLICY.maxRecursionDepth,
    });
    merged.maxRecursionDepth = DEFAULT_POLICY.maxRecursionDepth;
  }

  const ignoredMatcher = new TypePatternMatcher(merged.ignoredTypePatterns);
  const customStableMatcher = new TypePatternMatcher(merged.customStableTypePatterns);

  return Object.freeze({
    enabled: merged.enabled,
    ignoredTypePatterns: Object.freeze([...merged.ignoredTypePatterns]),
    customStableTypePatterns: Object.freeze([...merged.customStableTypePatterns]),
    treatUnstableAsIdentityComparable: merged.treatUnstableAsIdentityComparable,
    maxRecursionDepth: merged.maxRecursionDepth,

    isIgnored(qualifiedName: string | undefined): boolean {
      if (qualifiedName === undefined) return false;
      if (!merged.enabled) return true;
      return ignoredMatcher.matches(qualifiedName);
    },

    isCustomStable(qualifiedName: string | undefined): boolean {
      return customStableMatcher.matches(qualifiedName);
    },
  });
}

/**
 * Build a policy from environment configuration, plus patterns loaded from a config file.
 */
export function policyFromConfig(
  customStableTypePatterns: string[] = [],
  overrides: Partial<StabilityPolicyOptions> = {}
): StabilityPolicy {
  return createPolicy({
    enabled: config.stability.enabled,
    ignoredTypePatterns: config.stability.ignoredTypePatterns,
    customStableTypePatterns,
    treatUnstableAsIdentityComparable: config.stability.strongSkipping,
    maxRecursionDepth: config.stability.maxRecursionDepth,
    ...overrides,
  });
}
