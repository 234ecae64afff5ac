import { CallableId } from '../model/types';
import { CallableStabilityInfo } from '../stability/callable-analyzer';

export type TruncationKind = 'max_depth' | 'cycle' | 'cancelled';

export interface Truncation {
  kind: TruncationKind;
  reason: string;
}

export interface CascadeNode {
  id: CallableId;
  depth: number;
  stability: CallableStabilityInfo;
  children: CascadeNode[];
  /**
   * Set when the branch was cut short. Cycle and max-depth truncations have no children;
   * a node interrupted by cancellation keeps the children built before the abort.
   */
  truncated?: Truncation;
  /** Set when the node's stability could not be computed and a placeholder was used */
  error?: string;
}

export interface CascadeSummary {
  totalCount: number;
  skippableCount: number;
  unskippableCount: number;
  maxDepth: number;
  hasTruncatedBranches: boolean;
}

export interface CascadeResult {
  /** Null only when the walk was cancelled before the root was visited */
  root: CascadeNode | null;
  summary: CascadeSummary;
  /** False when the walk was cancelled and the tree is partial */
  complete: boolean;
  executionTimeMs: number;
}

export interface CascadeWalkOptions {
  /**
   * Maximum call depth. Omitted or 0 falls back to the walker's default; other values
   * are clamped to the range 1..MAX_ABSOLUTE_DEPTH.
   */
  maxDepth?: number;
  signal?: AbortSignal;
}
