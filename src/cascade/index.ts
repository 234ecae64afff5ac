export { CascadeWalker, computeSummary, placeholderStability, MAX_ABSOLUTE_DEPTH } from './cascade-walker';
export { formatCascadeTree, formatCascadeSummary } from './cascade-formatter';
export type { CascadeFormatOptions } from './cascade-formatter';
export type {
  CascadeNode,
  CascadeResult,
  CascadeSummary,
  CascadeWalkOptions,
  Truncation,
  TruncationKind,
} from './types';
