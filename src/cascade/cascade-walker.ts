import { CallableId, CallGraphQuery } from '../model/types';
import { CallableStabilityInfo, CallableStabilityProvider } from '../stability/callable-analyzer';
import { config } from '../utils/config';
import { createComponentLogger } from '../utils/logger';
import { CascadeNode, CascadeResult, CascadeSummary, CascadeWalkOptions } from './types';

const logger = createComponentLogger('cascade-walker');

export const MAX_ABSOLUTE_DEPTH = 50;

interface WalkState {
  maxDepth: number;
  visited: Set<CallableId>;
  signal?: AbortSignal;
  cancelled: boolean;
}

/**
 * Builds the tree of callables reachable from a root, annotated with per-node stability.
 *
 * The visited set is branch-local: a callee may appear under several siblings
 * (diamonds) but never twice on the same root-to-leaf path.
 */
export class CascadeWalker {
  private readonly DEFAULT_MAX_DEPTH: number;

  constructor(
    private readonly provider: CallableStabilityProvider,
    private readonly callGraph: CallGraphQuery,
    defaultMaxDepth: number = config.cascade.maxDepth
  ) {
    this.DEFAULT_MAX_DEPTH = defaultMaxDepth;
  }

  async walk(rootId: CallableId, options: CascadeWalkOptions = {}): Promise<CascadeResult> {
    const startTime = Date.now();
    const maxDepth = Math.max(1, Math.min(options.maxDepth || this.DEFAULT_MAX_DEPTH, MAX_ABSOLUTE_DEPTH));

    const state: WalkState = {
      maxDepth,
      visited: new Set<CallableId>(),
      signal: options.signal,
      cancelled: false,
    };

    const root = await this.visit(rootId, 0, state);
    const summary = computeSummary(root);

    logger.debug('Cascade walk finished', {
      rootId,
      maxDepth,
      totalCount: summary.totalCount,
      complete: !state.cancelled,
    });

    return {
      root,
      summary,
      complete: !state.cancelled,
      executionTimeMs: Date.now() - startTime,
    };
  }

  private async visit(id: CallableId, depth: number, state: WalkState): Promise<CascadeNode | null> {
    if (state.cancelled || state.signal?.aborted) {
      state.cancelled = true;
      return null;
    }

    const node = await this.createNode(id, depth);

    if (depth >= state.maxDepth) {
      node.truncated = { kind: 'max_depth', reason: `max depth reached (${state.maxDepth})` };
      return node;
    }

    if (state.visited.has(id)) {
      node.truncated = { kind: 'cycle', reason: `cycle detected: ${id}` };
      return node;
    }

    state.visited.add(id);

    try {
      const callees = await this.getCallees(id);

      for (const calleeId of callees) {
        const child = await this.visit(calleeId, depth + 1, state);
        if (!child) {
          node.truncated = { kind: 'cancelled', reason: 'walk cancelled' };
          break;
        }
        node.children.push(child);
      }
    } finally {
      state.visited.delete(id);
    }

    return node;
  }

  private async createNode(id: CallableId, depth: number): Promise<CascadeNode> {
    try {
      const stability = await this.provider.analyzeCallable(id);
      if (stability) {
        return { id, depth, stability, children: [] };
      }
      return { id, depth, stability: placeholderStability(id), children: [], error: 'callable not found' };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn('Failed to analyze callable, using placeholder', { id, error: errorMessage });
      return { id, depth, stability: placeholderStability(id), children: [], error: errorMessage };
    }
  }

  /**
   * Direct callees, deduplicated in first-seen order.
   */
  private async getCallees(id: CallableId): Promise<CallableId[]> {
    try {
      const callees = await this.callGraph.callees(id);
      return [...new Set(callees)];
    } catch (error) {
      logger.error('Error querying callees', {
        id,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}

/**
 * Conservative stand-in for a node whose stability could not be computed.
 */
export function placeholderStability(id: CallableId): CallableStabilityInfo {
  return {
    id,
    name: id,
    qualifiedName: id,
    isRestartable: true,
    isSkippable: false,
    isReadonly: false,
    isSkippableInStrongSkippingMode: false,
    parameters: [],
    receivers: [],
  };
}

export function computeSummary(root: CascadeNode | null): CascadeSummary {
  const summary: CascadeSummary = {
    totalCount: 0,
    skippableCount: 0,
    unskippableCount: 0,
    maxDepth: 0,
    hasTruncatedBranches: false,
  };

  if (!root) {
    return summary;
  }

  const stack: CascadeNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    summary.totalCount++;
    if (node.stability.isSkippable) {
      summary.skippableCount++;
    } else {
      summary.unskippableCount++;
    }
    summary.maxDepth = Math.max(summary.maxDepth, node.depth);
    if (node.truncated) {
      summary.hasTruncatedBranches = true;
    }
    stack.push(...node.children);
  }

  return summary;
}
