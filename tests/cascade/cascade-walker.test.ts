import { jest } from '@jest/globals';
import { CascadeWalker, computeSummary, placeholderStability } from '../../src/cascade/cascade-walker';
import { CascadeNode } from '../../src/cascade/types';
import { CallableId, CallGraphQuery } from '../../src/model/types';
import { CallableStabilityInfo, CallableStabilityProvider } from '../../src/stability/callable-analyzer';

function info(id: CallableId, isSkippable = true): CallableStabilityInfo {
  return { ...placeholderStability(id), name: id.toUpperCase(), isSkippable };
}

function providerFor(unskippable: CallableId[] = []): CallableStabilityProvider {
  return { analyzeCallable: id => info(id, !unskippable.includes(id)) };
}

function graphOf(edges: Record<CallableId, CallableId[]>): CallGraphQuery {
  return { callees: id => edges[id] ?? [] };
}

function shape(node: CascadeNode | null): unknown {
  if (!node) return null;
  return {
    id: node.id,
    depth: node.depth,
    ...(node.truncated ? { truncated: node.truncated.kind } : {}),
    children: node.children.map(shape),
  };
}

describe('CascadeWalker', () => {
  it('should truncate direct recursion as a cycle', async () => {
    const walker = new CascadeWalker(providerFor(), graphOf({ a: ['a'] }));
    const result = await walker.walk('a');

    expect(shape(result.root)).toEqual({
      id: 'a',
      depth: 0,
      children: [{ id: 'a', depth: 1, truncated: 'cycle', children: [] }],
    });
    expect(result.root?.children[0].truncated?.reason).toBe('cycle detected: a');
    expect(result.summary).toEqual({
      totalCount: 2,
      skippableCount: 2,
      unskippableCount: 0,
      maxDepth: 1,
      hasTruncatedBranches: true,
    });
    expect(result.complete).toBe(true);
  });

  it('should keep truncated nodes annotated with stability', async () => {
    const walker = new CascadeWalker(providerFor(['a']), graphOf({ a: ['b'], b: ['a'] }));
    const result = await walker.walk('a');

    const repeated = result.root?.children[0].children[0];
    expect(repeated?.truncated).toEqual({ kind: 'cycle', reason: 'cycle detected: a' });
    expect(repeated?.stability.isSkippable).toBe(false);
    expect(result.summary.unskippableCount).toBe(2);
  });

  it('should allow the same callee in sibling branches', async () => {
    const walker = new CascadeWalker(providerFor(), graphOf({ a: ['b', 'c'], b: ['d'], c: ['d'] }));
    const result = await walker.walk('a');

    expect(shape(result.root)).toEqual({
      id: 'a',
      depth: 0,
      children: [
        { id: 'b', depth: 1, children: [{ id: 'd', depth: 2, children: [] }] },
        { id: 'c', depth: 1, children: [{ id: 'd', depth: 2, children: [] }] },
      ],
    });
    expect(result.summary.totalCount).toBe(5);
    expect(result.summary.hasTruncatedBranches).toBe(false);
  });

  it('should deduplicate repeated call sites to the same callee', async () => {
    const walker = new CascadeWalker(providerFor(), graphOf({ a: ['b', 'c', 'b'] }));
    const result = await walker.walk('a');

    expect(result.root?.children.map(child => child.id)).toEqual(['b', 'c']);
  });

  it('should truncate branches at the maximum depth', async () => {
    const walker = new CascadeWalker(providerFor(), graphOf({ a: ['b'], b: ['c'], c: ['d'] }));
    const result = await walker.walk('a', { maxDepth: 2 });

    expect(shape(result.root)).toEqual({
      id: 'a',
      depth: 0,
      children: [{ id: 'b', depth: 1, children: [{ id: 'c', depth: 2, truncated: 'max_depth', children: [] }] }],
    });
    expect(result.root?.children[0].children[0].truncated?.reason).toBe('max depth reached (2)');
    expect(result.summary.maxDepth).toBe(2);
    expect(result.summary.hasTruncatedBranches).toBe(true);
  });

  it('should use the constructor default depth when none is given', async () => {
    const walker = new CascadeWalker(providerFor(), graphOf({ a: ['b'], b: ['c'] }), 1);
    const result = await walker.walk('a');

    expect(result.root?.children[0].truncated?.reason).toBe('max depth reached (1)');
    expect(result.summary.totalCount).toBe(2);
  });

  it('should treat a zero depth as the default and clamp negative depths to one', async () => {
    const walker = new CascadeWalker(providerFor(), graphOf({ a: ['b'], b: ['c'], c: ['d'] }), 2);

    const zero = await walker.walk('a', { maxDepth: 0 });
    expect(zero.root?.children[0].children[0].truncated?.reason).toBe('max depth reached (2)');

    const negative = await walker.walk('a', { maxDepth: -3 });
    expect(negative.root?.children[0].truncated?.reason).toBe('max depth reached (1)');
    expect(negative.summary.totalCount).toBe(2);
  });

  it('should clamp the depth to the absolute maximum', async () => {
    const edges: Record<CallableId, CallableId[]> = {};
    for (let i = 0; i < 60; i++) {
      edges[`n${i}`] = [`n${i + 1}`];
    }
    const walker = new CascadeWalker(providerFor(), graphOf(edges));
    const result = await walker.walk('n0', { maxDepth: 500 });

    expect(result.summary.maxDepth).toBe(50);
    expect(result.summary.totalCount).toBe(51);
  });

  it('should accept asynchronous call graph queries', async () => {
    const graph: CallGraphQuery = { callees: async id => (id === 'a' ? ['b'] : []) };
    const walker = new CascadeWalker(providerFor(), graph);
    const result = await walker.walk('a');

    expect(result.summary.totalCount).toBe(2);
  });

  it('should substitute a placeholder when analysis fails and keep walking', async () => {
    const provider: CallableStabilityProvider = {
      analyzeCallable: id => {
        if (id === 'b') throw new Error('declaration unavailable');
        return info(id);
      },
    };
    const walker = new CascadeWalker(provider, graphOf({ a: ['b'], b: ['c'] }));
    const result = await walker.walk('a');

    const failed = result.root?.children[0];
    expect(failed?.error).toBe('declaration unavailable');
    expect(failed?.stability).toEqual(placeholderStability('b'));
    expect(failed?.children.map(child => child.id)).toEqual(['c']);
    expect(result.summary).toEqual({
      totalCount: 3,
      skippableCount: 2,
      unskippableCount: 1,
      maxDepth: 2,
      hasTruncatedBranches: false,
    });
  });

  it('should use a placeholder for callables the provider does not know', async () => {
    const provider: CallableStabilityProvider = {
      analyzeCallable: id => (id === 'a' ? info(id) : undefined),
    };
    const walker = new CascadeWalker(provider, graphOf({ a: ['ghost'] }));
    const result = await walker.walk('a');

    expect(result.root?.children[0].error).toBe('callable not found');
    expect(result.root?.children[0].stability.isSkippable).toBe(false);
  });

  it('should treat a failing callee query as a leaf', async () => {
    const graph: CallGraphQuery = {
      callees: () => {
        throw new Error('index busy');
      },
    };
    const walker = new CascadeWalker(providerFor(), graph);
    const result = await walker.walk('a');

    expect(result.root?.children).toEqual([]);
    expect(result.summary.totalCount).toBe(1);
  });

  it('should return an empty incomplete result when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const analyzeCallable = jest.fn((id: CallableId) => info(id));

    const walker = new CascadeWalker({ analyzeCallable }, graphOf({ a: ['b'] }));
    const result = await walker.walk('a', { signal: controller.signal });

    expect(result.root).toBeNull();
    expect(result.complete).toBe(false);
    expect(result.summary.totalCount).toBe(0);
    expect(analyzeCallable).not.toHaveBeenCalled();
  });

  it('should stop between node visits when cancelled mid-walk', async () => {
    const controller = new AbortController();
    const provider: CallableStabilityProvider = {
      analyzeCallable: id => {
        if (id === 'b') controller.abort();
        return info(id);
      },
    };
    const walker = new CascadeWalker(provider, graphOf({ a: ['b', 'c'], b: ['d'] }));
    const result = await walker.walk('a', { signal: controller.signal });

    expect(result.complete).toBe(false);
    expect(result.root?.truncated).toEqual({ kind: 'cancelled', reason: 'walk cancelled' });
    expect(result.root?.children.map(child => child.id)).toEqual(['b']);
    expect(result.root?.children[0].truncated).toEqual({ kind: 'cancelled', reason: 'walk cancelled' });
    expect(result.summary.totalCount).toBe(2);
    expect(result.summary.hasTruncatedBranches).toBe(true);
  });

  it('should summarize a missing root as empty', () => {
    expect(computeSummary(null)).toEqual({
      totalCount: 0,
      skippableCount: 0,
      unskippableCount: 0,
      maxDepth: 0,
      hasTruncatedBranches: false,
    });
  });
});
