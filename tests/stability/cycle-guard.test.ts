import { createPolicy } from '../../src/config/stability-policy';
import { SignatureGuard, SymbolGuard, createAnalysisContext } from '../../src/stability/cycle-guard';

describe('SignatureGuard', () => {
  it('should report re-entry of an active signature as a cycle', () => {
    const guard = new SignatureGuard(8);
    expect(guard.enter('com.example.Node')).toBe('entered');
    expect(guard.enter('com.example.Node')).toBe('cycle');
    expect(guard.depth).toBe(1);
  });

  it('should allow a signature again after it exits', () => {
    const guard = new SignatureGuard(8);
    guard.enter('com.example.Node');
    guard.exit('com.example.Node');
    expect(guard.enter('com.example.Node')).toBe('entered');
  });

  it('should refuse entries beyond the maximum depth', () => {
    const guard = new SignatureGuard(2);
    expect(guard.enter('a')).toBe('entered');
    expect(guard.enter('b')).toBe('entered');
    expect(guard.enter('c')).toBe('too_deep');
    expect(guard.depth).toBe(2);
  });

  it('should reject exits out of order', () => {
    const guard = new SignatureGuard(8);
    guard.enter('a');
    guard.enter('b');
    expect(() => guard.exit('a')).toThrow('Signature guard out of order: expected b, got a');
  });
});

describe('SymbolGuard', () => {
  it('should track declaration ids', () => {
    const guard = new SymbolGuard(['com.example.A']);
    expect(guard.has('com.example.A')).toBe(true);
    guard.add('com.example.B');
    guard.delete('com.example.A');
    expect(guard.has('com.example.A')).toBe(false);
    expect(guard.has('com.example.B')).toBe(true);
  });
});

describe('createAnalysisContext', () => {
  it('should size the signature guard from the policy', () => {
    const context = createAnalysisContext(createPolicy({ maxRecursionDepth: 1 }));
    expect(context.signatures.enter('a')).toBe('entered');
    expect(context.signatures.enter('b')).toBe('too_deep');
  });
});
