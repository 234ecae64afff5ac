import { StabilityPolicy } from '../config/stability-policy';

export type GuardEntry = 'entered' | 'cycle' | 'too_deep';

/**
 * Stack of rendered type signatures currently being classified.
 * One instance per analysis request; never shared between requests.
 */
export class SignatureGuard {
  private readonly active = new Set<string>();
  private readonly stack: string[] = [];

  constructor(private readonly maxDepth: number) {}

  enter(signature: string): GuardEntry {
    if (this.active.has(signature)) {
      return 'cycle';
    }
    if (this.stack.length >= this.maxDepth) {
      return 'too_deep';
    }
    this.active.add(signature);
    this.stack.push(signature);
    return 'entered';
  }

  exit(signature: string): void {
    const top = this.stack[this.stack.length - 1];
    if (top !== signature) {
      throw new Error(`Signature guard out of order: expected ${top ?? '(empty)'}, got ${signature}`);
    }
    this.stack.pop();
    this.active.delete(signature);
  }

  get depth(): number {
    return this.stack.length;
  }
}

/**
 * Set of declaration ids currently under class analysis.
 */
export class SymbolGuard {
  private readonly active: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.active = new Set(initial);
  }

  has(declarationId: string): boolean {
    return this.active.has(declarationId);
  }

  add(declarationId: string): void {
    this.active.add(declarationId);
  }

  delete(declarationId: string): void {
    this.active.delete(declarationId);
  }
}

/**
 * Per-request state handed through every classify call.
 */
export interface AnalysisContext {
  policy: StabilityPolicy;
  signatures: SignatureGuard;
}

export function createAnalysisContext(policy: StabilityPolicy): AnalysisContext {
  return {
    policy,
    signatures: new SignatureGuard(policy.maxRecursionDepth),
  };
}
