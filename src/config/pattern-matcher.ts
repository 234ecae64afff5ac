import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('pattern-matcher');

const DOUBLE_WILDCARD_PLACEHOLDER = '\u0000';

type CompiledPattern =
  | { type: 'regex'; pattern: string; regex: RegExp }
  | { type: 'literal'; pattern: string };

/**
 * Convert a glob-style type pattern into an anchored regular expression.
 *
 * `**` matches any run of characters, `*` matches within a single dotted segment.
 * Dots and dollar signs are literal; any other character keeps its regex meaning,
 * so the result can be invalid and this function may throw.
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/\./g, '\\.')
    .replace(/\$/g, '\\$')
    .replace(/\*\*/g, DOUBLE_WILDCARD_PLACEHOLDER)
    .replace(/\*/g, '[^.]*')
    .split(DOUBLE_WILDCARD_PLACEHOLDER)
    .join('.*');

  return new RegExp(`^(?:${source})$`);
}

/**
 * Split pattern text into individual patterns, skipping blank lines and # comments.
 */
export function parsePatternLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Matches qualified type names against a list of glob patterns.
 * Generic arguments are stripped from the name before matching.
 */
export class TypePatternMatcher {
  private readonly compiled: CompiledPattern[];

  constructor(patterns: string[] = []) {
    this.compiled = patterns
      .map(pattern => pattern.trim())
      .filter(pattern => pattern.length > 0)
      .map(pattern => this.compile(pattern));
  }

  matches(name: string | undefined): boolean {
    if (!name) {
      return false;
    }

    const rawName = stripGenerics(name);
    return this.compiled.some(entry =>
      entry.type === 'regex' ? entry.regex.test(rawName) : entry.pattern === rawName
    );
  }

  get isEmpty(): boolean {
    return this.compiled.length === 0;
  }

  getPatterns(): string[] {
    return this.compiled.map(entry => entry.pattern);
  }

  private compile(pattern: string): CompiledPattern {
    try {
      return { type: 'regex', pattern, regex: globToRegExp(pattern) };
    } catch (error) {
      logger.warn('Invalid type pattern, falling back to literal match', {
        pattern,
        error: error instanceof Error ? error.message : String(error),
      });
      return { type: 'literal', pattern };
    }
  }
}

function stripGenerics(name: string): string {
  const genericsStart = name.indexOf('<');
  return genericsStart < 0 ? name : name.substring(0, genericsStart);
}
