/**
 * Outcome of classifying a single type.
 */
export type Classification =
  | StableClassification
  | UnstableClassification
  | RuntimeClassification
  | ParameterClassification
  | UnknownClassification
  | CombinedClassification;

export interface StableClassification {
  kind: 'stable';
  reason: string;
}

export interface UnstableClassification {
  kind: 'unstable';
  reason: string;
}

/** Stability can only be decided for a concrete runtime value. */
export interface RuntimeClassification {
  kind: 'runtime';
  typeName: string;
  reason: string;
}

export interface ParameterClassification {
  kind: 'parameter';
  name: string;
}

export interface UnknownClassification {
  kind: 'unknown';
  name: string;
}

/** Mix of non-stable outcomes where none dominates. Members are structurally distinct. */
export interface CombinedClassification {
  kind: 'combined';
  members: Classification[];
}

export type ParameterStability = 'STABLE' | 'UNSTABLE' | 'RUNTIME';

export function stable(reason: string): StableClassification {
  return { kind: 'stable', reason };
}

export function unstable(reason: string): UnstableClassification {
  return { kind: 'unstable', reason };
}

export function runtime(typeName: string, reason: string): RuntimeClassification {
  return { kind: 'runtime', typeName, reason };
}

export function parameter(name: string): ParameterClassification {
  return { kind: 'parameter', name };
}

export function unknown(name: string): UnknownClassification {
  return { kind: 'unknown', name };
}

/**
 * Build a combined classification. Nested combined members are flattened and
 * structural duplicates dropped, keeping first-seen order.
 */
export function combine(members: Classification[]): CombinedClassification {
  const seen = new Set<string>();
  const flattened: Classification[] = [];

  const add = (member: Classification): void => {
    if (member.kind === 'combined') {
      member.members.forEach(add);
      return;
    }
    const key = classificationKey(member);
    if (!seen.has(key)) {
      seen.add(key);
      flattened.push(member);
    }
  };

  members.forEach(add);
  return { kind: 'combined', members: flattened };
}

export function isStable(classification: Classification): boolean {
  switch (classification.kind) {
    case 'stable':
      return true;
    case 'combined':
      return classification.members.every(isStable);
    default:
      return false;
  }
}

export function isUnstable(classification: Classification): boolean {
  switch (classification.kind) {
    case 'unstable':
      return true;
    case 'combined':
      return classification.members.some(isUnstable);
    default:
      return false;
  }
}

export function toParameterStability(classification: Classification): ParameterStability {
  if (isStable(classification)) return 'STABLE';
  if (isUnstable(classification)) return 'UNSTABLE';
  return 'RUNTIME';
}

export function describeClassification(classification: Classification): string {
  switch (classification.kind) {
    case 'stable':
    case 'unstable':
    case 'runtime':
      return classification.reason;
    case 'parameter':
      return `Type parameter ${classification.name} - stability depends on the type argument`;
    case 'unknown':
      return `Unknown stability: ${classification.name}`;
    case 'combined':
      return classification.members.map(describeClassification).join('; ');
  }
}

/**
 * Canonical string for structural equality.
 */
export function classificationKey(classification: Classification): string {
  switch (classification.kind) {
    case 'stable':
    case 'unstable':
      return `${classification.kind}:${classification.reason}`;
    case 'runtime':
      return `runtime:${classification.typeName}:${classification.reason}`;
    case 'parameter':
    case 'unknown':
      return `${classification.kind}:${classification.name}`;
    case 'combined':
      return `combined:[${classification.members.map(classificationKey).join(',')}]`;
  }
}
