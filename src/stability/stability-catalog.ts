/**
 * Built-in knowledge about well-known types.
 *
 * The lists live in config/stability/known-types.json and are validated with zod
 * on first load. Tests and embedders can build a catalog from their own data with
 * {@link createStabilityCatalog}.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { createComponentLogger } from '../utils/logger';
import { resolveProjectPath } from '../utils/project-root';

const logger = createComponentLogger('stability-catalog');

const KnownTypesSchema = z.object({
  primitiveTypes: z.array(z.string()),
  stringTypes: z.array(z.string()),
  unitTypes: z.array(z.string()),
  rootTypes: z.array(z.string()),
  functionTypePrefixes: z.array(z.string()),
  suspendFunctionTypePrefixes: z.array(z.string()),
  callbackAnnotations: z.array(z.string()),
  stableAnnotations: z.array(z.string()),
  markerAnnotations: z.array(z.string()),
  mutableCollectionTypes: z.array(z.string()),
  standardCollectionTypes: z.array(z.string()),
  immutableCollectionPackages: z.array(z.string()),
  immutableCollectionSimpleNames: z.array(z.string()),
  knownStableTypes: z.array(z.string()),
  knownStableSimpleNames: z.array(z.string()),
  nonRestartableAnnotations: z.array(z.string()),
  readOnlyAnnotations: z.array(z.string()),
});

export type KnownTypesData = z.infer<typeof KnownTypesSchema>;

export interface StabilityCatalog {
  isPrimitive(qualifiedName: string): boolean;
  isString(qualifiedName: string): boolean;
  isUnitLike(qualifiedName: string): boolean;
  /** The universal root type every class extends implicitly */
  isRootType(qualifiedName: string): boolean;
  /** Synthetic function interfaces such as `kotlin.Function1` */
  isFunctionInterface(qualifiedName: string): boolean;
  isSuspendFunctionInterface(qualifiedName: string): boolean;
  isMutableCollection(qualifiedName: string): boolean;
  isStandardCollection(qualifiedName: string): boolean;
  isImmutableCollection(qualifiedName: string | undefined, simpleName: string): boolean;
  isKnownStable(qualifiedName: string): boolean;
  isKnownStableSimpleName(simpleName: string): boolean;
  hasCallbackAnnotation(annotations: readonly string[]): boolean;
  hasStableAnnotation(annotations: readonly string[]): boolean;
  hasMarkerAnnotation(annotations: readonly string[]): boolean;
  hasNonRestartableAnnotation(annotations: readonly string[]): boolean;
  hasReadOnlyAnnotation(annotations: readonly string[]): boolean;
}

export class CatalogLoadError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'CatalogLoadError';
  }
}

export function createStabilityCatalog(data: unknown): StabilityCatalog {
  const parsed = KnownTypesSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CatalogLoadError('Invalid known-types catalog', issues);
  }

  const known = parsed.data;
  const primitives = new Set(known.primitiveTypes);
  const strings = new Set(known.stringTypes);
  const units = new Set(known.unitTypes);
  const roots = new Set(known.rootTypes);
  const mutableCollections = new Set(known.mutableCollectionTypes);
  const standardCollections = new Set(known.standardCollectionTypes);
  const immutableSimpleNames = new Set(known.immutableCollectionSimpleNames);
  const knownStable = new Set(known.knownStableTypes);
  const knownStableSimple = new Set(known.knownStableSimpleNames);

  const anyOf = (names: string[]) => {
    const lookup = new Set(names);
    return (annotations: readonly string[]) => annotations.some(annotation => lookup.has(annotation));
  };

  return {
    isPrimitive: qualifiedName => primitives.has(qualifiedName),
    isString: qualifiedName => strings.has(qualifiedName),
    isUnitLike: qualifiedName => units.has(qualifiedName),
    isRootType: qualifiedName => roots.has(qualifiedName),
    isFunctionInterface: qualifiedName =>
      known.functionTypePrefixes.some(prefix => qualifiedName.startsWith(prefix)),
    isSuspendFunctionInterface: qualifiedName =>
      known.suspendFunctionTypePrefixes.some(prefix => qualifiedName.startsWith(prefix)),
    isMutableCollection: qualifiedName => mutableCollections.has(qualifiedName),
    isStandardCollection: qualifiedName => standardCollections.has(qualifiedName),
    isImmutableCollection: (qualifiedName, simpleName) => {
      if (
        qualifiedName !== undefined &&
        known.immutableCollectionPackages.some(pkg => qualifiedName.startsWith(pkg)) &&
        (qualifiedName.includes('Immutable') || qualifiedName.includes('Persistent'))
      ) {
        return true;
      }
      return immutableSimpleNames.has(simpleName);
    },
    isKnownStable: qualifiedName => knownStable.has(qualifiedName),
    isKnownStableSimpleName: simpleName => knownStableSimple.has(simpleName),
    hasCallbackAnnotation: anyOf(known.callbackAnnotations),
    hasStableAnnotation: anyOf(known.stableAnnotations),
    hasMarkerAnnotation: anyOf(known.markerAnnotations),
    hasNonRestartableAnnotation: anyOf(known.nonRestartableAnnotations),
    hasReadOnlyAnnotation: anyOf(known.readOnlyAnnotations),
  };
}

let defaultCatalog: StabilityCatalog | null = null;

/**
 * Load the catalog shipped in config/stability/known-types.json (cached after the first call).
 */
export function getDefaultCatalog(): StabilityCatalog {
  if (defaultCatalog) {
    return defaultCatalog;
  }

  const catalogPath = resolveProjectPath('config', 'stability', 'known-types.json');
  if (!fs.existsSync(catalogPath)) {
    throw new CatalogLoadError(`Known-types catalog not found: ${catalogPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Failed to read known-types catalog ${catalogPath}: ${errorMessage}`);
  }

  defaultCatalog = createStabilityCatalog(raw);
  logger.debug('Loaded known-types catalog', { catalogPath });
  return defaultCatalog;
}
