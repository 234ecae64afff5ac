import { ClassDecl, FunctionTypeRef, TypeModel, TypeRef } from '../model/types';
import { withNullability } from '../model/type-builders';
import { renderType } from '../model/type-renderer';
import { createComponentLogger } from '../utils/logger';
import {
  Classification,
  combine,
  isStable,
  isUnstable,
  parameter,
  runtime,
  stable,
  unknown,
  unstable,
} from './classification';
import { AnalysisContext, SymbolGuard } from './cycle-guard';
import { StabilityCatalog, getDefaultCatalog } from './stability-catalog';

const logger = createComponentLogger('stability-classifier');

export const MAX_ALIAS_EXPANSIONS = 32;

export const REASONS = {
  CALLBACK_FUNCTION: 'callback-annotated function type',
  SUSPEND_FUNCTION: 'suspending function type',
  FUNCTION: 'function type',
  UNRESOLVED: 'unresolved',
  TOO_COMPLEX: 'too complex',
  CIRCULAR_REFERENCE: 'circular reference',
  CIRCULAR_ASSUMED_STABLE: 'circular reference - assumed stable',
  STABLE_ANNOTATION: 'annotated as stable',
  PRIMITIVE: 'primitive type',
  STRING: 'string type',
  UNIT: 'Unit/Nothing type',
  MUTABLE_COLLECTION: 'mutable collection',
  IMMUTABLE_COLLECTION: 'immutable collection',
  STANDARD_COLLECTION: 'interface; concrete implementation may be mutable',
  ENUM: 'enum class',
  MARKER_STABLE: 'marker type, all properties stable',
  INTERFACE: 'interface; implementation could vary',
  ABSTRACT: 'abstract; subclass could vary',
  NO_MUTABLE_STATE: 'no mutable state',
  ALL_PROPERTIES_STABLE: 'all properties stable',
  INFERRED_STABLE: 'inferred stable by a previous compilation',
} as const;

type Expansion = { ok: true; type: TypeRef } | { ok: false; result: Classification };

/**
 * Decides whether values of a type can be treated as unchanged unless replaced.
 *
 * Rules are evaluated in a fixed order and the first match wins, so an allowlisted
 * interface is stable before the interface rule is ever reached.
 */
export class StabilityClassifier {
  private readonly catalog: StabilityCatalog;

  constructor(
    private readonly typeModel: TypeModel,
    catalog?: StabilityCatalog
  ) {
    this.catalog = catalog ?? getDefaultCatalog();
  }

  /**
   * Classify a use-site type. Never throws: lookup failures degrade to `runtime`.
   */
  classify(type: TypeRef, context: AnalysisContext): Classification {
    let signature: string;
    try {
      signature = renderType(withNullability(type, false));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn('Could not render type for stability analysis', { error: errorMessage });
      return runtime('<unrenderable type>', `analysis failed: ${errorMessage}`);
    }

    const entry = context.signatures.enter(signature);

    if (entry === 'cycle') {
      return runtime(signature, REASONS.CIRCULAR_REFERENCE);
    }
    if (entry === 'too_deep') {
      logger.debug('Recursion depth limit reached', {
        type: signature,
        maxRecursionDepth: context.policy.maxRecursionDepth,
      });
      return runtime(signature, REASONS.TOO_COMPLEX);
    }

    try {
      return this.classifyType(type, context);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn('Stability analysis failed', { type: signature, error: errorMessage });
      return runtime(signature, `analysis failed: ${errorMessage}`);
    } finally {
      context.signatures.exit(signature);
    }
  }

  /**
   * Class-level rules. `symbolGuard` holds declarations already under analysis on this path.
   */
  analyzeClass(
    decl: ClassDecl,
    context: AnalysisContext,
    symbolGuard: SymbolGuard = new SymbolGuard()
  ): Classification {
    if (symbolGuard.has(decl.id)) {
      return stable(REASONS.CIRCULAR_ASSUMED_STABLE);
    }

    if (decl.kind === 'unknown') {
      return unknown(decl.simpleName);
    }

    symbolGuard.add(decl.id);
    try {
      return this.applyClassRules(decl, context);
    } finally {
      symbolGuard.delete(decl.id);
    }
  }

  private classifyType(type: TypeRef, context: AnalysisContext): Classification {
    const expansion = this.expandAliases(type);
    if (!expansion.ok) {
      return expansion.result;
    }

    const expanded = withNullability(expansion.type, false);

    switch (expanded.kind) {
      case 'parameter':
        return parameter(expanded.name);

      case 'function':
        return stable(this.functionReason(type, expanded));

      case 'alias':
        // expandAliases only returns non-alias types
        return runtime(renderType(expanded), REASONS.UNRESOLVED);

      case 'class': {
        const decl = this.typeModel.resolve(expanded);
        if (!decl) {
          return runtime(renderType(expanded), REASONS.UNRESOLVED);
        }

        const fqName = decl.qualifiedName;
        if (fqName !== undefined && this.catalog.isFunctionInterface(fqName)) {
          const annotations = [...type.annotations, ...expanded.annotations];
          if (this.catalog.hasCallbackAnnotation(annotations)) {
            return stable(REASONS.CALLBACK_FUNCTION);
          }
          return stable(
            this.catalog.isSuspendFunctionInterface(fqName) ? REASONS.SUSPEND_FUNCTION : REASONS.FUNCTION
          );
        }

        return this.analyzeClass(decl, context);
      }
    }
  }

  private expandAliases(type: TypeRef): Expansion {
    let current = type;
    let steps = 0;

    while (current.kind === 'alias') {
      if (steps >= MAX_ALIAS_EXPANSIONS) {
        return { ok: false, result: runtime(renderType(withNullability(type, false)), REASONS.TOO_COMPLEX) };
      }

      const next = this.typeModel.expandAlias(current);
      if (next === current || (next.kind === 'alias' && renderType(next) === renderType(current))) {
        return { ok: false, result: runtime(renderType(withNullability(current, false)), REASONS.UNRESOLVED) };
      }

      current = next;
      steps++;
    }

    return { ok: true, type: current };
  }

  private functionReason(original: TypeRef, expanded: FunctionTypeRef): string {
    if (this.catalog.hasCallbackAnnotation([...original.annotations, ...expanded.annotations])) {
      return REASONS.CALLBACK_FUNCTION;
    }
    return expanded.suspending ? REASONS.SUSPEND_FUNCTION : REASONS.FUNCTION;
  }

  private applyClassRules(decl: ClassDecl, context: AnalysisContext): Classification {
    const { policy } = context;
    const fqName = decl.qualifiedName;
    const displayName = fqName ?? decl.simpleName;

    if (policy.isIgnored(displayName)) {
      return stable(`Ignored by policy: ${displayName}`);
    }

    if (policy.isCustomStable(displayName)) {
      return stable(`Custom stable type: ${displayName}`);
    }

    if (fqName !== undefined && this.catalog.isKnownStable(fqName)) {
      return stable(`Known stable type: ${fqName}`);
    }

    if (this.catalog.isKnownStableSimpleName(decl.simpleName)) {
      return stable(`Known stable type: ${decl.simpleName}`);
    }

    if (this.catalog.hasStableAnnotation(decl.annotations)) {
      return stable(REASONS.STABLE_ANNOTATION);
    }

    if (fqName !== undefined) {
      if (this.catalog.isPrimitive(fqName)) return stable(REASONS.PRIMITIVE);
      if (this.catalog.isString(fqName)) return stable(REASONS.STRING);
      if (this.catalog.isUnitLike(fqName)) return stable(REASONS.UNIT);
      if (this.catalog.isFunctionInterface(fqName)) return stable(REASONS.FUNCTION);
      if (this.catalog.isMutableCollection(fqName)) return unstable(REASONS.MUTABLE_COLLECTION);
    }

    if (this.catalog.isImmutableCollection(fqName, decl.simpleName)) {
      return stable(REASONS.IMMUTABLE_COLLECTION);
    }

    if (fqName !== undefined && this.catalog.isStandardCollection(fqName)) {
      return runtime(fqName, REASONS.STANDARD_COLLECTION);
    }

    if (decl.kind === 'value_class') {
      return this.analyzeValueClass(decl, context);
    }

    if (decl.kind === 'enum') {
      return stable(REASONS.ENUM);
    }

    if (this.catalog.hasMarkerAnnotation(decl.annotations)) {
      const markerResult = this.analyzeMarkerType(decl, context);
      if (markerResult) {
        return markerResult;
      }
    }

    if (decl.kind === 'interface') {
      return runtime(displayName, REASONS.INTERFACE);
    }

    if (decl.modality === 'abstract') {
      return runtime(displayName, REASONS.ABSTRACT);
    }

    const propertyResult = this.analyzeProperties(decl, context);
    if (isStable(propertyResult) || isUnstable(propertyResult)) {
      return propertyResult;
    }

    if (decl.inferredStability) {
      const { parameters } = decl.inferredStability;
      if (parameters === 0) {
        return stable(REASONS.INFERRED_STABLE);
      }
      return runtime(displayName, `inferred stability depends on ${parameters} type parameter(s)`);
    }

    return propertyResult;
  }

  private analyzeValueClass(decl: ClassDecl, context: AnalysisContext): Classification {
    const displayName = decl.qualifiedName ?? decl.simpleName;
    const wrapped = decl.wrappedProperty;
    if (!wrapped) {
      return runtime(displayName, 'value class without a wrapped property');
    }

    const inner = this.classify(wrapped.type, context);
    const reason = `Value class - stability inherited from wrapped type (${renderType(wrapped.type)})`;

    switch (inner.kind) {
      case 'stable':
        return stable(reason);
      case 'unstable':
        return unstable(reason);
      case 'runtime':
        return runtime(inner.typeName, reason);
      default:
        return inner;
    }
  }

  /**
   * Marker-annotated types are judged by their declared properties only.
   * Returns undefined when the declaration should fall through to the interface/abstract rules.
   */
  private analyzeMarkerType(decl: ClassDecl, context: AnalysisContext): Classification | undefined {
    const mutableCount = decl.properties.filter(property => property.mutable).length;
    if (mutableCount > 0) {
      return unstable(mutablePropertiesReason(mutableCount));
    }

    const allStable = decl.properties.every(property => isStable(this.classify(property.type, context)));
    return allStable ? stable(REASONS.MARKER_STABLE) : undefined;
  }

  private analyzeSupertypes(decl: ClassDecl, context: AnalysisContext): Classification | undefined {
    for (const supertype of decl.supertypes) {
      if (supertype.kind === 'class' && this.catalog.isRootType(supertype.declarationId)) {
        continue;
      }

      const result = this.classify(supertype, context);
      if (isStable(result)) {
        continue;
      }

      const superName = renderType(withNullability(supertype, false));
      switch (result.kind) {
        case 'unstable':
          return unstable(`extends unstable type ${superName}`);
        case 'combined':
          return result;
        default:
          return runtime(superName, `extends ${superName} with runtime stability`);
      }
    }
    return undefined;
  }

  private analyzeProperties(decl: ClassDecl, context: AnalysisContext): Classification {
    const superResult = this.analyzeSupertypes(decl, context);

    if (decl.properties.length === 0) {
      return superResult ?? stable(REASONS.NO_MUTABLE_STATE);
    }

    const mutableCount = decl.properties.filter(property => property.mutable).length;
    if (mutableCount > 0) {
      return unstable(mutablePropertiesReason(mutableCount));
    }

    const propertyResults = decl.properties.map(property => ({
      name: property.name,
      result: this.classify(property.type, context),
    }));

    const unstableNames = propertyResults.filter(entry => isUnstable(entry.result)).map(entry => entry.name);
    if (unstableNames.length > 0) {
      return unstable(`properties with unstable types: [${unstableNames.join(', ')}]`);
    }

    const nonStable = propertyResults.map(entry => entry.result).filter(result => !isStable(result));
    if (superResult) {
      nonStable.push(superResult);
    }

    if (nonStable.length === 0) {
      return stable(REASONS.ALL_PROPERTIES_STABLE);
    }

    logger.debug('Class stability depends on members', {
      declaration: decl.id,
      nonStable: nonStable.length,
    });
    return combine(nonStable);
  }
}

function mutablePropertiesReason(count: number): string {
  return `${count} mutable ${count === 1 ? 'property' : 'properties'}`;
}
