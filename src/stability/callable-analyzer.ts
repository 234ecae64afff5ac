import { StabilityPolicy } from '../config/stability-policy';
import { CallableId, CallableSource, ReceiverKind, TypeRef } from '../model/types';
import { renderType } from '../model/type-renderer';
import { createComponentLogger } from '../utils/logger';
import {
  Classification,
  ParameterStability,
  describeClassification,
  toParameterStability,
} from './classification';
import { AnalysisContext, createAnalysisContext } from './cycle-guard';
import { StabilityCatalog, getDefaultCatalog } from './stability-catalog';
import { StabilityClassifier } from './stability-classifier';

const logger = createComponentLogger('callable-analyzer');

export interface TypeStabilityInfo {
  /** Rendered use-site type */
  type: string;
  classification: Classification;
  stability: ParameterStability;
  reason: string;
}

export interface ParameterStabilityInfo extends TypeStabilityInfo {
  name: string;
}

export interface ReceiverStabilityInfo extends TypeStabilityInfo {
  kind: ReceiverKind;
}

export interface CallableStabilityInfo {
  id: CallableId;
  name: string;
  qualifiedName: string;
  isRestartable: boolean;
  isSkippable: boolean;
  isReadonly: boolean;
  /** Skippable only because strong skipping treats non-stable inputs as identity-comparable */
  isSkippableInStrongSkippingMode: boolean;
  parameters: ParameterStabilityInfo[];
  receivers: ReceiverStabilityInfo[];
}

export interface CallableStabilityProvider {
  analyzeCallable(id: CallableId): CallableStabilityInfo | undefined | Promise<CallableStabilityInfo | undefined>;
}

/**
 * Classifies every parameter and receiver of a callable and derives its skippable flags.
 */
export class CallableAnalyzer implements CallableStabilityProvider {
  private readonly catalog: StabilityCatalog;

  constructor(
    private readonly callables: CallableSource,
    private readonly classifier: StabilityClassifier,
    private readonly policy: StabilityPolicy,
    catalog?: StabilityCatalog
  ) {
    this.catalog = catalog ?? getDefaultCatalog();
  }

  analyzeCallable(id: CallableId): CallableStabilityInfo | undefined {
    const callable = this.callables.resolveCallable(id);
    if (!callable) {
      logger.debug('Callable not found', { id });
      return undefined;
    }

    const context = createAnalysisContext(this.policy);

    const parameters: ParameterStabilityInfo[] = callable.parameters.map(param => ({
      name: param.name,
      ...this.describe(param.type, context),
    }));

    const receivers: ReceiverStabilityInfo[] = callable.receivers.map(receiver => ({
      kind: receiver.kind,
      ...this.describe(receiver.type, context),
    }));

    const naturallySkippable = [...parameters, ...receivers].every(info => info.stability === 'STABLE');
    const strongSkipping = this.policy.treatUnstableAsIdentityComparable;

    const info: CallableStabilityInfo = {
      id: callable.id,
      name: callable.name,
      qualifiedName: callable.qualifiedName,
      isRestartable: !this.catalog.hasNonRestartableAnnotation(callable.annotations),
      isSkippable: strongSkipping || naturallySkippable,
      isReadonly: this.catalog.hasReadOnlyAnnotation(callable.annotations),
      isSkippableInStrongSkippingMode: strongSkipping && !naturallySkippable,
      parameters,
      receivers,
    };

    logger.debug('Analyzed callable', {
      id,
      isSkippable: info.isSkippable,
      parameters: parameters.length,
      receivers: receivers.length,
    });

    return info;
  }

  private describe(type: TypeRef, context: AnalysisContext): TypeStabilityInfo {
    const classification = this.classifier.classify(type, context);
    return {
      type: renderType(type),
      classification,
      stability: toParameterStability(classification),
      reason: describeClassification(classification),
    };
  }
}
