/**
 * PriceWhy Pipeline
 *
 * Wires the change tracker to explanation generation for callers that want
 * evidence and both audience texts from each observed state.
 */

import type {
  AuditSink,
  Evidence,
  PriceState,
  PricingModel,
  SafetyFlags,
} from './types.js';
import { initializeAttribution, type AttributionMode } from './attribution/compute.js';
import { ChangeTracker } from './tracker/change-tracker.js';
import { generateExplanations, type ExplanationResult } from './explainability/generate.js';

export interface PipelineOptions {
  model: PricingModel;
  sink: AuditSink;
  productId: string;
  currency: string;
  safetyFlags: SafetyFlags;
  /** Use the model's explainer when it has one (default: true) */
  explainability?: boolean;
  supplierNames?: readonly string[];
  clock?: () => Date;
  idGenerator?: () => string;
}

export interface PipelineCycle {
  evidence: Evidence;
  explanations: ExplanationResult;
}

export class ExplainabilityPipeline {
  private readonly tracker: ChangeTracker;
  private readonly sink: AuditSink;
  private readonly supplierNames: readonly string[];

  constructor(options: PipelineOptions) {
    const { model, sink } = options;
    const capability =
      options.explainability === false ? undefined : model.createExplainer?.bind(model);
    const attribution = initializeAttribution(capability, sink);

    sink.logEvent('MODEL_INITIALIZED', {
      model_version: model.metadata.version,
      confidence: model.metadata.confidence,
      features: [...model.featureNames],
      mode: attribution.mode,
    });

    this.sink = sink;
    this.supplierNames = options.supplierNames ?? [];
    this.tracker = new ChangeTracker({
      attribution,
      model: model.metadata,
      sink,
      productId: options.productId,
      currency: options.currency,
      safetyFlags: options.safetyFlags,
      clock: options.clock,
      idGenerator: options.idGenerator,
    });
  }

  get mode(): AttributionMode {
    return this.tracker.mode;
  }

  /**
   * Observe one state. Returns the evidence and its explanations when the
   * state produced evidence, otherwise null.
   */
  process(state: PriceState): PipelineCycle | null {
    const evidence = this.tracker.observe(state);
    if (!evidence) {
      return null;
    }

    const explanations = generateExplanations(evidence, this.sink, {
      supplierNames: this.supplierNames,
    });
    return { evidence, explanations };
  }
}
