/**
 * PriceWhy Core Types
 *
 * Shared data model for the evidence pipeline: observed pricing states,
 * per-feature attributions, the frozen evidence record and the
 * collaborator interfaces the core consumes.
 */

// ─── Observed State ──────────────────────────────────────────

/**
 * One pricing decision as produced by the pricing model each cycle.
 * Owned by the caller; the core never writes to it.
 */
export interface PriceState {
  price: number;
  /** Model input features keyed by feature name */
  inputs: Readonly<Record<string, number>>;
}

// ─── Attribution ─────────────────────────────────────────────

export interface FeatureAttribution {
  /** Raw feature key, e.g. `raw_material_cost` */
  name: string;
  /** Percentage change of the feature's input value, one decimal */
  value_change_pct: number;
  /** Absolute magnitude before normalization, fraction of 1.0 after */
  attribution: number;
  /** Signed explainer contribution, kept for audit (explainable mode only) */
  raw_signed_value?: number;
  /** System the feature value was sourced from */
  data_source: string;
}

// ─── Evidence Contract ───────────────────────────────────────

export interface SafetyFlags {
  hide_exact_costs: boolean;
  hide_supplier_names: boolean;
}

export interface TimeWindow {
  /** YYYY-MM-DD */
  from: string;
  /** YYYY-MM-DD */
  to: string;
}

/**
 * The single source of truth for one price change.
 * Field names follow the JSON wire contract.
 */
export interface Evidence {
  readonly event_id: string;
  readonly product_id: string;
  readonly old_price: number;
  readonly new_price: number;
  readonly currency: string;
  /** UTC, YYYY-MM-DDTHH:MM:SSZ */
  readonly event_time: string;
  readonly model_version: string;
  readonly xai_method: string;
  readonly time_window: Readonly<TimeWindow>;
  readonly features_used: ReadonlyArray<Readonly<FeatureAttribution>>;
  readonly confidence_score: number;
  readonly safety_flags: Readonly<SafetyFlags>;
}

/** Fields every evidence record must carry before it may be rendered. */
export const REQUIRED_EVIDENCE_FIELDS = [
  'old_price',
  'new_price',
  'currency',
  'model_version',
  'time_window',
  'features_used',
  'confidence_score',
  'safety_flags',
  'xai_method',
] as const;

export type RequiredEvidenceField = (typeof REQUIRED_EVIDENCE_FIELDS)[number];

/** The only explainability method evidence may declare. */
export const XAI_METHOD = 'SHAP';

// ─── Rendering ───────────────────────────────────────────────

export type Audience = 'customer' | 'regulator';

export const AUDIENCES: readonly Audience[] = ['customer', 'regulator'];

// ─── Collaborators ───────────────────────────────────────────

/**
 * Metadata the pricing model supplies for each evidence record.
 */
export interface ModelMetadata {
  version: string;
  /** Trust in the model's output, 0-1 */
  confidence: number;
}

/**
 * Explainability capability: signed per-feature contributions for an
 * input vector, aligned with `featureNames`.
 */
export interface Explainer {
  readonly featureNames: readonly string[];
  explain(inputs: Readonly<Record<string, number>>): number[];
}

/**
 * The pricing predictor. `createExplainer` is optional; models that
 * cannot explain themselves leave it out.
 */
export interface PricingModel {
  readonly metadata: ModelMetadata;
  readonly featureNames: readonly string[];
  predict(inputs: Readonly<Record<string, number>>): number;
  createExplainer?(): Explainer;
}

export type AuditEventType =
  | 'MODEL_INITIALIZED'
  | 'EXPLAINABILITY_UNAVAILABLE'
  | 'ATTRIBUTION_FAILED'
  | 'ATTRIBUTION_VALIDATION_FAILED'
  | 'EVIDENCE_GENERATED'
  | 'GENERATION_REFUSED'
  | 'TEXT_GENERATED';

/**
 * Audit log collaborator. Fire-and-forget: callers never await it and
 * its failures never reach the pipeline.
 */
export interface AuditSink {
  logEvent(type: AuditEventType, details: Record<string, unknown>): void;
}

// ─── Configuration ───────────────────────────────────────────

export interface PriceWhyConfig {
  version: string;
  productId: string;
  /** ISO 4217 code */
  currency: string;
  /** Model file path; null uses the bundled linear model */
  modelPath: string | null;
  audit: {
    path: string;
  };
  safety: {
    hideExactCosts: boolean;
    hideSupplierNames: boolean;
    /** Supplier names redacted when hideSupplierNames is set */
    supplierNames: string[];
  };
}
