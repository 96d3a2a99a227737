/**
 * PriceWhy — evidence-backed price change explanations
 *
 * Public API for programmatic usage.
 */

// Core types
export type {
  Audience,
  AuditEventType,
  AuditSink,
  Evidence,
  Explainer,
  FeatureAttribution,
  ModelMetadata,
  PriceState,
  PriceWhyConfig,
  PricingModel,
  RequiredEvidenceField,
  SafetyFlags,
  TimeWindow,
} from './types.js';
export { AUDIENCES, REQUIRED_EVIDENCE_FIELDS, XAI_METHOD } from './types.js';

// Config
export {
  loadConfig,
  saveConfig,
  parseConfig,
  initializeProject,
  isInitialized,
  defaultConfig,
  safetyFlagsFor,
  auditLogPath,
  configSchema,
  ConfigError,
  PRICEWHY_DIR,
  GLOBAL_PRICEWHY_DIR,
} from './config.js';

// Attribution
export {
  ATTRIBUTION_THRESHOLD,
  AttributionError,
  computeAttributions,
  initializeAttribution,
  normalizeAttributions,
  percentChange,
  dataSourceFor,
  DATA_SOURCES,
} from './attribution/index.js';
export type { AttributionComputer, AttributionMode } from './attribution/index.js';

// Evidence
export {
  ATTRIBUTION_SUM_TOLERANCE,
  EVIDENCE_WINDOW_DAYS,
  EvidenceParseError,
  buildEvidence,
  checkAttributionSum,
  evidenceSchema,
  inspectEvidence,
  parseEvidenceJson,
  serializeEvidence,
  validateEvidence,
} from './evidence/index.js';
export type {
  EvidenceBuildOptions,
  EvidenceDraft,
  EvidenceErrorCode,
  EvidenceValidationResult,
  RenderableEvidence,
} from './evidence/index.js';

// Change tracking
export { ChangeTracker, MATERIALITY_THRESHOLD, isMaterial } from './tracker/index.js';
export type { ChangeTrackerOptions } from './tracker/index.js';

// Explanations
export {
  REFUSAL_TEXT,
  VALIDATION_FAILED,
  applySafetyFilter,
  confidenceLabel,
  explainForAudience,
  friendlyName,
  generateExplanations,
  renderExplanation,
} from './explainability/index.js';
export type {
  ExplanationOptions,
  ExplanationResult,
  SafetyFilterOptions,
} from './explainability/index.js';

// Pipeline
export { ExplainabilityPipeline } from './pipeline.js';
export type { PipelineCycle, PipelineOptions } from './pipeline.js';

// Audit
export { JsonlAuditSink, MemoryAuditSink } from './audit/index.js';
export type { AuditEvent, AuditEventFilter, JsonlAuditSinkOptions } from './audit/index.js';

// Pricing model
export {
  DEFAULT_MODEL_PATH,
  LinearPricingModel,
  MarketSimulator,
  ModelLoadError,
  applyShock,
  loadPricingModel,
} from './model/index.js';
export type { LinearModelSpec, MarketShock, MarketStep } from './model/index.js';
