/**
 * PriceWhy Evidence
 *
 * The evidence contract: validation, construction and the JSON codec.
 */

export {
  ATTRIBUTION_SUM_TOLERANCE,
  checkAttributionSum,
  inspectEvidence,
  validateEvidence,
  type EvidenceErrorCode,
  type EvidenceValidationResult,
} from './validator.js';

export {
  EVIDENCE_WINDOW_DAYS,
  buildEvidence,
  formatDate,
  formatEventTime,
  type EvidenceBuildOptions,
  type EvidenceDraft,
} from './builder.js';

export { EvidenceParseError, parseEvidenceJson, serializeEvidence } from './codec.js';

export { evidenceSchema, type RenderableEvidence, type RenderableFeature } from './schema.js';
