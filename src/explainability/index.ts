/**
 * PriceWhy Explainability
 *
 * Audience-specific explanation texts for validated evidence, with
 * mandatory safety redaction.
 */

export {
  REFUSAL_TEXT,
  VALIDATION_FAILED,
  explainForAudience,
  generateExplanations,
  type ExplanationOptions,
  type ExplanationResult,
} from './generate.js';

export { renderExplanation, sortByImpact } from './render.js';

export {
  COST_REDACTION_MARKER,
  SUPPLIER_PLACEHOLDER,
  applySafetyFilter,
  type SafetyFilterOptions,
} from './safety.js';

export {
  CURRENCY_SYMBOLS,
  FRIENDLY_NAMES,
  confidenceLabel,
  currencySymbol,
  friendlyName,
  impactPercent,
} from './labels.js';
