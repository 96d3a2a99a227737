/**
 * Explanation orchestration: validate, render per audience, redact.
 */

import type { Audience, AuditSink } from '../types.js';
import { validateEvidence } from '../evidence/validator.js';
import type { RenderableEvidence } from '../evidence/schema.js';
import { renderExplanation } from './render.js';
import { applySafetyFilter, type SafetyFilterOptions } from './safety.js';

/** Text returned for every audience when evidence fails validation */
export const REFUSAL_TEXT = 'Explanation unavailable due to data validation failure.';

export const VALIDATION_FAILED = 'Validation Failed';

export type ExplanationResult =
  | {
      status: 'generated';
      customer_text: string;
      regulator_text: string;
      /** `event_id` of the evidence the texts were rendered from */
      evidence_used: string | null;
    }
  | {
      status: 'refused';
      customer_text: typeof REFUSAL_TEXT;
      regulator_text: typeof REFUSAL_TEXT;
      error: typeof VALIDATION_FAILED;
    };

export interface ExplanationOptions {
  /** Supplier names redacted when the evidence sets `hide_supplier_names` */
  supplierNames?: readonly string[];
}

/**
 * Produce both audience texts for a candidate evidence record.
 * Invalid evidence yields the refusal payload; this never throws.
 */
export function generateExplanations(
  candidate: unknown,
  sink: AuditSink,
  options: ExplanationOptions = {},
): ExplanationResult {
  if (!validateEvidence(candidate, sink)) {
    return {
      status: 'refused',
      customer_text: REFUSAL_TEXT,
      regulator_text: REFUSAL_TEXT,
      error: VALIDATION_FAILED,
    };
  }

  const result: ExplanationResult = {
    status: 'generated',
    customer_text: renderSafely(candidate, 'customer', options),
    regulator_text: renderSafely(candidate, 'regulator', options),
    evidence_used: candidate.event_id ?? null,
  };

  sink.logEvent('TEXT_GENERATED', { ...result });
  return result;
}

/**
 * Render a single audience, re-validating the evidence first.
 */
export function explainForAudience(
  candidate: unknown,
  audience: Audience,
  sink: AuditSink,
  options: ExplanationOptions = {},
): string {
  if (!validateEvidence(candidate, sink)) {
    return REFUSAL_TEXT;
  }
  return renderSafely(candidate, audience, options);
}

function renderSafely(
  evidence: RenderableEvidence,
  audience: Audience,
  options: ExplanationOptions,
): string {
  const filterOptions: SafetyFilterOptions = {
    currencyCodes: [evidence.currency],
    supplierNames: options.supplierNames,
  };
  return applySafetyFilter(renderExplanation(evidence, audience), evidence.safety_flags, filterOptions);
}
