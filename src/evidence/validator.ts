/**
 * Evidence Validator
 *
 * Gatekeeper between attribution and rendering. Every rejection is written
 * to the audit sink before `false` is returned.
 */

import {
  REQUIRED_EVIDENCE_FIELDS,
  XAI_METHOD,
  type AuditSink,
  type FeatureAttribution,
} from '../types.js';
import { sumAttributions } from '../attribution/normalize.js';
import { evidenceSchema, type RenderableEvidence } from './schema.js';

/** Allowed distance of the attribution sum from 1.0 */
export const ATTRIBUTION_SUM_TOLERANCE = 0.001;

export type EvidenceErrorCode =
  | 'missing_field'
  | 'invalid_xai_method'
  | 'malformed_evidence'
  | 'attribution_sum_mismatch';

export interface EvidenceValidationResult {
  valid: boolean;
  code?: EvidenceErrorCode;
  reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(code: EvidenceErrorCode, reason: string): EvidenceValidationResult {
  return { valid: false, code, reason };
}

/**
 * Run the evidence contract checks without logging.
 * Checks run in order and stop at the first failure.
 */
export function inspectEvidence(candidate: unknown): EvidenceValidationResult {
  if (!isRecord(candidate)) {
    return fail('malformed_evidence', 'Evidence must be an object');
  }

  for (const field of REQUIRED_EVIDENCE_FIELDS) {
    if (!Object.hasOwn(candidate, field) || candidate[field] === undefined) {
      return fail('missing_field', `Missing field: ${field}`);
    }
  }

  if (candidate.confidence_score === null) {
    return fail('missing_field', 'Missing confidence score');
  }

  if (candidate.xai_method !== XAI_METHOD) {
    return fail('invalid_xai_method', `Invalid XAI method (must be ${XAI_METHOD})`);
  }

  const parsed = evidenceSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return fail('malformed_evidence', `Malformed field: ${path} (${issue.message})`);
  }

  return { valid: true };
}

/**
 * Validate a candidate evidence record, logging `GENERATION_REFUSED`
 * on failure.
 */
export function validateEvidence(candidate: unknown, sink: AuditSink): candidate is RenderableEvidence {
  const result = inspectEvidence(candidate);
  if (!result.valid) {
    sink.logEvent('GENERATION_REFUSED', { reason: result.reason, code: result.code });
    return false;
  }
  return true;
}

/**
 * Check that normalized attributions sum to 1.0. An empty list passes:
 * there is nothing to apportion.
 */
export function checkAttributionSum(
  features: ReadonlyArray<Readonly<FeatureAttribution>>,
  sink: AuditSink,
): boolean {
  if (features.length === 0) {
    return true;
  }

  const total = sumAttributions(features);
  if (Math.abs(total - 1.0) > ATTRIBUTION_SUM_TOLERANCE) {
    sink.logEvent('ATTRIBUTION_VALIDATION_FAILED', {
      code: 'attribution_sum_mismatch',
      total,
      features: features.map((f) => ({ ...f })),
    });
    return false;
  }

  return true;
}
