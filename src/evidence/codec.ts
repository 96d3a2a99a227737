/**
 * Evidence wire codec.
 */

import type { Evidence } from '../types.js';

export class EvidenceParseError extends Error {
  readonly code = 'EVIDENCE_PARSE_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'EvidenceParseError';
  }
}

export function serializeEvidence(evidence: Evidence): string {
  return JSON.stringify(evidence, null, 2);
}

/**
 * Parse evidence JSON text. The result is untrusted and must go through
 * `validateEvidence` before it is rendered.
 */
export function parseEvidenceJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new EvidenceParseError(`Evidence is not valid JSON: ${message}`);
  }
}
