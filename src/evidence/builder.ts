/**
 * Evidence Builder
 *
 * Assembles the frozen evidence record once attribution, normalization and
 * the sum check have all passed.
 */

import { randomUUID } from 'node:crypto';
import {
  XAI_METHOD,
  type Evidence,
  type FeatureAttribution,
  type ModelMetadata,
  type SafetyFlags,
} from '../types.js';

/** Length of the trailing window every evidence record covers. */
export const EVIDENCE_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface EvidenceDraft {
  productId: string;
  oldPrice: number;
  newPrice: number;
  currency: string;
  features: readonly FeatureAttribution[];
  model: ModelMetadata;
  safetyFlags: SafetyFlags;
}

export interface EvidenceBuildOptions {
  /** Defaults to the current time */
  now?: Date;
  /** Defaults to a random v4 UUID */
  idGenerator?: () => string;
}

/**
 * Build an immutable evidence record.
 *
 * The time window is always the seven days up to `now`; it is not derived
 * from when the compared states were observed.
 */
export function buildEvidence(draft: EvidenceDraft, options: EvidenceBuildOptions = {}): Evidence {
  const now = options.now ?? new Date();
  const eventId = (options.idGenerator ?? randomUUID)();
  const windowStart = new Date(now.getTime() - EVIDENCE_WINDOW_DAYS * DAY_MS);

  const features = Object.freeze(draft.features.map((f) => Object.freeze({ ...f })));

  return Object.freeze({
    event_id: eventId,
    product_id: draft.productId,
    old_price: draft.oldPrice,
    new_price: draft.newPrice,
    currency: draft.currency,
    event_time: formatEventTime(now),
    model_version: draft.model.version,
    xai_method: XAI_METHOD,
    time_window: Object.freeze({
      from: formatDate(windowStart),
      to: formatDate(now),
    }),
    features_used: features,
    confidence_score: draft.model.confidence,
    safety_flags: Object.freeze({ ...draft.safetyFlags }),
  });
}

/** UTC YYYY-MM-DDTHH:MM:SSZ */
export function formatEventTime(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/** UTC YYYY-MM-DD */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
