/**
 * Change Tracker
 *
 * Owns the baseline state and turns each material price move into an
 * evidence record. Immaterial moves leave the baseline in place, so slow
 * drift accumulates until it is material. Material moves always advance
 * it, rejected ones included, so a rejected move is never re-attributed
 * against the same reference point.
 */

import type {
  AuditSink,
  Evidence,
  FeatureAttribution,
  ModelMetadata,
  PriceState,
  SafetyFlags,
} from '../types.js';
import {
  computeAttributions,
  type AttributionComputer,
} from '../attribution/compute.js';
import { normalizeAttributions } from '../attribution/normalize.js';
import { checkAttributionSum } from '../evidence/validator.js';
import { buildEvidence } from '../evidence/builder.js';

/** Price moves smaller than this are not explained. */
export const MATERIALITY_THRESHOLD = 0.01;

/** Absorbs float error in price subtraction (10.01 - 10 = 0.00999...). */
const PRICE_EPSILON = 1e-9;

export function isMaterial(delta: number): boolean {
  return Math.abs(delta) >= MATERIALITY_THRESHOLD - PRICE_EPSILON;
}

export interface ChangeTrackerOptions {
  attribution: AttributionComputer;
  model: ModelMetadata;
  sink: AuditSink;
  productId: string;
  currency: string;
  safetyFlags: SafetyFlags;
  /** Defaults to the system clock */
  clock?: () => Date;
  /** Defaults to a random v4 UUID */
  idGenerator?: () => string;
}

export class ChangeTracker {
  private current: Readonly<PriceState> | null = null;

  constructor(private readonly options: ChangeTrackerOptions) {}

  /** Attribution mode fixed at start-up */
  get mode(): AttributionComputer['mode'] {
    return this.options.attribution.mode;
  }

  /** Frozen copy of the reference state (the first observation, then the last material one) */
  get baseline(): Readonly<PriceState> | null {
    return this.current;
  }

  /**
   * Observe the next pricing state. Returns evidence when the price moved
   * materially and the attribution passed validation, otherwise null.
   */
  observe(next: PriceState): Evidence | null {
    const previous = this.current;
    if (previous === null) {
      this.current = freezeState(next);
      return null;
    }

    if (!isMaterial(next.price - previous.price)) {
      return null;
    }

    this.current = freezeState(next);
    return this.explainChange(previous, next);
  }

  /** Forget the baseline; the next observation starts a new series. */
  reset(): void {
    this.current = null;
  }

  private explainChange(previous: Readonly<PriceState>, next: PriceState): Evidence | null {
    const { sink } = this.options;

    let raw: FeatureAttribution[];
    try {
      raw = computeAttributions(this.options.attribution, previous, next);
    } catch (error) {
      sink.logEvent('ATTRIBUTION_FAILED', {
        reason: error instanceof Error ? error.message : String(error),
        old_price: previous.price,
        new_price: next.price,
      });
      return null;
    }

    const features = normalizeAttributions(raw);
    if (!checkAttributionSum(features, sink)) {
      return null;
    }

    const evidence = buildEvidence(
      {
        productId: this.options.productId,
        oldPrice: previous.price,
        newPrice: next.price,
        currency: this.options.currency,
        features,
        model: this.options.model,
        safetyFlags: this.options.safetyFlags,
      },
      {
        now: this.options.clock?.(),
        idGenerator: this.options.idGenerator,
      },
    );

    sink.logEvent('EVIDENCE_GENERATED', { ...evidence });
    return evidence;
  }
}

function freezeState(state: PriceState): Readonly<PriceState> {
  return Object.freeze({
    price: state.price,
    inputs: Object.freeze({ ...state.inputs }),
  });
}
