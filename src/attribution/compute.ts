/**
 * Attribution Computer
 *
 * Assigns each input feature a share of a price change. The mode is fixed
 * once at start-up: with an explainability capability the model's own
 * signed contributions are used, without one the magnitude of each
 * feature's percentage change stands in for them.
 */

import type { AuditSink, Explainer, FeatureAttribution, PriceState } from '../types.js';
import { dataSourceFor } from './data-sources.js';
import { roundTo } from './normalize.js';

/** Contributions below this magnitude are left out of the evidence. */
export const ATTRIBUTION_THRESHOLD = 0.001;

export type AttributionComputer =
  | { readonly mode: 'explainable'; readonly explainer: Explainer }
  | { readonly mode: 'fallback'; readonly reason: string };

export type AttributionMode = AttributionComputer['mode'];

export class AttributionError extends Error {
  readonly code = 'ATTRIBUTION_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'AttributionError';
  }
}

/**
 * Select the attribution mode for the lifetime of the process.
 *
 * `capability` builds the explainer. When it is missing or throws, the
 * fallback variant is returned and never retried.
 */
export function initializeAttribution(
  capability: (() => Explainer) | undefined,
  sink: AuditSink,
): AttributionComputer {
  if (!capability) {
    return fallback('No explainability capability provided', sink);
  }

  try {
    const explainer = capability();
    return Object.freeze({ mode: 'explainable', explainer });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fallback(`Explainer initialization failed: ${message}`, sink);
  }
}

function fallback(reason: string, sink: AuditSink): AttributionComputer {
  sink.logEvent('EXPLAINABILITY_UNAVAILABLE', { reason, mode: 'fallback' });
  return Object.freeze({ mode: 'fallback', reason });
}

/**
 * Percentage change from `previous` to `next`; 0 when `previous` is 0.
 */
export function percentChange(previous: number, next: number): number {
  if (previous === 0) {
    return 0.0;
  }
  return ((next - previous) / previous) * 100.0;
}

/**
 * Compute pre-normalization attributions for the move from `baseline`
 * to `next`. Attributions hold absolute magnitudes.
 *
 * @throws AttributionError when the explainer output cannot be aligned
 */
export function computeAttributions(
  computer: AttributionComputer,
  baseline: PriceState,
  next: PriceState,
): FeatureAttribution[] {
  switch (computer.mode) {
    case 'explainable':
      return explainedAttributions(computer.explainer, baseline, next);
    case 'fallback':
      return changeMagnitudeAttributions(baseline, next);
  }
}

function explainedAttributions(
  explainer: Explainer,
  baseline: PriceState,
  next: PriceState,
): FeatureAttribution[] {
  const names = explainer.featureNames;
  const contributions = explainer.explain(next.inputs);

  if (contributions.length !== names.length) {
    throw new AttributionError(
      `Explainer returned ${contributions.length} contributions for ${names.length} features`,
    );
  }

  const features: FeatureAttribution[] = [];

  names.forEach((name, i) => {
    const contribution = contributions[i];
    if (!Number.isFinite(contribution)) {
      throw new AttributionError(`Non-finite contribution for feature "${name}"`);
    }
    if (Math.abs(contribution) < ATTRIBUTION_THRESHOLD) {
      return;
    }

    const change = percentChange(baseline.inputs[name] ?? 0, next.inputs[name] ?? 0);
    features.push({
      name,
      value_change_pct: roundTo(change, 1),
      attribution: Math.abs(contribution),
      raw_signed_value: contribution,
      data_source: dataSourceFor(name),
    });
  });

  return features;
}

function changeMagnitudeAttributions(baseline: PriceState, next: PriceState): FeatureAttribution[] {
  const names = [...new Set([...Object.keys(baseline.inputs), ...Object.keys(next.inputs)])];
  const features: FeatureAttribution[] = [];

  for (const name of names) {
    const change = percentChange(baseline.inputs[name] ?? 0, next.inputs[name] ?? 0);
    const magnitude = Math.abs(change);
    if (magnitude < ATTRIBUTION_THRESHOLD) continue;

    features.push({
      name,
      value_change_pct: roundTo(change, 1),
      attribution: magnitude,
      data_source: dataSourceFor(name),
    });
  }

  return features;
}
