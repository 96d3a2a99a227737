/**
 * Attribution normalization.
 *
 * Rescales attribution magnitudes into two-decimal fractions that sum to
 * exactly 1.00. Rounding drift is folded into the first feature, so the
 * first listed feature can be off by up to a cent from its true share.
 */

import type { FeatureAttribution } from '../types.js';

/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function normalizeAttributions(features: readonly FeatureAttribution[]): FeatureAttribution[] {
  if (features.length === 0) {
    return [...features];
  }

  const total = features.reduce((sum, f) => sum + Math.abs(f.attribution), 0);
  if (total === 0) {
    return [...features];
  }

  const normalized = features.map((f) => ({
    ...f,
    attribution: roundTo(f.attribution / total, 2),
  }));

  const currentSum = sumAttributions(normalized);
  const diff = roundTo(1.0 - currentSum, 2);

  if (diff !== 0) {
    const first = normalized[0];
    normalized[0] = { ...first, attribution: roundTo(first.attribution + diff, 2) };
  }

  return normalized;
}

export function sumAttributions(features: ReadonlyArray<Readonly<FeatureAttribution>>): number {
  return features.reduce((sum, f) => sum + f.attribution, 0);
}
