/**
 * Tests for attribution normalization
 */

import { describe, it, expect } from 'vitest';
import { normalizeAttributions, roundTo, sumAttributions } from '../normalize.js';
import type { FeatureAttribution } from '../../types.js';

function feature(name: string, attribution: number): FeatureAttribution {
  return { name, value_change_pct: 0, attribution, data_source: 'unknown' };
}

function hasTwoDecimals(value: number): boolean {
  return Math.abs(value * 100 - Math.round(value * 100)) < 1e-9;
}

describe('normalizeAttributions', () => {
  it('returns an empty list unchanged', () => {
    expect(normalizeAttributions([])).toEqual([]);
  });

  it('returns zero-total lists unchanged', () => {
    const features = [feature('a', 0), feature('b', 0)];
    expect(normalizeAttributions(features)).toEqual(features);
  });

  it('splits equal magnitudes evenly', () => {
    const result = normalizeAttributions([feature('a', 10), feature('b', 10)]);
    expect(result.map((f) => f.attribution)).toEqual([0.5, 0.5]);
  });

  it('scales to fractions of the total', () => {
    const result = normalizeAttributions([feature('a', 3), feature('b', 1)]);
    expect(result.map((f) => f.attribution)).toEqual([0.75, 0.25]);
  });

  it('folds rounding drift into the first feature', () => {
    const result = normalizeAttributions([feature('a', 1), feature('b', 1), feature('c', 1)]);
    expect(result.map((f) => f.attribution)).toEqual([0.34, 0.33, 0.33]);
  });

  it('gives a single feature the whole change', () => {
    const result = normalizeAttributions([feature('a', 27.28)]);
    expect(result[0].attribution).toBe(1);
  });

  it('does not mutate its input', () => {
    const input = [feature('a', 2), feature('b', 6)];
    const result = normalizeAttributions(input);

    expect(input.map((f) => f.attribution)).toEqual([2, 6]);
    expect(result).not.toBe(input);
    expect(result[0]).not.toBe(input[0]);
  });

  it('keeps the other feature fields', () => {
    const input: FeatureAttribution[] = [
      { name: 'raw_material_cost', value_change_pct: 6.2, attribution: 4, raw_signed_value: -4, data_source: 'supplier_invoices' },
    ];
    expect(normalizeAttributions(input)).toEqual([
      { name: 'raw_material_cost', value_change_pct: 6.2, attribution: 1, raw_signed_value: -4, data_source: 'supplier_invoices' },
    ]);
  });

  it('always sums to 1.0 with two-decimal values', () => {
    const cases = [
      [1, 2],
      [1, 1, 1],
      [7, 13, 29, 0.5],
      [0.002, 5, 5, 5, 5, 5, 5],
      [12.5, 3.3, 0.07, 98.1, 44],
      [1, 1, 1, 1, 1, 1],
    ];

    for (const magnitudes of cases) {
      const result = normalizeAttributions(magnitudes.map((m, i) => feature(`f${i}`, m)));
      expect(Math.abs(sumAttributions(result) - 1)).toBeLessThanOrEqual(0.001);
      for (const f of result) {
        expect(hasTwoDecimals(f.attribution)).toBe(true);
      }
    }
  });
});

describe('roundTo', () => {
  it('rounds to the requested decimals', () => {
    expect(roundTo(0.3333, 2)).toBe(0.33);
    expect(roundTo(6.19999, 1)).toBe(6.2);
    expect(roundTo(1352.2800000000002, 2)).toBe(1352.28);
  });
});
