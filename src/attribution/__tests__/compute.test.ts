/**
 * Tests for the attribution computer
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AttributionError,
  computeAttributions,
  initializeAttribution,
  percentChange,
  type AttributionComputer,
} from '../compute.js';
import { dataSourceFor } from '../data-sources.js';
import { MemoryAuditSink } from '../../audit/memory.js';
import type { Explainer, PriceState } from '../../types.js';

const FALLBACK: AttributionComputer = { mode: 'fallback', reason: 'test' };

function explainable(explainer: Explainer): AttributionComputer {
  return { mode: 'explainable', explainer };
}

describe('percentChange', () => {
  it('computes percentage change', () => {
    expect(percentChange(100, 150)).toBe(50);
    expect(percentChange(200, 150)).toBe(-25);
  });

  it('returns 0 when the previous value is 0', () => {
    expect(percentChange(0, 5)).toBe(0);
    expect(percentChange(0, 0)).toBe(0);
  });
});

describe('dataSourceFor', () => {
  it('maps known features to their source systems', () => {
    expect(dataSourceFor('raw_material_cost')).toBe('supplier_invoices');
    expect(dataSourceFor('demand_index')).toBe('sales_forecast_model');
    expect(dataSourceFor('inventory_level')).toBe('warehouse_system');
    expect(dataSourceFor('competitor_price_avg')).toBe('market_scraper');
  });

  it('maps unknown features to "unknown"', () => {
    expect(dataSourceFor('shipping_surcharge')).toBe('unknown');
    expect(dataSourceFor('toString')).toBe('unknown');
  });
});

describe('computeAttributions (fallback mode)', () => {
  it('uses the magnitude of each input change', () => {
    const baseline: PriceState = { price: 1000, inputs: { raw_material_cost: 100, demand: 50 } };
    const next: PriceState = { price: 1200, inputs: { raw_material_cost: 150, demand: 50 } };

    expect(computeAttributions(FALLBACK, baseline, next)).toEqual([
      { name: 'raw_material_cost', value_change_pct: 50, attribution: 50, data_source: 'supplier_invoices' },
    ]);
  });

  it('keeps the magnitude of decreases', () => {
    const baseline: PriceState = { price: 10, inputs: { inventory_level: 200 } };
    const next: PriceState = { price: 12, inputs: { inventory_level: 150 } };

    const [result] = computeAttributions(FALLBACK, baseline, next);
    expect(result.value_change_pct).toBe(-25);
    expect(result.attribution).toBe(25);
    expect(result.raw_signed_value).toBeUndefined();
  });

  it('drops changes below the threshold', () => {
    const baseline: PriceState = { price: 10, inputs: { a: 100000 } };
    const next: PriceState = { price: 11, inputs: { a: 100000.0005 } };

    expect(computeAttributions(FALLBACK, baseline, next)).toEqual([]);
  });

  it('treats a zero baseline value as no change', () => {
    const baseline: PriceState = { price: 10, inputs: { a: 0 } };
    const next: PriceState = { price: 11, inputs: { a: 50, b: 3 } };

    expect(computeAttributions(FALLBACK, baseline, next)).toEqual([]);
  });
});

describe('computeAttributions (explainable mode)', () => {
  it('uses signed contributions of the new state', () => {
    const explain = vi.fn(() => [12.5, -0.0005, -3]);
    const computer = explainable({
      featureNames: ['raw_material_cost', 'demand_index', 'mystery'],
      explain,
    });
    const baseline: PriceState = { price: 100, inputs: { raw_material_cost: 400, demand_index: 100 } };
    const next: PriceState = { price: 110, inputs: { raw_material_cost: 440, demand_index: 100, mystery: 7 } };

    const result = computeAttributions(computer, baseline, next);

    expect(explain).toHaveBeenCalledWith(next.inputs);
    expect(result).toEqual([
      {
        name: 'raw_material_cost',
        value_change_pct: 10,
        attribution: 12.5,
        raw_signed_value: 12.5,
        data_source: 'supplier_invoices',
      },
      {
        name: 'mystery',
        value_change_pct: 0,
        attribution: 3,
        raw_signed_value: -3,
        data_source: 'unknown',
      },
    ]);
  });

  it('keeps contributions exactly at the threshold', () => {
    const computer = explainable({ featureNames: ['a'], explain: () => [0.001] });
    const state: PriceState = { price: 1, inputs: { a: 1 } };

    expect(computeAttributions(computer, state, state)).toHaveLength(1);
  });

  it('rejects misaligned explainer output', () => {
    const computer = explainable({ featureNames: ['a', 'b'], explain: () => [1] });
    const state: PriceState = { price: 1, inputs: { a: 1, b: 2 } };

    expect(() => computeAttributions(computer, state, state)).toThrow(AttributionError);
  });

  it('rejects non-finite contributions', () => {
    const computer = explainable({ featureNames: ['a'], explain: () => [Number.NaN] });
    const state: PriceState = { price: 1, inputs: { a: 1 } };

    expect(() => computeAttributions(computer, state, state)).toThrow('Non-finite contribution for feature "a"');
  });
});

describe('initializeAttribution', () => {
  it('selects explainable mode when the capability builds', () => {
    const sink = new MemoryAuditSink();
    const explainer: Explainer = { featureNames: ['a'], explain: () => [1] };

    const computer = initializeAttribution(() => explainer, sink);

    expect(computer).toEqual({ mode: 'explainable', explainer });
    expect(sink.size).toBe(0);
  });

  it('falls back when no capability is provided', () => {
    const sink = new MemoryAuditSink();

    const computer = initializeAttribution(undefined, sink);

    expect(computer.mode).toBe('fallback');
    expect(sink.types()).toEqual(['EXPLAINABILITY_UNAVAILABLE']);
  });

  it('falls back permanently when the capability throws', () => {
    const sink = new MemoryAuditSink();
    const capability = vi.fn((): Explainer => {
      throw new Error('model file missing');
    });

    const computer = initializeAttribution(capability, sink);
    const state: PriceState = { price: 1, inputs: { a: 1 } };
    computeAttributions(computer, state, { price: 2, inputs: { a: 2 } });

    expect(computer).toEqual({
      mode: 'fallback',
      reason: 'Explainer initialization failed: model file missing',
    });
    expect(capability).toHaveBeenCalledTimes(1);
    expect(sink.query({ type: 'EXPLAINABILITY_UNAVAILABLE' })[0].details).toEqual({
      reason: 'Explainer initialization failed: model file missing',
      mode: 'fallback',
    });
  });
});
