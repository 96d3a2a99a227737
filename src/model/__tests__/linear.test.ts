/**
 * Tests for the linear pricing model
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LinearPricingModel, loadPricingModel, ModelLoadError, type LinearModelSpec } from '../linear.js';
import { DEFAULT_MARKET_INPUTS, applyShock } from '../simulator.js';

const SPEC: LinearModelSpec = {
  version: 'test_v1',
  confidence: 0.75,
  intercept: 10,
  features: [
    { name: 'a', coefficient: 2, reference: 5 },
    { name: 'b', coefficient: -0.5, reference: 100 },
  ],
};

describe('LinearPricingModel', () => {
  it('predicts intercept plus weighted inputs', () => {
    const model = new LinearPricingModel(SPEC);
    expect(model.predict({ a: 5, b: 100 })).toBe(-30);
    expect(model.predict({ a: 8, b: 60 })).toBe(-4);
  });

  it('reads missing inputs as zero', () => {
    expect(new LinearPricingModel(SPEC).predict({})).toBe(10);
  });

  it('exposes metadata and feature names', () => {
    const model = new LinearPricingModel(SPEC);
    expect(model.metadata).toEqual({ version: 'test_v1', confidence: 0.75 });
    expect(model.featureNames).toEqual(['a', 'b']);
    expect(model.referenceInputs()).toEqual({ a: 5, b: 100 });
  });

  it('explains inputs against the reference point', () => {
    const explainer = new LinearPricingModel(SPEC).createExplainer();

    expect(explainer.featureNames).toEqual(['a', 'b']);
    expect(explainer.explain({ a: 8, b: 60 })).toEqual([6, 20]);
  });

  it('contributions sum to the move from the reference price', () => {
    const model = new LinearPricingModel(SPEC);
    const inputs = { a: 8, b: 60 };
    const total = model.createExplainer().explain(inputs).reduce((sum, c) => sum + c, 0);

    expect(total).toBeCloseTo(model.predict(inputs) - model.predict(model.referenceInputs()), 9);
  });
});

describe('loadPricingModel', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pricewhy-model-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled model', async () => {
    const model = await loadPricingModel();

    expect(model.metadata).toEqual({ version: 'pricing_linear_v1', confidence: 0.92 });
    expect(model.predict(DEFAULT_MARKET_INPUTS)).toBe(1325);
    expect(model.createExplainer().explain(DEFAULT_MARKET_INPUTS).every((c) => c === 0)).toBe(true);
  });

  it('attributes a cost hike to raw material cost alone', async () => {
    const model = await loadPricingModel();
    const contributions = model.createExplainer().explain(applyShock(DEFAULT_MARKET_INPUTS, 'cost_hike'));

    expect(contributions[0]).toBeCloseTo(27.28, 6);
    expect(contributions.slice(1).every((c) => c === 0)).toBe(true);
  });

  it('rejects a missing file', async () => {
    await expect(loadPricingModel(join(dir, 'absent.json'))).rejects.toThrow(ModelLoadError);
  });

  it('rejects invalid JSON', async () => {
    const path = join(dir, 'model.json');
    await writeFile(path, '{ "version": ', 'utf-8');

    await expect(loadPricingModel(path)).rejects.toThrow(/^Model file is not valid JSON/);
  });

  it('rejects a model that fails the schema', async () => {
    const path = join(dir, 'model.json');
    await writeFile(path, JSON.stringify({ ...SPEC, confidence: 2 }), 'utf-8');

    await expect(loadPricingModel(path)).rejects.toThrow(`Invalid model file ${path}: confidence`);
  });

  it('loads a custom model file', async () => {
    const path = join(dir, 'model.json');
    await writeFile(path, JSON.stringify(SPEC), 'utf-8');

    const model = await loadPricingModel(path);
    expect(model.metadata.version).toBe('test_v1');
  });
});
