/**
 * Linear pricing model.
 *
 * price = intercept + Σ coefficient × value
 *
 * For a linear model the Shapley value of each feature against a reference
 * point is exact: coefficient × (value − reference). The contributions sum
 * to predict(x) − predict(reference).
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Explainer, ModelMetadata, PricingModel } from '../types.js';
import { roundTo } from '../attribution/normalize.js';

/** Model file shipped with the package */
export const DEFAULT_MODEL_PATH = fileURLToPath(
  new URL('../../models/pricing-linear-v1.json', import.meta.url),
);

export const linearModelSchema = z.object({
  version: z.string().min(1),
  confidence: z.number().min(0).max(1),
  intercept: z.number().finite(),
  features: z
    .array(
      z.object({
        name: z.string().min(1),
        coefficient: z.number().finite(),
        /** Reference (background) value the contributions are measured from */
        reference: z.number().finite(),
      }),
    )
    .min(1),
});

export type LinearModelSpec = z.infer<typeof linearModelSchema>;

export class ModelLoadError extends Error {
  readonly code = 'MODEL_LOAD_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'ModelLoadError';
  }
}

export class LinearPricingModel implements PricingModel {
  readonly metadata: ModelMetadata;
  readonly featureNames: readonly string[];

  constructor(private readonly spec: LinearModelSpec) {
    this.metadata = Object.freeze({ version: spec.version, confidence: spec.confidence });
    this.featureNames = Object.freeze(spec.features.map((f) => f.name));
  }

  predict(inputs: Readonly<Record<string, number>>): number {
    const total = this.spec.features.reduce(
      (sum, f) => sum + f.coefficient * (inputs[f.name] ?? 0),
      this.spec.intercept,
    );
    return roundTo(total, 2);
  }

  createExplainer(): Explainer {
    const features = this.spec.features;
    return {
      featureNames: this.featureNames,
      explain: (inputs) => features.map((f) => f.coefficient * ((inputs[f.name] ?? 0) - f.reference)),
    };
  }

  /** The reference point as a full input vector */
  referenceInputs(): Record<string, number> {
    return Object.fromEntries(this.spec.features.map((f) => [f.name, f.reference]));
  }
}

/**
 * Load and validate a model file.
 *
 * @throws ModelLoadError when the file is missing or invalid
 */
export async function loadPricingModel(path: string = DEFAULT_MODEL_PATH): Promise<LinearPricingModel> {
  if (!existsSync(path)) {
    throw new ModelLoadError(`Model file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(`Model file is not valid JSON: ${message}`);
  }

  const parsed = linearModelSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ModelLoadError(`Invalid model file ${path}: ${issue.path.join('.')} ${issue.message}`);
  }

  return new LinearPricingModel(parsed.data);
}
