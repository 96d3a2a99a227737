/**
 * Wire shape of an evidence record as the renderer reads it.
 *
 * Hand-built or deserialized evidence may omit the identity fields
 * (`event_id`, `product_id`, `event_time`) and per-feature `data_source`;
 * everything the explanation text is built from must be present and typed.
 */

import { z } from 'zod';
import type { Evidence, FeatureAttribution, SafetyFlags } from '../types.js';
import { XAI_METHOD } from '../types.js';

export type RenderableFeature = Readonly<
  Omit<FeatureAttribution, 'data_source'> & { data_source?: string }
>;

export type RenderableEvidence = Readonly<
  Omit<Evidence, 'event_id' | 'product_id' | 'event_time' | 'features_used' | 'safety_flags'>
> & {
  readonly event_id?: string;
  readonly product_id?: string;
  readonly event_time?: string;
  readonly features_used: ReadonlyArray<RenderableFeature>;
  readonly safety_flags: Readonly<Partial<SafetyFlags>>;
};

const featureSchema = z.object({
  name: z.string().min(1),
  value_change_pct: z.number().finite(),
  attribution: z.number().finite(),
  raw_signed_value: z.number().finite().optional(),
  data_source: z.string().optional(),
});

export const evidenceSchema: z.ZodType<RenderableEvidence> = z.object({
  event_id: z.string().optional(),
  product_id: z.string().optional(),
  old_price: z.number().finite(),
  new_price: z.number().finite(),
  currency: z.string().min(1),
  event_time: z.string().optional(),
  model_version: z.string(),
  xai_method: z.literal(XAI_METHOD),
  time_window: z.object({
    from: z.string(),
    to: z.string(),
  }),
  features_used: z.array(featureSchema),
  confidence_score: z.number().min(0).max(1),
  safety_flags: z.object({
    hide_exact_costs: z.boolean().optional(),
    hide_supplier_names: z.boolean().optional(),
  }),
});
