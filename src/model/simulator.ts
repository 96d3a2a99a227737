/**
 * Market simulator.
 *
 * Each step applies one random market shock to the model inputs and
 * re-prices through the model. Pass a seed for reproducible runs.
 */

import seedrandom from 'seedrandom';
import type { PriceState, PricingModel } from '../types.js';

export type MarketShock = 'cost_hike' | 'demand_surge' | 'inventory_drop' | 'competitor_move' | 'mixed';

export const MARKET_SHOCKS: readonly MarketShock[] = [
  'cost_hike',
  'demand_surge',
  'inventory_drop',
  'competitor_move',
  'mixed',
];

export const DEFAULT_MARKET_INPUTS: Readonly<Record<string, number>> = {
  raw_material_cost: 400.0,
  demand_index: 100.0,
  inventory_level: 5000,
  competitor_price_avg: 1050.0,
};

export interface MarketSimulatorOptions {
  /** Seed for the shock sequence; ignored when `random` is given */
  seed?: string | number;
  /** Uniform [0, 1) source */
  random?: () => number;
  initialInputs?: Readonly<Record<string, number>>;
}

export interface MarketStep {
  shock: MarketShock;
  state: PriceState;
}

export class MarketSimulator {
  private inputs: Record<string, number>;
  private price: number;
  private readonly random: () => number;

  constructor(
    private readonly model: PricingModel,
    options: MarketSimulatorOptions = {},
  ) {
    this.random =
      options.random ??
      (options.seed !== undefined ? seedrandom(String(options.seed)) : Math.random);
    this.inputs = { ...(options.initialInputs ?? DEFAULT_MARKET_INPUTS) };
    this.price = model.predict(this.inputs);
  }

  current(): PriceState {
    return { price: this.price, inputs: { ...this.inputs } };
  }

  step(): MarketStep {
    const index = Math.min(MARKET_SHOCKS.length - 1, Math.floor(this.random() * MARKET_SHOCKS.length));
    const shock = MARKET_SHOCKS[index];

    this.inputs = applyShock(this.inputs, shock);
    this.price = this.model.predict(this.inputs);

    return { shock, state: this.current() };
  }
}

/**
 * Apply a market shock to an input vector, returning a new vector.
 */
export function applyShock(
  inputs: Readonly<Record<string, number>>,
  shock: MarketShock,
): Record<string, number> {
  const next = { ...inputs };
  const value = (name: string): number => next[name] ?? 0;

  switch (shock) {
    case 'cost_hike':
      next.raw_material_cost = value('raw_material_cost') * 1.062;
      break;
    case 'demand_surge':
      next.demand_index = value('demand_index') * 1.098;
      break;
    case 'inventory_drop':
      next.inventory_level = Math.floor(value('inventory_level') * 0.879);
      break;
    case 'competitor_move':
      next.competitor_price_avg = value('competitor_price_avg') * 1.031;
      break;
    case 'mixed':
      next.raw_material_cost = value('raw_material_cost') * 1.02;
      next.competitor_price_avg = value('competitor_price_avg') * 0.98;
      break;
  }

  return next;
}
