/**
 * PriceWhy Pricing Model
 *
 * A linear pricing model with exact Shapley explanations, and a market
 * simulator that drives it.
 */

export {
  DEFAULT_MODEL_PATH,
  LinearPricingModel,
  ModelLoadError,
  linearModelSchema,
  loadPricingModel,
  type LinearModelSpec,
} from './linear.js';

export {
  DEFAULT_MARKET_INPUTS,
  MARKET_SHOCKS,
  MarketSimulator,
  applyShock,
  type MarketShock,
  type MarketSimulatorOptions,
  type MarketStep,
} from './simulator.js';
