/**
 * PriceWhy Attribution
 *
 * Per-feature attribution of price changes and normalization into
 * fractional shares.
 */

export {
  ATTRIBUTION_THRESHOLD,
  AttributionError,
  computeAttributions,
  initializeAttribution,
  percentChange,
  type AttributionComputer,
  type AttributionMode,
} from './compute.js';

export { normalizeAttributions, roundTo, sumAttributions } from './normalize.js';

export { DATA_SOURCES, UNKNOWN_DATA_SOURCE, dataSourceFor } from './data-sources.js';
