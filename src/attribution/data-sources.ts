/**
 * Systems each known pricing feature is sourced from.
 */
export const DATA_SOURCES: Readonly<Record<string, string>> = {
  raw_material_cost: 'supplier_invoices',
  demand_index: 'sales_forecast_model',
  inventory_level: 'warehouse_system',
  competitor_price_avg: 'market_scraper',
};

export const UNKNOWN_DATA_SOURCE = 'unknown';

export function dataSourceFor(feature: string): string {
  return Object.hasOwn(DATA_SOURCES, feature) ? DATA_SOURCES[feature] : UNKNOWN_DATA_SOURCE;
}
