/**
 * Display vocabulary shared by both audiences.
 */

/**
 * Customer-facing names for known feature keys.
 */
export const FRIENDLY_NAMES: Readonly<Record<string, string>> = {
  raw_material_cost: 'Raw Material Costs',
  demand_index: 'Market Demand',
  inventory_level: 'Inventory Availability',
  competitor_price_avg: 'Competitor Pricing',
};

/**
 * Currency glyphs by ISO 4217 code. Codes without a glyph are shown as-is.
 */
export const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
  INR: '₹',
  USD: '$',
  EUR: '€',
  GBP: '£',
  JPY: '¥',
};

/**
 * `snake_case_key` → `Snake Case Key` unless the key has a friendly name.
 */
export function friendlyName(key: string): string {
  if (Object.hasOwn(FRIENDLY_NAMES, key)) {
    return FRIENDLY_NAMES[key];
  }
  return key
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function currencySymbol(code: string): string {
  return Object.hasOwn(CURRENCY_SYMBOLS, code) ? CURRENCY_SYMBOLS[code] : code;
}

export function confidenceLabel(score: number): string {
  if (score >= 0.8) return 'High confidence';
  if (score >= 0.5) return 'Medium confidence';
  return 'Low confidence';
}

/** Attribution fraction as a whole-number percentage */
export function impactPercent(attribution: number): number {
  return Math.round(attribution * 100);
}
