/**
 * Safety Filter
 *
 * Mandatory post-render redaction driven by the evidence safety flags.
 * Applied to every rendered text regardless of audience. Filtering already
 * filtered text leaves it unchanged.
 */

import type { SafetyFlags } from '../types.js';
import { CURRENCY_SYMBOLS } from './labels.js';

/** Marker appended to a currency glyph or code to blur exact amounts */
export const COST_REDACTION_MARKER = '~';

export const SUPPLIER_PLACEHOLDER = '[REDACTED:SUPPLIER]';

export interface SafetyFilterOptions {
  /** Currency codes to redact in addition to the known ones */
  currencyCodes?: readonly string[];
  /** Supplier names to redact when `hide_supplier_names` is set */
  supplierNames?: readonly string[];
}

const GLYPH_PATTERN = new RegExp(
  `[${Object.values(CURRENCY_SYMBOLS).map(escapeRegExp).join('')}](?!${COST_REDACTION_MARKER})`,
  'gu',
);

export function applySafetyFilter(
  text: string,
  flags: Readonly<Partial<SafetyFlags>>,
  options: SafetyFilterOptions = {},
): string {
  let filtered = text;

  // Suppliers first: a name containing a currency code must still match.
  if (flags.hide_supplier_names) {
    filtered = redactSuppliers(filtered, options.supplierNames ?? []);
  }

  if (flags.hide_exact_costs) {
    filtered = redactCurrency(filtered, options.currencyCodes ?? []);
  }

  return filtered;
}

function redactCurrency(text: string, extraCodes: readonly string[]): string {
  const codes = [...new Set([...Object.keys(CURRENCY_SYMBOLS), ...extraCodes])]
    .filter((code) => code.trim().length > 0)
    .map(escapeRegExp);

  const withGlyphs = text.replace(GLYPH_PATTERN, (glyph) => `${glyph}${COST_REDACTION_MARKER}`);
  if (codes.length === 0) {
    return withGlyphs;
  }

  const codePattern = new RegExp(
    `(?<![A-Za-z])(?:${codes.join('|')})(?![A-Za-z${COST_REDACTION_MARKER}])`,
    'g',
  );
  return withGlyphs.replace(codePattern, (code) => `${code}${COST_REDACTION_MARKER}`);
}

function redactSuppliers(text: string, names: readonly string[]): string {
  const alternatives = [...new Set(names.map((name) => name.trim()).filter((name) => name.length > 0))]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  if (alternatives.length === 0) {
    return text;
  }

  const pattern = new RegExp(`(?<![\\w])(?:${alternatives.join('|')})(?![\\w])`, 'gi');

  // Existing placeholders are never rescanned.
  return text
    .split(SUPPLIER_PLACEHOLDER)
    .map((segment) => segment.replace(pattern, SUPPLIER_PLACEHOLDER))
    .join(SUPPLIER_PLACEHOLDER);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
