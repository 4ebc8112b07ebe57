import Decimal from 'decimal.js';
import { DEFAULT_USD_RATES } from '../../config/currencyRates';
import { normalizeCurrencyCode } from './fields';
import type { CompatSettings } from './types';

export type CompatSettingsInput = {
  rates?: Readonly<Record<string, Decimal.Value>>;
  priceTolerance?: Decimal.Value;
  dateSentinel?: string;
};

export const DEFAULT_PRICE_TOLERANCE = '0.01';
export const DEFAULT_DATE_SENTINEL = 'UNKNOWN';

/**
 * Builds an immutable settings object. Rate keys are normalized to upper-case
 * ISO codes; rates must be positive.
 */
export function createCompatSettings(input: CompatSettingsInput = {}): CompatSettings {
  const rates: Record<string, Decimal> = {};
  for (const [code, value] of Object.entries(input.rates ?? DEFAULT_USD_RATES)) {
    const key = normalizeCurrencyCode(code);
    if (!key) throw new Error(`[Compat] Invalid currency code in rate table: '${code}'`);
    const rate = new Decimal(value);
    if (!rate.isFinite() || rate.lte(0)) {
      throw new Error(`[Compat] Rate for ${key} must be a positive number, got ${String(value)}`);
    }
    rates[key] = rate;
  }

  const priceTolerance = new Decimal(input.priceTolerance ?? DEFAULT_PRICE_TOLERANCE);
  if (!priceTolerance.isFinite() || priceTolerance.isNegative()) {
    throw new Error(`[Compat] Price tolerance must be >= 0, got ${String(input.priceTolerance)}`);
  }

  return Object.freeze({
    rates: Object.freeze(rates),
    priceTolerance,
    dateSentinel: input.dateSentinel ?? DEFAULT_DATE_SENTINEL,
  });
}

export const DEFAULT_COMPAT_SETTINGS: CompatSettings = createCompatSettings();
