/**
 * USD value of one unit of each supported currency.
 *
 * Rates are fixed configuration, not market data: the table is frozen at load
 * and only ever replaced wholesale through `buildCompatSettings()`.
 * Values are strings so they reach decimal.js without binary float error.
 */
export const DEFAULT_USD_RATES: Readonly<Record<string, string>> = Object.freeze({
  USD: '1.0',
  EUR: '1.10',
  JPY: '0.007',
  GBP: '1.27',
  CAD: '0.73',
});

export const BASE_CURRENCY = 'USD';
