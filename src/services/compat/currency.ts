import Decimal from 'decimal.js';
import { BASE_CURRENCY } from '../../config/currencyRates';
import type { AuditTrail } from './auditTrail';
import { normalizeCurrencyCode } from './fields';
import type { CompatSettings } from './types';

export type Conversion = {
  usd: Decimal;
  rate: Decimal;
  currency: string;
  /** True when the currency was missing from the table and 1:1 was used. */
  fallback: boolean;
};

const ONE = new Decimal(1);

export function roundMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/**
 * Converts an amount to USD at the configured rate, rounded half-up to cents.
 * Never throws on an unknown code: the amount is kept 1:1 and flagged.
 */
export function convertToUsd(
  amount: Decimal.Value,
  currency: string | null | undefined,
  rates: CompatSettings['rates']
): Conversion {
  const code = normalizeCurrencyCode(currency) ?? BASE_CURRENCY;
  const rate: Decimal | undefined = Object.prototype.hasOwnProperty.call(rates, code) ? rates[code] : undefined;
  const effective = rate ?? ONE;
  return {
    usd: roundMoney(new Decimal(amount).times(effective)),
    rate: effective,
    currency: code,
    fallback: rate === undefined,
  };
}

export function unknownCurrencyWarning(currency: string): string {
  return `Unknown currency '${currency}', using 1:1 USD fallback`;
}

/**
 * convertToUsd plus the audit side effects every engine call site needs:
 * a warning for a fallback, a decision for a real non-USD conversion.
 */
export function convertWithAudit(
  amount: Decimal.Value,
  currency: string | null | undefined,
  settings: CompatSettings,
  audit: AuditTrail,
  subject: string
): Decimal {
  const conversion = convertToUsd(amount, currency, settings.rates);
  if (conversion.fallback) {
    audit.addWarning(unknownCurrencyWarning(conversion.currency));
    audit.addDecision('currency_conversion', 'fallback_1_to_1', {
      subject,
      currency: conversion.currency,
    });
  } else if (conversion.currency !== BASE_CURRENCY) {
    audit.addDecision('currency_conversion', `${conversion.currency}→${BASE_CURRENCY}`, {
      subject,
      rate: conversion.rate.toString(),
      amount: new Decimal(amount).toString(),
      usd: conversion.usd.toNumber(),
    });
  }
  return conversion.usd;
}
