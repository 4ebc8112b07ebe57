import Decimal from 'decimal.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Strings pass through trimmed; finite numbers are stringified; anything else is null. */
export function readText(value: unknown): string | null {
  if (typeof value === 'string') {
    const v = value.trim();
    return v ? v : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Parses JSON numbers and numeric strings into a Decimal.
 * Numbers go through their shortest string form so 7.25 stays 7.25.
 */
export function readDecimal(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(String(value)) : null;
  }
  if (typeof value === 'string') {
    const v = value.trim();
    if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(v)) return null;
    return new Decimal(v);
  }
  return null;
}

export function normalizeCurrencyCode(currencyCode: unknown): string | null {
  const v = typeof currencyCode === 'string' ? currencyCode.trim().toUpperCase() : '';
  if (!v) return null;
  return v;
}
