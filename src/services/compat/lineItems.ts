import Decimal from 'decimal.js';
import { BASE_CURRENCY } from '../../config/currencyRates';
import type { AuditTrail } from './auditTrail';
import { asRecord, normalizeCurrencyCode, readDecimal, readText } from './fields';
import type { PricedLine } from './types';

export type SourceLine = PricedLine & {
  sku: string | null;
  name: string | null;
};

const ZERO = new Decimal(0);

function readQuantity(raw: unknown, index: number, audit: AuditTrail): number {
  if (raw === undefined || raw === null) return 1;
  const q = readDecimal(raw);
  if (q && q.isInteger() && q.gte(1)) return q.toNumber();
  audit.addWarning(`Invalid quantity on line item ${index} (${JSON.stringify(raw)}), defaulted to 1`);
  return 1;
}

/**
 * Reads source line items in either generation's shape:
 * v2 `{sku|name, price|unitPrice, quantity, currency?}` and
 * v3 `{variant.sku, name, pricing.unit, quantity, currency?}`.
 */
export function readSourceLines(rawItems: unknown[], audit: AuditTrail): SourceLine[] {
  return rawItems.map((raw, index) => {
    const item = asRecord(raw);
    const variant = asRecord(item.variant);
    const itemPricing = asRecord(item.pricing);

    const rawPrice = item.price ?? item.unitPrice ?? itemPricing.unit;
    let price = readDecimal(rawPrice);
    if (!price) {
      audit.addWarning(`Invalid price on line item ${index} (${JSON.stringify(rawPrice ?? null)}), counted as 0`);
      price = ZERO;
    }

    return {
      sku: readText(item.sku) ?? readText(variant.sku),
      name: readText(item.name) ?? readText(item.title),
      price,
      quantity: readQuantity(item.quantity, index, audit),
      currency: normalizeCurrencyCode(item.currency) ?? BASE_CURRENCY,
    };
  });
}
