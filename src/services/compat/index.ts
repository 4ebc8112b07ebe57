import Decimal from 'decimal.js';
import { BASE_CURRENCY } from '../../config/currencyRates';
import { AuditTrail } from './auditTrail';
import { convertWithAudit } from './currency';
import { normalizeDate } from './dates';
import { DateParseError, EmptyPayloadError, UnknownVersionError } from './errors';
import { asArray, asRecord, isRecord, normalizeCurrencyCode, readDecimal, type JsonRecord, readText } from './fields';
import { readSourceLines, type SourceLine } from './lineItems';
import { reconcilePrice } from './pricing';
import { DEFAULT_COMPAT_SETTINGS } from './settings';
import { hasV2Tracking, hasV3Tracking, mapStatus } from './status';
import type { CompatSettings, LegacyDocument, LegacyItem, LegacyOrder, MoneyAmount, PricedLine, SourceVersion } from './types';
import { detectVersion } from './version';

export { AuditTrail } from './auditTrail';
export type { AuditDecision, AuditStep, AuditTrailJSON, AuditValue } from './auditTrail';
export { convertToUsd } from './currency';
export { normalizeDate } from './dates';
export { CompatError, DateParseError, EmptyPayloadError, UnknownVersionError } from './errors';
export { reconcilePrice } from './pricing';
export { classifyResponse, normalizeErrorResponse } from './responses';
export { createCompatSettings, DEFAULT_COMPAT_SETTINGS } from './settings';
export { mapStatus } from './status';
export { detectVersion } from './version';
export * from './types';

export type LegacyTransformResult =
  | { version: 'v1'; order: LegacyDocument; audit: AuditTrail }
  | { version: Exclude<SourceVersion, 'v1'>; order: LegacyOrder; audit: AuditTrail };

const UNKNOWN_ORDER_ID = 'UNKNOWN';

/** One source record, read into the fields every generation has in common. */
type WorkingRecord = {
  orderId: unknown;
  state: unknown;
  hasTracking: boolean;
  customer: JsonRecord;
  declared: MoneyAmount;
  components: PricedLine[];
  createdAt: unknown;
  lines: SourceLine[];
};

function readMoney(value: unknown, currency: unknown, audit: AuditTrail, subject: string): MoneyAmount {
  let amount = readDecimal(value);
  if (!amount) {
    audit.addWarning(`Invalid ${subject} (${JSON.stringify(value ?? null)}), counted as 0`);
    amount = new Decimal(0);
  }
  return { value: amount, currency: normalizeCurrencyCode(currency) ?? BASE_CURRENCY };
}

function readV2Record(record: JsonRecord, audit: AuditTrail): WorkingRecord {
  const amount: JsonRecord = isRecord(record.amount) ? record.amount : { value: record.amount };
  const lines = readSourceLines(asArray(record.lineItems), audit);

  return {
    orderId: record.orderId,
    state: record.state,
    hasTracking: hasV2Tracking(record),
    customer: asRecord(record.customer),
    declared: readMoney(amount.value, amount.currency, audit, 'declared amount'),
    components: lines,
    createdAt: record.createdAt,
    lines,
  };
}

function readDiscount(value: unknown): Decimal | null {
  return isRecord(value) ? readDecimal(value.amount) : readDecimal(value);
}

function readV3Record(record: JsonRecord, audit: AuditTrail): WorkingRecord {
  const pricing = asRecord(record.pricing);
  const declared = readMoney(pricing.total, pricing.currency, audit, 'declared total');

  // Components are the pricing breakdown, never line items
  const subtotal = readDecimal(pricing.subtotal);
  const components: PricedLine[] = [];
  if (subtotal) {
    const tax = readDecimal(pricing.tax) ?? new Decimal(0);
    const discount = readDiscount(pricing.discount) ?? new Decimal(0);
    components.push({ price: subtotal.plus(tax).minus(discount), quantity: 1, currency: declared.currency });
  }

  return {
    orderId: record.orderId,
    state: asRecord(record.orderStatus).current,
    hasTracking: hasV3Tracking(record),
    customer: asRecord(record.customer),
    declared,
    components,
    createdAt: asRecord(record.timestamps).created,
    lines: readSourceLines(asArray(record.lineItems), audit),
  };
}

function selectV3Record(doc: JsonRecord, audit: AuditTrail): JsonRecord {
  const data = asArray(doc.data);
  if (data.length === 0) throw new EmptyPayloadError();

  const first = data[0];
  if (!isRecord(first)) {
    throw new UnknownVersionError('v3 payload record is not an object');
  }
  audit.addDecision('select_record', 'first_of_data', { index: 0, available: data.length });
  return first;
}

function resolveCreatedAt(raw: unknown, audit: AuditTrail, settings: CompatSettings): string {
  if (raw === undefined || raw === null || raw === '') {
    audit.addWarning(`Missing creation timestamp, using '${settings.dateSentinel}'`);
    audit.addDecision('date_normalization', 'sentinel', { reason: 'missing', value: settings.dateSentinel });
    return settings.dateSentinel;
  }

  try {
    const date = normalizeDate(raw);
    audit.addDecision('date_normalization', 'utc_date', { from: String(raw), to: date });
    return date;
  } catch (err) {
    if (!(err instanceof DateParseError)) throw err;
    audit.addWarning(`Date parsing failed: ${err.message}; using '${settings.dateSentinel}'`);
    audit.addDecision('date_normalization', 'sentinel', { reason: 'unparseable', value: settings.dateSentinel });
    return settings.dateSentinel;
  }
}

function buildItems(lines: SourceLine[], audit: AuditTrail, settings: CompatSettings): LegacyItem[] {
  return lines.map((line, i) => ({
    sku: line.sku,
    name: line.name,
    price: convertWithAudit(line.price, line.currency, settings, audit, `item[${i}]`).toNumber(),
    quantity: line.quantity,
  }));
}

function readCustomer(customer: JsonRecord, audit: AuditTrail): Pick<LegacyOrder, 'customerId' | 'customerName'> {
  const customerId = readText(customer.id);
  const customerName = readText(customer.name);
  if (customerId === null) audit.addWarning('Missing customer id, using null');
  audit.addDecision('customer', customerId === null ? 'missing' : 'flattened', {
    customerId,
    customerName,
  });
  return { customerId, customerName };
}

function transformRecord(
  version: Exclude<SourceVersion, 'v1'>,
  record: JsonRecord,
  audit: AuditTrail,
  settings: CompatSettings
): LegacyOrder {
  const working = version === 'v2' ? readV2Record(record, audit) : readV3Record(record, audit);

  let orderId = readText(working.orderId);
  if (orderId === null) {
    audit.addWarning(`Missing orderId, using '${UNKNOWN_ORDER_ID}'`);
    orderId = UNKNOWN_ORDER_ID;
  }

  const status = mapStatus(working.state, working.hasTracking, audit);
  const customer = readCustomer(working.customer, audit);
  const price = reconcilePrice(working.declared, working.components, audit, settings);
  const createdAt = resolveCreatedAt(working.createdAt, audit, settings);

  const items = buildItems(working.lines, audit, settings);
  audit.addDecision('items', items.length > 0 ? 'mapped_line_items' : 'empty', { count: items.length });

  return {
    orderId,
    status,
    totalPrice: price.totalUsd.toNumber(),
    customerId: customer.customerId,
    customerName: customer.customerName,
    createdAt,
    items,
  };
}

/**
 * Transforms a v2 or v3 order document into the legacy v1 shape.
 *
 * Structural problems (unknown shape, empty v3 payload) throw a CompatError.
 * Data-quality problems inside a known shape are repaired or defaulted and
 * reported through `audit.warnings`.
 */
export function toLegacy(doc: unknown, settings: CompatSettings = DEFAULT_COMPAT_SETTINGS): LegacyTransformResult {
  const audit = new AuditTrail();
  const version = detectVersion(doc);
  audit.addDecision('detect_version', version);

  // detectVersion only returns for objects
  const root = asRecord(doc);

  if (version === 'v1') {
    audit.addDecision('noop', 'already_legacy');
    return { version, order: structuredClone(root), audit };
  }

  const record = version === 'v3' ? selectV3Record(root, audit) : root;
  return { version, order: transformRecord(version, record, audit, settings), audit };
}
