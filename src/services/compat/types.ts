import type Decimal from 'decimal.js';

export type SourceVersion = 'v1' | 'v2' | 'v3';

export const LEGACY_STATUSES = ['PAID', 'CANCELLED', 'SHIPPED'] as const;
export type LegacyStatus = (typeof LEGACY_STATUSES)[number];

export type LegacyItem = {
  sku: string | null;
  name: string | null;
  price: number;
  quantity: number;
};

export type LegacyOrder = {
  orderId: string;
  status: LegacyStatus;
  totalPrice: number;
  customerId: string | null;
  customerName: string | null;
  createdAt: string;
  items: LegacyItem[];
};

/** A v1 document received as-is; returned unchanged and never validated. */
export type LegacyDocument = Record<string, unknown>;

export type CompatSettings = {
  /** USD value of one unit of each currency, keyed by upper-case ISO code. */
  rates: Readonly<Record<string, Decimal>>;
  /** Inclusive USD tolerance between declared and computed totals. */
  priceTolerance: Decimal;
  dateSentinel: string;
};

/** A priced line in source currency, before conversion. */
export type PricedLine = {
  price: Decimal;
  quantity: number;
  currency: string;
};

export type MoneyAmount = {
  value: Decimal;
  currency: string;
};

export type ReconcileStrategy = 'declared' | 'computed';

export type ReconcileResult = {
  totalUsd: Decimal;
  strategy: ReconcileStrategy;
  declaredUsd: Decimal;
  computedUsd: Decimal | null;
};

export type ResponseClass = 'OK' | 'DEPRECATED' | 'TRANSIENT' | 'CLIENT_ERROR' | 'OUTAGE';

export type NormalizedError = {
  error: string;
  message: string;
};
