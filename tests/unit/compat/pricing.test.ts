import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { AuditTrail } from '../../../src/services/compat/auditTrail';
import { computeComponentsUsd, reconcilePrice } from '../../../src/services/compat/pricing';
import { createCompatSettings, DEFAULT_COMPAT_SETTINGS } from '../../../src/services/compat/settings';
import type { MoneyAmount, PricedLine } from '../../../src/services/compat/types';

const usd = (value: Decimal.Value): MoneyAmount => ({ value: new Decimal(value), currency: 'USD' });
const line = (price: Decimal.Value, quantity = 1, currency = 'USD'): PricedLine => ({
  price: new Decimal(price),
  quantity,
  currency,
});

describe('reconcilePrice', () => {
  it('repairs a stale declared total from the components', () => {
    const audit = new AuditTrail();
    const result = reconcilePrice(usd(50), [line(20), line(20)], audit, DEFAULT_COMPAT_SETTINGS);

    expect(result.totalUsd.toNumber()).toBe(40);
    expect(result.strategy).toBe('computed');
    expect(result.declaredUsd.toNumber()).toBe(50);
    expect(audit.warnings).toEqual(['Price mismatch: declared 50.00 USD, computed 40.00 USD; using computed total']);
    expect(audit.findDecisions('price_consistency')).toEqual([
      {
        step: 'price_consistency',
        action: 'use_computed',
        details: { status: 'mismatch', declared: 50, computed: 40, difference: 10, strategy: 'computed' },
      },
    ]);
  });

  it('keeps the declared total within tolerance, inclusive', () => {
    const audit = new AuditTrail();
    const result = reconcilePrice(usd('40.01'), [line(20, 2)], audit, DEFAULT_COMPAT_SETTINGS);

    expect(result.totalUsd.toNumber()).toBe(40.01);
    expect(result.strategy).toBe('declared');
    expect(audit.warnings).toEqual([]);
    expect(audit.decisions).toEqual([
      {
        step: 'price_consistency',
        action: 'use_declared',
        details: { status: 'valid', declared: 40.01, computed: 40 },
      },
    ]);
  });

  it('switches to the computed total just beyond tolerance', () => {
    const result = reconcilePrice(usd('40.02'), [line(20, 2)], new AuditTrail(), DEFAULT_COMPAT_SETTINGS);
    expect(result.strategy).toBe('computed');
    expect(result.totalUsd.toNumber()).toBe(40);
  });

  it('uses the declared total when there are no components', () => {
    const audit = new AuditTrail();
    const result = reconcilePrice(usd('12.5'), [], audit, DEFAULT_COMPAT_SETTINGS);

    expect(result.totalUsd.toNumber()).toBe(12.5);
    expect(result.computedUsd).toBeNull();
    expect(audit.decisions).toEqual([
      { step: 'price_consistency', action: 'use_declared', details: { reason: 'no_components', declared: 12.5 } },
    ]);
  });

  it('compares in USD after converting both sides', () => {
    const audit = new AuditTrail();
    const result = reconcilePrice(
      { value: new Decimal(10000), currency: 'JPY' },
      [line(5000, 1, 'JPY')],
      audit,
      DEFAULT_COMPAT_SETTINGS
    );

    expect(result.totalUsd.toNumber()).toBe(35);
    expect(result.declaredUsd.toNumber()).toBe(70);
    expect(audit.warnings).toEqual(['Price mismatch: declared 70.00 USD, computed 35.00 USD; using computed total']);
  });

  it('honours a configured tolerance', () => {
    const settings = createCompatSettings({ priceTolerance: '5' });
    const result = reconcilePrice(usd(50), [line(46)], new AuditTrail(), settings);
    expect(result.strategy).toBe('declared');
    expect(result.totalUsd.toNumber()).toBe(50);
  });
});

describe('computeComponentsUsd', () => {
  it('rounds each converted unit price before multiplying by quantity', () => {
    // 333 JPY = 2.331 USD -> 2.33 per unit, x3
    const total = computeComponentsUsd([line(333, 3, 'JPY')], DEFAULT_COMPAT_SETTINGS, new AuditTrail());
    expect(total.toString()).toBe('6.99');
  });

  it('sums mixed currencies', () => {
    const total = computeComponentsUsd(
      [line(50, 2, 'EUR'), line('9.99', 1, 'USD')],
      DEFAULT_COMPAT_SETTINGS,
      new AuditTrail()
    );
    expect(total.toString()).toBe('119.99');
  });
});
