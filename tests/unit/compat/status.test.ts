import { describe, it, expect } from 'vitest';
import { AuditTrail } from '../../../src/services/compat/auditTrail';
import { hasV2Tracking, hasV3Tracking, mapStatus } from '../../../src/services/compat/status';
import { LEGACY_STATUSES } from '../../../src/services/compat/types';

describe('mapStatus', () => {
  it('keeps legacy statuses as they are', () => {
    const audit = new AuditTrail();
    expect(mapStatus('PAID', false, audit)).toBe('PAID');
    expect(mapStatus('CANCELLED', false, audit)).toBe('CANCELLED');
    expect(audit.decisions[0]).toEqual({
      step: 'status_mapping',
      action: 'PAID→PAID',
      details: { from: 'PAID', to: 'PAID' },
    });
    expect(audit.warnings).toEqual([]);
  });

  it('compares states trimmed and upper-cased', () => {
    const audit = new AuditTrail();
    expect(mapStatus(' shipped ', false, audit)).toBe('SHIPPED');
    expect(audit.decisions[0]).toEqual({
      step: 'status_mapping',
      action: 'SHIPPED→SHIPPED',
      details: { from: ' shipped ', to: 'SHIPPED' },
    });
  });

  it('maps FULFILLED with tracking to SHIPPED in a physical context', () => {
    const audit = new AuditTrail();
    expect(mapStatus('FULFILLED', true, audit)).toBe('SHIPPED');
    expect(audit.decisions).toEqual([
      {
        step: 'status_mapping',
        action: 'FULFILLED→SHIPPED',
        details: { from: 'FULFILLED', to: 'SHIPPED', context: 'physical' },
      },
    ]);
  });

  it('maps FULFILLED without tracking to SHIPPED in a digital context', () => {
    const audit = new AuditTrail();
    expect(mapStatus('fulfilled', false, audit)).toBe('SHIPPED');
    expect(audit.decisions[0].details).toEqual({ from: 'fulfilled', to: 'SHIPPED', context: 'digital' });
  });

  it('defaults unknown states to PAID with a warning', () => {
    const audit = new AuditTrail();
    expect(mapStatus('ON_HOLD', false, audit)).toBe('PAID');
    expect(audit.warnings).toEqual(["Unknown status 'ON_HOLD', defaulted to PAID"]);
    expect(audit.decisions).toEqual([
      {
        step: 'status_mapping',
        action: 'ON_HOLD→PAID',
        details: { from: 'ON_HOLD', to: 'PAID', fallback: true },
      },
    ]);
  });

  it('defaults a missing state to PAID', () => {
    const audit = new AuditTrail();
    expect(mapStatus(undefined, false, audit)).toBe('PAID');
    expect(audit.decisions[0].action).toBe('<missing>→PAID');
    expect(audit.warnings).toEqual(["Unknown status '', defaulted to PAID"]);
  });

  it('always lands inside the legacy enum', () => {
    const inputs: unknown[] = ['PAID', 'REFUNDED', 'FULFILLED', '', null, 7, { state: 'PAID' }, 'cancelled'];
    for (const input of inputs) {
      expect(LEGACY_STATUSES).toContain(mapStatus(input, false, new AuditTrail()));
    }
  });
});

describe('tracking signals', () => {
  it('reads v2 tracking from the record', () => {
    expect(hasV2Tracking({ trackingNumber: 'TRACK123' })).toBe(true);
    expect(hasV2Tracking({ trackingNumber: '  ' })).toBe(false);
    expect(hasV2Tracking({})).toBe(false);
  });

  it('reads v3 tracking from the record, the shipment or the status history', () => {
    expect(hasV3Tracking({ trackingNumber: 'TRACK123' })).toBe(true);
    expect(hasV3Tracking({ shipment: { trackingNumber: 'SHP-1' } })).toBe(true);
    expect(hasV3Tracking({ orderStatus: { history: [{ status: 'PAID' }, { status: 'FULFILLED', tracking: 'ZX9' }] } })).toBe(
      true
    );
    expect(hasV3Tracking({ orderStatus: { history: [{ status: 'FULFILLED', tracking: '' }] } })).toBe(false);
    expect(hasV3Tracking({ orderStatus: { current: 'FULFILLED' } })).toBe(false);
  });
});
