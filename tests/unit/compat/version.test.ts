import { describe, it, expect } from 'vitest';
import { detectVersion } from '../../../src/services/compat/version';
import { UnknownVersionError } from '../../../src/services/compat/errors';

const legacyDoc = {
  orderId: 'ORD-1',
  status: 'PAID',
  totalPrice: 10,
  customerId: 'C-1',
  customerName: 'Ada',
  createdAt: '2023-01-01',
  items: [],
};

describe('detectVersion', () => {
  it('detects v3 by a data array, even an empty one', () => {
    expect(detectVersion({ data: [] })).toBe('v3');
    expect(detectVersion({ data: [{ orderId: 'X' }], pagination: { page: 1 } })).toBe('v3');
  });

  it('detects v2 by a top-level orderId', () => {
    expect(detectVersion({ orderId: 'ORD-1', state: 'PAID' })).toBe('v2');
    expect(detectVersion({ orderId: 'ORD-1', data: 'not-an-array' })).toBe('v2');
  });

  it('detects a complete legacy document as v1', () => {
    expect(detectVersion(legacyDoc)).toBe('v1');
  });

  it('treats a legacy-looking document with v2 fields as v2', () => {
    expect(detectVersion({ ...legacyDoc, state: 'PAID' })).toBe('v2');
    expect(detectVersion({ ...legacyDoc, lineItems: [] })).toBe('v2');
  });

  it('detects v1 by orderId, status and totalPrice alone', () => {
    expect(detectVersion({ orderId: 'ORD-1', status: 'PAID', totalPrice: 10 })).toBe('v1');
    expect(detectVersion({ ...legacyDoc, status: 'ON_HOLD', customerId: 42 })).toBe('v1');
  });

  it('needs all three legacy keys for v1', () => {
    expect(detectVersion({ orderId: 'ORD-1', status: 'PAID' })).toBe('v2');
    expect(detectVersion({ orderId: 'ORD-1', totalPrice: 10 })).toBe('v2');
  });

  it('rejects non-objects', () => {
    expect(() => detectVersion(null)).toThrow(UnknownVersionError);
    expect(() => detectVersion(null)).toThrow('Cannot detect API version: expected an object, got null');
    expect(() => detectVersion([legacyDoc])).toThrow('Cannot detect API version: expected an object, got array');
    expect(() => detectVersion('ORD-1')).toThrow('Cannot detect API version: expected an object, got string');
  });

  it('rejects objects with no recognizable keys', () => {
    expect(() => detectVersion({ id: 1, total: 5 })).toThrow('Cannot detect API version from keys: id, total');
    expect(() => detectVersion({})).toThrow('Cannot detect API version from keys: <none>');
  });

  it('carries the UNKNOWN_VERSION code and a 422 status', () => {
    try {
      detectVersion({});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownVersionError);
      if (err instanceof UnknownVersionError) {
        expect(err.code).toBe('UNKNOWN_VERSION');
        expect(err.statusCode).toBe(422);
      }
    }
  });
});
