import { describe, it, expect } from 'vitest';
import { buildCompatSettings, parseRateOverrides } from '../../../src/config/compat';
import { createCompatSettings, DEFAULT_COMPAT_SETTINGS } from '../../../src/services/compat/settings';

describe('parseRateOverrides', () => {
  it('returns an empty table when unset or blank', () => {
    expect(parseRateOverrides(undefined)).toEqual({});
    expect(parseRateOverrides('   ')).toEqual({});
  });

  it('parses a JSON object of ISO code to rate', () => {
    expect(parseRateOverrides('{"gbp":1.3,"CHF":1.12}')).toEqual({ gbp: 1.3, CHF: 1.12 });
  });

  it('rejects malformed JSON', () => {
    expect(() => parseRateOverrides('{gbp:1.3')).toThrow(/COMPAT_RATE_OVERRIDES is not valid JSON/);
  });

  it('rejects non-ISO codes and non-positive rates', () => {
    expect(() => parseRateOverrides('{"EURO":1}')).toThrow(/COMPAT_RATE_OVERRIDES is invalid/);
    expect(() => parseRateOverrides('{"EUR":-1}')).toThrow(/COMPAT_RATE_OVERRIDES is invalid/);
  });
});

describe('buildCompatSettings', () => {
  it('merges overrides over the default rate table', () => {
    const settings = buildCompatSettings({
      COMPAT_PRICE_TOLERANCE: 0.5,
      COMPAT_DATE_SENTINEL: 'N/A',
      COMPAT_RATE_OVERRIDES: '{"gbp":1.3,"CHF":1.12}',
    });

    expect(settings.rates.GBP.toString()).toBe('1.3');
    expect(settings.rates.CHF.toString()).toBe('1.12');
    expect(settings.rates.EUR.toString()).toBe('1.1');
    expect(settings.rates.JPY.toString()).toBe('0.007');
    expect(settings.priceTolerance.toString()).toBe('0.5');
    expect(settings.dateSentinel).toBe('N/A');
  });

  it('keeps 0.01 exact when passed through as a number', () => {
    const settings = buildCompatSettings({
      COMPAT_PRICE_TOLERANCE: 0.01,
      COMPAT_DATE_SENTINEL: 'UNKNOWN',
      COMPAT_RATE_OVERRIDES: undefined,
    });
    expect(settings.priceTolerance.toString()).toBe('0.01');
  });
});

describe('createCompatSettings', () => {
  it('freezes the settings and the rate table', () => {
    expect(Object.isFrozen(DEFAULT_COMPAT_SETTINGS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_COMPAT_SETTINGS.rates)).toBe(true);
  });

  it('normalizes rate keys to upper-case codes', () => {
    const settings = createCompatSettings({ rates: { ' usd ': 1, sek: '0.095' } });
    expect(Object.keys(settings.rates)).toEqual(['USD', 'SEK']);
  });

  it('rejects zero rates and negative tolerances', () => {
    expect(() => createCompatSettings({ rates: { EUR: 0 } })).toThrow('[Compat] Rate for EUR must be a positive number, got 0');
    expect(() => createCompatSettings({ priceTolerance: -1 })).toThrow('[Compat] Price tolerance must be >= 0, got -1');
  });
});
