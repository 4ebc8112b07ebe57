import z from 'zod';
import { DEFAULT_USD_RATES } from './currencyRates';
import { createCompatSettings } from '../services/compat/settings';
import type { CompatSettings } from '../services/compat/types';
import type { AppConfig } from './env';

const rateOverridesSchema = z.record(z.string().regex(/^[A-Za-z]{3}$/), z.number().positive());

export function parseRateOverrides(raw: string | undefined): Record<string, number> {
  if (!raw || !raw.trim()) return {};

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Compat] COMPAT_RATE_OVERRIDES is not valid JSON: ${message}`);
  }

  const parsed = rateOverridesSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`[Compat] COMPAT_RATE_OVERRIDES is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Engine settings for this process. Built once at startup and passed down;
 * nothing in the engine reads the environment itself.
 */
export function buildCompatSettings(
  cfg: Pick<AppConfig, 'COMPAT_PRICE_TOLERANCE' | 'COMPAT_DATE_SENTINEL' | 'COMPAT_RATE_OVERRIDES'>
): CompatSettings {
  const overrides = parseRateOverrides(cfg.COMPAT_RATE_OVERRIDES);
  const rates: Record<string, string | number> = { ...DEFAULT_USD_RATES };
  for (const [code, rate] of Object.entries(overrides)) {
    rates[code.toUpperCase()] = rate;
  }

  return createCompatSettings({
    rates,
    // Through String() so 0.01 reaches decimal.js as "0.01"
    priceTolerance: String(cfg.COMPAT_PRICE_TOLERANCE),
    dateSentinel: cfg.COMPAT_DATE_SENTINEL,
  });
}
