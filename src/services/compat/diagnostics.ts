import { isDeepStrictEqual } from 'util';
import { performance } from 'perf_hooks';
import { toLegacy } from './index';
import { DEFAULT_COMPAT_SETTINGS } from './settings';
import type { CompatSettings } from './types';

/** True when feeding the legacy output back through the engine changes nothing. */
export function validateIdempotency(doc: unknown, settings: CompatSettings = DEFAULT_COMPAT_SETTINGS): boolean {
  const first = toLegacy(doc, settings).order;
  const second = toLegacy(first, settings).order;
  return isDeepStrictEqual(first, second);
}

/** Average milliseconds per `toLegacy` call over `iterations` runs. */
export function benchmarkTransformation(
  doc: unknown,
  iterations: number,
  settings: CompatSettings = DEFAULT_COMPAT_SETTINGS
): number {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`iterations must be a positive integer, got ${iterations}`);
  }

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    toLegacy(doc, settings);
  }
  return (performance.now() - start) / iterations;
}
