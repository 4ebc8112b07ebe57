import { UnknownVersionError } from './errors';
import { isRecord, type JsonRecord } from './fields';
import type { SourceVersion } from './types';

const V2_MARKERS = ['state', 'amount', 'lineItems'] as const;

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

const LEGACY_KEYS = ['orderId', 'status', 'totalPrice'] as const;

/** orderId + status + totalPrice, with none of the v2-only fields. */
export function isLegacyShaped(doc: JsonRecord): boolean {
  return LEGACY_KEYS.every((key) => key in doc) && V2_MARKERS.every((key) => !(key in doc));
}

/**
 * Classifies a document by its top-level structure. Pure; an empty v3 `data`
 * array is still v3 here and only fails once a record is needed.
 */
export function detectVersion(doc: unknown): SourceVersion {
  if (!isRecord(doc)) {
    throw new UnknownVersionError(`Cannot detect API version: expected an object, got ${describeKind(doc)}`);
  }

  if (Array.isArray(doc.data)) return 'v3';

  if ('orderId' in doc) {
    return isLegacyShaped(doc) ? 'v1' : 'v2';
  }

  throw new UnknownVersionError(`Cannot detect API version from keys: ${Object.keys(doc).join(', ') || '<none>'}`);
}
