import type { AuditTrail } from './auditTrail';
import { asArray, asRecord, readText } from './fields';
import { LEGACY_STATUSES, type LegacyStatus } from './types';

export type FulfilmentContext = 'physical' | 'digital';

const FALLBACK_STATUS: LegacyStatus = 'PAID';

function isLegacyStatus(value: string): value is LegacyStatus {
  return LEGACY_STATUSES.some((status) => status === value);
}

/**
 * Maps a source order state onto the legacy enum.
 *
 * FULFILLED always becomes SHIPPED; whether the goods were physical (tracked)
 * or digital survives only in the decision's `context`.
 */
export function mapStatus(state: unknown, hasTracking: boolean, audit: AuditTrail): LegacyStatus {
  const raw = typeof state === 'string' ? state : state === undefined || state === null ? '' : String(state);
  const normalized = raw.trim().toUpperCase();

  if (normalized === 'FULFILLED') {
    const context: FulfilmentContext = hasTracking ? 'physical' : 'digital';
    audit.addDecision('status_mapping', 'FULFILLED→SHIPPED', { from: raw, to: 'SHIPPED', context });
    return 'SHIPPED';
  }

  if (isLegacyStatus(normalized)) {
    audit.addDecision('status_mapping', `${normalized}→${normalized}`, { from: raw, to: normalized });
    return normalized;
  }

  audit.addDecision('status_mapping', `${raw || '<missing>'}→${FALLBACK_STATUS}`, {
    from: raw,
    to: FALLBACK_STATUS,
    fallback: true,
  });
  audit.addWarning(`Unknown status '${raw}', defaulted to ${FALLBACK_STATUS}`);
  return FALLBACK_STATUS;
}

export function hasV2Tracking(record: Record<string, unknown>): boolean {
  return readText(record.trackingNumber) !== null;
}

/**
 * v3 carries tracking in three places: the record itself, a shipment block,
 * or a status-history entry that recorded one.
 */
export function hasV3Tracking(record: Record<string, unknown>): boolean {
  if (readText(record.trackingNumber) !== null) return true;
  if (readText(asRecord(record.shipment).trackingNumber) !== null) return true;

  const history = asArray(asRecord(record.orderStatus).history);
  return history.some((entry) => {
    const e = asRecord(entry);
    return readText(e.tracking) !== null || readText(e.trackingNumber) !== null;
  });
}
