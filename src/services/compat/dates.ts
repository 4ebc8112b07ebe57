import { isValid, parseISO } from 'date-fns';
import { DateParseError } from './errors';

const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;

// date, T or space, HH:mm[:ss[.fff]], then Z | ±HH:MM | ±HHMM | ±HH | nothing
const DATE_TIME_RE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?)(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function toUtcDate(iso: string, input: unknown): string {
  const parsed = parseISO(iso);
  if (!isValid(parsed)) throw new DateParseError(input);
  return parsed.toISOString().slice(0, 10);
}

/**
 * Reduces an ISO-8601 timestamp to its UTC calendar date (YYYY-MM-DD).
 * A timestamp without an offset is read as UTC, not server-local time.
 */
export function normalizeDate(value: unknown): string {
  if (typeof value !== 'string') throw new DateParseError(value);
  const raw = value.trim();

  if (DATE_ONLY_RE.test(raw)) {
    // Validates the calendar date (rejects 2023-02-30) without shifting it
    toUtcDate(`${raw}T00:00:00Z`, value);
    return raw;
  }

  const m = raw.match(DATE_TIME_RE);
  if (!m) throw new DateParseError(value);

  const [, datePart, timePart, zone] = m;
  return toUtcDate(`${datePart}T${timePart}${zone ? zone.toUpperCase() : 'Z'}`, value);
}
