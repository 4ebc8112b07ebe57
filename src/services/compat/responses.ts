import { asArray, asRecord, isRecord, readDecimal, readText, type JsonRecord } from './fields';
import type { NormalizedError, ResponseClass } from './types';

function stringifyBody(body: unknown): string {
  if (typeof body === 'string') return body;
  if (body === undefined) return '';
  return JSON.stringify(body);
}

function readRetryAfter(source: JsonRecord): string | null {
  const seconds = readDecimal(source.retryAfter ?? source.retry_after);
  return seconds ? seconds.toString() : null;
}

function retryHint(body: JsonRecord, errors: JsonRecord[]): string {
  const seconds =
    readRetryAfter(body) ??
    errors.map((e) => readRetryAfter(asRecord(e.metadata)) ?? readRetryAfter(e)).find((s) => s !== null) ??
    null;
  if (seconds !== null) return ` (retry after ${seconds}s)`;
  if (body.retryable === true) return ' (retryable)';
  return '';
}

function readErrorCode(source: JsonRecord): string | null {
  return readText(source.code) ?? readText(source.error_code) ?? readText(source.error);
}

function readErrorMessage(source: JsonRecord): string | null {
  return readText(source.message) ?? readText(source.detail) ?? readText(source.error_description);
}

/**
 * Collapses the error body shapes seen across API generations into the v1
 * `{error, message}` pair:
 * - `{error, message}` (and `{error: {code, message}}`)
 * - `{error_code, detail}` / `{code, message|detail}`
 * - `{errors: [{code, detail|message}, ...]}`, aggregated into one message
 */
export function normalizeErrorResponse(statusCode: number, body: unknown): NormalizedError {
  const fallbackCode = `HTTP_${statusCode}`;
  if (!isRecord(body)) {
    return { error: fallbackCode, message: stringifyBody(body) };
  }

  const errors = asArray(body.errors).filter(isRecord);
  let code: string | null;
  let message: string | null;

  if (errors.length > 0) {
    code = readErrorCode(errors[0]);
    const messages = errors.map(readErrorMessage).filter((m): m is string => m !== null);
    message = messages.length > 0 ? messages.join('; ') : null;
  } else if (isRecord(body.error)) {
    code = readErrorCode(body.error);
    message = readErrorMessage(body.error) ?? readErrorMessage(body);
  } else {
    code = readErrorCode(body);
    message = readErrorMessage(body);
  }

  if (code === null && message === null) {
    return { error: fallbackCode, message: stringifyBody(body) };
  }

  return {
    error: code ?? fallbackCode,
    message: (message ?? `Request failed with status ${statusCode}`) + retryHint(body, errors),
  };
}

function signalsDeprecation(body: unknown): boolean {
  if (!isRecord(body)) return false;
  if (body.deprecated === true) return true;
  if (readText(body.warning)?.toLowerCase() === 'deprecated') return true;

  const codes = [body, asRecord(body.error), ...asArray(body.errors).filter(isRecord)]
    .map(readErrorCode)
    .filter((c): c is string => c !== null);
  return codes.some((c) => c.toUpperCase().includes('DEPRECATED'));
}

/**
 * Buckets an upstream response for monitoring and retry decisions.
 * An explicit deprecation signal in the body wins over the status code.
 */
export function classifyResponse(statusCode: number, body?: unknown): ResponseClass {
  if (signalsDeprecation(body)) return 'DEPRECATED';
  if (statusCode >= 200 && statusCode < 300) return 'OK';
  if (statusCode === 410) return 'DEPRECATED';
  if (statusCode === 429 || statusCode === 503) return 'TRANSIENT';
  if (statusCode >= 400 && statusCode < 500) return 'CLIENT_ERROR';
  if (statusCode >= 500 && statusCode < 600) return 'OUTAGE';
  return 'TRANSIENT';
}
