import { isDeepStrictEqual } from 'util';
import type { AuditTrailJSON } from './compat/auditTrail';
import { validateIdempotency } from './compat/diagnostics';
import { classifyResponse, normalizeErrorResponse, toLegacy } from './compat';
import { DEFAULT_COMPAT_SETTINGS } from './compat/settings';
import type { CompatSettings, LegacyTransformResult } from './compat';
import type { OrderSource, SourceResponse } from './orderSourceService';

export type RegressionCheckResult = {
  name: string;
  ok: boolean;
  details: string;
  audit?: AuditTrailJSON;
};

type CheckContext = {
  fetch(caseId: string): Promise<SourceResponse>;
  transform(caseId: string): Promise<LegacyTransformResult>;
};

type RegressionCheck = {
  name: string;
  run(ctx: CheckContext): Promise<Omit<RegressionCheckResult, 'name'>>;
};

const IDEMPOTENCY_CASES = ['v2_good', 'v2_price_mismatch', 'v2_eur', 'v3_fulfilled_physical', 'v3_jpy_tz', 'v1_legacy'];

function fulfilmentContext(result: LegacyTransformResult): string {
  const decision = result.audit.findDecisions('status_mapping')[0];
  return String(decision?.details?.context ?? 'none');
}

const CHECKS: RegressionCheck[] = [
  {
    name: 'v2 price mismatch is repaired from line items',
    async run(ctx) {
      const { order, audit } = await ctx.transform('v2_price_mismatch');
      const warned = audit.warnings.some((w) => w.includes('mismatch'));
      return {
        ok: order.totalPrice === 40 && warned,
        details: `totalPrice=${order.totalPrice} mismatchWarning=${warned}`,
        audit: audit.toJSON(),
      };
    },
  },
  {
    name: 'v3 FULFILLED with tracking maps to SHIPPED (physical)',
    async run(ctx) {
      const result = await ctx.transform('v3_fulfilled_physical');
      const context = fulfilmentContext(result);
      return {
        ok: result.order.status === 'SHIPPED' && context === 'physical',
        details: `status=${result.order.status} context=${context}`,
        audit: result.audit.toJSON(),
      };
    },
  },
  {
    name: 'v3 FULFILLED without tracking maps to SHIPPED (digital)',
    async run(ctx) {
      const result = await ctx.transform('v3_fulfilled_digital');
      const context = fulfilmentContext(result);
      return {
        ok: result.order.status === 'SHIPPED' && context === 'digital',
        details: `status=${result.order.status} context=${context}`,
        audit: result.audit.toJSON(),
      };
    },
  },
  {
    name: 'EUR totals convert to USD',
    async run(ctx) {
      const { order, audit } = await ctx.transform('v2_eur');
      return { ok: order.totalPrice === 110, details: `totalPrice=${order.totalPrice}`, audit: audit.toJSON() };
    },
  },
  {
    name: 'JPY totals convert to USD and mismatches are repaired',
    async run(ctx) {
      const { order, audit } = await ctx.transform('v2_jpy');
      return { ok: order.totalPrice === 35, details: `totalPrice=${order.totalPrice}`, audit: audit.toJSON() };
    },
  },
  {
    name: 'offset timestamps normalize to the UTC date',
    async run(ctx) {
      const { order, audit } = await ctx.transform('v3_jpy_tz');
      return {
        ok: order.createdAt === '2023-07-02' && order.totalPrice === 73.5,
        details: `createdAt=${order.createdAt} totalPrice=${order.totalPrice}`,
        audit: audit.toJSON(),
      };
    },
  },
  {
    name: 'v3 error list normalizes to the v1 error body',
    async run(ctx) {
      const { statusCode, body } = await ctx.fetch('v3_error');
      const normalized = normalizeErrorResponse(statusCode, body);
      return {
        ok: normalized.error === 'E1001' && normalized.message === 'invalid amount',
        details: JSON.stringify(normalized),
      };
    },
  },
  {
    name: 'v2 flat error keeps its code and message',
    async run(ctx) {
      const { statusCode, body } = await ctx.fetch('v2_error');
      const normalized = normalizeErrorResponse(statusCode, body);
      const classification = classifyResponse(statusCode, body);
      return {
        ok: normalized.error === 'INVALID_REQUEST' && classification === 'CLIENT_ERROR',
        details: `${JSON.stringify(normalized)} classification=${classification}`,
      };
    },
  },
  {
    name: 'busy upstream is transient with a retry hint',
    async run(ctx) {
      const { statusCode, body } = await ctx.fetch('v3_retry');
      const normalized = normalizeErrorResponse(statusCode, body);
      const classification = classifyResponse(statusCode, body);
      return {
        ok: classification === 'TRANSIENT' && normalized.message.endsWith('(retry after 60s)'),
        details: `${JSON.stringify(normalized)} classification=${classification}`,
      };
    },
  },
  {
    name: 'retired v1 endpoint is classified DEPRECATED',
    async run(ctx) {
      const { statusCode, body } = await ctx.fetch('v1_deprecated');
      const classification = classifyResponse(statusCode, body);
      return { ok: classification === 'DEPRECATED', details: `classification=${classification}` };
    },
  },
  {
    name: 'legacy documents pass through unchanged',
    async run(ctx) {
      const { body } = await ctx.fetch('v1_legacy');
      const { order, audit } = await ctx.transform('v1_legacy');
      const unchanged = isDeepStrictEqual(order, body);
      return { ok: unchanged, details: `unchanged=${unchanged}`, audit: audit.toJSON() };
    },
  },
];

/**
 * Replays the catalogued upstream cases through the engine and reports one
 * result per expectation. Cases that cannot be fetched or transformed fail
 * their check instead of aborting the run.
 */
export async function runRegressionChecks(
  source: OrderSource,
  settings: CompatSettings = DEFAULT_COMPAT_SETTINGS
): Promise<RegressionCheckResult[]> {
  const ctx: CheckContext = {
    fetch: (caseId) => source.fetch(caseId),
    async transform(caseId) {
      const { statusCode, body } = await source.fetch(caseId);
      if (classifyResponse(statusCode, body) !== 'OK') {
        throw new Error(`case ${caseId} answered ${statusCode}`);
      }
      return toLegacy(body, settings);
    },
  };

  const results: RegressionCheckResult[] = [];
  for (const check of CHECKS) {
    try {
      results.push({ name: check.name, ...(await check.run(ctx)) });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      results.push({ name: check.name, ok: false, details: `error: ${message}` });
    }
  }

  const failures: string[] = [];
  for (const caseId of IDEMPOTENCY_CASES) {
    try {
      const { body } = await source.fetch(caseId);
      if (!validateIdempotency(body, settings)) failures.push(caseId);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      failures.push(`${caseId} (${message})`);
    }
  }
  results.push({
    name: 'legacy output is idempotent',
    ok: failures.length === 0,
    details: failures.length === 0 ? `${IDEMPOTENCY_CASES.length} cases stable` : `unstable: ${failures.join(', ')}`,
  });

  return results;
}

export function formatRegressionReport(results: RegressionCheckResult[]): string {
  const lines: string[] = [];
  for (const r of results) {
    lines.push(`${r.ok ? 'PASS' : 'FAIL'} - ${r.name} :: ${r.details}`);
  }

  for (const r of results) {
    if (!r.audit) continue;
    lines.push('', `Audit: ${r.name}`);
    for (const d of r.audit.decisions) {
      lines.push(`  [${d.step}] ${d.action}${d.details ? ` ${JSON.stringify(d.details)}` : ''}`);
    }
    for (const w of r.audit.warnings) {
      lines.push(`  WARNING: ${w}`);
    }
  }

  const passed = results.filter((r) => r.ok).length;
  lines.push('', `Summary: ${passed}/${results.length} PASS`);
  return lines.join('\n');
}
