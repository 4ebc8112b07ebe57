#!/usr/bin/env tsx
/**
 * Compatibility Regression Checks
 *
 * Replays the fixture catalogue through the legacy order engine and prints
 * one PASS/FAIL line per expectation, the audit trail of every transformed
 * case, and a summary. Exits 1 when any check fails.
 *
 * Usage: tsx scripts/run-compat-checks.ts
 *        npm run compat:check
 */

import { config } from '../src/config/env';
import { buildCompatSettings } from '../src/config/compat';
import { createDefaultOrderSource } from '../src/services/orderSourceService';
import { formatRegressionReport, runRegressionChecks } from '../src/services/regressionCheckService';

async function main() {
  const settings = buildCompatSettings(config);
  const results = await runRegressionChecks(createDefaultOrderSource(), settings);

  console.log(formatRegressionReport(results));

  if (results.some((r) => !r.ok)) {
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('❌ Compatibility check script error:', error);
  process.exit(1);
});
