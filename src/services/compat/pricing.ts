import Decimal from 'decimal.js';
import type { AuditTrail } from './auditTrail';
import { convertWithAudit, roundMoney } from './currency';
import type { CompatSettings, MoneyAmount, PricedLine, ReconcileResult } from './types';

/**
 * Sum of components in USD. Each unit price is converted and rounded on its
 * own, multiplied by its quantity, and the sum is rounded once more.
 */
export function computeComponentsUsd(
  components: PricedLine[],
  settings: CompatSettings,
  audit: AuditTrail
): Decimal {
  const sum = components.reduce((acc, line, i) => {
    const unitUsd = convertWithAudit(line.price, line.currency, settings, audit, `component[${i}]`);
    return acc.plus(unitUsd.times(line.quantity));
  }, new Decimal(0));
  return roundMoney(sum);
}

/**
 * Checks a declared total against its components.
 *
 * Within tolerance the declared header wins. Beyond it the computed sum wins.
 */
export function reconcilePrice(
  declared: MoneyAmount,
  components: PricedLine[],
  audit: AuditTrail,
  settings: CompatSettings
): ReconcileResult {
  const declaredUsd = convertWithAudit(declared.value, declared.currency, settings, audit, 'declared_total');

  if (components.length === 0) {
    audit.addDecision('price_consistency', 'use_declared', {
      reason: 'no_components',
      declared: declaredUsd.toNumber(),
    });
    return { totalUsd: declaredUsd, strategy: 'declared', declaredUsd, computedUsd: null };
  }

  const computedUsd = computeComponentsUsd(components, settings, audit);
  const difference = declaredUsd.minus(computedUsd).abs();

  if (difference.lte(settings.priceTolerance)) {
    audit.addDecision('price_consistency', 'use_declared', {
      status: 'valid',
      declared: declaredUsd.toNumber(),
      computed: computedUsd.toNumber(),
    });
    return { totalUsd: declaredUsd, strategy: 'declared', declaredUsd, computedUsd };
  }

  audit.addDecision('price_consistency', 'use_computed', {
    status: 'mismatch',
    declared: declaredUsd.toNumber(),
    computed: computedUsd.toNumber(),
    difference: difference.toNumber(),
    strategy: 'computed',
  });
  audit.addWarning(
    `Price mismatch: declared ${declaredUsd.toFixed(2)} USD, computed ${computedUsd.toFixed(2)} USD; using computed total`
  );
  return { totalUsd: computedUsd, strategy: 'computed', declaredUsd, computedUsd };
}
