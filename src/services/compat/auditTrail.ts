export type AuditStep =
  | 'detect_version'
  | 'noop'
  | 'select_record'
  | 'status_mapping'
  | 'customer'
  | 'currency_conversion'
  | 'price_consistency'
  | 'date_normalization'
  | 'items';

export type AuditValue = string | number | boolean | null;

export type AuditDecision = {
  step: AuditStep;
  action: string;
  details?: Record<string, AuditValue>;
};

export type AuditTrailJSON = {
  decisions: AuditDecision[];
  warnings: string[];
};

function cloneDecision(d: AuditDecision): AuditDecision {
  return d.details ? { ...d, details: { ...d.details } } : { ...d };
}

/**
 * Append-only record of what one transformation decided and where it had to
 * degrade. Insertion order is the order the engine took the steps in.
 */
export class AuditTrail {
  private readonly decisionLog: AuditDecision[] = [];
  private readonly warningLog: string[] = [];

  get decisions(): readonly AuditDecision[] {
    return this.decisionLog;
  }

  get warnings(): readonly string[] {
    return this.warningLog;
  }

  addDecision(step: AuditStep, action: string, details?: Record<string, AuditValue>): void {
    this.decisionLog.push(details ? { step, action, details: { ...details } } : { step, action });
  }

  addWarning(message: string): void {
    this.warningLog.push(message);
  }

  hasWarnings(): boolean {
    return this.warningLog.length > 0;
  }

  /** Appends another trail's entries after this one's. */
  merge(other: AuditTrail): this {
    for (const d of other.decisions) this.decisionLog.push(cloneDecision(d));
    for (const w of other.warnings) this.warningLog.push(w);
    return this;
  }

  findDecisions(step: AuditStep): AuditDecision[] {
    return this.decisionLog.filter((d) => d.step === step);
  }

  toJSON(): AuditTrailJSON {
    return {
      decisions: this.decisionLog.map(cloneDecision),
      warnings: [...this.warningLog],
    };
  }
}
