/**
 * Audit Types
 *
 * Result model of the auditor: one AuditCheck per rule evaluated against an
 * extraction, aggregated into an AuditReport.
 */

// ============================================================================
// Check Types
// ============================================================================

export type CheckType =
  | 'MATH'
  | 'CHECKSUM_IBAN'
  | 'CHECKSUM_OGM'
  | 'VAT_RATE'
  | 'COMPANY_EXISTS'
  | 'COMPANY_NAME';

export const ALL_CHECK_TYPES: readonly CheckType[] = [
  'MATH',
  'CHECKSUM_IBAN',
  'CHECKSUM_OGM',
  'VAT_RATE',
  'COMPANY_EXISTS',
  'COMPANY_NAME',
];

/** Check types whose failure triggers self-correction and blocks approval */
export const CRITICAL_CHECK_TYPES: ReadonlySet<CheckType> = new Set<CheckType>([
  'MATH',
  'CHECKSUM_IBAN',
  'CHECKSUM_OGM',
  'VAT_RATE',
]);

export function isCheckType(value: string): value is CheckType {
  return (ALL_CHECK_TYPES as readonly string[]).includes(value);
}

export type CheckStatus = 'passed' | 'warning' | 'incomplete' | 'failed';

export interface AuditCheck {
  type: CheckType;
  /** Field (or field path, e.g. "lineItems[2]") the check looked at */
  field: string;
  status: CheckStatus;
  message: string;
  /** Guidance for a correction attempt */
  hint?: string;
  expected?: string;
  actual?: string;
}

export type AuditStatus = 'PASSED' | 'FAILED';

export interface AuditReport {
  checks: AuditCheck[];
  overallStatus: AuditStatus;
  passedCount: number;
  failedCount: number;
  incompleteCount: number;
  /** FAILED checks of a critical type */
  criticalFailures: AuditCheck[];
  /** WARNING checks plus non-critical FAILED checks */
  warnings: AuditCheck[];
}

export function isCriticalFailure(check: AuditCheck): boolean {
  return check.status === 'failed' && CRITICAL_CHECK_TYPES.has(check.type);
}

/**
 * Aggregate checks into a report.
 */
export function createAuditReport(checks: AuditCheck[]): AuditReport {
  const failed = checks.filter(c => c.status === 'failed');
  const criticalFailures = failed.filter(isCriticalFailure);

  return {
    checks,
    overallStatus: failed.length === 0 ? 'PASSED' : 'FAILED',
    passedCount: checks.filter(c => c.status === 'passed').length,
    failedCount: failed.length,
    incompleteCount: checks.filter(c => c.status === 'incomplete').length,
    criticalFailures,
    warnings: checks.filter(c => c.status === 'warning' || (c.status === 'failed' && !isCriticalFailure(c))),
  };
}

export const EMPTY_AUDIT_REPORT: AuditReport = createAuditReport([]);
