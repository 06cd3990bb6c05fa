import { createAuditReport } from '../../audit/types.js';
import type { AuditCheck } from '../../audit/types.js';
import { createConflictReport } from '../../ensemble/types.js';
import type { ConflictReport } from '../../ensemble/types.js';
import type { JudgmentContext } from '../types.js';

export const passedMath: AuditCheck = {
  type: 'MATH',
  field: 'totalAmount',
  status: 'passed',
  message: 'Subtotal 100.00 + VAT 21.00 = total 121.00',
};

export const failedMath: AuditCheck = {
  type: 'MATH',
  field: 'totalAmount',
  status: 'failed',
  message: 'Subtotal 100.00 + VAT 12.00 = 112.00, but total is 115.00',
  expected: '112.00',
  actual: '115.00',
};

export function vatWarning(n: number): AuditCheck {
  return { type: 'VAT_RATE', field: 'vatRate', status: 'warning', message: `warning ${n}` };
}

export const totalConflict: ConflictReport = createConflictReport([{
  field: 'totalAmount',
  fastValue: '100.00',
  expertValue: '110.00',
  chosenValue: '110.00',
  chosenSource: 'expert',
  severity: 'critical',
  rationale: 'Models disagree; expert value kept',
}]);

export function judgmentContext(overrides: Partial<JudgmentContext> = {}): JudgmentContext {
  return {
    documentType: 'INVOICE',
    extractionConfidence: 0.92,
    consensusReport: null,
    auditReport: createAuditReport([passedMath]),
    retryResult: null,
    hasEssentialFields: true,
    missingEssentialFields: [],
    ...overrides,
  };
}
