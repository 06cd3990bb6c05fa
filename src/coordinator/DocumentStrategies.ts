/**
 * Per-lane strategy bundles.
 *
 * The coordinator runs one generic pipeline; what differs between invoices,
 * bills, receipts and expenses is only how candidates are merged, how the
 * result is audited and which fields are essential.
 */

import type { AuditOptions, ExtractionAuditService } from '../audit/ExtractionAuditService.js';
import type { AuditReport } from '../audit/types.js';
import type { ConsensusEngine } from '../ensemble/ConsensusEngine.js';
import type { ConsensusResult } from '../ensemble/types.js';
import type { DocumentKind, ExtractedDataByKind } from '../types/documents.js';

export interface DocumentStrategy<T> {
  kind: DocumentKind;
  merge(fast: T | null, expert: T | null): ConsensusResult<T>;
  audit(data: T, options?: AuditOptions): Promise<AuditReport>;
  /** Names of essential fields that are absent or blank */
  missingEssentialFields(data: T): string[];
}

export type DocumentStrategies = { [K in DocumentKind]: DocumentStrategy<ExtractedDataByKind[K]> };

function blank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function missing(entries: [string, string | undefined][]): string[] {
  return entries.filter(([, value]) => blank(value)).map(([field]) => field);
}

export function createDocumentStrategies(
  consensus: ConsensusEngine,
  auditor: ExtractionAuditService
): DocumentStrategies {
  return {
    invoice: {
      kind: 'invoice',
      merge: (fast, expert) => consensus.mergeInvoices(fast, expert),
      audit: (data, options) => auditor.auditInvoice(data, options),
      missingEssentialFields: data => missing([
        ['totalAmount', data.totalAmount],
        ['vendorName', data.vendorName],
      ]),
    },
    bill: {
      kind: 'bill',
      merge: (fast, expert) => consensus.mergeBills(fast, expert),
      audit: (data, options) => auditor.auditBill(data, options),
      // `amount` stands in for a missing total, as in the bill audit
      missingEssentialFields: data => missing([
        ['totalAmount', blank(data.totalAmount) ? data.amount : data.totalAmount],
        ['supplierName', data.supplierName],
      ]),
    },
    receipt: {
      kind: 'receipt',
      merge: (fast, expert) => consensus.mergeReceipts(fast, expert),
      audit: (data, options) => auditor.auditReceipt(data, options),
      missingEssentialFields: data => missing([
        ['totalAmount', data.totalAmount],
        ['merchantName', data.merchantName],
      ]),
    },
    expense: {
      kind: 'expense',
      merge: (fast, expert) => consensus.mergeExpenses(fast, expert),
      audit: (data, options) => auditor.auditExpense(data, options),
      missingEssentialFields: data => missing([['totalAmount', data.totalAmount]]),
    },
  };
}
