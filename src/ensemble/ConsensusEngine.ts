/**
 * Consensus Engine
 *
 * Merges the fast and expert extractions of one document field by field.
 *
 * - Both tiers agree (formatting aside): keep the expert's value
 * - Only one tier has a value: use it, no conflict
 * - Tiers disagree: apply the field's weight and record a conflict
 *
 * Amounts agree when they are numerically within `amountEpsilon`
 * ("100.00" == "100"); identifiers compare without separators; dates compare
 * after normalization. Line items and raw text are taken from the expert when
 * present and are never compared.
 *
 * Pure: no I/O, inputs are not mutated, same inputs give the same result.
 */

import type {
  ConflictSeverity,
  ConsensusResult,
  FieldConflict,
  ModelTier,
  ModelWeight,
} from './types.js';
import { createConflictReport } from './types.js';
import type {
  ExtractedBillData,
  ExtractedExpenseData,
  ExtractedInvoiceData,
  ExtractedReceiptData,
  LineItem,
} from '../types/documents.js';
import { amountsAgree } from '../utils/money.js';
import { normalizeDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

const log = logger.child('CONSENSUS');

export type FieldKind = 'text' | 'amount' | 'identifier' | 'date';

export interface FieldSpec<K extends string> {
  field: K;
  kind: FieldKind;
}

/** Disagreement on these fields blocks approval until resolved */
export const CRITICAL_FIELDS: ReadonlySet<string> = new Set([
  'totalAmount',
  'subtotal',
  'totalVatAmount',
  'vatAmount',
  'amount',
  'iban',
  'bankAccount',
  'paymentReference',
  'vendorVatNumber',
  'supplierVatNumber',
  'merchantVatNumber',
]);

export interface ConsensusEngineOptions {
  /** Per-field weights; unspecified fields prefer the expert */
  fieldWeights?: Record<string, ModelWeight>;
  amountEpsilon?: number;
}

type StringFields<K extends string> = Partial<Record<K, string>>;

// ============================================================================
// Field sets per document type
// ============================================================================

type InvoiceField =
  | 'vendorName' | 'vendorVatNumber' | 'invoiceNumber' | 'issueDate' | 'dueDate' | 'currency'
  | 'subtotal' | 'totalVatAmount' | 'totalAmount' | 'iban' | 'bic' | 'paymentReference';

const INVOICE_FIELDS: FieldSpec<InvoiceField>[] = [
  { field: 'vendorName', kind: 'text' },
  { field: 'vendorVatNumber', kind: 'identifier' },
  { field: 'invoiceNumber', kind: 'identifier' },
  { field: 'issueDate', kind: 'date' },
  { field: 'dueDate', kind: 'date' },
  { field: 'currency', kind: 'identifier' },
  { field: 'subtotal', kind: 'amount' },
  { field: 'totalVatAmount', kind: 'amount' },
  { field: 'totalAmount', kind: 'amount' },
  { field: 'iban', kind: 'identifier' },
  { field: 'bic', kind: 'identifier' },
  { field: 'paymentReference', kind: 'identifier' },
];

type BillField =
  | 'supplierName' | 'supplierVatNumber' | 'invoiceNumber' | 'issueDate' | 'dueDate' | 'currency'
  | 'amount' | 'vatAmount' | 'vatRate' | 'totalAmount' | 'bankAccount' | 'paymentReference';

const BILL_FIELDS: FieldSpec<BillField>[] = [
  { field: 'supplierName', kind: 'text' },
  { field: 'supplierVatNumber', kind: 'identifier' },
  { field: 'invoiceNumber', kind: 'identifier' },
  { field: 'issueDate', kind: 'date' },
  { field: 'dueDate', kind: 'date' },
  { field: 'currency', kind: 'identifier' },
  { field: 'amount', kind: 'amount' },
  { field: 'vatAmount', kind: 'amount' },
  { field: 'vatRate', kind: 'amount' },
  { field: 'totalAmount', kind: 'amount' },
  { field: 'bankAccount', kind: 'identifier' },
  { field: 'paymentReference', kind: 'identifier' },
];

type ReceiptField =
  | 'merchantName' | 'merchantVatNumber' | 'receiptNumber' | 'transactionDate' | 'currency'
  | 'subtotal' | 'vatAmount' | 'totalAmount' | 'cardLastFour';

const RECEIPT_FIELDS: FieldSpec<ReceiptField>[] = [
  { field: 'merchantName', kind: 'text' },
  { field: 'merchantVatNumber', kind: 'identifier' },
  { field: 'receiptNumber', kind: 'identifier' },
  { field: 'transactionDate', kind: 'date' },
  { field: 'currency', kind: 'identifier' },
  { field: 'subtotal', kind: 'amount' },
  { field: 'vatAmount', kind: 'amount' },
  { field: 'totalAmount', kind: 'amount' },
  { field: 'cardLastFour', kind: 'identifier' },
];

type ExpenseField =
  | 'merchantName' | 'merchantVatNumber' | 'date' | 'totalAmount' | 'currency'
  | 'vatAmount' | 'vatRate' | 'reference';

const EXPENSE_FIELDS: FieldSpec<ExpenseField>[] = [
  { field: 'merchantName', kind: 'text' },
  { field: 'merchantVatNumber', kind: 'identifier' },
  { field: 'date', kind: 'date' },
  { field: 'totalAmount', kind: 'amount' },
  { field: 'currency', kind: 'identifier' },
  { field: 'vatAmount', kind: 'amount' },
  { field: 'vatRate', kind: 'amount' },
  { field: 'reference', kind: 'identifier' },
];

function present(value: string | undefined): string | null {
  if (value === undefined) return null;
  return value.trim() === '' ? null : value;
}

function preferExpertList(fast: LineItem[], expert: LineItem[]): LineItem[] {
  return expert.length > 0 ? expert : fast;
}

export class ConsensusEngine {
  private readonly fieldWeights: Record<string, ModelWeight>;
  private readonly amountEpsilon: number;

  constructor(options: ConsensusEngineOptions = {}) {
    this.fieldWeights = { ...options.fieldWeights };
    this.amountEpsilon = options.amountEpsilon ?? 0.005;
  }

  // ==========================================================================
  // Per-type merges
  // ==========================================================================

  mergeInvoices(
    fast: ExtractedInvoiceData | null,
    expert: ExtractedInvoiceData | null
  ): ConsensusResult<ExtractedInvoiceData> {
    return this.merge('invoice', fast, expert, INVOICE_FIELDS, (f, e, values, conflictCount) => ({
      ...e,
      ...values,
      vendorAddress: e.vendorAddress ?? f.vendorAddress,
      paymentTerms: e.paymentTerms ?? f.paymentTerms,
      category: e.category ?? f.category,
      lineItems: preferExpertList(f.lineItems, e.lineItems),
      extractedText: e.extractedText ?? f.extractedText,
      confidence: this.mergedConfidence(f.confidence, e.confidence, conflictCount),
    }));
  }

  mergeBills(
    fast: ExtractedBillData | null,
    expert: ExtractedBillData | null
  ): ConsensusResult<ExtractedBillData> {
    return this.merge('bill', fast, expert, BILL_FIELDS, (f, e, values, conflictCount) => ({
      ...e,
      ...values,
      supplierAddress: e.supplierAddress ?? f.supplierAddress,
      category: e.category ?? f.category,
      description: e.description ?? f.description,
      paymentTerms: e.paymentTerms ?? f.paymentTerms,
      notes: e.notes ?? f.notes,
      lineItems: preferExpertList(f.lineItems, e.lineItems),
      extractedText: e.extractedText ?? f.extractedText,
      confidence: this.mergedConfidence(f.confidence, e.confidence, conflictCount),
    }));
  }

  mergeReceipts(
    fast: ExtractedReceiptData | null,
    expert: ExtractedReceiptData | null
  ): ConsensusResult<ExtractedReceiptData> {
    return this.merge('receipt', fast, expert, RECEIPT_FIELDS, (f, e, values, conflictCount) => ({
      ...e,
      ...values,
      merchantAddress: e.merchantAddress ?? f.merchantAddress,
      transactionTime: e.transactionTime ?? f.transactionTime,
      paymentMethod: e.paymentMethod ?? f.paymentMethod,
      suggestedCategory: e.suggestedCategory ?? f.suggestedCategory,
      items: preferExpertList(f.items, e.items),
      extractedText: e.extractedText ?? f.extractedText,
      confidence: this.mergedConfidence(f.confidence, e.confidence, conflictCount),
    }));
  }

  mergeExpenses(
    fast: ExtractedExpenseData | null,
    expert: ExtractedExpenseData | null
  ): ConsensusResult<ExtractedExpenseData> {
    return this.merge('expense', fast, expert, EXPENSE_FIELDS, (f, e, values, conflictCount) => ({
      ...e,
      ...values,
      description: e.description ?? f.description,
      category: e.category ?? f.category,
      paymentMethod: e.paymentMethod ?? f.paymentMethod,
      extractedText: e.extractedText ?? f.extractedText,
      confidence: this.mergedConfidence(f.confidence, e.confidence, conflictCount),
    }));
  }

  // ==========================================================================
  // Shared algorithm
  // ==========================================================================

  private merge<T extends StringFields<K>, K extends string>(
    label: string,
    fast: T | null,
    expert: T | null,
    specs: FieldSpec<K>[],
    assemble: (fast: T, expert: T, values: StringFields<K>, conflictCount: number) => T
  ): ConsensusResult<T> {
    if (fast === null || expert === null) {
      if (expert !== null) return { kind: 'single_source', data: expert, source: 'expert' };
      if (fast !== null) return { kind: 'single_source', data: fast, source: 'fast' };
      return { kind: 'no_data' };
    }

    const conflicts: FieldConflict[] = [];
    const values: StringFields<K> = {};

    for (const spec of specs) {
      const resolution = this.resolveField(spec, present(fast[spec.field]), present(expert[spec.field]));
      values[spec.field] = resolution.value ?? undefined;
      if (resolution.conflict) {
        conflicts.push(resolution.conflict);
      }
    }

    const merged = assemble(fast, expert, values, conflicts.length);

    if (conflicts.length === 0) {
      log.debug(`${label}: models agree on all compared fields`);
      return { kind: 'unanimous', data: merged };
    }

    log.info(`${label}: ${conflicts.length} conflict(s) between fast and expert models`, conflicts.map(c => c.field));
    return { kind: 'with_conflicts', data: merged, report: createConflictReport(conflicts) };
  }

  /**
   * Resolve one field from the two tiers' values
   */
  resolveField<K extends string>(
    spec: FieldSpec<K>,
    fastValue: string | null,
    expertValue: string | null
  ): { value: string | null; conflict?: FieldConflict } {
    if (fastValue === null) return { value: expertValue };
    if (expertValue === null) return { value: fastValue };

    if (this.valuesAgree(spec.kind, fastValue, expertValue)) {
      return { value: expertValue };
    }

    const weight = this.fieldWeights[spec.field] ?? 'prefer_expert';
    const severity: ConflictSeverity = CRITICAL_FIELDS.has(spec.field) ? 'critical' : 'warning';

    let chosenValue: string | null;
    let chosenSource: ModelTier | 'none';
    let rationale: string;

    switch (weight) {
      case 'prefer_fast':
        chosenValue = fastValue;
        chosenSource = 'fast';
        rationale = 'Models disagree; field is weighted towards the fast model';
        break;
      case 'require_match':
        chosenValue = null;
        chosenSource = 'none';
        rationale = 'Models disagree on a field that requires agreement; no value chosen';
        break;
      default:
        chosenValue = expertValue;
        chosenSource = 'expert';
        rationale = 'Models disagree; expert value kept';
        break;
    }

    return {
      value: chosenValue,
      conflict: {
        field: spec.field,
        fastValue,
        expertValue,
        chosenValue,
        chosenSource,
        severity,
        rationale,
      },
    };
  }

  /**
   * Whether two non-empty values are the same value in different notation
   */
  valuesAgree(kind: FieldKind, a: string, b: string): boolean {
    if (a === b || a.trim() === b.trim()) return true;

    switch (kind) {
      case 'amount':
        return amountsAgree(a, b, this.amountEpsilon);
      case 'identifier':
        return a.replace(/[^A-Za-z0-9]/g, '').toUpperCase() === b.replace(/[^A-Za-z0-9]/g, '').toUpperCase();
      case 'date': {
        const left = normalizeDate(a);
        return left !== null && left === normalizeDate(b);
      }
      case 'text':
        return a.trim().replace(/\s+/g, ' ').toLowerCase() === b.trim().replace(/\s+/g, ' ').toLowerCase();
    }
  }

  /**
   * Expert-weighted mean of both confidences, minus 0.05 per conflict
   * (at most 0.25), floored at 0
   */
  mergedConfidence(fast: number, expert: number, conflictCount: number): number {
    const base = (fast + 2 * expert) / 3;
    const penalty = Math.min(0.05 * conflictCount, 0.25);
    return Math.max(0, base - penalty);
  }
}
