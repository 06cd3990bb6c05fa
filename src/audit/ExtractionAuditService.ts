/**
 * Extraction Audit Service
 *
 * Runs the per-document-type battery of checks against an extraction:
 * - Arithmetic (subtotal + VAT = total, line items)
 * - IBAN and structured payment reference checksums
 * - VAT rate legality against the jurisdiction's rate table
 * - Optional business registry checks (company exists, name matches)
 *
 * Checks whose type is not enabled are skipped entirely. Collaborator
 * failures never escape: an unreachable registry yields incomplete checks.
 */

import type { AuditCheck, AuditReport, CheckType } from './types.js';
import { createAuditReport } from './types.js';
import { MathValidator } from './validators/MathValidator.js';
import { IbanValidator } from './validators/IbanValidator.js';
import { StructuredReferenceValidator } from './validators/StructuredReferenceValidator.js';
import { VatRateValidator } from './validators/VatRateValidator.js';
import { CompanyExistsValidator, CompanyNameValidator } from './validators/RegistryValidators.js';
import type { VatJurisdiction } from './jurisdictions/index.js';
import { getJurisdiction } from './jurisdictions/index.js';
import type { BusinessRegistryLookup, RegistryLookupResult } from '../registry/types.js';
import { normalizeVatNumber } from '../registry/types.js';
import type { PipelineConfig } from '../config/PipelineConfig.js';
import type {
  ExtractedBillData,
  ExtractedExpenseData,
  ExtractedInvoiceData,
  ExtractedReceiptData,
  LineItem,
} from '../types/documents.js';
import { parseAmount, parseCents } from '../utils/money.js';
import { normalizeDate } from '../utils/dates.js';
import { ConfigurationError, PipelineCancelledError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('AUDIT');

export interface AuditServiceOptions {
  jurisdiction: string;
  enabledChecks: CheckType[];
  enableExternalValidation: boolean;
  /** Arithmetic tolerance in currency units */
  mathTolerance: number;
  vatToleranceBp: number;
  companyNameMatchThreshold: number;
}

export interface AuditOptions {
  signal?: AbortSignal;
  /** Jurisdiction code overriding the service default for this call */
  jurisdiction?: string;
}

interface Counterparty {
  vatNumber?: string;
  name?: string;
  vatField: string;
  nameField: string;
}

interface BillAmounts {
  net: number | null;
  vat: number | null;
  gross: number | null;
}

/**
 * Resolve net/VAT/gross for a bill. `totalAmount` is the gross when present;
 * `amount` is the net only when it differs from the gross, otherwise the net
 * is derived as gross - VAT.
 */
export function resolveBillAmounts(bill: ExtractedBillData): BillAmounts {
  const amount = parseCents(bill.amount);
  const explicitTotal = parseCents(bill.totalAmount);
  const vat = parseCents(bill.vatAmount);
  const gross = explicitTotal ?? amount;

  let net: number | null = null;
  if (explicitTotal !== null && amount !== null && explicitTotal !== amount) {
    net = amount;
  } else if (gross !== null && vat !== null) {
    net = gross - vat;
  }

  return { net, vat, gross };
}

/**
 * Bill lines for fees already included in other lines (e.g. the Recupel
 * recycling contribution) are left out of the line-item sum.
 */
export function isIncludedFeeLineItem(item: LineItem): boolean {
  const normalized = item.description.toLowerCase().replace(/[\n\t]/g, ' ').trim();

  return normalized.startsWith('incl ') ||
    normalized.startsWith('incl.') ||
    normalized.startsWith('included ') ||
    normalized.startsWith('inclusief ') ||
    normalized.includes('recupel') ||
    normalized.includes('auvibel');
}

export class ExtractionAuditService {
  private readonly enabled: ReadonlySet<CheckType>;
  private readonly defaultJurisdiction: VatJurisdiction;
  private readonly math: MathValidator;
  private readonly iban = new IbanValidator();
  private readonly reference = new StructuredReferenceValidator();
  private readonly companyExists = new CompanyExistsValidator();
  private readonly companyName: CompanyNameValidator;

  constructor(
    private readonly options: AuditServiceOptions,
    private readonly registry?: BusinessRegistryLookup
  ) {
    const jurisdiction = getJurisdiction(options.jurisdiction);
    if (!jurisdiction) {
      throw new ConfigurationError(`No VAT rate table registered for jurisdiction ${options.jurisdiction}`);
    }
    this.defaultJurisdiction = jurisdiction;
    this.enabled = new Set(options.enabledChecks);
    this.math = new MathValidator(Math.round(options.mathTolerance * 100));
    this.companyName = new CompanyNameValidator(options.companyNameMatchThreshold);
  }

  static fromConfig(config: PipelineConfig, registry?: BusinessRegistryLookup): ExtractionAuditService {
    return new ExtractionAuditService(
      {
        jurisdiction: config.jurisdiction,
        enabledChecks: config.enabledChecks,
        enableExternalValidation: config.enableExternalValidation,
        mathTolerance: config.mathTolerance,
        vatToleranceBp: config.vatToleranceBp,
        companyNameMatchThreshold: config.companyNameMatchThreshold,
      },
      registry
    );
  }

  isEnabled(type: CheckType): boolean {
    return this.enabled.has(type);
  }

  // ==========================================================================
  // Per-type audits
  // ==========================================================================

  async auditInvoice(invoice: ExtractedInvoiceData, options: AuditOptions = {}): Promise<AuditReport> {
    const subtotal = parseCents(invoice.subtotal);
    const vat = parseCents(invoice.totalVatAmount);
    const total = parseCents(invoice.totalAmount);
    const checks: AuditCheck[] = [];

    if (this.isEnabled('MATH')) {
      checks.push(this.math.verifyTotals(subtotal, vat, total));
      checks.push(...this.auditLineItems(invoice.lineItems, subtotal));
    }
    if (this.isEnabled('CHECKSUM_OGM')) {
      checks.push(this.reference.verify(invoice.paymentReference));
    }
    if (this.isEnabled('CHECKSUM_IBAN')) {
      checks.push(this.iban.verify(invoice.iban));
    }
    if (this.isEnabled('VAT_RATE')) {
      checks.push(
        this.vatValidator(options).verify(subtotal, vat, normalizeDate(invoice.issueDate), invoice.category)
      );
    }
    checks.push(...await this.auditCounterparty({
      vatNumber: invoice.vendorVatNumber,
      name: invoice.vendorName,
      vatField: 'vendorVatNumber',
      nameField: 'vendorName',
    }, options));

    return this.report('invoice', checks);
  }

  async auditBill(bill: ExtractedBillData, options: AuditOptions = {}): Promise<AuditReport> {
    const amounts = resolveBillAmounts(bill);
    const checks: AuditCheck[] = [];

    if (this.isEnabled('MATH')) {
      checks.push(this.math.verifyTotals(amounts.net, amounts.vat, amounts.gross));
      checks.push(...this.auditLineItems(bill.lineItems.filter(item => !isIncludedFeeLineItem(item)), amounts.net, bill.lineItems));
    }
    if (this.isEnabled('CHECKSUM_OGM') && bill.paymentReference) {
      checks.push(this.reference.verify(bill.paymentReference));
    }
    if (this.isEnabled('CHECKSUM_IBAN')) {
      checks.push(this.iban.verify(bill.bankAccount, 'bankAccount'));
    }
    if (this.isEnabled('VAT_RATE')) {
      checks.push(
        this.vatValidator(options).verify(amounts.net, amounts.vat, normalizeDate(bill.issueDate), bill.category)
      );
    }
    checks.push(...await this.auditCounterparty({
      vatNumber: bill.supplierVatNumber,
      name: bill.supplierName,
      vatField: 'supplierVatNumber',
      nameField: 'supplierName',
    }, options));

    return this.report('bill', checks);
  }

  async auditReceipt(receipt: ExtractedReceiptData, options: AuditOptions = {}): Promise<AuditReport> {
    const subtotal = parseCents(receipt.subtotal);
    const vat = parseCents(receipt.vatAmount);
    const total = parseCents(receipt.totalAmount);
    const checks: AuditCheck[] = [];

    if (this.isEnabled('MATH')) {
      checks.push(this.math.verifyTotals(subtotal, vat, total));
    }
    if (this.isEnabled('VAT_RATE')) {
      checks.push(
        this.vatValidator(options).verify(
          subtotal,
          vat,
          normalizeDate(receipt.transactionDate),
          receipt.suggestedCategory
        )
      );
    }
    checks.push(...await this.auditCounterparty({
      vatNumber: receipt.merchantVatNumber,
      name: receipt.merchantName,
      vatField: 'merchantVatNumber',
      nameField: 'merchantName',
    }, options));

    return this.report('receipt', checks);
  }

  /**
   * Expenses rarely print a subtotal; it is derived as total - VAT.
   */
  async auditExpense(expense: ExtractedExpenseData, options: AuditOptions = {}): Promise<AuditReport> {
    const vat = parseCents(expense.vatAmount);
    const total = parseCents(expense.totalAmount);
    const subtotal = total !== null && vat !== null ? total - vat : null;
    const checks: AuditCheck[] = [];

    if (this.isEnabled('MATH')) {
      checks.push(this.math.verifyTotals(subtotal, vat, total));
    }
    if (this.isEnabled('VAT_RATE')) {
      checks.push(
        this.vatValidator(options).verify(subtotal, vat, normalizeDate(expense.date), expense.category)
      );
    }
    checks.push(...await this.auditCounterparty({
      vatNumber: expense.merchantVatNumber,
      name: expense.merchantName,
      vatField: 'merchantVatNumber',
      nameField: 'merchantName',
    }, options));

    return this.report('expense', checks);
  }

  // ==========================================================================
  // Shared pieces
  // ==========================================================================

  /**
   * Sum check over `summed`, plus one quantity x price check per line of
   * `allLines` (defaults to `summed`).
   */
  private auditLineItems(summed: LineItem[], net: number | null, allLines: LineItem[] = summed): AuditCheck[] {
    if (allLines.length === 0) {
      return [];
    }

    const checks: AuditCheck[] = [];
    const lineTotals = summed
      .map(item => parseCents(item.total))
      .filter((cents): cents is number => cents !== null);

    if (lineTotals.length > 0) {
      checks.push(this.math.verifyLineItems(lineTotals, net));
    }

    allLines.forEach((item, index) => {
      checks.push(
        this.math.verifyLineItemCalculation(
          parseAmount(item.quantity),
          parseAmount(item.unitPrice),
          parseCents(item.total),
          index + 1
        )
      );
    });

    return checks;
  }

  private vatValidator(options: AuditOptions): VatRateValidator {
    let jurisdiction = this.defaultJurisdiction;
    if (options.jurisdiction) {
      const override = getJurisdiction(options.jurisdiction);
      if (override) {
        jurisdiction = override;
      } else {
        log.warn(`Unknown jurisdiction ${options.jurisdiction}, using ${jurisdiction.code}`);
      }
    }
    return new VatRateValidator(jurisdiction, this.options.vatToleranceBp);
  }

  private async auditCounterparty(party: Counterparty, options: AuditOptions): Promise<AuditCheck[]> {
    const wantsExists = this.isEnabled('COMPANY_EXISTS');
    const wantsName = this.isEnabled('COMPANY_NAME');
    if (!wantsExists && !wantsName) {
      return [];
    }

    const lookup = await this.lookup(party.vatNumber, options.signal);
    const checks: AuditCheck[] = [];
    if (wantsExists) {
      checks.push(this.companyExists.verify(party.vatNumber, lookup, party.vatField));
    }
    if (wantsName) {
      checks.push(this.companyName.verify(party.name, lookup, party.nameField));
    }
    return checks;
  }

  /**
   * Registry lookup; null when external validation is off or no registry is
   * bound. Thrown errors become `unavailable`, except a cancellation.
   */
  private async lookup(vatNumber: string | undefined, signal?: AbortSignal): Promise<RegistryLookupResult | null> {
    if (!this.options.enableExternalValidation || !this.registry) {
      return null;
    }
    if (!vatNumber || vatNumber.trim() === '') {
      return { status: 'not_found' };
    }

    try {
      return await this.registry.searchByVat(normalizeVatNumber(vatNumber), signal);
    } catch (error) {
      if (error instanceof PipelineCancelledError || signal?.aborted) {
        throw error;
      }
      log.warn(`Registry lookup failed for ${vatNumber}: ${describeError(error)}`);
      return { status: 'unavailable', error: describeError(error) };
    }
  }

  private report(kind: string, checks: AuditCheck[]): AuditReport {
    const report = createAuditReport(checks);
    log.debug(
      `${kind}: ${report.overallStatus} (${report.passedCount} passed, ${report.failedCount} failed, ` +
      `${report.incompleteCount} incomplete, ${report.criticalFailures.length} critical)`
    );
    return report;
  }
}
