import { describe, it, expect, vi } from 'vitest';
import {
  ExtractionAuditService,
  isIncludedFeeLineItem,
  resolveBillAmounts,
} from '../ExtractionAuditService.js';
import type { AuditServiceOptions } from '../ExtractionAuditService.js';
import type { BusinessRegistryLookup } from '../../registry/types.js';
import type {
  ExtractedBillData,
  ExtractedExpenseData,
  ExtractedInvoiceData,
  ExtractedReceiptData,
} from '../../types/documents.js';
import { ConfigurationError, PipelineCancelledError } from '../../utils/errors.js';

function createService(
  overrides: Partial<AuditServiceOptions> = {},
  registry?: BusinessRegistryLookup
): ExtractionAuditService {
  return new ExtractionAuditService({
    jurisdiction: 'BE',
    enabledChecks: ['MATH', 'CHECKSUM_IBAN', 'CHECKSUM_OGM', 'VAT_RATE'],
    enableExternalValidation: false,
    mathTolerance: 0.01,
    vatToleranceBp: 50,
    companyNameMatchThreshold: 0.85,
    ...overrides,
  }, registry);
}

const restaurantReceipt: ExtractedReceiptData = {
  merchantName: 'Brasserie Test',
  transactionDate: '2025-11-15',
  items: [],
  subtotal: '100.00',
  vatAmount: '12.00',
  totalAmount: '115.00',
  suggestedCategory: 'Restaurant',
  confidence: 0.9,
};

const cleanInvoice: ExtractedInvoiceData = {
  vendorName: 'Acme',
  vendorVatNumber: 'BE 0123.456.789',
  issueDate: '2025-06-01',
  lineItems: [{ description: 'Consulting', quantity: '10', unitPrice: '100', total: '1000.00' }],
  subtotal: '1.000,00',
  totalVatAmount: '210,00',
  totalAmount: '1.210,00',
  iban: 'BE68 5390 0754 7034',
  paymentReference: '+++123/4567/89002+++',
  confidence: 0.95,
};

describe('ExtractionAuditService', () => {
  it('rejects an unknown jurisdiction at construction', () => {
    expect(() => createService({ jurisdiction: 'XX' })).toThrow(ConfigurationError);
  });

  describe('auditReceipt', () => {
    it('fails the arithmetic and records the Horeca rate', async () => {
      const report = await createService().auditReceipt(restaurantReceipt);

      expect(report.checks).toHaveLength(2);
      expect(report.checks[0]).toMatchObject({ type: 'MATH', status: 'failed', expected: '112.00', actual: '115.00' });
      expect(report.checks[1]).toMatchObject({
        type: 'VAT_RATE',
        status: 'passed',
        message: '12% rate valid for Horeca (restaurant and catering services) before the March 2026 reform',
      });
      expect(report.overallStatus).toBe('FAILED');
      expect(report.criticalFailures).toHaveLength(1);
      expect(report.passedCount).toBe(1);
    });

    it('skips checks that are not enabled', async () => {
      const report = await createService({ enabledChecks: ['VAT_RATE'] }).auditReceipt(restaurantReceipt);
      expect(report.checks.map(c => c.type)).toEqual(['VAT_RATE']);
      expect(report.overallStatus).toBe('PASSED');
    });

    it('uses the jurisdiction passed per call', async () => {
      const receipt: ExtractedReceiptData = {
        items: [],
        subtotal: '100.00',
        vatAmount: '9.00',
        totalAmount: '109.00',
        confidence: 0.9,
      };
      const report = await createService({ enabledChecks: ['VAT_RATE'] }).auditReceipt(receipt, { jurisdiction: 'NL' });
      expect(report.checks[0].message).toBe('VAT rate 9% is a standard Netherlands rate');
    });
  });

  describe('auditInvoice', () => {
    it('passes a consistent invoice', async () => {
      const report = await createService().auditInvoice(cleanInvoice);

      expect(report.checks.map(c => c.type)).toEqual([
        'MATH',
        'MATH',
        'MATH',
        'CHECKSUM_OGM',
        'CHECKSUM_IBAN',
        'VAT_RATE',
      ]);
      expect(report.checks.every(c => c.status === 'passed')).toBe(true);
      expect(report.overallStatus).toBe('PASSED');
    });

    it('reports a bad IBAN as a critical failure', async () => {
      const report = await createService().auditInvoice({ ...cleanInvoice, iban: 'BE68539007547035' });
      expect(report.criticalFailures.map(c => c.type)).toEqual(['CHECKSUM_IBAN']);
    });
  });

  describe('auditBill', () => {
    const bill: ExtractedBillData = {
      supplierName: 'Electro Test',
      issueDate: '2025-09-10',
      amount: '100.00',
      totalAmount: '121.00',
      vatAmount: '21.00',
      lineItems: [
        { description: 'Washing machine', quantity: '1', unitPrice: '100.00', total: '100.00' },
        { description: 'Recupel contribution', quantity: '1', unitPrice: '1', total: '1.00' },
      ],
      confidence: 0.9,
    };

    it('leaves included fees out of the line-item sum', async () => {
      const report = await createService().auditBill(bill);

      expect(report.checks.map(c => c.type)).toEqual([
        'MATH',
        'MATH',
        'MATH',
        'MATH',
        'CHECKSUM_IBAN',
        'VAT_RATE',
      ]);
      expect(report.checks[4]).toMatchObject({ field: 'bankAccount', status: 'incomplete' });
      expect(report.overallStatus).toBe('PASSED');
      expect(report.incompleteCount).toBe(1);
    });

    it('checks a payment reference only when one is present', async () => {
      const report = await createService().auditBill({ ...bill, paymentReference: '+++123/4567/89003+++' });
      expect(report.criticalFailures.map(c => c.type)).toEqual(['CHECKSUM_OGM']);
    });
  });

  describe('auditExpense', () => {
    it('derives the subtotal from total and VAT', async () => {
      const expense: ExtractedExpenseData = { totalAmount: '121.00', vatAmount: '21.00', confidence: 0.8 };
      const report = await createService().auditExpense(expense);

      expect(report.checks[0].message).toBe('Subtotal 100.00 + VAT 21.00 = total 121.00');
      expect(report.checks[1].message).toBe('VAT rate 21% is a standard Belgium rate');
    });
  });

  describe('registry checks', () => {
    const registryChecks: Partial<AuditServiceOptions> = {
      enabledChecks: ['COMPANY_EXISTS', 'COMPANY_NAME'],
      enableExternalValidation: true,
    };

    it('looks the normalized VAT number up once for both checks', async () => {
      const searchByVat = vi.fn<BusinessRegistryLookup['searchByVat']>().mockResolvedValue({
        status: 'found',
        entity: { vatNumber: 'BE0123456789', legalName: 'Acme BV', status: 'active' },
      });
      const report = await createService(registryChecks, { searchByVat }).auditInvoice(cleanInvoice);

      expect(searchByVat).toHaveBeenCalledTimes(1);
      expect(searchByVat.mock.calls[0][0]).toBe('BE0123456789');
      expect(report.checks.map(c => [c.type, c.status])).toEqual([
        ['COMPANY_EXISTS', 'passed'],
        ['COMPANY_NAME', 'passed'],
      ]);
    });

    it('turns a throwing registry into incomplete checks', async () => {
      const searchByVat = vi.fn<BusinessRegistryLookup['searchByVat']>().mockRejectedValue(new Error('registry down'));
      const report = await createService(registryChecks, { searchByVat }).auditInvoice(cleanInvoice);

      expect(report.checks.map(c => c.message)).toEqual([
        'Business registry unavailable: registry down',
        'Business registry unavailable: registry down',
      ]);
      expect(report.overallStatus).toBe('PASSED');
    });

    it('passes a cancellation from the registry through', async () => {
      const searchByVat = vi.fn<BusinessRegistryLookup['searchByVat']>()
        .mockRejectedValue(new PipelineCancelledError());

      await expect(createService(registryChecks, { searchByVat }).auditInvoice(cleanInvoice))
        .rejects.toBeInstanceOf(PipelineCancelledError);
    });

    it('rethrows a registry error once the signal is aborted', async () => {
      const controller = new AbortController();
      const aborted = new Error('request aborted');
      const searchByVat = vi.fn<BusinessRegistryLookup['searchByVat']>().mockImplementation(async () => {
        controller.abort();
        throw aborted;
      });

      await expect(
        createService(registryChecks, { searchByVat }).auditInvoice(cleanInvoice, { signal: controller.signal })
      ).rejects.toBe(aborted);
    });

    it('does not call the registry when external validation is off', async () => {
      const searchByVat = vi.fn<BusinessRegistryLookup['searchByVat']>();
      const report = await createService(
        { ...registryChecks, enableExternalValidation: false },
        { searchByVat }
      ).auditInvoice(cleanInvoice);

      expect(searchByVat).not.toHaveBeenCalled();
      expect(report.checks[0].message).toBe('External validation disabled');
    });

    it('treats an unregistered VAT number as a non-critical failure', async () => {
      const searchByVat = vi.fn<BusinessRegistryLookup['searchByVat']>().mockResolvedValue({ status: 'not_found' });
      const report = await createService(
        { ...registryChecks, enabledChecks: ['COMPANY_EXISTS'] },
        { searchByVat }
      ).auditInvoice(cleanInvoice);

      expect(report.overallStatus).toBe('FAILED');
      expect(report.criticalFailures).toEqual([]);
      expect(report.warnings.map(c => c.type)).toEqual(['COMPANY_EXISTS']);
    });
  });
});

describe('bill helpers', () => {
  it('treats a printed amount equal to the total as gross', () => {
    expect(resolveBillAmounts({ amount: '121.00', totalAmount: '121.00', vatAmount: '21.00', lineItems: [], confidence: 1 }))
      .toEqual({ net: 10000, vat: 2100, gross: 12100 });
  });

  it('uses the amount as gross when no total is printed', () => {
    expect(resolveBillAmounts({ amount: '121.00', vatAmount: '21.00', lineItems: [], confidence: 1 }))
      .toEqual({ net: 10000, vat: 2100, gross: 12100 });
  });

  it('recognizes included fee lines', () => {
    expect(isIncludedFeeLineItem({ description: 'incl. Auvibel' })).toBe(true);
    expect(isIncludedFeeLineItem({ description: 'Speakers' })).toBe(false);
  });
});
