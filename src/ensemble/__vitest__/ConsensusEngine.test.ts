import { describe, it, expect } from 'vitest';
import { ConsensusEngine } from '../ConsensusEngine.js';
import { consensusData, consensusReport, summarizeConflicts } from '../types.js';
import type { ExtractedInvoiceData, ExtractedReceiptData } from '../../types/documents.js';

function invoice(fields: Partial<ExtractedInvoiceData>): ExtractedInvoiceData {
  return { lineItems: [], confidence: 0.9, ...fields };
}

describe('ConsensusEngine', () => {
  const engine = new ConsensusEngine();

  describe('mergeInvoices', () => {
    it('reports unanimity when values differ only in notation', () => {
      const fast = invoice({ vendorName: 'Acme BV', totalAmount: '1234.56', issueDate: '31/01/2026' });
      const expert = invoice({
        vendorName: 'ACME  bv',
        totalAmount: '1.234,56',
        issueDate: '2026-01-31',
        lineItems: [{ description: 'Widget', total: '1234.56' }],
      });

      const result = engine.mergeInvoices(fast, expert);

      expect(result.kind).toBe('unanimous');
      const data = consensusData(result);
      expect(data?.vendorName).toBe('ACME  bv');
      expect(data?.totalAmount).toBe('1.234,56');
      expect(data?.lineItems).toEqual([{ description: 'Widget', total: '1234.56' }]);
      expect(consensusReport(result)).toBeNull();
    });

    it('treats trailing zeros as the same amount', () => {
      const result = engine.mergeInvoices(
        invoice({ subtotal: '1234.56', totalAmount: '1493.82' }),
        invoice({ subtotal: '1234.560', totalAmount: '1.493,820' })
      );

      expect(result.kind).toBe('unanimous');
      expect(consensusData(result)).toMatchObject({ subtotal: '1234.560', totalAmount: '1.493,820' });
    });

    it('fills a field only one tier read without a conflict', () => {
      const result = engine.mergeInvoices(
        invoice({ iban: 'BE68539007547034' }),
        invoice({ totalAmount: '10.00' })
      );

      expect(result.kind).toBe('unanimous');
      expect(consensusData(result)).toMatchObject({ iban: 'BE68539007547034', totalAmount: '10.00' });
    });

    it('keeps the expert value and records conflicts', () => {
      const result = engine.mergeInvoices(
        invoice({ vendorName: 'Acme', totalAmount: '100.00' }),
        invoice({ vendorName: 'Globex', totalAmount: '110.00' })
      );

      expect(result.kind).toBe('with_conflicts');
      const report = consensusReport(result);
      expect(report).toMatchObject({ hasConflicts: true, criticalCount: 1, warningCount: 1 });
      expect(consensusData(result)).toMatchObject({ vendorName: 'Globex', totalAmount: '110.00' });
      expect(report?.conflicts[1]).toEqual({
        field: 'totalAmount',
        fastValue: '100.00',
        expertValue: '110.00',
        chosenValue: '110.00',
        chosenSource: 'expert',
        severity: 'critical',
        rationale: 'Models disagree; expert value kept',
      });
    });

    it('summarizes critical conflicts first', () => {
      const result = engine.mergeInvoices(
        invoice({ vendorName: 'Acme', totalAmount: '100.00' }),
        invoice({ vendorName: 'Globex', totalAmount: '110.00' })
      );
      const report = consensusReport(result);
      expect(report).not.toBeNull();
      if (report) {
        expect(summarizeConflicts(report)).toEqual([
          'totalAmount: fast="100.00" expert="110.00" -> "110.00" (expert)',
          'vendorName: fast="Acme" expert="Globex" -> "Globex" (expert)',
        ]);
      }
    });

    it('applies field weights', () => {
      const weighted = new ConsensusEngine({
        fieldWeights: { vendorName: 'prefer_fast', totalAmount: 'require_match' },
      });
      const result = weighted.mergeInvoices(
        invoice({ vendorName: 'Acme', totalAmount: '100.00' }),
        invoice({ vendorName: 'Globex', totalAmount: '110.00' })
      );

      const data = consensusData(result);
      expect(data?.vendorName).toBe('Acme');
      expect(data?.totalAmount).toBeUndefined();
      expect(consensusReport(result)?.conflicts.map(c => c.chosenSource)).toEqual(['fast', 'none']);
    });

    it('passes a single candidate through', () => {
      const only = invoice({ vendorName: 'Acme' });
      expect(engine.mergeInvoices(null, only)).toEqual({ kind: 'single_source', data: only, source: 'expert' });
      expect(engine.mergeInvoices(only, null)).toEqual({ kind: 'single_source', data: only, source: 'fast' });
      expect(engine.mergeInvoices(null, null)).toEqual({ kind: 'no_data' });
    });

    it('does not mutate its inputs', () => {
      const fast = invoice({ vendorName: 'Acme', totalAmount: '100.00' });
      const expert = invoice({ vendorName: 'Globex', totalAmount: '110.00' });
      const before = structuredClone([fast, expert]);

      engine.mergeInvoices(fast, expert);

      expect([fast, expert]).toEqual(before);
    });

    it('lowers the merged confidence per conflict', () => {
      const result = engine.mergeInvoices(
        invoice({ totalAmount: '100.00', confidence: 0.6 }),
        invoice({ totalAmount: '110.00', confidence: 0.9 })
      );
      expect(consensusData(result)?.confidence).toBeCloseTo(0.75);
    });
  });

  describe('mergeReceipts', () => {
    it('takes the fast items when the expert read none', () => {
      const fast: ExtractedReceiptData = { items: [{ description: 'Coffee', total: '3.00' }], totalAmount: '3.00', confidence: 0.8 };
      const expert: ExtractedReceiptData = { items: [], totalAmount: '3', confidence: 0.8 };

      const result = engine.mergeReceipts(fast, expert);

      expect(result.kind).toBe('unanimous');
      expect(consensusData(result)?.items).toEqual([{ description: 'Coffee', total: '3.00' }]);
    });
  });

  describe('valuesAgree', () => {
    it('compares identifiers without separators', () => {
      expect(engine.valuesAgree('identifier', 'BE 0123.456.789', 'be0123456789')).toBe(true);
    });

    it('compares dates after normalization', () => {
      expect(engine.valuesAgree('date', '31/01/2026', '2026-01-31')).toBe(true);
      expect(engine.valuesAgree('date', 'soon', 'later')).toBe(false);
    });

    it('tolerates trailing zeros on amounts', () => {
      expect(engine.valuesAgree('amount', '1234.56', '1234.560')).toBe(true);
      expect(engine.valuesAgree('amount', '1234.56', '1234.57')).toBe(false);
    });

    it('never matches an amount against text', () => {
      expect(engine.valuesAgree('amount', '100', 'abc')).toBe(false);
    });
  });

  describe('mergedConfidence', () => {
    it('weights the expert twice', () => {
      expect(engine.mergedConfidence(0.6, 0.9, 0)).toBeCloseTo(0.8);
    });

    it('caps the conflict penalty and floors at zero', () => {
      expect(engine.mergedConfidence(0.6, 0.9, 10)).toBeCloseTo(0.55);
      expect(engine.mergedConfidence(0, 0, 1)).toBe(0);
    });
  });
});
