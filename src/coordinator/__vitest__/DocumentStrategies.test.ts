import { describe, it, expect } from 'vitest';
import { createDocumentStrategies } from '../DocumentStrategies.js';
import { ExtractionAuditService } from '../../audit/ExtractionAuditService.js';
import { DEFAULT_PIPELINE_CONFIG } from '../../config/PipelineConfig.js';
import { ConsensusEngine } from '../../ensemble/ConsensusEngine.js';

const strategies = createDocumentStrategies(
  new ConsensusEngine(),
  ExtractionAuditService.fromConfig(DEFAULT_PIPELINE_CONFIG)
);

describe('missingEssentialFields', () => {
  it('treats blank values as missing', () => {
    expect(strategies.invoice.missingEssentialFields({ lineItems: [], vendorName: '  ', confidence: 0.9 }))
      .toEqual(['totalAmount', 'vendorName']);
  });

  it('accepts a bill amount in place of a missing total', () => {
    expect(strategies.bill.missingEssentialFields({
      lineItems: [],
      supplierName: 'Energie Test',
      amount: '121,00',
      confidence: 0.9,
    })).toEqual([]);
  });

  it('requires only the total for expenses', () => {
    expect(strategies.expense.missingEssentialFields({ confidence: 0.9 })).toEqual(['totalAmount']);
    expect(strategies.receipt.missingEssentialFields({ items: [], totalAmount: '5.00', confidence: 0.9 }))
      .toEqual(['merchantName']);
  });
});
