import { describe, it, expect } from 'vitest';
import { IbanValidator } from '../validators/IbanValidator.js';
import { MathValidator } from '../validators/MathValidator.js';
import { StructuredReferenceValidator, formatOgm, ogmCheckDigits } from '../validators/StructuredReferenceValidator.js';
import { VatRateValidator, formatRate } from '../validators/VatRateValidator.js';
import { CompanyExistsValidator, CompanyNameValidator } from '../validators/RegistryValidators.js';
import { BELGIUM } from '../jurisdictions/index.js';
import type { RegistryLookupResult } from '../../registry/types.js';

describe('IbanValidator', () => {
  const validator = new IbanValidator();

  it('passes a valid Belgian IBAN written in groups', () => {
    const check = validator.verify('BE68 5390 0754 7034');
    expect(check.status).toBe('passed');
    expect(check.message).toBe('IBAN BE68 5390 0754 7034 checksum valid');
    expect(check.type).toBe('CHECKSUM_IBAN');
  });

  it('fails a checksum error', () => {
    const check = validator.verify('BE68539007547035');
    expect(check.status).toBe('failed');
    expect(check.message).toBe('IBAN BE68 5390 0754 7035 fails the mod-97 checksum');
  });

  it('fails a wrong country length', () => {
    const check = validator.verify('BE6853900754703', 'bankAccount');
    expect(check).toMatchObject({
      field: 'bankAccount',
      status: 'failed',
      message: 'BE IBAN must have 16 characters, found 15',
      expected: '16 characters',
      actual: '15 characters',
      hint: 'A character was probably dropped while reading the IBAN.',
    });
  });

  it('fails text that is not an IBAN', () => {
    expect(validator.verify('not an iban').message).toBe('"not an iban" is not a valid IBAN format');
  });

  it('is incomplete without a value', () => {
    const check = validator.verify('  ');
    expect(check.status).toBe('incomplete');
    expect(check.message).toBe('No IBAN present');
  });

  it('passes IBANs of other countries', () => {
    expect(validator.verify('NL91ABNA0417164300').status).toBe('passed');
  });
});

describe('StructuredReferenceValidator', () => {
  const validator = new StructuredReferenceValidator();

  it('computes OGM check digits with 0 mapped to 97', () => {
    expect(ogmCheckDigits('1234567890')).toBe('02');
    expect(ogmCheckDigits('0000000097')).toBe('97');
  });

  it('formats twelve digits as an OGM', () => {
    expect(formatOgm('123456789002')).toBe('+++123/4567/89002+++');
  });

  it('passes a valid OGM', () => {
    const check = validator.verify('+++123/4567/89002+++');
    expect(check.status).toBe('passed');
    expect(check.message).toBe('Structured reference +++123/4567/89002+++ checksum valid');
  });

  it('accepts asterisk markers and bare digits', () => {
    expect(validator.verify('***000/0000/09797***').status).toBe('passed');
    expect(validator.verify('123/4567/89002').status).toBe('passed');
  });

  it('fails wrong check digits', () => {
    const check = validator.verify('+++123/4567/89003+++');
    expect(check).toMatchObject({ status: 'failed', expected: '02', actual: '03' });
  });

  it('fails a malformed OGM', () => {
    const check = validator.verify('+++123/4567/8900+++');
    expect(check.status).toBe('failed');
    expect(check.expected).toBe('+++XXX/XXXX/XXXXX+++');
  });

  it('verifies RF creditor references', () => {
    expect(validator.verify('RF18 5390 0754 7034').message).toBe('Creditor reference RF18539007547034 checksum valid');
    expect(validator.verify('RF18539007547035').status).toBe('failed');
  });

  it('leaves free-form references incomplete', () => {
    const check = validator.verify('Invoice 2025-001');
    expect(check.status).toBe('incomplete');
    expect(check.message).toBe('Payment reference is free-form; no structured checksum to verify');
  });
});

describe('MathValidator', () => {
  const validator = new MathValidator(1);

  it('passes consistent totals', () => {
    const check = validator.verifyTotals(10000, 2100, 12100);
    expect(check.status).toBe('passed');
    expect(check.message).toBe('Subtotal 100.00 + VAT 21.00 = total 121.00');
  });

  it('allows a one-cent rounding difference', () => {
    expect(validator.verifyTotals(10000, 2100, 12101).status).toBe('passed');
  });

  it('fails inconsistent totals with expected and actual', () => {
    expect(validator.verifyTotals(10000, 1200, 11500)).toMatchObject({
      status: 'failed',
      field: 'totalAmount',
      message: 'Subtotal 100.00 + VAT 12.00 = 112.00, but total is 115.00',
      expected: '112.00',
      actual: '115.00',
    });
  });

  it('names the missing amounts', () => {
    const check = validator.verifyTotals(null, 2100, null);
    expect(check.status).toBe('incomplete');
    expect(check.message).toBe('Cannot verify totals: missing subtotal, total');
  });

  it('scales line-item tolerance with the number of lines', () => {
    expect(validator.verifyLineItems([5000, 5000], 10002).status).toBe('passed');
    expect(validator.verifyLineItems([5000], 10500).message).toBe('Line items sum to 50.00, but subtotal is 105.00');
  });

  it('checks quantity times unit price', () => {
    expect(validator.verifyLineItemCalculation(3, 2.5, 750, 1).message).toBe('Line 1: 3 x 2.5 = 7.50');
    expect(validator.verifyLineItemCalculation(3, 2.5, 800, 2)).toMatchObject({
      field: 'lineItems[2]',
      status: 'failed',
      expected: '7.50',
      actual: '8.00',
    });
  });
});

describe('VatRateValidator', () => {
  const validator = new VatRateValidator(BELGIUM, 50);

  it('formats basis points', () => {
    expect(formatRate(1200)).toBe('12%');
    expect(formatRate(550)).toBe('5.5%');
  });

  it('passes a standard rate', () => {
    expect(validator.verify(10000, 2100, '2025-01-01').message).toBe('VAT rate 21% is a standard Belgium rate');
  });

  it('passes a rate within the tolerance band', () => {
    expect(validator.verify(10000, 2080, null).status).toBe('passed');
  });

  it('warns about a non-standard rate', () => {
    expect(validator.verify(10000, 1800, null)).toMatchObject({
      status: 'warning',
      message: 'Implied VAT rate 18% is not a standard Belgium rate',
      expected: '21%',
      actual: '18%',
      hint: 'Belgium standard VAT rates are 0%, 6%, 12%, 21%. The nearest is 21%, 3% away; re-read the VAT amount and subtotal.',
    });
  });

  it('records the Horeca rule before the reform', () => {
    const check = validator.verify(10000, 1200, '2025-11-15', 'Restaurant');
    expect(check.status).toBe('passed');
    expect(check.message).toBe('12% rate valid for Horeca (restaurant and catering services) before the March 2026 reform');
  });

  it('records the extended rule from the reform date', () => {
    expect(validator.verify(10000, 1200, '2026-03-01', 'Hotel').message)
      .toBe('12% rate valid for Horeca, accommodation and takeaway meals under the March 2026 reform');
  });

  it('passes a category outside its window with a message naming the window', () => {
    expect(validator.verify(10000, 1200, '2025-11-15', 'Hotel')).toMatchObject({
      status: 'passed',
      message: 'VAT rate 12% is a standard Belgium rate; category "Hotel" qualifies for 12% only from 2026-03-01, ' +
        'document dated 2025-11-15',
      actual: '12%',
    });
  });

  it('skips category eligibility without a date', () => {
    expect(validator.verify(10000, 1200, null, 'Restaurant').message)
      .toBe('VAT rate 12% is a standard Belgium rate; document date unknown, category eligibility not checked');
  });

  it('is incomplete for a zero subtotal', () => {
    expect(validator.verify(0, 0, null).status).toBe('incomplete');
  });
});

describe('registry validators', () => {
  const found: RegistryLookupResult = {
    status: 'found',
    entity: { vatNumber: 'BE0123456789', legalName: 'Acme BV', status: 'active' },
  };

  it('passes a registered VAT number', () => {
    const check = new CompanyExistsValidator().verify('BE0123456789', found, 'vendorVatNumber');
    expect(check.status).toBe('passed');
    expect(check.message).toBe('VAT number BE0123456789 registered to Acme BV');
  });

  it('fails an inactive company', () => {
    const inactive: RegistryLookupResult = {
      status: 'found',
      entity: { vatNumber: 'BE0123456789', legalName: 'Acme BV', status: 'inactive' },
    };
    expect(new CompanyExistsValidator().verify('BE0123456789', inactive, 'vendorVatNumber').message)
      .toBe('Company Acme BV (BE0123456789) is no longer active');
  });

  it('fails an unknown VAT number', () => {
    expect(new CompanyExistsValidator().verify('BE0123456789', { status: 'not_found' }, 'vendorVatNumber').status)
      .toBe('failed');
  });

  it('is incomplete when the registry is unavailable or switched off', () => {
    const validator = new CompanyExistsValidator();
    expect(validator.verify('BE0123456789', { status: 'unavailable', error: 'timeout' }, 'vendorVatNumber').message)
      .toBe('Business registry unavailable: timeout');
    expect(validator.verify('BE0123456789', null, 'vendorVatNumber').message).toBe('External validation disabled');
  });

  it('matches names across legal-form spellings', () => {
    const check = new CompanyNameValidator(0.85).verify('ACME B.V.', found, 'vendorName');
    expect(check.status).toBe('passed');
    expect(check.message).toBe('Company name matches registered name "Acme BV"');
  });

  it('fails a different name', () => {
    expect(new CompanyNameValidator(0.85).verify('Globex SA', found, 'vendorName')).toMatchObject({
      status: 'failed',
      expected: 'Acme BV',
      actual: 'Globex SA',
    });
  });
});
