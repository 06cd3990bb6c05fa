import { BaseCheckValidator } from './BaseCheckValidator.js';
import { mod97, rearrange } from './mod97.js';
import type { AuditCheck } from '../types.js';

const OGM_WRAPPED = /^[+*]{3}\s*(\d{3})\s*\/\s*(\d{4})\s*\/\s*(\d{5})\s*[+*]{3}$/;
const OGM_BARE = /^(\d{3})\s*\/\s*(\d{4})\s*\/\s*(\d{5})$/;

export function formatOgm(digits: string): string {
  return `+++${digits.slice(0, 3)}/${digits.slice(3, 7)}/${digits.slice(7)}+++`;
}

/**
 * Check digits of a 12-digit Belgian structured communication: the first ten
 * digits modulo 97, where a remainder of 0 becomes 97.
 */
export function ogmCheckDigits(firstTen: string): string {
  const remainder = Number(firstTen) % 97;
  return String(remainder === 0 ? 97 : remainder).padStart(2, '0');
}

/**
 * Structured payment references: Belgian OGM/VCS (+++123/4567/89012+++) and
 * ISO 11649 RF creditor references.
 */
export class StructuredReferenceValidator extends BaseCheckValidator {
  readonly checkType = 'CHECKSUM_OGM' as const;

  verify(value: string | null | undefined, field = 'paymentReference'): AuditCheck {
    const reference = this.textOf(value);
    if (reference === null) {
      return this.incomplete(field, 'No structured payment reference present');
    }

    const compact = reference.replace(/\s/g, '').toUpperCase();
    if (/^RF\d{2}/.test(compact)) {
      return this.verifyCreditorReference(compact, field);
    }

    const wrapped = OGM_WRAPPED.exec(reference);
    if (wrapped) {
      return this.verifyOgm(wrapped[1] + wrapped[2] + wrapped[3], field);
    }

    if (/^[+*]{3}/.test(reference) || /[+*]{3}$/.test(reference)) {
      return this.failed(field, `Structured reference "${reference}" is malformed`, {
        expected: '+++XXX/XXXX/XXXXX+++',
        actual: reference,
        hint: 'A structured reference has exactly 12 digits grouped 3/4/5 between +++ markers.',
      });
    }

    const bare = OGM_BARE.exec(reference);
    if (bare) {
      return this.verifyOgm(bare[1] + bare[2] + bare[3], field);
    }

    return this.incomplete(field, 'Payment reference is free-form; no structured checksum to verify');
  }

  private verifyOgm(digits: string, field: string): AuditCheck {
    const expected = ogmCheckDigits(digits.slice(0, 10));
    const actual = digits.slice(10);

    if (expected === actual) {
      return this.passed(field, `Structured reference ${formatOgm(digits)} checksum valid`);
    }

    return this.failed(field, `Structured reference ${formatOgm(digits)} has check digits ${actual}, expected ${expected}`, {
      expected,
      actual,
      hint: 'Re-read all 12 digits; the last two are the first ten modulo 97.',
    });
  }

  private verifyCreditorReference(reference: string, field: string): AuditCheck {
    if (!/^RF\d{2}[A-Z0-9]{1,21}$/.test(reference)) {
      return this.failed(field, `Creditor reference "${reference}" is malformed`, {
        expected: 'RF + 2 check digits + up to 21 characters',
        actual: reference,
      });
    }

    if (mod97(rearrange(reference)) !== 1) {
      return this.failed(field, `Creditor reference ${reference} fails the mod-97 checksum`, {
        actual: reference,
        hint: 'Compare every character of the RF reference against the document.',
      });
    }

    return this.passed(field, `Creditor reference ${reference} checksum valid`);
  }
}
