import { BaseCheckValidator } from './BaseCheckValidator.js';
import { mod97, rearrange } from './mod97.js';
import type { AuditCheck } from '../types.js';

const IBAN_LENGTHS: Record<string, number> = {
  BE: 16,
  NL: 18,
  LU: 20,
  DE: 22,
  FR: 27,
  GB: 22,
  ES: 24,
  IT: 27,
};

function groupInFours(iban: string): string {
  return iban.replace(/(.{4})(?=.)/g, '$1 ');
}

/**
 * IBAN format, per-country length and mod-97 checksum
 */
export class IbanValidator extends BaseCheckValidator {
  readonly checkType = 'CHECKSUM_IBAN' as const;

  verify(value: string | null | undefined, field = 'iban'): AuditCheck {
    const raw = this.textOf(value);
    if (raw === null) {
      return this.incomplete(field, 'No IBAN present');
    }

    const iban = raw.replace(/[\s.-]/g, '').toUpperCase();

    if (!/^[A-Z]{2}\d{2}[A-Z0-9]{8,30}$/.test(iban)) {
      return this.failed(field, `"${raw}" is not a valid IBAN format`, {
        actual: raw,
        hint: 'An IBAN starts with a two-letter country code and two check digits, e.g. BE68 5390 0754 7034.',
      });
    }

    const country = iban.slice(0, 2);
    const expectedLength = IBAN_LENGTHS[country];
    if (expectedLength !== undefined && iban.length !== expectedLength) {
      return this.failed(
        field,
        `${country} IBAN must have ${expectedLength} characters, found ${iban.length}`,
        {
          expected: `${expectedLength} characters`,
          actual: `${iban.length} characters`,
          hint: iban.length < expectedLength
            ? 'A character was probably dropped while reading the IBAN.'
            : 'An extra character was probably read into the IBAN.',
        }
      );
    }

    if (mod97(rearrange(iban)) !== 1) {
      return this.failed(field, `IBAN ${groupInFours(iban)} fails the mod-97 checksum`, {
        actual: groupInFours(iban),
        hint: 'Compare every character against the document; O/0, I/1, B/8 and S/5 are common misreads.',
      });
    }

    return this.passed(field, `IBAN ${groupInFours(iban)} checksum valid`);
  }
}
