import { BaseCheckValidator } from './BaseCheckValidator.js';
import type { AuditCheck } from '../types.js';
import type { RegistryLookupResult } from '../../registry/types.js';
import { companyNameSimilarity } from '../../utils/stringMatching.js';

/**
 * `null` lookup means external validation is switched off.
 */
type Lookup = RegistryLookupResult | null;

/**
 * The extracted VAT number belongs to a registered company
 */
export class CompanyExistsValidator extends BaseCheckValidator {
  readonly checkType = 'COMPANY_EXISTS' as const;

  verify(vatNumber: string | null | undefined, lookup: Lookup, field: string): AuditCheck {
    const vat = this.textOf(vatNumber);
    if (vat === null) {
      return this.incomplete(field, 'No VAT number extracted; registry check skipped');
    }
    if (lookup === null) {
      return this.incomplete(field, 'External validation disabled');
    }

    switch (lookup.status) {
      case 'unavailable':
        return this.incomplete(field, `Business registry unavailable: ${lookup.error}`);
      case 'not_found':
        return this.failed(field, `No company registered under VAT number ${vat}`, {
          actual: vat,
          hint: 'Belgian VAT numbers are BE followed by 10 digits; re-read the VAT number.',
        });
      case 'found':
        if (lookup.entity.status === 'inactive') {
          return this.failed(field, `Company ${lookup.entity.legalName} (${vat}) is no longer active`, {
            actual: vat,
          });
        }
        return this.passed(field, `VAT number ${vat} registered to ${lookup.entity.legalName}`);
    }
  }
}

/**
 * The extracted counterparty name matches the registry's legal name
 */
export class CompanyNameValidator extends BaseCheckValidator {
  readonly checkType = 'COMPANY_NAME' as const;

  constructor(private readonly threshold: number = 0.85) {
    super();
  }

  verify(name: string | null | undefined, lookup: Lookup, field: string): AuditCheck {
    const extracted = this.textOf(name);
    if (extracted === null) {
      return this.incomplete(field, 'No company name extracted; registry check skipped');
    }
    if (lookup === null) {
      return this.incomplete(field, 'External validation disabled');
    }
    if (lookup.status === 'unavailable') {
      return this.incomplete(field, `Business registry unavailable: ${lookup.error}`);
    }
    if (lookup.status === 'not_found') {
      return this.incomplete(field, 'No registry entry to compare the company name against');
    }

    const official = lookup.entity.legalName;
    const similarity = companyNameSimilarity(extracted, official);

    if (similarity >= this.threshold) {
      return this.passed(field, `Company name matches registered name "${official}"`);
    }

    return this.failed(field, `Company name "${extracted}" does not match registered name "${official}"`, {
      expected: official,
      actual: extracted,
      hint: `Similarity ${similarity.toFixed(2)}. The name may belong to a brand or a different party on the document.`,
    });
  }
}
