import { BaseCheckValidator } from './BaseCheckValidator.js';
import type { AuditCheck } from '../types.js';
import type { VatCategoryRule, VatJurisdiction } from '../jurisdictions/types.js';
import { isWithin } from '../../utils/dates.js';

/**
 * Render basis points as a percentage: 1200 -> "12%", 550 -> "5.5%"
 */
export function formatRate(bp: number): string {
  return `${Number((bp / 100).toFixed(2))}%`;
}

function describeWindow(rule: VatCategoryRule): string {
  if (rule.effectiveFrom && rule.effectiveUntil) {
    return `from ${rule.effectiveFrom} until ${rule.effectiveUntil}`;
  }
  if (rule.effectiveFrom) return `from ${rule.effectiveFrom}`;
  if (rule.effectiveUntil) return `before ${rule.effectiveUntil}`;
  return 'at any date';
}

/**
 * Implied VAT rate against a jurisdiction's rate table.
 *
 * The implied rate is round(vat / subtotal * 10000) basis points. It passes
 * when it lies within the tolerance band of a standard rate; when that rate
 * has category rules, the document's category and date pick the message. A
 * category that qualifies only at another date still passes, with a message
 * naming the window it belongs to.
 */
export class VatRateValidator extends BaseCheckValidator {
  readonly checkType = 'VAT_RATE' as const;

  constructor(
    private readonly jurisdiction: VatJurisdiction,
    private readonly toleranceBp: number = 50
  ) {
    super();
  }

  get standardRatesDescription(): string {
    return this.jurisdiction.standardRatesBp.map(formatRate).join(', ');
  }

  /**
   * @param subtotal net amount in cents
   * @param vat VAT amount in cents
   * @param documentDate YYYY-MM-DD or null when unknown
   */
  verify(
    subtotal: number | null,
    vat: number | null,
    documentDate: string | null,
    category?: string | null
  ): AuditCheck {
    const field = 'vatRate';
    const { name } = this.jurisdiction;

    if (subtotal === null || vat === null) {
      return this.incomplete(field, 'Cannot verify VAT rate: missing subtotal or VAT amount');
    }
    if (subtotal === 0) {
      return this.incomplete(field, 'Cannot verify VAT rate: subtotal is zero');
    }
    if (this.jurisdiction.standardRatesBp.length === 0) {
      return this.incomplete(field, `No VAT rates configured for ${name}`);
    }

    const impliedBp = Math.round((vat / subtotal) * 10000);
    const nearest = this.jurisdiction.standardRatesBp.reduce((best, rate) =>
      Math.abs(rate - impliedBp) < Math.abs(best - impliedBp) ? rate : best
    );
    const deviation = Math.abs(nearest - impliedBp);

    if (deviation > this.toleranceBp) {
      return this.warning(
        field,
        `Implied VAT rate ${formatRate(impliedBp)} is not a standard ${name} rate`,
        {
          expected: formatRate(nearest),
          actual: formatRate(impliedBp),
          hint: `${name} standard VAT rates are ${this.standardRatesDescription}. ` +
            `The nearest is ${formatRate(nearest)}, ${formatRate(deviation)} away; re-read the VAT amount and subtotal.`,
        }
      );
    }

    const generic = `VAT rate ${formatRate(nearest)} is a standard ${name} rate`;
    const normalizedCategory = category?.trim().toLowerCase();
    if (!normalizedCategory) {
      return this.passed(field, generic);
    }

    const rulesForCategory = this.jurisdiction.categoryRules.filter(
      rule => rule.rateBp === nearest && rule.categories.some(keyword => normalizedCategory.includes(keyword))
    );
    if (rulesForCategory.length === 0) {
      return this.passed(field, generic);
    }

    if (documentDate === null) {
      return this.passed(field, `${generic}; document date unknown, category eligibility not checked`);
    }

    const inForce = rulesForCategory.find(rule => isWithin(documentDate, rule.effectiveFrom, rule.effectiveUntil));
    if (inForce) {
      return this.passed(field, inForce.message);
    }

    // Standard rate outside the category's window
    const windows = rulesForCategory.map(describeWindow).join(' or ');
    return this.passed(
      field,
      `${generic}; category "${category?.trim()}" qualifies for ${formatRate(nearest)} only ${windows}, ` +
        `document dated ${documentDate}`,
      {
        actual: formatRate(nearest),
        hint: 'Check the document date and the VAT rate printed per line.',
      }
    );
  }
}
