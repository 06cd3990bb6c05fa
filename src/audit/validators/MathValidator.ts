import { BaseCheckValidator } from './BaseCheckValidator.js';
import type { AuditCheck } from '../types.js';
import { formatCents } from '../../utils/money.js';

/**
 * Arithmetic consistency of document totals. All amounts are integer cents.
 */
export class MathValidator extends BaseCheckValidator {
  readonly checkType = 'MATH' as const;

  constructor(private readonly toleranceCents: number = 1) {
    super();
  }

  /**
   * subtotal + VAT = total
   */
  verifyTotals(subtotal: number | null, vat: number | null, total: number | null): AuditCheck {
    const field = 'totalAmount';

    if (subtotal === null || vat === null || total === null) {
      const missing = [
        subtotal === null ? 'subtotal' : null,
        vat === null ? 'VAT amount' : null,
        total === null ? 'total' : null,
      ].filter((name): name is string => name !== null);
      return this.incomplete(field, `Cannot verify totals: missing ${missing.join(', ')}`);
    }

    const expected = subtotal + vat;
    const difference = total - expected;

    if (Math.abs(difference) <= this.toleranceCents) {
      return this.passed(
        field,
        `Subtotal ${formatCents(subtotal)} + VAT ${formatCents(vat)} = total ${formatCents(total)}`
      );
    }

    return this.failed(
      field,
      `Subtotal ${formatCents(subtotal)} + VAT ${formatCents(vat)} = ${formatCents(expected)}, but total is ${formatCents(total)}`,
      {
        expected: formatCents(expected),
        actual: formatCents(total),
        hint: `Difference of ${formatCents(Math.abs(difference))}. Re-read the subtotal, VAT and total amounts; one of them has a misread digit.`,
      }
    );
  }

  /**
   * Line totals add up to the net amount. Each line may carry its own
   * rounding, so the tolerance grows with the number of lines.
   */
  verifyLineItems(lineTotals: number[], subtotal: number | null): AuditCheck {
    const field = 'lineItems';

    if (subtotal === null) {
      return this.incomplete(field, 'Cannot verify line items: missing subtotal');
    }

    const sum = lineTotals.reduce((acc, value) => acc + value, 0);
    const tolerance = this.toleranceCents * Math.max(1, lineTotals.length);

    if (Math.abs(sum - subtotal) <= tolerance) {
      return this.passed(field, `${lineTotals.length} line items sum to subtotal ${formatCents(subtotal)}`);
    }

    return this.failed(
      field,
      `Line items sum to ${formatCents(sum)}, but subtotal is ${formatCents(subtotal)}`,
      {
        expected: formatCents(subtotal),
        actual: formatCents(sum),
        hint: 'Check for a missed or duplicated line, or a misread line total.',
      }
    );
  }

  /**
   * quantity x unit price = line total, for the 1-based line `lineIndex`
   */
  verifyLineItemCalculation(
    quantity: number | null,
    unitPrice: number | null,
    lineTotal: number | null,
    lineIndex: number
  ): AuditCheck {
    const field = `lineItems[${lineIndex}]`;

    if (quantity === null || unitPrice === null || lineTotal === null) {
      return this.incomplete(field, `Line ${lineIndex}: cannot verify without quantity, unit price and total`);
    }

    const expected = Math.round(quantity * unitPrice * 100);

    if (Math.abs(expected - lineTotal) <= this.toleranceCents) {
      return this.passed(field, `Line ${lineIndex}: ${quantity} x ${unitPrice} = ${formatCents(lineTotal)}`);
    }

    return this.failed(
      field,
      `Line ${lineIndex}: ${quantity} x ${unitPrice} = ${formatCents(expected)}, but line total is ${formatCents(lineTotal)}`,
      {
        expected: formatCents(expected),
        actual: formatCents(lineTotal),
        hint: `Re-read quantity, unit price and total on line ${lineIndex}.`,
      }
    );
  }
}
