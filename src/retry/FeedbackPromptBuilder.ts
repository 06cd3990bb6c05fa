/**
 * Feedback Prompt Builder
 *
 * Turns audit failures into a correction prompt for a retry attempt: what
 * failed, which part of the document to re-read, the character confusions
 * that typically cause that failure, and the expected vs extracted values.
 */

import type { AuditCheck, AuditReport, CheckType } from '../audit/types.js';

const RULE = '═'.repeat(70);
const SUB_RULE = '─'.repeat(70);

interface CheckGuide {
  title: string;
  heading: string;
  /** Part of the document to re-read */
  section: string;
  expectedLabel: string;
  actualLabel: string;
  advice: string[];
}

export const CHECK_DISPLAY_NAMES: Record<CheckType, string> = {
  MATH: 'Mathematical Verification',
  CHECKSUM_OGM: 'OGM Payment Reference',
  CHECKSUM_IBAN: 'IBAN Bank Account',
  VAT_RATE: 'VAT Rate',
  COMPANY_EXISTS: 'Company Registry',
  COMPANY_NAME: 'Company Name',
};

export interface FeedbackPromptOptions {
  /** e.g. "0%, 6%, 12%, 21%" */
  standardVatRates?: string;
  jurisdictionName?: string;
}

export class FeedbackPromptBuilder {
  private readonly guides: Record<CheckType, CheckGuide>;

  constructor(options: FeedbackPromptOptions = {}) {
    const rates = options.standardVatRates ?? '0%, 6%, 12%, 21%';
    const country = options.jurisdictionName ?? 'Belgium';

    this.guides = {
      MATH: {
        title: 'MATH ERROR',
        heading: '❌',
        section: 'the TOTALS section',
        expectedLabel: 'Expected value',
        actualLabel: 'Your extraction',
        advice: [
          'Frequent causes:',
          '  • Misread digits (1/7, 0/6, 5/S)',
          '  • Decimal separator in the wrong place (121.00 read as 1210.0)',
          '  • A dropped minus sign',
          '  • Net and gross amounts swapped',
          'Extract subtotal, VAT amount and total again, digit by digit.',
        ],
      },
      CHECKSUM_OGM: {
        title: 'STRUCTURED REFERENCE CHECKSUM FAILED',
        heading: '❌',
        section: 'the PAYMENT section; find the structured communication in +++XXX/XXXX/XXXXX+++ format',
        expectedLabel: 'Expected check digits',
        actualLabel: 'Found check digits',
        advice: [
          'Characters often confused in payment references:',
          '  • 0 and O',
          '  • 1, I and l',
          '  • 8 and B',
          '  • 5 and S',
          '  • 6 and G',
          'Extract the payment reference again, character by character.',
        ],
      },
      CHECKSUM_IBAN: {
        title: 'IBAN CHECKSUM FAILED',
        heading: '❌',
        section: 'the BANK DETAILS section',
        expectedLabel: 'Expected',
        actualLabel: 'Your extraction',
        advice: [
          'Belgian IBANs are BE + 2 check digits + 12 digits = 16 characters, e.g. BE68 5390 0754 7034.',
          'Characters often confused in IBANs:',
          '  • 0 and O',
          '  • 1 and I',
          '  • Dropped or doubled characters',
          'Extract the IBAN again and count its characters.',
        ],
      },
      VAT_RATE: {
        title: 'UNUSUAL VAT RATE',
        heading: '⚠️',
        section: 'the amounts in the TOTALS section',
        expectedLabel: 'Nearest standard rate',
        actualLabel: 'Rate implied by your extraction',
        advice: [
          `Standard VAT rates in ${country}: ${rates}`,
          'Possible explanations:',
          '  • A misread subtotal, VAT amount or total',
          '  • A foreign document with another VAT regime',
          '  • Several VAT rates on one document (extract the VAT breakdown per rate)',
          'Check the subtotal excl. VAT, the VAT amount and the total incl. VAT.',
        ],
      },
      COMPANY_EXISTS: {
        title: 'COMPANY NOT FOUND',
        heading: '⚠️',
        section: 'the VAT NUMBER in the document header or footer',
        expectedLabel: 'Expected',
        actualLabel: 'Your extraction',
        advice: [
          'The VAT number was not found in the business registry.',
          'Frequent causes:',
          '  • Missing country prefix',
          '  • Wrong digits',
          '  • A foreign company',
          'Belgian VAT numbers are BE + 10 digits, e.g. BE0123456789.',
        ],
      },
      COMPANY_NAME: {
        title: 'COMPANY NAME MISMATCH',
        heading: '⚠️',
        section: 'the company name in the document header',
        expectedLabel: 'Registered name',
        actualLabel: 'Your extraction',
        advice: [
          'The extracted name differs from the registered legal name.',
          'A trading name, an abbreviation or a misread name can all cause this.',
          'Prefer the legal name when the document shows both.',
        ],
      },
    };
  }

  /**
   * Full correction prompt for one retry attempt. Critical failures come
   * first, then warnings.
   */
  buildFeedbackPrompt(auditReport: AuditReport, attempt: number, maxRetries: number): string {
    const lines: string[] = [
      RULE,
      `⚠️ CORRECTION REQUIRED (Attempt ${attempt} of ${maxRetries})`,
      RULE,
      '',
    ];

    const failures = [...auditReport.criticalFailures, ...auditReport.warnings];
    if (failures.length === 0) {
      lines.push('No specific failures to address.');
      return `${lines.join('\n')}\n`;
    }

    lines.push(
      `The previous extraction failed validation. Address these ${failures.length} issue(s):`,
      ''
    );

    failures.forEach((check, index) => {
      lines.push(
        SUB_RULE,
        `Issue ${index + 1}: ${CHECK_DISPLAY_NAMES[check.type]}`,
        SUB_RULE,
        '',
        this.buildCheckFeedback(check),
        ''
      );
    });

    lines.push(
      RULE,
      '',
      'Change ONLY the fields named above. Re-read those parts of the document and correct them.'
    );
    if (attempt >= maxRetries) {
      lines.push('', '⚠️ This is your FINAL attempt. Verify every field above before answering.');
    }

    return `${lines.join('\n')}\n`;
  }

  /**
   * Feedback section for a single check
   */
  buildCheckFeedback(check: AuditCheck): string {
    const guide = this.guides[check.type];
    const lines: string[] = [
      `${guide.heading} ${guide.title} in '${check.field}'`,
      '',
      `Problem: ${check.message}`,
      '',
      `Re-read ${guide.section}.`,
      '',
    ];

    if (check.expected !== undefined) {
      lines.push(`${guide.expectedLabel}: ${check.expected}`);
    }
    if (check.actual !== undefined) {
      lines.push(`${guide.actualLabel}: ${check.actual}`);
      const note = check.type === 'CHECKSUM_IBAN' ? ibanLengthNote(check.actual) : null;
      if (note) lines.push(note);
    }
    if (check.expected !== undefined || check.actual !== undefined) {
      lines.push('');
    }

    lines.push(...guide.advice);

    if (check.hint) {
      lines.push('', `Hint: ${check.hint}`);
    }

    return lines.join('\n');
  }

  /**
   * One line per failing check type, e.g. "MATH: totalAmount, lineItems[2]"
   */
  buildCorrectionSummary(failures: AuditCheck[]): string {
    if (failures.length === 0) {
      return 'No corrections needed.';
    }

    const byType = new Map<CheckType, string[]>();
    for (const check of failures) {
      const fields = byType.get(check.type) ?? [];
      fields.push(check.field);
      byType.set(check.type, fields);
    }

    return [...byType.entries()]
      .map(([type, fields]) => `${CHECK_DISPLAY_NAMES[type]}: ${fields.join(', ')}`)
      .join('\n');
  }
}

function ibanLengthNote(actual: string): string | null {
  const compact = actual.replace(/\s/g, '');
  if (compact.startsWith('BE') && compact.length !== 16) {
    return `Length: ${compact.length} characters (a Belgian IBAN has 16)`;
  }
  return null;
}
