/**
 * Amount parsing for values read off scanned documents.
 *
 * Extraction agents return amounts as text in whatever notation the document
 * used: "1234.56", "1.234,56", "1,234.56", "€ 12,50", "-7.00". Everything here
 * works on integer cents once parsed so that sums compare exactly.
 */

const CURRENCY_NOISE = /[€$£\s']|EUR|USD|GBP/gi;

/**
 * Parse a document amount into a number, or null when it is not a number.
 *
 * When both "." and "," appear the last one is the decimal separator. A lone
 * separator kind reads as thousands grouping only when the leading group has
 * one to three digits (not "0") and every later group exactly three:
 * "1.234" and "1.234.560" are grouped, "1234.560" and "0.125" are decimals.
 */
export function parseAmount(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;

  let text = value.replace(CURRENCY_NOISE, '');
  if (text === '') return null;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (text.startsWith('-')) {
    negative = !negative;
    text = text.slice(1);
  } else if (text.endsWith('-')) {
    negative = !negative;
    text = text.slice(0, -1);
  }

  if (!/^[\d.,]+$/.test(text) || !/\d/.test(text)) return null;

  const lastDot = text.lastIndexOf('.');
  const lastComma = text.lastIndexOf(',');
  let normalized: string;

  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    normalized = text.split(thousands).join('').replace(decimal, '.');
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? '.' : ',';
    const [head, ...groups] = text.split(separator);
    const groupedThousands = head.length >= 1 && head.length <= 3 && head !== '0' &&
      groups.every(group => group.length === 3);

    if (groupedThousands) {
      normalized = [head, ...groups].join('');
    } else if (groups.length === 1) {
      normalized = `${head}.${groups[0]}`;
    } else {
      return null;
    }
  } else {
    normalized = text;
  }

  if (!/^\d*\.?\d*$/.test(normalized) || normalized === '.') return null;

  const parsed = Number(normalized);
  if (!Number.isFinite(parsed)) return null;
  return negative ? -parsed : parsed;
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

/**
 * Parse straight to integer cents.
 */
export function parseCents(value: string | null | undefined): number | null {
  const amount = parseAmount(value);
  return amount === null ? null : toCents(amount);
}

/**
 * Render cents as a plain two-decimal string ("112.00", "-3.50").
 */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Two amounts agree when they differ by no more than epsilon.
 */
export function amountsAgree(a: string, b: string, epsilon: number): boolean {
  const left = parseAmount(a);
  const right = parseAmount(b);
  if (left === null || right === null) return false;
  return Math.abs(left - right) <= epsilon;
}
