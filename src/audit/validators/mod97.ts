/**
 * ISO 7064 MOD 97-10 over an alphanumeric string, letters expanded to 10..35.
 * Used by IBANs and RF creditor references.
 */
export function mod97(value: string): number {
  let remainder = 0;
  for (const char of value.toUpperCase()) {
    const code = char.charCodeAt(0);
    const digits = code >= 65 && code <= 90 ? String(code - 55) : char;
    for (const digit of digits) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder;
}

/**
 * Move the four leading characters to the end, as IBAN and RF checks require.
 */
export function rearrange(value: string): string {
  return value.slice(4) + value.slice(0, 4);
}
