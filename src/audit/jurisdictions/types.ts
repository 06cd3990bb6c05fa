/**
 * A category-gated rule for one rate: the rate applies to documents whose
 * category matches one of `categories` and whose date falls in
 * [effectiveFrom, effectiveUntil).
 */
export interface VatCategoryRule {
  rateBp: number;
  /** Lowercase keywords matched as substrings of the document category */
  categories: string[];
  /** Inclusive, YYYY-MM-DD */
  effectiveFrom?: string;
  /** Exclusive, YYYY-MM-DD */
  effectiveUntil?: string;
  /** Message recorded on the passing check, for the audit trail */
  message: string;
}

export interface VatJurisdiction {
  /** ISO 3166 alpha-2 code */
  code: string;
  name: string;
  /** Legal rates in basis points (2100 = 21%) */
  standardRatesBp: number[];
  categoryRules: VatCategoryRule[];
}
