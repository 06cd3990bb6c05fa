/**
 * String Matching Utilities
 *
 * Fuzzy comparison of counterparty names, used when an extracted company name
 * is checked against the legal name held by a business registry.
 */

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const m = str1.length;
  const n = str2.length;

  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      if (str1[i - 1] === str2[j - 1]) {
        dp[i][j] = dp[i - 1][j - 1];
      } else {
        dp[i][j] = 1 + Math.min(
          dp[i - 1][j],     // deletion
          dp[i][j - 1],     // insertion
          dp[i - 1][j - 1]  // substitution
        );
      }
    }
  }

  return dp[m][n];
}

/**
 * Normalized similarity score (0-1) from Levenshtein distance
 */
export function levenshteinSimilarity(str1: string, str2: string): number {
  if (!str1 && !str2) return 1;
  if (!str1 || !str2) return 0;

  const distance = levenshteinDistance(str1, str2);
  const maxLength = Math.max(str1.length, str2.length);

  return maxLength === 0 ? 1 : 1 - distance / maxLength;
}

/**
 * Jaro-Winkler similarity, better suited to names. Returns 0-1.
 */
export function jaroWinklerSimilarity(str1: string, str2: string): number {
  if (str1 === str2) return 1;
  if (!str1 || !str2) return 0;

  const s1 = str1.toLowerCase();
  const s2 = str2.toLowerCase();

  const len1 = s1.length;
  const len2 = s2.length;

  const matchWindow = Math.max(0, Math.floor(Math.max(len1, len2) / 2) - 1);

  const s1Matches = new Array<boolean>(len1).fill(false);
  const s2Matches = new Array<boolean>(len2).fill(false);

  let matches = 0;
  let transpositions = 0;

  for (let i = 0; i < len1; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, len2);

    for (let j = start; j < end; j++) {
      if (s2Matches[j] || s1[i] !== s2[j]) continue;
      s1Matches[i] = true;
      s2Matches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0;

  let k = 0;
  for (let i = 0; i < len1; i++) {
    if (!s1Matches[i]) continue;
    while (!s2Matches[k]) k++;
    if (s1[i] !== s2[k]) transpositions++;
    k++;
  }

  const jaro = (
    matches / len1 +
    matches / len2 +
    (matches - transpositions / 2) / matches
  ) / 3;

  // Common prefix, up to 4 chars
  let prefix = 0;
  for (let i = 0; i < Math.min(4, len1, len2); i++) {
    if (s1[i] === s2[i]) prefix++;
    else break;
  }

  return jaro + prefix * 0.1 * (1 - jaro);
}

/**
 * Normalize a string for comparison
 * - Lowercase
 * - Remove diacritics
 * - Remove punctuation
 * - Collapse whitespace
 */
export function normalizeString(str: string): string {
  if (!str) return '';

  return str
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\w\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Legal-form designations that registries and documents attach inconsistently
 * ("Acme BV" on the invoice, "ACME B.V." in the registry).
 */
const LEGAL_FORMS = [
  'bvba', 'sprl', 'bv', 'nv', 'sa', 'srl', 'sc', 'scrl', 'cvba', 'cv', 'vof', 'snc',
  'comm v', 'commv', 'vzw', 'asbl', 'gmbh', 'ag', 'ltd', 'llc', 'inc', 'plc', 'sarl', 'sas',
];

/**
 * Normalize a company name: drops dotted abbreviations to letters and strips
 * leading or trailing legal-form designations.
 */
export function normalizeCompanyName(name: string): string {
  if (!name) return '';

  // "B.V." -> "BV" before punctuation is stripped
  let normalized = normalizeString(name.replace(/\b([A-Za-z])\.(?=[A-Za-z]\.?)/g, '$1').replace(/\./g, ''));

  normalized = normalized.replace(/\s+(and|en|et|und)\s+/g, ' ');

  let changed = true;
  while (changed) {
    changed = false;
    for (const form of LEGAL_FORMS) {
      if (normalized.endsWith(` ${form}`)) {
        normalized = normalized.slice(0, -(form.length + 1)).trim();
        changed = true;
      } else if (normalized.startsWith(`${form} `)) {
        normalized = normalized.slice(form.length + 1).trim();
        changed = true;
      }
    }
  }

  return normalized;
}

/**
 * Combined similarity score of two strings, 0-1
 */
export function combinedSimilarity(str1: string, str2: string): number {
  const normalized1 = normalizeString(str1);
  const normalized2 = normalizeString(str2);

  if (normalized1 === normalized2) return 1;

  const levenshtein = levenshteinSimilarity(normalized1, normalized2);
  const jaroWinkler = jaroWinklerSimilarity(normalized1, normalized2);

  const containsBonus = (
    normalized1.includes(normalized2) ||
    normalized2.includes(normalized1)
  ) ? 0.1 : 0;

  // Jaro-Winkler weighs heavier for names
  return Math.min(1, jaroWinkler * 0.6 + levenshtein * 0.4 + containsBonus);
}

/**
 * Company name similarity after legal-form normalization
 */
export function companyNameSimilarity(extracted: string, official: string): number {
  const a = normalizeCompanyName(extracted);
  const b = normalizeCompanyName(official);

  if (!a || !b) return 0;
  if (a === b) return 1;

  return combinedSimilarity(a, b);
}
