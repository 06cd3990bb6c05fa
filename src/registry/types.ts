/**
 * Business registry lookup contract
 */

export interface RegistryEntity {
  vatNumber: string;
  legalName: string;
  status?: 'active' | 'inactive' | 'unknown';
  address?: string;
}

export type RegistryLookupResult =
  | { status: 'found'; entity: RegistryEntity }
  | { status: 'not_found' }
  | { status: 'unavailable'; error: string };

/**
 * Lookup collaborator used by the optional registry checks. Implementations
 * may return `unavailable` or throw; the auditor treats both the same way.
 */
export interface BusinessRegistryLookup {
  searchByVat(vatNumber: string, signal?: AbortSignal): Promise<RegistryLookupResult>;
}

/**
 * Normalize a VAT number: uppercase, separators removed.
 * "be 0123.456.789" -> "BE0123456789"
 */
export function normalizeVatNumber(value: string): string {
  return value.replace(/[^A-Za-z0-9]/g, '').toUpperCase();
}
