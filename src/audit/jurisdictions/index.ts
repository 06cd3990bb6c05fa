import type { VatJurisdiction } from './types.js';
import { BELGIUM } from './belgium.js';
import { NETHERLANDS } from './netherlands.js';

const registry = new Map<string, VatJurisdiction>([
  [BELGIUM.code, BELGIUM],
  [NETHERLANDS.code, NETHERLANDS],
]);

/**
 * Add or replace a jurisdiction table.
 */
export function registerJurisdiction(jurisdiction: VatJurisdiction): void {
  registry.set(jurisdiction.code.toUpperCase(), jurisdiction);
}

export function getJurisdiction(code: string): VatJurisdiction | undefined {
  return registry.get(code.toUpperCase());
}

export function listJurisdictions(): string[] {
  return [...registry.keys()];
}

export { BELGIUM, BELGIAN_VAT_REFORM_DATE } from './belgium.js';
export { NETHERLANDS } from './netherlands.js';
export type { VatJurisdiction, VatCategoryRule } from './types.js';
