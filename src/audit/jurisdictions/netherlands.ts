import type { VatJurisdiction } from './types.js';

export const NETHERLANDS: VatJurisdiction = {
  code: 'NL',
  name: 'Netherlands',
  standardRatesBp: [0, 900, 2100],
  categoryRules: [],
};
