import type { VatJurisdiction } from './types.js';

/** Start of the 2026 reform that moved accommodation and takeaway to 12% */
export const BELGIAN_VAT_REFORM_DATE = '2026-03-01';

const HORECA = ['horeca', 'restaurant', 'catering', 'meal', 'café', 'cafe', 'brasserie', 'bistro'];
const REFORM_ADDITIONS = ['accommodation', 'hotel', 'camping', 'takeaway', 'take-away', 'lodging'];

export const BELGIUM: VatJurisdiction = {
  code: 'BE',
  name: 'Belgium',
  standardRatesBp: [0, 600, 1200, 2100],
  categoryRules: [
    {
      rateBp: 1200,
      categories: HORECA,
      effectiveUntil: BELGIAN_VAT_REFORM_DATE,
      message: '12% rate valid for Horeca (restaurant and catering services) before the March 2026 reform',
    },
    {
      rateBp: 1200,
      categories: [...HORECA, ...REFORM_ADDITIONS],
      effectiveFrom: BELGIAN_VAT_REFORM_DATE,
      message: '12% rate valid for Horeca, accommodation and takeaway meals under the March 2026 reform',
    },
    {
      rateBp: 600,
      categories: REFORM_ADDITIONS,
      effectiveUntil: BELGIAN_VAT_REFORM_DATE,
      message: '6% rate valid for accommodation and takeaway meals before the March 2026 reform',
    },
  ],
};
