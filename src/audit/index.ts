export { ExtractionAuditService, isIncludedFeeLineItem, resolveBillAmounts } from './ExtractionAuditService.js';
export type { AuditOptions, AuditServiceOptions } from './ExtractionAuditService.js';
export {
  ALL_CHECK_TYPES,
  CRITICAL_CHECK_TYPES,
  EMPTY_AUDIT_REPORT,
  createAuditReport,
  isCheckType,
  isCriticalFailure,
} from './types.js';
export type { AuditCheck, AuditReport, AuditStatus, CheckStatus, CheckType } from './types.js';
export { MathValidator } from './validators/MathValidator.js';
export { IbanValidator } from './validators/IbanValidator.js';
export { StructuredReferenceValidator, formatOgm, ogmCheckDigits } from './validators/StructuredReferenceValidator.js';
export { VatRateValidator, formatRate } from './validators/VatRateValidator.js';
export { CompanyExistsValidator, CompanyNameValidator } from './validators/RegistryValidators.js';
export {
  BELGIAN_VAT_REFORM_DATE,
  BELGIUM,
  NETHERLANDS,
  getJurisdiction,
  listJurisdictions,
  registerJurisdiction,
} from './jurisdictions/index.js';
export type { VatCategoryRule, VatJurisdiction } from './jurisdictions/index.js';
