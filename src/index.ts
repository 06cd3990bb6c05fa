export * from './coordinator/index.js';
export * from './config/index.js';
export * from './audit/index.js';
export * from './ensemble/index.js';
export * from './retry/index.js';
export * from './judgment/index.js';
export * from './registry/index.js';
export * from './clients/index.js';
export type { Classifier, CorrectionExtractor, ExtractionAgent, RetryCapableAgent } from './agents/types.js';
export { routeDocumentType } from './types/documents.js';
export type {
  DocumentClassification,
  DocumentKind,
  DocumentType,
  ExtractedBillData,
  ExtractedData,
  ExtractedDataByKind,
  ExtractedExpenseData,
  ExtractedInvoiceData,
  ExtractedReceiptData,
  LineItem,
  PageImage,
  TenantContext,
} from './types/documents.js';
export {
  APIError,
  ConfigurationError,
  PipelineCancelledError,
  describeError,
} from './utils/errors.js';
export { logger } from './utils/logger.js';
export type { LogLevel, Logger } from './utils/logger.js';
export { formatCents, parseAmount } from './utils/money.js';
export { normalizeDate } from './utils/dates.js';
