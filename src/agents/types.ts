/**
 * Collaborator contracts consumed by the pipeline.
 *
 * Model calls, OCR and prompt mechanics live behind these interfaces. Every
 * method may reject; the pipeline turns rejections into result values.
 * Implementations should honour the AbortSignal they are given.
 */

import type { AuditReport } from '../audit/types.js';
import type { RetryResult } from '../retry/types.js';
import type { DocumentClassification, PageImage, TenantContext } from '../types/documents.js';

export interface Classifier {
  classify(images: PageImage[], tenantContext: TenantContext, signal?: AbortSignal): Promise<DocumentClassification>;
}

export interface ExtractionAgent<T> {
  extract(images: PageImage[], signal?: AbortSignal): Promise<T>;
}

/**
 * Extraction agent that can re-read a document with targeted feedback
 */
export interface RetryCapableAgent<T> {
  attemptCorrection(
    images: PageImage[],
    initialExtraction: T,
    initialAuditReport: AuditReport,
    signal?: AbortSignal
  ): Promise<RetryResult<T>>;
}

/**
 * Model call used by FeedbackDrivenRetryAgent: extract again, given the
 * previous extraction and a correction prompt.
 */
export interface CorrectionExtractor<T> {
  extractWithFeedback(
    images: PageImage[],
    previousExtraction: T,
    feedbackPrompt: string,
    signal?: AbortSignal
  ): Promise<T>;
}
