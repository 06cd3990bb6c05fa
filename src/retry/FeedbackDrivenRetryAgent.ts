/**
 * Feedback-driven retry agent
 *
 * Implements the self-correction loop on top of a CorrectionExtractor: each
 * attempt sends the audit failures of the previous round as a correction
 * prompt, re-audits the new extraction and stops as soon as no critical
 * failure remains.
 */

import type { CorrectionExtractor, RetryCapableAgent } from '../agents/types.js';
import type { AuditCheck, AuditReport } from '../audit/types.js';
import type { PageImage } from '../types/documents.js';
import type { RetryResult } from './types.js';
import { FeedbackPromptBuilder } from './FeedbackPromptBuilder.js';
import { PipelineCancelledError, describeError, throwIfAborted } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('RETRY');

export type AuditFunction<T> = (data: T, signal?: AbortSignal) => Promise<AuditReport>;

export interface FeedbackDrivenRetryAgentOptions {
  maxRetries: number;
  promptBuilder?: FeedbackPromptBuilder;
}

export class FeedbackDrivenRetryAgent<T extends object> implements RetryCapableAgent<T> {
  private readonly promptBuilder: FeedbackPromptBuilder;
  private readonly maxRetries: number;

  constructor(
    private readonly extractor: CorrectionExtractor<T>,
    private readonly audit: AuditFunction<T>,
    options: FeedbackDrivenRetryAgentOptions
  ) {
    this.maxRetries = options.maxRetries;
    this.promptBuilder = options.promptBuilder ?? new FeedbackPromptBuilder();
  }

  async attemptCorrection(
    images: PageImage[],
    initialExtraction: T,
    initialAuditReport: AuditReport,
    signal?: AbortSignal
  ): Promise<RetryResult<T>> {
    if (initialAuditReport.criticalFailures.length === 0) {
      return { kind: 'no_retry_needed' };
    }

    const originalFailures = initialAuditReport.criticalFailures;
    let current = initialExtraction;
    let currentReport = initialAuditReport;
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      throwIfAborted(signal);

      const prompt = this.promptBuilder.buildFeedbackPrompt(currentReport, attempt, this.maxRetries);
      log.info(
        `Attempt ${attempt}/${this.maxRetries}: ${currentReport.criticalFailures.length} critical failure(s)`
      );
      log.debug(this.promptBuilder.buildCorrectionSummary(currentReport.criticalFailures));

      let corrected: T;
      try {
        corrected = await this.extractor.extractWithFeedback(images, current, prompt, signal);
      } catch (error) {
        if (error instanceof PipelineCancelledError || signal?.aborted) {
          throw error;
        }
        lastError = describeError(error);
        log.warn(`Attempt ${attempt} failed: ${lastError}`);
        continue;
      }

      const report = await this.audit(corrected, signal);
      current = corrected;
      currentReport = report;
      lastError = undefined;

      if (report.criticalFailures.length === 0) {
        const fields = diffFields(initialExtraction, corrected);
        log.info(`Corrected on attempt ${attempt}`, fields);
        return {
          kind: 'corrected_on_retry',
          data: corrected,
          attempt,
          correctedFields: fields,
          originalFailures,
        };
      }
    }

    log.warn(`Still failing after ${this.maxRetries} attempt(s)`);
    const remainingFailures: AuditCheck[] = currentReport.criticalFailures;
    return {
      kind: 'still_failing',
      data: current,
      attempts: this.maxRetries,
      remainingFailures,
      ...(lastError !== undefined ? { error: lastError } : {}),
    };
  }
}

/**
 * Top-level keys whose values differ between two extractions, in key order.
 * Confidence and the raw text dump are not fields a correction fixes.
 */
export function diffFields<T extends object>(before: T, after: T): string[] {
  const ignored = new Set(['confidence', 'extractedText']);
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  const changed: string[] = [];

  for (const key of keys) {
    if (ignored.has(key)) continue;
    const left: unknown = Reflect.get(before, key);
    const right: unknown = Reflect.get(after, key);
    if (JSON.stringify(left) !== JSON.stringify(right)) {
      changed.push(key);
    }
  }

  return changed;
}
