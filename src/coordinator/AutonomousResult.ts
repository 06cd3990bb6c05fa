/**
 * Terminal value of one pipeline run.
 *
 * `success` means the document went through every stage and carries the
 * judgment; the verdict inside may still be NEEDS_REVIEW or REJECT.
 * `rejected` means processing stopped early.
 */

import type { AuditReport } from '../audit/types.js';
import type { ConflictReport } from '../ensemble/types.js';
import type { JudgmentDecision } from '../judgment/types.js';
import type { RetryResult } from '../retry/types.js';
import { correctedFields, retryAttempts } from '../retry/types.js';
import type { DocumentClassification, DocumentKind, ExtractedData } from '../types/documents.js';

export type RejectionStage = 'CLASSIFICATION' | 'EXTRACTION' | 'VALIDATION';

export interface AutonomousSuccess<T extends ExtractedData = ExtractedData> {
  kind: 'success';
  runId: string;
  documentKind: DocumentKind;
  classification: DocumentClassification;
  /** Final extraction: after consensus and, when it succeeded, correction */
  extraction: T;
  /** Null when a single model ran or both models agreed */
  conflictReport: ConflictReport | null;
  /** Audit of the final extraction */
  auditReport: AuditReport;
  /** Null when self-correction was not attempted */
  retryResult: RetryResult<T> | null;
  judgment: JudgmentDecision;
}

export interface AutonomousRejected {
  kind: 'rejected';
  runId: string;
  reason: string;
  classification: DocumentClassification | null;
  stage: RejectionStage;
  details: Record<string, string>;
}

export type AutonomousResult<T extends ExtractedData = ExtractedData> = AutonomousSuccess<T> | AutonomousRejected;

export function isSuccess<T extends ExtractedData>(result: AutonomousResult<T>): result is AutonomousSuccess<T> {
  return result.kind === 'success';
}

// ============================================================================
// Derived views of a success
// ============================================================================

export interface SuccessView {
  isAutoApproved: boolean;
  needsReview: boolean;
  /** Judged REJECT after the full pipeline */
  isRejected: boolean;
  wasCorrected: boolean;
  correctedFields: string[];
  retryAttempts: number;
  hadConflicts: boolean;
  confidence: number;
}

export function successView(success: AutonomousSuccess): SuccessView {
  return {
    isAutoApproved: success.judgment.outcome === 'AUTO_APPROVE',
    needsReview: success.judgment.outcome === 'NEEDS_REVIEW',
    isRejected: success.judgment.outcome === 'REJECT',
    wasCorrected: success.retryResult?.kind === 'corrected_on_retry',
    correctedFields: correctedFields(success.retryResult),
    retryAttempts: retryAttempts(success.retryResult),
    hadConflicts: success.conflictReport?.hasConflicts ?? false,
    confidence: success.judgment.confidence,
  };
}

// ============================================================================
// Early rejections
// ============================================================================

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function errorDetails(fastError: Error | null, expertError: Error | null): Record<string, string> {
  const details: Record<string, string> = {};
  if (fastError) details.fastError = fastError.message || fastError.name;
  if (expertError) details.expertError = expertError.message || expertError.name;
  return details;
}

export const Rejected = {
  lowConfidence(runId: string, classification: DocumentClassification, threshold: number): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: `Classification confidence ${percent(classification.confidence)} is below threshold ${percent(threshold)}`,
      classification,
      stage: 'CLASSIFICATION',
      details: {
        confidence: String(classification.confidence),
        threshold: String(threshold),
      },
    };
  },

  unknownDocumentType(runId: string, classification: DocumentClassification, failFast = true): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: failFast
        ? 'Could not determine document type'
        : 'Document type could not be determined; manual classification required',
      classification,
      stage: 'CLASSIFICATION',
      details: failFast ? {} : { failFast: 'false' },
    };
  },

  classificationFailed(runId: string, error: string): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: 'Document classification failed',
      classification: null,
      stage: 'CLASSIFICATION',
      details: { error },
    };
  },

  extractionFailed(
    runId: string,
    classification: DocumentClassification,
    fastError: Error | null,
    expertError: Error | null
  ): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: fastError && expertError
        ? 'Both models failed to extract data'
        : 'Extraction failed',
      classification,
      stage: 'EXTRACTION',
      details: errorDetails(fastError, expertError),
    };
  },

  noDataExtracted(runId: string, classification: DocumentClassification): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: 'No data could be extracted from the document',
      classification,
      stage: 'EXTRACTION',
      details: {},
    };
  },

  noAgentConfigured(runId: string, classification: DocumentClassification, documentKind: DocumentKind): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: `No ${documentKind} extraction agent configured`,
      classification,
      stage: 'EXTRACTION',
      details: { documentKind, configurationError: 'true' },
    };
  },

  cancelled(runId: string, stage: RejectionStage, classification: DocumentClassification | null): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: 'Processing was cancelled',
      classification,
      stage,
      details: { cancelled: 'true' },
    };
  },

  validationFailed(runId: string, classification: DocumentClassification, error: string): AutonomousRejected {
    return {
      kind: 'rejected',
      runId,
      reason: 'Validation could not be completed',
      classification,
      stage: 'VALIDATION',
      details: { error },
    };
  },
};

// ============================================================================
// Batch statistics
// ============================================================================

export interface ProcessingStats {
  totalProcessed: number;
  autoApproved: number;
  needsReview: number;
  /** Judged REJECT after the full pipeline */
  rejected: number;
  /** Stopped before judgment */
  earlyRejected: number;
  averageConfidence: number;
  averageRetryAttempts: number;
  autoApproveRate: number;
  reviewRate: number;
  rejectionRate: number;
  /** At least 95% of documents were approved without a human */
  meetsSilenceGoal: boolean;
}

export const SILENCE_GOAL_RATE = 0.95;

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function calculateProcessingStats(results: AutonomousResult[]): ProcessingStats {
  const views = results
    .filter((r): r is AutonomousSuccess => r.kind === 'success')
    .map(successView);
  const total = results.length;
  const autoApproved = views.filter(v => v.isAutoApproved).length;
  const needsReview = views.filter(v => v.needsReview).length;
  const rejected = views.filter(v => v.isRejected).length;
  const earlyRejected = total - views.length;

  const rate = (count: number): number => (total > 0 ? count / total : 0);
  const autoApproveRate = rate(autoApproved);

  return {
    totalProcessed: total,
    autoApproved,
    needsReview,
    rejected,
    earlyRejected,
    averageConfidence: average(views.map(v => v.confidence)),
    averageRetryAttempts: average(views.map(v => v.retryAttempts)),
    autoApproveRate,
    reviewRate: rate(needsReview),
    rejectionRate: rate(rejected + earlyRejected),
    meetsSilenceGoal: autoApproveRate >= SILENCE_GOAL_RATE,
  };
}
