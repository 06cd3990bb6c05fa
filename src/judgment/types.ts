/**
 * Judgment Types
 */

import type { AuditReport } from '../audit/types.js';
import type { ConflictReport } from '../ensemble/types.js';
import type { RetryResult } from '../retry/types.js';
import type { DocumentType } from '../types/documents.js';

export type JudgmentOutcome = 'AUTO_APPROVE' | 'NEEDS_REVIEW' | 'REJECT';

/**
 * Read-only snapshot of everything upstream stages produced, consumed once by
 * the judgment agent.
 */
export interface JudgmentContext {
  documentType: DocumentType;
  /** Confidence of the final extraction (after consensus and correction) */
  extractionConfidence: number;
  /** Null when a single model ran or both models agreed */
  consensusReport: ConflictReport | null;
  /** Audit of the final extraction */
  auditReport: AuditReport;
  /** Null when self-correction was not attempted */
  retryResult: RetryResult<unknown> | null;
  hasEssentialFields: boolean;
  missingEssentialFields: string[];
}

export type JudgmentSource = 'deterministic' | 'llm';

export interface JudgmentDecision {
  outcome: JudgmentOutcome;
  confidence: number;
  reasoning: string;
  /** Most important issue first */
  issuesForUser: string[];
  allCriticalChecksPassed: boolean;
  hasModelConsensus: boolean;
  retryAttempts: number;
  correctedFields: string[];
  source: JudgmentSource;
}

export interface JudgmentConfig {
  /** Extraction confidence floor for AUTO_APPROVE */
  minConfidenceForAutoApprove: number;
  /** Whether advisory warnings may accompany an AUTO_APPROVE */
  autoApproveWithWarnings: boolean;
  maxWarningsForAutoApprove: number;
  /** AUTO_APPROVE at or above this is clear-cut and never sent to the LLM */
  clearCutConfidence: number;
  /** Below this an otherwise clean NEEDS_REVIEW counts as clear-cut */
  lowConfidenceCutoff: number;
}

export const DEFAULT_JUDGMENT_CONFIG: JudgmentConfig = {
  minConfidenceForAutoApprove: 0.8,
  autoApproveWithWarnings: true,
  maxWarningsForAutoApprove: 3,
  clearCutConfidence: 0.85,
  lowConfidenceCutoff: 0.6,
};

export const STRICT_JUDGMENT_CONFIG: JudgmentConfig = {
  ...DEFAULT_JUDGMENT_CONFIG,
  minConfidenceForAutoApprove: 0.9,
  autoApproveWithWarnings: false,
  maxWarningsForAutoApprove: 0,
};

export const LENIENT_JUDGMENT_CONFIG: JudgmentConfig = {
  ...DEFAULT_JUDGMENT_CONFIG,
  minConfidenceForAutoApprove: 0.7,
  maxWarningsForAutoApprove: 5,
};

/**
 * Optional LLM backend consulted for ambiguous cases. Returns the raw model
 * reply; parsing lives in the judgment agent.
 */
export interface JudgmentBackend {
  complete(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string>;
}
