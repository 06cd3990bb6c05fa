/**
 * Judgment Agent
 *
 * Final gate of the pipeline. Decides deterministically first; only when
 * that decision is not clear-cut, LLM use is requested and a backend is
 * bound does it ask the backend. The backend only reads the reports of the
 * earlier stages, never the document. Any backend or parsing failure falls
 * back to the deterministic decision.
 */

import type {
  JudgmentBackend,
  JudgmentConfig,
  JudgmentContext,
  JudgmentDecision,
  JudgmentOutcome,
} from './types.js';
import { DEFAULT_JUDGMENT_CONFIG } from './types.js';
import { JudgmentCriteria } from './JudgmentCriteria.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('JUDGMENT');

const MAX_LISTED_WARNINGS = 3;

export const JUDGMENT_SYSTEM_PROMPT = `You are the final reviewer of an automated bookkeeping pipeline.
You receive the reports produced for one financial document and decide what happens to it.

AUTO_APPROVE: no critical audit failure remains, the extraction models agree on critical fields,
extraction confidence is at least 80% and the essential fields are present. The document is booked
without a human looking at it.

NEEDS_REVIEW: warnings, resolved conflicts, missing non-essential fields or a confidence between
50% and 80%. A person checks the highlighted issues.

REJECT: critical failures remain after correction, essential fields are missing, the document type is
unknown or the confidence is below 50%. The document has to be processed by hand.

Approve clean extractions. Escalate only when correctness cannot be verified.

Reply with a single JSON object and nothing else:
{"decision": "AUTO_APPROVE" | "NEEDS_REVIEW" | "REJECT", "confidence": 0.0-1.0, "reasoning": "one or two sentences", "issuesForUser": ["..."]}`;

const OUTCOMES: readonly JudgmentOutcome[] = ['AUTO_APPROVE', 'NEEDS_REVIEW', 'REJECT'];

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export interface JudgmentAgentOptions {
  config?: JudgmentConfig;
  backend?: JudgmentBackend;
}

export class JudgmentAgent {
  private readonly config: JudgmentConfig;
  private readonly criteria: JudgmentCriteria;
  private readonly backend: JudgmentBackend | undefined;

  constructor(options: JudgmentAgentOptions = {}) {
    this.config = options.config ?? DEFAULT_JUDGMENT_CONFIG;
    this.criteria = new JudgmentCriteria(this.config);
    this.backend = options.backend;
  }

  async judge(context: JudgmentContext, useLlm = false, signal?: AbortSignal): Promise<JudgmentDecision> {
    const deterministic = this.criteria.evaluate(context);

    if (this.isClearCut(deterministic)) {
      log.info(`${context.documentType}: ${deterministic.outcome} (confidence ${deterministic.confidence.toFixed(2)})`);
      return deterministic;
    }

    if (!useLlm || !this.backend) {
      return deterministic;
    }

    log.info(`${context.documentType}: not clear-cut, consulting judgment model`);
    try {
      const reply = await this.backend.complete(JUDGMENT_SYSTEM_PROMPT, buildJudgmentPrompt(context), signal);
      const decision = parseJudgmentReply(reply, deterministic);
      log.info(`${context.documentType}: model decided ${decision.outcome}`);
      return decision;
    } catch (error) {
      log.warn(`Judgment model failed, keeping deterministic decision: ${describeError(error)}`);
      return deterministic;
    }
  }

  canPotentiallyAutoApprove(context: JudgmentContext): boolean {
    return this.criteria.canPotentiallyAutoApprove(context);
  }

  /**
   * REJECT, confident AUTO_APPROVE, and NEEDS_REVIEW with explicit issues or
   * very low confidence need no second opinion.
   */
  isClearCut(decision: JudgmentDecision): boolean {
    switch (decision.outcome) {
      case 'REJECT':
        return true;
      case 'AUTO_APPROVE':
        return decision.confidence >= this.config.clearCutConfidence;
      case 'NEEDS_REVIEW':
        return decision.issuesForUser.length > 0 || decision.confidence < this.config.lowConfidenceCutoff;
    }
  }
}

// ============================================================================
// Prompt
// ============================================================================

export function buildJudgmentPrompt(context: JudgmentContext): string {
  const lines: string[] = [
    '# Document report',
    '',
    `Type: ${context.documentType}`,
    `Extraction confidence: ${percent(context.extractionConfidence)}`,
    `Essential fields present: ${context.hasEssentialFields ? 'yes' : 'no'}`,
  ];
  if (context.missingEssentialFields.length > 0) {
    lines.push(`Missing fields: ${context.missingEssentialFields.join(', ')}`);
  }

  lines.push('', '## Model consensus');
  const consensus = context.consensusReport;
  if (!consensus?.hasConflicts) {
    lines.push('No conflicts between the extraction models.');
  } else {
    lines.push(`${consensus.conflicts.length} conflict(s), ${consensus.criticalCount} critical:`);
    for (const conflict of consensus.conflicts) {
      lines.push(
        `- [${conflict.severity}] ${conflict.field}: fast "${conflict.fastValue ?? ''}" vs expert "${conflict.expertValue ?? ''}"`
      );
    }
  }

  const audit = context.auditReport;
  lines.push(
    '',
    '## Audit',
    `Status: ${audit.overallStatus}`,
    `Checks: ${audit.checks.length} (passed ${audit.passedCount}, failed ${audit.failedCount}, incomplete ${audit.incompleteCount})`
  );
  if (audit.criticalFailures.length > 0) {
    lines.push('Critical failures:');
    for (const check of audit.criticalFailures) {
      lines.push(`- ${check.type}: ${check.message}`);
    }
  }
  if (audit.warnings.length > 0) {
    lines.push('Warnings:');
    for (const check of audit.warnings.slice(0, MAX_LISTED_WARNINGS)) {
      lines.push(`- ${check.type}: ${check.message}`);
    }
    if (audit.warnings.length > MAX_LISTED_WARNINGS) {
      lines.push(`- ... and ${audit.warnings.length - MAX_LISTED_WARNINGS} more`);
    }
  }

  lines.push('', '## Self-correction');
  const retry = context.retryResult;
  if (retry === null) {
    lines.push('Not attempted.');
  } else {
    switch (retry.kind) {
      case 'no_retry_needed':
        lines.push('Not needed.');
        break;
      case 'corrected_on_retry':
        lines.push(`Corrected on attempt ${retry.attempt}: ${retry.correctedFields.join(', ')}`);
        break;
      case 'still_failing':
        lines.push(`Still failing after ${retry.attempts} attempt(s); ${retry.remainingFailures.length} failure(s) remain.`);
        break;
    }
  }

  lines.push('', 'Decide: AUTO_APPROVE, NEEDS_REVIEW or REJECT.');
  return lines.join('\n');
}

// ============================================================================
// Reply parsing
// ============================================================================

function toOutcome(value: string): JudgmentOutcome | null {
  const normalized = value.trim().toUpperCase().replace(/[\s-]+/g, '_');
  if (normalized === 'AUTOAPPROVE') return 'AUTO_APPROVE';
  if (normalized === 'NEEDSREVIEW') return 'NEEDS_REVIEW';
  return OUTCOMES.find(o => o === normalized) ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clampConfidence(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : fallback;
}

/**
 * JSON object in the reply, if one parses
 */
function jsonVerdict(reply: string): Record<string, unknown> | null {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  try {
    const parsed: unknown = JSON.parse(reply.slice(start, end + 1));
    return isRecord(parsed) ? parsed : null;
  } catch {
    // not JSON; the caller falls back to keywords
    return null;
  }
}

/**
 * The outcome keyword mentioned first in free text
 */
function keywordVerdict(reply: string): JudgmentOutcome | null {
  const upper = reply.toUpperCase();
  const patterns: [JudgmentOutcome, RegExp][] = [
    ['AUTO_APPROVE', /AUTO[_ -]?APPROVE/],
    ['NEEDS_REVIEW', /NEEDS[_ -]?REVIEW/],
    ['REJECT', /\bREJECT/],
  ];

  let best: { outcome: JudgmentOutcome; index: number } | null = null;
  for (const [outcome, pattern] of patterns) {
    const match = pattern.exec(upper);
    if (match && (best === null || match.index < best.index)) {
      best = { outcome, index: match.index };
    }
  }
  return best?.outcome ?? null;
}

/**
 * Turn a model reply into a decision. A JSON object is preferred; otherwise
 * the first outcome keyword is used; a reply naming no outcome means review.
 * Provenance fields are carried over from the deterministic decision.
 */
export function parseJudgmentReply(reply: string, deterministic: JudgmentDecision): JudgmentDecision {
  const provenance = {
    allCriticalChecksPassed: deterministic.allCriticalChecksPassed,
    hasModelConsensus: deterministic.hasModelConsensus,
    retryAttempts: deterministic.retryAttempts,
    correctedFields: deterministic.correctedFields,
    source: 'llm' as const,
  };

  const verdict = jsonVerdict(reply);
  const jsonOutcome = verdict && typeof verdict.decision === 'string' ? toOutcome(verdict.decision) : null;
  if (verdict && jsonOutcome) {
    const issues = Array.isArray(verdict.issuesForUser)
      ? verdict.issuesForUser.filter((i): i is string => typeof i === 'string')
      : [];
    return {
      ...provenance,
      outcome: jsonOutcome,
      confidence: clampConfidence(verdict.confidence, 0.8),
      reasoning: typeof verdict.reasoning === 'string' && verdict.reasoning ? verdict.reasoning : `Model decided ${jsonOutcome}`,
      issuesForUser: jsonOutcome === 'AUTO_APPROVE' ? [] : issues,
    };
  }

  const outcome = keywordVerdict(reply) ?? 'NEEDS_REVIEW';
  switch (outcome) {
    case 'AUTO_APPROVE':
      return { ...provenance, outcome, confidence: 0.8, reasoning: 'Model approved the document', issuesForUser: [] };
    case 'REJECT':
      return { ...provenance, outcome, confidence: 0.8, reasoning: 'Model rejected the document', issuesForUser: ['Rejected by judgment model'] };
    case 'NEEDS_REVIEW':
      return { ...provenance, outcome, confidence: 0.6, reasoning: 'Model requested review', issuesForUser: ['Review requested by judgment model'] };
  }
}
