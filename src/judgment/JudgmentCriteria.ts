/**
 * Deterministic judgment rules
 *
 * Rules in precedence order; the first one that fires decides the outcome,
 * and every rule that is not satisfied contributes an issue for the reviewer
 * in the same order:
 *
 * 1. Unknown document type or missing essential fields -> REJECT
 * 2. Final audit FAILED, whether or not a retry corrected something -> REJECT
 *    on critical failures, NEEDS_REVIEW otherwise
 * 3. Unresolved model conflicts -> NEEDS_REVIEW
 * 4. More advisory warnings than allowed -> NEEDS_REVIEW
 * 5. Extraction confidence below the floor -> NEEDS_REVIEW
 * 6. Otherwise -> AUTO_APPROVE
 */

import type { JudgmentConfig, JudgmentContext, JudgmentDecision, JudgmentOutcome } from './types.js';
import { DEFAULT_JUDGMENT_CONFIG } from './types.js';
import { correctedFields, retryAttempts } from '../retry/types.js';
import { summarizeConflicts } from '../ensemble/types.js';

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

interface RuleFinding {
  outcome: Exclude<JudgmentOutcome, 'AUTO_APPROVE'>;
  confidence: number;
  reasoning: string;
  issues: string[];
}

export class JudgmentCriteria {
  constructor(private readonly config: JudgmentConfig = DEFAULT_JUDGMENT_CONFIG) {}

  evaluate(context: JudgmentContext): JudgmentDecision {
    const findings = this.findings(context);
    const issuesForUser = findings.flatMap(f => f.issues);
    const decisive = findings[0];

    const base = {
      allCriticalChecksPassed: context.auditReport.criticalFailures.length === 0,
      hasModelConsensus: !(context.consensusReport?.hasConflicts ?? false),
      retryAttempts: retryAttempts(context.retryResult),
      correctedFields: correctedFields(context.retryResult),
      source: 'deterministic' as const,
    };

    if (decisive === undefined) {
      const corrected = this.wasCorrected(context);
      return {
        ...base,
        outcome: 'AUTO_APPROVE',
        confidence: context.extractionConfidence,
        reasoning: corrected
          ? `All checks pass after correcting ${base.correctedFields.join(', ')}`
          : `All checks pass with ${percent(context.extractionConfidence)} extraction confidence`,
        issuesForUser: [],
      };
    }

    return {
      ...base,
      outcome: decisive.outcome,
      confidence: decisive.confidence,
      reasoning: decisive.reasoning,
      issuesForUser,
    };
  }

  /**
   * Whether nothing in the context rules out auto-approval
   */
  canPotentiallyAutoApprove(context: JudgmentContext): boolean {
    return this.findings(context).length === 0;
  }

  private wasCorrected(context: JudgmentContext): boolean {
    return context.retryResult?.kind === 'corrected_on_retry';
  }

  private retrySuffix(context: JudgmentContext): string {
    switch (context.retryResult?.kind) {
      case 'still_failing':
        return ` after ${retryAttempts(context.retryResult)} retry attempt(s)`;
      case 'corrected_on_retry':
        return ` after correcting ${correctedFields(context.retryResult).join(', ')}`;
      default:
        return '';
    }
  }

  private findings(context: JudgmentContext): RuleFinding[] {
    const findings: RuleFinding[] = [];
    const { auditReport, consensusReport } = context;

    // 1. Structural completeness
    if (context.documentType === 'UNKNOWN') {
      findings.push({
        outcome: 'REJECT',
        confidence: 0.95,
        reasoning: 'Could not determine the document type',
        issues: ['Document type could not be determined'],
      });
    }
    if (!context.hasEssentialFields) {
      const missing = context.missingEssentialFields;
      findings.push({
        outcome: 'REJECT',
        confidence: 0.95,
        reasoning: `Essential fields missing: ${missing.join(', ') || 'unknown'}`,
        issues: [
          missing.length > 0
            ? `Missing essential fields: ${missing.join(', ')}`
            : 'Missing essential fields',
        ],
      });
    }

    // 2. Final audit, judged as it stands after self-correction
    if (auditReport.overallStatus === 'FAILED') {
      const suffix = this.retrySuffix(context);

      if (auditReport.criticalFailures.length > 0) {
        findings.push({
          outcome: 'REJECT',
          confidence: 0.9,
          reasoning: `${auditReport.criticalFailures.length} critical check(s) failed${suffix}`,
          issues: auditReport.criticalFailures.map(c => c.message),
        });
      } else {
        findings.push({
          outcome: 'NEEDS_REVIEW',
          confidence: 0.7,
          reasoning: `${auditReport.failedCount} non-critical check(s) failed${suffix}`,
          issues: auditReport.checks.filter(c => c.status === 'failed').map(c => c.message),
        });
      }
    }

    // 3. Model disagreement
    if (consensusReport?.hasConflicts) {
      findings.push({
        outcome: 'NEEDS_REVIEW',
        confidence: 0.7,
        reasoning: `Extraction models disagree on ${consensusReport.conflicts.length} field(s)`,
        issues: summarizeConflicts(consensusReport).map(line => `Models disagree on ${line}`),
      });
    }

    // 4. Advisory warnings
    const warningCount = auditReport.checks.filter(c => c.status === 'warning').length;
    const allowedWarnings = this.config.autoApproveWithWarnings ? this.config.maxWarningsForAutoApprove : 0;
    if (warningCount > allowedWarnings) {
      findings.push({
        outcome: 'NEEDS_REVIEW',
        confidence: 0.75,
        reasoning: `${warningCount} audit warning(s), at most ${allowedWarnings} allowed for auto-approval`,
        issues: auditReport.checks.filter(c => c.status === 'warning').map(c => c.message),
      });
    }

    // 5. Confidence floor
    if (context.extractionConfidence < this.config.minConfidenceForAutoApprove) {
      findings.push({
        outcome: 'NEEDS_REVIEW',
        confidence: context.extractionConfidence,
        reasoning: `Extraction confidence ${percent(context.extractionConfidence)} is below ` +
          `the ${percent(this.config.minConfidenceForAutoApprove)} auto-approval threshold`,
        issues: [`Low extraction confidence (${percent(context.extractionConfidence)})`],
      });
    }

    return findings;
  }
}
