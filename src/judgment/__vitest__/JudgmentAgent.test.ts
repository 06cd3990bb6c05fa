import { describe, it, expect, vi } from 'vitest';
import { JUDGMENT_SYSTEM_PROMPT, JudgmentAgent, buildJudgmentPrompt, parseJudgmentReply } from '../JudgmentAgent.js';
import type { JudgmentBackend, JudgmentDecision } from '../types.js';
import { createAuditReport } from '../../audit/types.js';
import { failedMath, judgmentContext, passedMath, totalConflict, vatWarning } from './fixtures.js';

function backendReplying(reply: string) {
  return { complete: vi.fn<JudgmentBackend['complete']>().mockResolvedValue(reply) };
}

// 0.82 clears the auto-approval floor but not the clear-cut bar
const borderline = judgmentContext({ extractionConfidence: 0.82 });

const deterministic: JudgmentDecision = {
  outcome: 'AUTO_APPROVE',
  confidence: 0.82,
  reasoning: 'All checks pass with 82% extraction confidence',
  issuesForUser: [],
  allCriticalChecksPassed: true,
  hasModelConsensus: true,
  retryAttempts: 1,
  correctedFields: ['iban'],
  source: 'deterministic',
};

describe('JudgmentAgent', () => {
  it('does not consult the model on a clear-cut case', async () => {
    const backend = backendReplying('{"decision":"REJECT"}');
    const agent = new JudgmentAgent({ backend });

    const decision = await agent.judge(judgmentContext(), true);

    expect(decision.outcome).toBe('AUTO_APPROVE');
    expect(decision.source).toBe('deterministic');
    expect(backend.complete).not.toHaveBeenCalled();
  });

  it('consults the model on a borderline case when asked to', async () => {
    const backend = backendReplying(
      '{"decision":"NEEDS_REVIEW","confidence":0.7,"reasoning":"Vendor unclear","issuesForUser":["Check vendor"]}'
    );
    const agent = new JudgmentAgent({ backend });
    const controller = new AbortController();

    const decision = await agent.judge(borderline, true, controller.signal);

    expect(decision).toMatchObject({
      outcome: 'NEEDS_REVIEW',
      confidence: 0.7,
      reasoning: 'Vendor unclear',
      issuesForUser: ['Check vendor'],
      source: 'llm',
    });
    expect(backend.complete).toHaveBeenCalledWith(
      JUDGMENT_SYSTEM_PROMPT,
      buildJudgmentPrompt(borderline),
      controller.signal
    );
  });

  it('stays deterministic when the model is not requested', async () => {
    const backend = backendReplying('{"decision":"REJECT"}');
    const decision = await new JudgmentAgent({ backend }).judge(borderline, false);

    expect(decision.source).toBe('deterministic');
    expect(backend.complete).not.toHaveBeenCalled();
  });

  it('falls back to the deterministic decision when the model fails', async () => {
    const backend = { complete: vi.fn<JudgmentBackend['complete']>().mockRejectedValue(new Error('503')) };
    const decision = await new JudgmentAgent({ backend }).judge(borderline, true);

    expect(decision.outcome).toBe('AUTO_APPROVE');
    expect(decision.source).toBe('deterministic');
  });

  it('classifies decisions as clear-cut', () => {
    const agent = new JudgmentAgent();
    expect(agent.isClearCut({ ...deterministic, outcome: 'REJECT' })).toBe(true);
    expect(agent.isClearCut({ ...deterministic, confidence: 0.9 })).toBe(true);
    expect(agent.isClearCut(deterministic)).toBe(false);
    expect(agent.isClearCut({ ...deterministic, outcome: 'NEEDS_REVIEW', issuesForUser: ['x'] })).toBe(true);
    expect(agent.isClearCut({ ...deterministic, outcome: 'NEEDS_REVIEW', confidence: 0.5 })).toBe(true);
    expect(agent.isClearCut({ ...deterministic, outcome: 'NEEDS_REVIEW', confidence: 0.7 })).toBe(false);
  });
});

describe('parseJudgmentReply', () => {
  it('reads a JSON object wrapped in prose', () => {
    const decision = parseJudgmentReply('Here you go: {"decision":"auto-approve","confidence":1.4} thanks', deterministic);

    expect(decision).toEqual({
      outcome: 'AUTO_APPROVE',
      confidence: 1,
      reasoning: 'Model decided AUTO_APPROVE',
      issuesForUser: [],
      allCriticalChecksPassed: true,
      hasModelConsensus: true,
      retryAttempts: 1,
      correctedFields: ['iban'],
      source: 'llm',
    });
  });

  it('accepts outcomes written without separators', () => {
    expect(parseJudgmentReply('{"decision":"NeedsReview"}', deterministic).outcome).toBe('NEEDS_REVIEW');
  });

  it('falls back to the first outcome keyword', () => {
    expect(parseJudgmentReply('REJECT. This cannot be an AUTO_APPROVE.', deterministic)).toMatchObject({
      outcome: 'REJECT',
      confidence: 0.8,
      reasoning: 'Model rejected the document',
      issuesForUser: ['Rejected by judgment model'],
    });
    expect(parseJudgmentReply('I would auto approve this one', deterministic).outcome).toBe('AUTO_APPROVE');
  });

  it('uses keywords when the braces do not hold JSON', () => {
    expect(parseJudgmentReply('{decision: REJECT}', deterministic).outcome).toBe('REJECT');
  });

  it('asks for review when no outcome is named', () => {
    expect(parseJudgmentReply('no idea', deterministic)).toMatchObject({
      outcome: 'NEEDS_REVIEW',
      confidence: 0.6,
      reasoning: 'Model requested review',
      issuesForUser: ['Review requested by judgment model'],
      source: 'llm',
    });
  });
});

describe('buildJudgmentPrompt', () => {
  it('summarizes a clean report', () => {
    const lines = buildJudgmentPrompt(judgmentContext()).split('\n');

    expect(lines.slice(0, 5)).toEqual([
      '# Document report',
      '',
      'Type: INVOICE',
      'Extraction confidence: 92%',
      'Essential fields present: yes',
    ]);
    expect(lines).toContain('No conflicts between the extraction models.');
    expect(lines).toContain('Checks: 1 (passed 1, failed 0, incomplete 0)');
    expect(lines).toContain('Not attempted.');
    expect(lines[lines.length - 1]).toBe('Decide: AUTO_APPROVE, NEEDS_REVIEW or REJECT.');
  });

  it('lists conflicts, failures and at most three warnings', () => {
    const lines = buildJudgmentPrompt(judgmentContext({
      consensusReport: totalConflict,
      auditReport: createAuditReport([
        passedMath,
        failedMath,
        vatWarning(1),
        vatWarning(2),
        vatWarning(3),
        vatWarning(4),
        vatWarning(5),
      ]),
      retryResult: { kind: 'still_failing', data: {}, attempts: 2, remainingFailures: [failedMath] },
    })).split('\n');

    expect(lines).toContain('1 conflict(s), 1 critical:');
    expect(lines).toContain('- [critical] totalAmount: fast "100.00" vs expert "110.00"');
    expect(lines).toContain(`- MATH: ${failedMath.message}`);
    expect(lines).toContain('- VAT_RATE: warning 3');
    expect(lines).not.toContain('- VAT_RATE: warning 4');
    expect(lines).toContain('- ... and 2 more');
    expect(lines).toContain('Still failing after 2 attempt(s); 1 failure(s) remain.');
  });
});
