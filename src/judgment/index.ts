export { JudgmentAgent, JUDGMENT_SYSTEM_PROMPT, buildJudgmentPrompt, parseJudgmentReply } from './JudgmentAgent.js';
export type { JudgmentAgentOptions } from './JudgmentAgent.js';
export { JudgmentCriteria } from './JudgmentCriteria.js';
export {
  OpenAICompatibleJudgmentClient,
  createJudgmentClientFromEnv,
  extractCompletionText,
} from './OpenAICompatibleJudgmentClient.js';
export type { OpenAICompatibleJudgmentConfig } from './OpenAICompatibleJudgmentClient.js';
export { DEFAULT_JUDGMENT_CONFIG, LENIENT_JUDGMENT_CONFIG, STRICT_JUDGMENT_CONFIG } from './types.js';
export type {
  JudgmentBackend,
  JudgmentConfig,
  JudgmentContext,
  JudgmentDecision,
  JudgmentOutcome,
  JudgmentSource,
} from './types.js';
