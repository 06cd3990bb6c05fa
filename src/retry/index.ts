export { CHECK_DISPLAY_NAMES, FeedbackPromptBuilder } from './FeedbackPromptBuilder.js';
export type { FeedbackPromptOptions } from './FeedbackPromptBuilder.js';
export { FeedbackDrivenRetryAgent, diffFields } from './FeedbackDrivenRetryAgent.js';
export type { AuditFunction, FeedbackDrivenRetryAgentOptions } from './FeedbackDrivenRetryAgent.js';
export { correctedFields, retryAttempts } from './types.js';
export type { RetryResult } from './types.js';
