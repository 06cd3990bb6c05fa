import type { AuditCheck } from '../audit/types.js';

/**
 * Outcome of the self-correction loop
 */
export type RetryResult<T> =
  | { kind: 'no_retry_needed' }
  | {
      kind: 'corrected_on_retry';
      data: T;
      /** 1-based attempt that passed re-audit */
      attempt: number;
      correctedFields: string[];
      originalFailures: AuditCheck[];
    }
  | {
      kind: 'still_failing';
      data: T;
      attempts: number;
      remainingFailures: AuditCheck[];
      /** Message of a retry-agent error, when one ended the loop */
      error?: string;
    };

export function retryAttempts(result: RetryResult<unknown> | null): number {
  if (result === null) return 0;
  switch (result.kind) {
    case 'no_retry_needed':
      return 0;
    case 'corrected_on_retry':
      return result.attempt;
    case 'still_failing':
      return result.attempts;
  }
}

export function correctedFields(result: RetryResult<unknown> | null): string[] {
  return result?.kind === 'corrected_on_retry' ? result.correctedFields : [];
}
