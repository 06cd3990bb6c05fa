/**
 * Perception Ensemble
 *
 * Runs the fast and expert extraction agents against the same pages and
 * collects both outcomes. In parallel mode both calls start immediately and
 * are awaited jointly; a rejection in one tier never cancels the other.
 */

import type { ExtractionAgent } from '../agents/types.js';
import type { EnsembleResult, ModelTier } from './types.js';
import type { PageImage } from '../types/documents.js';
import { PipelineCancelledError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('ENSEMBLE');

export interface PerceptionEnsembleOptions {
  parallel: boolean;
}

type TierOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(describeError(reason));
}

export class PerceptionEnsemble<T> {
  constructor(
    private readonly fastAgent: ExtractionAgent<T>,
    private readonly expertAgent: ExtractionAgent<T>,
    private readonly options: PerceptionEnsembleOptions = { parallel: true }
  ) {}

  async extract(images: PageImage[], signal?: AbortSignal): Promise<EnsembleResult<T>> {
    let fast: TierOutcome<T>;
    let expert: TierOutcome<T>;

    if (this.options.parallel) {
      [fast, expert] = await Promise.all([
        this.runTier('fast', this.fastAgent, images, signal),
        this.runTier('expert', this.expertAgent, images, signal),
      ]);
    } else {
      fast = await this.runTier('fast', this.fastAgent, images, signal);
      expert = await this.runTier('expert', this.expertAgent, images, signal);
    }

    const result: EnsembleResult<T> = {
      fast: fast.ok ? fast.value : null,
      expert: expert.ok ? expert.value : null,
      fastError: fast.ok ? null : fast.error,
      expertError: expert.ok ? null : expert.error,
      hasAnyCandidate: fast.ok || expert.ok,
    };

    log.info(
      `Ensemble finished (${this.options.parallel ? 'parallel' : 'sequential'}): ` +
      `fast=${fast.ok ? 'ok' : 'failed'}, expert=${expert.ok ? 'ok' : 'failed'}`
    );
    return result;
  }

  /**
   * Run one tier; never rejects
   */
  private async runTier(
    tier: ModelTier,
    agent: ExtractionAgent<T>,
    images: PageImage[],
    signal?: AbortSignal
  ): Promise<TierOutcome<T>> {
    if (signal?.aborted) {
      return { ok: false, error: new PipelineCancelledError(`${tier} extraction skipped: cancelled`) };
    }

    try {
      const value = await agent.extract(images, signal);
      return { ok: true, value };
    } catch (reason) {
      const error = toError(reason);
      log.warn(`${tier} extraction failed: ${error.message}`);
      return { ok: false, error };
    }
  }
}
