/**
 * Autonomous Processing Coordinator
 *
 * Entry point of the pipeline:
 *
 *   classify -> route -> extract (ensemble) -> reconcile -> audit
 *     -> [self-correct -> re-audit] -> judge
 *
 * Every collaborator failure is turned into a value; `process()` resolves
 * with a `rejected` result for early exits and a `success` result carrying
 * the judgment otherwise. Lanes (agents per document kind) are bound once at
 * construction and never change afterwards.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  Classifier,
  CorrectionExtractor,
  ExtractionAgent,
  RetryCapableAgent,
} from '../agents/types.js';
import { ExtractionAuditService } from '../audit/ExtractionAuditService.js';
import { getJurisdiction } from '../audit/jurisdictions/index.js';
import type { AuditReport } from '../audit/types.js';
import { formatRate } from '../audit/validators/VatRateValidator.js';
import type { PipelineConfig } from '../config/PipelineConfig.js';
import { DEFAULT_PIPELINE_CONFIG, validatePipelineConfig } from '../config/PipelineConfig.js';
import { ConsensusEngine } from '../ensemble/ConsensusEngine.js';
import { PerceptionEnsemble } from '../ensemble/PerceptionEnsemble.js';
import type { ConsensusResult, ModelTier, ModelWeight } from '../ensemble/types.js';
import { consensusData, consensusReport } from '../ensemble/types.js';
import { JudgmentAgent } from '../judgment/JudgmentAgent.js';
import type { JudgmentBackend } from '../judgment/types.js';
import type { BusinessRegistryLookup } from '../registry/types.js';
import { FeedbackDrivenRetryAgent } from '../retry/FeedbackDrivenRetryAgent.js';
import { FeedbackPromptBuilder } from '../retry/FeedbackPromptBuilder.js';
import type { RetryResult } from '../retry/types.js';
import type {
  DocumentClassification,
  DocumentKind,
  ExtractedData,
  ExtractedDataByKind,
  PageImage,
  TenantContext,
} from '../types/documents.js';
import { routeDocumentType } from '../types/documents.js';
import {
  ConfigurationError,
  PipelineCancelledError,
  assertNever,
  describeError,
  throwIfAborted,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { logger } from '../utils/logger.js';
import type { AutonomousResult, RejectionStage } from './AutonomousResult.js';
import { Rejected } from './AutonomousResult.js';
import type { DocumentStrategy } from './DocumentStrategies.js';
import { createDocumentStrategies } from './DocumentStrategies.js';

// ============================================================================
// Options
// ============================================================================

/**
 * Agents for one document kind. `retry` wins over `corrector`; a corrector
 * alone is wrapped in a FeedbackDrivenRetryAgent bound to the lane's audit.
 */
export interface LaneAgents<T> {
  fast?: ExtractionAgent<T>;
  expert?: ExtractionAgent<T>;
  retry?: RetryCapableAgent<T>;
  corrector?: CorrectionExtractor<T>;
}

export type AgentRegistry = { [K in DocumentKind]?: LaneAgents<ExtractedDataByKind[K]> };

export interface CoordinatorOptions {
  classifier: Classifier;
  agents: AgentRegistry;
  config?: PipelineConfig;
  registry?: BusinessRegistryLookup;
  judgmentBackend?: JudgmentBackend;
  fieldWeights?: Record<string, ModelWeight>;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

interface Lane<T> {
  strategy: DocumentStrategy<T>;
  ensemble: PerceptionEnsemble<T> | null;
  /** Agent used when the ensemble is off or incomplete: expert, else fast */
  single: { tier: ModelTier; agent: ExtractionAgent<T> } | null;
  retry: RetryCapableAgent<T> | null;
}

type Lanes = { [K in DocumentKind]: Lane<ExtractedDataByKind[K]> };

interface RunContext {
  runId: string;
  log: Logger;
  classification: DocumentClassification;
  images: PageImage[];
  tenant: TenantContext;
  signal?: AbortSignal;
}

// ============================================================================
// Coordinator
// ============================================================================

export class AutonomousProcessingCoordinator {
  private readonly config: PipelineConfig;
  private readonly classifier: Classifier;
  private readonly judgment: JudgmentAgent;
  private readonly lanes: Lanes;

  constructor(options: CoordinatorOptions) {
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;

    const validation = validatePipelineConfig(this.config);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid pipeline configuration', validation.errors);
    }
    for (const warning of validation.warnings) {
      logger.warn(`Pipeline config: ${warning}`);
    }

    this.classifier = options.classifier;
    this.judgment = new JudgmentAgent({ config: this.config.judgment, backend: options.judgmentBackend });

    const consensus = new ConsensusEngine({
      amountEpsilon: this.config.amountEpsilon,
      fieldWeights: options.fieldWeights,
    });
    const auditor = ExtractionAuditService.fromConfig(this.config, options.registry);
    const strategies = createDocumentStrategies(consensus, auditor);

    const jurisdiction = getJurisdiction(this.config.jurisdiction);
    const promptBuilder = new FeedbackPromptBuilder({
      jurisdictionName: jurisdiction?.name,
      standardVatRates: jurisdiction?.standardRatesBp.map(formatRate).join(', '),
    });

    const agents = options.agents;
    this.lanes = {
      invoice: this.buildLane(strategies.invoice, agents.invoice, promptBuilder),
      bill: this.buildLane(strategies.bill, agents.bill, promptBuilder),
      receipt: this.buildLane(strategies.receipt, agents.receipt, promptBuilder),
      expense: this.buildLane(strategies.expense, agents.expense, promptBuilder),
    };
  }

  getConfig(): PipelineConfig {
    return this.config;
  }

  private buildLane<T extends ExtractedData>(
    strategy: DocumentStrategy<T>,
    agents: LaneAgents<T> | undefined,
    promptBuilder: FeedbackPromptBuilder
  ): Lane<T> {
    const fast = agents?.fast;
    const expert = agents?.expert;

    let retry: RetryCapableAgent<T> | null = agents?.retry ?? null;
    if (!retry && agents?.corrector) {
      retry = new FeedbackDrivenRetryAgent<T>(
        agents.corrector,
        (data, signal) => strategy.audit(data, { signal }),
        { maxRetries: this.config.maxRetries, promptBuilder }
      );
    }

    return {
      strategy,
      ensemble: fast && expert
        ? new PerceptionEnsemble<T>(fast, expert, { parallel: this.config.parallelExtraction })
        : null,
      single: expert
        ? { tier: 'expert', agent: expert }
        : fast
          ? { tier: 'fast', agent: fast }
          : null,
      retry,
    };
  }

  /**
   * Process one document
   */
  async process(
    images: PageImage[],
    tenantContext: TenantContext,
    options: ProcessOptions = {}
  ): Promise<AutonomousResult> {
    const runId = uuidv4();
    const log = logger.child('COORDINATOR').child(runId);
    const { signal } = options;

    log.info(`Processing ${images.length} page(s) for tenant ${tenantContext.tenantId}`);

    // Classification
    let classification: DocumentClassification;
    try {
      throwIfAborted(signal);
      classification = await this.classifier.classify(images, tenantContext, signal);
    } catch (error) {
      if (error instanceof PipelineCancelledError || signal?.aborted) {
        log.warn('Cancelled during classification');
        return Rejected.cancelled(runId, 'CLASSIFICATION', null);
      }
      log.error(`Classification failed: ${describeError(error)}`);
      return Rejected.classificationFailed(runId, describeError(error));
    }

    log.info(`Classified as ${classification.documentType} (confidence ${classification.confidence.toFixed(2)})`);

    if (classification.confidence < this.config.minClassificationConfidence) {
      log.warn('Classification confidence below threshold, rejecting');
      return Rejected.lowConfidence(runId, classification, this.config.minClassificationConfidence);
    }

    const kind = routeDocumentType(classification.documentType);
    if (kind === null) {
      log.warn(`Document type ${classification.documentType}, rejecting`);
      return Rejected.unknownDocumentType(runId, classification, this.config.failFastOnUnknownType);
    }

    const run: RunContext = { runId, log, classification, images, tenant: tenantContext, signal };

    switch (kind) {
      case 'invoice':
        return this.runLane(this.lanes.invoice, run);
      case 'bill':
        return this.runLane(this.lanes.bill, run);
      case 'receipt':
        return this.runLane(this.lanes.receipt, run);
      case 'expense':
        return this.runLane(this.lanes.expense, run);
      default:
        return assertNever(kind);
    }
  }

  /**
   * The generic pipeline from extraction to judgment
   */
  private async runLane<T extends ExtractedData>(lane: Lane<T>, run: RunContext): Promise<AutonomousResult<T>> {
    const { runId, log, classification, signal } = run;
    let stage: RejectionStage = 'EXTRACTION';

    try {
      // Extraction and consensus
      const extracted = await this.extract(lane, run);
      if ('rejected' in extracted) {
        return extracted.rejected;
      }

      const consensus = extracted.consensus;
      const data = consensusData(consensus);
      if (data === null) {
        log.warn('Consensus produced no data');
        return Rejected.noDataExtracted(runId, classification);
      }
      const conflictReport = consensusReport(consensus);
      log.info(`Consensus: ${consensus.kind}`);

      // Audit
      stage = 'VALIDATION';
      throwIfAborted(signal);
      const auditOptions = { signal, jurisdiction: run.tenant.jurisdiction };
      const auditReport = await lane.strategy.audit(data, auditOptions);
      log.info(
        `Audit: ${auditReport.overallStatus} (${auditReport.passedCount} passed, ${auditReport.failedCount} failed)`
      );

      // Self-correction
      const retryResult = await this.selfCorrect(lane, data, auditReport, run);
      let finalData = data;
      let finalAudit = auditReport;
      if (retryResult?.kind === 'corrected_on_retry') {
        finalData = retryResult.data;
        finalAudit = await lane.strategy.audit(finalData, auditOptions);
        log.info(`Corrected on attempt ${retryResult.attempt}: ${retryResult.correctedFields.join(', ')}`);
      } else if (retryResult?.kind === 'still_failing') {
        finalData = retryResult.data;
        log.warn(`Still failing after ${retryResult.attempts} attempt(s)`);
      }

      // Judgment
      throwIfAborted(signal);
      const missingEssentialFields = lane.strategy.missingEssentialFields(finalData);
      const judgment = await this.judgment.judge(
        {
          documentType: classification.documentType,
          extractionConfidence: finalData.confidence,
          consensusReport: conflictReport,
          auditReport: finalAudit,
          retryResult,
          hasEssentialFields: missingEssentialFields.length === 0,
          missingEssentialFields,
        },
        this.config.useLlmForJudgment,
        signal
      );
      log.info(`Judgment: ${judgment.outcome} (${judgment.source}, confidence ${judgment.confidence.toFixed(2)})`);

      return {
        kind: 'success',
        runId,
        documentKind: lane.strategy.kind,
        classification,
        extraction: finalData,
        conflictReport,
        auditReport: finalAudit,
        retryResult,
        judgment,
      };
    } catch (error) {
      if (error instanceof PipelineCancelledError || signal?.aborted) {
        log.warn(`Cancelled during ${stage.toLowerCase()}`);
        return Rejected.cancelled(runId, stage, classification);
      }
      log.error(`Unexpected failure during ${stage.toLowerCase()}`, error);
      return stage === 'EXTRACTION'
        ? Rejected.extractionFailed(runId, classification, null, toError(error))
        : Rejected.validationFailed(runId, classification, describeError(error));
    }
  }

  private async extract<T extends ExtractedData>(
    lane: Lane<T>,
    run: RunContext
  ): Promise<{ consensus: ConsensusResult<T> } | { rejected: AutonomousResult<T> }> {
    const { runId, log, classification, images, signal } = run;

    if (this.config.enableEnsemble && lane.ensemble) {
      const ensemble = await lane.ensemble.extract(images, signal);
      throwIfAborted(signal);
      if (!ensemble.hasAnyCandidate) {
        log.error('Both extraction tiers failed');
        return {
          rejected: Rejected.extractionFailed(runId, classification, ensemble.fastError, ensemble.expertError),
        };
      }
      return { consensus: lane.strategy.merge(ensemble.fast, ensemble.expert) };
    }

    if (!lane.single) {
      log.error(`No ${lane.strategy.kind} extraction agent configured`);
      return { rejected: Rejected.noAgentConfigured(runId, classification, lane.strategy.kind) };
    }

    const { tier, agent } = lane.single;
    throwIfAborted(signal);
    try {
      const data = await agent.extract(images, signal);
      return { consensus: { kind: 'single_source', data, source: tier } };
    } catch (error) {
      if (error instanceof PipelineCancelledError || signal?.aborted) {
        throw error;
      }
      log.error(`${tier} extraction failed: ${describeError(error)}`);
      const failure = toError(error);
      return {
        rejected: Rejected.extractionFailed(
          runId,
          classification,
          tier === 'fast' ? failure : null,
          tier === 'expert' ? failure : null
        ),
      };
    }
  }

  /**
   * Null when self-correction is disabled or no retry agent is bound for the
   * lane. Retry-agent errors become still_failing with the triggering
   * failures preserved.
   */
  private async selfCorrect<T extends ExtractedData>(
    lane: Lane<T>,
    data: T,
    auditReport: AuditReport,
    run: RunContext
  ): Promise<RetryResult<T> | null> {
    const { log, signal } = run;

    if (!this.config.enableSelfCorrection) {
      return null;
    }
    if (auditReport.overallStatus === 'PASSED' || auditReport.criticalFailures.length === 0) {
      return { kind: 'no_retry_needed' };
    }
    if (!lane.retry) {
      log.warn(`Self-correction requested but no ${lane.strategy.kind} retry agent is configured`);
      return null;
    }

    log.info(`Self-correcting ${auditReport.criticalFailures.length} critical failure(s)`);
    try {
      return await lane.retry.attemptCorrection(run.images, data, auditReport, signal);
    } catch (error) {
      if (error instanceof PipelineCancelledError || signal?.aborted) {
        throw error;
      }
      log.error(`Retry agent failed: ${describeError(error)}`);
      return {
        kind: 'still_failing',
        data,
        attempts: 0,
        remainingFailures: auditReport.criticalFailures,
        error: describeError(error),
      };
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}
