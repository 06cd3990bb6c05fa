/**
 * Pipeline configuration schema, defaults, presets and validation
 */

import type { CheckType } from '../audit/types.js';
import { isCheckType } from '../audit/types.js';
import type { JudgmentConfig } from '../judgment/types.js';
import { DEFAULT_JUDGMENT_CONFIG } from '../judgment/types.js';

export interface PipelineConfig {
  /** Run both fast and expert agents and reconcile them */
  enableEnsemble: boolean;
  /** Start both ensemble calls at once instead of one after the other */
  parallelExtraction: boolean;
  enableSelfCorrection: boolean;
  /** Allow checks that consult the business registry */
  enableExternalValidation: boolean;
  useLlmForJudgment: boolean;
  failFastOnUnknownType: boolean;
  minClassificationConfidence: number;
  maxRetries: number;
  enabledChecks: CheckType[];
  /** Jurisdiction code of the VAT-rate table, e.g. "BE" */
  jurisdiction: string;
  /** Largest difference at which two extracted amounts still agree */
  amountEpsilon: number;
  /** Rounding tolerance of the arithmetic check, in currency units */
  mathTolerance: number;
  /** VAT-rate tolerance band in basis points */
  vatToleranceBp: number;
  /** Similarity at or above which an extracted company name matches the registry */
  companyNameMatchThreshold: number;
  judgment: JudgmentConfig;
}

/**
 * Config file / preset shape: every key optional, judgment merged key by key
 */
export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'judgment'>> & {
  judgment?: Partial<JudgmentConfig>;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  enableEnsemble: true,
  parallelExtraction: true,
  enableSelfCorrection: true,
  enableExternalValidation: false,
  useLlmForJudgment: false,
  failFastOnUnknownType: true,
  minClassificationConfidence: 0.3,
  maxRetries: 2,
  enabledChecks: ['MATH', 'CHECKSUM_IBAN', 'CHECKSUM_OGM', 'VAT_RATE'],
  jurisdiction: 'BE',
  amountEpsilon: 0.005,
  mathTolerance: 0.01,
  vatToleranceBp: 50,
  companyNameMatchThreshold: 0.85,
  judgment: DEFAULT_JUDGMENT_CONFIG,
};

export type PipelinePresetName = 'fast' | 'thorough' | 'offline' | 'development';

/**
 * Named bundles of the same options. A preset carries no behavior of its own.
 */
export const PIPELINE_PRESETS: Record<PipelinePresetName, PipelineConfigOverrides> = {
  // Single model, no correction round-trips
  fast: {
    enableEnsemble: false,
    enableSelfCorrection: false,
    enableExternalValidation: false,
    useLlmForJudgment: false,
  },
  thorough: {
    enableEnsemble: true,
    parallelExtraction: true,
    enableSelfCorrection: true,
    enableExternalValidation: true,
    useLlmForJudgment: true,
    maxRetries: 3,
    enabledChecks: ['MATH', 'CHECKSUM_IBAN', 'CHECKSUM_OGM', 'VAT_RATE', 'COMPANY_EXISTS', 'COMPANY_NAME'],
  },
  // Nothing leaves the process except the extraction agents
  offline: {
    enableExternalValidation: false,
    useLlmForJudgment: false,
    enabledChecks: ['MATH', 'CHECKSUM_IBAN', 'CHECKSUM_OGM', 'VAT_RATE'],
  },
  development: {
    parallelExtraction: false,
    maxRetries: 1,
    failFastOnUnknownType: false,
    enableExternalValidation: false,
    useLlmForJudgment: false,
  },
};

export function isPresetName(value: string): value is PipelinePresetName {
  return Object.hasOwn(PIPELINE_PRESETS, value);
}

/**
 * Merge overrides over a base config; later overrides win.
 */
export function mergePipelineConfig(
  base: PipelineConfig,
  ...overrides: PipelineConfigOverrides[]
): PipelineConfig {
  return overrides.reduce<PipelineConfig>(
    (acc, override) => ({
      ...acc,
      ...override,
      enabledChecks: override.enabledChecks ? [...override.enabledChecks] : acc.enabledChecks,
      judgment: { ...acc.judgment, ...override.judgment },
    }),
    base
  );
}

/**
 * Build a config from a preset plus explicit overrides.
 */
export function createPipelineConfig(
  preset?: PipelinePresetName,
  overrides: PipelineConfigOverrides = {}
): PipelineConfig {
  return mergePipelineConfig(
    DEFAULT_PIPELINE_CONFIG,
    preset ? PIPELINE_PRESETS[preset] : {},
    overrides
  );
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Validate a pipeline configuration
 */
export function validatePipelineConfig(config: PipelineConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!inUnitRange(config.minClassificationConfidence)) {
    errors.push('minClassificationConfidence must be between 0 and 1');
  }

  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    errors.push('maxRetries must be a non-negative integer');
  } else if (config.maxRetries > 5) {
    warnings.push(`maxRetries=${config.maxRetries} will make failing documents slow to settle`);
  }

  for (const check of config.enabledChecks) {
    if (!isCheckType(check)) {
      errors.push(`Unknown check type: ${String(check)}`);
    }
  }

  if (!config.jurisdiction) {
    errors.push('jurisdiction is required');
  }

  if (!(config.amountEpsilon >= 0)) {
    errors.push('amountEpsilon must be >= 0');
  }
  if (!(config.mathTolerance >= 0)) {
    errors.push('mathTolerance must be >= 0');
  }
  if (!(config.vatToleranceBp >= 0)) {
    errors.push('vatToleranceBp must be >= 0');
  }
  if (!inUnitRange(config.companyNameMatchThreshold)) {
    errors.push('companyNameMatchThreshold must be between 0 and 1');
  }

  const { judgment } = config;
  if (!inUnitRange(judgment.minConfidenceForAutoApprove)) {
    errors.push('judgment.minConfidenceForAutoApprove must be between 0 and 1');
  }
  if (!inUnitRange(judgment.clearCutConfidence)) {
    errors.push('judgment.clearCutConfidence must be between 0 and 1');
  }
  if (!inUnitRange(judgment.lowConfidenceCutoff)) {
    errors.push('judgment.lowConfidenceCutoff must be between 0 and 1');
  }
  if (!Number.isInteger(judgment.maxWarningsForAutoApprove) || judgment.maxWarningsForAutoApprove < 0) {
    errors.push('judgment.maxWarningsForAutoApprove must be a non-negative integer');
  }

  const registryChecks = config.enabledChecks.filter(c => c === 'COMPANY_EXISTS' || c === 'COMPANY_NAME');
  if (registryChecks.length > 0 && !config.enableExternalValidation) {
    warnings.push(`${registryChecks.join(', ')} enabled but external validation is off; they will report incomplete`);
  }

  if (config.enableSelfCorrection && config.maxRetries === 0) {
    warnings.push('Self-correction is enabled with maxRetries=0; no retry will run');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
