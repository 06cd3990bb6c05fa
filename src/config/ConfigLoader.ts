import { promises as fs } from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import type { PipelineConfig, PipelineConfigOverrides } from './PipelineConfig.js';
import {
  DEFAULT_PIPELINE_CONFIG,
  PIPELINE_PRESETS,
  isPresetName,
  mergePipelineConfig,
  validatePipelineConfig,
} from './PipelineConfig.js';
import { isCheckType } from '../audit/types.js';
import type { CheckType } from '../audit/types.js';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type Env = Record<string, string | undefined>;

function envBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${env[name]}"`);
}

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

function envChecks(env: Env, name: string): CheckType[] | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const values = raw.split(',').map(v => v.trim().toUpperCase()).filter(v => v.length > 0);
  const unknown = values.filter(v => !isCheckType(v));
  if (unknown.length > 0) {
    throw new ConfigurationError(`${name} contains unknown check types: ${unknown.join(', ')}`);
  }
  return values.filter(isCheckType);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader for the processing pipeline
 * Supports loading from a JSON file, a named preset and environment variables
 */
export class ConfigLoader {

  /**
   * Load pipeline configuration.
   *
   * Priority order (later wins):
   * 1. Built-in defaults
   * 2. JSON file (explicit path, PIPELINE_CONFIG_PATH, or ./config/pipeline-config.json)
   * 3. Preset named by the file's "preset" key or PIPELINE_PRESET
   * 4. Individual environment variables
   */
  static async loadPipelineConfig(configPath?: string, env: Env = process.env): Promise<PipelineConfig> {
    if (env === process.env) {
      dotenv.config();
    }

    const finalPath = configPath
      || env.PIPELINE_CONFIG_PATH
      || path.join(process.cwd(), 'config', 'pipeline-config.json');

    const fileOverrides = await this.readConfigFile(finalPath, configPath !== undefined);

    const presetName = env.PIPELINE_PRESET?.trim() || fileOverrides.preset;
    let presetOverrides: PipelineConfigOverrides = {};
    if (presetName) {
      if (!isPresetName(presetName)) {
        throw new ConfigurationError(`Unknown pipeline preset: ${presetName}`);
      }
      presetOverrides = PIPELINE_PRESETS[presetName];
      logger.info(`Using pipeline preset: ${presetName}`);
    }

    const config = mergePipelineConfig(
      DEFAULT_PIPELINE_CONFIG,
      fileOverrides.overrides,
      presetOverrides,
      this.envOverrides(env)
    );

    const validation = validatePipelineConfig(config);
    if (!validation.valid) {
      logger.error('Invalid pipeline configuration:', validation.errors);
      throw new ConfigurationError(
        `Configuration validation failed: ${validation.errors.join(', ')}`,
        validation.errors
      );
    }

    if (validation.warnings.length > 0) {
      logger.warn('Configuration warnings:', validation.warnings);
    }

    logger.info(
      `Pipeline config loaded (ensemble=${config.enableEnsemble}, selfCorrection=${config.enableSelfCorrection}, ` +
      `jurisdiction=${config.jurisdiction})`
    );
    return config;
  }

  /**
   * Read the optional JSON file. A missing file is only an error when the
   * caller named it explicitly.
   */
  private static async readConfigFile(
    filePath: string,
    required: boolean
  ): Promise<{ overrides: PipelineConfigOverrides; preset?: string }> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (required) {
        throw new ConfigurationError(`Config file not readable: ${filePath} (${describeError(error)})`);
      }
      logger.debug(`Config file not found: ${filePath}, using defaults`);
      return { overrides: {} };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Config file is not valid JSON: ${filePath} (${describeError(error)})`);
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config file must contain a JSON object: ${filePath}`);
    }

    logger.info(`Loaded pipeline config from: ${filePath}`);
    const { preset, ...rest } = parsed;
    return {
      overrides: this.parseOverrides(rest, filePath),
      preset: typeof preset === 'string' ? preset : undefined,
    };
  }

  /**
   * Check the types of a config object read from JSON.
   */
  static parseOverrides(source: Record<string, unknown>, origin = 'config'): PipelineConfigOverrides {
    const overrides: PipelineConfigOverrides = {};
    const problems: string[] = [];

    const booleanKeys = [
      'enableEnsemble',
      'parallelExtraction',
      'enableSelfCorrection',
      'enableExternalValidation',
      'useLlmForJudgment',
      'failFastOnUnknownType',
    ] as const;
    const numberKeys = [
      'minClassificationConfidence',
      'maxRetries',
      'amountEpsilon',
      'mathTolerance',
      'vatToleranceBp',
      'companyNameMatchThreshold',
    ] as const;

    for (const key of booleanKeys) {
      const value = source[key];
      if (value === undefined) continue;
      if (typeof value === 'boolean') overrides[key] = value;
      else problems.push(`${key} must be a boolean`);
    }

    for (const key of numberKeys) {
      const value = source[key];
      if (value === undefined) continue;
      if (typeof value === 'number') overrides[key] = value;
      else problems.push(`${key} must be a number`);
    }

    if (source.jurisdiction !== undefined) {
      if (typeof source.jurisdiction === 'string') overrides.jurisdiction = source.jurisdiction.toUpperCase();
      else problems.push('jurisdiction must be a string');
    }

    if (source.enabledChecks !== undefined) {
      const checks = source.enabledChecks;
      if (Array.isArray(checks) && checks.every((c): c is string => typeof c === 'string' && isCheckType(c))) {
        overrides.enabledChecks = checks.filter(isCheckType);
      } else {
        problems.push('enabledChecks must be a list of known check types');
      }
    }

    if (source.judgment !== undefined) {
      const judgment = source.judgment;
      if (!isRecord(judgment)) {
        problems.push('judgment must be an object');
      } else {
        const parsedJudgment: PipelineConfigOverrides['judgment'] = {};
        for (const key of ['minConfidenceForAutoApprove', 'maxWarningsForAutoApprove', 'clearCutConfidence', 'lowConfidenceCutoff'] as const) {
          const value = judgment[key];
          if (value === undefined) continue;
          if (typeof value === 'number') parsedJudgment[key] = value;
          else problems.push(`judgment.${key} must be a number`);
        }
        if (judgment.autoApproveWithWarnings !== undefined) {
          if (typeof judgment.autoApproveWithWarnings === 'boolean') {
            parsedJudgment.autoApproveWithWarnings = judgment.autoApproveWithWarnings;
          } else {
            problems.push('judgment.autoApproveWithWarnings must be a boolean');
          }
        }
        overrides.judgment = parsedJudgment;
      }
    }

    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid ${origin}: ${problems.join(', ')}`, problems);
    }
    return overrides;
  }

  /**
   * Environment variable overrides. Only variables that are set take part.
   */
  static envOverrides(env: Env): PipelineConfigOverrides {
    const overrides: PipelineConfigOverrides = {};

    const enableEnsemble = envBoolean(env, 'ENABLE_ENSEMBLE');
    if (enableEnsemble !== undefined) overrides.enableEnsemble = enableEnsemble;
    const parallelExtraction = envBoolean(env, 'PARALLEL_EXTRACTION');
    if (parallelExtraction !== undefined) overrides.parallelExtraction = parallelExtraction;
    const enableSelfCorrection = envBoolean(env, 'ENABLE_SELF_CORRECTION');
    if (enableSelfCorrection !== undefined) overrides.enableSelfCorrection = enableSelfCorrection;
    const enableExternalValidation = envBoolean(env, 'ENABLE_EXTERNAL_VALIDATION');
    if (enableExternalValidation !== undefined) overrides.enableExternalValidation = enableExternalValidation;
    const useLlm = envBoolean(env, 'USE_LLM_JUDGMENT');
    if (useLlm !== undefined) overrides.useLlmForJudgment = useLlm;
    const failFast = envBoolean(env, 'FAIL_FAST_ON_UNKNOWN_TYPE');
    if (failFast !== undefined) overrides.failFastOnUnknownType = failFast;

    const maxRetries = envNumber(env, 'MAX_RETRIES');
    if (maxRetries !== undefined) overrides.maxRetries = maxRetries;
    const minConfidence = envNumber(env, 'MIN_CLASSIFICATION_CONFIDENCE');
    if (minConfidence !== undefined) overrides.minClassificationConfidence = minConfidence;

    const enabledChecks = envChecks(env, 'ENABLED_CHECKS');
    if (enabledChecks !== undefined) overrides.enabledChecks = enabledChecks;

    const jurisdiction = env.VAT_JURISDICTION?.trim();
    if (jurisdiction) overrides.jurisdiction = jurisdiction.toUpperCase();

    return overrides;
  }

  /**
   * Export configuration to environment variables format
   */
  static exportToEnv(config: PipelineConfig): string[] {
    return [
      `ENABLE_ENSEMBLE=${config.enableEnsemble}`,
      `PARALLEL_EXTRACTION=${config.parallelExtraction}`,
      `ENABLE_SELF_CORRECTION=${config.enableSelfCorrection}`,
      `ENABLE_EXTERNAL_VALIDATION=${config.enableExternalValidation}`,
      `USE_LLM_JUDGMENT=${config.useLlmForJudgment}`,
      `FAIL_FAST_ON_UNKNOWN_TYPE=${config.failFastOnUnknownType}`,
      `MAX_RETRIES=${config.maxRetries}`,
      `MIN_CLASSIFICATION_CONFIDENCE=${config.minClassificationConfidence}`,
      `ENABLED_CHECKS=${config.enabledChecks.join(',')}`,
      `VAT_JURISDICTION=${config.jurisdiction}`,
    ];
  }

  /**
   * Save configuration to a JSON file
   */
  static async savePipelineConfig(config: PipelineConfig, outputPath: string): Promise<void> {
    const validation = validatePipelineConfig(config);
    if (!validation.valid) {
      throw new ConfigurationError(
        `Cannot save invalid configuration: ${validation.errors.join(', ')}`,
        validation.errors
      );
    }

    await fs.writeFile(outputPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
    logger.info(`Saved pipeline config to: ${outputPath}`);
  }
}
