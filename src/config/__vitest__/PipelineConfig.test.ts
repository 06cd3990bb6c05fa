import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PIPELINE_CONFIG,
  createPipelineConfig,
  isPresetName,
  mergePipelineConfig,
  validatePipelineConfig,
} from '../PipelineConfig.js';

describe('createPipelineConfig', () => {
  it('returns the defaults without preset or overrides', () => {
    expect(createPipelineConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('applies a preset over the defaults', () => {
    const config = createPipelineConfig('fast');
    expect(config.enableEnsemble).toBe(false);
    expect(config.enableSelfCorrection).toBe(false);
    expect(config.maxRetries).toBe(2);
  });

  it('lets explicit overrides win over the preset', () => {
    const config = createPipelineConfig('thorough', { maxRetries: 1 });
    expect(config.maxRetries).toBe(1);
    expect(config.enabledChecks).toHaveLength(6);
  });

  it('merges judgment settings key by key', () => {
    const config = createPipelineConfig(undefined, { judgment: { minConfidenceForAutoApprove: 0.9 } });
    expect(config.judgment.minConfidenceForAutoApprove).toBe(0.9);
    expect(config.judgment.clearCutConfidence).toBe(0.85);
  });
});

describe('mergePipelineConfig', () => {
  it('does not share the enabled checks array with its input', () => {
    const checks: ('MATH' | 'VAT_RATE')[] = ['MATH'];
    const merged = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, { enabledChecks: checks });
    checks.push('VAT_RATE');
    expect(merged.enabledChecks).toEqual(['MATH']);
  });
});

describe('isPresetName', () => {
  it('recognizes the built-in presets only', () => {
    expect(isPresetName('offline')).toBe(true);
    expect(isPresetName('turbo')).toBe(false);
    expect(isPresetName('toString')).toBe(false);
  });
});

describe('validatePipelineConfig', () => {
  it('accepts the defaults without warnings', () => {
    expect(validatePipelineConfig(DEFAULT_PIPELINE_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('rejects an out-of-range classification threshold', () => {
    const result = validatePipelineConfig(createPipelineConfig(undefined, { minClassificationConfidence: 1.5 }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['minClassificationConfidence must be between 0 and 1']);
  });

  it('rejects a negative retry budget', () => {
    const result = validatePipelineConfig(createPipelineConfig(undefined, { maxRetries: -1 }));
    expect(result.errors).toEqual(['maxRetries must be a non-negative integer']);
  });

  it('warns about a large retry budget', () => {
    const result = validatePipelineConfig(createPipelineConfig(undefined, { maxRetries: 6 }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['maxRetries=6 will make failing documents slow to settle']);
  });

  it('warns when registry checks run without external validation', () => {
    const result = validatePipelineConfig(
      createPipelineConfig(undefined, { enabledChecks: ['MATH', 'COMPANY_EXISTS'] })
    );
    expect(result.warnings).toEqual([
      'COMPANY_EXISTS enabled but external validation is off; they will report incomplete',
    ]);
  });

  it('warns when self-correction has no retries', () => {
    const result = validatePipelineConfig(createPipelineConfig(undefined, { maxRetries: 0 }));
    expect(result.warnings).toEqual(['Self-correction is enabled with maxRetries=0; no retry will run']);
  });

  it('rejects judgment thresholds outside 0..1', () => {
    const result = validatePipelineConfig(
      createPipelineConfig(undefined, { judgment: { clearCutConfidence: 2 } })
    );
    expect(result.errors).toEqual(['judgment.clearCutConfidence must be between 0 and 1']);
  });
});
