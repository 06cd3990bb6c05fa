export { ConfigLoader } from './ConfigLoader.js';
export {
  DEFAULT_PIPELINE_CONFIG,
  PIPELINE_PRESETS,
  createPipelineConfig,
  isPresetName,
  mergePipelineConfig,
  validatePipelineConfig,
} from './PipelineConfig.js';
export type {
  PipelineConfig,
  PipelineConfigOverrides,
  PipelinePresetName,
  ValidationResult,
} from './PipelineConfig.js';
