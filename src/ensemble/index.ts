export { ConsensusEngine, CRITICAL_FIELDS } from './ConsensusEngine.js';
export type { ConsensusEngineOptions, FieldKind, FieldSpec } from './ConsensusEngine.js';
export { PerceptionEnsemble } from './PerceptionEnsemble.js';
export type { PerceptionEnsembleOptions } from './PerceptionEnsemble.js';
export { createConflictReport, consensusData, consensusReport, summarizeConflicts } from './types.js';
export type {
  ConflictReport,
  ConflictSeverity,
  ConsensusResult,
  EnsembleResult,
  FieldConflict,
  ModelTier,
  ModelWeight,
} from './types.js';
