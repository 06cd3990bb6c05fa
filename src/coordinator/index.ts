export { AutonomousProcessingCoordinator } from './AutonomousProcessingCoordinator.js';
export type {
  AgentRegistry,
  CoordinatorOptions,
  LaneAgents,
  ProcessOptions,
} from './AutonomousProcessingCoordinator.js';
export {
  Rejected,
  SILENCE_GOAL_RATE,
  calculateProcessingStats,
  isSuccess,
  successView,
} from './AutonomousResult.js';
export type {
  AutonomousRejected,
  AutonomousResult,
  AutonomousSuccess,
  ProcessingStats,
  RejectionStage,
  SuccessView,
} from './AutonomousResult.js';
export { createDocumentStrategies } from './DocumentStrategies.js';
export type { DocumentStrategies, DocumentStrategy } from './DocumentStrategies.js';
