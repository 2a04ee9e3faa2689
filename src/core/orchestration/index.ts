export { BaseOrchestrator } from './base-orchestrator';
export { DefaultPerformanceTracker } from './performance-tracker';
export type { PerformanceTracker } from './performance-tracker';
export type {
  Operation,
  OperationContext,
  OrchestratorConfig,
  OrchestratorMetadata,
  OrchestratorResult,
  PipelineStage,
  StageError,
} from './types';
