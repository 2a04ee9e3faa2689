import type { PerformanceTracker } from './performance-tracker';

export interface OrchestratorConfig {
  name: string;
  /** Upper bound for the whole pipeline, in milliseconds */
  timeout: number;
  /** Report per-stage durations in the result metadata */
  enableMetrics: boolean;
  logErrors: boolean;
}

export interface StageError {
  stage: string;
  message: string;
}

/**
 * Fields every pipeline context carries. Services extend this with their
 * own inputs and stage outputs.
 */
export interface OperationContext {
  requestId: string;
  startTime: number;
  perfTracker: PerformanceTracker;
  results: Record<string, unknown>;
  errors: StageError[];
  metadata: Record<string, unknown>;
  reasonCodes: string[];
}

export type Operation<TContext extends OperationContext> = (ctx: TContext) => Promise<TContext>;

export interface PipelineStage<TContext extends OperationContext> {
  name: string;
  operation: Operation<TContext>;
  /** A failing critical stage aborts the run; others are recorded and skipped */
  critical: boolean;
}

export interface OrchestratorMetadata {
  orchestrator: string;
  requestId: string;
  durationMs: number;
  stageDurations?: Record<string, number>;
  errors: StageError[];
  reasonCodes: string[];
}

export type OrchestratorResult<T> =
  | { success: true; data: T; metadata: OrchestratorMetadata }
  | { success: false; error: Error; metadata: OrchestratorMetadata };
