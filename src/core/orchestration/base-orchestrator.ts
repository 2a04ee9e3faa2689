import type { Logger } from 'pino';
import { createLogger } from '@utils/logger';
import { TimeoutError, toError } from '@utils/errors';
import type {
  OperationContext,
  OrchestratorConfig,
  OrchestratorMetadata,
  OrchestratorResult,
  PipelineStage,
} from './types';

/**
 * Base Orchestrator
 *
 * Runs a fixed list of stages over a shared context. Subclasses provide the
 * context, the stages and the final result; `isComplete` lets a stage finish
 * the run early (the remaining stages are skipped and `buildResult` still runs).
 */
export abstract class BaseOrchestrator<TContext extends OperationContext, TResult, TInput> {
  protected readonly logger: Logger;

  constructor(private readonly config: OrchestratorConfig) {
    this.logger = createLogger(config.name);
  }

  public getName(): string {
    return this.config.name;
  }

  protected abstract initializeContext(input: TInput): Promise<TContext>;

  protected abstract getPipeline(): PipelineStage<TContext>[];

  protected abstract buildResult(ctx: TContext): TResult;

  protected isComplete(_ctx: TContext): boolean {
    return false;
  }

  async execute(input: TInput): Promise<OrchestratorResult<TResult>> {
    const ctx = await this.initializeContext(input);

    try {
      const data = await this.withTimeout(this.runPipeline(ctx));
      return { success: true, data, metadata: this.buildMetadata(ctx) };
    } catch (err) {
      const error = toError(err);
      if (this.config.logErrors) {
        this.logger.error({ err: error, requestId: ctx.requestId }, `${this.config.name} failed`);
      }
      return { success: false, error, metadata: this.buildMetadata(ctx) };
    }
  }

  private async runPipeline(ctx: TContext): Promise<TResult> {
    let current = ctx;

    for (const stage of this.getPipeline()) {
      if (this.isComplete(current)) {
        this.logger.debug({ requestId: current.requestId, stage: stage.name }, 'Pipeline complete, skipping');
        break;
      }

      current.perfTracker.start(stage.name);
      try {
        current = await stage.operation(current);
      } catch (err) {
        const error = toError(err);
        current.errors.push({ stage: stage.name, message: error.message });
        if (stage.critical) throw error;
        this.logger.warn({ err: error, requestId: current.requestId, stage: stage.name }, 'Non-critical stage failed');
      } finally {
        current.perfTracker.end(stage.name);
      }
    }

    return this.buildResult(current);
  }

  private async withTimeout<T>(work: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(`${this.config.name} timed out after ${this.config.timeout}ms`));
      }, this.config.timeout);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private buildMetadata(ctx: TContext): OrchestratorMetadata {
    return {
      orchestrator: this.config.name,
      requestId: ctx.requestId,
      durationMs: Date.now() - ctx.startTime,
      stageDurations: this.config.enableMetrics ? ctx.perfTracker.getMetrics() : undefined,
      errors: ctx.errors,
      reasonCodes: ctx.reasonCodes,
    };
  }
}
