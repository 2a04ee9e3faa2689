import { describe, it, expect } from 'vitest';
import { BaseOrchestrator } from './base-orchestrator';
import { DefaultPerformanceTracker } from './performance-tracker';
import type { OperationContext, PipelineStage } from './types';

interface CounterContext extends OperationContext {
  value: number;
  done: boolean;
}

interface CounterOptions {
  stages: PipelineStage<CounterContext>[];
  timeout?: number;
  enableMetrics?: boolean;
}

class CounterOrchestrator extends BaseOrchestrator<CounterContext, number, number> {
  constructor(private readonly options: CounterOptions) {
    super({
      name: 'CounterOrchestrator',
      timeout: options.timeout ?? 1000,
      enableMetrics: options.enableMetrics ?? false,
      logErrors: false,
    });
  }

  protected async initializeContext(input: number): Promise<CounterContext> {
    return {
      value: input,
      done: false,
      requestId: 'req-1',
      startTime: Date.now(),
      perfTracker: new DefaultPerformanceTracker(),
      results: {},
      errors: [],
      metadata: {},
      reasonCodes: [],
    };
  }

  protected getPipeline(): PipelineStage<CounterContext>[] {
    return this.options.stages;
  }

  protected buildResult(ctx: CounterContext): number {
    return ctx.value;
  }

  protected isComplete(ctx: CounterContext): boolean {
    return ctx.done;
  }
}

const add =
  (amount: number) =>
  async (ctx: CounterContext): Promise<CounterContext> => {
    ctx.value += amount;
    ctx.reasonCodes.push(`added_${amount}`);
    return ctx;
  };

const fail = async (): Promise<CounterContext> => {
  throw new Error('stage exploded');
};

describe('BaseOrchestrator', () => {
  it('runs every stage in order', async () => {
    const orchestrator = new CounterOrchestrator({
      stages: [
        { name: 'add-1', operation: add(1), critical: true },
        { name: 'add-10', operation: add(10), critical: true },
      ],
    });

    const result = await orchestrator.execute(5);

    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(16);
    expect(result.metadata.reasonCodes).toEqual(['added_1', 'added_10']);
    expect(result.metadata.requestId).toBe('req-1');
  });

  it('stops at a failing critical stage', async () => {
    const orchestrator = new CounterOrchestrator({
      stages: [
        { name: 'add-1', operation: add(1), critical: true },
        { name: 'explode', operation: fail, critical: true },
        { name: 'add-10', operation: add(10), critical: true },
      ],
    });

    const result = await orchestrator.execute(0);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('stage exploded');
    expect(result.metadata.errors).toEqual([{ stage: 'explode', message: 'stage exploded' }]);
    expect(result.metadata.reasonCodes).toEqual(['added_1']);
  });

  it('records and skips a failing non-critical stage', async () => {
    const orchestrator = new CounterOrchestrator({
      stages: [
        { name: 'explode', operation: fail, critical: false },
        { name: 'add-10', operation: add(10), critical: true },
      ],
    });

    const result = await orchestrator.execute(0);

    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(10);
    expect(result.metadata.errors).toEqual([{ stage: 'explode', message: 'stage exploded' }]);
  });

  it('skips the remaining stages once the context is complete', async () => {
    const finish = async (ctx: CounterContext): Promise<CounterContext> => {
      ctx.done = true;
      return ctx;
    };
    const orchestrator = new CounterOrchestrator({
      stages: [
        { name: 'add-1', operation: add(1), critical: true },
        { name: 'finish', operation: finish, critical: true },
        { name: 'add-10', operation: add(10), critical: true },
      ],
    });

    const result = await orchestrator.execute(0);

    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(1);
  });

  it('fails with a 504 when the pipeline outlives its timeout', async () => {
    const stall = (ctx: CounterContext) =>
      new Promise<CounterContext>((resolve) => setTimeout(() => resolve(ctx), 200));
    const orchestrator = new CounterOrchestrator({
      timeout: 20,
      stages: [{ name: 'stall', operation: stall, critical: true }],
    });

    const result = await orchestrator.execute(0);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('CounterOrchestrator timed out after 20ms');
      expect(result.error).toMatchObject({ statusCode: 504 });
    }
  });

  it('reports stage durations only when metrics are enabled', async () => {
    const stages = [{ name: 'add-1', operation: add(1), critical: true }];

    const withMetrics = await new CounterOrchestrator({ stages, enableMetrics: true }).execute(0);
    const withoutMetrics = await new CounterOrchestrator({ stages }).execute(0);

    expect(Object.keys(withMetrics.metadata.stageDurations ?? {})).toEqual(['add-1']);
    expect(withoutMetrics.metadata.stageDurations).toBeUndefined();
  });
});
