export interface PerformanceTracker {
  start(stage: string): void;
  end(stage: string): number;
  getMetrics(): Record<string, number>;
}

export class DefaultPerformanceTracker implements PerformanceTracker {
  private readonly started = new Map<string, number>();
  private readonly durations: Record<string, number> = {};

  start(stage: string): void {
    this.started.set(stage, performance.now());
  }

  end(stage: string): number {
    const startedAt = this.started.get(stage);
    if (startedAt === undefined) return 0;

    const duration = performance.now() - startedAt;
    this.durations[stage] = duration;
    this.started.delete(stage);
    return duration;
  }

  getMetrics(): Record<string, number> {
    return { ...this.durations };
  }
}
