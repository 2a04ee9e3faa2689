import { BaseOrchestrator, DefaultPerformanceTracker } from '@core/orchestration';
import type { PipelineStage } from '@core/orchestration';
import type { QaContext, QaDependencies, QaInput, QaPolicy, QaResult } from './types';
import { ABSTAIN_ANSWER } from './vocabulary';
import * as ops from './operations';

const DEFAULT_POLICY: QaPolicy = {
  topK: 5,
};

export interface QaOrchestratorOptions {
  policy?: Partial<QaPolicy>;
  timeout?: number;
}

/**
 * QA Orchestrator
 *
 * validate → load → classify → resolve member → filter → rank → extract → decide.
 * Resolving or filtering may settle the answer (abstain), which ends the run.
 */
export class QaOrchestrator extends BaseOrchestrator<QaContext, QaResult, QaInput> {
  private readonly policy: QaPolicy;

  constructor(
    private readonly deps: QaDependencies,
    options: QaOrchestratorOptions = {}
  ) {
    super({
      name: 'QaOrchestrator',
      timeout: options.timeout ?? 30000,
      enableMetrics: true,
      logErrors: true,
    });
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
  }

  protected async initializeContext(input: QaInput): Promise<QaContext> {
    return {
      question: input.question,
      policy: { ...this.policy, ...input.policy },
      deps: this.deps,
      requestId: input.requestId ?? Math.random().toString(36).slice(2, 11),
      startTime: Date.now(),
      perfTracker: new DefaultPerformanceTracker(),
      results: {},
      errors: [],
      metadata: { orchestrator: this.getName() },
      reasonCodes: [],
    };
  }

  protected getPipeline(): PipelineStage<QaContext>[] {
    return [
      { name: 'validate-input', operation: ops.validateInput, critical: true },
      { name: 'load-messages', operation: ops.loadMessages, critical: true },
      { name: 'classify-question', operation: ops.classify, critical: true },
      { name: 'resolve-member', operation: ops.resolveMember, critical: true },
      { name: 'filter-relevant', operation: ops.filterRelevant, critical: true },
      { name: 'rank-contexts', operation: ops.rankContexts, critical: true },
      { name: 'extract-answers', operation: ops.extractAnswers, critical: true },
      { name: 'decide-answer', operation: ops.decideAnswer, critical: true },
    ];
  }

  protected isComplete(ctx: QaContext): boolean {
    return ctx.answer !== undefined;
  }

  protected buildResult(ctx: QaContext): QaResult {
    if (!ctx.kind) {
      throw new Error('Pipeline incomplete: missing question kind');
    }

    return {
      answer: ctx.answer?.text ?? ABSTAIN_ANSWER,
      outcome: ctx.answer?.outcome ?? 'abstained',
      kind: ctx.kind,
      reasonCodes: ctx.reasonCodes,
    };
  }
}
