import type { OrchestratorResult } from '@core/orchestration';
import { TfidfRanker } from '@services/ranking';
import type { MessageSource } from '@services/messages';
import { CapitalizedNameResolver } from './member-resolver';
import { QaOrchestrator } from './orchestrator';
import type { QaOrchestratorOptions } from './orchestrator';
import type { QaDependencies, QaPolicy, QaResult } from './types';

/**
 * QA Service
 *
 * Answers questions about members from their messages. Collaborators are
 * passed in; the defaults rank with TF-IDF and resolve members by name.
 */
export class QaService {
  private readonly orchestrator: QaOrchestrator;

  constructor(deps: QaDependencies, options: QaOrchestratorOptions = {}) {
    this.orchestrator = new QaOrchestrator(deps, options);
  }

  async ask(
    question: string,
    options: { requestId?: string; policy?: Partial<QaPolicy> } = {}
  ): Promise<OrchestratorResult<QaResult>> {
    return this.orchestrator.execute({
      question,
      requestId: options.requestId,
      policy: options.policy,
    });
  }
}

export function createQaService(
  source: MessageSource,
  options: QaOrchestratorOptions = {}
): QaService {
  return new QaService(
    { source, resolver: new CapitalizedNameResolver(), ranker: new TfidfRanker() },
    options
  );
}

export { QaOrchestrator } from './orchestrator';
export type { QaOrchestratorOptions } from './orchestrator';
export { CapitalizedNameResolver, extractCandidateNames, normalizeForMatch } from './member-resolver';
export { classifyQuestion } from './operations';
export { ABSTAIN_ANSWER } from './vocabulary';
export type * from './types';
