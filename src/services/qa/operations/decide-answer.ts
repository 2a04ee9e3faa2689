import type { QaContext } from '../types';
import { FACT_KINDS } from '../vocabulary';
import { abstain } from './abstain';

/**
 * DecideAnswer Operation
 *
 * Best-ranked extraction wins. Without one, fact questions abstain and
 * open-ended ones get the best-ranked message verbatim.
 */
export async function decideAnswer(ctx: QaContext): Promise<QaContext> {
  const [best] = ctx.extractions ?? [];
  if (best) {
    ctx.answer = { text: best.text, outcome: 'extracted' };
    ctx.reasonCodes.push('answer_extracted');
    return ctx;
  }

  if (!ctx.kind || FACT_KINDS.has(ctx.kind)) {
    return abstain(ctx, 'no_extraction');
  }

  const [top] = ctx.rankedContexts ?? [];
  if (!top) {
    return abstain(ctx, 'no_contexts');
  }

  ctx.answer = { text: top.message.text, outcome: 'fallback' };
  ctx.reasonCodes.push('raw_context_fallback');

  return ctx;
}
