import type { QaContext } from '../types';
import { mentionsNumericFact } from '../vocabulary';
import { abstain } from './abstain';

/**
 * FilterRelevant Operation
 *
 * Count questions (and questions about cars, kids, pets...) prefer messages
 * that mention such facts. The narrowing only applies when it leaves
 * something; it runs inside the member scope.
 */
export async function filterRelevant(ctx: QaContext): Promise<QaContext> {
  const space = ctx.searchSpace ?? [];

  if (ctx.kind === 'numeric' || mentionsNumericFact(ctx.question)) {
    const narrowed = space.filter((message) => mentionsNumericFact(message.text));
    if (narrowed.length > 0) {
      ctx.searchSpace = narrowed;
      ctx.reasonCodes.push('numeric_fact_filter');
    } else {
      ctx.reasonCodes.push('numeric_fact_filter_skipped');
    }
  }

  if (!ctx.searchSpace || ctx.searchSpace.length === 0) {
    return abstain(ctx, 'empty_search_space');
  }

  return ctx;
}
