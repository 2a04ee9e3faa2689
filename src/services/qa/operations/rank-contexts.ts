import type { Message } from '@services/messages';
import type { QaContext } from '../types';

/**
 * Member name first so that "How many cars does Vikram Desai have?" also
 * matches on the name.
 */
export function toDocument(message: Message): string {
  return `${message.memberName}: ${message.text}`.trim();
}

export async function rankContexts(ctx: QaContext): Promise<QaContext> {
  const space = ctx.searchSpace;
  if (!space || space.length === 0) {
    throw new Error('Pipeline incomplete: missing search space');
  }

  const ranked = ctx.deps.ranker.rank(ctx.question, space.map(toDocument));

  ctx.rankedContexts = ranked.slice(0, ctx.policy.topK).flatMap(({ index, score }) => {
    const message = space[index];
    return message ? [{ message, index, score }] : [];
  });
  ctx.reasonCodes.push(`ranked_${ctx.rankedContexts.length}_contexts`);

  return ctx;
}
