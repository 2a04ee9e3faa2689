import type { Extraction, QaContext } from '../../types';
import { extractAnswer } from './helpers';

/**
 * ExtractAnswers Operation
 *
 * Runs the extractor for the question kind over each ranked context on its
 * own, keeping successful extractions in rank order.
 */
export async function extractAnswers(ctx: QaContext): Promise<QaContext> {
  const kind = ctx.kind;
  if (!kind || !ctx.rankedContexts) {
    throw new Error('Pipeline incomplete: missing kind or ranked contexts');
  }

  const extractions: Extraction[] = [];
  ctx.rankedContexts.forEach(({ message }, rank) => {
    const text = extractAnswer(kind, ctx.question, message.text);
    if (text) {
      extractions.push({ text, rank, message });
    }
  });

  ctx.extractions = extractions;
  ctx.reasonCodes.push(`extracted_${extractions.length}_answers`);

  return ctx;
}
