import type { QaContext, QuestionKind } from '../types';
import { QUESTION_KIND_PHRASES } from '../vocabulary';

export function classifyQuestion(question: string): QuestionKind {
  const lower = question.toLowerCase();
  for (const [kind, phrases] of QUESTION_KIND_PHRASES) {
    if (phrases.some((phrase) => lower.includes(phrase))) {
      return kind;
    }
  }
  return 'other';
}

export async function classify(ctx: QaContext): Promise<QaContext> {
  ctx.kind = classifyQuestion(ctx.question);
  ctx.reasonCodes.push(`kind_${ctx.kind}`);

  return ctx;
}
