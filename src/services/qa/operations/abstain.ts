import type { QaContext } from '../types';
import { ABSTAIN_ANSWER } from '../vocabulary';

export function abstain(ctx: QaContext, reasonCode: string): QaContext {
  ctx.answer = { text: ABSTAIN_ANSWER, outcome: 'abstained' };
  ctx.reasonCodes.push(reasonCode);
  return ctx;
}
