import type { QaContext } from '../types';

export async function loadMessages(ctx: QaContext): Promise<QaContext> {
  ctx.messages = await ctx.deps.source.fetchMessages();
  ctx.reasonCodes.push('messages_loaded');

  return ctx;
}
