import type { QaContext } from '../types';
import { abstain } from './abstain';

/**
 * ResolveMember Operation
 *
 * Scopes the search to the members the question is about. An unrecognised
 * name ends the request with the abstain answer.
 */
export async function resolveMember(ctx: QaContext): Promise<QaContext> {
  if (!ctx.messages) {
    throw new Error('Pipeline incomplete: missing messages');
  }

  const resolution = ctx.deps.resolver.resolve(ctx.question, ctx.messages);
  ctx.resolution = resolution;

  if (resolution.status === 'unknown-member') {
    return abstain(ctx, 'unknown_member');
  }

  ctx.searchSpace = resolution.messages;
  ctx.reasonCodes.push(resolution.status === 'scoped' ? 'member_scoped' : 'all_members');

  return ctx;
}
