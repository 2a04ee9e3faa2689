import type { QaContext } from '../types';
import { ValidationError } from '@utils/errors';

/**
 * ValidateInput Operation
 *
 * Rejects blank questions before anything is fetched.
 */
export async function validateInput(ctx: QaContext): Promise<QaContext> {
  const question = ctx.question.trim();
  if (!question) {
    throw new ValidationError("Query parameter 'q' must not be empty.");
  }

  ctx.question = question;
  ctx.reasonCodes.push('input_valid');

  return ctx;
}
