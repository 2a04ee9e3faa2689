import { mentionsNumericFact } from '../../../vocabulary';

const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const NUMBER = /\b\d+(?:\.\d+)?\b/;

/**
 * First number of the first sentence that mentions a countable fact and
 * has a number in it.
 */
export function extractNumericFact(context: string): string | null {
  for (const sentence of context.split(SENTENCE_BREAK)) {
    if (!mentionsNumericFact(sentence)) continue;

    const match = NUMBER.exec(sentence);
    if (match) return match[0];
  }
  return null;
}
