import type { QuestionKind } from '../../../types';
import { extractDate } from './dates';
import { extractNumericFact } from './numeric';
import { extractSnippet } from './open-ended';
import { findPlace } from './places';
import { extractPreference } from './preferences';

/**
 * Short answer from a single message, or null when this message does not
 * answer a question of the given kind.
 */
export function extractAnswer(kind: QuestionKind, question: string, context: string): string | null {
  const text = context.trim();

  switch (kind) {
    case 'numeric':
      return extractNumericFact(text);
    case 'when':
      return extractDate(question, text);
    case 'where':
      return findPlace(text);
    case 'favorite':
      return extractPreference(text);
    case 'other':
      return extractSnippet(text);
  }
}

export { extractDate, extractNumericFact, extractPreference, extractSnippet, findPlace };
