import type { QuestionKind } from './types';

export const ABSTAIN_ANSWER = "I don't know based on the available messages.";

/** Kinds that must abstain rather than echo a raw message */
export const FACT_KINDS: ReadonlySet<QuestionKind> = new Set(['numeric', 'when', 'where', 'favorite']);

/** Checked in this order; the first kind with a matching phrase wins */
export const QUESTION_KIND_PHRASES: ReadonlyArray<readonly [QuestionKind, readonly string[]]> = [
  ['numeric', ['how many', 'number of', 'count of']],
  ['when', ['when', 'what date', 'what day']],
  ['where', ['where', 'which city', 'which country']],
  ['favorite', ['favorite', 'favourite', 'what are', 'list of']],
];

/** Countable facts worth narrowing the search to */
export const NUMERIC_FACT_KEYWORDS = [
  'car',
  'cars',
  'child',
  'children',
  'kid',
  'kids',
  'pet',
  'pets',
  'dog',
  'dogs',
  'cat',
  'cats',
] as const;

export const PREFERENCE_KEYWORDS = [
  'favorite',
  'favourite',
  'love',
  'loves',
  'like',
  'likes',
  'prefer',
  'prefers',
  'preference',
  'preferences',
] as const;

export function mentionsNumericFact(text: string): boolean {
  const lower = text.toLowerCase();
  return NUMERIC_FACT_KEYWORDS.some((keyword) => lower.includes(keyword));
}
