import { findPlace } from './places';

const MONTH =
  'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';

const ABSOLUTE_DATE = new RegExp(
  [
    '\\b(?:',
    '\\d{4}-\\d{2}-\\d{2}',
    '|\\d{1,2}[/-]\\d{1,2}(?:[/-]\\d{2,4})?',
    `|(?:${MONTH})\\s+\\d{1,2}(?:,\\s*\\d{2,4})?`,
    ')\\b',
  ].join(''),
  'i'
);

const RELATIVE_DATE =
  /\b(?:next|this|coming)\s+(?:week|month|year|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/i;

const MONTH_ONLY = new RegExp(`\\b(?:${MONTH})\\b`, 'i');

/**
 * A date-like phrase from the context. When the question asks about a trip
 * to somewhere, the context has to mention that place too.
 */
export function extractDate(question: string, context: string): string | null {
  const destination = findPlace(question);
  if (destination && !context.toLowerCase().includes(destination.toLowerCase())) {
    return null;
  }

  for (const pattern of [ABSOLUTE_DATE, RELATIVE_DATE, MONTH_ONLY]) {
    const match = pattern.exec(context);
    if (match) return match[0];
  }
  return null;
}
