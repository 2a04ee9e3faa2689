import type { MessageCandidate } from './types';

/**
 * Data-quality checks over the raw upstream collection, used by
 * `scripts/inspect-data.ts`.
 */

const FACT_TOKENS = ['car', 'cars', 'children', 'kids', 'pets', 'dogs', 'cats'];

const TIMESTAMP_PATTERNS = [
  /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
  /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
  /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/,
];

export interface DuplicateText {
  text: string;
  count: number;
}

export interface NumericConflict {
  memberName: string;
  values: string[][];
}

export interface DataInsights {
  total: number;
  blank: number;
  unparseableTimestamps: number;
  duplicates: DuplicateText[];
  conflicts: NumericConflict[];
}

/**
 * Epoch seconds, or one of the three ISO-like layouts with real calendar values.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (!value) return null;

  if (typeof value === 'number') {
    const date = new Date(value * 1000);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  if (typeof value !== 'string') return null;

  for (const pattern of TIMESTAMP_PATTERNS) {
    const match = pattern.exec(value);
    if (!match) continue;

    const [year, month, day, hour = 0, minute = 0, second = 0] = match.slice(1).map(Number);
    if (year === undefined || month === undefined || day === undefined) continue;

    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    // Date.UTC rolls 2024-02-31 over into March; reject anything that moved
    if (
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day &&
      date.getUTCHours() === hour &&
      date.getUTCMinutes() === minute &&
      date.getUTCSeconds() === second
    ) {
      return date;
    }
  }

  return null;
}

export function findDuplicateTexts(messages: MessageCandidate[]): DuplicateText[] {
  const counts = new Map<string, number>();
  for (const { text } of messages) {
    if (!text) continue;
    counts.set(text, (counts.get(text) ?? 0) + 1);
  }

  return [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([text, count]) => ({ text, count }))
    .sort((a, b) => b.count - a.count);
}

/**
 * Members whose fact-bearing messages mention different sets of integers.
 * Very rough: "2 cars" and "2 cars, 1 bike" already count as a conflict.
 */
export function findNumericConflicts(messages: MessageCandidate[]): NumericConflict[] {
  const byMember = new Map<string, Map<string, string[]>>();

  for (const message of messages) {
    const text = message.text.toLowerCase();
    if (!FACT_TOKENS.some((token) => text.includes(token))) continue;

    const numbers = text.match(/\b\d+\b/g);
    if (!numbers) continue;

    const values = byMember.get(message.memberName) ?? new Map<string, string[]>();
    values.set(numbers.join(','), numbers);
    byMember.set(message.memberName, values);
  }

  return [...byMember.entries()]
    .filter(([, values]) => values.size > 1)
    .map(([memberName, values]) => ({
      memberName,
      values: [...values.keys()].sort().map((key) => values.get(key) ?? []),
    }));
}

/**
 * `total` is the raw item count of the payload, which can exceed
 * `messages.length` when non-object items were dropped.
 */
export function collectInsights(messages: MessageCandidate[], total = messages.length): DataInsights {
  return {
    total,
    blank: messages.filter((m) => !m.text).length,
    unparseableTimestamps: messages.filter((m) => m.timestamp && parseTimestamp(m.timestamp) === null)
      .length,
    duplicates: findDuplicateTexts(messages),
    conflicts: findNumericConflicts(messages),
  };
}

export function snippet(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
