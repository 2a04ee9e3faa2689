import { describe, it, expect } from 'vitest';
import {
  collectInsights,
  findDuplicateTexts,
  findNumericConflicts,
  parseTimestamp,
  snippet,
} from './insights';
import type { MessageCandidate } from './types';

const message = (memberName: string, text: string, timestamp: unknown = null): MessageCandidate => ({
  memberId: null,
  memberName,
  text,
  timestamp,
});

describe('parseTimestamp', () => {
  it('accepts the supported layouts', () => {
    expect(parseTimestamp('2024-03-09')?.toISOString()).toBe('2024-03-09T00:00:00.000Z');
    expect(parseTimestamp('2024-03-09T14:05:00')?.toISOString()).toBe('2024-03-09T14:05:00.000Z');
    expect(parseTimestamp('2024-03-09 14:05:00')?.toISOString()).toBe('2024-03-09T14:05:00.000Z');
  });

  it('accepts one-digit months, days and time fields', () => {
    expect(parseTimestamp('2024-3-9')?.toISOString()).toBe('2024-03-09T00:00:00.000Z');
    expect(parseTimestamp('2024-3-9 4:5:6')?.toISOString()).toBe('2024-03-09T04:05:06.000Z');
  });

  it('treats numbers as epoch seconds', () => {
    expect(parseTimestamp(86400)?.toISOString()).toBe('1970-01-02T00:00:00.000Z');
  });

  it('rejects other layouts and impossible dates', () => {
    expect(parseTimestamp('2024-03-09T14:05:00.123Z')).toBeNull();
    expect(parseTimestamp('09/03/2024')).toBeNull();
    expect(parseTimestamp('2024-02-31')).toBeNull();
    expect(parseTimestamp({ at: 1 })).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });
});

describe('findDuplicateTexts', () => {
  it('counts repeated texts, most frequent first', () => {
    const duplicates = findDuplicateTexts([
      message('A', 'Thanks!'),
      message('B', 'See you soon'),
      message('C', 'See you soon'),
      message('D', 'Thanks!'),
      message('E', 'Thanks!'),
      message('F', ''),
      message('G', ''),
      message('H', 'Unique'),
    ]);

    expect(duplicates).toEqual([
      { text: 'Thanks!', count: 3 },
      { text: 'See you soon', count: 2 },
    ]);
  });
});

describe('findNumericConflicts', () => {
  it('flags members with differing numbers in fact-bearing messages', () => {
    const conflicts = findNumericConflicts([
      message('Vikram Desai', 'I have 2 cars in the garage.'),
      message('Vikram Desai', 'We now own 3 cars.'),
      message('Vikram Desai', 'Table for 4 please.'),
      message('Amira Khan', 'My 2 kids love the park.'),
      message('Amira Khan', 'Both 2 kids are at camp.'),
    ]);

    expect(conflicts).toEqual([{ memberName: 'Vikram Desai', values: [['2'], ['3']] }]);
  });
});

describe('collectInsights', () => {
  it('summarizes the collection', () => {
    const insights = collectInsights([
      message('A', '', '2024-01-01'),
      message('B', 'Hello', 'yesterday'),
      message('C', 'Hello', 1700000000),
    ]);

    expect(insights.total).toBe(3);
    expect(insights.blank).toBe(1);
    expect(insights.unparseableTimestamps).toBe(1);
    expect(insights.duplicates).toEqual([{ text: 'Hello', count: 2 }]);
    expect(insights.conflicts).toEqual([]);
  });
});

describe('collectInsights total', () => {
  it('reports the raw payload size when given', () => {
    const insights = collectInsights([message('A', 'Hi')], 3);
    expect(insights.total).toBe(3);
  });
});

describe('snippet', () => {
  it('truncates long text to 77 characters plus an ellipsis', () => {
    const long = 'x'.repeat(81);
    expect(snippet(long)).toBe(`${'x'.repeat(77)}...`);
    expect(snippet('short')).toBe('short');
  });
});
