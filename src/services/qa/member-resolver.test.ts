import { describe, it, expect } from 'vitest';
import type { Message } from '@services/messages';
import { CapitalizedNameResolver, extractCandidateNames, normalizeForMatch } from './member-resolver';

const message = (memberName: string, text = 'Hello'): Message => ({
  memberId: null,
  memberName,
  text,
  timestamp: null,
});

const messages = [
  message('Vikram Desai', 'I have two cars.'),
  message('Amira Khan', 'Loving the new apartment.'),
  message('Layla Kawaguchi', 'Booked my trip to London.'),
  message('', 'Anonymous note'),
];

describe('normalizeForMatch', () => {
  it('lowercases and collapses non-letters', () => {
    expect(normalizeForMatch("Amira’s  favorite, café!")).toBe('amira s favorite caf');
    expect(normalizeForMatch('  --  ')).toBe('');
  });
});

describe('extractCandidateNames', () => {
  it('captures capitalised runs in order', () => {
    expect(extractCandidateNames('How many cars does Vikram Desai have?')).toEqual(['How', 'Vikram Desai']);
  });

  it('deduplicates repeated names', () => {
    expect(extractCandidateNames('Vikram, did you see vikram? Vikram!')).toEqual(['Vikram']);
  });

  it('joins adjacent capitalised words into one chunk', () => {
    expect(extractCandidateNames('Did Amira call?')).toEqual(['Did Amira']);
  });

  it('finds nothing in a lowercase question', () => {
    expect(extractCandidateNames('what is the best restaurant?')).toEqual([]);
  });
});

describe('CapitalizedNameResolver', () => {
  const resolver = new CapitalizedNameResolver();

  it('scopes to a member whose full name appears in the question', () => {
    const resolution = resolver.resolve('How many cars does Vikram Desai have?', messages);

    expect(resolution.status).toBe('scoped');
    if (resolution.status === 'scoped') {
      expect(resolution.messages.map((m) => m.memberName)).toEqual(['Vikram Desai']);
    }
  });

  it('scopes by a member name written in lowercase', () => {
    const resolution = resolver.resolve('how many cars does vikram desai have?', messages);

    expect(resolution).toEqual({ status: 'scoped', messages: [messages[0]], candidates: [] });
  });

  it('scopes by a first name contained in the member name', () => {
    const resolution = resolver.resolve("When is Layla's trip?", messages);

    expect(resolution.status).toBe('scoped');
    if (resolution.status === 'scoped') {
      expect(resolution.messages.map((m) => m.memberName)).toEqual(['Layla Kawaguchi']);
    }
  });

  it('matches possessives through normalisation', () => {
    const resolution = resolver.resolve('What are Amira’s favorite restaurants?', messages);

    expect(resolution.status).toBe('scoped');
    if (resolution.status === 'scoped') {
      expect(resolution.messages.map((m) => m.memberName)).toEqual(['Amira Khan']);
    }
  });

  it('fails closed on a name nobody has', () => {
    const resolution = resolver.resolve('How many cars does Michael have?', messages);

    expect(resolution).toEqual({ status: 'unknown-member', candidates: ['how', 'michael'] });
  });

  it('searches everything when the question names nobody', () => {
    const resolution = resolver.resolve('who is planning a trip?', messages);

    expect(resolution.status).toBe('unscoped');
    if (resolution.status === 'unscoped') {
      expect(resolution.messages).toBe(messages);
    }
  });

  it('never matches messages without a member name', () => {
    const resolution = resolver.resolve('anything about Anonymous?', messages);
    expect(resolution.status).toBe('unknown-member');
  });
});
