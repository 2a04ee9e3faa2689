import type { Message } from '@services/messages';
import type { MemberResolution, MemberResolver } from './types';

// A capitalised word, optionally followed by more: "Michael", "Vikram Desai"
const CAPITALIZED_RUN = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g;

/**
 * Lowercase and collapse everything outside a-z into single spaces, so
 * "Amira’s" and "amira s" compare equal.
 */
export function normalizeForMatch(text: string): string {
  return text.toLowerCase().replace(/[^a-z]+/g, ' ').trim();
}

/**
 * Capitalised word runs of the question, deduplicated case-insensitively in
 * first-seen order. Sentence-initial words ("When", "How") are included.
 */
export function extractCandidateNames(question: string): string[] {
  const seen = new Set<string>();
  const names: string[] = [];

  for (const [chunk] of question.matchAll(CAPITALIZED_RUN)) {
    const key = chunk.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      names.push(chunk);
    }
  }

  return names;
}

/**
 * Matches members by substring in both directions between the normalised
 * question and normalised member names. Fails closed: a question that names
 * somebody unknown resolves to `unknown-member` instead of every member.
 */
export class CapitalizedNameResolver implements MemberResolver {
  resolve(question: string, messages: Message[]): MemberResolution {
    const normalizedQuestion = normalizeForMatch(question);
    const candidates = extractCandidateNames(question)
      .map(normalizeForMatch)
      .filter((name) => name.length > 0);

    const matched = messages.filter((message) => {
      const name = normalizeForMatch(message.memberName);
      if (!name) return false;
      return normalizedQuestion.includes(name) || candidates.some((candidate) => name.includes(candidate));
    });

    if (matched.length > 0) {
      return { status: 'scoped', messages: matched, candidates };
    }
    if (candidates.length > 0) {
      return { status: 'unknown-member', candidates };
    }
    return { status: 'unscoped', messages, candidates };
  }
}
