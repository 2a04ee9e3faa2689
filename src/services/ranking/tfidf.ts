import stopWordList from './stop-words.json';
import type { RankedDocument, Ranker } from './types';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

// Two or more word characters, as a run of letters, digits or underscores
const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export function tokenize(text: string, stopWords: ReadonlySet<string> = STOP_WORDS): string[] {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return tokens.filter((token) => !stopWords.has(token));
}

/**
 * Compute cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dotProduct / magnitude;
}

/**
 * Term-frequency / inverse-document-frequency vector space.
 *
 * The vocabulary comes from the documents only; query terms outside it are
 * ignored. Weights are raw counts times the smoothed idf
 * `ln((1 + n) / (1 + df)) + 1`.
 */
export class TfidfVectorSpace {
  private readonly vocabulary = new Map<string, number>();
  private readonly idf: number[] = [];
  readonly documentVectors: number[][];

  constructor(documents: string[], private readonly stopWords: ReadonlySet<string> = STOP_WORDS) {
    const tokenized = documents.map((doc) => tokenize(doc, stopWords));
    const documentFrequency: number[] = [];

    for (const tokens of tokenized) {
      for (const term of new Set(tokens)) {
        let column = this.vocabulary.get(term);
        if (column === undefined) {
          column = this.vocabulary.size;
          this.vocabulary.set(term, column);
          documentFrequency.push(0);
        }
        documentFrequency[column] = (documentFrequency[column] ?? 0) + 1;
      }
    }

    const n = documents.length;
    for (const df of documentFrequency) {
      this.idf.push(Math.log((1 + n) / (1 + df)) + 1);
    }

    this.documentVectors = tokenized.map((tokens) => this.weigh(tokens));
  }

  get size(): number {
    return this.vocabulary.size;
  }

  vectorize(text: string): number[] {
    return this.weigh(tokenize(text, this.stopWords));
  }

  private weigh(tokens: string[]): number[] {
    const vector: number[] = new Array(this.vocabulary.size).fill(0);
    for (const token of tokens) {
      const column = this.vocabulary.get(token);
      if (column !== undefined) {
        vector[column] = (vector[column] ?? 0) + 1;
      }
    }
    return vector.map((count, column) => count * (this.idf[column] ?? 0));
  }
}

export class TfidfRanker implements Ranker {
  constructor(private readonly stopWords: ReadonlySet<string> = STOP_WORDS) {}

  rank(query: string, documents: string[]): RankedDocument[] {
    const space = new TfidfVectorSpace(documents, this.stopWords);
    const queryVector = space.vectorize(query);

    return space.documentVectors
      .map((vector, index) => ({ index, score: cosineSimilarity(queryVector, vector) }))
      .sort((a, b) => b.score - a.score);
  }
}
