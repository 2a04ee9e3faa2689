export { TfidfRanker, TfidfVectorSpace, cosineSimilarity, tokenize } from './tfidf';
export type { RankedDocument, Ranker } from './types';
