export interface RankedDocument {
  /** Position of the document in the input list */
  index: number;
  score: number;
}

/**
 * Orders documents by similarity to a query.
 *
 * Implementations return every document, highest score first; documents
 * with equal scores keep their input order.
 */
export interface Ranker {
  rank(query: string, documents: string[]): RankedDocument[];
}
