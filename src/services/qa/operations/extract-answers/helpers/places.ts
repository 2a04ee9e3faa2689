// "to London", "in New York", "at Soho House"
const PLACE_PHRASE = /\b(?:to|in|at)\s+([A-Z][a-zA-Z]+(?:\s+[A-Z][a-zA-Z]+)*)/;

export function findPlace(text: string): string | null {
  return PLACE_PHRASE.exec(text)?.[1] ?? null;
}
