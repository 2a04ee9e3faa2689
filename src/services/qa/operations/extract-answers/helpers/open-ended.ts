const MAX_LENGTH = 280;
const ELLIPSIS = '...';

export function extractSnippet(context: string): string | null {
  const chars = Array.from(context.trim());
  if (chars.length === 0) return null;
  if (chars.length <= MAX_LENGTH) return chars.join('');
  return chars.slice(0, MAX_LENGTH - ELLIPSIS.length).join('') + ELLIPSIS;
}
