import { PREFERENCE_KEYWORDS } from '../../../vocabulary';

const AFTER_FAVORITE = /(?:favorite|favourite)\s+([^.!?]+)/i;

function stripSpacesAndDots(text: string): string {
  return text.replace(/^[ .]+|[ .]+$/g, '');
}

export function extractPreference(context: string): string | null {
  const lower = context.toLowerCase();
  if (!PREFERENCE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return null;
  }

  const favorite = AFTER_FAVORITE.exec(context);
  if (favorite?.[1]) {
    return stripSpacesAndDots(favorite[1]) || null;
  }

  const firstSentence = (context.split(/[.!?]/)[0] ?? '').trim();
  return firstSentence || null;
}
