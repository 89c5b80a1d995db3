/**
 * Decides whether a scraped listing title is actually the product searched
 * for, as opposed to an accessory that merely mentions it.
 */

export const PRIMARY_KEYWORD_WINDOW = 60;

const STOP_WORDS = new Set([
  'for', 'with', 'and', 'the', 'a', 'an', 'in', 'on', 'of', 'to', 'is', 'by', 'or', 'at', 'as'
]);

/**
 * Phrases that mark a listing as an accessory for the product. A title may not
 * start with one, and one may not appear ahead of the primary keyword.
 */
export const ACCESSORY_PREAMBLES = [
  'compatible with',
  'compatible for',
  'cable for',
  'case for',
  'cover for',
  'strap for',
  'stand for',
  'holder for',
  'skin for',
  'charger for',
  'charging cable',
  'charging cord',
  'replacement ear pads',
  'screen protector for',
  'screen guard',
  'tempered glass'
];

export function relevanceKeywords(query: string): string[] {
  const tokens = query.toLowerCase().split(/\s+/).filter(Boolean);
  const keywords = tokens.filter(token => !STOP_WORDS.has(token));
  return keywords.length > 0 ? keywords : tokens;
}

/** Spellings a keyword may take in a title: itself plus its singular or plural form. */
export function keywordVariants(keyword: string): string[] {
  if (keyword.endsWith('s') && keyword.length > 3) {
    return [keyword, keyword.slice(0, -1)];
  }
  return [keyword, `${keyword}s`];
}

function firstIndexOf(title: string, keyword: string): number {
  let best = -1;
  for (const variant of keywordVariants(keyword)) {
    const idx = title.indexOf(variant);
    if (idx !== -1 && (best === -1 || idx < best)) {
      best = idx;
    }
  }
  return best;
}

function hasAccessoryPreamble(title: string, primaryIndex: number): boolean {
  const preamble = title.slice(0, primaryIndex);
  return ACCESSORY_PREAMBLES.some(phrase => title.startsWith(phrase) || preamble.includes(phrase));
}

export function isRelevant(title: string, query: string): boolean {
  const normalizedTitle = title.toLowerCase().replace(/\s+/g, ' ').trim();
  const keywords = relevanceKeywords(query);
  if (!normalizedTitle || keywords.length === 0) {
    return false;
  }

  const positions = keywords.map(keyword => firstIndexOf(normalizedTitle, keyword));
  if (positions.some(position => position === -1)) {
    return false;
  }

  const primaryIndex = positions[0];
  if (primaryIndex >= PRIMARY_KEYWORD_WINDOW) {
    return false;
  }

  return !hasAccessoryPreamble(normalizedTitle, primaryIndex);
}
