import type { Clock, Product, RawCandidate } from '../types.js';

export interface NormalizeOptions {
  platform: string;
  now?: Clock;
}

const NUMBER_PATTERN = /\d+(?:\.\d+)?/;

export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * "₹29,990.00" -> 29990, "$1,299" -> 1299. Commas are treated as thousands
 * separators; the first number in the text wins.
 */
export function parsePrice(text: string | null): number | null {
  if (!text) {
    return null;
  }
  const cleaned = text.replace(/[,\s]/g, '');
  const match = cleaned.match(NUMBER_PATTERN);
  if (!match) {
    return null;
  }
  const price = Number.parseFloat(match[0]);
  return Number.isFinite(price) && price >= 0 ? price : null;
}

/** "4.5 out of 5 stars" -> 4.5. Values outside 0-5 are discarded. */
export function parseRating(text: string | null): number | null {
  if (!text) {
    return null;
  }
  const match = text.match(NUMBER_PATTERN);
  if (!match) {
    return null;
  }
  const rating = Number.parseFloat(match[0]);
  return Number.isFinite(rating) && rating >= 0 && rating <= 5 ? rating : null;
}

export function normalizeProductUrl(value: string | null): string | null {
  if (!value) {
    return null;
  }
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Turn relevant raw candidates into products: parse numbers, drop records
 * without a usable link and keep only the first record per title.
 */
export function normalizeCandidates(candidates: RawCandidate[], options: NormalizeOptions): Product[] {
  const now = options.now ?? (() => new Date());
  const seen = new Set<string>();
  const products: Product[] = [];

  for (const candidate of candidates) {
    const title = candidate.title.replace(/\s+/g, ' ').trim();
    const key = normalizeTitle(title);
    if (!key || seen.has(key)) {
      continue;
    }

    const url = normalizeProductUrl(candidate.url);
    if (!url) {
      continue;
    }

    seen.add(key);
    products.push({
      title,
      price: parsePrice(candidate.priceText),
      rating: parseRating(candidate.ratingText),
      url,
      platform: options.platform,
      scrapedAt: now().toISOString()
    });
  }

  return products;
}
