import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { RawCandidate } from '../../types.js';
import { ParseError, errorMessage } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { resolveListingUrl } from './search.js';

const log = createLogger('extractor');

const RESULT_CARD_SELECTOR = 'div[data-component-type="s-search-result"]';
const TITLE_TEXT_SELECTORS = ['h2 span.a-text-normal', 'h2 a span', 'h2 span'];
const PRICE_SELECTORS = ['.a-price .a-offscreen', '.a-price-whole'];

type Card = cheerio.Cheerio<Element>;

function collapse(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

function firstText(card: Card, selectors: string[]): string | null {
  for (const selector of selectors) {
    const text = collapse(card.find(selector).first().text());
    if (text) {
      return text;
    }
  }
  return null;
}

function extractTitle(card: Card): string | null {
  return (
    firstText(card, TITLE_TEXT_SELECTORS) ||
    collapse(card.find('h2 a').first().attr('aria-label')) ||
    collapse(card.find('img.s-image').first().attr('alt')) ||
    null
  );
}

function extractRatingText(card: Card): string | null {
  const iconAlt = collapse(card.find('span.a-icon-alt').first().text());
  if (iconAlt) {
    return iconAlt;
  }
  const labelled = collapse(card.find('[aria-label*="out of 5"]').first().attr('aria-label'));
  return labelled || null;
}

function extractHref(card: Card): string | null {
  const heading = card.find('h2 a[href]').first().attr('href');
  if (heading) {
    return heading;
  }
  return card.find('a.a-link-normal[href]').first().attr('href') ?? null;
}

export interface ExtractedPage {
  /** Listing containers on the page, titled or not. Zero means the results ran out. */
  cardCount: number;
  candidates: RawCandidate[];
}

/**
 * Pull raw listing records out of one search results page, in document order.
 * Fields that cannot be found are recorded as null; nothing here is validated.
 */
export function extractPage(html: string, sourcePage: number, baseUrl: string): ExtractedPage {
  try {
    const $ = cheerio.load(html);
    const cards = $(RESULT_CARD_SELECTOR);
    const candidates: RawCandidate[] = [];

    cards.each((_idx, element) => {
      const card = $(element);
      const title = extractTitle(card);
      if (!title) {
        return;
      }
      const href = extractHref(card);
      candidates.push({
        title,
        priceText: firstText(card, PRICE_SELECTORS),
        ratingText: extractRatingText(card),
        url: href ? resolveListingUrl(href, baseUrl) : null,
        sourcePage
      });
    });

    return { cardCount: cards.length, candidates };
  } catch (error) {
    const parseError = new ParseError(sourcePage, `Failed to parse page ${sourcePage}: ${errorMessage(error)}`, {
      cause: error
    });
    log.warn(parseError.message);
    return { cardCount: 0, candidates: [] };
  }
}

export function extractCandidates(html: string, sourcePage: number, baseUrl: string): RawCandidate[] {
  return extractPage(html, sourcePage, baseUrl).candidates;
}
