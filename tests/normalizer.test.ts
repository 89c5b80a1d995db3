import { describe, expect, it } from 'vitest';
import {
  normalizeCandidates,
  normalizeProductUrl,
  normalizeTitle,
  parsePrice,
  parseRating
} from '../src/pipeline/normalizer.js';
import type { RawCandidate } from '../src/types.js';

const fixedNow = () => new Date('2026-03-01T10:00:00.000Z');

function candidate(overrides: Partial<RawCandidate>): RawCandidate {
  return {
    title: 'Sony WH-1000XM5 Wireless Headphones',
    priceText: '₹29,990',
    ratingText: '4.5 out of 5 stars',
    url: 'https://www.amazon.in/dp/B0TEST0001',
    sourcePage: 1,
    ...overrides
  };
}

describe('parsePrice', () => {
  it('strips currency symbols and thousands separators', () => {
    expect(parsePrice('₹29,990')).toBe(29990);
    expect(parsePrice('$1,299.50')).toBe(1299.5);
    expect(parsePrice('29,990.')).toBe(29990);
  });

  it('returns null for missing or unparsable text', () => {
    expect(parsePrice(null)).toBeNull();
    expect(parsePrice('')).toBeNull();
    expect(parsePrice('Currently unavailable')).toBeNull();
  });
});

describe('parseRating', () => {
  it('reads the leading number', () => {
    expect(parseRating('4.5 out of 5 stars')).toBe(4.5);
    expect(parseRating('5.0 out of 5')).toBe(5);
  });

  it('discards out-of-range or unparsable ratings', () => {
    expect(parseRating('7.2 out of 5')).toBeNull();
    expect(parseRating('no reviews')).toBeNull();
    expect(parseRating(null)).toBeNull();
  });
});

describe('normalizeProductUrl', () => {
  it('keeps absolute http(s) urls', () => {
    expect(normalizeProductUrl('https://www.amazon.in/dp/B0TEST0001')).toBe('https://www.amazon.in/dp/B0TEST0001');
  });

  it('rejects relative, empty and non-web urls', () => {
    expect(normalizeProductUrl('/dp/B0TEST0001')).toBeNull();
    expect(normalizeProductUrl('')).toBeNull();
    expect(normalizeProductUrl(null)).toBeNull();
    expect(normalizeProductUrl('javascript:alert(1)')).toBeNull();
  });
});

describe('normalizeTitle', () => {
  it('case-folds and collapses whitespace', () => {
    expect(normalizeTitle('  Sony   WH-1000XM5\tHeadphones ')).toBe('sony wh-1000xm5 headphones');
  });
});

describe('normalizeCandidates', () => {
  it('builds products with parsed fields, platform and timestamp', () => {
    const products = normalizeCandidates([candidate({})], { platform: 'Amazon', now: fixedNow });
    expect(products).toEqual([
      {
        title: 'Sony WH-1000XM5 Wireless Headphones',
        price: 29990,
        rating: 4.5,
        url: 'https://www.amazon.in/dp/B0TEST0001',
        platform: 'Amazon',
        scrapedAt: '2026-03-01T10:00:00.000Z'
      }
    ]);
  });

  it('keeps records without price or rating', () => {
    const [product] = normalizeCandidates([candidate({ priceText: null, ratingText: 'unrated' })], {
      platform: 'Amazon',
      now: fixedNow
    });
    expect(product.price).toBeNull();
    expect(product.rating).toBeNull();
  });

  it('drops records without a resolvable url', () => {
    const products = normalizeCandidates(
      [candidate({ url: null }), candidate({ title: 'Sony WH-CH520 Headphones', url: '/dp/B0TEST0002' })],
      { platform: 'Amazon', now: fixedNow }
    );
    expect(products).toEqual([]);
  });

  it('keeps the first of several records with the same normalized title', () => {
    const products = normalizeCandidates(
      [
        candidate({ priceText: '₹29,990', sourcePage: 1 }),
        candidate({ title: 'Sony WH-CH520 Headphones', url: 'https://www.amazon.in/dp/B0TEST0002' }),
        candidate({ title: '  sony wh-1000xm5   WIRELESS headphones', priceText: '₹31,990', sourcePage: 2 })
      ],
      { platform: 'Amazon', now: fixedNow }
    );
    expect(products.map(product => product.title)).toEqual([
      'Sony WH-1000XM5 Wireless Headphones',
      'Sony WH-CH520 Headphones'
    ]);
    expect(products[0].price).toBe(29990);
  });

  it('never returns two products with the same normalized title', () => {
    const titles = ['A b', 'a  B', 'A B ', 'c', 'C', 'd'];
    const products = normalizeCandidates(
      titles.map((title, index) => candidate({ title, url: `https://www.amazon.in/dp/B${index}` })),
      { platform: 'Amazon', now: fixedNow }
    );
    const keys = products.map(product => normalizeTitle(product.title));
    expect(new Set(keys).size).toBe(keys.length);
    expect(products.map(product => product.url)).toEqual([
      'https://www.amazon.in/dp/B0',
      'https://www.amazon.in/dp/B3',
      'https://www.amazon.in/dp/B5'
    ]);
  });
});
