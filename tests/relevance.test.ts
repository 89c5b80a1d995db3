import { describe, expect, it } from 'vitest';
import { isRelevant, keywordVariants, relevanceKeywords } from '../src/pipeline/relevance.js';

describe('relevanceKeywords', () => {
  it('splits on whitespace and case-folds', () => {
    expect(relevanceKeywords('Sony  Headphones')).toEqual(['sony', 'headphones']);
  });

  it('drops stop words unless nothing else is left', () => {
    expect(relevanceKeywords('case for iPhone')).toEqual(['case', 'iphone']);
    expect(relevanceKeywords('for the')).toEqual(['for', 'the']);
  });

  it('returns nothing for a blank query', () => {
    expect(relevanceKeywords('   ')).toEqual([]);
  });
});

describe('keywordVariants', () => {
  it('adds the singular for a plural keyword and the plural for a singular one', () => {
    expect(keywordVariants('headphones')).toEqual(['headphones', 'headphone']);
    expect(keywordVariants('headphone')).toEqual(['headphone', 'headphones']);
  });

  it('does not strip the s from very short words', () => {
    expect(keywordVariants('bus')).toEqual(['bus', 'buss']);
  });
});

describe('isRelevant', () => {
  it('accepts a title containing every keyword near the start', () => {
    expect(isRelevant('Sony WH-1000XM5 Wireless Headphones', 'sony headphones')).toBe(true);
  });

  it('rejects a title missing a keyword', () => {
    expect(isRelevant('Sony Bravia 55 inch 4K TV', 'sony headphones')).toBe(false);
  });

  it('matches singular and plural forms both ways', () => {
    expect(isRelevant('Sony WH-CH520 Wireless Headphone', 'sony headphones')).toBe(true);
    expect(isRelevant('Sony Wireless Headphones', 'sony headphone')).toBe(true);
  });

  it('rejects a title whose primary keyword starts at index 60 or later', () => {
    const late = `${'a'.repeat(59)} sony wireless headphones`;
    expect(late.indexOf('sony')).toBe(60);
    expect(isRelevant(late, 'sony headphones')).toBe(false);
  });

  it('accepts a title whose primary keyword starts before index 60', () => {
    const early = `${'a'.repeat(58)} sony wireless headphones`;
    expect(early.indexOf('sony')).toBe(59);
    expect(isRelevant(early, 'sony headphones')).toBe(true);
  });

  it('rejects titles that open with an accessory phrase', () => {
    expect(isRelevant('Compatible with iPhone 14 Case', 'iphone case')).toBe(false);
    expect(isRelevant('Case for Sony Headphones WH-1000XM5', 'sony headphones')).toBe(false);
    expect(isRelevant('Screen Protector for iPhone 15', 'iphone')).toBe(false);
  });

  it('rejects accessory phrases that come before the primary keyword', () => {
    expect(isRelevant('USB Cable Compatible with Sony Headphones', 'sony headphones')).toBe(false);
  });

  it('keeps accessory words that come after the product name', () => {
    expect(isRelevant('Sony Headphones with Carry Case for Travel', 'sony headphones')).toBe(true);
  });

  it('treats empty input as not relevant', () => {
    expect(isRelevant('', 'sony headphones')).toBe(false);
    expect(isRelevant('Sony Headphones', '')).toBe(false);
    expect(isRelevant('Sony Headphones', '   ')).toBe(false);
  });

  it('gives the same answer regardless of call order', () => {
    const titles = [
      'USB Cable Compatible with Sony Headphones',
      'Sony WH-1000XM5 Wireless Headphones',
      'Sony Bravia TV'
    ];
    const forward = titles.map(title => isRelevant(title, 'sony headphones'));
    const backward = [...titles].reverse().map(title => isRelevant(title, 'sony headphones')).reverse();
    expect(forward).toEqual([false, true, false]);
    expect(backward).toEqual(forward);
  });
});
