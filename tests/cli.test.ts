import { describe, expect, it } from 'vitest';
import { parseArgs, renderResult } from '../src/cli.js';
import { ValidationError } from '../src/errors.js';
import { parsePageCount } from '../src/validation.js';
import type { QueryResult } from '../src/types.js';

describe('parseArgs', () => {
  it('joins free words into the query and reads options', () => {
    expect(parseArgs(['search', 'sony', 'headphones', '--limit', '5', '--min-rating', '4', '--pages', '2', '--fresh'])).toEqual({
      command: 'search',
      query: 'sony headphones',
      limit: '5',
      minRating: '4',
      maxPages: '2',
      fresh: true
    });
  });

  it('leaves the query unset when no words are given', () => {
    expect(parseArgs(['search', '--fresh'])).toEqual({ command: 'search', fresh: true });
  });

  it('recognizes purge', () => {
    expect(parseArgs(['purge'])).toEqual({ command: 'purge', fresh: false });
  });

  it.each([
    [['search', 'sony', '--limit'], 'limit', '--limit: requires a value'],
    [['search', 'sony', '--pages', '--fresh'], 'maxPages', '--pages: requires a value'],
    [['search', '--min-rating'], 'minRating', '--min-rating: requires a value']
  ])('rejects %j', (argv, field, message) => {
    expect(() => parseArgs(argv)).toThrow(message);
    try {
      parseArgs(argv);
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe(field);
      }
    }
  });

  it('treats words that look like object keys as query text', () => {
    expect(parseArgs(['search', 'constructor', 'toString'])).toEqual({
      command: 'search',
      query: 'constructor toString',
      fresh: false
    });
  });

  it('falls back to help for anything else', () => {
    expect(parseArgs([])).toEqual({ command: 'help', fresh: false });
    expect(parseArgs(['scrape', 'tv'])).toEqual({ command: 'help', fresh: false });
  });
});

describe('parsePageCount', () => {
  it('accepts a whole page count', () => {
    expect(parsePageCount('4')).toBe(4);
  });

  it.each([
    ['2abc', 'pages: must be a number'],
    ['2.5', 'pages: must be an integer'],
    ['0', 'pages: must be between 1 and 20'],
    ['21', 'pages: must be between 1 and 20']
  ])('rejects %s', (value, message) => {
    expect(() => parsePageCount(value)).toThrow(message);
  });
});

describe('renderResult', () => {
  const result: QueryResult = {
    query: 'sony headphones',
    cached: false,
    createdAt: new Date('2026-03-01T08:00:00.000Z'),
    products: [
      {
        title: 'Sony WH-1000XM5 Wireless Headphones',
        price: 29990,
        rating: 4.5,
        url: 'https://www.amazon.in/dp/B0TEST0001',
        platform: 'Amazon',
        scrapedAt: '2026-03-01T08:00:00.000Z'
      }
    ]
  };

  it('prints a summary line and one row per product', () => {
    const output = renderResult(result);
    expect(output).toContain('1 result(s) for "sony headphones"');
    expect(output).toContain('fresh scrape');
    expect(output).toContain('Sony WH-1000XM5 Wireless Headphones');
    expect(output).toContain('4.5 ★');
  });

  it('marks cached results with their creation time', () => {
    expect(renderResult({ ...result, cached: true })).toContain('cached 2026-03-01T08:00:00.000Z');
  });
});
