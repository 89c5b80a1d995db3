import type { Product, QueryResult } from '../types.js';

export interface CacheStore {
  /** The current entry for the query's key, or null when missing or older than the TTL. */
  get(query: string): Promise<QueryResult | null>;
  /** Replace whatever is stored under the query's key with a new entry. */
  put(query: string, products: Product[]): Promise<QueryResult>;
  purgeExpired(): Promise<number>;
  clear(): Promise<number>;
  close(): Promise<void>;
}

export const HOUR_MS = 60 * 60 * 1000;

/** "  Sony   Headphones " -> "sony_headphones" */
export function queryToKey(query: string): string {
  return query.trim().toLowerCase().split(/\s+/).filter(Boolean).join('_');
}

export function buildEntryId(key: string, createdAt: Date): string {
  return `${key}_${createdAt.getTime()}`;
}
