import fs from 'fs/promises';
import path from 'path';
import initSqlJs from 'sql.js';
import type { Database, SqlValue } from 'sql.js';
import { CacheError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Clock, Product, QueryResult } from '../types.js';
import { HOUR_MS, buildEntryId, queryToKey, type CacheStore } from './store.js';

const log = createLogger('cache');

export interface SqliteCacheOptions {
  ttlHours: number;
  now?: Clock;
}

interface EntryRow {
  entryId: string;
  query: string;
  createdAt: Date;
}

function asString(value: SqlValue): string {
  return value === null || value instanceof Uint8Array ? '' : String(value);
}

function asNumberOrNull(value: SqlValue): number | null {
  return typeof value === 'number' ? value : null;
}

function ensureSchema(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS cache_entries (
      entry_id TEXT PRIMARY KEY,
      cache_key TEXT NOT NULL,
      query TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_cache_entries_key ON cache_entries (cache_key, created_at);

    CREATE TABLE IF NOT EXISTS cache_products (
      entry_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      title TEXT NOT NULL,
      price REAL,
      rating REAL,
      url TEXT NOT NULL,
      platform TEXT NOT NULL,
      scraped_at TEXT NOT NULL,
      PRIMARY KEY (entry_id, position)
    );
  `);
}

/**
 * Query cache kept in a sql.js database and persisted as a single file.
 *
 * Each put inserts the new entry and deletes the previous ones for the same
 * key in one transaction, so a reader sees either the old entry or the new
 * one. The file on disk is replaced by write-then-rename.
 */
export class SqliteCacheStore implements CacheStore {
  private db: Database;
  private dbPath: string;
  private ttlMs: number;
  private now: Clock;
  private flushChain: Promise<void> = Promise.resolve();

  private constructor(db: Database, dbPath: string, options: SqliteCacheOptions) {
    this.db = db;
    this.dbPath = dbPath;
    this.ttlMs = options.ttlHours * HOUR_MS;
    this.now = options.now ?? (() => new Date());
  }

  static async create(dbPath: string, options: SqliteCacheOptions): Promise<SqliteCacheStore> {
    let SQL: Awaited<ReturnType<typeof initSqlJs>>;
    try {
      SQL = await initSqlJs();
    } catch (error) {
      throw new CacheError('open', `Failed to load sql.js: ${errorMessage(error)}`, { cause: error });
    }

    let file: Uint8Array | null = null;
    try {
      file = new Uint8Array(await fs.readFile(dbPath));
    } catch (error) {
      log.debug(`No cache file at ${dbPath} (${errorMessage(error)}); starting empty`);
    }

    let db: Database | null = null;
    if (file) {
      let existing: Database | null = null;
      try {
        existing = new SQL.Database(file);
        ensureSchema(existing);
        db = existing;
      } catch (error) {
        existing?.close();
        log.warn(`Cache file ${dbPath} is unreadable (${errorMessage(error)}); starting with an empty cache`);
      }
    }
    if (!db) {
      db = new SQL.Database();
      try {
        ensureSchema(db);
      } catch (error) {
        throw new CacheError('open', `Failed to create cache schema: ${errorMessage(error)}`, { cause: error });
      }
    }

    return new SqliteCacheStore(db, dbPath, options);
  }

  async get(query: string): Promise<QueryResult | null> {
    const key = queryToKey(query);
    try {
      const entry = this.findCurrentEntry(key);
      if (!entry) {
        return null;
      }
      const age = this.now().getTime() - entry.createdAt.getTime();
      if (age >= this.ttlMs) {
        log.debug(`Entry ${entry.entryId} expired (${Math.round(age / 1000)}s old)`);
        return null;
      }
      return {
        query: entry.query,
        products: this.loadProducts(entry.entryId),
        createdAt: entry.createdAt,
        cached: true
      };
    } catch (error) {
      throw new CacheError('read', `Failed to read cache for "${key}": ${errorMessage(error)}`, { cause: error });
    }
  }

  async put(query: string, products: Product[]): Promise<QueryResult> {
    const key = queryToKey(query);
    const createdAt = this.now();
    const entryId = buildEntryId(key, createdAt);

    try {
      this.db.exec('BEGIN');
      try {
        this.db.run(
          'INSERT OR REPLACE INTO cache_entries (entry_id, cache_key, query, created_at) VALUES (?, ?, ?, ?)',
          [entryId, key, query, createdAt.toISOString()]
        );
        this.db.run('DELETE FROM cache_products WHERE entry_id = ?', [entryId]);
        this.insertProducts(entryId, products);
        this.db.run(
          'DELETE FROM cache_products WHERE entry_id IN (SELECT entry_id FROM cache_entries WHERE cache_key = ? AND entry_id <> ?)',
          [key, entryId]
        );
        this.db.run('DELETE FROM cache_entries WHERE cache_key = ? AND entry_id <> ?', [key, entryId]);
        this.db.exec('COMMIT');
      } catch (error) {
        this.db.exec('ROLLBACK');
        throw error;
      }
      await this.flush();
    } catch (error) {
      throw new CacheError('write', `Failed to write cache for "${key}": ${errorMessage(error)}`, { cause: error });
    }

    log.debug(`Stored ${products.length} product(s) as ${entryId}`);
    return { query, products: [...products], createdAt, cached: false };
  }

  async purgeExpired(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.ttlMs).toISOString();
    return this.deleteEntries('WHERE created_at <= ?', [cutoff]);
  }

  async clear(): Promise<number> {
    return this.deleteEntries('', []);
  }

  async close(): Promise<void> {
    await this.flush();
    this.db.close();
  }

  private async deleteEntries(where: string, params: SqlValue[]): Promise<number> {
    let removed = 0;
    try {
      this.db.exec('BEGIN');
      try {
        this.db.run(`DELETE FROM cache_products WHERE entry_id IN (SELECT entry_id FROM cache_entries ${where})`, params);
        this.db.run(`DELETE FROM cache_entries ${where}`, params);
        removed = this.db.getRowsModified();
        this.db.exec('COMMIT');
      } catch (error) {
        this.db.exec('ROLLBACK');
        throw error;
      }
      if (removed > 0) {
        await this.flush();
      }
    } catch (error) {
      throw new CacheError('purge', `Failed to purge cache: ${errorMessage(error)}`, { cause: error });
    }

    if (removed > 0) {
      log.info(`Removed ${removed} cache entr${removed === 1 ? 'y' : 'ies'}`);
    }
    return removed;
  }

  private findCurrentEntry(key: string): EntryRow | null {
    const stmt = this.db.prepare(
      'SELECT entry_id, query, created_at FROM cache_entries WHERE cache_key = ? ORDER BY created_at DESC LIMIT 1'
    );
    try {
      stmt.bind([key]);
      if (!stmt.step()) {
        return null;
      }
      const [entryId, query, createdAt] = stmt.get();
      return {
        entryId: asString(entryId),
        query: asString(query),
        createdAt: new Date(asString(createdAt))
      };
    } finally {
      stmt.free();
    }
  }

  private loadProducts(entryId: string): Product[] {
    const stmt = this.db.prepare(
      'SELECT title, price, rating, url, platform, scraped_at FROM cache_products WHERE entry_id = ? ORDER BY position ASC'
    );
    const products: Product[] = [];
    try {
      stmt.bind([entryId]);
      while (stmt.step()) {
        const [title, price, rating, url, platform, scrapedAt] = stmt.get();
        products.push({
          title: asString(title),
          price: asNumberOrNull(price),
          rating: asNumberOrNull(rating),
          url: asString(url),
          platform: asString(platform),
          scrapedAt: asString(scrapedAt)
        });
      }
    } finally {
      stmt.free();
    }
    return products;
  }

  private insertProducts(entryId: string, products: Product[]): void {
    if (products.length === 0) {
      return;
    }
    const stmt = this.db.prepare(`
      INSERT INTO cache_products (
        entry_id,
        position,
        title,
        price,
        rating,
        url,
        platform,
        scraped_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    try {
      products.forEach((product, position) => {
        stmt.run([
          entryId,
          position,
          product.title,
          product.price,
          product.rating,
          product.url,
          product.platform,
          product.scrapedAt
        ]);
      });
    } finally {
      stmt.free();
    }
  }

  private flush(): Promise<void> {
    const run = this.flushChain.then(async () => {
      const data = this.db.export();
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      const tempPath = `${this.dbPath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, Buffer.from(data));
      await fs.rename(tempPath, this.dbPath);
    });
    // Keep the chain usable after a failed flush.
    this.flushChain = run.catch(() => undefined);
    return run;
  }
}
