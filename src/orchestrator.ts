import type { CacheStore } from './cache/store.js';
import { FetchError, TotalFetchFailureError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { normalizeCandidates } from './pipeline/normalizer.js';
import { createPacer, type Pacer } from './pipeline/pacing.js';
import { isRelevant } from './pipeline/relevance.js';
import type { PageFetcher } from './scrapers/amazon/fetcher.js';
import { extractPage, type ExtractedPage } from './scrapers/amazon/parser.js';
import type { Clock, Product, QueryResult, RawCandidate, SearchOptions } from './types.js';

const log = createLogger('orchestrator');

export const DEFAULT_LIMIT = 20;
export const DEFAULT_MIN_RATING = 0;

export type Extractor = (html: string, sourcePage: number, baseUrl: string) => ExtractedPage;

export interface OrchestratorDeps {
  fetcher: PageFetcher;
  store: CacheStore;
  extract?: Extractor;
  /** Builds the pacer for one scrape; each query gets its own. */
  pacer?: () => Pacer;
  now?: Clock;
}

export interface OrchestratorOptions {
  maxPages: number;
  platform: string;
  baseUrl: string;
  requestTimeoutMs?: number;
  pageDelayMinMs?: number;
  pageDelayMaxMs?: number;
}

export interface ScrapeReport {
  candidates: RawCandidate[];
  pagesFetched: number;
  failures: FetchError[];
}

interface Deadline {
  signal: AbortSignal;
  clear(): void;
}

/** Settles with `work`, or rejects with the abort reason if the signal fires first. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Drops products below the rating threshold and caps the count. A missing
 * rating never satisfies a positive threshold.
 */
export function applyView(products: Product[], limit: number, minRating: number): Product[] {
  const filtered = minRating > 0
    ? products.filter(product => product.rating !== null && product.rating >= minRating)
    : products;
  return filtered.slice(0, limit);
}

export class QueryOrchestrator {
  private fetcher: PageFetcher;
  private store: CacheStore;
  private extract: Extractor;
  private createPacer: () => Pacer;
  private now: Clock;
  private options: Readonly<OrchestratorOptions>;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.fetcher = deps.fetcher;
    this.store = deps.store;
    this.extract = deps.extract ?? extractPage;
    this.now = deps.now ?? (() => new Date());
    this.createPacer = deps.pacer ?? (() => createPacer({
      minDelayMs: options.pageDelayMinMs ?? 2000,
      maxDelayMs: options.pageDelayMaxMs ?? 4000
    }));
    this.options = Object.freeze({ ...options });
  }

  async search(query: string, searchOptions: SearchOptions = {}): Promise<QueryResult> {
    const limit = searchOptions.limit ?? DEFAULT_LIMIT;
    const minRating = searchOptions.minRating ?? DEFAULT_MIN_RATING;
    const deadline = this.startDeadline();

    try {
      if (!searchOptions.forceRefresh) {
        const hit = await this.readCache(query, deadline.signal);
        if (hit) {
          log.info(`Cache hit for "${query}" (${hit.products.length} product(s))`);
          return {
            query,
            products: applyView(hit.products, limit, minRating),
            createdAt: hit.createdAt,
            cached: true
          };
        }
      }

      log.info(`Cache miss for "${query}", scraping up to ${this.options.maxPages} page(s)`);
      const report = await this.scrape(query, deadline.signal);
      if (report.pagesFetched === 0) {
        throw new TotalFetchFailureError(this.options.maxPages, report.failures);
      }

      const products = normalizeCandidates(report.candidates, {
        platform: this.options.platform,
        now: this.now
      });
      log.info(
        `Scraped "${query}": ${report.pagesFetched} page(s), ${report.candidates.length} relevant, ${products.length} unique`
      );

      let createdAt = this.now();
      try {
        const stored = await untilAborted(this.store.put(query, products), deadline.signal);
        createdAt = stored.createdAt;
      } catch (error) {
        log.error(`Durability gap: result for "${query}" was not cached: ${errorMessage(error)}`);
      }

      return {
        query,
        products: applyView(products, limit, minRating),
        createdAt,
        cached: false
      };
    } finally {
      deadline.clear();
    }
  }

  /**
   * Fetch pages 1..maxPages in order, one at a time, keeping the relevant
   * candidates in document order. Failed pages are skipped. Without a signal
   * the scrape gets its own request deadline.
   */
  async scrape(query: string, signal?: AbortSignal): Promise<ScrapeReport> {
    const ownDeadline = signal ? undefined : this.startDeadline();
    const active = signal ?? ownDeadline?.signal;
    const pacer = this.createPacer();

    const report: ScrapeReport = { candidates: [], pagesFetched: 0, failures: [] };
    try {
      for (let page = 1; page <= this.options.maxPages; page += 1) {
        if (active?.aborted) {
          report.failures.push(new FetchError(page, `Page ${page} skipped: request timed out`));
          continue;
        }

        let html: string;
        try {
          await pacer.wait(active);
          html = await this.fetcher.fetchPage(query, page, active);
        } catch (error) {
          const failure = error instanceof FetchError
            ? error
            : new FetchError(page, `Page ${page} failed: ${errorMessage(error)}`, { cause: error });
          report.failures.push(failure);
          log.warn(failure.message);
          continue;
        }

        report.pagesFetched += 1;
        const { cardCount, candidates } = this.extract(html, page, this.options.baseUrl);
        if (cardCount === 0) {
          log.info(`Page ${page} has no listings; stopping`);
          break;
        }

        const relevant = candidates.filter(candidate => isRelevant(candidate.title, query));
        log.debug(`Page ${page}: ${cardCount} card(s), ${candidates.length} titled, ${relevant.length} relevant`);
        report.candidates.push(...relevant);
      }
    } finally {
      ownDeadline?.clear();
    }

    return report;
  }

  private startDeadline(): Deadline {
    const controller = new AbortController();
    const timeoutMs = this.options.requestTimeoutMs;
    const timer = timeoutMs
      ? setTimeout(() => controller.abort(new Error('request timed out')), timeoutMs)
      : undefined;
    return {
      signal: controller.signal,
      clear: () => clearTimeout(timer)
    };
  }

  private async readCache(query: string, signal: AbortSignal): Promise<QueryResult | null> {
    try {
      return await untilAborted(this.store.get(query), signal);
    } catch (error) {
      log.warn(`Cache read failed, scraping instead: ${errorMessage(error)}`);
      return null;
    }
  }
}
