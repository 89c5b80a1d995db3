import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { pathToFileURL } from 'url';
import { SqliteCacheStore } from './cache/sqliteStore.js';
import { loadConfig, type AppConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { errorMessage, toErrorResponse } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import { QueryOrchestrator } from './orchestrator.js';
import { HttpPageFetcher } from './scrapers/amazon/fetcher.js';
import type { Product, QueryResult } from './types.js';
import { parseProductQuery } from './validation.js';

export const APP_NAME = 'listing-lens';
export const APP_VERSION = '1.0.0';

const log = createLogger('server');

export interface ProductBody {
  title: string;
  price: number | null;
  rating: number | null;
  url: string;
  platform: string;
  scraped_at: string;
}

export interface ProductResponseBody {
  query: string;
  count: number;
  cached: boolean;
  products: ProductBody[];
}

export interface SearchService {
  search: QueryOrchestrator['search'];
}

export function toProductBody(product: Product): ProductBody {
  return {
    title: product.title,
    price: product.price,
    rating: product.rating,
    url: product.url,
    platform: product.platform,
    scraped_at: product.scrapedAt
  };
}

export function toResponseBody(result: QueryResult): ProductResponseBody {
  return {
    query: result.query,
    count: result.products.length,
    cached: result.cached,
    products: result.products.map(toProductBody)
  };
}

export function createApp(service: SearchService): express.Express {
  const app = express();
  app.use(cors());

  app.get('/', (_req: Request, res: Response) => {
    res.json({ name: APP_NAME, version: APP_VERSION });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), version: APP_VERSION });
  });

  const api = express.Router();
  app.use('/api', api);

  api.get('/products', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parseProductQuery(req.query);
      log.info(`GET /api/products query="${params.query}" limit=${params.limit} min_rating=${params.min_rating}`);
      const result = await service.search(params.query, {
        limit: params.limit,
        minRating: params.min_rating
      });
      res.json(toResponseBody(result));
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      log.error(`Request failed: ${errorMessage(error)}`);
    }
    res.status(status).json(body);
  });

  return app;
}

export async function startServer(config: Readonly<AppConfig>): Promise<void> {
  setLogLevel(config.logLevel);
  const store = await SqliteCacheStore.create(config.cacheDbPath, { ttlHours: config.cacheTtlHours });
  if (config.clearCacheOnBoot) {
    await store.clear();
  } else {
    await store.purgeExpired();
  }

  const fetcher = new HttpPageFetcher({
    baseUrl: config.sourceBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
    userAgent: config.userAgent
  });
  const orchestrator = new QueryOrchestrator(
    { fetcher, store },
    {
      maxPages: config.maxPages,
      platform: config.platform,
      baseUrl: config.sourceBaseUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      pageDelayMinMs: config.pageDelayMinMs,
      pageDelayMaxMs: config.pageDelayMaxMs
    }
  );

  const app = createApp(orchestrator);
  const server = app.listen(config.port, () => {
    log.info(`${APP_NAME} v${APP_VERSION} listening on port ${config.port} (MAX_PAGES=${config.maxPages}, CACHE_TTL=${config.cacheTtlHours}h)`);
  });

  const shutdown = () => {
    log.info('Shutting down');
    server.close(() => {
      store.close().catch(error => {
        log.error(`Failed to flush cache on shutdown: ${errorMessage(error)}`);
      });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

const isMain = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMain) {
  (async () => {
    await loadDotEnv();
    await startServer(loadConfig());
  })().catch(error => {
    log.error(`Server failed to start: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}
