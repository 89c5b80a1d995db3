#!/usr/bin/env node
import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { SqliteCacheStore } from './cache/sqliteStore.js';
import { loadConfig, type AppConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { AppError, TotalFetchFailureError, ValidationError, errorMessage } from './errors.js';
import { setLogLevel } from './logger.js';
import { QueryOrchestrator } from './orchestrator.js';
import { HttpPageFetcher } from './scrapers/amazon/fetcher.js';
import type { QueryResult } from './types.js';
import { parsePageCount, parseProductQuery } from './validation.js';

export interface CliArgs {
  command: 'search' | 'purge' | 'help';
  query?: string;
  limit?: string;
  minRating?: string;
  maxPages?: string;
  fresh: boolean;
}

const VALUE_FLAGS = {
  '--limit': 'limit',
  '--min-rating': 'minRating',
  '--pages': 'maxPages'
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

/** Throws a ValidationError when an option is missing its value. */
export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  if (command !== 'search' && command !== 'purge') {
    return { command: 'help', fresh: false };
  }

  const args: CliArgs = { command, fresh: false };
  const words: string[] = [];
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (isValueFlag(arg)) {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ValidationError(VALUE_FLAGS[arg], `${arg}: requires a value`);
      }
      args[VALUE_FLAGS[arg]] = next;
      i += 1;
    } else if (arg === '--fresh') {
      args.fresh = true;
    } else {
      words.push(arg);
    }
  }
  if (words.length > 0) {
    args.query = words.join(' ');
  }
  return args;
}

function formatPrice(price: number | null): string {
  return price === null ? chalk.dim('n/a') : price.toLocaleString('en-IN', { maximumFractionDigits: 2 });
}

function formatRating(rating: number | null): string {
  return rating === null ? chalk.dim('n/a') : `${rating.toFixed(1)} ★`;
}

export function renderResult(result: QueryResult): string {
  const table = new Table({
    head: ['#', 'Title', 'Price', 'Rating'],
    colWidths: [5, 70, 14, 10],
    wordWrap: true
  });
  result.products.forEach((product, index) => {
    table.push([String(index + 1), product.title, formatPrice(product.price), formatRating(product.rating)]);
  });

  const source = result.cached
    ? chalk.blue(`cached ${result.createdAt.toISOString()}`)
    : chalk.green('fresh scrape');
  return `${chalk.bold(`${result.products.length} result(s) for "${result.query}"`)} (${source})\n${table.toString()}`;
}

function usage(): string {
  return [
    'Usage:',
    '  listing-lens search <query> [--limit N] [--min-rating R] [--pages N] [--fresh]',
    '  listing-lens purge'
  ].join('\n');
}

async function runSearch(args: CliArgs, config: Readonly<AppConfig>, store: SqliteCacheStore): Promise<void> {
  const params = parseProductQuery({ query: args.query, limit: args.limit, min_rating: args.minRating });
  const maxPages = args.maxPages === undefined ? config.maxPages : parsePageCount(args.maxPages);

  const orchestrator = new QueryOrchestrator(
    {
      fetcher: new HttpPageFetcher({
        baseUrl: config.sourceBaseUrl,
        timeoutMs: config.fetchTimeoutMs,
        userAgent: config.userAgent
      }),
      store
    },
    {
      maxPages,
      platform: config.platform,
      baseUrl: config.sourceBaseUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      pageDelayMinMs: config.pageDelayMinMs,
      pageDelayMaxMs: config.pageDelayMaxMs
    }
  );

  const spinner = ora(`Searching for "${params.query}"...`).start();
  try {
    const result = await orchestrator.search(params.query, {
      limit: params.limit,
      minRating: params.min_rating,
      forceRefresh: args.fresh
    });
    spinner.succeed(chalk.green('Done'));
    console.log(renderResult(result));
  } catch (error) {
    spinner.fail(chalk.red('Search failed'));
    throw error;
  }
}

function reportInvalid(error: ValidationError): number {
  console.error(chalk.red(error.message));
  console.error(usage());
  return 2;
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof ValidationError) {
      return reportInvalid(error);
    }
    throw error;
  }
  if (args.command === 'help') {
    console.log(usage());
    return 0;
  }

  await loadDotEnv();
  const config = loadConfig();
  // Keep pipeline logs out of the spinner unless asked for.
  setLogLevel(config.logLevel === 'info' ? 'warn' : config.logLevel);
  const store = await SqliteCacheStore.create(config.cacheDbPath, { ttlHours: config.cacheTtlHours });

  try {
    if (args.command === 'purge') {
      const removed = await store.purgeExpired();
      console.log(chalk.cyan(`Removed ${removed} expired cache entr${removed === 1 ? 'y' : 'ies'}`));
      return 0;
    }
    await runSearch(args, config, store);
    return 0;
  } catch (error) {
    if (error instanceof ValidationError) {
      return reportInvalid(error);
    }
    if (error instanceof TotalFetchFailureError) {
      console.error(chalk.red(`${error.message}:`));
      error.failures.forEach(failure => console.error(chalk.dim(`  • ${failure.message}`)));
      return 3;
    }
    console.error(chalk.red(error instanceof AppError ? error.message : `Unexpected error: ${errorMessage(error)}`));
    return 1;
  } finally {
    await store.close();
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

const isMain = isMainModule();

if (isMain) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(chalk.red(`listing-lens failed: ${errorMessage(error)}`));
      process.exitCode = 1;
    });
}
