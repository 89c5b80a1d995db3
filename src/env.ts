import fs from 'fs/promises';
import path from 'path';
import { createLogger } from './logger.js';

const log = createLogger('env');

/** Overrides the location of the env file; relative paths resolve from cwd. */
export const ENV_FILE_VARIABLE = 'LISTING_LENS_ENV_FILE';

function unquote(raw: string): string {
  const quote = raw[0];
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    const inner = raw.slice(1, -1);
    return quote === '"' ? inner.replace(/\\n/g, '\n') : inner;
  }
  // Unquoted values may carry a trailing comment: KEY=value # note
  const hash = raw.search(/\s#/);
  return (hash === -1 ? raw : raw.slice(0, hash)).trim();
}

/**
 * Parse `.env` content into key/value pairs. Accepts an optional `export `
 * prefix; malformed lines are skipped. Later duplicates win.
 */
export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, '');
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      continue;
    }
    values[key] = unquote(trimmed.slice(idx + 1).trim());
  }
  return values;
}

export function resolveEnvPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[ENV_FILE_VARIABLE]?.trim();
  return path.resolve(process.cwd(), override || '.env');
}

/**
 * Copy values from the env file into `target` for keys it does not already
 * set. Returns the keys that were applied.
 */
export async function loadDotEnv(
  envPath: string = resolveEnvPath(),
  target: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    // No .env file found; environment comes from the process only.
    return [];
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (target[key] === undefined || target[key] === '') {
      target[key] = value;
      applied.push(key);
    }
  }
  log.debug(`Loaded ${applied.length} setting(s) from ${envPath}`);
  return applied;
}
