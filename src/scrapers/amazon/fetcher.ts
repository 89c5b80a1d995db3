import axios, { AxiosInstance, isAxiosError } from 'axios';
import { FetchError, errorMessage } from '../../errors.js';
import { buildSearchPageUrl } from './search.js';

export interface PageFetcher {
  /** Resolve with the markup of one results page, or reject with a FetchError. */
  fetchPage(query: string, page: number, signal?: AbortSignal): Promise<string>;
}

export interface HttpFetcherConfig {
  baseUrl: string;
  timeoutMs: number;
  userAgent?: string;
}

const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_3) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.3 Safari/605.1.15'
];

const BLOCK_MARKERS = ['/errors/validateCaptcha', 'Enter the characters you see below', 'api-services-support@amazon.com'];

export function looksBlocked(html: string): boolean {
  return BLOCK_MARKERS.some(marker => html.includes(marker));
}

export class HttpPageFetcher implements PageFetcher {
  private client: AxiosInstance;
  private config: HttpFetcherConfig;

  constructor(config: HttpFetcherConfig, client?: AxiosInstance) {
    this.config = config;
    this.client = client ?? axios.create({ timeout: config.timeoutMs, responseType: 'text' });
  }

  async fetchPage(query: string, page: number, signal?: AbortSignal): Promise<string> {
    const url = buildSearchPageUrl(this.config.baseUrl, query, page);
    let html: string;
    try {
      const response = await this.client.get<string>(url, {
        headers: this.buildHeaders(),
        timeout: this.config.timeoutMs,
        responseType: 'text',
        signal
      });
      html = String(response.data ?? '');
    } catch (error) {
      throw new FetchError(page, `Failed to fetch page ${page}: ${describeRequestError(error)}`, { cause: error });
    }

    if (looksBlocked(html)) {
      throw new FetchError(page, `Page ${page} was served a captcha challenge`);
    }
    return html;
  }

  private buildHeaders(): Record<string, string> {
    const userAgent = this.config.userAgent || USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
    return {
      'User-Agent': userAgent,
      'Accept-Language': 'en-IN,en;q=0.9',
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Cache-Control': 'no-cache'
    };
  }
}

function describeRequestError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    if (error.code === 'ERR_CANCELED') {
      return 'request cancelled';
    }
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
  }
  return errorMessage(error);
}
