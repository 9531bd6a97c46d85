import { request } from 'undici';
import { RateLimiter } from '../compliance/rate-limiter.js';

export interface HttpResult {
  body: string;
  status: number;
}

/** What the fetchers and the extractor need from the network. */
export interface HttpClient {
  /** Resolves with the body of a 2xx response; rejects otherwise. */
  get(url: string): Promise<HttpResult>;
}

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`GET ${url} responded ${status}`);
    this.name = 'HttpStatusError';
  }
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

export async function fetchHttp(url: string): Promise<HttpResult> {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: DEFAULT_HEADERS,
    maxRedirections: 3,
    headersTimeout: 15000,
    bodyTimeout: 30000,
  });

  const text = await body.text();

  return {
    body: text,
    status: statusCode,
  };
}

export interface HttpClientOptions {
  delayMs: number;
  /** Transport; defaults to undici */
  fetch?: (url: string) => Promise<HttpResult>;
}

/** Every request of a run shares one politeness slot, whatever its host. */
const POLITENESS_KEY = 'run';

/**
 * HTTP client used by a run: waits `delayMs` between any two requests and
 * treats any non-2xx status as a failure.
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const limiter = new RateLimiter(options.delayMs);
  const transport = options.fetch ?? fetchHttp;

  return {
    async get(url: string): Promise<HttpResult> {
      await limiter.acquire(POLITENESS_KEY);
      const result = await transport(url);
      if (result.status < 200 || result.status >= 300) {
        throw new HttpStatusError(url, result.status);
      }
      return result;
    },
  };
}
