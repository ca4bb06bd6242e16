import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { FetchError, describeError } from '../../errors.js';
import { silentLogger, type Logger } from '../../logger.js';
import { sleep, type Sleep } from '../../throttle.js';
import type { FetchOutcome, SessionCookie } from '../../types.js';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

export interface FetcherOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  userAgent?: string;
  cookies?: SessionCookie[];
  http?: AxiosInstance;
  sleep?: Sleep;
  logger?: Logger;
}

function domainMatches(hostname: string, domain: string): boolean {
  const bare = domain.replace(/^\./, '').toLowerCase();
  const host = hostname.toLowerCase();
  return host === bare || host.endsWith(`.${bare}`);
}

export function buildCookieHeader(url: string, cookies: SessionCookie[]): string | undefined {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return undefined;
  }
  const pairs = cookies
    .filter(cookie => domainMatches(hostname, cookie.domain))
    .map(cookie => `${cookie.name}=${cookie.value}`);
  return pairs.length > 0 ? pairs.join('; ') : undefined;
}

/**
 * HTTP GET with bounded exponential backoff. Never throws: exhausted retries
 * come back as a FetchError value.
 */
export class PageFetcher {
  private http: AxiosInstance;
  private timeoutMs: number;
  private maxAttempts: number;
  private retryBaseDelayMs: number;
  private userAgent: string;
  private cookies: SessionCookie[];
  private wait: Sleep;
  private logger: Logger;

  constructor(options: FetcherOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.cookies = options.cookies ?? [];
    this.wait = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  async fetchHtml(url: string): Promise<FetchOutcome> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    const cookieHeader = buildCookieHeader(url, this.cookies);
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }

    let lastError: unknown = null;
    let lastStatus: number | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      try {
        const response = await this.http.get<string>(url, {
          headers,
          timeout: this.timeoutMs,
          responseType: 'text'
        });
        return { ok: true, body: String(response.data) };
      } catch (error) {
        lastError = error;
        lastStatus = isAxiosError(error) ? error.response?.status : undefined;
        this.logger.warn(`Attempt ${attempt + 1} failed for ${url}: ${describeError(error)}`);
        if (attempt < this.maxAttempts - 1) {
          await this.wait(this.retryBaseDelayMs * 2 ** attempt);
        }
      }
    }

    const failure = new FetchError(url, this.maxAttempts, lastError, lastStatus);
    this.logger.error(`Failed to fetch ${url} after ${this.maxAttempts} attempts`);
    return { ok: false, error: failure };
  }
}
