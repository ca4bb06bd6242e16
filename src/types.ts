import type { FetchError, ParseError, SendError } from './errors.js';
import type { LogLevel } from './logger.js';
import type { GameRecord } from './scrapers/forum/types.js';

export type FetchOutcome = { ok: true; body: string } | { ok: false; error: FetchError };

export type ParseResult = { ok: true; record: GameRecord } | { ok: false; error: ParseError };

export type SendOutcome = { ok: true; postId: string | number | null } | { ok: false; error: SendError };

export interface SyncResult {
  mode: 'batch' | 'individual';
  created: number;
  skipped: number;
  failed: GameRecord[];
}

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
}

export interface CrawlerConfig {
  forumBaseUrl: string;
  categoryUrl: string;
  attachmentHost: string;
  catalogUrl: string;
  apiKey: string;
  imageProxyBase: string;
  cookies: SessionCookie[];
  existingPageSize: number;
  requestDelayMs: number;
  batchSize: number;
  concurrency: number;
  startPage: number;
  maxPages?: number;
  maxThreads?: number;
  ignoreThreadIds: string[];
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  userAgent: string;
  logLevel: LogLevel;
  logFile?: string;
}

export interface CrawlSummary {
  pagesFetched: number;
  threadsFound: number;
  duplicatesSkipped: number;
  processed: number;
  succeeded: number;
  failedTitles: string[];
}
