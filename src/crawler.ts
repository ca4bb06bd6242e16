import { describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { buildListingPageUrl, parseListingPage } from './scrapers/forum/listing.js';
import { parseThreadPage } from './scrapers/forum/thread.js';
import type { GameRecord, ThreadParseOptions, ThreadSummary } from './scrapers/forum/types.js';
import type { ThreadCache } from './threadCache.js';
import { createThrottle, sleep, type Sleep, type Throttle } from './throttle.js';
import type { CrawlSummary, CrawlerConfig, FetchOutcome, SyncResult } from './types.js';

export const FAILED_PREVIEW_LIMIT = 10;

export interface HtmlSource {
  fetchHtml(url: string): Promise<FetchOutcome>;
}

export interface RecordSink {
  sendBatch(records: GameRecord[]): Promise<SyncResult>;
}

export type CrawlerSettings = Pick<
  CrawlerConfig,
  | 'forumBaseUrl'
  | 'categoryUrl'
  | 'attachmentHost'
  | 'imageProxyBase'
  | 'ignoreThreadIds'
  | 'requestDelayMs'
  | 'batchSize'
  | 'concurrency'
  | 'startPage'
  | 'maxPages'
  | 'maxThreads'
>;

export interface CrawlerDeps {
  fetcher: HtmlSource;
  sync: RecordSink;
  cache: ThreadCache;
  logger?: Logger;
  sleep?: Sleep;
  signal?: AbortSignal;
}

/**
 * Drives listing pages into batches of parsed records and hands each batch to
 * the catalog. Per-thread failures are recorded and skipped; the run goes on.
 */
export class Crawler {
  private settings: CrawlerSettings;
  private fetcher: HtmlSource;
  private sync: RecordSink;
  private cache: ThreadCache;
  private logger: Logger;
  private signal?: AbortSignal;
  private throttles: Throttle[];
  private ignoreThreadIds: ReadonlySet<string>;
  private parseOptions: ThreadParseOptions;
  private threadBudget: number;
  private summary: CrawlSummary = {
    pagesFetched: 0,
    threadsFound: 0,
    duplicatesSkipped: 0,
    processed: 0,
    succeeded: 0,
    failedTitles: []
  };

  constructor(settings: CrawlerSettings, deps: CrawlerDeps) {
    this.settings = settings;
    this.fetcher = deps.fetcher;
    this.sync = deps.sync;
    this.cache = deps.cache;
    this.logger = deps.logger ?? silentLogger;
    this.signal = deps.signal;

    const workers = Math.max(1, settings.concurrency);
    const wait = deps.sleep ?? sleep;
    this.throttles = Array.from({ length: workers }, () => createThrottle(settings.requestDelayMs, wait));
    this.ignoreThreadIds = new Set(settings.ignoreThreadIds);
    this.parseOptions = {
      baseUrl: settings.forumBaseUrl,
      attachmentHost: settings.attachmentHost,
      imageProxyBase: settings.imageProxyBase
    };
    this.threadBudget = settings.maxThreads ?? Number.POSITIVE_INFINITY;
  }

  private get aborted(): boolean {
    return this.signal?.aborted ?? false;
  }

  getSummary(): CrawlSummary {
    return { ...this.summary, failedTitles: [...this.summary.failedTitles] };
  }

  async run(): Promise<CrawlSummary> {
    const { startPage, maxPages, batchSize } = this.settings;
    this.logger.info('Starting crawler');
    this.logger.info(
      maxPages === undefined
        ? `Crawling category pages from page ${startPage} until stopped`
        : `Crawling ${maxPages} category page(s)`
    );
    this.logger.info(`Batch processing: ${batchSize} threads per batch`);

    if (maxPages !== undefined) {
      const pages = Array.from({ length: maxPages }, (_value, index) => startPage + index);
      const threads = await this.crawlListings(pages);
      this.logger.info(`Total threads found: ${threads.length}`);
      if (threads.length === 0) {
        this.logger.warn('No threads found, exiting');
      } else {
        await this.crawlThreads(threads);
      }
    } else {
      for (let page = startPage; !this.aborted && this.threadBudget > 0; page += 1) {
        const fetchedBefore = this.summary.pagesFetched;
        const threads = await this.crawlListings([page]);
        if (this.summary.pagesFetched > fetchedBefore && threads.length === 0) {
          this.logger.info(`Page ${page} lists no threads, stopping`);
          break;
        }
        await this.crawlThreads(threads);
      }
    }

    this.report();
    this.logger.info('Crawler completed');
    return this.getSummary();
  }

  async crawlListings(pages: number[]): Promise<ThreadSummary[]> {
    const throttle = this.throttles[0];
    const threads: ThreadSummary[] = [];

    for (const page of pages) {
      if (this.aborted) {
        break;
      }
      const pageUrl = buildListingPageUrl(this.settings.categoryUrl, page);
      this.logger.info(`Fetching category page ${page}: ${pageUrl}`);

      const outcome = await throttle(() => this.fetcher.fetchHtml(pageUrl));
      if (!outcome.ok) {
        this.logger.warn(`Skipping page ${page} due to fetch error`);
        continue;
      }
      this.summary.pagesFetched += 1;

      const found = parseListingPage(
        outcome.body,
        { baseUrl: this.settings.forumBaseUrl, ignoreThreadIds: this.ignoreThreadIds },
        this.logger
      );
      this.logger.info(`Found ${found.length} threads on page ${page}`);
      this.summary.threadsFound += found.length;
      threads.push(...found);
    }

    return threads;
  }

  async crawlThreads(threads: ThreadSummary[]): Promise<number> {
    const limited = threads.slice(0, Math.max(0, this.threadBudget));
    this.threadBudget -= limited.length;

    const toProcess: ThreadSummary[] = [];
    let skipped = 0;
    for (const thread of limited) {
      if (this.cache.claim(thread.threadId)) {
        toProcess.push(thread);
      } else {
        this.logger.info(`Skipping duplicate: ${thread.title} (ID: ${thread.threadId})`);
        skipped += 1;
      }
    }
    this.summary.duplicatesSkipped += skipped;
    this.logger.info(`Skipped ${skipped} duplicates, processing ${toProcess.length} new threads`);

    const total = toProcess.length;
    const batchSize = Math.max(1, this.settings.batchSize);
    let succeeded = 0;

    for (let batchStart = 0; batchStart < total; batchStart += batchSize) {
      if (this.aborted) {
        toProcess.slice(batchStart).forEach(thread => this.cache.release(thread.threadId));
        this.logger.warn(`Stopping before thread ${batchStart + 1}/${total}`);
        break;
      }

      const batchEnd = Math.min(batchStart + batchSize, total);
      const batch = toProcess.slice(batchStart, batchEnd);
      this.logger.info(
        `Processing batch ${Math.floor(batchStart / batchSize) + 1} (${batchStart + 1}-${batchEnd}/${total})`
      );

      const records = await this.processBatch(batch, batchStart, total);
      if (records.length > 0) {
        succeeded += await this.sendRecords(batch, records);
      }
      this.logger.info(`Batch complete: ${this.summary.succeeded}/${this.summary.processed} threads processed successfully`);
    }

    return succeeded;
  }

  private async sendRecords(batch: ThreadSummary[], records: GameRecord[]): Promise<number> {
    const titles = new Map(batch.map(thread => [thread.threadId, thread.title]));
    let result: SyncResult;
    try {
      result = await this.sync.sendBatch(records);
    } catch (error) {
      this.logger.error(`Sync failed for batch: ${describeError(error)}`);
      result = { mode: 'individual', created: 0, skipped: 0, failed: records };
    }

    for (const record of result.failed) {
      this.cache.release(record.threadId);
      this.summary.failedTitles.push(titles.get(record.threadId) ?? record.title);
    }
    const sent = records.length - result.failed.length;
    this.summary.succeeded += sent;
    return sent;
  }

  /** Fetches and parses one batch through the worker pool; records keep listing order. */
  private async processBatch(batch: ThreadSummary[], offset: number, total: number): Promise<GameRecord[]> {
    const results: Array<GameRecord | null> = batch.map(() => null);
    let next = 0;

    const workers = this.throttles.slice(0, batch.length).map(async throttle => {
      while (next < batch.length && !this.aborted) {
        const index = next;
        next += 1;
        results[index] = await this.processThread(batch[index], offset + index + 1, total, throttle);
      }
    });
    await Promise.all(workers);

    batch.slice(next).forEach(thread => this.cache.release(thread.threadId));
    return results.filter((record): record is GameRecord => record !== null);
  }

  private async processThread(
    thread: ThreadSummary,
    position: number,
    total: number,
    throttle: Throttle
  ): Promise<GameRecord | null> {
    this.logger.info(`Processing thread ${position}/${total}: ${thread.title}`);
    this.summary.processed += 1;

    try {
      const page = await throttle(() => this.fetcher.fetchHtml(thread.threadUrl));
      if (!page.ok) {
        this.logger.warn(`Skipping thread: ${thread.title}`);
        this.markFailed(thread);
        return null;
      }

      const parsed = parseThreadPage(page.body, thread, this.parseOptions);
      if (!parsed.ok) {
        this.logger.warn(`Failed to parse thread: ${thread.title} (${parsed.error.message})`);
        this.markFailed(thread);
        return null;
      }
      return parsed.record;
    } catch (error) {
      this.logger.error(`Error processing thread ${thread.title}: ${describeError(error)}`);
      this.markFailed(thread);
      return null;
    }
  }

  private markFailed(thread: ThreadSummary): void {
    this.cache.release(thread.threadId);
    this.summary.failedTitles.push(thread.title);
  }

  private report(): void {
    const { failedTitles, succeeded, processed } = this.summary;
    if (failedTitles.length > 0) {
      this.logger.warn(`Failed threads: ${failedTitles.slice(0, FAILED_PREVIEW_LIMIT).join(', ')}`);
    }
    this.logger.info(`Completed: ${succeeded}/${processed} threads successfully processed`);
  }
}
