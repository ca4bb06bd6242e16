import { describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export interface ExistingThreadSource {
  getExistingThreadIds(limit: number, offset: number): Promise<string[]>;
}

export interface ThreadCacheLoadOptions {
  pageSize?: number;
  logger?: Logger;
}

const DEFAULT_PAGE_SIZE = 2000;

/**
 * Thread ids the catalog already holds, for the lifetime of one run.
 *
 * Ids are only ever added. A claimed id belongs to work in flight: it is not
 * yet known to the catalog but must not be dispatched a second time.
 */
export class ThreadCache {
  private known: Set<string>;
  private claimed = new Set<string>();

  constructor(ids: Iterable<string> = []) {
    this.known = new Set(ids);
  }

  /**
   * Seeds a cache from the catalog page by page. A failed page ends paging
   * with whatever was read so far; startup never fails here.
   */
  static async load(source: ExistingThreadSource, options: ThreadCacheLoadOptions = {}): Promise<ThreadCache> {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    const logger = options.logger ?? silentLogger;
    const ids = new Set<string>();
    let offset = 0;

    while (true) {
      let page: string[];
      try {
        page = await source.getExistingThreadIds(pageSize, offset);
      } catch (error) {
        logger.warn(`Could not fetch existing thread IDs at offset ${offset}: ${describeError(error)}`);
        break;
      }

      page.forEach(id => ids.add(id));
      if (page.length < pageSize) {
        break;
      }
      offset += pageSize;
    }

    logger.info(`Loaded ${ids.size} existing thread IDs from the catalog`);
    return new ThreadCache(ids);
  }

  get size(): number {
    return this.known.size;
  }

  has(threadId: string): boolean {
    return this.known.has(threadId);
  }

  add(threadId: string): void {
    this.known.add(threadId);
    this.claimed.delete(threadId);
  }

  /** False when the id is already known or held by other work. */
  claim(threadId: string): boolean {
    if (this.known.has(threadId) || this.claimed.has(threadId)) {
      return false;
    }
    this.claimed.add(threadId);
    return true;
  }

  release(threadId: string): void {
    this.claimed.delete(threadId);
  }
}
