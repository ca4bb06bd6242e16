import { toCatalogPost, type BatchCreateResponse, type CatalogPost } from './api/catalogClient.js';
import { SendError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { GameRecord } from './scrapers/forum/types.js';
import type { ThreadCache } from './threadCache.js';
import type { SendOutcome, SyncResult } from './types.js';

export interface CatalogWriter {
  createPost(post: CatalogPost): Promise<string | number | null>;
  createBatch(posts: CatalogPost[]): Promise<BatchCreateResponse>;
}

function asSendError(error: unknown): SendError {
  return error instanceof SendError ? error : new SendError(describeError(error), { cause: error });
}

/**
 * Pushes records to the catalog. A rejected batch is never fatal: it degrades
 * to one request per record, and only confirmed records enter the cache.
 */
export class CatalogSync {
  private client: CatalogWriter;
  private cache: ThreadCache;
  private logger: Logger;

  constructor(client: CatalogWriter, cache: ThreadCache, logger: Logger = silentLogger) {
    this.client = client;
    this.cache = cache;
    this.logger = logger;
  }

  async sendOne(record: GameRecord): Promise<SendOutcome> {
    try {
      const postId = await this.client.createPost(toCatalogPost(record));
      this.logger.info(`Successfully sent: ${record.title} - Post ID: ${postId ?? 'unknown'}`);
      this.cache.add(record.threadId);
      return { ok: true, postId };
    } catch (error) {
      const sendError = asSendError(error);
      this.logger.error(`Failed to send ${record.title}: ${sendError.message}`);
      if (sendError.responseBody) {
        this.logger.error(`Response: ${sendError.responseBody}`);
      }
      return { ok: false, error: sendError };
    }
  }

  async sendBatch(records: GameRecord[]): Promise<SyncResult> {
    if (records.length === 0) {
      return { mode: 'batch', created: 0, skipped: 0, failed: [] };
    }

    try {
      const result = await this.client.createBatch(records.map(toCatalogPost));
      this.logger.info(`Batch sent: ${result.created} created, ${result.skipped} skipped`);
      records.forEach(record => this.cache.add(record.threadId));
      return { mode: 'batch', created: result.created, skipped: result.skipped, failed: [] };
    } catch (error) {
      const sendError = asSendError(error);
      this.logger.warn(`Batch send failed, falling back to individual sends: ${sendError.message}`);
      if (sendError.responseBody) {
        this.logger.warn(`Response: ${sendError.responseBody}`);
      }
    }

    let created = 0;
    const failed: GameRecord[] = [];
    for (const record of records) {
      const outcome = await this.sendOne(record);
      if (outcome.ok) {
        created += 1;
      } else {
        failed.push(record);
      }
    }
    return { mode: 'individual', created, skipped: 0, failed };
  }
}
