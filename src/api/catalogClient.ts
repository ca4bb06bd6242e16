/**
 * Catalog API Client
 *
 * Talks to the remote game catalog: lists the thread ids it already holds and
 * creates posts one at a time or in batches. Every request carries the
 * catalog's API key.
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { SendError, describeError } from '../errors.js';
import type { GameRecord } from '../scrapers/forum/types.js';

export interface CatalogDownloadLink {
  platform: string;
  host: string;
  url: string;
}

/** A game record as the catalog receives it. */
export interface CatalogPost {
  thread_id: string;
  thread_url: string;
  title: string;
  author: string;
  author_url: string;
  replies: number;
  views: number;
  rating: number;
  rating_count: number;
  prefixes: string[];
  version: string;
  developer: string;
  developer_url?: string;
  categories: string[];
  tags: string[];
  content: string;
  overview?: string;
  changelog?: string;
  installation?: string;
  release_date?: string;
  thread_updated?: string;
  censored?: string;
  os_platforms?: string;
  language?: string;
  genre?: string;
  download_links: CatalogDownloadLink[];
  images: string[];
  featured_image?: string;
  use_external_images: boolean;
}

export interface BatchCreateResponse {
  created: number;
  skipped: number;
}

export interface CatalogClientOptions {
  timeoutMs?: number;
  batchTimeoutMs?: number;
  http?: AxiosInstance;
}

export function toCatalogPost(record: GameRecord): CatalogPost {
  return {
    thread_id: record.threadId,
    thread_url: record.threadUrl,
    title: record.title,
    author: record.author,
    author_url: record.authorUrl,
    replies: record.replies,
    views: record.views,
    rating: record.rating,
    rating_count: record.ratingCount,
    prefixes: record.prefixes,
    version: record.version,
    developer: record.developer,
    developer_url: record.developerUrl,
    categories: record.categories,
    tags: record.tags,
    content: record.content,
    overview: record.overview,
    changelog: record.changelog,
    installation: record.installation,
    release_date: record.releaseDate,
    thread_updated: record.threadUpdated,
    censored: record.censored,
    os_platforms: record.osPlatforms,
    language: record.language,
    genre: record.genre,
    download_links: record.downloadLinks.map(link => ({ ...link })),
    images: record.images,
    featured_image: record.featuredImage,
    use_external_images: record.useExternalImages
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCount(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function bodyPreview(data: unknown): string | undefined {
  if (data === undefined || data === null || data === '') {
    return undefined;
  }
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.length > 500 ? `${text.slice(0, 500)}…` : text;
}

function toSendError(action: string, error: unknown): SendError {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    return new SendError(`${action} failed${status ? ` (status ${status})` : ''}: ${error.message}`, {
      cause: error,
      status,
      responseBody: bodyPreview(error.response?.data)
    });
  }
  return new SendError(`${action} failed: ${describeError(error)}`, { cause: error });
}

export class CatalogClient {
  private client: AxiosInstance;
  private timeoutMs: number;
  private batchTimeoutMs: number;

  constructor(baseUrl: string, apiKey: string, options: CatalogClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.batchTimeoutMs = options.batchTimeoutMs ?? 60000;
    this.client = options.http ?? axios.create();
    this.client.defaults.baseURL = baseUrl.replace(/\/+$/, '');
    this.client.defaults.headers.common['X-API-Key'] = apiKey;
  }

  /**
   * One page of thread ids known to the catalog. Throws on any non-success
   * response; paging policy belongs to the caller.
   */
  async getExistingThreadIds(limit: number, offset: number): Promise<string[]> {
    const response = await this.client.get<unknown>('/existing-threads', {
      params: { limit, offset },
      timeout: 15000
    });
    const ids = isRecord(response.data) ? response.data.thread_ids : undefined;
    if (!Array.isArray(ids)) {
      return [];
    }
    return ids
      .filter(id => typeof id === 'string' || typeof id === 'number')
      .map(id => String(id));
  }

  /**
   * Create a single post; resolves with the catalog's post id
   */
  async createPost(post: CatalogPost): Promise<string | number | null> {
    try {
      const response = await this.client.post<unknown>('/create-post', post, { timeout: this.timeoutMs });
      const postId = isRecord(response.data) ? response.data.post_id : undefined;
      return typeof postId === 'string' || typeof postId === 'number' ? postId : null;
    } catch (error) {
      throw toSendError('Create post', error);
    }
  }

  /**
   * Create many posts in one request
   */
  async createBatch(posts: CatalogPost[]): Promise<BatchCreateResponse> {
    try {
      const response = await this.client.post<unknown>(
        '/create-batch',
        { posts },
        { timeout: this.batchTimeoutMs }
      );
      const data = isRecord(response.data) ? response.data : {};
      return {
        created: toCount(data.created),
        skipped: toCount(data.skipped)
      };
    } catch (error) {
      throw toSendError('Create batch', error);
    }
  }
}
