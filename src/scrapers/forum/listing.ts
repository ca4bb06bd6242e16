import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError, describeError } from '../../errors.js';
import { silentLogger, type Logger } from '../../logger.js';
import { normalizeText, resolveUrl } from './dom.js';
import type { ListingParseOptions, ThreadSummary } from './types.js';

/** Announcement and rules threads pinned to every listing page. */
export const DEFAULT_IGNORED_THREAD_IDS: readonly string[] = ['137266', '50885', '21333'];

const THREAD_ID_PATTERN = /threads\/[^/]+\.(\d+)/;

export function extractThreadId(url: string): string | null {
  const match = url.match(THREAD_ID_PATTERN);
  return match?.[1] ?? null;
}

export function buildListingPageUrl(categoryUrl: string, page: number): string {
  if (page <= 1) {
    return categoryUrl;
  }
  const base = categoryUrl.endsWith('/') ? categoryUrl : `${categoryUrl}/`;
  return `${base}page-${page}`;
}

/** Parses `1,234`, `12K` or `1.5M`; null when the text holds no count. */
export function parseCount(value: string): number | null {
  const cleaned = value.replace(/,/g, '').trim();
  if (!cleaned) {
    return null;
  }
  const match = cleaned.match(/^(\d+(?:\.\d+)?)\s*([KkMm])?$/);
  if (!match) {
    return null;
  }
  const base = Number.parseFloat(match[1]);
  const suffix = match[2]?.toUpperCase();
  const multiplier = suffix === 'K' ? 1_000 : suffix === 'M' ? 1_000_000 : 1;
  return Math.round(base * multiplier);
}

function parseMetaPairs($: cheerio.CheerioAPI, item: cheerio.Cheerio<Element>): { replies: number; views: number } {
  let replies = 0;
  let views = 0;

  item.find('div.structItem-cell--meta dl.pairs').each((_idx, pair) => {
    const dt = $(pair).find('dt').first();
    const dd = $(pair).find('dd').first();
    if (!dt.length || !dd.length) {
      return;
    }
    const label = (dt.attr('title') || dt.text()).trim();
    const isReplies = label.startsWith('Replies');
    const isViews = label.startsWith('Views');
    if (!isReplies && !isViews) {
      return;
    }
    const raw = dd.text();
    const count = parseCount(raw);
    if (count === null) {
      throw new ParseError(`Unreadable ${isReplies ? 'replies' : 'views'} count "${raw.trim()}"`);
    }
    if (isReplies) {
      replies = count;
    } else {
      views = count;
    }
  });

  return { replies, views };
}

function parseRating(item: cheerio.Cheerio<Element>): { rating: number; ratingCount: number } {
  let rating = 0;
  let ratingCount = 0;

  const starsTitle = item.find('span.ratingStars').first().attr('title') ?? '';
  const ratingMatch = starsTitle.match(/([\d.]+)\s+star/);
  if (ratingMatch) {
    const parsed = Number.parseFloat(ratingMatch[1]);
    rating = Number.isFinite(parsed) ? parsed : 0;
  }

  const countText = item.find('span.ratingStarsRow-text').first().text();
  const countMatch = countText.match(/(\d+)/);
  if (countMatch) {
    ratingCount = Number.parseInt(countMatch[1], 10);
  }

  return { rating, ratingCount };
}

function parseThreadItem(
  $: cheerio.CheerioAPI,
  item: cheerio.Cheerio<Element>,
  options: ListingParseOptions,
  logger: Logger
): ThreadSummary | null {
  const titleLink = item.find('a[data-tp-primary="on"]').first();
  if (!titleLink.length) {
    return null;
  }

  const threadUrl = resolveUrl(titleLink.attr('href') ?? '', options.baseUrl);
  const title = normalizeText(titleLink.text());
  const threadId = extractThreadId(threadUrl);

  if (!threadId) {
    logger.debug(`Dropping thread without id: ${title} (${threadUrl})`);
    return null;
  }
  if (options.ignoreThreadIds.has(threadId)) {
    logger.info(`Skipping ignored thread: ${title} (ID: ${threadId})`);
    return null;
  }

  const authorLink = item.find('a.username').first();
  const author = authorLink.length ? normalizeText(authorLink.text()) || 'Unknown' : 'Unknown';
  const authorHref = authorLink.attr('href');
  const authorUrl = authorHref ? resolveUrl(authorHref, options.baseUrl) : '';

  const { replies, views } = parseMetaPairs($, item);
  const { rating, ratingCount } = parseRating(item);

  const prefixes = item
    .find('a.labelLink')
    .toArray()
    .map(element => normalizeText($(element).text()))
    .filter(Boolean);

  return {
    threadId,
    threadUrl,
    title,
    author,
    authorUrl,
    replies,
    views,
    rating,
    ratingCount,
    prefixes
  };
}

/** Thread summaries of one listing page, in display order. */
export function parseListingPage(
  html: string,
  options: ListingParseOptions,
  logger: Logger = silentLogger
): ThreadSummary[] {
  const $ = cheerio.load(html);
  const threads: ThreadSummary[] = [];

  $('div.structItem--thread').each((index, element) => {
    try {
      const summary = parseThreadItem($, $(element), options, logger);
      if (summary) {
        threads.push(summary);
      }
    } catch (error) {
      logger.error(`Error parsing thread item #${index + 1}: ${describeError(error)}`);
    }
  });

  return threads;
}
