import fs from 'fs/promises';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_IGNORED_THREAD_IDS,
  buildListingPageUrl,
  extractThreadId,
  parseCount,
  parseListingPage
} from '../src/scrapers/forum/listing.js';
import { recordingLogger } from './helpers/records.js';

const options = {
  baseUrl: 'https://forum.example',
  ignoreThreadIds: new Set(DEFAULT_IGNORED_THREAD_IDS)
};

async function loadListing(): Promise<string> {
  return fs.readFile(new URL('./fixtures/listing.html', import.meta.url), 'utf-8');
}

describe('parseListingPage', () => {
  it('emits summaries in page order, dropping ignored, id-less and malformed items', async () => {
    const threads = parseListingPage(await loadListing(), options);
    expect(threads.map(thread => thread.threadId)).toEqual(['1001', '1002', '1004']);
  });

  it('reads title, author, counters, rating and prefixes', async () => {
    const [first] = parseListingPage(await loadListing(), options);
    expect(first).toEqual({
      threadId: '1001',
      threadUrl: 'https://forum.example/threads/lighthouse-keeper-v1-0-devco.1001/',
      title: 'Lighthouse Keeper [v1.0] [DevCo]',
      author: 'DevCo',
      authorUrl: 'https://forum.example/members/devco.55/',
      replies: 1234,
      views: 56000,
      rating: 4.5,
      ratingCount: 12,
      prefixes: ["Ren'Py", 'Completed']
    });
  });

  it('defaults missing counters, rating and author instead of failing', async () => {
    const threads = parseListingPage(await loadListing(), options);
    const harbor = threads.find(thread => thread.threadId === '1002');
    expect(harbor).toEqual({
      threadId: '1002',
      threadUrl: 'https://forum.example/threads/quiet-harbor.1002/',
      title: 'Quiet Harbor [0.3]',
      author: 'Unknown',
      authorUrl: '',
      replies: 0,
      views: 0,
      rating: 0,
      ratingCount: 0,
      prefixes: []
    });
  });

  it('expands abbreviated view counts', async () => {
    const threads = parseListingPage(await loadListing(), options);
    const train = threads.find(thread => thread.threadId === '1004');
    expect(train?.views).toBe(1500000);
    expect(train?.replies).toBe(87);
    expect(train?.prefixes).toEqual(['VN']);
  });

  it('logs the ignored and the malformed items', async () => {
    const logger = recordingLogger();
    parseListingPage(await loadListing(), options, logger);
    expect(logger.lines).toContain('info Skipping ignored thread: Forum Rules (ID: 137266)');
    expect(logger.lines).toContain('error Error parsing thread item #5: Unreadable replies count "n/a"');
  });

  it('honours a custom ignore list', async () => {
    const threads = parseListingPage(await loadListing(), {
      baseUrl: 'https://forum.example',
      ignoreThreadIds: new Set(['1001'])
    });
    expect(threads.map(thread => thread.threadId)).toEqual(['137266', '1002', '1004']);
  });

  it('returns nothing for a page without thread items', () => {
    expect(parseListingPage('<html><body><p>Maintenance</p></body></html>', options)).toEqual([]);
  });
});

describe('extractThreadId', () => {
  it('takes the numeric suffix of the thread path segment', () => {
    expect(extractThreadId('https://forum.example/threads/some-game-v0-1.98765/')).toBe('98765');
    expect(extractThreadId('https://forum.example/threads/some-game.98765/page-3')).toBe('98765');
  });

  it('returns null for paths without an id', () => {
    expect(extractThreadId('https://forum.example/threads/some-game/')).toBeNull();
    expect(extractThreadId('https://forum.example/forums/games.2/')).toBeNull();
  });
});

describe('parseCount', () => {
  it('strips thousands separators and expands suffixes', () => {
    expect(parseCount('12,345')).toBe(12345);
    expect(parseCount(' 7 ')).toBe(7);
    expect(parseCount('3K')).toBe(3000);
    expect(parseCount('2.4m')).toBe(2400000);
  });

  it('rejects text without a count', () => {
    expect(parseCount('')).toBeNull();
    expect(parseCount('n/a')).toBeNull();
  });
});

describe('buildListingPageUrl', () => {
  it('uses the category url for the first page and page-N after that', () => {
    expect(buildListingPageUrl('https://forum.example/forums/games.2/', 1)).toBe('https://forum.example/forums/games.2/');
    expect(buildListingPageUrl('https://forum.example/forums/games.2/', 3)).toBe(
      'https://forum.example/forums/games.2/page-3'
    );
    expect(buildListingPageUrl('https://forum.example/forums/games.2', 2)).toBe(
      'https://forum.example/forums/games.2/page-2'
    );
  });
});
