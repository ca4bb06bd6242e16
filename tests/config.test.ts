import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { buildConfig, parseArgs, parseCookieHeader } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-config-'));

function writeConfig(name: string, content: unknown): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filePath;
}

const REQUIRED_ENV = {
  CRAWLER_CATALOG_URL: 'https://catalog.example/api/',
  CRAWLER_API_KEY: 'test-secret'
};

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('buildConfig', () => {
  it('fills defaults around the required catalog settings', async () => {
    const configPath = writeConfig('empty.json', {});
    const config = await buildConfig(['--config', configPath], REQUIRED_ENV);

    expect(config.catalogUrl).toBe('https://catalog.example/api');
    expect(config.apiKey).toBe('test-secret');
    expect(config.imageProxyBase).toBe('https://catalog.example/api');
    expect(config.categoryUrl).toBe('https://f95zone.to/forums/games.2/');
    expect(config.batchSize).toBe(10);
    expect(config.requestDelayMs).toBe(2000);
    expect(config.concurrency).toBe(1);
    expect(config.maxPages).toBeUndefined();
    expect(config.ignoreThreadIds).toEqual(['137266', '50885', '21333']);
    expect(config.logLevel).toBe('info');
  });

  it('layers the config file, then the environment, then flags', async () => {
    const configPath = writeConfig('layers.json', {
      batchSize: 5,
      concurrency: 2,
      requestDelayMs: 100,
      maxPages: 4,
      ignoreThreadIds: [1, '2'],
      imageProxyBase: 'https://images.example/'
    });

    const config = await buildConfig(['--config', configPath, '--batch-size', '9'], {
      ...REQUIRED_ENV,
      CRAWLER_BATCH_SIZE: '7',
      CRAWLER_CONCURRENCY: '3'
    });

    expect(config.batchSize).toBe(9);
    expect(config.concurrency).toBe(3);
    expect(config.requestDelayMs).toBe(100);
    expect(config.maxPages).toBe(4);
    expect(config.ignoreThreadIds).toEqual(['1', '2']);
    expect(config.imageProxyBase).toBe('https://images.example');
  });

  it('reads the config file named in the environment', async () => {
    const configPath = writeConfig('env-named.json', { apiKey: 'test-secret', catalogUrl: 'https://catalog.example' });
    const config = await buildConfig([], { CRAWLER_CONFIG: configPath });
    expect(config.catalogUrl).toBe('https://catalog.example');
  });

  it('drops the page limit with --infinite', async () => {
    const configPath = writeConfig('pages.json', { maxPages: 3 });
    const config = await buildConfig(['--config', configPath, '--infinite'], REQUIRED_ENV);
    expect(config.maxPages).toBeUndefined();
  });

  it('scopes cookie strings to the forum host', async () => {
    const configPath = writeConfig('cookies-env.json', {});
    const config = await buildConfig(['--config', configPath], {
      ...REQUIRED_ENV,
      CRAWLER_FORUM_URL: 'https://forum.example',
      CRAWLER_COOKIES: 'xf_user=test-session; xf_csrf=test-token'
    });

    expect(config.cookies).toEqual([
      { name: 'xf_user', value: 'test-session', domain: 'forum.example' },
      { name: 'xf_csrf', value: 'test-token', domain: 'forum.example' }
    ]);
  });

  it('accepts cookie lists in the config file', async () => {
    const configPath = writeConfig('cookies.json', {
      forumBaseUrl: 'https://forum.example',
      cookies: [
        { name: 'xf_user', value: 'test-session' },
        { name: 'cdn', value: 'x', domain: 'attachments.forum.example' }
      ]
    });
    const config = await buildConfig(['--config', configPath], REQUIRED_ENV);

    expect(config.cookies).toEqual([
      { name: 'xf_user', value: 'test-session', domain: 'forum.example' },
      { name: 'cdn', value: 'x', domain: 'attachments.forum.example' }
    ]);
  });

  it('requires the catalog url and API key', async () => {
    const configPath = writeConfig('no-key.json', { catalogUrl: 'https://catalog.example' });
    await expect(buildConfig(['--config', configPath], {})).rejects.toThrow(
      'apiKey is required (config file "apiKey" or CRAWLER_API_KEY)'
    );
  });

  it('rejects malformed numbers and out-of-range values', async () => {
    const configPath = writeConfig('numbers.json', {});
    await expect(
      buildConfig(['--config', configPath], { ...REQUIRED_ENV, CRAWLER_BATCH_SIZE: 'ten' })
    ).rejects.toThrow('CRAWLER_BATCH_SIZE must be an integer, got "ten"');
    await expect(buildConfig(['--config', configPath, '--concurrency', '0'], REQUIRED_ENV)).rejects.toThrow(
      'concurrency must be positive, got 0'
    );

    const config = await buildConfig(['--config', configPath, '--delay', '0'], REQUIRED_ENV);
    expect(config.requestDelayMs).toBe(0);
  });

  it('rejects unknown log levels', async () => {
    const configPath = writeConfig('levels.json', {});
    await expect(buildConfig(['--config', configPath], { ...REQUIRED_ENV, LOG_LEVEL: 'loud' })).rejects.toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, silent, got "loud"'
    );
  });

  it('fails on a named config file that is missing or invalid', async () => {
    const missing = path.join(tmpDir, 'missing.json');
    await expect(buildConfig(['--config', missing], REQUIRED_ENV)).rejects.toBeInstanceOf(ConfigError);

    const broken = writeConfig('broken.json', '{ "batchSize": ');
    await expect(buildConfig(['--config', broken], REQUIRED_ENV)).rejects.toThrow(
      `Invalid JSON in config file ${broken}`
    );

    const wrongType = writeConfig('wrong-type.json', { batchSize: '10' });
    await expect(buildConfig(['--config', wrongType], REQUIRED_ENV)).rejects.toThrow(
      `${wrongType}: "batchSize" must be an integer`
    );
  });
});

describe('parseArgs', () => {
  it('maps flags onto settings', () => {
    expect(
      parseArgs(['--pages', '3', '--start-page', '2', '--max-threads', '50', '--log-level', 'debug', '--log-file', 'run.log'])
    ).toEqual({
      infinite: false,
      values: { maxPages: 3, startPage: 2, maxThreads: 50, logLevel: 'debug', logFile: 'run.log' }
    });
  });

  it('ignores unknown flags', () => {
    expect(parseArgs(['--verbose', '--infinite'])).toEqual({ infinite: true, values: {} });
  });
});

describe('parseCookieHeader', () => {
  it('skips fragments without a name', () => {
    expect(parseCookieHeader('a=1; =2; junk; b = two ', 'forum.example')).toEqual([
      { name: 'a', value: '1', domain: 'forum.example' },
      { name: 'b', value: 'two', domain: 'forum.example' }
    ]);
  });
});
