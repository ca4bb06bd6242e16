#!/usr/bin/env node

import boxen from 'boxen';
import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import { CatalogClient } from './api/catalogClient.js';
import { CatalogSync } from './catalogSync.js';
import { buildConfig } from './config.js';
import { Crawler, FAILED_PREVIEW_LIMIT } from './crawler.js';
import { loadDotEnv } from './env.js';
import { ConfigError } from './errors.js';
import { createLogger, type LoggerOptions } from './logger.js';
import { PageFetcher } from './scrapers/forum/fetcher.js';
import { ThreadCache } from './threadCache.js';
import type { CrawlSummary } from './types.js';

function printSummary(summary: CrawlSummary): void {
  const table = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Value')],
    style: { head: [], border: [] }
  });

  table.push(
    ['Listing pages fetched', chalk.cyan(String(summary.pagesFetched))],
    ['Threads found', chalk.cyan(String(summary.threadsFound))],
    ['Duplicates skipped', chalk.dim(String(summary.duplicatesSkipped))],
    ['Threads processed', chalk.cyan(String(summary.processed))],
    ['Sent to catalog', chalk.green(String(summary.succeeded))],
    ['Failed', summary.failedTitles.length > 0 ? chalk.red(String(summary.failedTitles.length)) : chalk.green('0')]
  );

  const lines = [table.toString()];
  if (summary.failedTitles.length > 0) {
    const preview = summary.failedTitles.slice(0, FAILED_PREVIEW_LIMIT);
    const more = summary.failedTitles.length - preview.length;
    lines.push('', chalk.bold.red('Failed threads:'), ...preview.map(title => `  • ${title}`));
    if (more > 0) {
      lines.push(chalk.dim(`  … and ${more} more`));
    }
  }

  console.log(
    boxen(lines.join('\n'), {
      title: 'Crawl summary',
      padding: 1,
      borderColor: summary.failedTitles.length > 0 ? 'yellow' : 'green',
      borderStyle: 'round'
    })
  );
}

async function run(): Promise<void> {
  await loadDotEnv();
  const config = await buildConfig();
  const logOptions: LoggerOptions = { level: config.logLevel, filePath: config.logFile };

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.log(chalk.yellow(`\n${signal} received: finishing in-flight work, press again to exit now`));
    controller.abort();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  const client = new CatalogClient(config.catalogUrl, config.apiKey, { timeoutMs: config.timeoutMs });

  const spinner = ora({ text: 'Loading existing thread IDs from the catalog...', color: 'cyan' }).start();
  const cache = await ThreadCache.load(client, {
    pageSize: config.existingPageSize,
    logger: createLogger('cache', logOptions)
  });
  if (cache.size > 0) {
    spinner.succeed(chalk.green(`Loaded ${cache.size} existing thread IDs`));
  } else {
    spinner.warn(chalk.yellow('No existing thread IDs loaded; every thread found will be sent'));
  }

  const fetcher = new PageFetcher({
    timeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
    userAgent: config.userAgent,
    cookies: config.cookies,
    logger: createLogger('fetch', logOptions)
  });
  const sync = new CatalogSync(client, cache, createLogger('sync', logOptions));
  const crawler = new Crawler(config, {
    fetcher,
    sync,
    cache,
    logger: createLogger('crawler', logOptions),
    signal: controller.signal
  });

  const summary = await crawler.run();
  printSummary(summary);
}

run().catch(error => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Configuration error: ${error.message}`));
  } else {
    console.error(chalk.red('Crawler failed:'), error);
  }
  process.exitCode = 1;
});
