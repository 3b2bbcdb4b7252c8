#!/usr/bin/env node

import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { CrawlRun } from './run.js';
import { DuplicateScanner } from './duplicate-scanner.js';
import { HttpTransfer } from './transfer.js';
import { openPlaywrightRenderer } from './renderer.js';
import { logger } from './utils/logger.js';
import { describeError } from './errors.js';
import {
  buildConfig,
  parseBrowser,
  parseCount,
  parseCredentials,
  DEFAULT_RETRIES,
  DEFAULT_TIMEOUT,
  type CrawlOptions
} from './config.js';
import { LOG_FILE_NAME, type Config } from './types.js';

const program: Command = new Command();

program
  .name('vimeo-mirror')
  .description('Mirrors the videos, albums and channels of an account into a local folder tree')
  .version('3.0.0');

// Crawl command (default)
program
  .command('crawl [url]', { isDefault: true })
  .description('Download the video, folder or whole account at a URL (or a bare video ID)')
  .option('-d, --directory <dir>', 'Target directory for all output files', '.')
  .option('-l, --login <credentials>', 'Login credentials, formatted as email:password', parseCredentials)
  .option('-m, --max-items <n>', 'Maximum number of items to take from one listing page', parseCount)
  .option('-r, --retries <n>', 'Page and download retry attempts', parseCount, DEFAULT_RETRIES)
  .option('-t, --timeout <seconds>', 'Download timeout, also the longest tolerated stall', parseCount, DEFAULT_TIMEOUT)
  .option('-s, --set-language <language>', 'Try to set this interface language while crawling')
  .option('-w, --browser <name>', 'Browser engine: chromium, firefox or webkit', parseBrowser, 'chromium')
  .option('--headful', 'Show the browser window', false)
  .option('-v, --verbose', 'Verbose output', false)
  .option('-n, --no-download', 'Crawl only, do not download anything')
  .option('-f, --no-folders', 'Do not create subfolders with links for channels and albums')
  .option('-z, --no-filesize', 'Do not probe remote file sizes')
  .option('--hard-links', 'Use hard links instead of symbolic links in subfolders', false)
  .action(crawlAction);

// Dedup command
program
  .command('dedup <directory>')
  .description('Remove smaller duplicates of the same video from a directory')
  .option('-v, --verbose', 'Verbose output', false)
  .option('--dry-run', 'Show what would be deleted without deleting', false)
  .action(dedupAction);

await program.parseAsync();

async function crawlAction(url: string | undefined, options: CrawlOptions) {
  const config = configOrExit(url, options);
  logger.setVerbose(config.verbose);
  await fs.mkdir(config.outputDir, { recursive: true });
  await logger.attachFile(path.join(config.outputDir, LOG_FILE_NAME));

  logger.info(`Starting ${config.browser}...`);
  logger.info(`Output directory: ${config.outputDir}`);
  if (!config.download) {
    logger.info('CRAWL ONLY MODE');
  }

  const run = new CrawlRun(config, {
    openRenderer: () => openPlaywrightRenderer({
      browser: config.browser,
      headless: config.headless,
      timeout: config.timeout
    }),
    transfer: new HttpTransfer()
  });

  process.on('SIGINT', () => run.interrupt());

  const summary = await run.execute();
  logger.info(`Videos: ${summary.videos}, folders: ${summary.folders}`);
  await logger.detachFile();
  process.exit(summary.errors > 0 ? 1 : 0);
}

function configOrExit(url: string | undefined, options: CrawlOptions): Config {
  try {
    return buildConfig(url, options);
  } catch (error) {
    program.error(`ERROR: ${describeError(error)}`, { exitCode: 2 });
  }
}

async function dedupAction(directory: string, options: { verbose: boolean; dryRun: boolean }) {
  const absDir = path.resolve(directory);

  logger.setVerbose(options.verbose);

  try {
    await new DuplicateScanner().scan(absDir, { dryRun: options.dryRun });
  } catch (error) {
    logger.error(`Failed: ${describeError(error)}`);
    process.exit(1);
  }
}
