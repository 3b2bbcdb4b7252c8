import { promises as fs } from 'fs';
import type { Writable } from 'stream';
import { logger } from './utils/logger.js';
import { writeShortcut } from './utils/file-utils.js';
import { classifyLink, shortcutContents } from './link.js';
import { SiteCrawler } from './crawler.js';
import { DownloadEngine } from './downloader.js';
import { DuplicateScanner } from './duplicate-scanner.js';
import { InterruptedError, NavigationError, describeError } from './errors.js';
import { createSession, downloadOrder } from './session.js';
import type { PageRenderer } from './renderer.js';
import type { BulkTransfer } from './transfer.js';
import type { Config, CrawlSession, RunSummary } from './types.js';

export interface RunDependencies {
  openRenderer: () => Promise<PageRenderer>;
  transfer: BulkTransfer;
  /** Where transfer progress goes, stdout by default */
  progressOut?: Writable;
}

/**
 * One complete crawl: walk the site, download every video found, close the
 * browser, then reconcile duplicates in the flat store.
 */
export class CrawlRun {
  readonly session: CrawlSession = createSession();
  private readonly abortController = new AbortController();
  private engine: DownloadEngine | null = null;

  constructor(private config: Config, private deps: RunDependencies) {}

  /**
   * Abort the running transfer if there is one, otherwise stop the whole run
   * at the next step.
   */
  interrupt() {
    if (this.engine?.interrupt()) {
      logger.warn('Interrupting the current download...');
      return;
    }
    logger.warn('Interrupting the crawl...');
    this.abortController.abort();
  }

  async execute(): Promise<RunSummary> {
    const { config, session } = this;
    await fs.mkdir(config.outputDir, { recursive: true });

    let startNode = config.startUrl ? classifyLink(config.startUrl) : null;
    if (startNode) {
      await writeShortcut(config.outputDir, shortcutContents(startNode));
    }

    let renderer: PageRenderer | null = null;
    try {
      renderer = await this.deps.openRenderer();
      const crawler = new SiteCrawler(renderer, config, session, this.abortController.signal);

      if (config.credentials && !(await crawler.login(config.credentials))) {
        throw new NavigationError('Aborting');
      }
      if (!startNode) {
        startNode = classifyLink(renderer.currentUrl());
        await writeShortcut(config.outputDir, shortcutContents(startNode));
      }

      await crawler.crawl(startNode);

      if (session.folders.length > 0) {
        logger.info(`Got total of ${session.folders.length} folders`);
      }
      const videoIds = downloadOrder(session);
      if (videoIds.length > 0) {
        if (this.abortController.signal.aborted) {
          throw new InterruptedError();
        }
        this.engine = new DownloadEngine(renderer, this.deps.transfer, config, session, this.deps.progressOut);
        await this.downloadAll(this.engine, videoIds);
      }
    } catch (error) {
      const detail = error instanceof Error && config.verbose ? error.stack ?? error.message : describeError(error);
      logger.error(detail);
      session.errorCount++;
    } finally {
      this.engine = null;
      if (renderer) {
        await this.closeRenderer(renderer);
      }
    }

    logger.info(`Crawling completed${session.errorCount ? ` with ${session.errorCount} errors` : ''}`);
    await this.reconcile();

    return {
      errors: session.errorCount,
      videos: session.visitedVideoIds.size,
      folders: session.folders.length,
      bytesSeen: session.totalBytesSeen
    };
  }

  private async downloadAll(engine: DownloadEngine, videoIds: number[]) {
    logger.info(`Processing ${videoIds.length} videos...`);
    for (const [index, videoId] of videoIds.entries()) {
      if (this.abortController.signal.aborted) {
        throw new InterruptedError();
      }
      await engine.processVideo(videoId, index + 1, videoIds.length);
    }
  }

  private async closeRenderer(renderer: PageRenderer) {
    try {
      await renderer.close();
    } catch (error) {
      logger.error(`Could not close the browser: ${describeError(error)}`);
      this.session.errorCount++;
    }
  }

  private async reconcile() {
    try {
      await new DuplicateScanner().scan(this.config.outputDir);
    } catch (error) {
      logger.error(`Duplicate check failed: ${describeError(error)}`);
      this.session.errorCount++;
    }
  }
}
