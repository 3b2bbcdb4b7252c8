import path from 'path';
import type { Writable } from 'stream';
import { logger } from './utils/logger.js';
import { getFileSize, readableSize, replaceLink, sanitizeFileName } from './utils/file-utils.js';
import { ProgressIndicator } from './utils/progress.js';
import { resolveHref, videoUrl } from './link.js';
import { FilesystemError, IntegrityError, NavigationError, TransferError, describeError } from './errors.js';
import { reportError } from './session.js';
import * as selectors from './selectors.js';
import type { PageElement, PageRenderer } from './renderer.js';
import type { BulkTransfer, TransferRequest } from './transfer.js';
import {
  FILE_PREFERENCES,
  type Config,
  type CrawlSession,
  type Variant,
  type VideoDownloadPlan
} from './types.js';

export type VideoOutcome = 'downloaded' | 'present' | 'skipped' | 'failed';

/** How one attempt ended; `retry` sends the video round the outer loop again */
type AttemptResult =
  | { status: 'done'; outcome: Exclude<VideoOutcome, 'failed'>; plan: VideoDownloadPlan }
  | { status: 'interrupted'; plan: VideoDownloadPlan }
  | { status: 'retry'; plan: VideoDownloadPlan | null };

interface LoadedPage {
  title: string;
  panel: PageElement | null;
}

const NO_VARIANT = 'NONE';

function cleanTitle(title: string): string {
  return title.trim().replace(/\.+$/, '');
}

/** Distinct videos whose titles sanitize alike are given the same name */
export function planFileName(videoId: number, title: string, extension: string): string {
  const base = sanitizeFileName(title) || String(videoId);
  return `${base}.${extension.toLowerCase()}`;
}

/**
 * Downloads every discovered video, one at a time, into the flat store and
 * links the result into each folder the video belongs to.
 */
export class DownloadEngine {
  private language: string | null;
  private transferController: AbortController | null = null;

  constructor(
    private renderer: PageRenderer,
    private transfer: BulkTransfer,
    private config: Config,
    private session: CrawlSession,
    private out: Writable = process.stdout
  ) {
    this.language = config.language;
  }

  /** Abort the running transfer, if any. Returns whether there was one. */
  interrupt(): boolean {
    if (!this.transferController) return false;
    this.transferController.abort();
    return true;
  }

  async processVideo(videoId: number, number: number, total: number): Promise<VideoOutcome> {
    let outcome: VideoOutcome = 'failed';
    let plan: VideoDownloadPlan | null = null;
    let interrupted = false;

    for (let attempt = 0; attempt < this.config.retryCount && !interrupted; attempt++) {
      const result = await this.attempt(videoId, number, total);
      plan = result.plan ?? plan;
      if (result.status === 'done') {
        outcome = result.outcome;
        break;
      }
      interrupted = result.status === 'interrupted';
    }

    if (outcome === 'failed' && !interrupted) {
      logger.error(`Download ultimately failed after ${this.config.retryCount} retries: ${videoUrl(videoId)}`);
    }

    if (plan?.variant) {
      await this.linkIntoFolders(videoId, plan.fileName);
    }
    return outcome;
  }

  private async loadVideoPage(videoId: number): Promise<LoadedPage> {
    const url = videoUrl(videoId);
    for (let attempt = 0; ; attempt++) {
      const problem = await this.tryLoadVideoPage(url);
      if (typeof problem !== 'string') return problem;

      logger.warn(problem);
      if (attempt >= this.config.retryCount) {
        reportError(this.session, new NavigationError(`Page load failed: ${url}`));
        return { title: '', panel: null };
      }
    }
  }

  /** The loaded page, or a description of what was missing */
  private async tryLoadVideoPage(url: string): Promise<LoadedPage | string> {
    logger.info(`Going to ${url}`);
    try {
      await this.renderer.navigate(url);
    } catch (error) {
      return `Could not load ${url}: ${describeError(error)}`;
    }

    const heading = await this.renderer.findElement(selectors.VIDEO_TITLE);
    if (!heading) return `Video title not found at ${url}`;
    const title = cleanTitle(await heading.text());

    const button = await this.renderer.findElement(selectors.DOWNLOAD_BUTTON);
    if (!button) return `Download button not found at ${url}`;
    await button.click();

    const panel = await this.renderer.findElement(selectors.DOWNLOAD_PANEL);
    if (!panel) return `Download panel not found at ${url}`;
    return { title, panel };
  }

  /** First link matching the best available quality label, resolved against the page it was found on */
  async selectVariant(panel: PageElement, pageUrl: string): Promise<Variant | null> {
    const links = await panel.findAll(selectors.DOWNLOAD_LINKS);
    const labels = await Promise.all(links.map((link) => link.text()));

    for (const preference of FILE_PREFERENCES) {
      const index = labels.findIndex((label) => label.includes(preference));
      if (index < 0) continue;

      const link = links[index];
      const raw = await link.attribute('href');
      const href = raw ? resolveHref(raw, pageUrl) : null;
      if (!href) continue;
      const suggested = (await link.attribute('download')) ?? '';
      return {
        label: labels[index].trim(),
        fileExtension: suggested.split('.').pop() || NO_VARIANT,
        href
      };
    }
    return null;
  }

  private async captureRequest(): Promise<TransferRequest> {
    const userAgent = String(await this.renderer.executeScript(selectors.USER_AGENT_SCRIPT));
    const cookies = await this.renderer.getCookies();
    return { headers: { 'user-agent': userAgent }, cookies };
  }

  private async probeSize(href: string, request: TransferRequest): Promise<number | null> {
    try {
      const { contentLength } = await this.transfer.fetchHeaders(href, request);
      if (contentLength !== null) {
        this.session.totalBytesSeen += contentLength;
      }
      return contentLength;
    } catch (error) {
      logger.warn(`Size probe failed: ${describeError(error)}`);
      return null;
    }
  }

  private async attempt(videoId: number, number: number, total: number): Promise<AttemptResult> {
    const { title, panel } = await this.loadVideoPage(videoId);
    const variant = panel ? await this.selectVariant(panel, videoUrl(videoId)) : null;

    let request: TransferRequest | null = null;
    let expectedSize: number | null = null;
    let description = NO_VARIANT;
    if (variant) {
      request = await this.captureRequest();
      description = `${variant.label}/${variant.fileExtension.toUpperCase()}`;
      if (this.config.probeSizes) {
        expectedSize = await this.probeSize(variant.href, request);
        if (expectedSize !== null) {
          description += `, ${readableSize(expectedSize)}`;
        }
      }
    }

    const percent = Math.floor((number * 100) / total);
    const seen = this.session.totalBytesSeen ? ` ${readableSize(this.session.totalBytesSeen)}` : '';
    logger.info(`${title} (${description}) ${number}/${total} ${percent}%${seen}`);

    const fileName = planFileName(videoId, title, variant?.fileExtension ?? NO_VARIANT);
    const plan: VideoDownloadPlan = {
      videoId,
      title,
      variant,
      expectedSize,
      fileName,
      filePath: path.join(this.config.outputDir, fileName)
    };

    await this.applyLanguage();

    if (!variant || !request) {
      return { status: 'retry', plan };
    }

    if (expectedSize !== null) {
      const localSize = await getFileSize(plan.filePath);
      if (localSize === expectedSize) {
        logger.success('OK');
        return { status: 'done', outcome: 'present', plan };
      }
      if (localSize !== null && localSize > expectedSize) {
        reportError(this.session, new IntegrityError(
          `Local file is larger (${localSize}) than remote file (${expectedSize}): ${plan.filePath}`
        ));
        logger.info('Downloading SKIPPED');
        return { status: 'done', outcome: 'skipped', plan };
      }
    }

    if (!this.config.download) {
      logger.info('Downloading SKIPPED');
      return { status: 'done', outcome: 'skipped', plan };
    }

    try {
      await this.transferFile(variant.href, plan.filePath, request);
    } catch (error) {
      if (!(error instanceof TransferError)) throw error;
      reportError(this.session, error.interrupted ? error : new TransferError(`Download failed: ${error.message}`));
      return error.interrupted ? { status: 'interrupted', plan } : { status: 'retry', plan };
    }

    const problem = await this.verifyDownload(plan);
    if (problem) {
      reportError(this.session, problem);
      return { status: 'retry', plan };
    }

    logger.success('OK');
    return { status: 'done', outcome: 'downloaded', plan };
  }

  private async transferFile(href: string, filePath: string, request: TransferRequest): Promise<void> {
    const controller = new AbortController();
    const progress = new ProgressIndicator(this.out);
    this.transferController = controller;
    try {
      await this.transfer.download(href, filePath, {
        ...request,
        timeoutSeconds: this.config.timeout,
        deadlineSeconds: this.config.timeout,
        signal: controller.signal,
        onProgress: (bytes) => progress.update(bytes)
      });
      progress.end();
    } catch (error) {
      progress.end('FAILED');
      throw error;
    } finally {
      this.transferController = null;
    }
  }

  private async verifyDownload(plan: VideoDownloadPlan): Promise<IntegrityError | null> {
    const localSize = await getFileSize(plan.filePath);
    if (!localSize) {
      return new IntegrityError(`Downloaded file seems corrupt: ${plan.filePath}`);
    }
    if (plan.expectedSize !== null && localSize > plan.expectedSize) {
      return new IntegrityError(`Downloaded file larger (${localSize}) than remote file (${plan.expectedSize})`);
    }
    if (plan.expectedSize !== null && localSize < plan.expectedSize) {
      return new IntegrityError(`Downloaded file smaller (${localSize}) than remote file (${plan.expectedSize})`);
    }
    return null;
  }

  /**
   * Switch the account's interface language once, if it is still on the
   * default. Gives up for the rest of the run when the preference is
   * ambiguous or unknown.
   */
  private async applyLanguage(): Promise<void> {
    const preference = this.language;
    if (!preference) return;

    const settings = await this.renderer.findElement(selectors.SETTINGS_BUTTON);
    if (!settings) {
      logger.warn(`Failed to set language to ${preference}, settings not available`);
      return;
    }
    await settings.click();

    const select = await this.renderer.findElement(selectors.LANGUAGE_SELECT);
    const options = select ? await select.findAll(selectors.LANGUAGE_OPTIONS) : [];
    if (!select || options.length === 0) {
      logger.warn(`Failed to set language to ${preference}, settings not available`);
      return;
    }

    let current: PageElement | null = null;
    for (const option of options) {
      if (await option.isSelected()) {
        current = option;
        break;
      }
    }

    if (current && current !== options[0]) {
      const value = (await current.attribute('value')) ?? '';
      logger.info(`Language already set to ${value.toUpperCase()} / ${await current.text()}`);
      return;
    }

    const wanted = preference.toLowerCase();
    const described = await Promise.all(options.map(async (option) => ({
      option,
      text: (await option.text()).trim(),
      value: (await option.attribute('value')) ?? ''
    })));

    let matches = described.filter(({ text }) => text.toLowerCase().startsWith(wanted));
    if (matches.length !== 1) {
      matches = described.filter(({ value }) => value.toLowerCase().startsWith(wanted));
    }

    if (matches.length !== 1) {
      logger.error(`Unsupported language: ${preference}`);
      this.language = null;
      return;
    }

    const [match] = matches;
    logger.info(`Language not set, setting to ${match.text}`);
    await select.selectOption(match.value);
    const submit = await this.renderer.findElement(selectors.SETTINGS_SUBMIT);
    if (!submit) {
      logger.warn('Language settings form has no submit button');
      return;
    }
    await submit.click();
  }

  /** Replace the video's link in every folder that contains it */
  async linkIntoFolders(videoId: number, fileName: string): Promise<void> {
    for (const folder of this.session.folders) {
      if (!folder.memberVideoIds.has(videoId)) continue;

      const linkPath = path.join(folder.localPath, fileName);
      try {
        await replaceLink(this.config.outputDir, fileName, linkPath, this.config.hardLinks);
      } catch (error) {
        reportError(this.session, new FilesystemError(`Can't create link at ${linkPath}: ${describeError(error)}`));
      }
    }
  }
}
