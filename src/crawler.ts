import { promises as fs } from 'fs';
import path from 'path';
import { logger } from './utils/logger.js';
import { sanitizeFileName, writeShortcut } from './utils/file-utils.js';
import {
  classifyLink,
  resolveHref,
  shortcutContents,
  SITE_DOMAIN,
  SITE_URL,
  type FolderLink,
  type LinkNode
} from './link.js';
import { ConsistencyError, InterruptedError, NavigationError, describeError } from './errors.js';
import { reportError } from './session.js';
import * as selectors from './selectors.js';
import type { PageRenderer } from './renderer.js';
import type { Config, Credentials, CrawlSession, FolderRecord } from './types.js';

/** Member set of the folder currently being walked, if any */
type MembershipTarget = Set<number> | null;

function assertUnique(nodes: LinkNode[], context: string) {
  const urls = new Set(nodes.map((node) => node.url));
  if (urls.size !== nodes.length) {
    throw new ConsistencyError(`Duplicate items (${nodes.length - urls.size}) found in ${context}`);
  }
}

/**
 * Walks the site graph from a start node, recording every video it reaches
 * in the session and the videos belonging to each folder.
 */
export class SiteCrawler {
  constructor(
    private renderer: PageRenderer,
    private config: Config,
    private session: CrawlSession,
    private signal?: AbortSignal
  ) {}

  private async goTo(url: string): Promise<boolean> {
    logger.info(`Going to ${url}`);
    try {
      await this.renderer.navigate(url);
      return true;
    } catch (error) {
      logger.warn(`Could not load ${url}: ${describeError(error)}`);
      return false;
    }
  }

  private async goToOrReport(url: string): Promise<boolean> {
    const loaded = await this.goTo(url);
    if (!loaded) {
      reportError(this.session, new NavigationError(`Page load failed: ${url}`));
    }
    return loaded;
  }

  async login(credentials: Credentials): Promise<boolean> {
    for (let attempt = 0; attempt < this.config.retryCount; attempt++) {
      if (!(await this.goTo(`${SITE_URL}/${selectors.LOGIN_PATH}`))) continue;
      logger.info(`Logging in as ${credentials.email}...`);

      const email = await this.renderer.findElement(selectors.LOGIN_EMAIL);
      const password = await this.renderer.findElement(selectors.LOGIN_PASSWORD);
      const submit = await this.renderer.findElement(selectors.LOGIN_SUBMIT);
      if (!email || !password || !submit) {
        logger.warn('Login form not found');
        continue;
      }
      await email.fill(credentials.email);
      await password.fill(credentials.password);
      await submit.click();

      const accountLink = await this.renderer.findElement(selectors.ACCOUNT_MENU_LINK);
      if (!accountLink) {
        logger.warn('Login was not accepted');
        continue;
      }
      await accountLink.click();
      return true;
    }
    reportError(this.session, new NavigationError(`Login failed as ${credentials.email}`));
    return false;
  }

  /** Scrape the listing links of the current page */
  async collectPage(): Promise<LinkNode[]> {
    const pageUrl = this.renderer.currentUrl();
    logger.info(`Processing ${pageUrl}`);

    const nodes: LinkNode[] = [];
    for (const link of await this.renderer.findElements(selectors.LISTING_LINKS)) {
      const raw = await link.attribute('href');
      const href = raw ? resolveHref(raw, pageUrl) : null;
      if (!href || !href.includes(SITE_DOMAIN) || href.endsWith('settings')) continue;
      nodes.push(classifyLink(href));
    }
    const items = this.config.maxItems === null ? nodes : nodes.slice(0, this.config.maxItems);

    const videos = items.filter((item) => item.kind === 'video').length;
    if (videos === 0) {
      logger.info(`Got ${items.length} items`);
    } else if (videos === items.length) {
      logger.info(`Got ${videos} videos`);
    } else {
      logger.info(`Got ${videos} videos and ${items.length - videos} other items`);
    }

    assertUnique(items, pageUrl);
    return items;
  }

  /** Scrape the current listing, following "next page" until there is none */
  async collectListing(): Promise<LinkNode[]> {
    const items: LinkNode[] = [];
    const maxPages = this.config.maxItems ?? Number.POSITIVE_INFINITY;

    for (let page = 1; ; page++) {
      items.push(...(await this.collectPage()));
      if (page >= maxPages) break;
      const next = await this.renderer.findElement(selectors.NEXT_PAGE);
      if (!next) break;
      await next.click();
    }

    assertUnique(items, 'listing');
    return items;
  }

  private async readFolderTitle(): Promise<string | null> {
    for (const lookup of selectors.FOLDER_TITLE_LOOKUPS) {
      const element = await this.renderer.findElement(lookup.selector);
      if (!element) continue;
      const value = lookup.attribute ? await element.attribute(lookup.attribute) : await element.text();
      if (value && value.trim()) return value;
    }
    return null;
  }

  private async createFolder(node: FolderLink, title: string): Promise<FolderRecord> {
    // A title of nothing but dots would otherwise name the store itself
    const name = sanitizeFileName(title.trim().replace(/\.+$/, '')) || sanitizeFileName(node.name) || node.folderKind;
    const localPath = path.join(this.config.outputDir, name);
    await fs.mkdir(localPath, { recursive: true });
    await writeShortcut(localPath, shortcutContents(node));

    const folder: FolderRecord = { localPath, sourceUrl: node.url, memberVideoIds: new Set() };
    this.session.folders.push(folder);
    return folder;
  }

  private async expandFolder(node: FolderLink, target: MembershipTarget): Promise<void> {
    let title: string | null = null;
    for (let attempt = 0; attempt <= this.config.retryCount && !title; attempt++) {
      if (!(await this.goTo(node.url))) continue;
      title = await this.readFolderTitle();
      if (!title) {
        logger.warn(`Folder title not found at ${node.url}`);
      }
    }

    if (!title) {
      reportError(this.session, new NavigationError(`Page load failed: ${node.url}`));
      return;
    }

    logger.info(`Folder: ${title}`);
    let membership = target;
    if (this.session.createFolders) {
      membership = (await this.createFolder(node, title)).memberVideoIds;
    }
    await this.crawlAll(await this.collectListing(), membership);
  }

  private async crawlAll(items: LinkNode[], target: MembershipTarget) {
    for (const item of items) {
      await this.crawl(item, target);
    }
  }

  /**
   * Expand one node, recursing into whatever it links to. Videos below a
   * created folder are added to that folder's member set.
   */
  async crawl(node: LinkNode, target: MembershipTarget = null): Promise<void> {
    if (this.signal?.aborted) {
      throw new InterruptedError();
    }

    switch (node.kind) {
      case 'video':
        this.session.visitedVideoIds.add(node.videoId);
        target?.add(node.videoId);
        return;

      case 'account': {
        if (!(await this.goToOrReport(`${node.url}/videos`))) return;
        logger.info(`Processing account ${node.account}`);
        const items = await this.collectListing();
        items.push(classifyLink(`${node.url}/channels`), classifyLink(`${node.url}/albums`));
        this.session.createFolders = this.config.createFolders;
        await this.crawlAll(items, target);
        return;
      }

      case 'category': {
        if (!(await this.goToOrReport(node.url))) return;
        const items = await this.collectListing();
        this.session.createFolders = this.config.createFolders;
        await this.crawlAll(items, target);
        return;
      }

      case 'videos': {
        if (!(await this.goToOrReport(node.url))) return;
        await this.crawlAll(await this.collectListing(), target);
        return;
      }

      case 'folder':
        await this.expandFolder(node, target);
        return;

      case 'generic': {
        if (!(await this.goToOrReport(node.url))) return;
        await this.crawlAll(await this.collectPage(), target);
        return;
      }

      case 'system':
        logger.debug(`Skipping system page ${node.url}`);
        return;
    }
  }
}
