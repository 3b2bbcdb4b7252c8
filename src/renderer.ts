import { chromium, firefox, webkit, type Browser, type BrowserContext, type ElementHandle, type Page } from 'playwright-core';
import { logger } from './utils/logger.js';
import { describeError } from './errors.js';
import type { BrowserName, Cookie } from './types.js';

/** A located element on the current page */
export interface PageElement {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  isSelected(): Promise<boolean>;
  /** Select the option with this value, when the element is a select box */
  selectOption(value: string): Promise<void>;
  findAll(selector: string): Promise<PageElement[]>;
}

/**
 * The page-rendering capability the crawler consumes. Lookups resolve to
 * null (or an empty list) when nothing matches instead of throwing.
 */
export interface PageRenderer {
  navigate(url: string): Promise<void>;
  currentUrl(): string;
  findElement(selector: string): Promise<PageElement | null>;
  findElements(selector: string): Promise<PageElement[]>;
  executeScript(expression: string): Promise<unknown>;
  getCookies(): Promise<Cookie[]>;
  close(): Promise<void>;
}

export interface PlaywrightRendererOptions {
  browser: BrowserName;
  headless: boolean;
  /** Navigation timeout in seconds */
  timeout: number;
}

const ENGINES = { chromium, firefox, webkit };

type Handle = ElementHandle<HTMLElement | SVGElement>;

const SETTLE_TIMEOUT_MS = 5000;

class PlaywrightElement implements PageElement {
  constructor(private page: Page, private handle: Handle) {}

  async text(): Promise<string> {
    return this.handle.innerText();
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async click(): Promise<void> {
    await this.handle.click();
    await settle(this.page);
  }

  async fill(value: string): Promise<void> {
    await this.handle.fill(value);
  }

  async isSelected(): Promise<boolean> {
    return this.handle.evaluate((el) => el instanceof HTMLOptionElement && el.selected);
  }

  async selectOption(value: string): Promise<void> {
    await this.handle.selectOption(value);
  }

  async findAll(selector: string): Promise<PageElement[]> {
    const children = await this.handle.$$(selector);
    return children.map((child) => new PlaywrightElement(this.page, child));
  }
}

async function settle(page: Page): Promise<void> {
  // Many pages keep polling, so networkidle is best-effort
  await page.waitForLoadState('networkidle', { timeout: SETTLE_TIMEOUT_MS }).catch((error: unknown) => {
    logger.debug(`Page did not settle: ${describeError(error)}`);
  });
}

export class PlaywrightRenderer implements PageRenderer {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(private options: PlaywrightRendererOptions) {}

  async init() {
    logger.debug(`Launching ${this.options.browser}...`);
    this.browser = await ENGINES[this.options.browser].launch({
      headless: this.options.headless,
      args: this.options.browser === 'chromium' ? ['--no-sandbox', '--disable-setuid-sandbox'] : []
    });
    this.context = await this.browser.newContext();
    this.page = await this.context.newPage();
    this.page.setDefaultTimeout(this.options.timeout * 1000);
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('Browser not initialized. Call init() first.');
    }
    return this.page;
  }

  async navigate(url: string): Promise<void> {
    const page = this.requirePage();
    await page.goto(url, { waitUntil: 'load', timeout: this.options.timeout * 1000 });
    await settle(page);
  }

  currentUrl(): string {
    return this.requirePage().url();
  }

  async findElement(selector: string): Promise<PageElement | null> {
    const page = this.requirePage();
    const handle = await page.$(selector);
    return handle ? new PlaywrightElement(page, handle) : null;
  }

  async findElements(selector: string): Promise<PageElement[]> {
    const page = this.requirePage();
    const handles = await page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(page, handle));
  }

  async executeScript(expression: string): Promise<unknown> {
    return this.requirePage().evaluate(expression);
  }

  async getCookies(): Promise<Cookie[]> {
    if (!this.context) {
      throw new Error('Browser not initialized. Call init() first.');
    }
    const cookies = await this.context.cookies();
    return cookies.map(({ name, value }) => ({ name, value }));
  }

  async close() {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    this.page = null;
    if (browser) {
      logger.debug('Closing browser...');
      await browser.close();
    }
  }
}

export async function openPlaywrightRenderer(options: PlaywrightRendererOptions): Promise<PlaywrightRenderer> {
  const renderer = new PlaywrightRenderer(options);
  await renderer.init();
  return renderer;
}
