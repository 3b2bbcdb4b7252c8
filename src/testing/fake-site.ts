import { promises as fs } from 'fs';
import type { PageElement, PageRenderer } from '../renderer.js';
import type { BulkTransfer, DownloadOptions, RemoteHeaders, TransferRequest } from '../transfer.js';
import { TransferError } from '../errors.js';
import type { Config, Cookie } from '../types.js';

export function testConfig(outputDir: string, overrides: Partial<Config> = {}): Config {
  return {
    startUrl: null,
    outputDir,
    retryCount: 2,
    timeout: 5,
    maxItems: null,
    createFolders: true,
    probeSizes: true,
    download: true,
    hardLinks: false,
    language: null,
    credentials: null,
    browser: 'chromium',
    headless: true,
    verbose: false,
    ...overrides
  };
}

/** A listing page with one anchor per href and an optional next-page control */
export function listingPage(hrefs: string[], nextUrl?: string): ScriptedPage {
  const elements: Record<string, ScriptedElement[]> = {
    '#browse_content .browse a': hrefs.map((href) => ({ attributes: { href } }))
  };
  if (nextUrl) {
    elements['.pagination a[rel=next]'] = [{ text: 'Next', navigatesTo: nextUrl }];
  }
  return { elements };
}

export interface ScriptedElement {
  text?: string;
  attributes?: Record<string, string>;
  selected?: boolean;
  /** Clicking navigates here */
  navigatesTo?: string;
  children?: Record<string, ScriptedElement[]>;
}

export interface ScriptedPage {
  elements: Record<string, ScriptedElement[]>;
  /** The first N loads of this page render nothing */
  emptyLoads?: number;
  /** Navigation to this page always fails */
  unreachable?: boolean;
}

const EMPTY_PAGE: ScriptedPage = { elements: {} };

export const FAKE_USER_AGENT = 'FakeBrowser/1.0';

class FakeElement implements PageElement {
  constructor(private renderer: FakeRenderer, private script: ScriptedElement) {}

  async text(): Promise<string> {
    return this.script.text ?? '';
  }

  async attribute(name: string): Promise<string | null> {
    return this.script.attributes?.[name] ?? null;
  }

  async click(): Promise<void> {
    this.renderer.clicks.push(this.script.text ?? this.script.navigatesTo ?? '');
    if (this.script.navigatesTo) {
      await this.renderer.navigate(this.script.navigatesTo);
    }
  }

  async fill(value: string): Promise<void> {
    this.renderer.filled.push(value);
  }

  async isSelected(): Promise<boolean> {
    return this.script.selected ?? false;
  }

  async selectOption(value: string): Promise<void> {
    this.renderer.selectedOptions.push(value);
  }

  async findAll(selector: string): Promise<PageElement[]> {
    return (this.script.children?.[selector] ?? []).map((child) => new FakeElement(this.renderer, child));
  }
}

/**
 * Scripted stand-in for a browser: each URL maps to a page whose selectors
 * resolve to canned elements.
 */
export class FakeRenderer implements PageRenderer {
  readonly visits: string[] = [];
  readonly clicks: string[] = [];
  readonly filled: string[] = [];
  readonly selectedOptions: string[] = [];
  closeCount = 0;

  private current = 'about:blank';
  private page: ScriptedPage = EMPTY_PAGE;
  private loads = new Map<string, number>();

  constructor(
    private pages: Record<string, ScriptedPage>,
    private cookies: Cookie[] = [{ name: 'session', value: 'test-session' }]
  ) {}

  async navigate(url: string): Promise<void> {
    this.visits.push(url);
    const page = this.pages[url] ?? EMPTY_PAGE;
    if (page.unreachable) {
      throw new Error(`net::ERR_CONNECTION_REFUSED at ${url}`);
    }

    this.current = url;
    const loads = (this.loads.get(url) ?? 0) + 1;
    this.loads.set(url, loads);

    this.page = loads <= (page.emptyLoads ?? 0) ? EMPTY_PAGE : page;
  }

  currentUrl(): string {
    return this.current;
  }

  async findElement(selector: string): Promise<PageElement | null> {
    const [first] = await this.findElements(selector);
    return first ?? null;
  }

  async findElements(selector: string): Promise<PageElement[]> {
    return (this.page.elements[selector] ?? []).map((script) => new FakeElement(this, script));
  }

  async executeScript(expression: string): Promise<unknown> {
    return expression === 'navigator.userAgent' ? FAKE_USER_AGENT : undefined;
  }

  async getCookies(): Promise<Cookie[]> {
    return this.cookies;
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

export interface FakeRemoteFile {
  /** Bytes written by each download, the last entry repeats */
  bodies: Buffer[];
  /** Reported by fetchHeaders; null when the header is missing */
  contentLength?: number | null;
  /** Downloads that fail before writing anything */
  failures?: number;
  /** Never finishes until the signal aborts */
  hang?: boolean;
}

export interface DownloadCall {
  url: string;
  filepath: string;
  options: DownloadOptions;
}

/** Serves canned files to the download engine without any network */
export class FakeTransfer implements BulkTransfer {
  readonly probes: string[] = [];
  readonly downloads: DownloadCall[] = [];
  bytesTransferred = 0;

  constructor(private files: Record<string, FakeRemoteFile>) {}

  private file(url: string): FakeRemoteFile {
    const file = this.files[url];
    if (!file) {
      throw new TransferError(`Unexpected response 404: ${url}`);
    }
    return file;
  }

  async fetchHeaders(url: string, _request: TransferRequest): Promise<RemoteHeaders> {
    this.probes.push(url);
    const file = this.file(url);
    return { contentLength: file.contentLength === undefined ? file.bodies[0].length : file.contentLength };
  }

  async download(url: string, filepath: string, options: DownloadOptions): Promise<number> {
    const attempt = this.downloads.filter((call) => call.url === url).length;
    this.downloads.push({ url, filepath, options });
    const file = this.file(url);

    if (file.hang) {
      await new Promise<void>((resolve) => {
        if (options.signal?.aborted) resolve();
        options.signal?.addEventListener('abort', () => resolve(), { once: true });
      });
      throw new TransferError('Download interrupted', { interrupted: true });
    }

    if (attempt < (file.failures ?? 0)) {
      throw new TransferError(`Download seems stalled: ${url}`);
    }

    const body = file.bodies[Math.min(attempt - (file.failures ?? 0), file.bodies.length - 1)];
    await fs.writeFile(filepath, body);
    this.bytesTransferred += body.length;
    options.onProgress?.(body.length);
    return body.length;
  }
}
