import path from 'path';
import { InvalidArgumentError } from 'commander';
import { classifyLink } from './link.js';
import { ConfigError, InvalidLinkError } from './errors.js';
import type { BrowserName, Config, Credentials } from './types.js';

export const DEFAULT_RETRIES = 3;
export const DEFAULT_TIMEOUT = 60;

const BROWSERS: readonly BrowserName[] = ['chromium', 'firefox', 'webkit'];

/** Options of the crawl command as commander hands them over */
export interface CrawlOptions {
  directory: string;
  login?: Credentials;
  maxItems?: number;
  retries: number;
  timeout: number;
  setLanguage?: string;
  browser: BrowserName;
  headful: boolean;
  verbose: boolean;
  download: boolean;
  folders: boolean;
  filesize: boolean;
  hardLinks: boolean;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

/** `user.name@host.name:password`, the password may itself contain colons */
export function parseCredentials(value: string): Credentials {
  const at = value.indexOf('@');
  const colon = at < 0 ? -1 : value.indexOf(':', at);
  if (colon < 0) {
    throw new InvalidArgumentError('Must be formatted as user.name@host.name:password');
  }
  return { email: value.slice(0, colon), password: value.slice(colon + 1) };
}

export function parseBrowser(value: string): BrowserName {
  const browser = BROWSERS.find((name) => name === value.toLowerCase());
  if (!browser) {
    throw new InvalidArgumentError(`Valid values are: ${BROWSERS.join('/')}`);
  }
  return browser;
}

export function buildConfig(url: string | undefined, options: CrawlOptions): Config {
  if (!url && !options.login) {
    throw new ConfigError('Neither login credentials nor start URL is specified');
  }

  if (url) {
    try {
      classifyLink(url);
    } catch (error) {
      if (error instanceof InvalidLinkError) {
        throw new ConfigError(error.message, { cause: error });
      }
      throw error;
    }
  }

  return {
    startUrl: url ?? null,
    outputDir: path.resolve(options.directory),
    retryCount: options.retries,
    timeout: options.timeout,
    maxItems: options.maxItems ?? null,
    createFolders: options.folders,
    probeSizes: options.filesize,
    download: options.download,
    hardLinks: options.hardLinks,
    language: options.setLanguage?.trim() || null,
    credentials: options.login ?? null,
    browser: options.browser,
    headless: !options.headful,
    verbose: options.verbose
  };
}
