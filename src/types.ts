export type BrowserName = 'chromium' | 'firefox' | 'webkit';

export interface Credentials {
  email: string;
  password: string;
}

export interface Config {
  startUrl: string | null;
  outputDir: string;
  retryCount: number;
  /** Download timeout in seconds, also the stall window */
  timeout: number;
  /** Cap on items taken from one listing page, and on pages per listing */
  maxItems: number | null;
  createFolders: boolean;
  probeSizes: boolean;
  download: boolean;
  hardLinks: boolean;
  language: string | null;
  credentials: Credentials | null;
  browser: BrowserName;
  headless: boolean;
  verbose: boolean;
}

export interface FolderRecord {
  localPath: string;
  sourceUrl: string;
  memberVideoIds: Set<number>;
}

export interface CrawlSession {
  /** Insertion-ordered, so it doubles as the discovery order */
  visitedVideoIds: Set<number>;
  folders: FolderRecord[];
  errorCount: number;
  totalBytesSeen: number;
  /** Switched on once an account or category root has been walked */
  createFolders: boolean;
}

export interface Variant {
  label: string;
  fileExtension: string;
  href: string;
}

export interface VideoDownloadPlan {
  videoId: number;
  title: string;
  variant: Variant | null;
  expectedSize: number | null;
  fileName: string;
  filePath: string;
}

export interface Cookie {
  name: string;
  value: string;
}

export interface RunSummary {
  errors: number;
  videos: number;
  folders: number;
  bytesSeen: number;
}

// Best to worst; 'file' catches any remaining download link
export const FILE_PREFERENCES = ['Original', 'HD', 'SD', 'Mobile', 'file'] as const;

export const SHORTCUT_FILE_NAME = 'source.url';
export const LOG_FILE_NAME = 'crawl.log';
