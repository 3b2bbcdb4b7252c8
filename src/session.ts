import { logger } from './utils/logger.js';
import type { CrawlError } from './errors.js';
import type { CrawlSession } from './types.js';

export function createSession(): CrawlSession {
  return {
    visitedVideoIds: new Set(),
    folders: [],
    errorCount: 0,
    totalBytesSeen: 0,
    createFolders: false
  };
}

/** Log a recoverable failure and count it against the run */
export function reportError(session: CrawlSession, error: CrawlError): void {
  logger.error(error.message);
  session.errorCount++;
}

/** Newest videos (highest IDs) first */
export function downloadOrder(session: CrawlSession): number[] {
  return [...session.visitedVideoIds].sort((a, b) => b - a);
}
