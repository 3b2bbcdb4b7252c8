import { promises as fs } from 'fs';
import path from 'path';
import { logger } from './utils/logger.js';

interface FileInfo {
  filepath: string;
  filename: string;
  stem: string;
  size: number;
}

export interface ScanOptions {
  dryRun?: boolean;
}

/**
 * Removes inferior copies of the same video from the flat store. Files are
 * grouped by the part of their name before the first dot; in each group only
 * the largest survives.
 */
export class DuplicateScanner {
  /** The grouping key, or null for names without a dot */
  getStem(filename: string): string | null {
    const dot = filename.indexOf('.');
    return dot < 0 ? null : filename.slice(0, dot);
  }

  private async findFiles(directory: string): Promise<FileInfo[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const files: FileInfo[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const stem = this.getStem(entry.name);
      if (stem === null) continue;

      const filepath = path.join(directory, entry.name);
      const stats = await fs.stat(filepath);
      files.push({ filepath, filename: entry.name, stem, size: stats.size });
    }
    return files;
  }

  private groupByStem(files: FileInfo[]): Map<string, FileInfo[]> {
    const groups = new Map<string, FileInfo[]>();
    for (const file of files) {
      const group = groups.get(file.stem);
      if (group) {
        group.push(file);
      } else {
        groups.set(file.stem, [file]);
      }
    }
    return groups;
  }

  /**
   * Scan one directory (not its subfolders) and delete all but the largest
   * file of every stem group.
   *
   * @returns Names of the removed files, or those that would be removed in dry-run mode
   */
  async scan(directory: string, options: ScanOptions = {}): Promise<string[]> {
    logger.info('Checking for duplicate files...');
    const removed: string[] = [];

    for (const group of this.groupByStem(await this.findFiles(directory)).values()) {
      if (group.length < 2) continue;

      // Largest first; equal sizes keep the name that sorts first
      const [keep, ...rest] = [...group].sort(
        (a, b) => b.size - a.size || (a.filename < b.filename ? -1 : 1)
      );
      logger.debug(`Keeping ${keep.filename} (${keep.size} bytes)`);

      for (const file of rest) {
        if (options.dryRun) {
          logger.info(`[DRY-RUN] Would remove duplicate ${file.filename}`);
        } else {
          logger.info(`Removing duplicate ${file.filename}`);
          await fs.unlink(file.filepath);
        }
        removed.push(file.filename);
      }
    }

    logger.info('Done');
    return removed;
  }
}
