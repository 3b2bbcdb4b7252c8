import { promises as fs } from 'fs';
import path from 'path';
import { SHORTCUT_FILE_NAME } from '../types.js';

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*']/g;

/**
 * Replace characters that are invalid in file names with underscores and
 * drop trailing whitespace and dots.
 *
 * @example
 * sanitizeFileName('What? Why: "Now".') // 'What_ Why_ _Now_'
 */
export function sanitizeFileName(name: string): string {
  return name.replace(INVALID_FILENAME_CHARS, '_').replace(/[\s.]+$/, '');
}

/** Size of a file in bytes, or null when it does not exist or cannot be read */
export async function getFileSize(filepath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filepath);
    return stats.size;
  } catch {
    return null;
  }
}

const UNITS = ['bytes', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'];

/**
 * Human-readable size with at most three significant characters before
 * the unit, e.g. `512 bytes`, `1.5 KB`, `120 MB`.
 */
export function readableSize(bytes: number): string {
  let size = Math.trunc(bytes);
  let unit = 0;
  while (size >= 1024 && unit < UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  let formatted = size.toFixed(1);
  if (formatted.length > 3) {
    formatted = size.toFixed(0);
  }
  return `${formatted} ${UNITS[unit]}`;
}

export async function writeShortcut(directory: string, contents: string): Promise<string> {
  const filepath = path.join(directory, SHORTCUT_FILE_NAME);
  await fs.writeFile(filepath, contents, 'utf-8');
  return filepath;
}

async function pathExists(filepath: string): Promise<boolean> {
  try {
    await fs.lstat(filepath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Replace whatever sits at `linkPath` with a link to `fileName` in the
 * parent directory: a relative symbolic link, or a hard link to the file.
 */
export async function replaceLink(
  storeDir: string,
  fileName: string,
  linkPath: string,
  hardLink: boolean
): Promise<void> {
  if (await pathExists(linkPath)) {
    await fs.unlink(linkPath);
  }
  if (hardLink) {
    await fs.link(path.join(storeDir, fileName), linkPath);
  } else {
    await fs.symlink(path.join('..', fileName), linkPath);
  }
}
