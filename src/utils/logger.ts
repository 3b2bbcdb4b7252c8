import { createWriteStream, type WriteStream } from 'fs';
import chalk from 'chalk';

type Level = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

function timestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

class Logger {
  private verbose = false;
  private file: WriteStream | null = null;

  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  /**
   * Mirror every subsequent line into a log file, replacing any file
   * attached earlier.
   */
  async attachFile(filepath: string): Promise<void> {
    await this.detachFile();
    this.file = createWriteStream(filepath, { flags: 'w' });
  }

  async detachFile(): Promise<void> {
    const file = this.file;
    this.file = null;
    if (file) {
      await new Promise<void>((resolve) => file.end(() => resolve()));
    }
  }

  debug(message: string) {
    if (!this.verbose) return;
    console.log(chalk.gray(message));
    this.record('DEBUG', message);
  }

  info(message: string) {
    console.log(message);
    this.record('INFO', message);
  }

  success(message: string) {
    console.log(chalk.green(message));
    this.record('INFO', message);
  }

  warn(message: string) {
    console.warn(chalk.yellow(message));
    this.record('WARNING', message);
  }

  error(message: string) {
    console.error(chalk.red(message));
    this.record('ERROR', message);
  }

  private record(level: Level, message: string) {
    this.file?.write(`${timestamp()} ${level} ${message}\n`);
  }
}

export const logger = new Logger();
