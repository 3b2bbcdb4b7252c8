import type { Writable } from 'stream';

export const PROGRESS_QUANTUM = 10 * 1024 * 1024;

// Progress callbacks tend to arrive in pairs, doubling each frame keeps the spinner smooth
const SPINNER = '--\\\\||//';

/**
 * Console liveness feedback for a running transfer: `+` for the first
 * quantum, `=` for every further one, a spinner in between.
 */
export class ProgressIndicator {
  private totalRead = 0;
  private count = 0;
  private started = false;
  private frame = SPINNER.length - 1;

  constructor(private out: Writable = process.stdout) {
    this.progress('Downloading: ');
  }

  update(bytesSoFar: number) {
    if (bytesSoFar > this.totalRead) {
      this.totalRead = bytesSoFar;
    }
    const previous = this.count;
    this.count = Math.floor(this.totalRead / PROGRESS_QUANTUM) + 1;
    this.progress((this.started ? '=' : '+').repeat(Math.max(0, this.count - previous)));
    this.started = true;
  }

  end(status = 'OK') {
    this.progress(status, '\n');
  }

  private progress(text: string, suffix = '') {
    this.frame = (this.frame + 1) % SPINNER.length;
    this.out.write(`\b${text}${suffix || SPINNER[this.frame]}`);
  }
}
