import { createWriteStream } from 'fs';
import http, { type IncomingMessage, type OutgoingHttpHeaders } from 'http';
import https from 'https';
import { URL } from 'url';
import { TransferError, describeError } from './errors.js';
import type { Cookie } from './types.js';

export interface TransferRequest {
  headers: Record<string, string>;
  cookies: Cookie[];
}

export interface DownloadOptions extends TransferRequest {
  /** Connection timeout, and the longest allowed gap between received chunks */
  timeoutSeconds: number;
  /** Limit on the whole transfer, none when absent or 0 */
  deadlineSeconds?: number;
  onProgress?: (bytesSoFar: number) => void;
  signal?: AbortSignal;
}

export interface RemoteHeaders {
  contentLength: number | null;
}

/** The bulk-transfer capability the download engine consumes */
export interface BulkTransfer {
  fetchHeaders(url: string, request: TransferRequest): Promise<RemoteHeaders>;
  /** Stream `url` into `filepath`, resolving to the number of bytes written */
  download(url: string, filepath: string, options: DownloadOptions): Promise<number>;
}

const MAX_REDIRECTS = 5;
const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);
const PROBE_TIMEOUT_MS = 30000;

function interruptedError(): TransferError {
  return new TransferError('Download interrupted', { interrupted: true });
}

function toTransferError(error: unknown, signal?: AbortSignal): TransferError {
  if (signal?.aborted) return interruptedError();
  if (error instanceof TransferError) return error;
  return new TransferError(describeError(error), { cause: error });
}

function buildHeaders({ headers, cookies }: TransferRequest): OutgoingHttpHeaders {
  const outgoing: OutgoingHttpHeaders = { ...headers };
  if (cookies.length > 0) {
    outgoing.cookie = cookies.map(({ name, value }) => `${name}=${value}`).join('; ');
  }
  return outgoing;
}

/**
 * Bulk transfer over Node's http/https clients with redirect following and
 * a stall detector.
 */
export class HttpTransfer implements BulkTransfer {
  private open(
    url: string,
    headers: OutgoingHttpHeaders,
    timeoutMs: number,
    signal?: AbortSignal,
    redirectsLeft = MAX_REDIRECTS
  ): Promise<IncomingMessage> {
    return new Promise((resolve, reject) => {
      if (!URL.canParse(url)) {
        reject(new TransferError(`Invalid URL: ${url}`));
        return;
      }
      const parsedUrl = new URL(url);
      const requestOptions: http.RequestOptions = { headers, timeout: timeoutMs, signal };

      const onResponse = (response: IncomingMessage) => {
        // From here on the stall detector watches the body
        request.setTimeout(0);

        const location = response.headers.location;
        if (REDIRECT_CODES.has(response.statusCode ?? 0) && location) {
          response.resume();
          if (redirectsLeft <= 0) {
            reject(new TransferError(`Too many redirects: ${url}`));
            return;
          }
          if (!URL.canParse(location, url)) {
            reject(new TransferError(`Invalid redirect from ${url}: ${location}`));
            return;
          }
          this.open(new URL(location, parsedUrl).href, headers, timeoutMs, signal, redirectsLeft - 1)
            .then(resolve, reject);
          return;
        }
        resolve(response);
      };

      const request = parsedUrl.protocol === 'https:'
        ? https.get(parsedUrl, requestOptions, onResponse)
        : http.get(parsedUrl, requestOptions, onResponse);

      request.on('timeout', () => {
        request.destroy(new TransferError(`Connection timed out after ${timeoutMs} ms: ${url}`));
      });

      request.on('error', (error) => {
        reject(toTransferError(error, signal));
      });
    });
  }

  async fetchHeaders(url: string, request: TransferRequest): Promise<RemoteHeaders> {
    const response = await this.open(url, buildHeaders(request), PROBE_TIMEOUT_MS);
    // Only the headers are wanted
    response.destroy();

    if (response.statusCode !== 200) {
      throw new TransferError(`Unexpected response ${response.statusCode}: ${url}`);
    }
    const header = response.headers['content-length'];
    const length = header === undefined ? Number.NaN : Number(header);
    return { contentLength: Number.isSafeInteger(length) && length >= 0 ? length : null };
  }

  async download(url: string, filepath: string, options: DownloadOptions): Promise<number> {
    const { signal } = options;
    if (signal?.aborted) {
      throw interruptedError();
    }

    const timeoutMs = options.timeoutSeconds * 1000;
    const { deadlineSeconds = 0 } = options;
    const deadline = Date.now() + deadlineSeconds * 1000;
    const response = await this.open(url, buildHeaders(options), timeoutMs, signal);

    if (response.statusCode !== 200) {
      response.resume();
      throw new TransferError(`Unexpected response ${response.statusCode}: ${url}`);
    }

    return new Promise<number>((resolve, reject) => {
      const fileStream = createWriteStream(filepath);
      let received = 0;
      let settled = false;
      let stallTimer: NodeJS.Timeout | undefined;
      let deadlineTimer: NodeJS.Timeout | undefined;

      const finish = (error?: TransferError) => {
        if (settled) return;
        settled = true;
        clearTimeout(stallTimer);
        clearTimeout(deadlineTimer);
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          response.destroy();
          fileStream.destroy();
          reject(error);
        } else {
          resolve(received);
        }
      };

      const onAbort = () => finish(interruptedError());

      const armStallTimer = () => {
        clearTimeout(stallTimer);
        stallTimer = setTimeout(() => {
          finish(new TransferError(`Download seems stalled, no data for ${options.timeoutSeconds} s: ${url}`));
        }, timeoutMs);
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      response.on('data', (chunk: Buffer) => {
        received += chunk.length;
        armStallTimer();
        options.onProgress?.(received);
      });

      response.on('end', () => clearTimeout(stallTimer));

      response.on('error', (error) => finish(toTransferError(error, signal)));

      response.on('close', () => {
        if (!response.complete) {
          finish(new TransferError(`Connection closed before the download completed: ${url}`));
        }
      });

      fileStream.on('error', (error) => {
        finish(new TransferError(`Cannot write ${filepath}: ${error.message}`, { cause: error }));
      });

      fileStream.on('finish', () => finish());

      if (deadlineSeconds > 0) {
        deadlineTimer = setTimeout(() => {
          finish(new TransferError(`Download timed out after ${deadlineSeconds} s: ${url}`));
        }, Math.max(0, deadline - Date.now()));
      }

      armStallTimer();
      response.pipe(fileStream);
    });
  }
}
