export class CrawlError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidLinkError extends CrawlError {}

/** A page or element could not be located within the local retry budget */
export class NavigationError extends CrawlError {}

export class TransferError extends CrawlError {
  readonly interrupted: boolean;

  constructor(message: string, options?: ErrorOptions & { interrupted?: boolean }) {
    super(message, options);
    this.interrupted = options?.interrupted ?? false;
  }
}

/** Downloaded file is unreadable or disagrees with the remote size */
export class IntegrityError extends CrawlError {}

/** A listing produced duplicates where the site guarantees uniqueness */
export class ConsistencyError extends CrawlError {}

export class FilesystemError extends CrawlError {}

export class InterruptedError extends CrawlError {
  constructor(message = 'Crawl interrupted') {
    super(message);
  }
}

export class ConfigError extends CrawlError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
