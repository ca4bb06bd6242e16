export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A page could not be retrieved after every retry. The item is treated as
 * unavailable; the run continues.
 */
export class FetchError extends CrawlerError {
  readonly url: string;
  readonly attempts: number;
  readonly status?: number;

  constructor(url: string, attempts: number, cause: unknown, status?: number) {
    super(`Failed to fetch ${url} after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    this.url = url;
    this.attempts = attempts;
    this.status = status;
  }
}

/** A required element is missing from a thread page. */
export class ParseError extends CrawlerError {
  readonly threadId?: string;

  constructor(message: string, threadId?: string) {
    super(message);
    this.threadId = threadId;
  }
}

/** The catalog rejected a post or could not be reached. */
export class SendError extends CrawlerError {
  readonly status?: number;
  readonly responseBody?: string;

  constructor(message: string, options: { cause?: unknown; status?: number; responseBody?: string } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.responseBody = options.responseBody;
  }
}

export class ConfigError extends CrawlerError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
