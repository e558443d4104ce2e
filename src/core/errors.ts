import { AxiosError, isCancel } from "axios";

/**
 * Base class for every failure the crawler raises on purpose.
 * `code` is stable and safe to switch on; the message is for humans.
 */
export class CrawlerError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

/** A link or start URL that could not be parsed. Non-fatal per link. */
export class UrlParseError extends CrawlerError {
  readonly input: string;

  constructor(input: string, cause?: unknown) {
    super(`invalid URL "${input}"`, "URL_PARSE", { cause });
    this.input = input;
  }
}

/** The request could not be sent or the connection broke mid-response. */
export class RequestError extends CrawlerError {
  readonly url: string;
  /** Transport error code such as ECONNREFUSED, when the transport gave one */
  readonly transportCode: string | null;

  constructor(url: string, cause: unknown) {
    const transportCode =
      cause instanceof AxiosError && cause.code ? cause.code : null;
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`request to ${url} failed: ${reason}`, "REQUEST_FAILED", { cause });
    this.url = url;
    this.transportCode = transportCode;
  }
}

export class NotFoundError extends CrawlerError {
  readonly url: string;

  constructor(url: string) {
    super(`page not found: ${url}`, "NOT_FOUND");
    this.url = url;
  }
}

export class UnexpectedStatusError extends CrawlerError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`request failed with status: ${status}`, "UNEXPECTED_STATUS");
    this.url = url;
    this.status = status;
  }
}

/** Cache read or write failure under the destination directory. */
export class IOError extends CrawlerError {
  readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} ${path}: ${reason}`, "IO_ERROR", { cause });
    this.path = path;
  }
}

export class CancellationError extends CrawlerError {
  constructor(url: string) {
    super(`crawl of ${url} was cancelled`, "CANCELLED");
  }
}

export class CrawlInProgressError extends CrawlerError {
  constructor() {
    super(
      "a crawl is already running on this instance; create another Crawler for parallel runs",
      "CRAWL_IN_PROGRESS"
    );
  }
}

/** Bad command-line input. */
export class ConfigError extends CrawlerError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

/**
 * True for anything produced by an aborted signal: our own
 * CancellationError, an axios cancellation or a stream AbortError.
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof CancellationError) return true;
  if (isCancel(err)) return true;
  return err instanceof Error && err.name === "AbortError";
}

/** True when a filesystem error means "no such file". */
export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
