import type { Readable } from "stream";

/** CLI configuration parsed from command-line arguments */
export interface CrawlConfig {
  startUrl: string;
  destinationDir: string;
  depth: number;
  concurrency: number;
  timeout: number;
}

/** What the transport hands back: the status line and an unread body. */
export interface HttpResponse {
  status: number;
  body: Readable;
}

/**
 * The single network capability the crawler needs.
 * Implementations must reject with CancellationError when `signal` aborts
 * and with RequestError on transport failures; any status code resolves.
 */
export interface HttpTransport {
  get(url: string, signal?: AbortSignal): Promise<HttpResponse>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

/** Content resolved by the page store for one URL */
export interface StoredPage {
  url: string;
  body: Buffer;
  fromCache: boolean;
}

/** Outcome of normalizing a single href: accepted URL or the reason it was dropped */
export type NormalizedLink =
  | { ok: true; url: string }
  | {
      ok: false;
      reason: "empty" | "mailto" | "fragment" | "cross-host" | "invalid";
      error?: Error;
    };

/** Statistics for one crawl run */
export interface CrawlSummary {
  /** Every URL admitted during the run, fetched successfully or not */
  visited: string[];
  downloaded: number;
  cached: number;
  failed: number;
  cancelled: boolean;
  elapsedMs: number;
}
