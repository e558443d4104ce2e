import * as fs from "fs";
import * as os from "os";
import pLimit from "p-limit";
import { CancellationError, CrawlInProgressError, IOError, isCancellation } from "./errors";
import { createDefaultTransport } from "./http-transport";
import { extractLinksFromBuffer } from "./link-extractor";
import { PageStore } from "./page-store";
import { normalizeTarget } from "./url-normalizer";
import { getErrorMessage } from "./utils";
import { VisitedTracker } from "./visited-tracker";
import { CrawlSummary, HttpTransport, Logger } from "../types";

/** Default directory where fetched pages are saved */
export const DEFAULT_DESTINATION_DIR = "storage";

/** Default request timeout for the built-in transport (ms) */
export const DEFAULT_TIMEOUT = 30_000;

export interface CrawlerOptions {
  /** Injected network capability; defaults to an axios transport */
  transport?: HttpTransport;
  destinationDir?: string;
  /** Maximum branches fetching at once; defaults to the CPU count */
  maxConcurrency?: number;
  /** Request timeout for the default transport; ignored with a custom one */
  timeout?: number;
  logger?: Logger;
}

/** State shared by every branch of one run */
interface CrawlRun {
  visited: VisitedTracker;
  limit: ReturnType<typeof pLimit>;
  signal?: AbortSignal;
  downloaded: number;
  cached: number;
  failed: number;
}

/**
 * Depth-bounded crawler that follows same-host links, caching every page
 * it downloads under `destinationDir`.
 *
 * One run at a time per instance: the visited set belongs to the run, and
 * a second `start` while one is in flight is rejected.
 */
export class Crawler {
  private running = false;

  private constructor(
    private readonly store: PageStore,
    readonly maxConcurrency: number,
    private readonly logger: Logger
  ) {}

  /**
   * Build a crawler, creating the destination directory if needed.
   * @throws IOError when the directory cannot be created
   */
  static async create(options: CrawlerOptions = {}): Promise<Crawler> {
    const destinationDir = options.destinationDir || DEFAULT_DESTINATION_DIR;
    const maxConcurrency = options.maxConcurrency ?? os.availableParallelism();
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    try {
      await fs.promises.mkdir(destinationDir, { recursive: true });
    } catch (err) {
      throw new IOError("create destination directory", destinationDir, err);
    }

    const transport = options.transport ?? createDefaultTransport(options.timeout ?? DEFAULT_TIMEOUT);
    return new Crawler(
      new PageStore(transport, destinationDir),
      maxConcurrency,
      options.logger ?? console
    );
  }

  get destinationDir(): string {
    return this.store.destinationDir;
  }

  /**
   * Crawl from `rawUrl` and return every URL admitted during the run.
   * A cancelled run resolves with whatever was admitted before the abort.
   */
  async start(rawUrl: string, depth: number, signal?: AbortSignal): Promise<string[]> {
    const summary = await this.run(rawUrl, depth, signal);
    return summary.visited;
  }

  /**
   * Same traversal as `start`, reporting page counts as well.
   * @throws UrlParseError when `rawUrl` is not an absolute URL
   * @throws CrawlInProgressError when this instance is already crawling
   */
  async run(rawUrl: string, depth: number, signal?: AbortSignal): Promise<CrawlSummary> {
    if (this.running) throw new CrawlInProgressError();

    const target = normalizeTarget(rawUrl);
    const startTime = Date.now();
    const run: CrawlRun = {
      visited: new VisitedTracker(),
      limit: pLimit(this.maxConcurrency),
      signal,
      downloaded: 0,
      cached: 0,
      failed: 0,
    };

    this.running = true;
    try {
      await this.crawl(run, target, depth, rawUrl);
    } finally {
      this.running = false;
    }

    return {
      visited: run.visited.toArray(),
      downloaded: run.downloaded,
      cached: run.cached,
      failed: run.failed,
      cancelled: signal?.aborted ?? false,
      elapsedMs: Date.now() - startTime,
    };
  }

  /**
   * Load one page (cache or network) and return its same-host links.
   */
  async fetchLinks(url: string, signal?: AbortSignal): Promise<{ links: string[]; fromCache: boolean }> {
    const page = await this.store.fetch(url, signal);
    const links = await extractLinksFromBuffer(url, page.body, this.logger);
    return { links, fromCache: page.fromCache };
  }

  /**
   * One branch: admit, fetch and extract inside the concurrency gate, then
   * recurse into every child with depth - 1. The gate slot is released
   * before the children start, so a parent never holds a slot while it
   * waits on its own subtree. Failures end this branch only.
   *
   * `fetchUrl` is what gets requested and cached; only the start URL keeps
   * its raw form there, every other branch fetches its normalized target.
   */
  private async crawl(
    run: CrawlRun,
    target: string,
    depth: number,
    fetchUrl: string = target
  ): Promise<void> {
    if (depth <= 0) return;
    if (!run.visited.tryAdmit(target)) return;
    if (run.signal?.aborted) return;

    let links: string[];
    try {
      const result = await run.limit(() => {
        if (run.signal?.aborted) throw new CancellationError(target);
        return this.fetchLinks(fetchUrl, run.signal);
      });
      links = result.links;
      if (result.fromCache) run.cached++;
      else run.downloaded++;
      this.logger.log(
        `   + ${target}  found ${links.length} link(s)${result.fromCache ? " [cache]" : ""}`
      );
    } catch (err) {
      if (isCancellation(err)) return;
      run.failed++;
      this.logger.error(`   x ${target}: ${getErrorMessage(err)}`);
      return;
    }

    await Promise.all(links.map((link) => this.crawl(run, link, depth - 1)));
  }
}
