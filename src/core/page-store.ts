import * as fs from "fs";
import * as path from "path";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import {
  CancellationError,
  IOError,
  NotFoundError,
  RequestError,
  UnexpectedStatusError,
  isCancellation,
  isMissingFile,
} from "./errors";
import { HttpTransport, StoredPage } from "../types";

/** Every run of non-alphanumeric characters collapses to one separator */
const NON_ALPHANUMERIC = /[^a-zA-Z0-9]+/g;

/**
 * Deterministic cache filename for a URL, e.g.
 * "http://localhost.com/pricing" -> "http_localhost_com_pricing".
 * Distinct URLs can collide (differing only in punctuation); nothing
 * guards against it.
 */
export function cacheFilename(url: string): string {
  return url.replace(NON_ALPHANUMERIC, "_");
}

/**
 * Resolves URLs to page bodies, reading the on-disk cache first and
 * downloading on a miss. A cached file is never refreshed or removed, which
 * is what lets an interrupted crawl resume.
 */
export class PageStore {
  constructor(
    private readonly transport: HttpTransport,
    readonly destinationDir: string
  ) {}

  cachePath(url: string): string {
    return path.join(this.destinationDir, cacheFilename(url));
  }

  async fetch(url: string, signal?: AbortSignal): Promise<StoredPage> {
    const filePath = this.cachePath(url);

    try {
      const body = await fs.promises.readFile(filePath);
      return { url, body, fromCache: true };
    } catch (err) {
      if (!isMissingFile(err)) throw new IOError("read cache file", filePath, err);
    }

    const body = await this.download(url, filePath, signal);
    return { url, body, fromCache: false };
  }

  /**
   * GET `url` and stream a 200 body to `filePath` and to memory in a single
   * pass. Any other status fails before a file is created; a failure while
   * streaming removes the partial file.
   */
  async download(
    url: string,
    filePath: string,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const response = await this.transport.get(url, signal);

    if (response.status !== 200) {
      response.body.destroy();
      if (response.status === 404) throw new NotFoundError(url);
      throw new UnexpectedStatusError(url, response.status);
    }

    if (signal?.aborted) {
      response.body.destroy();
      throw new CancellationError(url);
    }

    const chunks: Buffer[] = [];
    const tee = new Transform({
      transform(chunk: Buffer | string, _encoding, callback) {
        const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
        chunks.push(bytes);
        callback(null, bytes);
      },
    });

    // pipeline re-emits the first error on every stream; remember who failed first
    const failure: { side: "network" | "file" | null } = { side: null };
    const file = fs.createWriteStream(filePath);
    response.body.once("error", () => {
      if (!failure.side) failure.side = "network";
    });
    file.once("error", () => {
      if (!failure.side) failure.side = "file";
    });

    try {
      await pipeline(response.body, tee, file, { signal });
    } catch (err) {
      if (!file.closed) {
        await new Promise<void>((resolve) => file.once("close", () => resolve()));
      }
      await fs.promises.rm(filePath, { force: true });

      if (signal?.aborted || isCancellation(err)) throw new CancellationError(url);
      if (failure.side === "file") throw new IOError("write cache file", filePath, err);
      throw new RequestError(url, err);
    }

    return Buffer.concat(chunks);
  }
}
