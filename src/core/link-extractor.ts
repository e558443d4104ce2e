import * as cheerio from "cheerio";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { normalizeLink, normalizeTarget } from "./url-normalizer";
import { Logger } from "../types";

/**
 * Collect the distinct same-host links of a parsed document.
 * The page's own URL is removed after collection.
 */
function collectLinks(
  $: cheerio.CheerioAPI,
  base: URL,
  self: string,
  logger: Pick<Logger, "warn">
): string[] {
  const found = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href") ?? "";
    const link = normalizeLink(base, href);
    if (link.ok) {
      found.add(link.url);
    } else if (link.reason === "invalid") {
      logger.warn(`   ! skipping link on ${self}: ${link.error?.message ?? href}`);
    }
  });

  found.delete(self);
  return [...found];
}

/**
 * Extract the outbound links of an HTML document read from `html`.
 *
 * The stream is fed to cheerio's streaming parser, which sniffs the
 * encoding and tolerates truncated or malformed markup; links are gathered
 * once the stream ends. Result order is not meaningful.
 * @param baseUrl - URL the document was fetched from
 * @param html - Raw document bytes
 */
export async function extractLinks(
  baseUrl: string,
  html: Readable,
  logger: Pick<Logger, "warn"> = console
): Promise<string[]> {
  const self = normalizeTarget(baseUrl);
  const $ = await parseDocument(html);
  return collectLinks($, new URL(baseUrl), self, logger);
}

/**
 * Stream bytes into cheerio. The document callback can fire after the
 * pipeline settles, so the promise follows the callback; the pipeline only
 * contributes source errors.
 */
function parseDocument(html: Readable): Promise<cheerio.CheerioAPI> {
  return new Promise((resolve, reject) => {
    const sink = cheerio.decodeStream({}, (err, $) => {
      if (err) reject(err);
      else resolve($);
    });
    pipeline(html, sink).catch(reject);
  });
}

/** Convenience wrapper for content already held in memory */
export function extractLinksFromBuffer(
  baseUrl: string,
  body: Buffer,
  logger: Pick<Logger, "warn"> = console
): Promise<string[]> {
  return extractLinks(baseUrl, Readable.from([body]), logger);
}
