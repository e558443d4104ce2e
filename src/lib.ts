export { Crawler, DEFAULT_DESTINATION_DIR, DEFAULT_TIMEOUT } from "./core/crawler";
export type { CrawlerOptions } from "./core/crawler";
export { PageStore, cacheFilename } from "./core/page-store";
export { extractLinks, extractLinksFromBuffer } from "./core/link-extractor";
export { normalizeLink, normalizeTarget } from "./core/url-normalizer";
export { VisitedTracker } from "./core/visited-tracker";
export { createAxiosTransport, createDefaultTransport } from "./core/http-transport";
export * from "./core/errors";
export type * from "./types";
