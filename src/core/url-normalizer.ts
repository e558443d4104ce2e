import { UrlParseError } from "./errors";
import { NormalizedLink } from "../types";

/**
 * Drop query, fragment and trailing slashes. Distinct query strings on the
 * same path collapse into one target; that loss is accepted.
 */
function canonical(url: URL): string {
  url.search = "";
  url.hash = "";
  return url.href.replace(/\/+$/, "");
}

/**
 * Normalize a crawl target (a start URL or a page's own URL) into its
 * deduplication key.
 * @throws UrlParseError when `rawUrl` is not an absolute URL
 */
export function normalizeTarget(rawUrl: string): string {
  let url: URL;
  try {
    url = new URL(rawUrl.trim());
  } catch (err) {
    throw new UrlParseError(rawUrl, err);
  }
  return canonical(url);
}

/**
 * Resolve an anchor href against the page it was found on.
 * Accepts only links on the same host as `base`; mailto links, same-page
 * fragments and empty hrefs are rejected before parsing.
 */
export function normalizeLink(base: URL, href: string): NormalizedLink {
  const raw = href.trim();
  if (raw === "") return { ok: false, reason: "empty" };
  if (raw.startsWith("mailto:")) return { ok: false, reason: "mailto" };
  if (raw.startsWith("#")) return { ok: false, reason: "fragment" };

  let resolved: URL;
  try {
    resolved = new URL(raw, base);
  } catch (err) {
    return { ok: false, reason: "invalid", error: new UrlParseError(raw, err) };
  }

  // Also catches protocol-relative links and schemes without a host (javascript:, tel:)
  if (resolved.host !== base.host) return { ok: false, reason: "cross-host" };

  return { ok: true, url: canonical(resolved) };
}
