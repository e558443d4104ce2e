import { describe, it, expect, vi } from "vitest";
import { Readable } from "stream";
import { extractLinks, extractLinksFromBuffer } from "../core/link-extractor";
import { htmlWithLinks } from "./helpers/fake-transport";

const LANDING_PAGE = htmlWithLinks([
  "/",
  "/advanced-features",
  "/pricing",
  "/demo?url=staging",
  "https://google.com",
  "mailto:someone@example.com",
  "#",
]);

function silentLogger() {
  return { warn: vi.fn() };
}

describe("extractLinks", () => {
  it("keeps same-host links and drops self, external and non-navigational hrefs", async () => {
    const links = await extractLinksFromBuffer(
      "http://localhost.com",
      Buffer.from(LANDING_PAGE),
      silentLogger()
    );

    expect(links).toHaveLength(3);
    expect([...links].sort()).toEqual([
      "http://localhost.com/advanced-features",
      "http://localhost.com/demo",
      "http://localhost.com/pricing",
    ]);
  });

  it("removes the self-link even when the base URL has a trailing slash or query", async () => {
    const html = htmlWithLinks(["/docs", "/docs/", "/docs?lang=fr", "/docs/intro"]);

    const links = await extractLinksFromBuffer(
      "http://localhost.com/docs/?lang=en",
      Buffer.from(html),
      silentLogger()
    );

    expect(links).toEqual(["http://localhost.com/docs/intro"]);
  });

  it("deduplicates links that normalize to the same target", async () => {
    const html = htmlWithLinks(["/a", "/a/", "/a?x=1", "http://localhost.com/a#section"]);

    const links = await extractLinksFromBuffer("http://localhost.com", Buffer.from(html), silentLogger());

    expect(links).toEqual(["http://localhost.com/a"]);
  });

  it("ignores non-anchor tags, anchors without href and other attributes", async () => {
    const html = `
      <link rel="stylesheet" href="/style.css">
      <img src="/logo.png">
      <area href="/map">
      <a name="top">Top</a>
      <a data-href="/hidden" title="/title">No href</a>
      <A HREF="/upper">Upper case tag</A>`;

    const links = await extractLinksFromBuffer("http://localhost.com", Buffer.from(html), silentLogger());

    expect(links).toEqual(["http://localhost.com/upper"]);
  });

  it("returns the links found before a truncated document ends", async () => {
    const html = `<html><body><a href="/one">one</a><div><a href="/two">two</a><a href="/thr`;

    const links = await extractLinksFromBuffer("http://localhost.com", Buffer.from(html), silentLogger());

    expect([...links].sort()).toEqual(["http://localhost.com/one", "http://localhost.com/two"]);
  });

  it("reads a document split across many stream chunks", async () => {
    const html = htmlWithLinks(["/first", "/second"]);
    const chunks = html.match(/[\s\S]{1,7}/g) ?? [];
    const stream = Readable.from(chunks.map((chunk) => Buffer.from(chunk)));

    const links = await extractLinks("http://localhost.com", stream, silentLogger());

    expect([...links].sort()).toEqual(["http://localhost.com/first", "http://localhost.com/second"]);
  });

  it("warns about unparsable hrefs and keeps going", async () => {
    const logger = silentLogger();
    const html = htmlWithLinks(["http://[invalid", "/valid"]);

    const links = await extractLinksFromBuffer("http://localhost.com", Buffer.from(html), logger);

    expect(links).toEqual(["http://localhost.com/valid"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      '   ! skipping link on http://localhost.com: invalid URL "http://[invalid"'
    );
  });

  it("returns nothing for an empty document", async () => {
    const links = await extractLinksFromBuffer("http://localhost.com", Buffer.alloc(0), silentLogger());
    expect(links).toEqual([]);
  });
});
