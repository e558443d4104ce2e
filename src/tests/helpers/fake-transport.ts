import { Readable } from "stream";
import { CancellationError } from "../../core/errors";
import { HttpResponse, HttpTransport } from "../../types";

export interface FakeRoute {
  status: number;
  body: string | Buffer | Readable;
}

/**
 * In-process stand-in for the network. URLs without a registered handler
 * answer 404, like a host that has no such page.
 */
export class FakeTransport implements HttpTransport {
  private readonly routes = new Map<string, () => FakeRoute | Promise<FakeRoute>>();
  readonly requests: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  request(url: string, handler: () => FakeRoute | Promise<FakeRoute>): this {
    this.routes.set(url, handler);
    return this;
  }

  page(url: string, html: string): this {
    return this.request(url, () => ({ status: 200, body: html }));
  }

  async get(url: string, signal?: AbortSignal): Promise<HttpResponse> {
    this.requests.push(url);
    if (signal?.aborted) throw new CancellationError(url);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const handler = this.routes.get(url);
      const route = handler ? await handler() : { status: 404, body: "" };
      const body =
        route.body instanceof Readable
          ? route.body
          : Readable.from([typeof route.body === "string" ? Buffer.from(route.body) : route.body]);
      return { status: route.status, body };
    } finally {
      this.inFlight--;
    }
  }
}

/** Build an HTML page whose body is a list of anchors */
export function htmlWithLinks(hrefs: string[]): string {
  const anchors = hrefs.map((href) => `<a href="${href}">${href}</a>`).join("\n");
  return `<!DOCTYPE html><html><body><ul>\n${anchors}\n</ul></body></html>`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
