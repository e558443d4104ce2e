import { AxiosInstance, isCancel } from "axios";
import { Readable } from "stream";
import { CancellationError, RequestError } from "./errors";
import { createHttpClient } from "./utils";
import { HttpResponse, HttpTransport } from "../types";

/**
 * Adapt an axios instance to the crawler's transport interface.
 * The body is left unread as a stream; every status code resolves so the
 * page store decides what a 404 or 500 means.
 */
export function createAxiosTransport(http: AxiosInstance): HttpTransport {
  return {
    async get(url: string, signal?: AbortSignal): Promise<HttpResponse> {
      try {
        const response = await http.get<Readable>(url, {
          responseType: "stream",
          validateStatus: () => true,
          signal,
        });
        return { status: response.status, body: response.data };
      } catch (err) {
        if (isCancel(err) || signal?.aborted) throw new CancellationError(url);
        throw new RequestError(url, err);
      }
    },
  };
}

/** Default transport: browser-like headers, the given timeout in ms */
export function createDefaultTransport(timeout: number): HttpTransport {
  return createAxiosTransport(createHttpClient(timeout));
}
