import fetch from "node-fetch";
import type { HttpClient, HttpResponse } from "../ports/http.js";
import { networkUnreachable } from "../errors/catalog.js";

/** The slice of a fetch implementation this adapter relies on */
export type FetchFn = (
  url: string,
  init?: { headers?: Record<string, string> }
) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}>;

export interface NodeFetchHttpClientOptions {
  fetchImpl?: FetchFn;
  userAgent?: string;
}

export const DEFAULT_USER_AGENT = "hospital-data/0.1 (+https://data.cms.gov/provider-data)";

/**
 * Create an HTTP client backed by node-fetch.
 */
export function createNodeFetchHttpClient({
  fetchImpl = fetch,
  userAgent = DEFAULT_USER_AGENT,
}: NodeFetchHttpClientOptions = {}): HttpClient {
  return {
    async get(url: string): Promise<HttpResponse> {
      let response: Awaited<ReturnType<FetchFn>>;
      try {
        response = await fetchImpl(url, { headers: { "User-Agent": userAgent } });
      } catch (error) {
        throw networkUnreachable(url, error);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        // Connection dropped mid-body
        throw networkUnreachable(url, error);
      }

      return {
        ok: response.ok,
        status: response.status,
        statusText: response.statusText,
        body,
      };
    },
  };
}

/**
 * Default HTTP client instance.
 */
export const nodeFetchHttpClient = createNodeFetchHttpClient();
