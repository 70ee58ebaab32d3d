import type { HttpClient, HttpResponse } from "../ports/http.js";
import { networkUnreachable } from "../errors/catalog.js";

type Route = HttpResponse | Error | (() => Promise<HttpResponse>);

/**
 * In-process HttpClient keyed by URL. Unknown URLs answer 404.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: string[] = [];
  private readonly routes = new Map<string, Route>();

  respond(url: string, body: string, status = 200, statusText = "OK"): this {
    this.routes.set(url, { ok: status >= 200 && status < 300, status, statusText, body });
    return this;
  }

  respondJson(url: string, payload: unknown): this {
    return this.respond(url, JSON.stringify(payload));
  }

  fail(url: string, error: Error): this {
    this.routes.set(url, error);
    return this;
  }

  handle(url: string, handler: () => Promise<HttpResponse>): this {
    this.routes.set(url, handler);
    return this;
  }

  async get(url: string): Promise<HttpResponse> {
    this.requests.push(url);
    const route = this.routes.get(url);
    if (route === undefined) {
      return { ok: false, status: 404, statusText: "Not Found", body: "" };
    }
    if (route instanceof Error) {
      throw networkUnreachable(url, route);
    }
    if (typeof route === "function") {
      return route();
    }
    return route;
  }
}
