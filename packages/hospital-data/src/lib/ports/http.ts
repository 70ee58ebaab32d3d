/**
 * Abstraction for outbound HTTP GETs.
 * Allows testing the catalog and dataset steps without network access.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  /** Full response body decoded as UTF-8 */
  body: string;
}

export interface HttpClient {
  /**
   * GET a URL. Resolves for any HTTP status; rejects with a RemoteError
   * when no response was received.
   */
  get(url: string): Promise<HttpResponse>;
}
