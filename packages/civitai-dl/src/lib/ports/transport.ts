/**
 * Abstraction for a single HTTP call.
 * Allows testing the client and the engine without network access.
 */

export type HttpMethod = "GET" | "HEAD";

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** Milliseconds until response headers, and then each body chunk, must arrive */
  timeoutMs?: number;
  /** Aborts the call, including a body that is still streaming */
  signal?: AbortSignal;
}

export interface TransportHeaders {
  get(name: string): string | null;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  headers: TransportHeaders;
  /** Streamed body; null for HEAD or empty responses */
  body: AsyncIterable<Uint8Array> | null;
  /** Read the whole body as text */
  text(): Promise<string>;
}

export interface Transport {
  /**
   * Issue the request. Rejects with a NetworkError when nothing usable came back.
   * HTTP error statuses resolve normally.
   */
  send(request: TransportRequest): Promise<TransportResponse>;
}
