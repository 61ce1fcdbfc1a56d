import fetch from "node-fetch";
import type { Transport, TransportRequest, TransportResponse } from "../ports/transport.js";
import { networkFailure } from "../errors/catalog.js";
import { errorMessage } from "../errors/types.js";

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  return Buffer.from(String(chunk));
}

interface StallGuard {
  /** Milliseconds without a chunk before the body counts as stalled */
  idleMs?: number;
  /** Called once the body stalled; aborts the underlying request */
  onStall: () => void;
}

/**
 * Re-yield a response body as bytes. Stream failures surface as NetworkError;
 * `release` runs once the body is finished or abandoned. Only time spent
 * waiting on the server counts against the idle limit.
 */
async function* byteStream(
  body: AsyncIterable<unknown>,
  url: string,
  guard: StallGuard,
  release: () => void
): AsyncGenerator<Uint8Array> {
  const iterator = body[Symbol.asyncIterator]();
  let stalled = false;
  let finished = false;
  let idle: NodeJS.Timeout | undefined;

  try {
    for (;;) {
      if (guard.idleMs !== undefined) {
        idle = setTimeout(() => {
          stalled = true;
          guard.onStall();
        }, guard.idleMs);
      }
      const next = await iterator.next();
      clearTimeout(idle);
      if (next.done) {
        finished = true;
        return;
      }
      yield toBytes(next.value);
    }
  } catch (error) {
    finished = true;
    if (stalled) {
      throw networkFailure(`Stream from ${url} stalled: no data for ${guard.idleMs}ms`, error, true);
    }
    throw networkFailure(`Stream from ${url} interrupted: ${errorMessage(error)}`, error);
  } finally {
    clearTimeout(idle);
    release();
    if (!finished) await iterator.return?.();
  }
}

/**
 * Create a transport backed by node-fetch.
 * The timeout bounds the wait for response headers and then every wait for
 * the next body chunk; the caller's signal covers the whole call.
 */
export function createFetchTransport(fetchImpl: typeof fetch = fetch): Transport {
  return {
    async send(request: TransportRequest): Promise<TransportResponse> {
      const controller = new AbortController();
      const forwardAbort = () => controller.abort();
      const release = () => request.signal?.removeEventListener("abort", forwardAbort);

      if (request.signal?.aborted) {
        controller.abort();
      } else {
        request.signal?.addEventListener("abort", forwardAbort, { once: true });
      }

      let timedOut = false;
      const timer =
        request.timeoutMs !== undefined
          ? setTimeout(() => {
              timedOut = true;
              controller.abort();
            }, request.timeoutMs)
          : undefined;

      try {
        const response = await fetchImpl(request.url, {
          method: request.method,
          headers: request.headers,
          redirect: "follow",
          signal: controller.signal,
        });

        const body = isAsyncIterable(response.body)
          ? byteStream(
              response.body,
              request.url,
              { idleMs: request.timeoutMs, onStall: () => controller.abort() },
              release
            )
          : null;
        if (!body) release();

        return {
          status: response.status,
          statusText: response.statusText,
          headers: response.headers,
          body,
          text: async () => {
            try {
              return await response.text();
            } finally {
              release();
            }
          },
        };
      } catch (error) {
        release();
        const message = timedOut
          ? `Request to ${request.url} timed out after ${request.timeoutMs}ms`
          : `Request to ${request.url} failed: ${errorMessage(error)}`;
        throw networkFailure(message, error, timedOut);
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
