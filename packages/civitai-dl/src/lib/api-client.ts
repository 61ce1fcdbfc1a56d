import Conf from "conf";
import type { z } from "zod";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { HttpMethod, Transport, TransportResponse } from "./ports/transport.js";
import { systemClock } from "./adapters/system-clock.js";
import { abortable, realDelay } from "./adapters/real-timers.js";
import { createFetchTransport } from "./adapters/fetch-transport.js";
import { NetworkError, errorMessage } from "./errors/types.js";
import {
  errorForStatus,
  invalidResponse,
  networkFailure,
  rateLimited,
  transportFailed,
} from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { CONFIG_DEFAULTS } from "./config.js";
import {
  ImagePageSchema,
  ModelPageSchema,
  ModelSchema,
  ModelVersionSchema,
  type CatalogImage,
  type Model,
  type ModelVersion,
  type Page,
} from "./catalog-schemas.js";
import { createPaginatedFetcher, type QueryParams } from "./pagination.js";

// ---------------------------------------------------------------------------
// Key storage
// ---------------------------------------------------------------------------

export interface StoredCredentials {
  apiKey?: string;
  savedAt?: number;
}

export interface KeyStore {
  getApiKey(): string | undefined;
  setApiKey(apiKey: string): void;
  clear(): void;
}

export class ConfKeyStore implements KeyStore {
  private readonly conf = new Conf<StoredCredentials>({ projectName: "civitai-dl" });

  getApiKey(): string | undefined {
    return this.conf.get("apiKey");
  }

  setApiKey(apiKey: string): void {
    const trimmed = apiKey.trim();
    if (!trimmed) {
      throw new Error("Refusing to store an empty API key.");
    }
    this.conf.set({ apiKey: trimmed, savedAt: Date.now() });
  }

  clear(): void {
    this.conf.clear();
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Lowest interval a throttled client backs off to, even when configured at zero */
const MIN_BACKOFF_INTERVAL_MS = 250;

export interface RateLimiterState {
  /** Monotonic time of the most recently reserved request slot */
  lastRequestTime: number | null;
  minIntervalMs: number;
  /** No request is issued before this monotonic time */
  penaltyUntil: number;
  /** 429 responses seen over the client's lifetime */
  throttledCount: number;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: QueryParams;
  signal?: AbortSignal;
  /** Overrides the client's timeout for this call */
  timeoutMs?: number;
  /** Called before each retry that follows a 429 */
  onRetry?: (attempt: number) => void;
}

export interface ApiClientOptions {
  baseUrl?: string;
  apiKey?: string;
  transport?: Transport;
  clock?: Clock;
  delay?: DelayFn;
  logger?: Logger;
  minRequestIntervalMs?: number;
  maxRequestIntervalMs?: number;
  maxRateLimitRetries?: number;
  rateLimitPenaltyMs?: number;
  timeoutMs?: number;
  maxPages?: number;
  userAgent?: string;
}

export type ModelSearchParams = {
  query?: string;
  types?: string | readonly string[];
  sort?: string;
  period?: string;
  username?: string;
  tag?: string;
  nsfw?: boolean;
  baseModels?: string | readonly string[];
  limit?: number;
  page?: number;
  cursor?: string;
};

export type ImageSearchParams = {
  modelId?: number;
  modelVersionId?: number;
  postId?: number;
  username?: string;
  nsfw?: boolean | string;
  sort?: string;
  period?: string;
  limit?: number;
  cursor?: string;
};

export interface ApiClient {
  /**
   * Issue one paced call. Resolves with any 2xx/3xx response; the caller owns its body.
   * 429 responses are retried here; other failures map to the APIError family.
   */
  request(method: HttpMethod, url: string, options?: RequestOptions): Promise<TransportResponse>;
  head(url: string, options?: RequestOptions): Promise<TransportResponse>;
  getJson<T>(path: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
  getModels(params?: ModelSearchParams): Promise<Page<Model>>;
  getModel(modelId: number): Promise<Model>;
  getModelVersion(versionId: number): Promise<ModelVersion>;
  getImages(params?: ImageSearchParams): Promise<Page<CatalogImage>>;
  getAllImages(params?: ImageSearchParams, limit?: number): Promise<CatalogImage[]>;
  /** Direct file link for a model version; carries the key as `token` when one is set */
  getDownloadUrl(versionId: number): string;
  hasApiKey(): boolean;
  getRateLimiterState(): RateLimiterState;
}

// ---------------------------------------------------------------------------
// URL helpers
// ---------------------------------------------------------------------------

function joinUrl(baseUrl: string, path: string): string {
  if (/^https?:\/\//i.test(path)) return path;
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Append query parameters, skipping null and undefined. Arrays repeat the key.
 */
export function withQuery(url: string, params: QueryParams = {}): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) target.searchParams.append(key, String(item));
    } else {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** The server's own explanation from an error body, if it gave one. */
function errorDetail(text: string): string | undefined {
  const body = parseJson(text);
  if (typeof body === "object" && body !== null) {
    for (const key of ["message", "error"]) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === "string" && value) return value;
    }
    return undefined;
  }
  const trimmed = text.trim();
  return trimmed ? trimmed.slice(0, 200) : undefined;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createApiClient({
  baseUrl = CONFIG_DEFAULTS.baseUrl,
  apiKey,
  transport = createFetchTransport(),
  clock = systemClock,
  delay = realDelay,
  logger = createNoopLogger(),
  minRequestIntervalMs = CONFIG_DEFAULTS.minRequestIntervalMs,
  maxRequestIntervalMs = CONFIG_DEFAULTS.maxRequestIntervalMs,
  maxRateLimitRetries = CONFIG_DEFAULTS.maxRateLimitRetries,
  rateLimitPenaltyMs = CONFIG_DEFAULTS.rateLimitPenaltyMs,
  timeoutMs = CONFIG_DEFAULTS.timeoutMs,
  maxPages = CONFIG_DEFAULTS.maxPages,
  userAgent = "civitai-dl",
}: ApiClientOptions = {}): ApiClient {
  const log = logger.child({ component: "api-client" });
  const key = apiKey?.trim() || undefined;

  const state: RateLimiterState = {
    lastRequestTime: null,
    minIntervalMs: minRequestIntervalMs,
    penaltyUntil: 0,
    throttledCount: 0,
  };

  /**
   * Claim the next issue slot and return how long to wait for it.
   * Runs without awaiting, so concurrent callers each get a distinct slot.
   */
  function reserveSlot(): number {
    const now = clock.monotonic();
    const spaced = state.lastRequestTime === null ? now : state.lastRequestTime + state.minIntervalMs;
    const scheduledAt = Math.max(now, spaced, state.penaltyUntil);
    state.lastRequestTime = scheduledAt;
    return scheduledAt - now;
  }

  function recordThrottle(): void {
    const doubled = Math.max(state.minIntervalMs * 2, MIN_BACKOFF_INTERVAL_MS);
    state.minIntervalMs = Math.max(state.minIntervalMs, Math.min(doubled, maxRequestIntervalMs));
    state.penaltyUntil = Math.max(state.penaltyUntil, clock.monotonic() + rateLimitPenaltyMs);
    state.throttledCount++;
  }

  /**
   * Sleep until a reserved slot comes up. A 429 seen meanwhile invalidates the
   * slot and a new one is reserved.
   */
  async function waitForSlot(target: string, signal: AbortSignal | undefined): Promise<void> {
    for (;;) {
      const generation = state.throttledCount;
      const wait = reserveSlot();
      if (wait > 0) await (signal ? abortable(delay(wait), signal) : delay(wait));
      if (signal?.aborted) {
        throw transportFailed(target, networkFailure(`Request to ${target} aborted`));
      }
      if (state.throttledCount === generation) return;
      log.debug("Slot reserved before a 429, reserving again", { url: target });
    }
  }

  async function discardBody(response: TransportResponse): Promise<void> {
    try {
      await response.text();
    } catch (error) {
      log.debug("Failed to drain response body", { error: errorMessage(error) });
    }
  }

  async function request(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<TransportResponse> {
    const target = withQuery(url, options.params);
    const headers: Record<string, string> = { "User-Agent": userAgent, ...options.headers };
    if (key && headers.Authorization === undefined) {
      headers.Authorization = `Bearer ${key}`;
    }

    let hits = 0;
    for (;;) {
      await waitForSlot(target, options.signal);

      log.debug("HTTP request", { method, url: target, range: headers.Range });

      let response: TransportResponse;
      try {
        response = await transport.send({
          method,
          url: target,
          headers,
          timeoutMs: options.timeoutMs ?? timeoutMs,
          signal: options.signal,
        });
      } catch (error) {
        if (error instanceof NetworkError) throw transportFailed(target, error);
        throw error;
      }

      if (response.status === 429) {
        hits++;
        await discardBody(response);
        recordThrottle();
        if (hits > maxRateLimitRetries) {
          throw rateLimited(hits, target);
        }
        log.warn("Rate limited, backing off", {
          url: target,
          attempt: hits,
          minIntervalMs: state.minIntervalMs,
        });
        options.onRetry?.(hits);
        continue;
      }

      if (response.status >= 400) {
        let detail: string | undefined;
        try {
          detail = errorDetail(await response.text());
        } catch (error) {
          log.debug("Failed to read error body", { error: errorMessage(error) });
        }
        throw errorForStatus(response.status, target, detail);
      }

      return response;
    }
  }

  async function getJson<T>(
    path: string,
    params: QueryParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const url = joinUrl(baseUrl, path);
    const response = await request("GET", url, {
      params,
      headers: { Accept: "application/json" },
    });

    const body = parseJson(await response.text());
    if (body === undefined) {
      throw invalidResponse(url, "Response body is not JSON");
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues
        .slice(0, 5)
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw invalidResponse(url, issues.join("\n"));
    }
    return result.data;
  }

  async function getImages(params: ImageSearchParams = {}): Promise<Page<CatalogImage>> {
    return getJson("images", params, ImagePageSchema);
  }

  return {
    request,
    head: (url, options) => request("HEAD", url, options),
    getJson,
    getModels: (params = {}) => getJson("models", params, ModelPageSchema),
    getModel: (modelId) => getJson(`models/${modelId}`, {}, ModelSchema),
    getModelVersion: (versionId) => getJson(`model-versions/${versionId}`, {}, ModelVersionSchema),
    getImages,
    getAllImages(params = {}, limit) {
      const fetcher = createPaginatedFetcher<CatalogImage>(
        (page) => getJson("images", page, ImagePageSchema),
        { maxPages, logger }
      );
      return fetcher.collect(params, limit);
    },
    getDownloadUrl(versionId) {
      const url = new URL(`../download/models/${versionId}`, `${baseUrl.replace(/\/+$/, "")}/`);
      if (key) url.searchParams.set("token", key);
      return url.toString();
    },
    hasApiKey: () => key !== undefined,
    getRateLimiterState: () => ({ ...state }),
  };
}
