import type { Page } from "./catalog-schemas.js";
import { createNoopLogger, type Logger } from "./logger.js";

export type QueryValue = string | number | boolean | null | undefined | readonly (string | number)[];
export type QueryParams = Record<string, QueryValue>;

export type FetchPage<T> = (params: QueryParams) => Promise<Page<T>>;

export interface PaginatedFetcherOptions {
  /** Hard ceiling on pages requested by one iteration */
  maxPages?: number;
  logger?: Logger;
}

export interface PaginatedFetcher<T> {
  /**
   * Yield every item across pages, following `metadata.nextCursor`.
   * Each call starts a fresh iteration from `baseParams`.
   */
  fetchAll(baseParams?: QueryParams): AsyncGenerator<T, void, undefined>;
  /** Gather items into an array, stopping early once `limit` items are held */
  collect(baseParams?: QueryParams, limit?: number): Promise<T[]>;
}

export const DEFAULT_MAX_PAGES = 500;

function cursorOf(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  if (typeof value === "string" && value !== "") return value;
  return undefined;
}

export function createPaginatedFetcher<T>(
  fetchPage: FetchPage<T>,
  { maxPages = DEFAULT_MAX_PAGES, logger = createNoopLogger() }: PaginatedFetcherOptions = {}
): PaginatedFetcher<T> {
  const log = logger.child({ component: "pagination" });

  async function* fetchAll(baseParams: QueryParams = {}): AsyncGenerator<T, void, undefined> {
    const params: QueryParams = { ...baseParams };
    const seen = new Set<string>();
    const initial = cursorOf(params.cursor);
    if (initial !== undefined) seen.add(initial);

    let pages = 0;
    for (;;) {
      const page = await fetchPage({ ...params });
      pages++;

      for (const item of page.items) {
        yield item;
      }

      const next = cursorOf(page.metadata?.nextCursor);
      if (next === undefined) return;

      if (seen.has(next)) {
        log.warn("Server repeated a pagination cursor, stopping", { cursor: next, pages });
        return;
      }
      if (pages >= maxPages) {
        log.warn("Page limit reached, stopping", { maxPages });
        return;
      }

      seen.add(next);
      params.cursor = next;
      log.debug("Fetching next page", { cursor: next, page: pages + 1 });
    }
  }

  async function collect(baseParams: QueryParams = {}, limit?: number): Promise<T[]> {
    const items: T[] = [];
    if (limit !== undefined && limit <= 0) return items;

    for await (const item of fetchAll(baseParams)) {
      items.push(item);
      if (limit !== undefined && items.length >= limit) break;
    }
    return items;
  }

  return { fetchAll, collect };
}
