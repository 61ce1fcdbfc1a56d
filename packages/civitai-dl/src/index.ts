/**
 * Library entry point: the catalog client, the pagination helper and the
 * download engine. The `civitai-dl` executable lives in cli.ts.
 */

export { createApiClient, withQuery, ConfKeyStore } from "./lib/api-client.js";
export type {
  ApiClient,
  ApiClientOptions,
  ImageSearchParams,
  KeyStore,
  ModelSearchParams,
  RateLimiterState,
  RequestOptions,
} from "./lib/api-client.js";
export { createPaginatedFetcher, DEFAULT_MAX_PAGES } from "./lib/pagination.js";
export type { FetchPage, PaginatedFetcher, PaginatedFetcherOptions, QueryParams } from "./lib/pagination.js";
export type { CatalogImage, Model, ModelFile, ModelVersion, Page } from "./lib/catalog-schemas.js";

export * from "./lib/download/index.js";

export { computeFileHash, expectedSha256, verifyFileHash } from "./lib/file-hash.js";
export { renderTemplate, renderModelPath, renderImagePath } from "./lib/path-template.js";

export { CONFIG_DEFAULTS, loadConfig, resolveConfig } from "./lib/config.js";
export type { ResolvedConfig } from "./lib/config.js";
export { createLogger, createNoopLogger } from "./lib/logger.js";
export type { Logger, LogLevel } from "./lib/logger.js";

export {
  CLIError,
  APIError,
  AuthenticationError,
  FilesystemError,
  IncompleteTransferError,
  NetworkError,
  RateLimitError,
  ResourceNotFoundError,
  isCLIError,
  isTransientError,
} from "./lib/errors/types.js";
export type { ErrorCode } from "./lib/errors/types.js";

export { createFetchTransport } from "./lib/adapters/fetch-transport.js";
export type * from "./lib/ports/index.js";
