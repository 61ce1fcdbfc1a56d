import { createApiClient, ConfKeyStore, type ApiClient, type KeyStore } from "./api-client.js";
import { envConfig, loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger, type LogLevel } from "./logger.js";
import { getContext, isJsonMode, isQuietMode } from "./cli-context.js";
import type { Transport } from "./ports/transport.js";
import { createDownloadEngine, type DownloadEngine } from "./download/engine.js";

export type ApiKeySource = "env" | "config" | "store";

export interface ResolvedApiKey {
  key: string;
  source: ApiKeySource;
}

/**
 * Shared objects for command handlers, built on first use so that
 * `--help` or `config path` never touch the config files.
 */
export interface Services {
  config(): ResolvedConfig;
  logger(): Logger;
  keyStore(): KeyStore;
  apiKey(): ResolvedApiKey | undefined;
  client(): ApiClient;
  engine(): DownloadEngine;
  /** Stop the engine if one was started */
  shutdown(wait?: boolean): Promise<void>;
}

export interface ServiceOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  transport?: Transport;
  keyStore?: KeyStore;
  logger?: Logger;
}

/**
 * Where the API key comes from: environment, then config files, then the key store.
 */
export function resolveApiKey(
  config: Pick<ResolvedConfig, "apiKey">,
  env: NodeJS.ProcessEnv,
  store: KeyStore
): ResolvedApiKey | undefined {
  const fromEnv = envConfig(env).apiKey;
  if (fromEnv) return { key: fromEnv, source: "env" };
  if (config.apiKey) return { key: config.apiKey, source: "config" };
  const stored = store.getApiKey();
  return stored ? { key: stored, source: "store" } : undefined;
}

/** In JSON and quiet mode only warnings and errors are logged */
export function effectiveLogLevel(configured: LogLevel): LogLevel {
  if ((isJsonMode() || isQuietMode()) && (configured === "debug" || configured === "info")) {
    return "warn";
  }
  return configured;
}

export function createServices(options: ServiceOptions = {}): Services {
  const env = options.env ?? process.env;
  let loaded: { config: ResolvedConfig; sources: string[] } | undefined;
  let logger = options.logger;
  let keyStore = options.keyStore;
  let client: ApiClient | undefined;
  let engine: DownloadEngine | undefined;

  function load() {
    if (!loaded) {
      const context = getContext();
      loaded = loadConfig(
        options.configPath ?? context.configPath,
        {
          timeoutMs: context.timeout,
          retryTimes: context.retry,
          maxWorkers: context.workers,
        },
        env
      );
    }
    return loaded;
  }

  const services: Services = {
    config: () => load().config,

    logger() {
      if (!logger) {
        const config = load().config;
        logger = createLogger({ level: effectiveLogLevel(config.logLevel), json: config.logJson });
      }
      return logger;
    },

    keyStore() {
      keyStore ??= new ConfKeyStore();
      return keyStore;
    },

    apiKey: () => resolveApiKey(load().config, env, services.keyStore()),

    client() {
      if (!client) {
        const config = load().config;
        client = createApiClient({
          baseUrl: config.baseUrl,
          apiKey: services.apiKey()?.key,
          transport: options.transport,
          logger: services.logger(),
          minRequestIntervalMs: config.minRequestIntervalMs,
          maxRequestIntervalMs: config.maxRequestIntervalMs,
          maxRateLimitRetries: config.maxRateLimitRetries,
          rateLimitPenaltyMs: config.rateLimitPenaltyMs,
          timeoutMs: config.timeoutMs,
          maxPages: config.maxPages,
        });
      }
      return client;
    },

    engine() {
      if (!engine) {
        const config = load().config;
        engine = createDownloadEngine({
          client: services.client(),
          maxWorkers: config.maxWorkers,
          chunkSize: config.chunkSize,
          retryTimes: config.retryTimes,
          retryDelayMs: config.retryDelayMs,
          logger: services.logger(),
        });
      }
      return engine;
    },

    async shutdown(wait = true) {
      if (engine) await engine.shutdown(wait);
    },
  };

  return services;
}
