import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { CLIError, errorMessage } from "./errors/types.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/civitai-dl/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "civitai-dl", "config.yaml");

export const DEFAULT_BASE_URL = "https://civitai.com/api/v1";

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  baseUrl: DEFAULT_BASE_URL,
  timeoutMs: 30000,
  minRequestIntervalMs: 1000,
  maxRequestIntervalMs: 60000,
  maxRateLimitRetries: 5,
  rateLimitPenaltyMs: 5000,
  outputDir: "./downloads",
  maxWorkers: 3,
  chunkSize: 8192,
  retryTimes: 3,
  retryDelayMs: 5000,
  pathTemplate: "{type}/{creator}/{name}",
  imagePathTemplate: "images/{model_id}",
  verifyHashes: true,
  maxPages: 500,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const ApiSchema = z.object({
  key: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(1000).max(600000).optional(),
  minRequestIntervalMs: z.number().int().min(0).max(60000).optional(),
  maxRequestIntervalMs: z.number().int().min(1000).max(3600000).optional(),
  maxRateLimitRetries: z.number().int().min(0).max(20).optional(),
  rateLimitPenaltyMs: z.number().int().min(0).max(300000).optional(),
});

const DownloadSchema = z.object({
  outputDir: z.string().min(1).optional(),
  maxWorkers: z.number().int().min(1).max(16).optional(),
  chunkSize: z.number().int().min(1024).max(16 * 1024 * 1024).optional(),
  retryTimes: z.number().int().min(0).max(10).optional(),
  retryDelayMs: z.number().int().min(0).max(300000).optional(),
  pathTemplate: z.string().min(1).optional(),
  imagePathTemplate: z.string().min(1).optional(),
  verifyHashes: z.boolean().optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  api: ApiSchema.optional(),
  download: DownloadSchema.optional(),
  pagination: z
    .object({
      maxPages: z.number().int().min(1).max(100000).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  minRequestIntervalMs: number;
  maxRequestIntervalMs: number;
  maxRateLimitRetries: number;
  rateLimitPenaltyMs: number;
  outputDir: string;
  maxWorkers: number;
  chunkSize: number;
  retryTimes: number;
  retryDelayMs: number;
  pathTemplate: string;
  imagePathTemplate: string;
  verifyHashes: boolean;
  maxPages: number;
  logLevel: "debug" | "info" | "warn" | "error";
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws VALIDATION_CONFIG_INVALID if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${errorMessage(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Flatten a config file into resolved-config keys, dropping unset values.
 */
export function flattenConfigFile(source: ConfigFile): Partial<ResolvedConfig> {
  return filterUndefined({
    apiKey: source.api?.key,
    baseUrl: source.api?.baseUrl,
    timeoutMs: source.api?.timeoutMs,
    minRequestIntervalMs: source.api?.minRequestIntervalMs,
    maxRequestIntervalMs: source.api?.maxRequestIntervalMs,
    maxRateLimitRetries: source.api?.maxRateLimitRetries,
    rateLimitPenaltyMs: source.api?.rateLimitPenaltyMs,
    outputDir: source.download?.outputDir,
    maxWorkers: source.download?.maxWorkers,
    chunkSize: source.download?.chunkSize,
    retryTimes: source.download?.retryTimes,
    retryDelayMs: source.download?.retryDelayMs,
    pathTemplate: source.download?.pathTemplate,
    imagePathTemplate: source.download?.imagePathTemplate,
    verifyHashes: source.download?.verifyHashes,
    maxPages: source.pagination?.maxPages,
    logLevel: source.logging?.level,
    logJson: source.logging?.json,
  });
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Values taken from the environment. Only the API key is read here;
 * the CIVITAI_DL_* switches belong to the CLI context.
 */
export function envConfig(env: NodeJS.ProcessEnv = process.env): Partial<ResolvedConfig> {
  const apiKey = env.CIVITAI_API_KEY?.trim();
  return apiKey ? { apiKey } : {};
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOptions: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    ...CONFIG_DEFAULTS,
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    Object.assign(config, flattenConfigFile(systemConfig));
  }

  if (userConfig) {
    Object.assign(config, flattenConfigFile(userConfig));
  }

  Object.assign(config, filterUndefined(envOptions));
  Object.assign(config, filterUndefined(cliOptions));

  if (config.maxRequestIntervalMs < config.minRequestIntervalMs) {
    throw new CLIError(
      "VALIDATION_CONFIG_INVALID",
      "api.maxRequestIntervalMs must not be below api.minRequestIntervalMs"
    );
  }

  return config;
}

/**
 * Path of the user config file: an explicit path, then CIVITAI_DL_CONFIG, then the XDG default.
 */
export function userConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return explicitPath ?? env.CIVITAI_DL_CONFIG ?? USER_CONFIG_PATH;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Optional path to a specific config file, used in place of the user file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  const systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
  if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

  const userPath = userConfigPath(explicitPath, env);
  const userConfig = loadConfigFile(userPath);
  if (userConfig) sources.push(userPath);

  const config = resolveConfig(cliOptions, userConfig, systemConfig, envConfig(env));

  return { config, sources };
}
