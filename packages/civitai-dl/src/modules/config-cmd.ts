import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  userConfigPath,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { errorMessage } from "../lib/errors/types.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# civitai-dl configuration
# Place at ~/.config/civitai-dl/config.yaml (user) or /etc/civitai-dl/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags (--timeout, --retry, --workers)
# 2. Environment (CIVITAI_API_KEY)
# 3. User config (~/.config/civitai-dl/config.yaml, or $CIVITAI_DL_CONFIG)
# 4. System config (/etc/civitai-dl/config.yaml)
# 5. Built-in defaults

api:
  # API key; prefer 'civitai-dl auth login' or CIVITAI_API_KEY over storing it here
  # key: "..."

  # baseUrl: "https://civitai.com/api/v1"

  # Per-request timeout (ms)
  timeoutMs: 30000

  # Minimum spacing between requests (ms); doubled on every 429 response
  minRequestIntervalMs: 1000

  # Upper bound for the spacing after repeated 429 responses (ms)
  maxRequestIntervalMs: 60000

  # 429 retries per request before giving up
  maxRateLimitRetries: 5

  # Pause for all requests after a 429 (ms)
  rateLimitPenaltyMs: 5000

download:
  outputDir: "./downloads"

  # Parallel transfers (1-16)
  maxWorkers: 3

  # Bytes written per chunk
  chunkSize: 8192

  # Retries for transient failures, with exponential backoff from retryDelayMs
  retryTimes: 3
  retryDelayMs: 5000

  # Variables: {type} {creator} {name} {id} {nsfw} {version_name} {version_id}
  # {base_model} {file_name} {file_format} {format} {year} {month} {day} {date}
  pathTemplate: "{type}/{creator}/{name}"

  # Variables: {model_id} {version_id} {image_id} {post_id} {username} {nsfw} and the date fields
  imagePathTemplate: "images/{model_id}"

  # Compare finished model files with the catalog's SHA-256
  verifyHashes: true

pagination:
  # Stop following cursors after this many pages
  maxPages: 500

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs
  json: false
`;

/** Effective settings for display, with the API key masked */
export function displayConfig(config: ResolvedConfig): Record<string, unknown> {
  return { ...config, apiKey: config.apiKey ? "[redacted]" : undefined };
}

function printSection(title: string, entries: [string, unknown][]): void {
  console.log();
  console.log(chalk.bold(`${title}:`));
  for (const [key, value] of entries) {
    console.log(`  ${`${key}:`.padEnd(22)}${String(value)}`);
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

/**
 * @param explicitPath - the global --config value, read when a command runs
 */
export function registerConfigCommands(
  program: Command,
  explicitPath: () => string | undefined = () => undefined
): void {
  const config = program
    .command("config")
    .description("Manage civitai-dl configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : userConfigPath(explicitPath());

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .action(() => {
      const given = explicitPath();
      const pathsToCheck = given ? [given] : [SYSTEM_CONFIG_PATH, userConfigPath()];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (given) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${errorMessage(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !given) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'civitai-dl config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action(() => {
      let resolved: ResolvedConfig;
      let sources: string[];
      try {
        ({ config: resolved, sources } = loadConfig(explicitPath()));
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${errorMessage(error)}`));
        process.exitCode = 1;
        return;
      }

      if (maybeOutputJson<ConfigShowJson>({ effective: displayConfig(resolved), sources })) return;

      console.log(chalk.cyan("Effective Configuration:"));
      console.log(chalk.gray("─".repeat(40)));
      console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));

      printSection("API", [
        ["key", resolved.apiKey ? "[redacted]" : "(not set)"],
        ["baseUrl", resolved.baseUrl],
        ["timeoutMs", resolved.timeoutMs],
        ["minRequestIntervalMs", resolved.minRequestIntervalMs],
        ["maxRequestIntervalMs", resolved.maxRequestIntervalMs],
        ["maxRateLimitRetries", resolved.maxRateLimitRetries],
        ["rateLimitPenaltyMs", resolved.rateLimitPenaltyMs],
      ]);
      printSection("Download", [
        ["outputDir", resolved.outputDir],
        ["maxWorkers", resolved.maxWorkers],
        ["chunkSize", resolved.chunkSize],
        ["retryTimes", resolved.retryTimes],
        ["retryDelayMs", resolved.retryDelayMs],
        ["pathTemplate", resolved.pathTemplate],
        ["imagePathTemplate", resolved.imagePathTemplate],
        ["verifyHashes", resolved.verifyHashes],
      ]);
      printSection("Pagination", [["maxPages", resolved.maxPages]]);
      printSection("Logging", [
        ["level", resolved.logLevel],
        ["json", resolved.logJson],
      ]);
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      const userPath = userConfigPath(explicitPath());
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${userPath}`);
      console.log(`  ${existsSync(userPath) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
