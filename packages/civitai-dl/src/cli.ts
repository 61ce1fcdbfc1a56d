#!/usr/bin/env node
import { Command, Option } from "commander";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { createProcessSignalHandler } from "./lib/adapters/process-signals.js";
import { EXISTING_FILE_STRATEGIES, getContext, initContext } from "./lib/cli-context.js";
import { renderError } from "./lib/errors/renderer.js";
import { createServices } from "./lib/services.js";
import { logProgress } from "./lib/spinner.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerBrowseCommands } from "./modules/browse.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommands } from "./modules/download.js";

function packageVersion(): string {
  const path = join(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const version = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "version") : undefined;
  return typeof version === "string" ? version : "0.0.0";
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("civitai-dl")
    .description("Download models and images from Civitai")
    .version(packageVersion())
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress spinners and progress output")
    .option("-y, --yes", "Skip confirmation prompts")
    .option("--no-input", "Fail instead of prompting for input (CI mode)")
    .option("--timeout <ms>", "Request timeout in milliseconds")
    .option("--retry <n>", "Retry attempts for failed transfers")
    .option("--workers <n>", "Parallel transfers")
    .addOption(
      new Option("--on-existing <strategy>", "What to do with files already on disk")
        .choices(EXISTING_FILE_STRATEGIES)
        .default("resume")
    )
    .option("-c, --config <path>", "Config file to use instead of the user config");

  const services = createServices();
  const signals = createProcessSignalHandler();
  signals.onShutdown(async () => {
    logProgress("\nStopping downloads, partial files are kept for a later resume...");
    await services.shutdown(true);
  });

  registerDownloadCommands(program, services);
  registerBrowseCommands(program, services);
  registerAuthCommands(program, services);
  registerConfigCommands(program, () => getContext().configPath);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderError(error);
    process.exitCode = 1;
  } finally {
    await services.shutdown(false);
    signals.removeAll();
  }
}

void main();
