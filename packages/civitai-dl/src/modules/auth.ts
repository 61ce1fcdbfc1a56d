import { Command } from "commander";
import chalk from "chalk";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";
import { isNonInteractive, shouldAutoConfirm } from "../lib/cli-context.js";
import { notAuthenticated } from "../lib/errors/catalog.js";
import { CLIError } from "../lib/errors/types.js";
import { maybeOutputJson, type AuthStatusJson } from "../lib/json-output.js";
import type { PromptService } from "../lib/ports/prompt.js";
import type { Services } from "../lib/services.js";
import { createSpinner } from "../lib/spinner.js";

export interface LoginOptions {
  key?: string;
  nonInteractive?: boolean;
}

const KEY_PAGE = "https://civitai.com/user/account";

export function registerAuthCommands(
  program: Command,
  services: Services,
  prompts: PromptService = interactivePrompts
): void {
  const auth = program.command("auth").description("Manage the Civitai API key");

  auth
    .command("login")
    .description("Store an API key for future requests")
    .option("-k, --key <key>", "API key")
    .action(async (options: { key?: string }) => {
      const key = await resolveKey({ key: options.key, nonInteractive: isNonInteractive() }, prompts);
      services.keyStore().setApiKey(key);

      if (!maybeOutputJson<AuthStatusJson>({ authenticated: true, source: "store" })) {
        console.log(chalk.green("API key saved locally."));
        const active = services.apiKey();
        if (active && active.source !== "store") {
          console.log(chalk.yellow(`Note: the key from ${active.source} takes precedence over the stored one.`));
        }
      }
    });

  auth
    .command("logout")
    .description("Remove the locally stored API key")
    .action(async () => {
      const store = services.keyStore();
      if (store.getApiKey() && !shouldAutoConfirm() && !isNonInteractive()) {
        const confirmed = await prompts.confirm("Remove the stored API key?");
        if (!confirmed) {
          if (!maybeOutputJson({ loggedOut: false })) console.log(chalk.gray("Kept the stored API key."));
          return;
        }
      }

      store.clear();
      if (!maybeOutputJson({ loggedOut: true })) {
        console.log(chalk.green("Stored API key removed."));
      }
    });

  auth
    .command("status")
    .description("Show where the API key comes from")
    .option("--check", "Verify the key against the API")
    .action(async (options: { check?: boolean }) => {
      const active = services.apiKey();
      if (options.check && !active) throw notAuthenticated();
      const status: AuthStatusJson = active
        ? { authenticated: true, source: active.source }
        : { authenticated: false };

      if (active && options.check) {
        const spinner = createSpinner("Checking API key").start();
        try {
          await services.client().getModels({ limit: 1 });
          spinner.succeed("API key accepted");
          status.verified = true;
        } catch (err) {
          spinner.fail("API key check failed");
          throw err;
        }
      }

      if (maybeOutputJson(status)) return;
      if (!active) {
        console.log(chalk.yellow("No API key configured."));
        console.log(chalk.gray("Run 'civitai-dl auth login' or set CIVITAI_API_KEY."));
        return;
      }
      console.log(chalk.cyan(`API key from: ${active.source}`));
    });
}

export async function resolveKey(options: LoginOptions, prompts: PromptService): Promise<string> {
  const given = options.key?.trim();
  if (given) return given;
  if (options.nonInteractive) {
    throw new CLIError("VALIDATION_INVALID_ARGUMENT", "No API key supplied and interactive prompts are disabled", {
      suggestion: "Pass the key with --key",
      example: "civitai-dl auth login --key <key>",
    });
  }

  const key = await prompts.password(`Paste your Civitai API key (from ${KEY_PAGE})`);
  if (!key) {
    throw new CLIError("VALIDATION_INVALID_ARGUMENT", "An API key is required");
  }
  return key;
}
