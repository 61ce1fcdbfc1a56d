import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { ApiClient } from "../lib/api-client.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { ModelPageSchema, type Model } from "../lib/catalog-schemas.js";
import { maybeOutputJson, type ModelSummaryJson } from "../lib/json-output.js";
import type { Logger } from "../lib/logger.js";
import { createPaginatedFetcher, type QueryParams } from "../lib/pagination.js";
import { parseId, parsePositive } from "../lib/option-parsers.js";
import type { Services } from "../lib/services.js";
import { createSpinner, formatBytes } from "../lib/spinner.js";

/** Largest page the catalog serves */
const MAX_PAGE_SIZE = 100;

export const MODEL_SORTS = ["Highest Rated", "Most Downloaded", "Newest"] as const;

export interface BrowseModelsOptions {
  query?: string;
  type?: string[];
  sort?: string;
  username?: string;
  nsfw?: boolean;
  limit: number;
}

// ---------------------------------------------------------------------------
// Data
// ---------------------------------------------------------------------------

export function modelSummary(model: Model): ModelSummaryJson {
  const creator = model.creator?.username;
  const downloads = model.stats?.downloadCount;
  return {
    id: model.id,
    name: model.name,
    type: model.type,
    ...(creator ? { creator } : {}),
    nsfw: model.nsfw ?? false,
    ...(downloads !== undefined ? { downloads } : {}),
    versions: model.modelVersions.map((v) => ({
      id: v.id,
      name: v.name,
      ...(v.baseModel ? { baseModel: v.baseModel } : {}),
    })),
  };
}

export function searchParams(options: BrowseModelsOptions): QueryParams {
  return {
    query: options.query,
    types: options.type?.length ? options.type : undefined,
    sort: options.sort,
    username: options.username,
    nsfw: options.nsfw ? true : undefined,
    limit: Math.min(options.limit, MAX_PAGE_SIZE),
  };
}

/**
 * Search the catalog, following cursors until `limit` models are held.
 */
export async function searchModels(
  client: Pick<ApiClient, "getJson">,
  options: BrowseModelsOptions,
  fetcherOptions: { maxPages?: number; logger?: Logger } = {}
): Promise<Model[]> {
  const fetcher = createPaginatedFetcher<Model>(
    (params) => client.getJson("models", params, ModelPageSchema),
    fetcherOptions
  );
  return fetcher.collect(searchParams(options), options.limit);
}

// ---------------------------------------------------------------------------
// Table rows
// ---------------------------------------------------------------------------

export function modelRow(model: Model): string[] {
  const latest = model.modelVersions[0];
  return [
    String(model.id),
    model.name,
    model.type,
    model.creator?.username ?? "-",
    model.stats?.downloadCount !== undefined ? model.stats.downloadCount.toLocaleString("en-US") : "-",
    latest ? latest.name : "-",
  ];
}

export function versionRows(model: Model): string[][] {
  return model.modelVersions.map((version) => {
    const sizeKB = version.files.reduce((sum, f) => sum + (f.sizeKB ?? 0), 0);
    return [
      String(version.id),
      version.name,
      version.baseModel ?? "-",
      String(version.files.length),
      sizeKB > 0 ? formatBytes(Math.round(sizeKB * 1024)) : "-",
    ];
  });
}

function printModels(models: Model[]): void {
  if (models.length === 0) {
    console.log(chalk.yellow("No models found."));
    return;
  }
  const table = new CliTable3({
    head: ["ID", "Name", "Type", "Creator", "Downloads", "Latest"].map((h) => chalk.cyan(h)),
  });
  for (const model of models) table.push(modelRow(model));
  console.log(table.toString());
}

function printModel(model: Model): void {
  console.log(chalk.bold(`${model.name}`) + chalk.gray(` (#${model.id}, ${model.type})`));
  if (model.creator?.username) console.log(chalk.gray(`by ${model.creator.username}`));

  const table = new CliTable3({
    head: ["Version ID", "Name", "Base model", "Files", "Size"].map((h) => chalk.cyan(h)),
  });
  for (const row of versionRows(model)) table.push(row);
  console.log(table.toString());
  console.log(chalk.gray(`\nDownload with: civitai-dl download model ${model.id} --version <id>`));
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

/** Accepts a sort order in any letter case and returns the catalog's spelling */
export function parseSort(value: string): string {
  const match = MODEL_SORTS.find((sort) => sort.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw invalidOption("sort", `"${value}" is not a known order`, [...MODEL_SORTS]);
  }
  return match;
}

function collectType(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerBrowseCommands(program: Command, services: Services): void {
  const browse = program.command("browse").description("Search and inspect the model catalog");

  browse
    .command("models")
    .description("Search models")
    .option("--query <text>", "Search text")
    .option("-t, --type <type>", "Model type, repeatable (Checkpoint, LORA, ...)", collectType)
    .option("-s, --sort <order>", `Sort order (${MODEL_SORTS.join(", ")})`, parseSort)
    .option("-u, --username <name>", "Creator username")
    .option("--nsfw", "Include NSFW models")
    .option("-l, --limit <n>", "Maximum number of results", parsePositive, 20)
    .action(async (options: BrowseModelsOptions) => {
      const started = Date.now();
      const config = services.config();
      const spinner = createSpinner("Searching models").start();
      let models: Model[];
      try {
        models = await searchModels(services.client(), options, {
          maxPages: config.maxPages,
          logger: services.logger(),
        });
        spinner.stop();
      } catch (err) {
        spinner.fail("Search failed");
        throw err;
      }

      if (!maybeOutputJson(models.map(modelSummary), { duration: Date.now() - started })) {
        printModels(models);
      }
    });

  browse
    .command("model")
    .description("Show a model and its versions")
    .argument("<modelId>", "Model ID", parseId)
    .action(async (modelId: number) => {
      const started = Date.now();
      const spinner = createSpinner(`Fetching model ${modelId}`).start();
      let model: Model;
      try {
        model = await services.client().getModel(modelId);
        spinner.stop();
      } catch (err) {
        spinner.fail(`Could not fetch model ${modelId}`);
        throw err;
      }

      if (!maybeOutputJson(modelSummary(model), { duration: Date.now() - started })) {
        printModel(model);
      }
    });
}
