import { Command } from "commander";
import chalk from "chalk";
import { rm } from "fs/promises";
import { extname, join } from "path";
import type { ImageSearchParams } from "../lib/api-client.js";
import type { CatalogImage, Model, ModelFile, ModelVersion } from "../lib/catalog-schemas.js";
import { getExistingFileStrategy, type ExistingFileStrategy } from "../lib/cli-context.js";
import { CLIError } from "../lib/errors/types.js";
import { filesystemFailure, invalidArgument } from "../lib/errors/catalog.js";
import { expectedSha256, verifyFileHash } from "../lib/file-hash.js";
import {
  fileResultFromTask,
  maybeOutputJson,
  summarizeFiles,
  type DownloadResultJson,
  type FileResultJson,
} from "../lib/json-output.js";
import type { Logger } from "../lib/logger.js";
import { renderImagePath, renderModelPath } from "../lib/path-template.js";
import { parseCount, parseId, parseInteger } from "../lib/option-parsers.js";
import type { Services } from "../lib/services.js";
import { attachProgress, createSpinner, formatBytes, type Spinner } from "../lib/spinner.js";
import type { DownloadEngine, SubmitRequest } from "../lib/download/engine.js";
import { filenameFromUrl, resolveFilename } from "../lib/download/filename.js";
import { fileSize } from "../lib/download/transfer.js";

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export interface DownloadPlanItem {
  request: SubmitRequest;
  /** Catalog SHA-256 checked once the file is complete */
  sha256?: string;
}

/**
 * The requested version, or the newest one (the catalog lists newest first).
 */
export function selectVersion(model: Model, versionId?: number): ModelVersion {
  if (versionId !== undefined) {
    const match = model.modelVersions.find((v) => v.id === versionId);
    if (!match) {
      throw invalidArgument("version", `model ${model.id} has no version ${versionId}`);
    }
    return match;
  }
  const [latest] = model.modelVersions;
  if (!latest) {
    throw invalidArgument("model", `model ${model.id} has no downloadable versions`);
  }
  return latest;
}

export interface FileSelection {
  files: ModelFile[];
  /** A format was asked for and nothing matched it */
  formatMissing: boolean;
}

function matchesFormat(file: ModelFile, format: string): boolean {
  const wanted = format.toLowerCase().replace(/^\./, "");
  return (
    file.metadata?.format?.toLowerCase() === wanted ||
    file.name.toLowerCase().endsWith(`.${wanted}`)
  );
}

/**
 * Files to fetch from a version. Without `allFiles` this is one file:
 * the first matching `format`, else the primary file, else the first listed.
 */
export function selectFiles(
  version: ModelVersion,
  options: { format?: string; allFiles?: boolean } = {}
): FileSelection {
  if (version.files.length === 0) {
    throw invalidArgument("version", `version ${version.id} has no files`);
  }

  const { format } = options;
  const matching = format ? version.files.filter((f) => matchesFormat(f, format)) : version.files;
  const formatMissing = format !== undefined && matching.length === 0;
  const pool = formatMissing ? version.files : matching;

  if (options.allFiles) return { files: pool, formatMissing };

  const preferred = format && !formatMissing ? undefined : pool.find((f) => f.primary);
  const chosen = preferred ?? pool[0];
  return { files: chosen ? [chosen] : [], formatMissing };
}

export interface ModelPlanOptions {
  outputDir: string;
  pathTemplate: string;
  date?: Date;
}

export function planModelDownloads(
  model: Model,
  version: ModelVersion,
  files: readonly ModelFile[],
  options: ModelPlanOptions
): DownloadPlanItem[] {
  return files.map((file) => ({
    request: {
      url: file.downloadUrl,
      outputPath: join(options.outputDir, renderModelPath(options.pathTemplate, model, version, file, options.date)),
      filename: file.name,
    },
    sha256: expectedSha256(file),
  }));
}

export interface ImagePlanOptions {
  outputDir: string;
  imagePathTemplate: string;
  modelId?: number;
  versionId?: number;
  date?: Date;
}

/** `<image id><extension of the URL>`, `.jpeg` when the URL has none */
export function imageFilename(image: CatalogImage): string {
  const ext = extname(filenameFromUrl(image.url) ?? "");
  return `${image.id}${ext || ".jpeg"}`;
}

export function planImageDownloads(
  images: readonly CatalogImage[],
  options: ImagePlanOptions
): DownloadPlanItem[] {
  const context = { modelId: options.modelId, versionId: options.versionId };
  return images.map((image) => ({
    request: {
      url: image.url,
      outputPath: join(options.outputDir, renderImagePath(options.imagePathTemplate, image, context, options.date)),
      filename: imageFilename(image),
      // Images after the model files
      priority: 10,
    },
  }));
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export interface ExecuteOptions {
  engine: DownloadEngine;
  logger: Logger;
  verifyHashes: boolean;
  onExisting: ExistingFileStrategy;
  spinner?: Spinner;
}

/** Path the engine will write to, when the plan fixes the name */
function plannedPath(request: SubmitRequest): string | undefined {
  if (request.filename === undefined) return undefined;
  return join(request.outputPath, resolveFilename({ explicit: request.filename, url: request.url }));
}

async function verify(item: DownloadPlanItem, result: FileResultJson, logger: Logger): Promise<FileResultJson> {
  if (item.sha256 === undefined || result.status !== "completed" || result.path === undefined) return result;
  try {
    const actual = await verifyFileHash(result.path, item.sha256);
    return { ...result, sha256: actual, verified: true };
  } catch (err) {
    if (err instanceof CLIError && err.code === "HASH_MISMATCH") {
      logger.error("Checksum mismatch", { file: result.path, details: err.details });
      return { ...result, status: "failed", verified: false, error: `${err.message} (${err.details ?? ""})` };
    }
    throw err;
  }
}

/**
 * Run a plan on the engine and wait for every file.
 * Existing files are resumed, skipped or replaced according to `onExisting`.
 */
export async function executeDownloads(
  items: readonly DownloadPlanItem[],
  options: ExecuteOptions
): Promise<DownloadResultJson> {
  const { engine, logger } = options;
  const results = items.map((): FileResultJson | undefined => undefined);
  const queued: { index: number; item: DownloadPlanItem }[] = [];

  for (const [index, item] of items.entries()) {
    const path = plannedPath(item.request);
    const existing = path !== undefined ? await fileSize(path) : 0;
    if (path !== undefined && existing > 0) {
      if (options.onExisting === "skip") {
        logger.info("Skipping existing file", { file: path });
        results[index] = { url: item.request.url, path, status: "skipped", bytes: existing, retries: 0 };
        continue;
      }
      if (options.onExisting === "overwrite") {
        const target = path;
        await rm(target, { force: true }).catch((err: unknown) => {
          throw filesystemFailure(target, err);
        });
      }
    }
    queued.push({ index, item });
  }

  const detach = options.spinner ? attachProgress(engine, options.spinner) : undefined;
  try {
    const ids = engine.submitBatch(queued.map((q) => q.item.request));
    const snapshots = await Promise.all(ids.map((id) => engine.waitFor(id)));

    for (const [position, snapshot] of snapshots.entries()) {
      const entry = queued[position];
      if (!entry) continue;
      const result = fileResultFromTask(snapshot);
      results[entry.index] = options.verifyHashes ? await verify(entry.item, result, logger) : result;
    }
  } finally {
    detach?.();
  }

  return summarizeFiles(results.filter((r): r is FileResultJson => r !== undefined));
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function printResult(result: DownloadResultJson, spinner: Spinner): void {
  const { summary } = result;
  const line = `${summary.completed} downloaded, ${summary.skipped} skipped, ${summary.failed} failed (${formatBytes(summary.bytes)})`;
  if (summary.failed > 0 || summary.cancelled > 0) spinner.fail(line);
  else spinner.succeed(line);

  for (const file of result.files) {
    const where = file.path ?? file.url;
    switch (file.status) {
      case "completed":
        console.log(chalk.green(`  ✓ ${where}`) + (file.verified ? chalk.gray(" (sha256 ok)") : ""));
        break;
      case "skipped":
        console.log(chalk.gray(`  - ${where} (exists)`));
        break;
      case "cancelled":
        console.log(chalk.yellow(`  ○ ${where} (cancelled, partial file kept)`));
        break;
      default:
        console.log(chalk.red(`  ✗ ${where}: ${file.error ?? file.status}`));
    }
  }
}

async function runPlan(services: Services, items: DownloadPlanItem[], started: number): Promise<void> {
  const config = services.config();
  const spinner = createSpinner(`Downloading ${items.length} file(s)`).start();
  let result: DownloadResultJson;
  try {
    result = await executeDownloads(items, {
      engine: services.engine(),
      logger: services.logger(),
      verifyHashes: config.verifyHashes,
      onExisting: getExistingFileStrategy(),
      spinner,
    });
  } catch (err) {
    spinner.fail("Download failed");
    throw err;
  }

  if (!maybeOutputJson(result, { duration: Date.now() - started })) {
    printResult(result, spinner);
  }
  if (result.summary.failed > 0 || result.summary.cancelled > 0) {
    process.exitCode = 1;
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

interface UrlOptions {
  output?: string;
  filename?: string;
  priority?: number;
}

interface ModelOptions {
  versionId?: number;
  output?: string;
  format?: string;
  allFiles?: boolean;
  withImages?: boolean;
  imageLimit: number;
}

interface ImagesOptions {
  modelId?: number;
  versionId?: number;
  username?: string;
  nsfw?: boolean;
  limit: number;
  output?: string;
}

export function registerDownloadCommands(program: Command, services: Services): void {
  const download = program.command("download").description("Download models, images or plain files");

  download
    .command("url")
    .description("Download a single URL")
    .argument("<url>", "File URL")
    .option("-o, --output <dir>", "Output directory (default: download.outputDir)")
    .option("-f, --filename <name>", "File name to save as")
    .option("-p, --priority <n>", "Queue priority, lower runs first", parseInteger)
    .action(async (url: string, options: UrlOptions) => {
      const started = Date.now();
      const outputPath = options.output ?? services.config().outputDir;
      await runPlan(
        services,
        [{ request: { url, outputPath, filename: options.filename, priority: options.priority } }],
        started
      );
    });

  download
    .command("model")
    .description("Download a model version's files")
    .argument("<modelId>", "Model ID", parseId)
    .option("-v, --version-id <id>", "Version ID (default: latest)", parseId)
    .option("-o, --output <dir>", "Output directory (default: download.outputDir)")
    .option("-f, --format <format>", "Preferred file format, e.g. safetensors")
    .option("--all-files", "Download every file of the version")
    .option("--with-images", "Also download the version's example images")
    .option("--image-limit <n>", "Number of example images", parseCount, 5)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  civitai-dl download model 4201                     ${chalk.gray("Latest version, primary file")}
  civitai-dl download model 4201 --version-id 130072 -f safetensors
  civitai-dl download model 4201 --with-images --image-limit 10
`
    )
    .action(async (modelId: number, options: ModelOptions) => {
      const started = Date.now();
      const config = services.config();
      const client = services.client();
      const logger = services.logger();
      const outputDir = options.output ?? config.outputDir;

      const spinner = createSpinner(`Fetching model ${modelId}`).start();
      let items: DownloadPlanItem[];
      try {
        const model = await client.getModel(modelId);
        const version = selectVersion(model, options.versionId);
        const selection = selectFiles(version, { format: options.format, allFiles: options.allFiles });
        if (selection.formatMissing) {
          logger.warn("No file in the requested format, using the default file", {
            format: options.format,
            versionId: version.id,
          });
        }
        items = planModelDownloads(model, version, selection.files, {
          outputDir,
          pathTemplate: config.pathTemplate,
        });

        if (options.withImages && options.imageLimit > 0) {
          spinner.text = `Fetching example images for ${model.name}`;
          const images = await client.getAllImages(
            { modelId: model.id, modelVersionId: version.id },
            options.imageLimit
          );
          items.push(
            ...planImageDownloads(images, {
              outputDir,
              imagePathTemplate: config.imagePathTemplate,
              modelId: model.id,
              versionId: version.id,
            })
          );
        }
        spinner.succeed(`${model.name} / ${version.name}: ${items.length} file(s)`);
      } catch (err) {
        spinner.fail(`Could not prepare model ${modelId}`);
        throw err;
      }

      await runPlan(services, items, started);
    });

  download
    .command("images")
    .description("Download images from the catalog")
    .option("--model-id <id>", "Images of a model", parseId)
    .option("--version-id <id>", "Images of a model version", parseId)
    .option("--username <name>", "Images posted by a user")
    .option("--nsfw", "Include NSFW images")
    .option("-l, --limit <n>", "Maximum number of images", parseCount, 20)
    .option("-o, --output <dir>", "Output directory (default: download.outputDir)")
    .action(async (options: ImagesOptions) => {
      const started = Date.now();
      if (options.modelId === undefined && options.versionId === undefined && !options.username) {
        throw invalidArgument("filter", "pass --model-id, --version-id or --username");
      }
      const config = services.config();
      const params: ImageSearchParams = {
        modelId: options.modelId,
        modelVersionId: options.versionId,
        username: options.username,
        nsfw: options.nsfw ? true : undefined,
      };

      const spinner = createSpinner("Fetching image list").start();
      let images: CatalogImage[];
      try {
        images = await services.client().getAllImages(params, options.limit);
        spinner.succeed(`Found ${images.length} image(s)`);
      } catch (err) {
        spinner.fail("Could not list images");
        throw err;
      }

      const items = planImageDownloads(images, {
        outputDir: options.output ?? config.outputDir,
        imagePathTemplate: config.imagePathTemplate,
        modelId: options.modelId,
        versionId: options.versionId,
      });
      await runPlan(services, items, started);
    });
}
