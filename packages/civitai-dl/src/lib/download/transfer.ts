import { mkdir, open, rm, stat, type FileHandle } from "fs/promises";
import { join } from "path";
import type { ApiClient } from "../api-client.js";
import type { Clock } from "../ports/clock.js";
import type { TransportHeaders, TransportResponse } from "../ports/transport.js";
import type { Logger } from "../logger.js";
import { APIError, CLIError, IncompleteTransferError, errorMessage } from "../errors/types.js";
import { filesystemFailure, networkFailure, systemErrorCode } from "../errors/catalog.js";
import { resolveFilename } from "./filename.js";
import { createProgressTracker, type ProgressTracker } from "./progress.js";
import type { DownloadTask } from "./task.js";

export interface TransferOptions {
  /** Live task; its progress fields are updated in place */
  task: DownloadTask;
  client: Pick<ApiClient, "request" | "head">;
  clock: Clock;
  /** Aborted on pause or cancel */
  signal: AbortSignal;
  chunkSize: number;
  progressIntervalMs?: number;
  logger: Logger;
  /** Progress fields changed */
  onProgress: () => void;
  /** The client retried a throttled request */
  onRateLimitRetry: () => void;
}

export type TransferOutcome = "completed" | "aborted";

// ---------------------------------------------------------------------------
// File helpers
// ---------------------------------------------------------------------------

async function fsCall<T>(path: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (err) {
    throw filesystemFailure(path, err);
  }
}

/** Size of the file at `path`, 0 when there is none */
export async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (systemErrorCode(err) === "ENOENT") return 0;
    throw filesystemFailure(path, err);
  }
}

function parseLength(value: string | null): number | undefined {
  if (value === null || !/^\s*\d+\s*$/.test(value)) return undefined;
  return Number(value);
}

/**
 * Full size of the resource: the `Content-Range` total when present,
 * otherwise `Content-Length` plus the bytes already on disk. 0 when unknown.
 */
export function totalFromHeaders(headers: TransportHeaders, offset: number): number {
  const range = /\/(\d+)\s*$/.exec(headers.get("content-range") ?? "");
  if (range) return Number(range[1]);
  const length = parseLength(headers.get("content-length"));
  return length === undefined ? 0 : length + offset;
}

// ---------------------------------------------------------------------------
// Transfer
// ---------------------------------------------------------------------------

/**
 * One attempt at fetching `task.url` into `task.outputPath`, resuming from
 * whatever is already on disk. Resolves "aborted" when the signal fired;
 * throws the APIError, NetworkError, FilesystemError or
 * IncompleteTransferError that ended the attempt otherwise.
 */
export async function runTransfer(options: TransferOptions): Promise<TransferOutcome> {
  const { task, client, signal, logger } = options;

  await fsCall(task.outputPath, () => mkdir(task.outputPath, { recursive: true }));

  let filePath =
    task.filePath ??
    (task.filename !== undefined
      ? join(task.outputPath, resolveFilename({ explicit: task.filename, url: task.url }))
      : undefined);
  let restarted = false;

  for (;;) {
    if (signal.aborted) return "aborted";

    const offset = filePath !== undefined ? await fileSize(filePath) : 0;
    const headers: Record<string, string> = { ...task.headers };
    if (offset > 0) headers.Range = `bytes=${offset}-`;

    // Per-request controller, so a fresh response can be dropped without touching the task
    const attempt = new AbortController();
    const forwardAbort = () => attempt.abort();
    signal.addEventListener("abort", forwardAbort, { once: true });

    try {
      let response: TransportResponse;
      try {
        response = await client.request("GET", task.url, {
          headers,
          signal: attempt.signal,
          onRetry: options.onRateLimitRetry,
        });
      } catch (err) {
        if (filePath === undefined || offset === 0 || !(err instanceof APIError) || err.status !== 416) {
          throw err;
        }
        const target = filePath;
        const remote = await remoteLength(options);
        if (remote !== undefined && offset >= remote) {
          task.filePath = target;
          task.downloadedSize = offset;
          task.totalSize = offset;
          options.onProgress();
          return "completed";
        }
        if (restarted) throw err;
        restarted = true;
        logger.warn("Server refused the resume offset, restarting from zero", {
          file: target,
          offset,
          remoteSize: remote,
        });
        await fsCall(target, () => rm(target, { force: true }));
        continue;
      }

      if (filePath === undefined) {
        const named = join(
          task.outputPath,
          resolveFilename({ contentDisposition: response.headers.get("content-disposition"), url: task.url })
        );
        filePath = named;
        if ((await fileSize(named)) > 0) {
          logger.info("Found a partial file, resuming it", { file: named });
          attempt.abort();
          continue;
        }
      }

      const resuming = response.status === 206 && offset > 0;
      return await writeBody(options, response, filePath, resuming ? offset : 0);
    } finally {
      signal.removeEventListener("abort", forwardAbort);
    }
  }
}

/** Length the server reports for the resource, if a HEAD request tells */
async function remoteLength(options: TransferOptions): Promise<number | undefined> {
  const { task, client, signal, logger } = options;
  try {
    const response = await client.head(task.url, {
      headers: { ...task.headers },
      signal,
      onRetry: options.onRateLimitRetry,
    });
    return parseLength(response.headers.get("content-length"));
  } catch (err) {
    if (err instanceof APIError && err.status !== undefined) {
      logger.debug("HEAD request failed", { url: task.url, status: err.status });
      return undefined;
    }
    throw err;
  }
}

async function writeBody(
  options: TransferOptions,
  response: TransportResponse,
  filePath: string,
  offset: number
): Promise<TransferOutcome> {
  const { task, signal } = options;

  task.filePath = filePath;
  task.downloadedSize = offset;
  task.totalSize = totalFromHeaders(response.headers, offset);
  options.onProgress();

  const tracker = createProgressTracker({
    clock: options.clock,
    intervalMs: options.progressIntervalMs,
    initialBytes: offset,
  });

  const handle = await fsCall(filePath, () => open(filePath, offset > 0 ? "a" : "w"));
  let aborted = false;
  try {
    aborted = await pump(options, response, handle, filePath, tracker);
  } finally {
    await fsCall(filePath, () => handle.close());
  }
  if (aborted) return "aborted";

  if (task.totalSize > 0 && task.downloadedSize < task.totalSize) {
    throw new IncompleteTransferError(task.totalSize, task.downloadedSize);
  }
  if (task.totalSize === 0) task.totalSize = task.downloadedSize;

  if (!signal.aborted) {
    const final = tracker.update(task.downloadedSize, task.totalSize, true);
    task.speed = final?.speed ?? 0;
    task.eta = final?.eta ?? null;
  }
  options.onProgress();
  return "completed";
}

/**
 * Copy the body to the file in `chunkSize` pieces, checking for abort
 * between writes. Returns true when stopped by the signal.
 */
async function pump(
  options: TransferOptions,
  response: TransportResponse,
  handle: FileHandle,
  filePath: string,
  tracker: ProgressTracker
): Promise<boolean> {
  const { task, signal, chunkSize } = options;
  if (!response.body) return signal.aborted;

  try {
    for await (const chunk of response.body) {
      for (let start = 0; start < chunk.length; start += chunkSize) {
        const piece = chunk.subarray(start, start + chunkSize);
        await fsCall(filePath, () => handle.write(piece));

        task.downloadedSize += piece.length;
        if (task.totalSize > 0 && task.downloadedSize > task.totalSize) {
          task.totalSize = task.downloadedSize;
        }
        if (signal.aborted) return true;

        const update = tracker.update(task.downloadedSize, task.totalSize);
        if (update) {
          task.speed = update.speed;
          task.eta = update.eta;
          options.onProgress();
        }
      }
    }
  } catch (err) {
    if (signal.aborted) return true;
    if (err instanceof CLIError) throw err;
    throw networkFailure(`Stream from ${task.url} interrupted: ${errorMessage(err)}`, err);
  }
  return signal.aborted;
}
