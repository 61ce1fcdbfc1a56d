import { randomUUID } from "crypto";
import type { ApiClient } from "../api-client.js";
import type { Clock } from "../ports/clock.js";
import type { DelayFn, TimerService } from "../ports/timer.js";
import type { Logger } from "../logger.js";
import { createNoopLogger } from "../logger.js";
import { systemClock } from "../adapters/system-clock.js";
import { abortable, realDelay, realTimerService } from "../adapters/real-timers.js";
import { CONFIG_DEFAULTS } from "../config.js";
import { CLIError, IncompleteTransferError, errorMessage, isTransientError } from "../errors/types.js";
import { invalidArgument } from "../errors/catalog.js";
import { sanitizeFilename } from "./filename.js";
import {
  DEFAULT_PROGRESS_INTERVAL_MS,
  aggregateStats,
  createCallbackBus,
  type EngineStats,
  type TaskCallback,
} from "./progress.js";
import { createTaskQueue } from "./task-queue.js";
import {
  TaskStatus,
  createTask,
  isTerminal,
  snapshotTask,
  transition,
  type DownloadTask,
  type TaskSnapshot,
} from "./task.js";
import { runTransfer } from "./transfer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SubmitRequest {
  url: string;
  /** Directory to write into */
  outputPath: string;
  filename?: string;
  headers?: Record<string, string>;
  /** Lower runs sooner; defaults to 0 */
  priority?: number;
}

export interface DownloadEngineOptions {
  client: Pick<ApiClient, "request" | "head">;
  maxWorkers?: number;
  chunkSize?: number;
  retryTimes?: number;
  retryDelayMs?: number;
  progressIntervalMs?: number;
  /** Scheduler polling period */
  tickMs?: number;
  clock?: Clock;
  delay?: DelayFn;
  timers?: TimerService;
  logger?: Logger;
  idFactory?: () => string;
}

export interface DownloadEngine {
  /** Queue a transfer. Throws VALIDATION_INVALID_ARGUMENT for a bad request. */
  submit(request: SubmitRequest): string;
  /** Validates every request before queueing any; ids come back in order */
  submitBatch(requests: readonly SubmitRequest[]): string[];
  get(taskId: string): TaskSnapshot | undefined;
  list(): TaskSnapshot[];
  cancel(taskId: string): boolean;
  cancelAll(): number;
  pause(taskId: string): boolean;
  resume(taskId: string): boolean;
  registerProgressCallback(callback: TaskCallback): () => void;
  registerCompletionCallback(callback: TaskCallback): () => void;
  /** Resolves with the terminal snapshot, after completion callbacks ran */
  waitFor(taskId: string): Promise<TaskSnapshot>;
  /** Resolves once nothing is queued or running; paused tasks may remain */
  drain(): Promise<void>;
  getStats(): EngineStats;
  /** Cancel everything still live; with `wait`, also let workers exit */
  shutdown(wait?: boolean): Promise<void>;
}

interface Entry {
  task: DownloadTask;
  /** Set while a worker owns the task */
  controller?: AbortController;
  waiters: ((snapshot: TaskSnapshot) => void)[];
}

const DEFAULT_TICK_MS = 100;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateRequest(request: SubmitRequest): void {
  if (typeof request.url !== "string" || request.url.trim() === "") {
    throw invalidArgument("url", "must not be empty");
  }
  let protocol: string;
  try {
    protocol = new URL(request.url).protocol;
  } catch {
    throw invalidArgument("url", `"${request.url}" is not a valid URL`);
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw invalidArgument("url", `unsupported protocol "${protocol}"`);
  }
  if (typeof request.outputPath !== "string" || request.outputPath.trim() === "") {
    throw invalidArgument("output path", "must not be empty");
  }
  if (request.filename !== undefined && sanitizeFilename(request.filename) === "") {
    throw invalidArgument("filename", `"${request.filename}" is not a usable file name`);
  }
  if (request.priority !== undefined && !Number.isInteger(request.priority)) {
    throw invalidArgument("priority", "must be an integer");
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Bounded pool of resumable transfers fed from a priority queue.
 *
 * All registry and queue updates happen in synchronous sections; workers only
 * await network, disk and backoff. Callbacks are delivered through a bus on a
 * later turn of the event loop, with frozen snapshots.
 */
export function createDownloadEngine(options: DownloadEngineOptions): DownloadEngine {
  const {
    client,
    maxWorkers = CONFIG_DEFAULTS.maxWorkers,
    chunkSize = CONFIG_DEFAULTS.chunkSize,
    retryTimes = CONFIG_DEFAULTS.retryTimes,
    retryDelayMs = CONFIG_DEFAULTS.retryDelayMs,
    progressIntervalMs = DEFAULT_PROGRESS_INTERVAL_MS,
    tickMs = DEFAULT_TICK_MS,
    clock = systemClock,
    delay = realDelay,
    timers = realTimerService,
    logger = createNoopLogger(),
    idFactory = randomUUID,
  } = options;

  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw invalidArgument("maxWorkers", "must be a positive integer");
  }
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw invalidArgument("chunkSize", "must be a positive integer");
  }

  const log = logger.child({ component: "download-engine" });
  const bus = createCallbackBus(log);
  const entries = new Map<string, Entry>();
  const queue = createTaskQueue<DownloadTask>();
  const workers = new Set<Promise<void>>();
  let idleWaiters: (() => void)[] = [];
  let ticker: NodeJS.Timeout | undefined;
  let tickQueued = false;
  let closed = false;

  function publish(kind: "progress" | "completion", task: DownloadTask): void {
    bus.publish(kind, snapshotTask(task));
  }

  function settle(entry: Entry): void {
    const snapshot = snapshotTask(entry.task);
    bus.publish("completion", snapshot);
    const waiting = entry.waiters;
    entry.waiters = [];
    for (const resolve of waiting) resolve(snapshot);
  }

  function isIdle(): boolean {
    return workers.size === 0 && queue.size() === 0;
  }

  function checkIdle(): void {
    if (!isIdle()) return;
    const waiting = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiting) resolve();
  }

  // -------------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------------

  function tick(): void {
    tickQueued = false;
    if (closed) return;
    while (workers.size < maxWorkers) {
      const task = queue.next();
      if (!task) break;
      const entry = entries.get(task.id);
      if (!entry || task.status !== TaskStatus.Pending) continue;
      start(entry);
    }
  }

  /** Tick once the current synchronous section is over, so a burst of submits is ordered by priority */
  function scheduleTick(): void {
    if (tickQueued) return;
    tickQueued = true;
    queueMicrotask(tick);
  }

  function ensureTicker(): void {
    ticker ??= timers.setInterval(tick, tickMs);
  }

  function start(entry: Entry): void {
    const { task } = entry;
    transition(task, TaskStatus.Downloading, clock.now());
    const controller = new AbortController();
    entry.controller = controller;
    publish("progress", task);
    log.debug("Dispatching task", { taskId: task.id, priority: task.priority });

    const worker: Promise<void> = runWorker(entry, controller.signal)
      .catch((err: unknown) => {
        log.error("Worker stopped unexpectedly", { taskId: task.id, error: errorMessage(err) });
      })
      .finally(() => {
        workers.delete(worker);
        entry.controller = undefined;
        // Resumed while this worker was still winding down
        if (task.status === TaskStatus.Pending && !closed) queue.add(task);
        tick();
        checkIdle();
      });
    workers.add(worker);
  }

  // -------------------------------------------------------------------------
  // Worker
  // -------------------------------------------------------------------------

  function retryable(err: unknown, attempt: number, incompleteRetried: boolean): boolean {
    if (err instanceof IncompleteTransferError) return !incompleteRetried;
    return isTransientError(err) && attempt < retryTimes;
  }

  async function runWorker(entry: Entry, signal: AbortSignal): Promise<void> {
    const { task } = entry;
    const stillOwned = () => !signal.aborted && task.status === TaskStatus.Downloading;
    let attempt = 0;
    let incompleteRetried = false;

    for (;;) {
      try {
        const outcome = await runTransfer({
          task,
          client,
          clock,
          signal,
          chunkSize,
          progressIntervalMs,
          logger: log,
          onProgress: () => publish("progress", task),
          onRateLimitRetry: () => {
            task.retryCount++;
          },
        });
        if (outcome === "completed" && stillOwned()) {
          transition(task, TaskStatus.Completed, clock.now());
          log.info("Download complete", { taskId: task.id, file: task.filePath, bytes: task.downloadedSize });
          settle(entry);
        }
        return;
      } catch (err) {
        if (!stillOwned()) return;

        if (!retryable(err, attempt, incompleteRetried)) {
          const message = errorMessage(err);
          transition(task, TaskStatus.Failed, clock.now(), message);
          log.error("Download failed", {
            taskId: task.id,
            url: task.url,
            code: err instanceof CLIError ? err.code : undefined,
            error: message,
          });
          settle(entry);
          return;
        }

        if (err instanceof IncompleteTransferError) incompleteRetried = true;
        const wait = retryDelayMs * 2 ** attempt;
        attempt++;
        task.retryCount++;
        log.warn("Transfer interrupted, retrying", {
          taskId: task.id,
          attempt,
          delayMs: wait,
          error: errorMessage(err),
        });
        publish("progress", task);

        await abortable(delay(wait), signal);
        if (!stillOwned()) return;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  function enqueue(request: SubmitRequest): string {
    const task = createTask(
      {
        id: idFactory(),
        url: request.url,
        outputPath: request.outputPath,
        filename: request.filename,
        headers: request.headers,
        priority: request.priority,
      },
      clock.now()
    );
    entries.set(task.id, { task, waiters: [] });
    queue.add(task);
    log.debug("Task queued", { taskId: task.id, url: task.url, priority: task.priority });
    return task.id;
  }

  function ensureOpen(): void {
    if (closed) {
      throw new CLIError("VALIDATION_INVALID_ARGUMENT", "Download engine has been shut down");
    }
  }

  function cancel(taskId: string): boolean {
    const entry = entries.get(taskId);
    if (!entry || isTerminal(entry.task.status)) return false;
    const { task } = entry;

    queue.remove(task.id);
    transition(task, TaskStatus.Cancelled, clock.now());
    entry.controller?.abort();
    log.info("Download cancelled", { taskId: task.id, downloaded: task.downloadedSize });
    settle(entry);
    checkIdle();
    return true;
  }

  function cancelAll(): number {
    let count = 0;
    for (const id of [...entries.keys()]) {
      if (cancel(id)) count++;
    }
    return count;
  }

  return {
    submit(request) {
      ensureOpen();
      validateRequest(request);
      const id = enqueue(request);
      ensureTicker();
      scheduleTick();
      return id;
    },

    submitBatch(requests) {
      ensureOpen();
      requests.forEach(validateRequest);
      const ids = requests.map(enqueue);
      if (ids.length > 0) {
        ensureTicker();
        scheduleTick();
      }
      return ids;
    },

    get(taskId) {
      const entry = entries.get(taskId);
      return entry ? snapshotTask(entry.task) : undefined;
    },

    list() {
      return [...entries.values()].map((entry) => snapshotTask(entry.task));
    },

    cancel,
    cancelAll,

    pause(taskId) {
      const entry = entries.get(taskId);
      if (!entry) return false;
      const { task } = entry;
      if (task.status !== TaskStatus.Pending && task.status !== TaskStatus.Downloading) return false;

      queue.remove(task.id);
      transition(task, TaskStatus.Paused, clock.now());
      entry.controller?.abort();
      log.info("Download paused", { taskId: task.id, downloaded: task.downloadedSize });
      publish("progress", task);
      checkIdle();
      return true;
    },

    resume(taskId) {
      const entry = entries.get(taskId);
      if (closed || !entry || entry.task.status !== TaskStatus.Paused) return false;
      const { task } = entry;

      transition(task, TaskStatus.Pending, clock.now());
      // A worker still winding down re-queues the task itself when it exits
      if (!entry.controller) queue.add(task);
      log.info("Download resumed", { taskId: task.id, from: task.downloadedSize });
      publish("progress", task);
      scheduleTick();
      return true;
    },

    registerProgressCallback: (callback) => bus.onProgress(callback),
    registerCompletionCallback: (callback) => bus.onCompletion(callback),

    async waitFor(taskId) {
      const entry = entries.get(taskId);
      if (!entry) throw invalidArgument("task id", `no task "${taskId}"`);

      const snapshot = isTerminal(entry.task.status)
        ? snapshotTask(entry.task)
        : await new Promise<TaskSnapshot>((resolve) => entry.waiters.push(resolve));
      await bus.flush();
      return snapshot;
    },

    async drain() {
      if (!isIdle()) {
        await new Promise<void>((resolve) => idleWaiters.push(resolve));
      }
      await bus.flush();
    },

    getStats: () => aggregateStats([...entries.values()].map((entry) => entry.task)),

    async shutdown(wait = true) {
      if (!closed) {
        closed = true;
        if (ticker !== undefined) {
          timers.clearInterval(ticker);
          ticker = undefined;
        }
        const cancelled = cancelAll();
        log.info("Download engine shut down", { cancelled });
      }
      if (wait) {
        await Promise.all(workers);
        await bus.flush();
      }
    },
  };
}
