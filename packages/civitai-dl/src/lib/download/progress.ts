import type { Clock } from "../ports/clock.js";
import type { Logger } from "../logger.js";
import { errorMessage } from "../errors/types.js";
import { TaskStatus, type TaskSnapshot } from "./task.js";

// ---------------------------------------------------------------------------
// Throughput sampling
// ---------------------------------------------------------------------------

export const DEFAULT_PROGRESS_INTERVAL_MS = 500;
const DEFAULT_ALPHA = 0.3;

export interface ProgressSample {
  /** Bytes per second, exponentially smoothed */
  speed: number;
  /** Seconds left, or null while the total or the speed is unknown */
  eta: number | null;
}

export interface ProgressTracker {
  /**
   * Feed the current byte counts. Returns a sample at most once per interval,
   * or immediately when `force` is set; undefined otherwise.
   */
  update(downloaded: number, total: number, force?: boolean): ProgressSample | undefined;
}

export interface ProgressTrackerOptions {
  clock: Clock;
  intervalMs?: number;
  /** EMA weight of the newest sample */
  alpha?: number;
  /** Bytes already on disk when the attempt started */
  initialBytes?: number;
}

export function createProgressTracker(options: ProgressTrackerOptions): ProgressTracker {
  const { clock } = options;
  const intervalMs = options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  const alpha = options.alpha ?? DEFAULT_ALPHA;

  let lastTime = clock.monotonic();
  let lastBytes = options.initialBytes ?? 0;
  let speed: number | undefined;

  return {
    update(downloaded, total, force = false) {
      const now = clock.monotonic();
      const elapsed = now - lastTime;
      if (!force && elapsed < intervalMs) return undefined;

      if (elapsed > 0) {
        const instant = (Math.max(0, downloaded - lastBytes) * 1000) / elapsed;
        speed = speed === undefined ? instant : alpha * instant + (1 - alpha) * speed;
        lastTime = now;
        lastBytes = downloaded;
      }

      const current = speed ?? 0;
      let eta: number | null = null;
      if (total > 0) {
        const remaining = Math.max(0, total - downloaded);
        if (remaining === 0) eta = 0;
        else if (current > 0) eta = remaining / current;
      }
      return { speed: current, eta };
    },
  };
}

// ---------------------------------------------------------------------------
// Aggregate statistics
// ---------------------------------------------------------------------------

export interface EngineStats {
  total: number;
  pending: number;
  downloading: number;
  paused: number;
  completed: number;
  failed: number;
  cancelled: number;
  downloadedBytes: number;
  /** Sum of known totals; tasks with an unknown size add nothing */
  totalBytes: number;
  /** Combined speed of running transfers, bytes per second */
  speed: number;
}

export function aggregateStats(tasks: Iterable<TaskSnapshot>): EngineStats {
  const stats: EngineStats = {
    total: 0,
    pending: 0,
    downloading: 0,
    paused: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    downloadedBytes: 0,
    totalBytes: 0,
    speed: 0,
  };

  for (const task of tasks) {
    stats.total++;
    stats[task.status]++;
    stats.downloadedBytes += task.downloadedSize;
    stats.totalBytes += task.totalSize;
    if (task.status === TaskStatus.Downloading) stats.speed += task.speed;
  }
  return stats;
}

// ---------------------------------------------------------------------------
// Observer dispatch
// ---------------------------------------------------------------------------

export type TaskCallback = (task: TaskSnapshot) => void | Promise<void>;

type EventKind = "progress" | "completion";

export interface CallbackBus {
  /** Returns a function that unregisters the callback */
  onProgress(callback: TaskCallback): () => void;
  onCompletion(callback: TaskCallback): () => void;
  publish(kind: EventKind, task: TaskSnapshot): void;
  /** Resolves once every event published so far has been delivered */
  flush(): Promise<void>;
}

/**
 * Queue of task events delivered on a later turn of the event loop,
 * never from inside the code that published them.
 */
export function createCallbackBus(logger: Logger): CallbackBus {
  const listeners: Record<EventKind, Set<TaskCallback>> = {
    progress: new Set(),
    completion: new Set(),
  };
  let queue: { kind: EventKind; task: TaskSnapshot }[] = [];
  let scheduled = false;
  let waiters: (() => void)[] = [];

  function report(kind: EventKind, task: TaskSnapshot, err: unknown): void {
    logger.error("Task callback failed", { event: kind, taskId: task.id, error: errorMessage(err) });
  }

  function drain(): void {
    scheduled = false;
    const batch = queue;
    queue = [];

    for (const { kind, task } of batch) {
      for (const callback of [...listeners[kind]]) {
        try {
          const result = callback(task);
          if (result instanceof Promise) {
            result.catch((err: unknown) => report(kind, task, err));
          }
        } catch (err) {
          report(kind, task, err);
        }
      }
    }

    if (queue.length > 0) {
      schedule();
      return;
    }
    const done = waiters;
    waiters = [];
    for (const resolve of done) resolve();
  }

  function schedule(): void {
    if (scheduled) return;
    scheduled = true;
    setImmediate(drain);
  }

  function subscribe(kind: EventKind, callback: TaskCallback): () => void {
    listeners[kind].add(callback);
    return () => {
      listeners[kind].delete(callback);
    };
  }

  return {
    onProgress: (callback) => subscribe("progress", callback),
    onCompletion: (callback) => subscribe("completion", callback),

    publish(kind, task) {
      queue.push({ kind, task });
      schedule();
    },

    flush() {
      if (!scheduled && queue.length === 0) return Promise.resolve();
      return new Promise((resolve) => waiters.push(resolve));
    },
  };
}
