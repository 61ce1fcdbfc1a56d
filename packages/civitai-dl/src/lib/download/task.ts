// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export const TaskStatus = {
  Pending: "pending",
  Downloading: "downloading",
  Paused: "paused",
  Completed: "completed",
  Failed: "failed",
  Cancelled: "cancelled",
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/**
 * Allowed moves out of each status. Anything not listed is rejected.
 * Paused goes back through Pending so a resumed task waits for a free worker.
 */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["downloading", "paused", "cancelled"],
  downloading: ["completed", "failed", "paused", "cancelled"],
  paused: ["pending", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

// ---------------------------------------------------------------------------
// Task
// ---------------------------------------------------------------------------

export interface DownloadTask {
  readonly id: string;
  readonly url: string;
  /** Directory the file is written into */
  readonly outputPath: string;
  /** Caller-chosen file name; wins over anything the server suggests */
  readonly filename?: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Lower runs sooner */
  readonly priority: number;
  status: TaskStatus;
  /** Full path of the file on disk, once the name is known */
  filePath?: string;
  downloadedSize: number;
  /** 0 while unknown */
  totalSize: number;
  /** Bytes per second over the latest sample */
  speed: number;
  /** Seconds left at the current speed; null while unknown */
  eta: number | null;
  retryCount: number;
  /** Set exactly when the task failed */
  error?: string;
  readonly createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

export type TaskSnapshot = Readonly<DownloadTask>;

export interface NewTask {
  id: string;
  url: string;
  outputPath: string;
  filename?: string;
  headers?: Record<string, string>;
  priority?: number;
}

export function createTask(input: NewTask, now: number): DownloadTask {
  return {
    id: input.id,
    url: input.url,
    outputPath: input.outputPath,
    filename: input.filename,
    headers: { ...input.headers },
    priority: input.priority ?? 0,
    status: TaskStatus.Pending,
    downloadedSize: 0,
    totalSize: 0,
    speed: 0,
    eta: null,
    retryCount: 0,
    createdAt: now,
  };
}

/**
 * Move `task` to `to`, stamping times and the failure message.
 * Throws on a move the table does not allow.
 */
export function transition(
  task: DownloadTask,
  to: TaskStatus,
  now: number,
  error?: string
): void {
  if (!canTransition(task.status, to)) {
    throw new Error(`Invalid task transition for ${task.id}: ${task.status} -> ${to}`);
  }

  task.status = to;
  if (to === TaskStatus.Downloading) {
    task.startedAt ??= now;
  }
  if (to !== TaskStatus.Downloading) {
    task.speed = 0;
    task.eta = null;
  }
  if (to === TaskStatus.Failed) {
    task.error = error ?? "Download failed";
  }
  if (isTerminal(to)) {
    task.completedAt = now;
  }
}

/** Frozen copy handed to observers */
export function snapshotTask(task: DownloadTask): TaskSnapshot {
  return Object.freeze({ ...task, headers: Object.freeze({ ...task.headers }) });
}
