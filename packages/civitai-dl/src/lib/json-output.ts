/**
 * JSON output utilities for machine-readable CLI output.
 * Errors are printed by the error renderer; this module covers successful results.
 */

import { isJsonMode } from "./cli-context.js";
import type { TaskSnapshot } from "./download/task.js";
import type { ApiKeySource } from "./services.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export type FileResultStatus = "completed" | "failed" | "cancelled" | "skipped" | "paused";

export interface FileResultJson {
  url: string;
  path?: string;
  status: FileResultStatus;
  bytes: number;
  retries: number;
  sha256?: string;
  verified?: boolean;
  error?: string;
}

export interface DownloadResultJson {
  files: FileResultJson[];
  summary: {
    total: number;
    completed: number;
    failed: number;
    cancelled: number;
    skipped: number;
    bytes: number;
  };
}

export interface ModelSummaryJson {
  id: number;
  name: string;
  type: string;
  creator?: string;
  nsfw: boolean;
  downloads?: number;
  versions: Array<{ id: number; name: string; baseModel?: string }>;
}

export interface AuthStatusJson {
  authenticated: boolean;
  source?: ApiKeySource;
  verified?: boolean;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Builders
// ============================================================================

export function fileResultFromTask(task: TaskSnapshot): FileResultJson {
  const status: FileResultStatus =
    task.status === "completed" || task.status === "failed" || task.status === "cancelled" || task.status === "paused"
      ? task.status
      : "failed";
  return {
    url: task.url,
    ...(task.filePath !== undefined && { path: task.filePath }),
    status,
    bytes: task.downloadedSize,
    retries: task.retryCount,
    ...(task.error !== undefined && { error: task.error }),
  };
}

export function summarizeFiles(files: FileResultJson[]): DownloadResultJson {
  const count = (status: FileResultStatus) => files.filter((f) => f.status === status).length;
  return {
    files,
    summary: {
      total: files.length,
      completed: count("completed"),
      failed: count("failed"),
      cancelled: count("cancelled"),
      skipped: count("skipped"),
      bytes: files.reduce((sum, f) => sum + (f.status === "completed" ? f.bytes : 0), 0),
    },
  };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
