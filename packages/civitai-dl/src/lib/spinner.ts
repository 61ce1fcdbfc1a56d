import ora from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import type { DownloadEngine } from "./download/engine.js";
import type { EngineStats } from "./download/progress.js";

/** The part of ora the commands drive */
export interface Spinner {
  text: string;
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
}

/** Stands in for ora when stdout belongs to JSON output or the user asked for quiet. */
export class SilentSpinner implements Spinner {
  text = "";

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(text?: string): Spinner {
    return this.start(text);
  }

  fail(text?: string): Spinner {
    return this.start(text);
  }
}

/**
 * Spinner on stderr. stdin is left alone so Ctrl-C reaches the
 * shutdown handler that stops the engine.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return ora({ text, discardStdin: false });
}

/** Status line for stderr, dropped in JSON mode */
export function logProgress(message: string): void {
  if (!isJsonMode()) {
    console.error(message);
  }
}

// ---------------------------------------------------------------------------
// Download progress
// ---------------------------------------------------------------------------

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/**
 * One-line summary, e.g. "2/5 files | 1.5 MB / 10.0 MB | 512.0 KB/s".
 */
export function progressText(stats: EngineStats): string {
  const finished = stats.completed + stats.failed + stats.cancelled;
  const parts = [`${finished}/${stats.total} files`];
  parts.push(
    stats.totalBytes > 0
      ? `${formatBytes(stats.downloadedBytes)} / ${formatBytes(stats.totalBytes)}`
      : formatBytes(stats.downloadedBytes)
  );
  if (stats.downloading > 0) parts.push(`${formatBytes(Math.round(stats.speed))}/s`);
  if (stats.failed > 0) parts.push(`${stats.failed} failed`);
  return parts.join(" | ");
}

/**
 * Keep the spinner text in step with the engine. Returns a detach function.
 */
export function attachProgress(
  engine: Pick<DownloadEngine, "registerProgressCallback" | "registerCompletionCallback" | "getStats">,
  spinner: Spinner
): () => void {
  const refresh = () => {
    spinner.text = progressText(engine.getStats());
  };
  const offProgress = engine.registerProgressCallback(refresh);
  const offCompletion = engine.registerCompletionCallback(refresh);
  return () => {
    offProgress();
    offCompletion();
  };
}
