export { createDownloadEngine } from "./engine.js";
export type { DownloadEngine, DownloadEngineOptions, SubmitRequest } from "./engine.js";
export { TaskStatus, canTransition, isTerminal } from "./task.js";
export type { TaskSnapshot } from "./task.js";
export { createTaskQueue } from "./task-queue.js";
export type { TaskQueue } from "./task-queue.js";
export { aggregateStats, createProgressTracker } from "./progress.js";
export type { EngineStats, ProgressSample, TaskCallback } from "./progress.js";
export { fallbackFilename, parseContentDisposition, resolveFilename, sanitizeFilename } from "./filename.js";
