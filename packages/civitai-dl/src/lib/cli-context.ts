/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

/** What to do when the target file already exists on disk */
export type ExistingFileStrategy = "resume" | "skip" | "overwrite";

export const EXISTING_FILE_STRATEGIES: readonly ExistingFileStrategy[] = [
  "resume",
  "skip",
  "overwrite",
];

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Skip confirmation prompts (auto-yes) */
  yes: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
  /** Request timeout in milliseconds; undefined keeps the configured value */
  timeout?: number;
  /** Transfer retry attempts; undefined keeps the configured value */
  retry?: number;
  /** Parallel transfers; undefined keeps the configured value */
  workers?: number;
  onExisting: ExistingFileStrategy;
  /** Config file used in place of the user config */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
  onExisting: "resume",
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function parseIntAtLeast(value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed >= min ? parsed : undefined;
}

function flagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.findIndex((arg) => arg === flag);
  if (idx !== -1) return argv[idx + 1];
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  return inline?.slice(flag.length + 1);
}

function isExistingFileStrategy(value: string | undefined): value is ExistingFileStrategy {
  return EXISTING_FILE_STRATEGIES.some((s) => s === value);
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y")) {
    currentContext.yes = true;
  }

  if (argv.includes("--no-input")) {
    currentContext.noInput = true;
    currentContext.yes = true; // No input implies auto-yes
  }

  currentContext.timeout = parseIntAtLeast(flagValue(argv, "--timeout"), 1);
  currentContext.retry = parseIntAtLeast(flagValue(argv, "--retry"), 0);
  currentContext.workers = parseIntAtLeast(flagValue(argv, "--workers"), 1);

  currentContext.configPath = flagValue(argv, "--config") ?? flagValue(argv, "-c");

  const onExisting = flagValue(argv, "--on-existing");
  if (isExistingFileStrategy(onExisting)) {
    currentContext.onExisting = onExisting;
  }

  // Environment variable overrides
  if (isTruthyEnv(env.CIVITAI_DL_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthyEnv(env.CIVITAI_DL_QUIET)) {
    currentContext.quiet = true;
  }

  if (isTruthyEnv(env.CIVITAI_DL_YES)) {
    currentContext.yes = true;
  }

  if (env.CI || isTruthyEnv(env.CIVITAI_DL_NO_INPUT)) {
    currentContext.noInput = true;
    currentContext.yes = true;
  }

  currentContext.timeout ??= parseIntAtLeast(env.CIVITAI_DL_TIMEOUT, 1);
  currentContext.retry ??= parseIntAtLeast(env.CIVITAI_DL_RETRY, 0);
  currentContext.workers ??= parseIntAtLeast(env.CIVITAI_DL_WORKERS, 1);

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

export function shouldAutoConfirm(): boolean {
  return currentContext.yes;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdout.isTTY;
}

export function getExistingFileStrategy(): ExistingFileStrategy {
  return currentContext.onExisting;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
