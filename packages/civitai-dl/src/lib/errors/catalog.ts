import {
  APIError,
  AuthenticationError,
  CLIError,
  FilesystemError,
  NetworkError,
  RateLimitError,
  ResourceNotFoundError,
} from "./types.js";

/**
 * Error catalog - factory functions for creating errors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

const DOCS_URL = "https://developer.civitai.com/docs/api/public-rest";

// ============================================================================
// Authentication Errors
// ============================================================================

export function notAuthenticated(): CLIError {
  return new CLIError("AUTH_NOT_AUTHENTICATED", "No API key is configured", {
    suggestion: "Store a key once, or pass it with CIVITAI_API_KEY",
    example: "civitai-dl auth login",
  });
}

export function invalidApiKey(url?: string): AuthenticationError {
  return new AuthenticationError("API authentication failed", {
    url,
    suggestion: "Check your API key and that it has the necessary permissions",
    example: "civitai-dl auth login",
  });
}

// ============================================================================
// API Errors
// ============================================================================

export function resourceNotFound(url: string): ResourceNotFoundError {
  return new ResourceNotFoundError(`Resource not found: ${url}`, {
    url,
    suggestion: "Check the ID or endpoint URL",
  });
}

export function rateLimited(attempts: number, url: string): RateLimitError {
  return new RateLimitError(`API rate limit exceeded after ${attempts} attempts`, attempts, {
    url,
    suggestion: "Wait a few minutes, or raise api.minRequestIntervalMs in your config",
  });
}

/**
 * Map a non-success HTTP status to the matching error class.
 * `detail` is the server's message, if the body carried one.
 */
export function errorForStatus(status: number, url: string, detail?: string): APIError {
  if (status === 404) return resourceNotFound(url);
  if (status === 401) return invalidApiKey(url);

  const message = detail ? `HTTP error ${status}: ${detail}` : `HTTP error ${status}`;

  if (status === 403) {
    return new APIError("API_REQUEST_FAILED", message, {
      status,
      url,
      suggestion: "You don't have permission to access this resource. Check your API key",
    });
  }

  if (status >= 500) {
    return new APIError("API_SERVER_ERROR", message, {
      status,
      url,
      suggestion: "The server encountered an error. Try again later",
      docs: DOCS_URL,
    });
  }

  return new APIError("API_REQUEST_FAILED", message, {
    status,
    url,
    suggestion: "Verify the API endpoint and parameters are correct",
    docs: DOCS_URL,
  });
}

export function transportFailed(url: string, cause: NetworkError): APIError {
  return new APIError("API_REQUEST_FAILED", `Unable to reach API server: ${cause.message}`, {
    url,
    cause,
    suggestion: cause.timedOut
      ? "Increase the timeout with --timeout, or try again later"
      : "Check your internet connection and proxy settings",
  });
}

export function invalidResponse(url: string, details?: string): APIError {
  return new APIError("API_INVALID_RESPONSE", "The API returned an unexpected response", {
    url,
    details,
    suggestion: "Make sure you're using the latest version of civitai-dl",
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function networkFailure(message: string, cause?: unknown, timedOut = false): NetworkError {
  return new NetworkError(message, {
    cause,
    timedOut,
    suggestion: timedOut
      ? "The server took too long to answer. Try again, or raise --timeout"
      : "Check your internet connection",
  });
}

/** File-system error codes that mean retrying cannot help. */
const FATAL_FS_CODES: Record<string, string> = {
  EACCES: "Permission denied",
  EPERM: "Operation not permitted",
  ENOSPC: "No space left on device",
  EROFS: "Read-only file system",
  EISDIR: "Target is a directory",
  ENOTDIR: "A parent path is not a directory",
  EDQUOT: "Disk quota exceeded",
};

export function filesystemFailure(path: string, cause: unknown): FilesystemError {
  const systemCode = systemErrorCode(cause);
  const reason =
    (systemCode && FATAL_FS_CODES[systemCode]) ??
    (cause instanceof Error ? cause.message : String(cause));
  return new FilesystemError(`Can't write "${path}": ${reason}`, path, {
    cause,
    systemCode,
    suggestion: "Check permissions and free space in the output directory",
  });
}

export function hashMismatch(path: string, expected: string, actual: string): CLIError {
  return new CLIError("HASH_MISMATCH", `Checksum mismatch for "${path}"`, {
    details: `expected ${expected.toLowerCase()}, got ${actual}`,
    suggestion: "Delete the file and download it again",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidArgument(name: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_ARGUMENT", `Invalid ${name}: ${reason}`);
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length ? `Choose from: ${validValues.join(", ")}` : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file has errors`, {
    details: `${path}\n${details ?? ""}`.trim(),
    suggestion: "Fix the listed fields, then check again",
    example: "civitai-dl config validate",
  });
}

// ============================================================================
// Generic
// ============================================================================

/**
 * Wrap anything thrown into a CLIError so the renderer has one shape to print.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, { cause: error });
}

/** `code` of a Node system error (`ENOENT`, `EACCES`...), if present. */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}
