/**
 * Error codes for every error the CLI and the download core can raise.
 * Each code maps to a specific scenario with predefined messaging.
 */
export type ErrorCode =
  // Authentication errors
  | "AUTH_NOT_AUTHENTICATED"
  | "AUTH_INVALID_KEY"
  // API errors
  | "API_NOT_FOUND"
  | "API_RATE_LIMITED"
  | "API_SERVER_ERROR"
  | "API_REQUEST_FAILED"
  | "API_INVALID_RESPONSE"
  // Transfer errors
  | "NETWORK_ERROR"
  | "NETWORK_TIMEOUT"
  | "FILESYSTEM_ERROR"
  | "TRANSFER_INCOMPLETE"
  | "HASH_MISMATCH"
  // Validation errors
  | "VALIDATION_INVALID_ARGUMENT"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  docs?: string;
  details?: string;
  cause?: unknown;
}

/**
 * Base error carrying a stable code plus the context the renderer shows.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly docs?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.example = options.example;
    this.examples = options.examples;
    this.docs = options.docs;
    this.details = options.details;
  }
}

// ---------------------------------------------------------------------------
// API layer
// ---------------------------------------------------------------------------

export interface APIErrorOptions extends CLIErrorOptions {
  status?: number;
  url?: string;
}

/** Any failed call to the catalog service: status >= 400 or transport failure. */
export class APIError extends CLIError {
  readonly status?: number;
  readonly url?: string;

  constructor(code: ErrorCode, message: string, options: APIErrorOptions = {}) {
    super(code, message, options);
    this.name = "APIError";
    this.status = options.status;
    this.url = options.url;
  }
}

export class ResourceNotFoundError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super("API_NOT_FOUND", message, { status: 404, ...options });
    this.name = "ResourceNotFoundError";
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super("AUTH_INVALID_KEY", message, { status: 401, ...options });
    this.name = "AuthenticationError";
  }
}

export class RateLimitError extends APIError {
  /** Number of 429 responses received before giving up */
  readonly attempts: number;

  constructor(message: string, attempts: number, options: APIErrorOptions = {}) {
    super("API_RATE_LIMITED", message, { status: 429, ...options });
    this.name = "RateLimitError";
    this.attempts = attempts;
  }
}

// ---------------------------------------------------------------------------
// Transfer layer
// ---------------------------------------------------------------------------

/** Connection reset, DNS failure, timeout or a stream that broke mid-read. Retryable. */
export class NetworkError extends CLIError {
  readonly timedOut: boolean;

  constructor(message: string, options: CLIErrorOptions & { timedOut?: boolean } = {}) {
    super(options.timedOut ? "NETWORK_TIMEOUT" : "NETWORK_ERROR", message, options);
    this.name = "NetworkError";
    this.timedOut = options.timedOut ?? false;
  }
}

/** Permission denied, disk full and friends. Never retried. */
export class FilesystemError extends CLIError {
  readonly path: string;
  readonly systemCode?: string;

  constructor(
    message: string,
    path: string,
    options: CLIErrorOptions & { systemCode?: string } = {}
  ) {
    super("FILESYSTEM_ERROR", message, options);
    this.name = "FilesystemError";
    this.path = path;
    this.systemCode = options.systemCode;
  }
}

/** The stream ended cleanly before the declared size was reached. */
export class IncompleteTransferError extends CLIError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number, options: CLIErrorOptions = {}) {
    super(
      "TRANSFER_INCOMPLETE",
      `Transfer ended at ${received} of ${expected} bytes`,
      options
    );
    this.name = "IncompleteTransferError";
    this.expected = expected;
    this.received = received;
  }
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Whether a failed transfer attempt is worth repeating.
 * Server errors and anything the transport could not deliver are; client errors are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof IncompleteTransferError) return true;
  if (error instanceof RateLimitError) return true;
  if (error instanceof APIError) {
    if (error.status === undefined) return error.cause instanceof NetworkError;
    return error.status >= 500;
  }
  return false;
}

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
