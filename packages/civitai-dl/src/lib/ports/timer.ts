/**
 * Abstraction for timer operations.
 * Allows injecting fake timers for testing.
 */
export interface TimerService {
  setInterval(fn: () => void, ms: number): NodeJS.Timeout;
  clearInterval(id: NodeJS.Timeout): void;
}

/**
 * Promise-based delay function type.
 * Used for rate-limit pacing and retry backoff.
 */
export type DelayFn = (ms: number) => Promise<void>;
