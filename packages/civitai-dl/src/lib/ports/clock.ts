/**
 * Time source for task timestamps, rate-limit pacing and speed sampling.
 * Tests inject a manual clock.
 */
export interface Clock {
  /** Wall-clock milliseconds since the epoch (task timestamps) */
  now(): number;
  /** Monotonic milliseconds (intervals and throughput); never jumps backwards */
  monotonic(): number;
}
