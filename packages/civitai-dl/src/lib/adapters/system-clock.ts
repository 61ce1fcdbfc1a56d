import { performance } from "perf_hooks";
import type { Clock } from "../ports/clock.js";

/**
 * Real system clock.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => performance.now(),
};
