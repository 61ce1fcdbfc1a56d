import type { TimerService, DelayFn } from "../ports/timer.js";

/**
 * Real timer service. Intervals are unref'd so an idle engine never keeps
 * the process alive.
 */
export const realTimerService: TimerService = {
  setInterval: (fn, ms) => {
    const id = globalThis.setInterval(fn, ms);
    id.unref();
    return id;
  },
  clearInterval: (id) => globalThis.clearInterval(id),
};

/**
 * Real delay function using setTimeout.
 */
export const realDelay: DelayFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

/** Resolves on abort or when `wait` settles, whichever is first */
export function abortable(wait: Promise<void>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
    wait.then(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
