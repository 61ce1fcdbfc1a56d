import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a process stopped by a signal */
const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Create a signal handler for process shutdown signals.
 * A second signal while callbacks are still running exits immediately.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code)
): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    const code = SIGNAL_EXIT_CODES[signal] ?? 1;
    if (isHandling) {
      exit(code);
      return;
    }
    isHandling = true;
    Promise.allSettled(handlers.map((h) => h(signal)))
      .then(() => exit(code))
      .catch(() => exit(code));
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}
