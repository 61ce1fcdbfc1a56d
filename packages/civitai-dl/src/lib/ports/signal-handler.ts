/**
 * Abstraction for process signal handling.
 * Lets a long download run stop its engine cleanly on Ctrl-C.
 */
export interface SignalHandler {
  /** Register a callback for SIGINT/SIGTERM; the first signal runs every callback once */
  onShutdown(callback: (signal: NodeJS.Signals) => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
