export { systemClock } from "./system-clock.js";
export { realTimerService, realDelay } from "./real-timers.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createFetchTransport } from "./fetch-transport.js";
