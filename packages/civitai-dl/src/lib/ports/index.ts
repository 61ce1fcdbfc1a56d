export type { Clock } from "./clock.js";
export type { TimerService, DelayFn } from "./timer.js";
export type { PromptService } from "./prompt.js";
export type { SignalHandler } from "./signal-handler.js";
export type {
  Transport,
  TransportRequest,
  TransportResponse,
  TransportHeaders,
  HttpMethod,
} from "./transport.js";
