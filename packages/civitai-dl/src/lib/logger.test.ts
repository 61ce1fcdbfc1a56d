import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createLogger, createNoopLogger, redactMeta, redactUrl } from "./logger.js";

describe("logger", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("logs debug when level is debug", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.debug("test message");
        expect(consoleLogSpy).toHaveBeenCalled();
      });

      it("does not log debug when level is info", () => {
        const logger = createLogger({ level: "info", json: false });
        logger.debug("test message");
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });

      it("does not log warn when level is error", () => {
        const logger = createLogger({ level: "error", json: false });
        logger.warn("test message");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });
    });

    describe("output routing", () => {
      it("logs info to stdout", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.info("info message");
        expect(consoleLogSpy).toHaveBeenCalled();
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("logs warn and error to stderr", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.warn("warn message");
        logger.error("error message");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("JSON format", () => {
      it("outputs one JSON object with metadata", () => {
        const logger = createLogger({ level: "debug", json: true });
        logger.info("transfer started", { taskId: "t-1", offset: 400 });

        const parsed = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);

        expect(parsed.message).toBe("transfer started");
        expect(parsed.level).toBe("info");
        expect(parsed.taskId).toBe("t-1");
        expect(parsed.offset).toBe(400);
        expect(parsed.timestamp).toBeDefined();
      });
    });

    describe("human-readable format", () => {
      it("prints timestamp, padded level, message and metadata", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.info("queued", { priority: 1 });

        const output = consoleLogSpy.mock.calls[0][0] as string;
        expect(output).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO  queued \{"priority":1\}$/);
      });

      it("omits metadata section when empty", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.info("test message");

        const output = consoleLogSpy.mock.calls[0][0] as string;
        expect(output.endsWith("INFO  test message")).toBe(true);
      });
    });

    describe("redaction", () => {
      it("masks credential keys in metadata", () => {
        const logger = createLogger({ level: "debug", json: true });
        logger.info("client ready", { apiKey: "test-secret", baseUrl: "https://example.test" });

        const parsed = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        expect(parsed.apiKey).toBe("[redacted]");
        expect(parsed.baseUrl).toBe("https://example.test");
      });

      it("masks token query parameters in messages and values", () => {
        const logger = createLogger({ level: "debug", json: true });
        logger.warn("GET https://example.test/dl/1?token=test-secret failed", {
          url: "https://example.test/dl/1?type=Model&token=test-secret",
        });

        const parsed = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);
        expect(parsed.message).toBe("GET https://example.test/dl/1?token=[redacted] failed");
        expect(parsed.url).toBe("https://example.test/dl/1?type=Model&token=[redacted]");
      });
    });

    describe("child logger", () => {
      it("includes default meta on all logs", () => {
        const logger = createLogger({ level: "debug", json: true });
        const child = logger.child({ component: "engine" });

        child.info("message 1");
        child.warn("message 2");

        const output1 = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        const output2 = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);

        expect(output1.component).toBe("engine");
        expect(output2.component).toBe("engine");
      });

      it("per-call metadata overrides default meta", () => {
        const logger = createLogger({ level: "debug", json: true });
        const child = logger.child({ component: "default" });

        child.info("message", { component: "override" });

        const output = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        expect(output.component).toBe("override");
      });

      it("supports nested child loggers", () => {
        const logger = createLogger({ level: "debug", json: true });
        const child = logger.child({ component: "engine" }).child({ taskId: "t-9" });

        child.info("nested message");

        const output = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        expect(output.component).toBe("engine");
        expect(output.taskId).toBe("t-9");
      });
    });
  });

  describe("redact helpers", () => {
    it("leaves URLs without a token untouched", () => {
      expect(redactUrl("https://example.test/models/1?limit=5")).toBe(
        "https://example.test/models/1?limit=5"
      );
    });

    it("recurses into nested objects", () => {
      expect(redactMeta({ headers: { Authorization: "Bearer test-secret", Range: "bytes=0-" } })).toEqual({
        headers: { Authorization: "[redacted]", Range: "bytes=0-" },
      });
    });
  });

  describe("createNoopLogger", () => {
    it("returns a logger that does nothing", () => {
      const logger = createNoopLogger();

      logger.debug("debug");
      logger.info("info");
      logger.warn("warn");
      logger.error("error");
      logger.child({ component: "x" }).info("child");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });
});
