import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { parse as parseYaml } from "yaml";
import { registerConfigCommands } from "./config-cmd.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

// Mock config module
vi.mock("../lib/config.js", () => ({
  loadConfig: vi.fn(),
  loadConfigFile: vi.fn(),
  userConfigPath: vi.fn((path?: string) => path ?? "/home/user/.config/civitai-dl/config.yaml"),
  SYSTEM_CONFIG_PATH: "/etc/civitai-dl/config.yaml",
}));

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { loadConfig, loadConfigFile, type ResolvedConfig } from "../lib/config.js";

const RESOLVED: ResolvedConfig = {
  apiKey: "test-secret",
  baseUrl: "https://civitai.com/api/v1",
  timeoutMs: 30000,
  minRequestIntervalMs: 1000,
  maxRequestIntervalMs: 60000,
  maxRateLimitRetries: 5,
  rateLimitPenaltyMs: 5000,
  outputDir: "./downloads",
  maxWorkers: 3,
  chunkSize: 8192,
  retryTimes: 3,
  retryDelayMs: 5000,
  pathTemplate: "{type}/{creator}/{name}",
  imagePathTemplate: "images/{model_id}",
  verifyHashes: true,
  maxPages: 500,
  logLevel: "info",
  logJson: false,
};

describe("config-cmd", () => {
  let program: Command;
  let explicitPath: string | undefined;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  function printed(spy: MockInstance): string[] {
    return spy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    explicitPath = undefined;
    program = new Command();
    program.exitOverride();
    registerConfigCommands(program, () => explicitPath);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    vi.clearAllMocks();
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("config init", () => {
    it("creates user config file when it does not exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith("/home/user/.config/civitai-dl", { recursive: true });
      expect(writeFileSync).toHaveBeenCalledWith(
        "/home/user/.config/civitai-dl/config.yaml",
        expect.stringContaining("# civitai-dl configuration"),
        "utf-8"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Created config file: /home/user/.config/civitai-dl/config.yaml"
      );
    });

    it("writes an example that passes the config schema", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      const actual = await vi.importActual<typeof import("../lib/config.js")>("../lib/config.js");

      await program.parseAsync(["node", "test", "config", "init"]);

      const written = String(vi.mocked(writeFileSync).mock.calls[0]?.[1]);
      const result = actual.ConfigFileSchema.safeParse(parseYaml(written));
      expect(result.success).toBe(true);
    });

    it("creates the file at the --config path", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      explicitPath = "/custom/civitai.yaml";

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(writeFileSync).toHaveBeenCalledWith("/custom/civitai.yaml", expect.any(String), "utf-8");
    });

    it("creates system config with --global flag", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(writeFileSync).toHaveBeenCalledWith("/etc/civitai-dl/config.yaml", expect.any(String), "utf-8");
    });

    it("does not overwrite existing config file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file already exists: /home/user/.config/civitai-dl/config.yaml"
      );
      expect(process.exitCode).toBe(1);
    });

    it("suggests sudo when the global file cannot be written", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(printed(consoleErrorSpy)).toEqual([
        "Failed to create config: Permission denied",
        "System config may require sudo.",
      ]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config validate", () => {
    it("validates the config files that exist", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).includes("/home/user"));
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(loadConfigFile).toHaveBeenCalledWith("/home/user/.config/civitai-dl/config.yaml");
      expect(consoleLogSpy).toHaveBeenCalledWith("\nAll configuration files are valid.");
    });

    it("validates only the --config file when given", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockReturnValue({});
      explicitPath = "/custom/config.yaml";

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(loadConfigFile).toHaveBeenCalledWith("/custom/config.yaml");
    });

    it("reports validation errors", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockImplementation(() => {
        throw new Error("Invalid schema");
      });
      explicitPath = "/bad/config.yaml";

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("  ✗ Invalid: Invalid schema");
      expect(process.exitCode).toBe(1);
    });

    it("reports a missing --config file", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      explicitPath = "/missing/config.yaml";

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("File not found: /missing/config.yaml");
      expect(process.exitCode).toBe(1);
    });

    it("shows message when no config files found", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(process.exitCode).toBeUndefined();
    });
  });

  describe("config show", () => {
    it("displays effective configuration with the key masked", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: RESOLVED,
        sources: ["/home/user/.config/civitai-dl/config.yaml"],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      const lines = printed(consoleLogSpy);
      expect(lines).toContain("Sources: /home/user/.config/civitai-dl/config.yaml");
      expect(lines).toContain(`  ${"key:".padEnd(22)}[redacted]`);
      expect(lines).toContain(`  ${"maxWorkers:".padEnd(22)}3`);
      expect(lines).toContain(`  ${"pathTemplate:".padEnd(22)}{type}/{creator}/{name}`);
      expect(lines.some((line) => line.includes("test-secret"))).toBe(false);
    });

    it("shows defaults only message when no sources", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: { ...RESOLVED, apiKey: undefined }, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      const lines = printed(consoleLogSpy);
      expect(lines).toContain("Sources: (defaults only)");
      expect(lines).toContain(`  ${"key:".padEnd(22)}(not set)`);
    });

    it("handles config loading errors", async () => {
      vi.mocked(loadConfig).mockImplementation(() => {
        throw new Error("Config parse error");
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to load config: Config parse error");
      expect(process.exitCode).toBe(1);
    });

    it("loads the --config file", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: RESOLVED, sources: [] });
      explicitPath = "/custom/config.yaml";

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(loadConfig).toHaveBeenCalledWith("/custom/config.yaml");
    });
  });

  describe("config path", () => {
    it("displays config file locations", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "path"]);

      const lines = printed(consoleLogSpy);
      expect(lines).toContain("  /home/user/.config/civitai-dl/config.yaml");
      expect(lines).toContain("  /etc/civitai-dl/config.yaml");
      expect(lines.filter((line) => line === "  (not found)")).toHaveLength(2);
    });

    it("indicates when config files exist", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(printed(consoleLogSpy).filter((line) => line === "  (exists)")).toHaveLength(2);
    });
  });
});
