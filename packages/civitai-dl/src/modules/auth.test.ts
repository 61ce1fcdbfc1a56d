import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { Command } from "commander";
import { join } from "path";
import { tmpdir } from "os";
import type { KeyStore } from "../lib/api-client.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { createServices } from "../lib/services.js";
import { registerAuthCommands, resolveKey } from "./auth.js";

function fakePrompts(answer?: string): PromptService {
  return {
    confirm: vi.fn(async () => false),
    password: vi.fn(async () => answer),
  };
}

function memoryStore(initial?: string): KeyStore {
  let value = initial;
  return {
    getApiKey: () => value,
    setApiKey: (key) => {
      value = key;
    },
    clear: () => {
      value = undefined;
    },
  };
}

describe("resolveKey", () => {
  it("returns the provided key, trimmed", async () => {
    await expect(resolveKey({ key: "  test-secret " }, fakePrompts())).resolves.toBe("test-secret");
  });

  it("prompts for the key when missing", async () => {
    const prompts = fakePrompts("prompted-key");

    await expect(resolveKey({}, prompts)).resolves.toBe("prompted-key");
    expect(prompts.password).toHaveBeenCalledTimes(1);
  });

  it("throws if non-interactive without a key", async () => {
    await expect(resolveKey({ nonInteractive: true }, fakePrompts())).rejects.toThrow(
      "No API key supplied and interactive prompts are disabled"
    );
  });

  it("throws when the prompt is dismissed", async () => {
    await expect(resolveKey({}, fakePrompts(undefined))).rejects.toThrow("An API key is required");
  });
});

describe("auth commands", () => {
  let consoleLogSpy: MockInstance;
  const configPath = join(tmpdir(), "civitai-dl-auth-test-missing", "config.yaml");

  function run(args: string[], store: KeyStore, env: NodeJS.ProcessEnv = {}) {
    const program = new Command();
    program.exitOverride();
    registerAuthCommands(program, createServices({ env, keyStore: store, configPath }), fakePrompts());
    return program.parseAsync(["node", "test", "auth", ...args]);
  }

  function printedJson(): unknown {
    const [first] = consoleLogSpy.mock.calls;
    return JSON.parse(String(first?.[0]));
  }

  beforeEach(() => {
    resetContext();
    initContext(["node", "test", "--json"], {});
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
  });

  it("stores the key on login", async () => {
    const store = memoryStore();

    await run(["login", "--key", "test-secret"], store);

    expect(store.getApiKey()).toBe("test-secret");
    expect(printedJson()).toEqual({ success: true, data: { authenticated: true, source: "store" } });
  });

  it("clears the key on logout with --yes", async () => {
    initContext(["node", "test", "--json", "--yes"], {});
    const store = memoryStore("test-secret");

    await run(["logout"], store);

    expect(store.getApiKey()).toBeUndefined();
    expect(printedJson()).toEqual({ success: true, data: { loggedOut: true } });
  });

  it("keeps the key when logout is not confirmed", async () => {
    const wasTTY = process.stdout.isTTY;
    process.stdout.isTTY = true;
    const store = memoryStore("test-secret");

    try {
      await run(["logout"], store);
    } finally {
      process.stdout.isTTY = wasTTY;
    }

    expect(store.getApiKey()).toBe("test-secret");
    expect(printedJson()).toEqual({ success: true, data: { loggedOut: false } });
  });

  it("reports the environment key ahead of the stored one", async () => {
    await run(["status"], memoryStore("stored-secret"), { CIVITAI_API_KEY: "test-secret" });

    expect(printedJson()).toEqual({ success: true, data: { authenticated: true, source: "env" } });
  });

  it("reports the stored key", async () => {
    await run(["status"], memoryStore("test-secret"));

    expect(printedJson()).toEqual({ success: true, data: { authenticated: true, source: "store" } });
  });

  it("refuses to check when no key is configured", async () => {
    await expect(run(["status", "--check"], memoryStore())).rejects.toMatchObject({
      code: "AUTH_NOT_AUTHENTICATED",
      message: "No API key is configured",
    });
  });

  it("reports a missing key", async () => {
    await run(["status"], memoryStore());

    expect(printedJson()).toEqual({ success: true, data: { authenticated: false } });
  });
});
