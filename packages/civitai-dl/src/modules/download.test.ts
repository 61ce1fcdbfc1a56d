import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHash } from "crypto";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createApiClient } from "../lib/api-client.js";
import { ImageSchema, ModelSchema } from "../lib/catalog-schemas.js";
import { createDownloadEngine, type DownloadEngine } from "../lib/download/engine.js";
import {
  createFakeTransport,
  createManualClock,
  createRecordingLogger,
  payload,
  serveFile,
} from "../lib/testing/fakes.js";
import {
  executeDownloads,
  imageFilename,
  planImageDownloads,
  planModelDownloads,
  selectFiles,
  selectVersion,
  type ExecuteOptions,
} from "./download.js";

const model = ModelSchema.parse({
  id: 1,
  name: "Paper Lanterns",
  type: "LORA",
  creator: { username: "alice" },
  modelVersions: [
    {
      id: 11,
      name: "v2",
      baseModel: "SDXL 1.0",
      files: [
        {
          id: 101,
          name: "lanterns-v2.pt",
          downloadUrl: "https://files.test/101",
          metadata: { format: "PickleTensor" },
        },
        {
          id: 102,
          name: "lanterns-v2.safetensors",
          primary: true,
          downloadUrl: "https://files.test/102",
          metadata: { format: "SafeTensor" },
          hashes: { SHA256: "ABC" },
        },
      ],
    },
    { id: 10, name: "v1", files: [] },
  ],
});

function versionById(id: number) {
  const version = model.modelVersions.find((v) => v.id === id);
  if (!version) throw new Error(`fixture has no version ${id}`);
  return version;
}

describe("selectVersion", () => {
  it("defaults to the newest version", () => {
    expect(selectVersion(model).id).toBe(11);
  });

  it("finds a requested version", () => {
    expect(selectVersion(model, 10).name).toBe("v1");
  });

  it("rejects an unknown version", () => {
    expect(() => selectVersion(model, 99)).toThrow("Invalid version: model 1 has no version 99");
  });

  it("rejects a model without versions", () => {
    const empty = ModelSchema.parse({ id: 2, name: "Empty", type: "Checkpoint" });

    expect(() => selectVersion(empty)).toThrow("Invalid model: model 2 has no downloadable versions");
  });
});

describe("selectFiles", () => {
  const v2 = versionById(11);
  const ids = (files: { id: number }[]) => files.map((f) => f.id);

  it("prefers the primary file", () => {
    expect(ids(selectFiles(v2).files)).toEqual([102]);
  });

  it("matches a format by file extension", () => {
    expect(ids(selectFiles(v2, { format: "pt" }).files)).toEqual([101]);
  });

  it("matches a format by catalog metadata", () => {
    expect(ids(selectFiles(v2, { format: "safetensor" }).files)).toEqual([102]);
  });

  it("falls back to the default file when nothing matches", () => {
    const selection = selectFiles(v2, { format: "ckpt" });

    expect(selection.formatMissing).toBe(true);
    expect(ids(selection.files)).toEqual([102]);
  });

  it("returns every file, or every matching file, with allFiles", () => {
    expect(ids(selectFiles(v2, { allFiles: true }).files)).toEqual([101, 102]);
    expect(ids(selectFiles(v2, { allFiles: true, format: ".pt" }).files)).toEqual([101]);
  });

  it("rejects a version without files", () => {
    expect(() => selectFiles(versionById(10))).toThrow("Invalid version: version 10 has no files");
  });
});

describe("planModelDownloads", () => {
  it("places each file under the rendered template", () => {
    const v2 = versionById(11);
    const plan = planModelDownloads(model, v2, selectFiles(v2).files, {
      outputDir: "out",
      pathTemplate: "{type}/{creator}/{name}/{version_name}",
    });

    expect(plan).toEqual([
      {
        request: {
          url: "https://files.test/102",
          outputPath: "out/LORA/alice/Paper Lanterns/v2",
          filename: "lanterns-v2.safetensors",
        },
        sha256: "ABC",
      },
    ]);
  });
});

describe("image planning", () => {
  const image = ImageSchema.parse({
    id: 5,
    url: "https://image.test/abc/width=450/77.png",
    username: "bob",
  });

  it("names images by id with the URL's extension", () => {
    expect(imageFilename(image)).toBe("5.png");
    expect(imageFilename({ ...image, url: "https://image.test/abc/raw" })).toBe("5.jpeg");
  });

  it("queues images behind model files", () => {
    const plan = planImageDownloads([image], {
      outputDir: "out",
      imagePathTemplate: "images/{model_id}/{username}",
      modelId: 1,
    });

    expect(plan).toEqual([
      {
        request: {
          url: "https://image.test/abc/width=450/77.png",
          outputPath: "out/images/1/bob",
          filename: "5.png",
          priority: 10,
        },
      },
    ]);
  });
});

describe("executeDownloads", () => {
  const URL = "https://files.test/files/a.bin";
  const DATA = payload(1000);
  const DIGEST = createHash("sha256").update(DATA).digest("hex");

  let dir: string;
  let engine: DownloadEngine;

  function setup(overrides: Partial<ExecuteOptions> = {}) {
    const manual = createManualClock();
    const transport = createFakeTransport(serveFile(DATA, { chunkSize: 250 }));
    const logger = createRecordingLogger();
    const client = createApiClient({
      transport,
      clock: manual.clock,
      delay: manual.delay,
      minRequestIntervalMs: 0,
    });
    engine = createDownloadEngine({ client, clock: manual.clock, delay: manual.delay, logger, retryTimes: 0 });
    const options: ExecuteOptions = {
      engine,
      logger,
      verifyHashes: true,
      onExisting: "resume",
      ...overrides,
    };
    return { transport, logger, options };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "civitai-dl-cmd-"));
  });

  afterEach(async () => {
    await engine.shutdown();
    await rm(dir, { recursive: true, force: true });
  });

  it("downloads and verifies the catalog checksum", async () => {
    const { options } = setup();

    const result = await executeDownloads(
      [{ request: { url: URL, outputPath: dir, filename: "a.bin" }, sha256: DIGEST.toUpperCase() }],
      options
    );

    expect(result).toEqual({
      files: [
        {
          url: URL,
          path: join(dir, "a.bin"),
          status: "completed",
          bytes: 1000,
          retries: 0,
          sha256: DIGEST,
          verified: true,
        },
      ],
      summary: { total: 1, completed: 1, failed: 0, cancelled: 0, skipped: 0, bytes: 1000 },
    });
  });

  it("reports a checksum mismatch as a failed file", async () => {
    const { options, logger } = setup();
    const path = join(dir, "a.bin");

    const result = await executeDownloads(
      [{ request: { url: URL, outputPath: dir, filename: "a.bin" }, sha256: "00" }],
      options
    );

    expect(result.files[0]).toEqual({
      url: URL,
      path,
      status: "failed",
      bytes: 1000,
      retries: 0,
      verified: false,
      error: `Checksum mismatch for "${path}" (expected 00, got ${DIGEST})`,
    });
    expect(result.summary).toEqual({ total: 1, completed: 0, failed: 1, cancelled: 0, skipped: 0, bytes: 0 });
    expect(logger.entries.filter((e) => e.message === "Checksum mismatch")).toHaveLength(1);
  });

  it("leaves files unverified when verification is off", async () => {
    const { options } = setup({ verifyHashes: false });

    const result = await executeDownloads(
      [{ request: { url: URL, outputPath: dir, filename: "a.bin" }, sha256: "00" }],
      options
    );

    expect(result.files[0]?.status).toBe("completed");
    expect(result.files[0]?.verified).toBeUndefined();
  });

  it("skips an existing file without a request", async () => {
    const { options, transport } = setup({ onExisting: "skip" });
    await writeFile(join(dir, "a.bin"), "partial");

    const result = await executeDownloads([{ request: { url: URL, outputPath: dir, filename: "a.bin" } }], options);

    expect(result.files).toEqual([
      { url: URL, path: join(dir, "a.bin"), status: "skipped", bytes: 7, retries: 0 },
    ]);
    expect(result.summary.skipped).toBe(1);
    expect(transport.requests).toHaveLength(0);
  });

  it("replaces an existing file when overwriting", async () => {
    const { options, transport } = setup({ onExisting: "overwrite" });
    await writeFile(join(dir, "a.bin"), "garbage");

    await executeDownloads([{ request: { url: URL, outputPath: dir, filename: "a.bin" } }], options);

    expect(transport.requests[0]?.headers.Range).toBeUndefined();
    expect(Buffer.compare(await readFile(join(dir, "a.bin")), Buffer.from(DATA))).toBe(0);
  });

  it("resumes an existing partial file by default", async () => {
    const { options, transport } = setup();
    await writeFile(join(dir, "a.bin"), DATA.slice(0, 400));

    const result = await executeDownloads(
      [{ request: { url: URL, outputPath: dir, filename: "a.bin" } }],
      options
    );

    expect(transport.requests[0]?.headers.Range).toBe("bytes=400-");
    expect(result.files[0]?.bytes).toBe(1000);
    expect(Buffer.compare(await readFile(join(dir, "a.bin")), Buffer.from(DATA))).toBe(0);
  });

  it("keeps plan order across skipped and downloaded files", async () => {
    const { options } = setup({ onExisting: "skip", verifyHashes: false });
    await writeFile(join(dir, "first.bin"), "x");

    const result = await executeDownloads(
      [
        { request: { url: URL, outputPath: dir, filename: "first.bin" } },
        { request: { url: URL, outputPath: dir, filename: "second.bin" } },
      ],
      options
    );

    expect(result.files.map((f) => [f.path, f.status])).toEqual([
      [join(dir, "first.bin"), "skipped"],
      [join(dir, "second.bin"), "completed"],
    ]);
  });
});
