import { describe, it, expect } from "vitest";
import { ImageSchema, ModelSchema } from "./catalog-schemas.js";
import { renderImagePath, renderModelPath, renderTemplate, sanitizeSegment } from "./path-template.js";

const model = ModelSchema.parse({
  id: 101,
  name: "Paper Lanterns",
  type: "LORA",
  creator: { username: "alice" },
  modelVersions: [
    {
      id: 202,
      name: "v1.0",
      baseModel: "SDXL 1.0",
      files: [
        {
          id: 303,
          name: "lanterns.safetensors",
          downloadUrl: "https://files.test/api/download/models/202",
          metadata: { format: "SafeTensor" },
        },
      ],
    },
  ],
});

const version = model.modelVersions[0];
const file = version?.files[0];

describe("renderTemplate", () => {
  it("substitutes variables segment by segment", () => {
    expect(
      renderTemplate("{type}/{creator}/{name}", { type: "LORA", creator: "alice", name: "Cute: Style/v2" })
    ).toBe("LORA/alice/Cute_ Style_v2");
  });

  it("renders missing variables as unknown", () => {
    expect(renderTemplate("{type}/{creator}", { type: "LORA" })).toBe("LORA/unknown");
    expect(renderTemplate("{type}/{creator}", { type: "LORA", creator: null })).toBe("LORA/unknown");
  });

  it("collapses underscore runs", () => {
    expect(renderTemplate("{a}__{b}", { a: "x_", b: "_y" })).toBe("x_y");
  });

  it("drops empty segments", () => {
    expect(renderTemplate("/{type}//{name}/", { type: "LORA", name: "n" })).toBe("LORA/n");
  });

  it("never yields a dot segment", () => {
    expect(renderTemplate("out/{name}", { name: ".." })).toBe("out/unknown");
  });
});

describe("sanitizeSegment", () => {
  it("caps long segments", () => {
    const result = sanitizeSegment("a".repeat(300));

    expect(result).toHaveLength(255);
    expect(result).toBe(`${"a".repeat(252)}...`);
  });
});

describe("renderModelPath", () => {
  const date = new Date(2024, 2, 5);

  it("exposes model, version, file and date variables", () => {
    expect(
      renderModelPath("{base_model}/{year}-{month}/{version_name}/{file_format}", model, version, file, date)
    ).toBe("SDXL 1.0/2024-03/v1.0/safetensors");
    expect(renderModelPath("{date}/{id}-{version_id}-{file_id}/{format}", model, version, file, date)).toBe(
      "2024-03-05/101-202-303/SafeTensor"
    );
  });

  it("uses the default layout", () => {
    expect(renderModelPath("{type}/{creator}/{name}", model)).toBe("LORA/alice/Paper Lanterns");
  });

  it("reports sfw when the flag is absent", () => {
    expect(renderModelPath("{nsfw}", model)).toBe("sfw");
  });
});

describe("renderImagePath", () => {
  it("renders image variables with the model context", () => {
    const image = ImageSchema.parse({ id: 1, url: "https://img.test/1.png", nsfw: "X", username: "bob" });

    expect(renderImagePath("images/{model_id}/{nsfw}/{username}", image, { modelId: 7 })).toBe(
      "images/7/nsfw/bob"
    );
  });
});
