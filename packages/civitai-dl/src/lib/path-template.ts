/**
 * Directory layout templates such as `{type}/{creator}/{name}`.
 *
 * Templates are split on `/` first and every segment is rendered and
 * sanitised on its own, so a variable value can never add a directory level.
 */

import type { CatalogImage, Model, ModelFile, ModelVersion } from "./catalog-schemas.js";
import { sanitizeFilename } from "./download/filename.js";

export type TemplateValue = string | number | boolean | null | undefined;
export type TemplateVariables = Record<string, TemplateValue>;

export const MISSING_VALUE = "unknown";
export const MAX_SEGMENT_LENGTH = 255;

const PLACEHOLDER = /\{([^{}]+)\}/g;

export function sanitizeSegment(segment: string): string {
  let clean = sanitizeFilename(segment.normalize("NFC")).replace(/_{2,}/g, "_");
  if (clean.length > MAX_SEGMENT_LENGTH) {
    clean = `${clean.slice(0, MAX_SEGMENT_LENGTH - 3)}...`;
  }
  return clean;
}

/**
 * Substitute `{name}` placeholders and return a relative, `/`-joined path.
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  const segments = template
    .split(/[\\/]+/)
    .filter((segment) => segment !== "")
    .map((segment) => {
      const rendered = segment.replace(PLACEHOLDER, (_match, name: string) => {
        const value = variables[name.trim()];
        if (value === undefined || value === null || value === "") return MISSING_VALUE;
        return String(value);
      });
      return sanitizeSegment(rendered) || MISSING_VALUE;
    });

  return segments.join("/");
}

// ---------------------------------------------------------------------------
// Variable sets
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function dateVariables(date: Date): TemplateVariables {
  const year = String(date.getFullYear());
  const month = pad(date.getMonth() + 1);
  const day = pad(date.getDate());
  return { year, month, day, date: `${year}-${month}-${day}` };
}

function extensionOf(name: string): string | undefined {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1) : undefined;
}

export function modelVariables(
  model: Model,
  version?: ModelVersion,
  file?: ModelFile,
  date: Date = new Date()
): TemplateVariables {
  const variables: TemplateVariables = {
    id: model.id,
    model_id: model.id,
    name: model.name,
    type: model.type,
    nsfw: model.nsfw ? "nsfw" : "sfw",
    creator: model.creator?.username,
    ...dateVariables(date),
  };

  if (version) {
    variables.version_id = version.id;
    variables.version_name = version.name;
    variables.base_model = version.baseModel;
  }

  if (file) {
    variables.file_id = file.id;
    variables.file_name = file.name;
    variables.file_format = extensionOf(file.name);
    variables.format = file.metadata?.format;
  }

  return variables;
}

export function imageVariables(
  image: CatalogImage,
  context: { modelId?: number; versionId?: number } = {},
  date: Date = new Date()
): TemplateVariables {
  return {
    image_id: image.id,
    model_id: context.modelId,
    version_id: context.versionId,
    post_id: image.postId,
    username: image.username,
    nsfw: image.nsfw === true || (typeof image.nsfw === "string" && image.nsfw !== "None") ? "nsfw" : "sfw",
    ...dateVariables(date),
  };
}

export function renderModelPath(
  template: string,
  model: Model,
  version?: ModelVersion,
  file?: ModelFile,
  date?: Date
): string {
  return renderTemplate(template, modelVariables(model, version, file, date));
}

export function renderImagePath(
  template: string,
  image: CatalogImage,
  context: { modelId?: number; versionId?: number } = {},
  date?: Date
): string {
  return renderTemplate(template, imageVariables(image, context, date));
}
