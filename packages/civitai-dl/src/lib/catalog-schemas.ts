import { z } from "zod";

// ---------------------------------------------------------------------------
// Zod Schemas for the catalog REST surface
// ---------------------------------------------------------------------------
// Only the fields the CLI reads are declared; everything else passes through.

export const ModelFileSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    sizeKB: z.number().nonnegative().optional(),
    type: z.string().optional(),
    primary: z.boolean().optional(),
    downloadUrl: z.string().url(),
    hashes: z.record(z.string()).optional(),
    metadata: z
      .object({
        format: z.string().nullish(),
        size: z.string().nullish(),
        fp: z.string().nullish(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const ImageSchema = z
  .object({
    id: z.number().int(),
    url: z.string().url(),
    hash: z.string().nullish(),
    width: z.number().int().nullish(),
    height: z.number().int().nullish(),
    nsfw: z.union([z.boolean(), z.string()]).optional(),
    nsfwLevel: z.union([z.number(), z.string()]).optional(),
    postId: z.number().int().nullish(),
    username: z.string().nullish(),
    meta: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const ModelVersionSchema = z
  .object({
    id: z.number().int(),
    modelId: z.number().int().optional(),
    name: z.string(),
    baseModel: z.string().nullish(),
    downloadUrl: z.string().url().optional(),
    files: z.array(ModelFileSchema).default([]),
    images: z.array(ImageSchema.partial({ id: true })).optional(),
  })
  .passthrough();

export const ModelSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    type: z.string(),
    nsfw: z.boolean().optional(),
    description: z.string().nullish(),
    creator: z
      .object({
        username: z.string().nullish(),
      })
      .passthrough()
      .optional(),
    stats: z
      .object({
        downloadCount: z.number().optional(),
        rating: z.number().optional(),
      })
      .passthrough()
      .optional(),
    modelVersions: z.array(ModelVersionSchema).default([]),
  })
  .passthrough();

export const PageMetadataSchema = z
  .object({
    nextCursor: z.union([z.string(), z.number()]).nullish(),
    nextPage: z.string().nullish(),
    totalItems: z.number().optional(),
    currentPage: z.number().optional(),
    pageSize: z.number().optional(),
    totalPages: z.number().optional(),
  })
  .passthrough();

/**
 * Envelope of every list endpoint: `{ items, metadata }`.
 */
export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item),
    metadata: PageMetadataSchema.optional(),
  });
}

export const ModelPageSchema = pageSchema(ModelSchema);
export const ImagePageSchema = pageSchema(ImageSchema);

export type ModelFile = z.infer<typeof ModelFileSchema>;
export type CatalogImage = z.infer<typeof ImageSchema>;
export type ModelVersion = z.infer<typeof ModelVersionSchema>;
export type Model = z.infer<typeof ModelSchema>;
export type PageMetadata = z.infer<typeof PageMetadataSchema>;

export interface Page<T> {
  items: T[];
  metadata?: PageMetadata;
}
