/**
 * File identity and checksum helpers used after a transfer finishes.
 */

import { createHash } from "crypto";
import { createReadStream } from "fs";
import { stat } from "fs/promises";
import type { ModelFile } from "./catalog-schemas.js";
import { filesystemFailure, hashMismatch } from "./errors/catalog.js";

export interface FileIdentity {
  path: string;
  size: number;
  mtime: string;
  sha256?: string;
}

/**
 * Streamed digest of a file, hex encoded.
 */
export async function computeFileHash(filePath: string, algorithm = "sha256"): Promise<string> {
  const hash = createHash(algorithm);
  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw filesystemFailure(filePath, err);
  }
  return hash.digest("hex");
}

/**
 * Size, mtime and optionally the SHA-256 of a file on disk.
 */
export async function getFileIdentity(filePath: string, includeHash = false): Promise<FileIdentity> {
  const stats = await stat(filePath).catch((err: unknown) => {
    throw filesystemFailure(filePath, err);
  });

  const identity: FileIdentity = {
    path: filePath,
    size: stats.size,
    mtime: stats.mtime.toISOString(),
  };
  if (includeHash) {
    identity.sha256 = await computeFileHash(filePath);
  }
  return identity;
}

/** The catalog's SHA-256 for a file, whatever case its key uses */
export function expectedSha256(file: Pick<ModelFile, "hashes">): string | undefined {
  for (const [key, value] of Object.entries(file.hashes ?? {})) {
    if (key.toUpperCase() === "SHA256" && value) return value;
  }
  return undefined;
}

/**
 * Compare a file against a known digest. Returns the actual digest;
 * throws HASH_MISMATCH when it differs.
 */
export async function verifyFileHash(filePath: string, expected: string): Promise<string> {
  const actual = await computeFileHash(filePath);
  if (actual !== expected.toLowerCase()) {
    throw hashMismatch(filePath, expected, actual);
  }
  return actual;
}
