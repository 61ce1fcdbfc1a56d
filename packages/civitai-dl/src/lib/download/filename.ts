import { createHash } from "crypto";

/** Characters that are unsafe in a file name on at least one common platform */
const INVALID_FILENAME_CHARS = /[\\/*?:"<>|]/g;

const DISPOSITION_PARAM = /(filename\*?)\s*=\s*(?:"([^"]*)"|([^;\s]+))/gi;

/** `charset'lang'value` of an RFC 5987 extended parameter */
const EXTENDED_VALUE = /^([\w!#$%&+^`{}~-]+)'[^']*'(.*)$/;

function decodePercent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Replace characters that cannot appear in a file name with `_`.
 * Returns "" for names that would still resolve outside the directory.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(INVALID_FILENAME_CHARS, "_").replace(/[\u0000-\u001f]/g, "").trim();
  return cleaned === "." || cleaned === ".." ? "" : cleaned;
}

/**
 * File name from a Content-Disposition header.
 * `filename*=` wins over `filename=` when both are present.
 */
export function parseContentDisposition(header: string | null | undefined): string | undefined {
  if (!header) return undefined;

  let extended: string | undefined;
  let plain: string | undefined;

  for (const match of header.matchAll(DISPOSITION_PARAM)) {
    const key = (match[1] ?? "").toLowerCase();
    const raw = match[2] ?? match[3] ?? "";
    if (key === "filename*") {
      const parts = EXTENDED_VALUE.exec(raw);
      extended = decodePercent(parts ? parts[2] ?? "" : raw);
    } else {
      plain = raw;
    }
  }

  const chosen = sanitizeFilename(extended || plain || "");
  return chosen || undefined;
}

/** Percent-decoded basename of the URL path, if it has one. */
export function filenameFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  const base = pathname.split("/").filter(Boolean).pop();
  if (!base) return undefined;
  return sanitizeFilename(decodePercent(base)) || undefined;
}

/** Stable name for a URL that offers nothing better */
export function fallbackFilename(url: string): string {
  return `download_${createHash("sha256").update(url).digest("hex").slice(0, 8)}`;
}

export interface FilenameSources {
  explicit?: string;
  contentDisposition?: string | null;
  url: string;
}

/**
 * Pick the name to write: explicit > Content-Disposition > URL basename > hash fallback.
 */
export function resolveFilename({ explicit, contentDisposition, url }: FilenameSources): string {
  const fromCaller = explicit !== undefined ? sanitizeFilename(explicit) : "";
  return (
    fromCaller ||
    parseContentDisposition(contentDisposition) ||
    filenameFromUrl(url) ||
    fallbackFilename(url)
  );
}
