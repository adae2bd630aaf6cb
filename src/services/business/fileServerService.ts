/**
 * File Server Service
 * Path resolution, listing and response headers for artifacts in the download directory.
 *
 * The download directory is the only trust boundary. A requested name is checked for
 * containment before anything touches the filesystem.
 */

import { readdir, realpath, stat } from "fs/promises";
import path from "path";
import { encodeRfc5987, escapeHtml, formatMegabytes } from "../../utils/formatting.js";
import { LISTING_ITEM_TEMPLATE, LISTING_PAGE_TEMPLATE } from "./listing/listingTemplate.js";

export const LISTING_LIMIT = 20;

export type ArtifactPathResult =
  | { kind: "ok"; path: string; name: string }
  | { kind: "denied" }
  | { kind: "missing" };

export interface ArtifactEntry {
  name: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/** Suffix of the hidden side-by-side file an H.264 re-encode writes before the rename. */
export const REENCODE_TEMP_SUFFIX = ".h264.tmp.mp4";

export function reencodeTempName(stem: string): string {
  return `.${stem}${REENCODE_TEMP_SUFFIX}`;
}

/** yt-dlp and the re-encoder leave these behind while a job is in flight. */
export function isPartialFile(name: string): boolean {
  return (
    /\.(part|ytdl)$/.test(name) ||
    /\.part-Frag\d+/.test(name) ||
    (name.startsWith(".") && name.endsWith(REENCODE_TEMP_SUFFIX))
  );
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") return true;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/** undefined for malformed percent-encoding */
function decodeName(rawName: string): string | undefined {
  try {
    return decodeURIComponent(rawName);
  } catch {
    return undefined;
  }
}

async function resolveRoot(root: string): Promise<string> {
  try {
    return await realpath(root);
  } catch {
    // Root not created yet: nothing can exist under it either
    return path.resolve(root);
  }
}

/**
 * Resolves a raw (still percent-encoded) name from the URL to a file under the root.
 * Order matters: lexical containment, then symlink resolution and containment again,
 * then the regular-file check.
 */
export async function resolveArtifactPath(
  root: string,
  rawName: string
): Promise<ArtifactPathResult> {
  const name = decodeName(rawName);
  if (name === undefined || name === "" || name.includes("\0")) {
    return { kind: "missing" };
  }

  const resolvedRoot = await resolveRoot(root);
  const candidate = path.resolve(resolvedRoot, name);
  if (!isWithin(resolvedRoot, candidate)) {
    return { kind: "denied" };
  }

  let realPath: string;
  try {
    realPath = await realpath(candidate);
  } catch {
    return { kind: "missing" };
  }
  if (!isWithin(resolvedRoot, realPath)) {
    return { kind: "denied" };
  }

  try {
    const stats = await stat(realPath);
    return stats.isFile()
      ? { kind: "ok", path: realPath, name: path.basename(candidate) }
      : { kind: "missing" };
  } catch {
    return { kind: "missing" };
  }
}

/**
 * Most recently modified regular files, newest first.
 */
export async function listRecentArtifacts(
  root: string,
  limit: number = LISTING_LIMIT
): Promise<ArtifactEntry[]> {
  let names: string[];
  try {
    names = await readdir(root);
  } catch (error) {
    console.warn(`[files] cannot read ${root}:`, error);
    return [];
  }

  const entries: ArtifactEntry[] = [];
  for (const name of names) {
    if (isPartialFile(name)) continue;
    try {
      const stats = await stat(path.join(root, name));
      if (stats.isFile()) {
        entries.push({ name, sizeBytes: stats.size, modifiedAt: stats.mtime });
      }
    } catch {
      // Removed between readdir and stat
    }
  }

  return entries
    .sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime())
    .slice(0, limit);
}

export function renderListingHtml(entries: ArtifactEntry[]): string {
  const items = entries
    .map((entry) =>
      LISTING_ITEM_TEMPLATE
        .replace("{{HREF}}", () => encodeURIComponent(entry.name))
        .replace("{{NAME}}", () => escapeHtml(entry.name))
        .replace("{{SIZE_MB}}", () => formatMegabytes(entry.sizeBytes))
    )
    .join("");

  return LISTING_PAGE_TEMPLATE.replace("{{ITEMS}}", () => items);
}

/**
 * Content-Disposition with an ASCII fallback and the exact UTF-8 name.
 * Fallback: control characters become spaces, double quotes become single quotes,
 * backslashes and non-ASCII become underscores.
 */
export function buildContentDisposition(fileName: string): string {
  const fallback = fileName
    .replace(/[\x00-\x1f\x7f]/g, " ")
    .replace(/"/g, "'")
    .replace(/\\/g, "_")
    .replace(/[^\x20-\x7e]/gu, "_");

  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeRfc5987(fileName)}`;
}
