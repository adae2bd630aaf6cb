/**
 * Cleanup utility for the download directory
 * Runs on startup to clear partial downloads left by crashes and, optionally, old artifacts
 */

import fs from "fs";
import path from "path";
import { isPartialFile } from "../services/business/fileServerService.js";

export interface CleanupOptions {
  /** Partial files (.part, .ytdl, re-encode temps) older than this are removed */
  partialMaxAgeHours: number;
  /** Finished artifacts older than this are removed; 0 keeps them forever */
  artifactMaxAgeHours: number;
  now?: number;
}

export interface CleanupReport {
  removedFiles: number;
  freedMB: number;
}

/**
 * Removes stale partial files and expired artifacts from the download directory.
 * Subdirectories are left alone: only top-level files are ever served.
 */
export async function cleanupDownloads(
  downloadDir: string,
  options: CleanupOptions
): Promise<CleanupReport> {
  const report: CleanupReport = { removedFiles: 0, freedMB: 0 };

  if (!fs.existsSync(downloadDir)) {
    console.log("[cleanup] No download directory found, nothing to clean");
    return report;
  }

  console.log(`[cleanup] Scanning ${downloadDir} for stale files...`);

  const now = options.now ?? Date.now();
  const partialMaxAgeMs = options.partialMaxAgeHours * 60 * 60 * 1000;
  const artifactMaxAgeMs = options.artifactMaxAgeHours * 60 * 60 * 1000;

  for (const name of await fs.promises.readdir(downloadDir)) {
    const filePath = path.join(downloadDir, name);

    try {
      const stats = await fs.promises.lstat(filePath);
      if (!stats.isFile()) {
        continue;
      }

      const ageMs = now - stats.mtimeMs;
      const partial = isPartialFile(name);
      const expired = partial
        ? ageMs > partialMaxAgeMs
        : artifactMaxAgeMs > 0 && ageMs > artifactMaxAgeMs;

      if (!expired) {
        continue;
      }

      await fs.promises.unlink(filePath);
      report.removedFiles++;
      report.freedMB += stats.size / (1024 * 1024);
      console.log(`[cleanup] Removed ${partial ? "partial" : "old"} file: ${name} (${(ageMs / 3600000).toFixed(1)}h old)`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${name}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${report.removedFiles} files, freed ${report.freedMB.toFixed(0)}MB`);
  return report;
}

/**
 * Disk usage of the download directory (top-level files only)
 */
export function getDownloadDiskUsage(downloadDir: string): { usedMB: number; files: number } {
  if (!fs.existsSync(downloadDir)) {
    return { usedMB: 0, files: 0 };
  }

  let totalBytes = 0;
  let totalFiles = 0;

  try {
    for (const name of fs.readdirSync(downloadDir)) {
      const stats = fs.statSync(path.join(downloadDir, name));
      if (stats.isFile()) {
        totalBytes += stats.size;
        totalFiles++;
      }
    }
  } catch (err) {
    console.error("[cleanup] Error calculating disk usage:", err);
  }

  return {
    usedMB: totalBytes / (1024 * 1024),
    files: totalFiles,
  };
}
