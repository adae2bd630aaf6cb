/**
 * Application Initialization
 * Ensures the download directory exists and clears leftovers from previous runs.
 */

import { mkdir } from "fs/promises";
import {
  ARTIFACT_MAX_AGE_HOURS,
  DOWNLOAD_DIR,
  STALE_PARTIAL_HOURS,
} from "./env.js";
import { cleanupDownloads, getDownloadDiskUsage } from "../utils/cleanupDownloads.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(downloadDir: string = DOWNLOAD_DIR): Promise<void> {
  console.log("Initializing application...");

  try {
    await mkdir(downloadDir, { recursive: true });
    console.log(`✓ Download directory: ${downloadDir}`);

    const before = getDownloadDiskUsage(downloadDir);
    console.log(`[cleanup] Disk usage: ${before.usedMB.toFixed(0)}MB (${before.files} files)`);

    await cleanupDownloads(downloadDir, {
      partialMaxAgeHours: STALE_PARTIAL_HOURS,
      artifactMaxAgeHours: ARTIFACT_MAX_AGE_HOURS,
    });

    const after = getDownloadDiskUsage(downloadDir);
    console.log(`[cleanup] Disk usage after cleanup: ${after.usedMB.toFixed(0)}MB (${after.files} files)`);

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
