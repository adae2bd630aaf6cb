/**
 * Environment Configuration
 * Exports type-safe environment variables with defaults.
 * Nothing here is required: the service runs on a LAN with sane defaults.
 */

import os from "os";
import path from "path";

/** Server configuration */
export const PORT = parseIntEnv("PORT", 8080);
export const NODE_ENV = process.env.NODE_ENV || "development";
/** Optional public base URL (e.g., reverse proxy) used for building download links */
export const PUBLIC_BASE_URL = process.env.PUBLIC_BASE_URL;

/** Artifact directory: the only directory the file server exposes */
export const DOWNLOAD_DIR = path.resolve(
  process.env.DOWNLOAD_DIR || path.join(os.homedir(), "Downloads", "video-drop")
);

/** External tools */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
export const FFMPEG_PATH = process.env.FFMPEG_PATH;
export const FFPROBE_PATH = process.env.FFPROBE_PATH;

/** Job lifecycle tuning */
export const PROGRESS_INTERVAL_MS = parseIntEnv("PROGRESS_INTERVAL_MS", 2000);
export const TOKEN_STORE_CAPACITY = parseIntEnv("TOKEN_STORE_CAPACITY", 100);

/** Startup cleanup */
export const STALE_PARTIAL_HOURS = parseIntEnv("STALE_PARTIAL_HOURS", 2);
/** 0 keeps finished artifacts forever */
export const ARTIFACT_MAX_AGE_HOURS = parseIntEnv("ARTIFACT_MAX_AGE_HOURS", 0);

/**
 * Parses an integer variable, falling back to the default when unset.
 * Throws immediately on garbage so misconfiguration fails at startup.
 */
function parseIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Invalid integer for environment variable: ${key}`);
  }
  return value;
}
