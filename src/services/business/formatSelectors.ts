/**
 * Format Selectors
 * Ranked yt-dlp format expressions per quality tier, preferring H.264 (avc1) + AAC (mp4a)
 * so downloads play natively on phones, and falling back to anything at all.
 */

import type { Quality } from "./types.js";

const HEIGHT_LIMITS: Record<Exclude<Quality, "audio">, number | null> = {
  best: null,
  "720p": 720,
  "480p": 480,
};

export const AUDIO_SELECTOR = "bestaudio/best";

/**
 * Selectors from most to least constrained:
 * exact codec + exact audio, exact codec + any audio, exact codec single file,
 * any codec at the resolution, then unconstrained.
 */
export function rankedVideoSelectors(quality: Exclude<Quality, "audio">): string[] {
  const limit = HEIGHT_LIMITS[quality];
  const res = limit === null ? "" : `[height<=${limit}]`;

  const selectors = [
    `bestvideo${res}[vcodec^=avc1]+bestaudio[acodec^=mp4a]`,
    `bestvideo${res}[vcodec^=avc1]+bestaudio`,
    `best${res}[vcodec^=avc1]`,
  ];
  if (res) {
    selectors.push(`bestvideo${res}+bestaudio`, `best${res}`);
  }
  selectors.push("best");
  return selectors;
}

/** Joins alternatives with yt-dlp's "/" fallback operator. */
export function buildFormatSelector(quality: Quality): string {
  if (quality === "audio") {
    return AUDIO_SELECTOR;
  }
  return rankedVideoSelectors(quality).join("/");
}

/** True for H.264 codec tags as reported by yt-dlp (avc1.64001F) or ffprobe (h264, avc1). */
export function isPreferredVideoCodec(vcodec: string): boolean {
  const normalized = vcodec.toLowerCase();
  return normalized.startsWith("avc") || normalized === "h264";
}
