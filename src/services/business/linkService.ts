/**
 * Link Service
 * Turns a chat message into a stored link plus the quality choices to offer.
 */

import { BadRequestError } from "../../utils/errors.js";
import { formatDuration } from "../../utils/formatting.js";
import type { ExtractionOptions, ExtractionPort, VideoInfo } from "../external/extractionPort.js";
import type { UrlTokenStore } from "./tokenStore.js";
import type { Quality } from "./types.js";

const YOUTUBE_REGEX =
  /(https?:\/\/)?(www\.)?(youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/shorts\/)[\w-]+/;

export const QUALITY_OPTIONS: ReadonlyArray<{ quality: Quality; label: string }> = [
  { quality: "best", label: "Best Quality" },
  { quality: "720p", label: "720p" },
  { quality: "480p", label: "480p" },
  { quality: "audio", label: "Audio Only" },
];

export interface QualityOption {
  quality: Quality;
  label: string;
  /** "quality|key", small enough for chat callback payloads */
  callbackData: string;
}

export interface SubmittedLink {
  key: string;
  url: string;
  info: VideoInfo & { duration: string };
  options: QualityOption[];
}

/**
 * Finds the first YouTube link in free text; "https://" is added when the scheme is missing.
 */
export function extractYouTubeUrl(text: string): string | undefined {
  const match = YOUTUBE_REGEX.exec(text);
  if (!match) {
    return undefined;
  }
  const url = match[0];
  return url.startsWith("http") ? url : `https://${url}`;
}

/** Splits "quality|key" back apart. */
export function parseCallbackData(data: string): { quality: string; key: string } | undefined {
  const separator = data.indexOf("|");
  if (separator <= 0 || separator === data.length - 1) {
    return undefined;
  }
  return { quality: data.slice(0, separator), key: data.slice(separator + 1) };
}

export interface LinkServiceDeps {
  engine: ExtractionPort;
  tokens: UrlTokenStore;
  extractionOptions?: ExtractionOptions;
}

export interface LinkService {
  submitLink(text: string): Promise<SubmittedLink>;
}

export function createLinkService(deps: LinkServiceDeps): LinkService {
  return {
    async submitLink(text) {
      const url = extractYouTubeUrl(text);
      if (!url) {
        throw new BadRequestError("Please send a valid YouTube link.");
      }

      const info = await deps.engine.probe(url, deps.extractionOptions);
      const key = deps.tokens.put(url);

      return {
        key,
        url,
        info: {
          ...info,
          duration: info.durationSeconds ? formatDuration(info.durationSeconds) : "Unknown",
        },
        options: QUALITY_OPTIONS.map(({ quality, label }) => ({
          quality,
          label,
          callbackData: `${quality}|${key}`,
        })),
      };
    },
  };
}
