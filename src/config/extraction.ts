/**
 * Extraction Engine Configuration
 * Environment-specific yt-dlp switches, passed through opaquely to the Extraction Port.
 */

import type { ExtractionOptions } from "../services/external/extractionPort.js";

export const extractionOptions: ExtractionOptions = {
  cookiesFromBrowser: process.env.YTDLP_COOKIES_FROM_BROWSER || undefined,
  remoteComponents: process.env.YTDLP_REMOTE_COMPONENTS || undefined,
  extraArgs: process.env.YTDLP_EXTRA_ARGS
    ? process.env.YTDLP_EXTRA_ARGS.split(/\s+/).filter(Boolean)
    : [],
};
