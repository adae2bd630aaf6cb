/**
 * Error Message Utility
 * Converts technical errors into user-friendly messages
 */

import {
  DownloadFailedError,
  LookupExpiredError,
  MissingOutputError,
  TranscodeFailedError,
} from "./errors.js";

/**
 * Converts technical error to generic user-friendly message
 */
export function getGenericErrorMessage(error: unknown): string {
  if (error instanceof LookupExpiredError) {
    return error.message;
  }
  if (error instanceof TranscodeFailedError) {
    return 'Conversion to H.264 failed';
  }
  if (error instanceof MissingOutputError) {
    return 'Downloaded file is missing';
  }

  // Match on the engine's reason only, not the "Download failed:" wrapper
  const errorStr = (error instanceof DownloadFailedError ? error.reason : String(error)).toLowerCase();

  if (errorStr.includes('cancelled') || errorStr.includes('aborted')) {
    return 'Download cancelled';
  }

  // Source errors
  if (errorStr.includes('unavailable') || errorStr.includes('not available') || errorStr.includes('404')) {
    return 'Video unavailable';
  }
  if (errorStr.includes('private') || errorStr.includes('403')) {
    return 'Video is private';
  }
  if (errorStr.includes('sign in') || errorStr.includes('age-restricted')) {
    return 'Video requires sign-in';
  }
  if (errorStr.includes('copyright') || errorStr.includes('blocked')) {
    return 'Video blocked';
  }
  if (errorStr.includes('timeout') || errorStr.includes('timed out')) {
    return 'Download timeout';
  }

  // Processing errors
  if (errorStr.includes('ffmpeg') || errorStr.includes('convert')) {
    return 'Media processing failed';
  }
  if (errorStr.includes('file not found') || errorStr.includes('missing output')) {
    return 'Downloaded file is missing';
  }
  if (errorStr.includes('yt-dlp') || errorStr.includes('download')) {
    return 'Download failed';
  }

  if (error instanceof DownloadFailedError) {
    return 'Download failed';
  }

  // Generic fallback
  return 'Processing failed';
}
