/**
 * Job Executor
 * Runs one fetch (+ optional H.264 re-encode) job through the Extraction Port.
 * Reports progress through a callback; the result is the finished artifact.
 */

import { rename, rm, stat } from "fs/promises";
import path from "path";
import {
  DownloadFailedError,
  ExtractionFailedError,
  MissingOutputError,
  TranscodeFailedError,
} from "../../utils/errors.js";
import type {
  ExtractionOptions,
  ExtractionPort,
  RawProgress,
  TranscoderPort,
} from "../external/extractionPort.js";
import { reencodeTempName } from "./fileServerService.js";
import { AUDIO_SELECTOR, buildFormatSelector, isPreferredVideoCodec } from "./formatSelectors.js";
import type { Artifact, ProgressCallback, Quality } from "./types.js";

const OUTPUT_TEMPLATE = "%(title)s.%(ext)s";
const AUDIO_CODEC = "mp3";
const AUDIO_QUALITY = "192K";

export interface JobExecutorDeps {
  engine: ExtractionPort;
  transcoder: TranscoderPort;
  downloadDir: string;
  extractionOptions?: ExtractionOptions;
}

export interface JobExecutor {
  runVideoJob(
    url: string,
    quality: Exclude<Quality, "audio">,
    onProgress: ProgressCallback,
    signal?: AbortSignal
  ): Promise<Artifact>;
  runAudioJob(url: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<Artifact>;
}

/**
 * Converts raw byte counts into integer percentages, reporting only changes.
 * Capped at 99: 100 means the engine has finished, which only the executor knows.
 */
export function createProgressShim(onProgress: ProgressCallback): (raw: RawProgress) => void {
  let lastPercent = -1;
  return ({ downloadedBytes, totalBytes }) => {
    if (totalBytes <= 0) return;
    const percent = Math.min(99, Math.floor((downloadedBytes / totalBytes) * 100));
    if (percent !== lastPercent) {
      lastPercent = percent;
      onProgress(percent, "downloading");
    }
  };
}

function withExtension(filePath: string, ext: string): string {
  const { dir, name } = path.parse(filePath);
  return path.join(dir, `${name}${ext}`);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function toArtifact(filePath: string): Promise<Artifact> {
  const { size } = await stat(filePath);
  return { path: filePath, fileName: path.basename(filePath), sizeBytes: size };
}

function asDownloadFailure(error: unknown, signal?: AbortSignal): DownloadFailedError {
  if (error instanceof DownloadFailedError) {
    return error;
  }
  if (signal?.aborted) {
    return new DownloadFailedError("cancelled", error);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ExtractionFailedError(reason, error);
}

export function createJobExecutor(deps: JobExecutorDeps): JobExecutor {
  const { engine, transcoder, downloadDir, extractionOptions } = deps;
  const outputTemplate = path.join(downloadDir, OUTPUT_TEMPLATE);

  /**
   * The engine may report the pre-merge name; merged output always lands as .mp4.
   */
  async function locateVideoOutput(reportedPath: string): Promise<string> {
    if (await isFile(reportedPath)) {
      return reportedPath;
    }
    const mp4Path = withExtension(reportedPath, ".mp4");
    if (await isFile(mp4Path)) {
      return mp4Path;
    }
    throw new MissingOutputError(`missing output file: ${path.basename(reportedPath)}`);
  }

  /**
   * Re-encodes anything that is not H.264 into a side-by-side temp file, then renames it
   * over the canonical .mp4 name. A failed encode leaves the original untouched.
   */
  async function ensureH264(
    filePath: string,
    reportedCodec: string | undefined,
    signal?: AbortSignal
  ): Promise<string> {
    let vcodec = reportedCodec;
    if (!vcodec) {
      try {
        vcodec = await transcoder.probeVideoCodec(filePath);
      } catch (error) {
        throw new TranscodeFailedError(`could not inspect ${path.basename(filePath)}`, error);
      }
    }

    if (!vcodec || vcodec === "none" || isPreferredVideoCodec(vcodec)) {
      return filePath;
    }

    console.log(`[job] ${path.basename(filePath)} is ${vcodec}, converting to H.264`);

    const canonicalPath = withExtension(filePath, ".mp4");
    const { dir, name } = path.parse(filePath);
    const tempPath = path.join(dir, reencodeTempName(name));

    try {
      await transcoder.reencodeToH264(filePath, tempPath, signal);
      await rename(tempPath, canonicalPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      const reason = signal?.aborted
        ? "cancelled"
        : `re-encode failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new TranscodeFailedError(reason, error);
    }

    if (canonicalPath !== filePath) {
      await rm(filePath, { force: true });
    }
    return canonicalPath;
  }

  return {
    async runVideoJob(url, quality, onProgress, signal) {
      const format = buildFormatSelector(quality);
      try {
        const result = await engine.download(
          {
            url,
            format,
            outputTemplate,
            mergeOutputFormat: "mp4",
            faststart: true,
            options: extractionOptions,
          },
          createProgressShim(onProgress),
          signal
        );
        onProgress(100, "processing");

        const downloaded = await locateVideoOutput(result.filePath);
        const finalPath = await ensureH264(downloaded, result.vcodec, signal);
        return await toArtifact(finalPath);
      } catch (error) {
        throw asDownloadFailure(error, signal);
      }
    },

    async runAudioJob(url, onProgress, signal) {
      try {
        const result = await engine.download(
          {
            url,
            format: AUDIO_SELECTOR,
            outputTemplate,
            extractAudio: { codec: AUDIO_CODEC, quality: AUDIO_QUALITY },
            options: extractionOptions,
          },
          createProgressShim(onProgress),
          signal
        );
        onProgress(100, "processing");

        const audioPath = withExtension(result.filePath, `.${AUDIO_CODEC}`);
        if (!(await isFile(audioPath))) {
          throw new MissingOutputError(`missing output file: ${path.basename(audioPath)}`);
        }
        return await toArtifact(audioPath);
      } catch (error) {
        throw asDownloadFailure(error, signal);
      }
    },
  };
}
