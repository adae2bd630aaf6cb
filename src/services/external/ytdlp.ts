/**
 * yt-dlp Extraction Engine
 * Runs the yt-dlp binary as a subprocess and parses its machine-readable output.
 */

import { execa, ExecaError } from "execa";
import { z } from "zod";
import { YTDLP_PATH } from "../../config/env.js";
import { ExtractionFailedError } from "../../utils/errors.js";
import type {
  ExtractionOptions,
  ExtractionPort,
  ExtractionRequest,
  ExtractionResult,
  RawProgress,
  VideoInfo,
} from "./extractionPort.js";

const PROGRESS_MARKER = "[progress]";
const FILE_MARKER = "[artifact]";
const CODEC_MARKER = "[vcodec]";
const TITLE_MARKER = "[title]";

/** Subset of yt-dlp's --dump-single-json output we rely on */
const infoSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nullish(),
  uploader: z.string().nullish(),
  thumbnail: z.string().nullish(),
});

export type EngineLine =
  | { type: "progress"; progress: RawProgress }
  | { type: "file"; filePath: string }
  | { type: "codec"; vcodec: string }
  | { type: "title"; title: string };

/**
 * Parses one line of yt-dlp output produced by our --progress-template and --print templates.
 * Anything else (warnings, merger chatter) returns undefined.
 */
export function parseEngineLine(line: string): EngineLine | undefined {
  const trimmed = line.trim();

  if (trimmed.startsWith(PROGRESS_MARKER)) {
    const [downloaded, total, estimate] = trimmed.slice(PROGRESS_MARKER.length).split("/");
    const totalBytes = toBytes(total) || toBytes(estimate);
    return {
      type: "progress",
      progress: { downloadedBytes: toBytes(downloaded), totalBytes },
    };
  }
  if (trimmed.startsWith(FILE_MARKER)) {
    return { type: "file", filePath: trimmed.slice(FILE_MARKER.length) };
  }
  if (trimmed.startsWith(CODEC_MARKER)) {
    return { type: "codec", vcodec: trimmed.slice(CODEC_MARKER.length) };
  }
  if (trimmed.startsWith(TITLE_MARKER)) {
    return { type: "title", title: trimmed.slice(TITLE_MARKER.length) };
  }
  return undefined;
}

/** yt-dlp prints "NA" for unknown fields */
function toBytes(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

export function buildOptionArgs(options: ExtractionOptions = {}): string[] {
  const args: string[] = [];
  if (options.cookiesFromBrowser) {
    args.push("--cookies-from-browser", options.cookiesFromBrowser);
  }
  if (options.remoteComponents) {
    args.push("--remote-components", options.remoteComponents);
  }
  if (options.extraArgs) {
    args.push(...options.extraArgs);
  }
  return args;
}

/**
 * Builds the full yt-dlp argument list for a download.
 * The URL always comes last, after "--", so it is never read as a flag.
 */
export function buildDownloadArgs(request: ExtractionRequest): string[] {
  const args = [
    "--no-playlist",
    "--no-warnings",
    "--newline",
    "--progress",
    "--progress-template",
    `download:${PROGRESS_MARKER}%(progress.downloaded_bytes)s/%(progress.total_bytes)s/%(progress.total_bytes_estimate)s`,
    "--print",
    `after_move:${FILE_MARKER}%(filepath)s`,
    "--print",
    `after_move:${CODEC_MARKER}%(vcodec)s`,
    "--print",
    `after_move:${TITLE_MARKER}%(title)s`,
    "--format",
    request.format,
    "--output",
    request.outputTemplate,
  ];

  if (request.mergeOutputFormat) {
    args.push("--merge-output-format", request.mergeOutputFormat);
  }
  if (request.faststart) {
    args.push("--postprocessor-args", "Merger:-movflags +faststart");
  }
  if (request.extractAudio) {
    args.push(
      "--extract-audio",
      "--audio-format",
      request.extractAudio.codec,
      "--audio-quality",
      request.extractAudio.quality
    );
  }

  args.push(...buildOptionArgs(request.options), "--", request.url);
  return args;
}

function describeFailure(error: unknown): string {
  if (error instanceof ExecaError) {
    if (error.isCanceled) {
      return "cancelled";
    }
    const rawStderr: unknown = error.stderr;
    const stderr = typeof rawStderr === "string" ? rawStderr.trim() : "";
    const lastLine = stderr.split("\n").filter(Boolean).pop();
    return lastLine || error.shortMessage;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Creates an Extraction Port backed by the yt-dlp binary.
 */
export function createYtDlpEngine(binaryPath: string = YTDLP_PATH): ExtractionPort {
  return {
    async probe(url: string, options?: ExtractionOptions): Promise<VideoInfo> {
      console.log(`[ytdlp] Fetching metadata for ${url}`);
      try {
        const { stdout } = await execa(binaryPath, [
          "--dump-single-json",
          "--no-playlist",
          "--no-warnings",
          ...buildOptionArgs(options),
          "--",
          url,
        ]);
        const info = infoSchema.parse(JSON.parse(stdout));
        return {
          title: info.title || "Unknown",
          durationSeconds: info.duration ?? 0,
          uploader: info.uploader || "Unknown",
          thumbnail: info.thumbnail ?? undefined,
        };
      } catch (error) {
        const reason = describeFailure(error);
        console.error(`[ytdlp] ✗ Metadata fetch failed: ${reason}`);
        throw new ExtractionFailedError(reason, error);
      }
    },

    async download(
      request: ExtractionRequest,
      onProgress: (progress: RawProgress) => void,
      signal?: AbortSignal
    ): Promise<ExtractionResult> {
      console.log(`[ytdlp] Downloading ${request.url}`);
      console.log(`[ytdlp] Format: ${request.format}`);

      let filePath: string | undefined;
      let vcodec: string | undefined;
      let title = "Unknown";

      try {
        const subprocess = execa(binaryPath, buildDownloadArgs(request), {
          all: true,
          cancelSignal: signal,
        });

        for await (const line of subprocess.iterable({ from: "all" })) {
          const parsed = parseEngineLine(line);
          if (!parsed) continue;

          switch (parsed.type) {
            case "progress":
              onProgress(parsed.progress);
              break;
            case "file":
              filePath = parsed.filePath;
              break;
            case "codec":
              vcodec = parsed.vcodec;
              break;
            case "title":
              title = parsed.title;
              break;
          }
        }

        await subprocess;
      } catch (error) {
        const reason = describeFailure(error);
        console.error(`[ytdlp] ✗ Download failed: ${reason}`);
        throw new ExtractionFailedError(reason, error);
      }

      if (!filePath) {
        throw new ExtractionFailedError("engine did not report an output file");
      }

      console.log(`[ytdlp] ✓ Downloaded ${filePath}`);
      return { filePath, title, vcodec: vcodec && vcodec !== "NA" ? vcodec : undefined };
    },
  };
}
