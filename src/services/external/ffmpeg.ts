/**
 * FFmpeg Service
 * Codec inspection and H.264 re-encoding for downloaded videos.
 */

import ffmpeg from "fluent-ffmpeg";
import { FFMPEG_PATH, FFPROBE_PATH } from "../../config/env.js";
import type { TranscoderPort } from "./extractionPort.js";

if (FFMPEG_PATH) ffmpeg.setFfmpegPath(FFMPEG_PATH);
if (FFPROBE_PATH) ffmpeg.setFfprobePath(FFPROBE_PATH);

/**
 * Helper to promisify FFmpeg command execution.
 * Kills the encoder when the signal aborts.
 */
function ffmpegRun(command: ffmpeg.FfmpegCommand, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("ffmpeg cancelled before start"));
      return;
    }

    const onAbort = () => command.kill("SIGKILL");
    signal?.addEventListener("abort", onAbort, { once: true });

    command
      .on("end", () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      })
      .on("error", (err: Error) => {
        signal?.removeEventListener("abort", onAbort);
        reject(err);
      })
      .run();
  });
}

/**
 * Reads the codec name of the first video stream.
 */
export function probeVideoCodec(filePath: string): Promise<string | undefined> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, metadata) => {
      if (err) return reject(err);
      const video = metadata?.streams?.find((stream) => stream.codec_type === "video");
      resolve(video?.codec_tag_string && video.codec_tag_string !== "[0][0][0][0]"
        ? video.codec_tag_string
        : video?.codec_name);
    });
  });
}

/**
 * Re-encodes to H.264/AAC with the moov atom up front so phones can play it while streaming.
 */
export async function reencodeToH264(
  inputPath: string,
  outputPath: string,
  signal?: AbortSignal
): Promise<void> {
  console.log(`[ffmpeg] re-encoding to H.264: ${inputPath}`);

  const command = ffmpeg(inputPath)
    .videoCodec("libx264")
    .audioCodec("aac")
    .audioBitrate("192k")
    .outputOptions(["-preset", "fast", "-crf", "23", "-movflags", "+faststart"])
    .output(outputPath)
    .outputOptions("-y");

  await ffmpegRun(command, signal);
  console.log(`[ffmpeg] ✓ re-encoded to ${outputPath}`);
}

export const ffmpegTranscoder: TranscoderPort = {
  probeVideoCodec,
  reencodeToH264,
};
