import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import {
  createJobExecutor,
  createProgressShim,
} from "../src/services/business/jobExecutor.js";
import type { ExtractionPort } from "../src/services/external/extractionPort.js";
import type { Phase } from "../src/services/business/types.js";
import {
  DownloadFailedError,
  ExtractionFailedError,
  MissingOutputError,
  TranscodeFailedError,
} from "../src/utils/errors.js";
import {
  createFakeEngine,
  createFakeTranscoder,
  removeDir,
  type FakeStream,
} from "./helpers/fakeEngine.js";

const URL = "https://youtu.be/abc123";

const H264_STREAMS: FakeStream[] = [
  { kind: "video", height: 1080, vcodec: "avc1.640028", ext: "mp4" },
  { kind: "video", height: 720, vcodec: "avc1.64001F", ext: "mp4" },
  { kind: "audio", acodec: "mp4a.40.2", ext: "m4a" },
];

const VP9_STREAMS: FakeStream[] = [
  { kind: "video", height: 720, vcodec: "vp9", ext: "webm" },
  { kind: "audio", acodec: "opus", ext: "webm" },
];

describe("createProgressShim", () => {
  it("reports integer percentages once each, capped at 99", () => {
    const onProgress = vi.fn<(percent: number, phase: Phase) => void>();
    const shim = createProgressShim(onProgress);

    shim({ downloadedBytes: 0, totalBytes: 0 });
    shim({ downloadedBytes: 10, totalBytes: 300 });
    shim({ downloadedBytes: 11, totalBytes: 300 });
    shim({ downloadedBytes: 300, totalBytes: 300 });

    expect(onProgress.mock.calls).toEqual([
      [3, "downloading"],
      [99, "downloading"],
    ]);
  });
});

describe("createJobExecutor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "video-drop-exec-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("downloads H.264 at 720p without re-encoding", async () => {
    const { engine, requests } = createFakeEngine({ title: "Test Clip", streams: H264_STREAMS });
    const { transcoder, reencodeToH264 } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });
    const onProgress = vi.fn<(percent: number, phase: Phase) => void>();

    const artifact = await executor.runVideoJob(URL, "720p", onProgress);

    expect(requests[0].format).toBe(
      "bestvideo[height<=720][vcodec^=avc1]+bestaudio[acodec^=mp4a]/bestvideo[height<=720][vcodec^=avc1]+bestaudio/best[height<=720][vcodec^=avc1]/bestvideo[height<=720]+bestaudio/best[height<=720]/best"
    );
    expect(requests[0].mergeOutputFormat).toBe("mp4");
    expect(requests[0].outputTemplate).toBe(path.join(dir, "%(title)s.%(ext)s"));
    expect(artifact.path).toBe(path.join(dir, "Test Clip.mp4"));
    expect(artifact.fileName).toBe("Test Clip.mp4");
    expect(artifact.sizeBytes).toBe("video:avc1.64001F".length);
    expect(onProgress.mock.calls).toEqual([
      [0, "downloading"],
      [25, "downloading"],
      [50, "downloading"],
      [99, "downloading"],
      [100, "processing"],
    ]);
    expect(reencodeToH264).not.toHaveBeenCalled();
  });

  it("re-encodes a VP9 fallback over the same name", async () => {
    const { engine } = createFakeEngine({ title: "Test Clip", streams: VP9_STREAMS });
    const { transcoder, reencodeToH264 } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    const artifact = await executor.runVideoJob(URL, "720p", () => {});

    const target = path.join(dir, "Test Clip.mp4");
    expect(reencodeToH264).toHaveBeenCalledWith(
      target,
      path.join(dir, ".Test Clip.h264.tmp.mp4"),
      undefined
    );
    expect(artifact.path).toBe(target);
    expect(await readFile(target, "utf8")).toBe("h264<video:vp9>");
    expect(await readdir(dir)).toEqual(["Test Clip.mp4"]);
  });

  it("replaces a .webm original with the re-encoded .mp4", async () => {
    const { engine } = createFakeEngine({
      title: "Test Clip",
      streams: [{ kind: "muxed", height: 720, vcodec: "vp9", acodec: "opus", ext: "webm" }],
    });
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    const artifact = await executor.runVideoJob(URL, "best", () => {});

    expect(artifact.fileName).toBe("Test Clip.mp4");
    expect(await readdir(dir)).toEqual(["Test Clip.mp4"]);
  });

  it("keeps the original untouched when the re-encode fails", async () => {
    const { engine } = createFakeEngine({ title: "Test Clip", streams: VP9_STREAMS });
    const { transcoder } = createFakeTranscoder({
      failWith: new Error("ffmpeg exited with code 1"),
    });
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    const failure = executor.runVideoJob(URL, "720p", () => {});

    await expect(failure).rejects.toBeInstanceOf(TranscodeFailedError);
    await expect(failure).rejects.toThrow(
      "Download failed: re-encode failed: ffmpeg exited with code 1"
    );
    expect(await readFile(path.join(dir, "Test Clip.mp4"), "utf8")).toBe("video:vp9");
    expect(await readdir(dir)).toEqual(["Test Clip.mp4"]);
  });

  it("probes the file when the engine does not report a codec", async () => {
    const { engine } = createFakeEngine({
      title: "Test Clip",
      streams: H264_STREAMS,
      hideCodec: true,
    });
    const { transcoder, probeVideoCodec, reencodeToH264 } = createFakeTranscoder({
      codec: "avc1",
    });
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    await executor.runVideoJob(URL, "best", () => {});

    expect(probeVideoCodec).toHaveBeenCalledWith(path.join(dir, "Test Clip.mp4"));
    expect(reencodeToH264).not.toHaveBeenCalled();
  });

  it("finds the merged .mp4 when the engine reports the pre-merge name", async () => {
    const { engine } = createFakeEngine({
      title: "Test Clip",
      streams: H264_STREAMS,
      reportedFileName: "Test Clip.mkv",
    });
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    const artifact = await executor.runVideoJob(URL, "best", () => {});

    expect(artifact.path).toBe(path.join(dir, "Test Clip.mp4"));
  });

  it("fails with MissingOutputError when nothing was written", async () => {
    const { engine } = createFakeEngine({
      title: "Test Clip",
      streams: H264_STREAMS,
      skipWrite: true,
    });
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    const failure = executor.runVideoJob(URL, "best", () => {});

    await expect(failure).rejects.toBeInstanceOf(MissingOutputError);
    await expect(failure).rejects.toThrow("Download failed: missing output file: Test Clip.mp4");
  });

  it("wraps engine errors as ExtractionFailedError", async () => {
    const { engine } = createFakeEngine({ title: "Test Clip", streams: [] });
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });

    const failure = executor.runVideoJob(URL, "best", () => {});

    await expect(failure).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(failure).rejects.toThrow(
      "Download failed: ERROR: Requested format is not available"
    );
  });

  it("reports a cancelled run as cancelled", async () => {
    const engine: ExtractionPort = {
      probe: async () => ({ title: "x", durationSeconds: 0, uploader: "x" }),
      download: async () => {
        throw new Error("Command was killed with SIGTERM");
      },
    };
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });
    const controller = new AbortController();
    controller.abort();

    const failure = executor.runVideoJob(URL, "best", () => {}, controller.signal);

    await expect(failure).rejects.toBeInstanceOf(DownloadFailedError);
    await expect(failure).rejects.toMatchObject({ reason: "cancelled" });
  });

  it("extracts audio to .mp3 even when the engine reports the source extension", async () => {
    const { engine, requests } = createFakeEngine({
      title: "Test Clip",
      streams: [{ kind: "audio", acodec: "opus", ext: "webm" }],
      reportedFileName: "Test Clip.webm",
    });
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });
    const onProgress = vi.fn<(percent: number, phase: Phase) => void>();

    const artifact = await executor.runAudioJob(URL, onProgress);

    expect(requests[0].format).toBe("bestaudio/best");
    expect(requests[0].extractAudio).toEqual({ codec: "mp3", quality: "192K" });
    expect(artifact.fileName).toBe("Test Clip.mp3");
    expect(onProgress).toHaveBeenLastCalledWith(100, "processing");
  });

  it("fails audio jobs whose .mp3 is missing", async () => {
    const { engine } = createFakeEngine({
      title: "Test Clip",
      streams: [{ kind: "audio", acodec: "opus", ext: "webm" }],
      skipWrite: true,
    });
    const { transcoder } = createFakeTranscoder();
    const executor = createJobExecutor({ engine, transcoder, downloadDir: dir });
    await writeFile(path.join(dir, "Test Clip.webm"), "leftover");

    await expect(executor.runAudioJob(URL, () => {})).rejects.toThrow(
      "Download failed: missing output file: Test Clip.mp3"
    );
  });
});
