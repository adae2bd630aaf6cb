import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from "vitest";
import { mkdtemp, writeFile } from "fs/promises";
import { z } from "zod";
import type { Server } from "http";
import { once } from "events";
import os from "os";
import path from "path";
import { createApp } from "../src/app.js";
import { createJobExecutor } from "../src/services/business/jobExecutor.js";
import { JobService } from "../src/services/business/jobService.js";
import { createLinkService } from "../src/services/business/linkService.js";
import { UrlTokenStore } from "../src/services/business/tokenStore.js";
import type { ExtractionPort } from "../src/services/external/extractionPort.js";
import { buildDownloadUrl } from "../src/utils/network.js";
import { deferred, type Deferred } from "./helpers/fakeExecutor.js";
import { createFakeEngine, createFakeTranscoder, removeDir } from "./helpers/fakeEngine.js";

const FILES_BASE = "http://files.test";

const createdJobSchema = z.object({ jobId: z.string() });
const jobStatusSchema = z.object({
  status: z.string(),
  downloadUrl: z.string(),
  fileName: z.string(),
  sizeBytes: z.number(),
});

describe("HTTP server", () => {
  let dir: string;
  let server: Server;
  let base: string;
  let jobService: JobService;
  let gate: Deferred<void>;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "video-drop-http-"));
    await writeFile(path.join(dir, "Hello World.mp4"), "hello");

    const fake = createFakeEngine({
      title: "Test Clip",
      streams: [
        { kind: "video", height: 720, vcodec: "avc1.64001F", ext: "mp4" },
        { kind: "audio", acodec: "mp4a.40.2", ext: "m4a" },
        { kind: "muxed", height: 360, vcodec: "avc1.42001E", acodec: "mp4a.40.2", ext: "mp4" },
      ],
    });
    // Downloads wait for the current gate so tests can observe a running job
    const engine: ExtractionPort = {
      probe: fake.engine.probe,
      download: async (request, onProgress, signal) => {
        await gate.promise;
        return fake.engine.download(request, onProgress, signal);
      },
    };

    const tokens = new UrlTokenStore();
    jobService = new JobService({
      executor: createJobExecutor({
        engine,
        transcoder: createFakeTranscoder().transcoder,
        downloadDir: dir,
      }),
      tokens,
      progressIntervalMs: 2000,
      buildDownloadUrl: (fileName) => buildDownloadUrl(FILES_BASE, fileName),
    });

    const app = createApp({
      jobService,
      linkService: createLinkService({ engine, tokens }),
      downloadDir: dir,
      fileBrowserUrl: FILES_BASE,
    });

    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Server did not bind to a TCP port");
    }
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    jobService.cancelAll();
    server.closeAllConnections();
    await new Promise((resolve) => server.close(resolve));
    await removeDir(dir);
  });

  beforeEach(() => {
    gate = deferred<void>();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  function postJson(route: string, body: unknown): Promise<Response> {
    return fetch(`${base}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  describe("file server", () => {
    it("lists downloaded files", async () => {
      const response = await fetch(`${base}/`);

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
      expect(await response.text()).toContain(
        '<li><a href="/download/Hello%20World.mp4">Hello World.mp4</a> (0.0 MB)</li>'
      );
    });

    it("serves a file as an attachment", async () => {
      const response = await fetch(`${base}/download/Hello%20World.mp4`);

      expect(response.status).toBe(200);
      expect(response.headers.get("content-disposition")).toBe(
        "attachment; filename=\"Hello World.mp4\"; filename*=UTF-8''Hello%20World.mp4"
      );
      expect(await response.text()).toBe("hello");
    });

    it("answers 403 for paths outside the download directory", async () => {
      const response = await fetch(`${base}/download/..%2F..%2Fetc%2Fpasswd`);

      expect(response.status).toBe(403);
      expect(await response.text()).toBe("Access denied");
    });

    it("answers 404 for missing and malformed names", async () => {
      const missing = await fetch(`${base}/download/nope.mp4`);
      expect(missing.status).toBe(404);
      expect(await missing.text()).toBe("File not found");

      const malformed = await fetch(`${base}/download/%E0%A4%A`);
      expect(malformed.status).toBe(404);
    });

    it("reports the file browser URL", async () => {
      const response = await fetch(`${base}/api/files`);
      expect(await response.json()).toEqual({ url: FILES_BASE });
    });
  });

  describe("links and jobs", () => {
    it("offers quality choices for a link", async () => {
      const response = await postJson("/api/links", { text: "check youtu.be/abc123" });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        key: "9e97888cce",
        url: "https://youtu.be/abc123",
        info: { title: "Test Clip", duration: "3:25" },
        options: [
          { quality: "best", label: "Best Quality", callbackData: "best|9e97888cce" },
          { quality: "720p", label: "720p", callbackData: "720p|9e97888cce" },
          { quality: "480p", label: "480p", callbackData: "480p|9e97888cce" },
          { quality: "audio", label: "Audio Only", callbackData: "audio|9e97888cce" },
        ],
      });
    });

    it("rejects messages without a link", async () => {
      const response = await postJson("/api/links", { text: "hello there" });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: "Please send a valid YouTube link." });
    });

    it("validates the request body", async () => {
      const response = await postJson("/api/links", {});

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: "Validation failed" });
    });

    it("answers 410 for an unknown key", async () => {
      const response = await postJson("/api/jobs", { key: "0000000000", quality: "best" });

      expect(response.status).toBe(410);
      expect(await response.json()).toMatchObject({ error: "Link expired. Please send the URL again." });
    });

    it("rejects unknown qualities in callback data", async () => {
      const response = await postJson("/api/jobs", { callbackData: "1080p|9e97888cce" });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: "Invalid callback data: 1080p|9e97888cce" });
    });

    it("answers 404 for unknown jobs and 400 for malformed ids", async () => {
      const unknown = await fetch(`${base}/api/jobs/00000000-0000-4000-8000-000000000000`, {
        method: "DELETE",
      });
      expect(unknown.status).toBe(404);

      const malformed = await fetch(`${base}/api/jobs/not-a-uuid`);
      expect(malformed.status).toBe(400);
    });

    it("downloads a link end to end", async () => {
      await postJson("/api/links", { text: "https://youtu.be/abc123" });
      gate.resolve();

      const created = await postJson("/api/jobs", { callbackData: "720p|9e97888cce" });
      const accepted = await created.json();
      expect(created.status).toBe(202);
      expect(accepted).toEqual({
        message: "Download started",
        jobId: expect.any(String),
        status: "running",
        quality: "720p",
      });
      const { jobId } = createdJobSchema.parse(accepted);

      await jobService.waitFor(jobId);

      const status = await fetch(`${base}/api/jobs/${jobId}`);
      const job = jobStatusSchema.parse(await status.json());
      expect(job).toEqual({
        status: "completed",
        downloadUrl: `${FILES_BASE}/download/Test%20Clip.mp4`,
        fileName: "Test Clip.mp4",
        sizeBytes: 17,
      });

      const file = await fetch(`${base}${new URL(job.downloadUrl).pathname}`);
      expect(file.status).toBe(200);
      expect(await file.text()).toBe("video:avc1.64001F");

      const listing = await fetch(`${base}/`);
      expect(await listing.text()).toContain(
        '<li><a href="/download/Test%20Clip.mp4">Test Clip.mp4</a> (0.0 MB)</li>'
      );
    });

    it("streams progress until the job completes", async () => {
      await postJson("/api/links", { text: "https://youtu.be/abc123" });
      const created = await postJson("/api/jobs", { key: "9e97888cce", quality: "best" });
      const { jobId } = createdJobSchema.parse(await created.json());

      const stream = await fetch(`${base}/api/jobs/${jobId}/stream`);
      expect(stream.headers.get("content-type")).toBe("text/event-stream");
      gate.resolve();

      expect(await stream.text()).toBe(
        `data: {"type":"connected","jobId":"${jobId}"}\n\n` +
          'data: {"type":"progress","percent":0,"phase":"downloading","status":"running"}\n\n' +
          'data: {"type":"complete","status":"completed",' +
          `"downloadUrl":"${FILES_BASE}/download/Test%20Clip.mp4","fileName":"Test Clip.mp4","sizeBytes":17}\n\n`
      );
    });

    it("closes the stream at once for a finished job", async () => {
      await postJson("/api/links", { text: "https://youtu.be/abc123" });
      gate.resolve();
      const created = await postJson("/api/jobs", { key: "9e97888cce", quality: "480p" });
      const { jobId } = createdJobSchema.parse(await created.json());
      await jobService.waitFor(jobId);

      const stream = await fetch(`${base}/api/jobs/${jobId}/stream`);
      const lines = (await stream.text()).split("\n\n").filter(Boolean);

      expect(lines).toHaveLength(3);
      expect(lines[1]).toBe(
        'data: {"type":"progress","percent":100,"phase":"done","status":"completed"}'
      );
    });
  });
});
