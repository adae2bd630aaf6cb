/**
 * HTTP Server Entry Point
 * Wires the job lifecycle services together and starts the Express application.
 * Handles graceful shutdown on SIGTERM/SIGINT.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import {
  DOWNLOAD_DIR,
  PORT,
  PROGRESS_INTERVAL_MS,
  PUBLIC_BASE_URL,
  TOKEN_STORE_CAPACITY,
} from "./config/env.js";
import { extractionOptions } from "./config/extraction.js";
import { createJobExecutor } from "./services/business/jobExecutor.js";
import { JobService } from "./services/business/jobService.js";
import { createLinkService } from "./services/business/linkService.js";
import { UrlTokenStore } from "./services/business/tokenStore.js";
import { ffmpegTranscoder } from "./services/external/ffmpeg.js";
import { postWebhook } from "./services/external/webhook.js";
import { createYtDlpEngine } from "./services/external/ytdlp.js";
import { buildDownloadUrl, getServerBaseUrl } from "./utils/network.js";

const baseUrl = getServerBaseUrl(PORT, PUBLIC_BASE_URL);

/** Process-wide link store, owned here and injected where needed. */
const tokens = new UrlTokenStore(TOKEN_STORE_CAPACITY);
const engine = createYtDlpEngine();

const executor = createJobExecutor({
  engine,
  transcoder: ffmpegTranscoder,
  downloadDir: DOWNLOAD_DIR,
  extractionOptions,
});

const jobService = new JobService({
  executor,
  tokens,
  progressIntervalMs: PROGRESS_INTERVAL_MS,
  buildDownloadUrl: (fileName) => buildDownloadUrl(baseUrl, fileName),
  postWebhook,
});

const linkService = createLinkService({ engine, tokens, extractionOptions });

const app = createApp({
  jobService,
  linkService,
  downloadDir: DOWNLOAD_DIR,
  fileBrowserUrl: baseUrl,
});

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

initializeApp(DOWNLOAD_DIR)
  .then(() => {
    server.listen(PORT, "0.0.0.0", () => {
      console.log(`Server running on 0.0.0.0:${PORT}`);
      console.log(`✓ File browser: ${baseUrl}`);
    });
  })
  .catch((error) => {
    console.error("✗ Initialization failed:", error);
    process.exit(1);
  });

/**
 * Cancels running jobs, then closes the server and exits.
 */
function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down...`);
  jobService.cancelAll();
  server.close(() => process.exit(0));
  // SSE streams would otherwise hold close() open
  server.closeAllConnections();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
