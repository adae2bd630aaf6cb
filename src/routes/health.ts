/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import { access, constants } from "fs/promises";

export function createHealthRouter(downloadDir: string): Router {
  const healthRouter = Router();

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Ready once the download directory exists and is writable. */
  healthRouter.get("/ready", async (_req, res) => {
    try {
      await access(downloadDir, constants.W_OK);
      res.json({ ready: true });
    } catch {
      res.status(503).json({ ready: false, reason: "Download directory not writable" });
    }
  });

  return healthRouter;
}
