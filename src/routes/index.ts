/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import type { JobService } from "../services/business/jobService.js";
import type { LinkService } from "../services/business/linkService.js";
import { createApiRouter } from "./jobs.js";
import { createFilesRouter } from "./files.js";
import { createHealthRouter } from "./health.js";

export interface RouterDeps {
  jobService: JobService;
  linkService: LinkService;
  downloadDir: string;
  /** Where the listing page is reachable from other devices */
  fileBrowserUrl: string;
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.downloadDir));
  router.use(createFilesRouter(deps.downloadDir, deps.fileBrowserUrl));
  router.use("/api", createApiRouter(deps.jobService, deps.linkService));

  return router;
}
