/**
 * API Routes
 * Link submission and download job endpoints used by the chat adapter.
 */

import { Router } from "express";
import { createJobController } from "../controllers/jobController.js";
import { createLinkController } from "../controllers/linkController.js";
import { strictLimiter } from "../middlewares/rateLimiting.js";
import {
  createJobSchema,
  jobIdParamsSchema,
  submitLinkSchema,
} from "../middlewares/schemas/jobSchemas.js";
import { validateBody, validateParams } from "../middlewares/validation.js";
import type { JobService } from "../services/business/jobService.js";
import type { LinkService } from "../services/business/linkService.js";

export function createApiRouter(jobService: JobService, linkService: LinkService): Router {
  const apiRouter = Router();
  const jobs = createJobController(jobService);
  const links = createLinkController(linkService);

  /** Detect a link in a message and offer quality choices */
  apiRouter.post("/links", strictLimiter, validateBody(submitLinkSchema), links.submitLink);

  /** Start a download for a stored link */
  apiRouter.post("/jobs", strictLimiter, validateBody(createJobSchema), jobs.createJob);

  apiRouter.get("/jobs", jobs.listJobs);
  apiRouter.get("/jobs/:jobId", validateParams(jobIdParamsSchema), jobs.getJob);
  apiRouter.delete("/jobs/:jobId", validateParams(jobIdParamsSchema), jobs.cancelJob);

  /** SSE progress stream */
  apiRouter.get("/jobs/:jobId/stream", validateParams(jobIdParamsSchema), jobs.streamJob);

  return apiRouter;
}
