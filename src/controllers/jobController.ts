/**
 * Job Controller
 * Handles HTTP requests for download jobs: creation, status, cancellation, progress stream.
 */

import type { Request, Response, NextFunction } from "express";
import type { CreateJobBody } from "../middlewares/schemas/jobSchemas.js";
import type { JobService } from "../services/business/jobService.js";
import { parseCallbackData } from "../services/business/linkService.js";
import { streamJobProgress } from "../services/business/progressStreamService.js";
import { isQuality, type Job, type Quality } from "../services/business/types.js";
import { BadRequestError, NotFoundError } from "../utils/errors.js";

function toResponse(job: Job) {
  return {
    jobId: job.id,
    url: job.url,
    quality: job.quality,
    status: job.status,
    progress: job.progress,
    downloadUrl: job.downloadUrl,
    fileName: job.artifact?.fileName,
    sizeBytes: job.artifact?.sizeBytes,
    error: job.error,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
}

function resolveSelection(body: CreateJobBody): { key: string; quality: Quality } {
  if ("key" in body) {
    return { key: body.key, quality: body.quality };
  }
  const parsed = parseCallbackData(body.callbackData);
  if (!parsed || !isQuality(parsed.quality)) {
    throw new BadRequestError(`Invalid callback data: ${body.callbackData}`);
  }
  return { key: parsed.key, quality: parsed.quality };
}

export function createJobController(jobService: JobService) {
  return {
    /**
     * POST /api/jobs
     * Starts a download job for a previously submitted link
     */
    createJob(req: Request, res: Response, next: NextFunction): void {
      try {
        const body: CreateJobBody = req.body;
        const selection = resolveSelection(body);
        const job = jobService.startJob({ ...selection, callbackUrl: body.callbackUrl });

        res.status(202).json({
          message: "Download started",
          jobId: job.id,
          status: job.status,
          quality: job.quality,
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/jobs
     * Recent jobs, newest first
     */
    listJobs(_req: Request, res: Response): void {
      res.status(200).json({ jobs: jobService.listJobs().map(toResponse) });
    },

    /**
     * GET /api/jobs/:jobId
     */
    getJob(req: Request<{ jobId: string }>, res: Response, next: NextFunction): void {
      try {
        const job = jobService.getJob(req.params.jobId);
        if (!job) {
          throw new NotFoundError("Job", req.params.jobId);
        }
        res.status(200).json(toResponse(job));
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /api/jobs/:jobId
     */
    cancelJob(req: Request<{ jobId: string }>, res: Response, next: NextFunction): void {
      try {
        const job = jobService.cancelJob(req.params.jobId);
        res.status(200).json({ jobId: job.id, status: job.status });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/jobs/:jobId/stream
     * SSE endpoint for job progress
     */
    async streamJob(req: Request<{ jobId: string }>, res: Response): Promise<void> {
      const { jobId } = req.params;
      console.log(`[sse] Client connected for job ${jobId}`);

      res.setHeader("Content-Type", "text/event-stream");
      res.setHeader("Cache-Control", "no-cache");
      res.setHeader("Connection", "keep-alive");
      res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
      res.flushHeaders();

      const disconnect = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) {
          console.log(`[sse] Client disconnected from job ${jobId}`);
        }
        disconnect.abort();
      });

      try {
        await streamJobProgress(jobService, jobId, res, disconnect.signal);
      } catch (error) {
        console.error(`[sse] Error streaming job ${jobId}:`, error);
        res.write(`data: ${JSON.stringify({ type: "error", message: "Stream error" })}\n\n`);
        res.end();
      }
    },
  };
}
