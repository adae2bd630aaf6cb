/**
 * Progress Stream Service
 *
 * Server-Sent Events for live job progress.
 *
 * ## Flow
 *
 * 1. Job service's throttler publishes to the `job:{jobId}` channel of `JobService.events`
 * 2. The SSE controller calls `streamJobProgress(jobService, jobId, res, signal)`
 * 3. This service writes the current snapshot, then forwards every channel event
 * 4. The stream closes after `completed` / `failed`, or when the client disconnects
 *
 * ## SSE Protocol Format
 *
 * ```
 * data: {"type":"connected","jobId":"..."}\n\n
 * data: {"type":"progress","percent":45,"phase":"downloading"}\n\n
 * data: {"type":"complete","status":"completed","downloadUrl":"http://..."}\n\n
 * ```
 *
 * `events.on()` buffers channel events between writes, so nothing published while a
 * write is in progress is lost.
 */

import { on } from "events";
import type { Response } from "express";
import { isFinished, jobChannel, type JobEvent, type JobService } from "./jobService.js";
import type { Job } from "./types.js";

function writeEvent(res: Response, payload: Record<string, unknown>): void {
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

function writeCompletion(res: Response, job: Job): void {
  writeEvent(res, {
    type: "complete",
    status: job.status,
    downloadUrl: job.downloadUrl,
    fileName: job.artifact?.fileName,
    sizeBytes: job.artifact?.sizeBytes,
    error: job.error,
  });
}

function isJobEvent(value: unknown): value is JobEvent {
  return typeof value === "object" && value !== null && "type" in value && "jobId" in value;
}

/**
 * Streams one job's progress to an SSE response and ends the response when the job ends.
 * Returns early (without ending) when `signal` aborts, i.e. the client went away.
 */
export async function streamJobProgress(
  jobService: JobService,
  jobId: string,
  res: Response,
  signal: AbortSignal
): Promise<void> {
  writeEvent(res, { type: "connected", jobId });

  const job = jobService.getJob(jobId);
  if (!job) {
    writeEvent(res, { type: "error", message: "Job not found" });
    res.end();
    return;
  }

  writeEvent(res, { type: "progress", ...job.progress, status: job.status });

  if (isFinished(job)) {
    writeCompletion(res, job);
    res.end();
    return;
  }

  try {
    for await (const [event] of on(jobService.events, jobChannel(jobId), { signal })) {
      if (!isJobEvent(event)) continue;

      if (event.type === "progress") {
        writeEvent(res, { type: "progress", percent: event.percent, phase: event.phase });
        console.log(`[sse] Sent to job ${jobId}: ${event.percent}% - ${event.phase}`);
        continue;
      }

      writeCompletion(res, event.job);
      res.end();
      console.log(`[sse] Job ${jobId} ${event.job.status}, closing connection`);
      break;
    }
  } catch (error) {
    // ABORT_ERR = client disconnected = normal exit
    if (!(error instanceof Error && "code" in error && error.code === "ABORT_ERR")) {
      throw error;
    }
  }
}
