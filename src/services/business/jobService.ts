/**
 * Job Service
 * Owns the download-job lifecycle: resolves the link key, starts the executor in the
 * background, wires the progress throttler, and records the outcome.
 *
 * Jobs live in memory only. Subscribers listen on `job:{jobId}` of `events`
 * for progress, completion and failure; `waitFor()` resolves when a job ends.
 */

import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import { LookupExpiredError, NotFoundError } from "../../utils/errors.js";
import { getGenericErrorMessage } from "../../utils/errorMessages.js";
import { LatestValueChannel } from "../../utils/latestValueChannel.js";
import type { WebhookSender } from "../external/webhook.js";
import type { JobExecutor } from "./jobExecutor.js";
import { ProgressThrottler } from "./progressThrottler.js";
import type { UrlTokenStore } from "./tokenStore.js";
import type {
  Artifact,
  Job,
  JobProgress,
  Phase,
  ProgressCallback,
  ProgressObserver,
  Quality,
} from "./types.js";

const MAX_FINISHED_JOBS = 50;

export type JobEvent =
  | { type: "progress"; jobId: string; percent: number; phase: Phase }
  | { type: "completed"; jobId: string; job: Job }
  | { type: "failed"; jobId: string; job: Job };

export interface StartJobInput {
  key: string;
  quality: Quality;
  callbackUrl?: string;
}

export interface JobServiceDeps {
  executor: JobExecutor;
  tokens: UrlTokenStore;
  progressIntervalMs: number;
  buildDownloadUrl: (fileName: string) => string;
  postWebhook?: WebhookSender;
}

export function jobChannel(jobId: string): string {
  return `job:${jobId}`;
}

export function isFinished(job: Job): boolean {
  return job.status === "completed" || job.status === "failed" || job.status === "cancelled";
}

function snapshot(job: Job): Job {
  return {
    ...job,
    progress: { ...job.progress },
    artifact: job.artifact ? { ...job.artifact } : undefined,
  };
}

export class JobService {
  readonly events = new EventEmitter();
  private readonly jobs = new Map<string, Job>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly completions = new Map<string, Promise<Job>>();

  constructor(private readonly deps: JobServiceDeps) {
    // One listener per open SSE stream
    this.events.setMaxListeners(100);
  }

  /**
   * Creates a job for a stored link and starts it in the background.
   * Throws LookupExpiredError when the key is unknown or evicted.
   */
  startJob(input: StartJobInput): Job {
    const url = this.deps.tokens.get(input.key);
    if (!url) {
      throw new LookupExpiredError(input.key);
    }

    const now = new Date().toISOString();
    const job: Job = {
      id: randomUUID(),
      url,
      quality: input.quality,
      status: "queued",
      progress: { percent: 0, phase: "downloading" },
      callbackUrl: input.callbackUrl,
      createdAt: now,
      updatedAt: now,
    };

    this.jobs.set(job.id, job);
    this.pruneFinished();

    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    this.completions.set(job.id, this.run(job, controller.signal));

    console.log(`[job] queued ${job.id} (${job.quality}) for ${url}`);
    return snapshot(job);
  }

  getJob(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job ? snapshot(job) : undefined;
  }

  /** Newest first */
  listJobs(): Job[] {
    return Array.from(this.jobs.values()).reverse().map(snapshot);
  }

  /** Resolves with the final job state; never rejects for a known job. */
  waitFor(jobId: string): Promise<Job> {
    const completion = this.completions.get(jobId);
    if (!completion) {
      return Promise.reject(new NotFoundError("Job", jobId));
    }
    return completion;
  }

  /** Aborts a running job. Finished jobs are returned unchanged. */
  cancelJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError("Job", jobId);
    }
    const controller = this.controllers.get(jobId);
    if (controller && !isFinished(job)) {
      console.log(`[job] cancelling ${jobId}`);
      controller.abort();
    }
    return snapshot(job);
  }

  /** Aborts everything still running; used on shutdown. */
  cancelAll(): void {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
  }

  private async run(job: Job, signal: AbortSignal): Promise<Job> {
    const channel = new LatestValueChannel<JobProgress>({ percent: 0, phase: "downloading" });
    const throttler = new ProgressThrottler(channel, this.createObserver(job), {
      intervalMs: this.deps.progressIntervalMs,
      label: `job ${job.id}`,
    });
    const onProgress: ProgressCallback = (percent, phase) => channel.write({ percent, phase });

    this.update(job, { status: "running" });
    const progressLoop = throttler.start();

    try {
      const artifact = await this.execute(job, onProgress, signal);
      this.update(job, {
        status: "completed",
        artifact,
        downloadUrl: this.deps.buildDownloadUrl(artifact.fileName),
        progress: { percent: 100, phase: "done" },
      });
      console.log(`[job] ✓ ${job.id} ready: ${artifact.fileName} (${artifact.sizeBytes} bytes)`);
    } catch (error) {
      const status = signal.aborted ? "cancelled" : "failed";
      this.update(job, { status, error: getGenericErrorMessage(error) });
      console.error(`[job] ✗ ${job.id} ${status}:`, error);
    } finally {
      throttler.cancel();
      await progressLoop;
      this.controllers.delete(job.id);
    }

    const final = snapshot(job);
    this.emit({
      type: final.status === "completed" ? "completed" : "failed",
      jobId: job.id,
      job: final,
    });
    await this.deliverResult(final);
    return final;
  }

  private execute(job: Job, onProgress: ProgressCallback, signal: AbortSignal): Promise<Artifact> {
    const { quality, url } = job;
    if (quality === "audio") {
      return this.deps.executor.runAudioJob(url, onProgress, signal);
    }
    return this.deps.executor.runVideoJob(url, quality, onProgress, signal);
  }

  /**
   * Throttled progress lands here: job record, SSE subscribers, then the webhook.
   * Webhook errors propagate to the throttler, which owns the best-effort policy.
   */
  private createObserver(job: Job): ProgressObserver {
    return {
      notify: async (percent, phase) => {
        // A publish racing the job's end must not overwrite the final state
        if (isFinished(job)) return;
        this.update(job, { progress: { percent, phase } });
        this.emit({ type: "progress", jobId: job.id, percent, phase });
        if (job.callbackUrl && this.deps.postWebhook) {
          await this.deps.postWebhook(job.callbackUrl, {
            type: "progress",
            jobId: job.id,
            percent,
            phase,
          });
        }
      },
    };
  }

  private async deliverResult(job: Job): Promise<void> {
    if (!job.callbackUrl || !this.deps.postWebhook) {
      return;
    }
    try {
      await this.deps.postWebhook(job.callbackUrl, {
        type: "result",
        jobId: job.id,
        status: job.status,
        downloadUrl: job.downloadUrl,
        fileName: job.artifact?.fileName,
        sizeBytes: job.artifact?.sizeBytes,
        error: job.error,
      });
    } catch (error) {
      console.error(`[job] result webhook for ${job.id} failed:`, error);
    }
  }

  private update(job: Job, patch: Partial<Job>): void {
    Object.assign(job, patch, { updatedAt: new Date().toISOString() });
  }

  private emit(event: JobEvent): void {
    this.events.emit(jobChannel(event.jobId), event);
  }

  private pruneFinished(): void {
    const finished = Array.from(this.jobs.values()).filter(isFinished);
    const excess = finished.length - MAX_FINISHED_JOBS;
    for (const job of finished.slice(0, Math.max(0, excess))) {
      this.jobs.delete(job.id);
      this.completions.delete(job.id);
    }
  }
}
