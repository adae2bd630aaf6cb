/**
 * Download job domain types.
 */

export const QUALITIES = ["best", "720p", "480p", "audio"] as const;

export type Quality = (typeof QUALITIES)[number];

export type Phase = "downloading" | "processing" | "done";

export interface DownloadRequest {
  readonly url: string;
  readonly quality: Quality;
}

export interface JobProgress {
  percent: number;
  phase: Phase;
}

/** Completed media file under the download root. */
export interface Artifact {
  path: string;
  fileName: string;
  sizeBytes: number;
}

export type ProgressCallback = (percent: number, phase: Phase) => void;

/**
 * Receives throttled progress. May reject; the throttler decides what a
 * rejection means.
 */
export interface ProgressObserver {
  notify(percent: number, phase: Phase): Promise<void>;
}

export type JobStatus = "queued" | "running" | "completed" | "failed" | "cancelled";

export interface Job {
  id: string;
  url: string;
  quality: Quality;
  status: JobStatus;
  progress: JobProgress;
  artifact?: Artifact;
  downloadUrl?: string;
  error?: string;
  callbackUrl?: string;
  createdAt: string;
  updatedAt: string;
}

export function isQuality(value: string): value is Quality {
  return QUALITIES.some((quality) => quality === value);
}
