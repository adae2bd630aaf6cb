/**
 * Webhook Client
 * Delivers job progress and results to a caller-supplied URL (e.g. a chat bot adapter).
 */

import { ObserverUnreachableError } from "../../utils/errors.js";

export type WebhookPayload =
  | { type: "progress"; jobId: string; percent: number; phase: string }
  | {
      type: "result";
      jobId: string;
      status: string;
      downloadUrl?: string;
      fileName?: string;
      sizeBytes?: number;
      error?: string;
    };

export type WebhookSender = (url: string, payload: WebhookPayload) => Promise<void>;

const WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * POSTs the payload as JSON.
 * 404/410 mean the receiver has gone away (deleted message, closed chat).
 */
export const postWebhook: WebhookSender = async (url, payload) => {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
  });

  if (response.status === 404 || response.status === 410) {
    throw new ObserverUnreachableError(`Webhook ${url} answered ${response.status}`);
  }
  if (!response.ok) {
    throw new Error(`Webhook ${url} failed: ${response.status} ${response.statusText}`);
  }
};
