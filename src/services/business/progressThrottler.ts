/**
 * Progress Throttler
 *
 * Samples the latest progress value on a fixed interval and republishes it to an
 * observer (chat message, SSE subscribers, webhook). Download hooks fire many times a
 * second; observers such as chat message edits are rate-limited, so only one value
 * per interval goes out, and only when it changed.
 *
 * ## Lifecycle
 *
 * 1. `start()` schedules the loop and returns a promise that settles when it stops
 * 2. Every `intervalMs` the loop reads the channel
 * 3. A new percent is published as `downloading`
 * 4. The first terminal value (percent >= 100 or phase `done`) is published once and the loop ends
 * 5. `cancel()` stops the loop at the next wake; calling it again is a no-op
 *
 * Observer failures are logged and swallowed: progress is best-effort and never aborts
 * the job. An `ObserverUnreachableError` stops the loop instead, since nobody is listening.
 * A publish still in flight when the loop is cancelled is left to finish on its own.
 */

import { ObserverUnreachableError } from "../../utils/errors.js";
import type { LatestValueChannel } from "../../utils/latestValueChannel.js";
import type { JobProgress, ProgressObserver } from "./types.js";

export interface ProgressThrottlerOptions {
  intervalMs: number;
  /** Used in log lines */
  label?: string;
  /** Aborting it has the same effect as cancel() */
  signal?: AbortSignal;
}

/** Resolves after `ms` or as soon as the signal aborts. */
function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

export class ProgressThrottler {
  private readonly controller = new AbortController();
  private readonly stopped = new Promise<void>((resolve) => {
    this.controller.signal.addEventListener("abort", () => resolve(), { once: true });
  });
  private lastShown = -1;
  private loop: Promise<void> | undefined;

  constructor(
    private readonly source: LatestValueChannel<JobProgress>,
    private readonly observer: ProgressObserver,
    private readonly options: ProgressThrottlerOptions
  ) {
    options.signal?.addEventListener("abort", () => this.cancel(), { once: true });
  }

  /** Starts the loop once; later calls return the same promise. */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  cancel(): void {
    this.controller.abort();
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    if (this.options.signal?.aborted) {
      this.cancel();
    }

    while (!signal.aborted) {
      await wait(this.options.intervalMs, signal);
      if (signal.aborted) break;

      const { percent, phase } = this.source.read();
      const terminal = percent >= 100 || phase === "done";

      if (terminal) {
        await this.publish(percent, phase === "done" ? "done" : "processing");
        this.cancel();
        break;
      }

      if (percent !== this.lastShown) {
        await this.publish(percent, "downloading");
      }
    }
  }

  private async publish(percent: number, phase: JobProgress["phase"]): Promise<void> {
    this.lastShown = percent;
    const delivery = this.observer
      .notify(percent, phase)
      .catch((error: unknown) => this.handleFailure(error));
    await Promise.race([delivery, this.stopped]);
  }

  private handleFailure(error: unknown): void {
    if (error instanceof ObserverUnreachableError) {
      console.warn(`[throttler] ${this.tag()}observer gone, stopping progress updates: ${error.message}`);
      this.cancel();
      return;
    }
    console.warn(`[throttler] ${this.tag()}progress publish failed (ignored):`, error);
  }

  private tag(): string {
    return this.options.label ? `${this.options.label}: ` : "";
  }
}
