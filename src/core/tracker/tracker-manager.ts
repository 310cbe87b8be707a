import type { TrackerConfig } from "../../types/config.js";
import type { SessionEvent } from "../../types/events.js";
import type { Job, JobStatus } from "../../types/job.js";
import type { Session } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { errorMessage } from "../../infra/errors.js";
import type { DisplayAdapter, DisplayHandle, DisplayPayload } from "./display.js";
import { EventBuffer } from "./event-buffer.js";
import { filterEvent } from "./event-filter.js";
import { DisplayRateLimiter } from "./rate-limiter.js";
import { renderTracker } from "./renderer.js";
import {
  applyEvents,
  createTrackerState,
  finalizeState,
  withPaused,
  withStatus,
  type TrackerState,
} from "./tracker-state.js";

export interface TrackerManagerOptions {
  config: TrackerConfig;
  display: DisplayAdapter;
  /** Shared limiter; one is created from config.rateLimit otherwise */
  limiter?: DisplayRateLimiter;
  now?: () => number;
}

interface Tracker {
  state: TrackerState;
  target: string;
  handle: DisplayHandle | null;
  /** Settles once createDisplay has succeeded or failed */
  ready: Promise<void>;
  buffer: EventBuffer;
  /** A regular update is queued and will render the latest state */
  updateQueued: boolean;
}

/**
 * TrackerManager - Owns one live status display per running job
 *
 * Events pass filter → truncate → buffer; each flushed batch is folded into
 * the tracker state, rendered, and pushed through the rate limiter. Display
 * failures are logged and never reach the job.
 */
export class TrackerManager {
  private trackers: Map<string, Tracker> = new Map();
  private readonly limiter: DisplayRateLimiter;
  private readonly now: () => number;

  constructor(private readonly options: TrackerManagerOptions) {
    this.now = options.now ?? Date.now;
    this.limiter = options.limiter ?? new DisplayRateLimiter(options.config.rateLimit, this.now);
  }

  /**
   * Create the tracker and its display. Resolves once the display exists
   * (or failed to be created).
   */
  async start(job: Job, session: Session): Promise<void> {
    if (this.trackers.has(job.id)) {
      return;
    }

    const state = createTrackerState({
      jobId: job.id,
      sessionId: session.id,
      instruction: job.instruction,
      startedAt: job.startedAt?.getTime() ?? this.now(),
    });

    const tracker: Tracker = {
      state,
      target: session.displayTarget,
      handle: null,
      ready: Promise.resolve(),
      buffer: new EventBuffer(this.options.config.buffer, (events) => this.onFlush(job.id, events)),
      updateQueued: false,
    };
    this.trackers.set(job.id, tracker);

    tracker.ready = this.openDisplay(tracker);
    await tracker.ready;
  }

  has(jobId: string): boolean {
    return this.trackers.has(jobId);
  }

  getState(jobId: string): TrackerState | null {
    return this.trackers.get(jobId)?.state ?? null;
  }

  /**
   * Feed one parsed event. Events the filter rejects are dropped here.
   */
  handleEvent(jobId: string, event: SessionEvent): void {
    const tracker = this.trackers.get(jobId);
    if (!tracker) {
      return;
    }
    const accepted = filterEvent(this.options.config.filter, event);
    if (accepted) {
      tracker.buffer.add(accepted);
    }
  }

  /**
   * Reflect an approval wait or resume. Pushed even while paused.
   */
  setStatus(jobId: string, status: JobStatus): void {
    const tracker = this.trackers.get(jobId);
    if (!tracker) {
      return;
    }
    tracker.buffer.flush();
    const next = withStatus(tracker.state, status, this.now());
    if (next !== tracker.state) {
      tracker.state = next;
      this.pushUpdate(tracker);
    }
  }

  pause(jobId: string): boolean {
    return this.setPaused(jobId, true);
  }

  resume(jobId: string): boolean {
    return this.setPaused(jobId, false);
  }

  /**
   * Flush, freeze the final state, and deliver it ahead of any queued
   * updates. The tracker is discarded afterwards.
   */
  async finalize(job: Job): Promise<void> {
    const tracker = this.trackers.get(job.id);
    if (!tracker) {
      return;
    }

    tracker.buffer.flush();
    tracker.buffer.dispose();

    if (job.status === "done" || job.status === "failed" || job.status === "canceled") {
      tracker.state = finalizeState(tracker.state, {
        status: job.status,
        resultSummary: job.resultSummary,
        error: job.error,
        errorType: job.errorType,
        finishedAt: job.finishedAt?.getTime() ?? this.now(),
      });
    }

    this.trackers.delete(job.id);
    await tracker.ready;

    const handle = tracker.handle;
    if (!handle) {
      return;
    }
    const payload = this.render(tracker);
    try {
      await this.limiter.schedule(
        tracker.target,
        handle.id,
        () => this.options.display.finalizeDisplay(handle, payload),
        { final: true }
      );
    } catch (error) {
      logger.warn(`Failed to finalize tracker display for job ${job.id}: ${errorMessage(error)}`);
    }
  }

  /**
   * Drop every tracker without a final update
   */
  dispose(): void {
    for (const tracker of this.trackers.values()) {
      tracker.buffer.dispose();
    }
    this.trackers.clear();
    this.limiter.dispose();
  }

  private setPaused(jobId: string, paused: boolean): boolean {
    const tracker = this.trackers.get(jobId);
    if (!tracker) {
      return false;
    }
    const next = withPaused(tracker.state, paused);
    if (next !== tracker.state) {
      tracker.state = next;
      // Controls change with the pause state
      this.pushUpdate(tracker);
    }
    return true;
  }

  private onFlush(jobId: string, events: SessionEvent[]): void {
    const tracker = this.trackers.get(jobId);
    if (!tracker) {
      return;
    }
    tracker.state = applyEvents(tracker.state, events);

    if (tracker.state.paused && !events.some((event) => event.type === "approval-needed")) {
      return;
    }
    this.pushUpdate(tracker);
  }

  private async openDisplay(tracker: Tracker): Promise<void> {
    const jobId = tracker.state.jobId;
    try {
      tracker.handle = await this.options.display.createDisplay(tracker.target, this.render(tracker));
      logger.debug(`Tracker display created for job ${jobId}`, { target: tracker.target, id: tracker.handle.id });
    } catch (error) {
      logger.warn(`Failed to create tracker display for job ${jobId}: ${errorMessage(error)}`);
    }
  }

  private render(tracker: Tracker): DisplayPayload {
    return renderTracker(tracker.state, this.options.config);
  }

  private pushUpdate(tracker: Tracker): void {
    if (tracker.updateQueued) {
      return;
    }
    tracker.updateQueued = true;
    const jobId = tracker.state.jobId;

    const deliver = async (): Promise<void> => {
      await tracker.ready;
      const handle = tracker.handle;
      if (!handle) {
        tracker.updateQueued = false;
        return;
      }
      const delivered = await this.limiter.schedule(tracker.target, handle.id, () => {
        tracker.updateQueued = false;
        return this.options.display.updateDisplay(handle, this.render(tracker));
      });
      if (!delivered) {
        tracker.updateQueued = false;
      }
    };

    deliver().catch((error: unknown) => {
      logger.warn(`Failed to update tracker display for job ${jobId}: ${errorMessage(error)}`);
    });
  }
}
