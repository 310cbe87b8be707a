import type { EventBufferConfig } from "../../types/config.js";
import { isUrgentEvent, type SessionEvent } from "../../types/events.js";

export type FlushReason = "urgent" | "size" | "interval" | "manual";

export type FlushHandler = (events: SessionEvent[], reason: FlushReason) => void;

/**
 * Accumulates accepted events for one job and hands them to the tracker in
 * batches.
 *
 * Flushes when an approval or result event arrives, when maxEvents are
 * pending, or flushIntervalMs after the previous flush (the timer is armed
 * by the first event of a batch).
 */
export class EventBuffer {
  private pending: SessionEvent[] = [];
  private timer: ReturnType<typeof setTimeout> | undefined;
  private lastFlushAt: number;
  private disposed = false;

  constructor(
    private readonly config: EventBufferConfig,
    private readonly onFlush: FlushHandler
  ) {
    this.lastFlushAt = Date.now();
  }

  add(event: SessionEvent): void {
    if (this.disposed) {
      return;
    }

    this.pending.push(event);

    if (isUrgentEvent(event)) {
      this.flush("urgent");
      return;
    }
    if (this.pending.length >= this.config.maxEvents) {
      this.flush("size");
      return;
    }
    this.armTimer();
  }

  /**
   * Deliver pending events now. No-op when nothing is pending.
   */
  flush(reason: FlushReason = "manual"): void {
    this.clearTimer();
    if (this.pending.length === 0) {
      return;
    }
    const batch = this.pending;
    this.pending = [];
    this.lastFlushAt = Date.now();
    this.onFlush(batch, reason);
  }

  size(): number {
    return this.pending.length;
  }

  /**
   * Stop the timer and drop pending events
   */
  dispose(): void {
    this.clearTimer();
    this.pending = [];
    this.disposed = true;
  }

  private armTimer(): void {
    if (this.timer) {
      return;
    }
    const due = Math.max(0, this.lastFlushAt + this.config.flushIntervalMs - Date.now());
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.flush("interval");
    }, due);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
