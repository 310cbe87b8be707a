import { logger } from "./logger.js";

export interface WatchdogContext {
  /** Type of operation being watched */
  operationType: string;
  /** When the watchdog was armed */
  startedAt: Date;
  /** Optional metadata about the operation */
  metadata: Record<string, unknown> | undefined;
}

export interface WatchdogOptions {
  /** Deadline in milliseconds from start */
  timeoutMs: number;
  /** Invoked once when the deadline passes */
  onTimeout: (context: WatchdogContext) => void;
}

/**
 * Single-shot deadline timer
 *
 * Arms a timer for a fixed deadline measured from start() and invokes the
 * callback at most once. Used for job execution deadlines and approval
 * expiry.
 *
 * Usage:
 * ```typescript
 * const watchdog = new Watchdog("job-deadline", {
 *   timeoutMs: 3_600_000,
 *   onTimeout: () => executor.terminate(jobId, "timeout"),
 * });
 *
 * watchdog.start({ jobId });
 * // ...
 * watchdog.stop();
 * ```
 */
export class Watchdog {
  private timer: ReturnType<typeof setTimeout> | undefined;
  private context: WatchdogContext | undefined;
  private running = false;
  private hasFired = false;
  private readonly options: WatchdogOptions;

  constructor(
    private readonly operationType: string,
    options: WatchdogOptions
  ) {
    this.options = options;
  }

  /**
   * Arm the timer
   *
   * @param metadata - Optional metadata to include in context
   */
  start(metadata?: Record<string, unknown>): void {
    if (this.running) {
      logger.warn(`Watchdog for ${this.operationType} already running, resetting`);
      this.stop();
    }

    this.context = {
      operationType: this.operationType,
      startedAt: new Date(),
      metadata,
    };
    this.running = true;
    this.hasFired = false;

    this.timer = setTimeout(() => this.fire(), this.options.timeoutMs);

    logger.debug(`Watchdog started for ${this.operationType}`, {
      timeoutMs: this.options.timeoutMs,
      metadata,
    });
  }

  /**
   * Disarm the timer. Safe to call repeatedly.
   */
  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Whether the deadline passed while armed
   */
  fired(): boolean {
    return this.hasFired;
  }

  getElapsedMs(): number {
    if (!this.context) {
      return 0;
    }
    return Date.now() - this.context.startedAt.getTime();
  }

  getRemainingMs(): number {
    if (!this.running) {
      return 0;
    }
    return Math.max(0, this.options.timeoutMs - this.getElapsedMs());
  }

  private fire(): void {
    if (!this.running || !this.context) {
      return;
    }

    this.timer = undefined;
    this.running = false;
    this.hasFired = true;

    logger.warn(`Watchdog timeout for ${this.operationType}`, {
      elapsedMs: this.getElapsedMs(),
      timeoutMs: this.options.timeoutMs,
      metadata: this.context.metadata,
    });

    this.options.onTimeout({ ...this.context });
  }
}

/**
 * Deadline for one agent run
 */
export function createJobDeadlineWatchdog(
  onTimeout: (context: WatchdogContext) => void,
  timeoutMs: number
): Watchdog {
  return new Watchdog("job-deadline", { timeoutMs, onTimeout });
}

/**
 * Expiry timer for one pending approval request
 */
export function createApprovalExpiryWatchdog(
  onTimeout: (context: WatchdogContext) => void,
  timeoutMs: number
): Watchdog {
  return new Watchdog("approval-expiry", { timeoutMs, onTimeout });
}
