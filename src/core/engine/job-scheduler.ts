import type { SchedulerConfig } from "../../types/config.js";
import { logger } from "../../infra/logger.js";
import { ConflictError, errorMessage } from "../../infra/errors.js";
import { Semaphore } from "../../infra/semaphore.js";
import { SessionQueue, type QueuedJob } from "./session-queue.js";

export interface JobSchedulerOptions {
  config: SchedulerConfig;
  /**
   * Whether a session may take a job now (the orchestrator reports its
   * session state)
   */
  canAdmit: (sessionId: string) => boolean;
  /**
   * Start an admitted job. Called synchronously inside the admission pass;
   * the job holds a slot until release() is called for it.
   */
  onAdmit: (job: QueuedJob, sessionId: string) => void;
}

export interface SchedulerStats {
  running: number;
  queued: number;
  maxConcurrent: number;
  sessions: number;
}

/**
 * JobScheduler - Per-session FIFO queues under a global concurrency cap
 *
 * Provides:
 * - One running job per session, any number queued behind it
 * - A global cap on running jobs across sessions
 * - Fair admission: among admissible session heads the oldest submission
 *   goes first
 *
 * pump() is the only place work is admitted. Calls made while a pass is in
 * progress (from onAdmit, for example) are folded into one more pass.
 */
export class JobScheduler {
  private readonly queues: Map<string, SessionQueue> = new Map();
  private readonly running: Map<string, string> = new Map();
  private readonly slots: Semaphore;
  private pumping = false;
  private pumpRequested = false;

  constructor(private readonly options: JobSchedulerOptions) {
    this.slots = new Semaphore(options.config.maxConcurrentJobs);
  }

  /**
   * Append a job to its session queue.
   *
   * @returns 0-based position among the session's queued jobs
   */
  enqueue(sessionId: string, job: QueuedJob): number {
    const queue = this.getQueue(sessionId);
    const limit = this.options.config.maxQueuedPerSession;
    if (queue.size() >= limit) {
      throw new ConflictError(
        `Session ${sessionId} already has ${queue.size()} queued jobs (limit ${limit})`,
        "SESSION_BUSY_OVERFLOW"
      );
    }
    queue.enqueue(job);
    logger.debug(`Queued job ${job.jobId} in session ${sessionId} (position ${queue.size() - 1})`);
    return queue.size() - 1;
  }

  /**
   * Whether the session queue is full
   */
  isFull(sessionId: string): boolean {
    return (this.queues.get(sessionId)?.size() ?? 0) >= this.options.config.maxQueuedPerSession;
  }

  /**
   * Remove a queued job. Returns false when it is not queued.
   */
  remove(sessionId: string, jobId: string): boolean {
    const queue = this.queues.get(sessionId);
    if (!queue?.remove(jobId)) {
      return false;
    }
    this.dropIfIdle(sessionId);
    return true;
  }

  /**
   * Remove and return every queued job of a session
   */
  drainSession(sessionId: string): QueuedJob[] {
    const queue = this.queues.get(sessionId);
    if (!queue) {
      return [];
    }
    const drained = queue.drain();
    this.dropIfIdle(sessionId);
    return drained;
  }

  positionOf(sessionId: string, jobId: string): number {
    return this.queues.get(sessionId)?.positionOf(jobId) ?? -1;
  }

  queuedJobs(sessionId: string): QueuedJob[] {
    return this.queues.get(sessionId)?.list() ?? [];
  }

  runningJob(sessionId: string): string | null {
    return this.running.get(sessionId) ?? null;
  }

  /**
   * Give back the slot held by a finished job and admit more work
   */
  release(sessionId: string, jobId: string): void {
    if (this.running.get(sessionId) !== jobId) {
      logger.debug(`Release ignored: job ${jobId} does not hold session ${sessionId}`);
      return;
    }
    this.running.delete(sessionId);
    this.slots.release();
    this.dropIfIdle(sessionId);
    this.pump();
  }

  /**
   * Admit jobs while slots are free. Returns the number admitted.
   */
  pump(): number {
    if (this.pumping) {
      this.pumpRequested = true;
      return 0;
    }

    this.pumping = true;
    let admitted = 0;
    try {
      do {
        this.pumpRequested = false;
        admitted += this.admitAll();
      } while (this.pumpRequested);
    } finally {
      this.pumping = false;
    }
    return admitted;
  }

  getStats(): SchedulerStats {
    let queued = 0;
    for (const queue of this.queues.values()) {
      queued += queue.size();
    }
    return {
      running: this.slots.acquired(),
      queued,
      maxConcurrent: this.slots.getMax(),
      sessions: this.queues.size,
    };
  }

  private admitAll(): number {
    let admitted = 0;
    while (this.slots.available() > 0) {
      const next = this.pickNext();
      if (!next) {
        break;
      }
      const [sessionId, queue] = next;
      const job = queue.shift();
      if (!job || !this.slots.tryAcquire()) {
        break;
      }
      this.running.set(sessionId, job.jobId);
      admitted++;
      logger.debug(`Admitted job ${job.jobId} in session ${sessionId}`, {
        running: this.slots.acquired(),
        max: this.slots.getMax(),
      });

      try {
        this.options.onAdmit(job, sessionId);
      } catch (error) {
        // Admission failed before the job started; free the slot
        logger.error(`Failed to start job ${job.jobId}: ${errorMessage(error)}`, error);
        this.running.delete(sessionId);
        this.slots.release();
      }
    }
    return admitted;
  }

  /**
   * Lowest-seq head among sessions that are free and admissible
   */
  private pickNext(): [string, SessionQueue] | null {
    let best: [string, SessionQueue] | null = null;
    let bestSeq = Number.POSITIVE_INFINITY;

    for (const [sessionId, queue] of this.queues) {
      const head = queue.peek();
      if (!head || this.running.has(sessionId) || !this.options.canAdmit(sessionId)) {
        continue;
      }
      if (head.seq < bestSeq) {
        best = [sessionId, queue];
        bestSeq = head.seq;
      }
    }
    return best;
  }

  private getQueue(sessionId: string): SessionQueue {
    let queue = this.queues.get(sessionId);
    if (!queue) {
      queue = new SessionQueue(sessionId);
      this.queues.set(sessionId, queue);
    }
    return queue;
  }

  private dropIfIdle(sessionId: string): void {
    const queue = this.queues.get(sessionId);
    if (queue?.isEmpty() && !this.running.has(sessionId)) {
      this.queues.delete(sessionId);
    }
  }
}
