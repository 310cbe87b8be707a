import { describe, it, expect, beforeEach } from "vitest";
import { JobScheduler } from "../../../src/core/engine/job-scheduler.js";
import type { QueuedJob } from "../../../src/core/engine/session-queue.js";
import { ConflictError } from "../../../src/infra/errors.js";
import { logger } from "../../../src/infra/logger.js";

describe("JobScheduler", () => {
  let admitted: Array<{ sessionId: string; jobId: string }>;
  let blocked: Set<string>;

  const createScheduler = (
    maxConcurrentJobs = 2,
    maxQueuedPerSession = 3,
    onAdmit?: (job: QueuedJob, sessionId: string) => void
  ): JobScheduler =>
    new JobScheduler({
      config: { maxConcurrentJobs, maxQueuedPerSession },
      canAdmit: (sessionId) => !blocked.has(sessionId),
      onAdmit:
        onAdmit ??
        ((job, sessionId) => {
          admitted.push({ sessionId, jobId: job.jobId });
        }),
    });

  beforeEach(() => {
    admitted = [];
    blocked = new Set();
    logger.configure({ level: "error" });
  });

  it("should run one job per session at a time", () => {
    const scheduler = createScheduler(3);
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s1", { jobId: "b", seq: 2 });

    expect(scheduler.pump()).toBe(1);
    expect(admitted).toEqual([{ sessionId: "s1", jobId: "a" }]);
    expect(scheduler.runningJob("s1")).toBe("a");
    expect(scheduler.queuedJobs("s1")).toEqual([{ jobId: "b", seq: 2 }]);

    scheduler.release("s1", "a");

    expect(admitted.map((a) => a.jobId)).toEqual(["a", "b"]);
    expect(scheduler.runningJob("s1")).toBe("b");
  });

  it("should respect the global cap and admit the oldest head first", () => {
    const scheduler = createScheduler(2);
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s2", { jobId: "b", seq: 2 });
    scheduler.enqueue("s3", { jobId: "c", seq: 3 });
    scheduler.enqueue("s1", { jobId: "d", seq: 4 });

    scheduler.pump();
    expect(admitted.map((a) => a.jobId)).toEqual(["a", "b"]);
    expect(scheduler.getStats()).toEqual({ running: 2, queued: 2, maxConcurrent: 2, sessions: 3 });

    // s1 frees a slot; c (seq 3) is older than d (seq 4)
    scheduler.release("s1", "a");
    expect(admitted.map((a) => a.jobId)).toEqual(["a", "b", "c"]);
  });

  it("should skip sessions that cannot admit", () => {
    const scheduler = createScheduler(2);
    blocked.add("s1");
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s2", { jobId: "b", seq: 2 });

    scheduler.pump();
    expect(admitted.map((a) => a.jobId)).toEqual(["b"]);

    blocked.delete("s1");
    scheduler.pump();
    expect(admitted.map((a) => a.jobId)).toEqual(["b", "a"]);
  });

  it("should reject submissions beyond the per-session queue limit", () => {
    const scheduler = createScheduler(1, 2);
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s1", { jobId: "b", seq: 2 });

    expect(scheduler.isFull("s1")).toBe(true);
    expect(() => scheduler.enqueue("s1", { jobId: "c", seq: 3 })).toThrow(ConflictError);
    expect(() => scheduler.enqueue("s1", { jobId: "c", seq: 3 })).toThrow(
      "Session s1 already has 2 queued jobs (limit 2)"
    );
  });

  it("should return queue positions", () => {
    const scheduler = createScheduler(1);
    blocked.add("s1");

    expect(scheduler.enqueue("s1", { jobId: "a", seq: 1 })).toBe(0);
    expect(scheduler.enqueue("s1", { jobId: "b", seq: 2 })).toBe(1);
    expect(scheduler.positionOf("s1", "b")).toBe(1);
    expect(scheduler.positionOf("s1", "zzz")).toBe(-1);
  });

  it("should remove and drain queued jobs", () => {
    const scheduler = createScheduler(1);
    blocked.add("s1");
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s1", { jobId: "b", seq: 2 });
    scheduler.enqueue("s1", { jobId: "c", seq: 3 });

    expect(scheduler.remove("s1", "b")).toBe(true);
    expect(scheduler.remove("s1", "b")).toBe(false);
    expect(scheduler.drainSession("s1").map((j) => j.jobId)).toEqual(["a", "c"]);
    expect(scheduler.getStats().sessions).toBe(0);
  });

  it("should ignore a release from a job that holds no slot", () => {
    const scheduler = createScheduler(1);
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.pump();

    scheduler.release("s1", "other");

    expect(scheduler.getStats().running).toBe(1);
  });

  it("should free the slot when admission throws", () => {
    const scheduler = createScheduler(1, 3, (job) => {
      if (job.jobId === "a") {
        throw new Error("store down");
      }
      admitted.push({ sessionId: "s2", jobId: job.jobId });
    });
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s2", { jobId: "b", seq: 2 });

    expect(scheduler.pump()).toBe(2);
    expect(admitted).toEqual([{ sessionId: "s2", jobId: "b" }]);
    expect(scheduler.getStats().running).toBe(1);
  });

  it("should fold nested pump calls into the current pass", () => {
    let scheduler: JobScheduler | null = null;
    scheduler = createScheduler(2, 3, (job, sessionId) => {
      admitted.push({ sessionId, jobId: job.jobId });
      expect(scheduler?.pump()).toBe(0);
    });
    scheduler.enqueue("s1", { jobId: "a", seq: 1 });
    scheduler.enqueue("s2", { jobId: "b", seq: 2 });

    expect(scheduler.pump()).toBe(2);
    expect(admitted.map((a) => a.jobId)).toEqual(["a", "b"]);
  });
});
