import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TrackerManager } from "../../../src/core/tracker/tracker-manager.js";
import type { DisplayAdapter } from "../../../src/core/tracker/display.js";
import type { StateManager } from "../../../src/core/state/state-manager.js";
import { TrackerConfigSchema } from "../../../src/types/config.js";
import type { Job } from "../../../src/types/job.js";
import type { Session } from "../../../src/types/session.js";
import { logger } from "../../../src/infra/logger.js";
import { RecordingDisplay, createTestEnvironment, flush, testEvents, testWorkspace } from "../../helpers.js";

describe("TrackerManager", () => {
  let store: StateManager;
  let cleanup: () => void;
  let display: RecordingDisplay;
  let manager: TrackerManager;
  let session: Session;
  let job: Job;

  const config = TrackerConfigSchema.parse({
    buffer: { maxEvents: 1 },
    rateLimit: { minIntervalMs: 0, burstLimit: 100 },
  });

  beforeEach(() => {
    ({ store, cleanup } = createTestEnvironment());
    logger.configure({ level: "error" });
    display = new RecordingDisplay();
    manager = new TrackerManager({ config, display });
    session = store.createSession({ id: "s1", workspace: testWorkspace("s1"), displayTarget: "chat-1" });
    const queued = store.createJob({ sessionId: "s1", instruction: "fix the build" });
    job = store.transitionJob(queued.id, "running", "Started", { startedAt: new Date(0) });
  });

  afterEach(() => {
    manager.dispose();
    cleanup();
  });

  it("should create one display per job", async () => {
    await manager.start(job, session);
    await manager.start(job, session);

    expect(display.calls).toHaveLength(1);
    expect(display.calls[0]).toMatchObject({ kind: "create", handle: { target: "chat-1", id: "msg-1" } });
    expect(display.calls[0]?.payload.text.split("\n")[0]).toBe(`🔧 Job ${job.id} • s1`);
    expect(manager.has(job.id)).toBe(true);
  });

  it("should push accepted events to the display", async () => {
    await manager.start(job, session);

    manager.handleEvent(job.id, testEvents.speech("Looking around"));
    await flush();

    expect(display.last()).toMatchObject({ kind: "update", handle: { id: "msg-1" } });
    expect(display.last()?.payload.text).toContain("💬 Looking around");
    expect(manager.getState(job.id)?.totalEvents).toBe(1);
  });

  it("should drop events the filter rejects", async () => {
    await manager.start(job, session);

    manager.handleEvent(job.id, testEvents.thinking("hmm"));
    await flush();

    expect(display.calls).toHaveLength(1);
    expect(manager.getState(job.id)?.totalEvents).toBe(0);
  });

  it("should coalesce updates queued before delivery", async () => {
    await manager.start(job, session);

    manager.handleEvent(job.id, testEvents.speech("first"));
    manager.handleEvent(job.id, testEvents.speech("second"));
    await flush();

    const updates = display.calls.filter((call) => call.kind === "update");
    expect(updates).toHaveLength(1);
    expect(updates[0]?.payload.text).toContain("💬 first\n💬 second");
  });

  it("should hold updates while paused except for approvals", async () => {
    await manager.start(job, session);

    expect(manager.pause(job.id)).toBe(true);
    await flush();
    expect(display.last()?.payload.controls[0]?.token).toBe(`resume:${job.id}`);
    const callsWhilePaused = display.calls.length;

    manager.handleEvent(job.id, testEvents.speech("quiet"));
    await flush();
    expect(display.calls).toHaveLength(callsWhilePaused);
    expect(manager.getState(job.id)?.totalEvents).toBe(1);

    manager.handleEvent(job.id, testEvents.approval("Bash", { command: "git push" }));
    await flush();
    expect(display.calls).toHaveLength(callsWhilePaused + 1);
    expect(display.last()?.payload.text).toContain("⏸️ Waiting for approval: 🔨 Bash");

    expect(manager.resume(job.id)).toBe(true);
    await flush();
    expect(display.last()?.payload.controls[0]?.token).toBe(`pause:${job.id}`);
  });

  it("should show the approval controls while waiting", async () => {
    await manager.start(job, session);

    manager.setStatus(job.id, "waiting_approval");
    await flush();

    expect(display.last()?.payload.controls.map((control) => control.token)).toEqual([
      `approve:${job.id}`,
      `deny:${job.id}`,
      `cancel:${job.id}`,
    ]);
  });

  it("should finalize with the job outcome and forget the tracker", async () => {
    await manager.start(job, session);
    manager.handleEvent(job.id, testEvents.speech("working"));

    const done = store.transitionJob(job.id, "done", "Agent finished", {
      finishedAt: new Date(5000),
      resultSummary: "Fixed",
    });
    await manager.finalize(done);
    await flush();

    expect(display.last()).toMatchObject({ kind: "finalize", handle: { id: "msg-1" } });
    expect(display.last()?.payload.text.endsWith("⏱️ 5s • 🔄 1\n\n✅ Done\nFixed")).toBe(true);
    expect(manager.has(job.id)).toBe(false);

    manager.handleEvent(job.id, testEvents.speech("late"));
    await flush();
    expect(display.last()?.kind).toBe("finalize");
  });

  it("should keep the job unaffected when the display fails", async () => {
    const failing: DisplayAdapter = {
      createDisplay: vi.fn(async () => {
        throw new Error("chat unavailable");
      }),
      updateDisplay: vi.fn(async () => undefined),
      finalizeDisplay: vi.fn(async () => undefined),
    };
    manager.dispose();
    manager = new TrackerManager({ config, display: failing });

    await expect(manager.start(job, session)).resolves.toBeUndefined();
    manager.handleEvent(job.id, testEvents.speech("hi"));
    await flush();
    await expect(manager.finalize(store.transitionJob(job.id, "canceled", "x"))).resolves.toBeUndefined();

    expect(failing.updateDisplay).not.toHaveBeenCalled();
    expect(failing.finalizeDisplay).not.toHaveBeenCalled();
  });

  it("should ignore unknown jobs", () => {
    manager.handleEvent("nope", testEvents.speech("hi"));
    manager.setStatus("nope", "running");

    expect(manager.pause("nope")).toBe(false);
    expect(manager.getState("nope")).toBeNull();
  });
});
