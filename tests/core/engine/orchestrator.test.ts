import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { Orchestrator, formatJobSummary } from "../../../src/core/engine/orchestrator.js";
import { StateManager } from "../../../src/core/state/state-manager.js";
import { ConflictError, NotFoundError, StoreError, ValidationError } from "../../../src/infra/errors.js";
import { logger } from "../../../src/infra/logger.js";
import { ConfigSchema } from "../../../src/types/config.js";
import type { Job } from "../../../src/types/job.js";
import type { Session } from "../../../src/types/session.js";
import {
  FakeWorkspaceProvider,
  RecordingDisplay,
  createFakeSpawner,
  createTestEnvironment,
  flush,
  testWorkspace,
} from "../../helpers.js";

describe("Orchestrator", () => {
  let store: StateManager;
  let tempDir: string;
  let cleanup: () => void;
  let workspaces: FakeWorkspaceProvider;
  let display: RecordingDisplay;
  let spawner: ReturnType<typeof createFakeSpawner>;
  let orchestrator: Orchestrator;

  const createOrchestrator = (
    overrides: {
      maxQueuedPerSession?: number;
      maxInstructionLength?: number;
      maxConcurrentJobs?: number;
      hookServer?: boolean;
    } = {}
  ) =>
    new Orchestrator({
      config: ConfigSchema.parse({
        dataDir: tempDir,
        execution: {
          agentCommand: "agent",
          agentArgs: ["{instruction}"],
          maxInstructionLength: overrides.maxInstructionLength ?? 4000,
        },
        scheduler: {
          maxConcurrentJobs: overrides.maxConcurrentJobs ?? 2,
          maxQueuedPerSession: overrides.maxQueuedPerSession ?? 10,
        },
        approval: { hookServer: { enabled: overrides.hookServer ?? false } },
        tracker: { buffer: { maxEvents: 1 }, rateLimit: { minIntervalMs: 0, burstLimit: 100 } },
      }),
      store,
      workspaces,
      display,
      spawnAgent: spawner.spawn,
    });

  const newSession = (): Promise<Session> => orchestrator.createSession({ repoPath: "/tmp/repo" });

  /** Let the executor snapshot the workspace and spawn */
  const started = async (): Promise<void> => {
    await flush();
  };

  beforeEach(() => {
    ({ store, tempDir, cleanup } = createTestEnvironment());
    logger.configure({ level: "error" });
    vi.spyOn(console, "error").mockImplementation(() => {});
    workspaces = new FakeWorkspaceProvider();
    display = new RecordingDisplay();
    spawner = createFakeSpawner();
    orchestrator = createOrchestrator();
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    cleanup();
  });

  describe("sessions", () => {
    it("should allocate a workspace for a new idle session", async () => {
      const session = await orchestrator.createSession({ repoPath: " /tmp/repo ", branch: "feature/x" });

      expect(session.state).toBe("idle");
      expect(session.displayTarget).toBe(`session-${session.id}`);
      expect(session.workspace).toEqual({
        path: `/tmp/workspaces/repo-${session.id}`,
        branch: "feature/x",
        repoPath: "/tmp/repo",
      });
      expect(orchestrator.listSessions().map((s) => s.id)).toEqual([session.id]);
    });

    it("should use the given display target", async () => {
      const session = await orchestrator.createSession({ repoPath: "/tmp/repo", displayTarget: "chat-1" });

      expect(orchestrator.getSession(session.id).displayTarget).toBe("chat-1");
    });

    it("should reject an empty repository path", async () => {
      await expect(orchestrator.createSession({ repoPath: "  " })).rejects.toThrow(ValidationError);
    });

    it("should surface workspace allocation failures", async () => {
      workspaces.failAllocate = new Error("Repository not found: /nope");

      await expect(orchestrator.createSession({ repoPath: "/nope" })).rejects.toThrow("Repository not found: /nope");
      expect(orchestrator.listSessions()).toEqual([]);
    });

    it("should close an idle session and release its workspace", async () => {
      const session = await newSession();

      await orchestrator.closeSession(session.id);

      expect(workspaces.destroyed).toEqual([session.workspace]);
      expect(() => orchestrator.getSession(session.id)).toThrow(NotFoundError);
    });

    it("should cancel queued and running jobs when forced closed", async () => {
      const session = await newSession();
      const running = orchestrator.submitJob(session.id, "first");
      const queued = orchestrator.submitJob(session.id, "second");
      await started();

      await orchestrator.closeSession(session.id, { force: true });

      expect(spawner.processes).toHaveLength(1);
      expect(spawner.latest().signals).toEqual(["SIGTERM"]);
      expect(display.last()?.kind).toBe("finalize");
      expect(display.last()?.payload.text.endsWith("⏹️ Canceled\nCanceled: Session closed")).toBe(true);
      expect(workspaces.destroyed).toHaveLength(1);
      expect(() => orchestrator.getSession(session.id)).toThrow(NotFoundError);
      expect(() => orchestrator.getJob(running.jobId)).toThrow(NotFoundError);
      expect(() => orchestrator.getJob(queued.jobId)).toThrow(NotFoundError);
    });

    it("should wait for the running job on a graceful close", async () => {
      const session = await newSession();
      const { jobId } = orchestrator.submitJob(session.id, "first");
      await started();

      const closing = orchestrator.closeSession(session.id);
      await flush();
      expect(orchestrator.getSession(session.id).state).toBe("closing");
      expect(() => orchestrator.submitJob(session.id, "more")).toThrow(ConflictError);

      spawner.latest().exit(0);
      await closing;

      expect(display.last()?.payload.text.endsWith("✅ Done\nCompleted")).toBe(true);
      expect(spawner.latest().signals).toEqual([]);
      expect(() => orchestrator.getJob(jobId)).toThrow(NotFoundError);
      expect(() => orchestrator.getSession(session.id)).toThrow(NotFoundError);
    });
  });

  describe("submitJob", () => {
    it("should start a job at once on an idle session", async () => {
      const session = await newSession();

      const result = orchestrator.submitJob(session.id, "  fix the build  ");
      await started();

      expect(result).toEqual({ jobId: result.jobId, status: "running", queuePosition: 0 });
      expect(orchestrator.getJob(result.jobId).instruction).toBe("fix the build");
      expect(orchestrator.getSession(session.id)).toMatchObject({ state: "running", currentJobId: result.jobId });
      expect(spawner.latest().options.args).toEqual(["fix the build"]);
      expect(display.calls[0]?.kind).toBe("create");
    });

    it("should queue later jobs and run them in order", async () => {
      const session = await newSession();
      const first = orchestrator.submitJob(session.id, "first");
      const second = orchestrator.submitJob(session.id, "second");
      const third = orchestrator.submitJob(session.id, "third");
      await started();

      expect(second).toMatchObject({ status: "queued", queuePosition: 0 });
      expect(third).toMatchObject({ status: "queued", queuePosition: 1 });

      spawner.latest().exit(0);
      await started();

      expect(store.requireJob(first.jobId).status).toBe("done");
      expect(store.requireJob(second.jobId).status).toBe("running");
      expect(store.requireJob(third.jobId).status).toBe("queued");
      expect(spawner.latest().options.args).toEqual(["second"]);
    });

    it("should validate the instruction", async () => {
      orchestrator = createOrchestrator({ maxInstructionLength: 10 });
      const session = await newSession();

      expect(() => orchestrator.submitJob(session.id, "   ")).toThrow("Instruction must not be empty");
      expect(() => orchestrator.submitJob(session.id, "a".repeat(11))).toThrow(
        "Instruction is 11 characters (limit 10)"
      );
    });

    it("should hold another session's job until the global slot frees", async () => {
      orchestrator = createOrchestrator({ maxConcurrentJobs: 1 });
      const first = await newSession();
      const second = await newSession();

      const j1 = orchestrator.submitJob(first.id, "first");
      const j2 = orchestrator.submitJob(second.id, "second");
      await started();

      expect(j2).toMatchObject({ status: "queued", queuePosition: 0 });
      expect(store.requireJob(j2.jobId).status).toBe("queued");
      expect(spawner.processes).toHaveLength(1);

      spawner.latest().exit(0);
      await started();

      expect(store.requireJob(j1.jobId).status).toBe("done");
      expect(store.requireJob(j2.jobId).status).toBe("running");
      expect(spawner.latest().options.args).toEqual(["second"]);
    });

    it("should hand the agent its hook settings when the hook server runs", async () => {
      orchestrator = createOrchestrator({ hookServer: true });
      await orchestrator.start();
      const session = await newSession();

      const { jobId } = orchestrator.submitJob(session.id, "ship it");
      await started();

      const settingsPath = join(tempDir, "hooks", "settings.json");
      const { args, env } = spawner.latest().options;
      expect(args).toEqual(["ship it", "--settings", settingsPath]);
      expect(env["AGENT_RELAY_HOOK_URL"]).toMatch(
        new RegExp(`^http://127\\.0\\.0\\.1:\\d+/hooks/pre-tool-use/${jobId}\\?token=`)
      );
      expect(JSON.parse(readFileSync(settingsPath, "utf-8"))).toEqual({
        hooks: {
          PreToolUse: [
            {
              matcher: "*",
              hooks: [{ type: "command", command: "agent-relay hook pre-tool-use", timeout: 3660 }],
            },
          ],
        },
      });
    });

    it("should reject unknown sessions", () => {
      expect(() => orchestrator.submitJob("missing", "hi")).toThrow("Session not found: missing");
    });

    it("should reject submissions beyond the session queue limit", async () => {
      orchestrator = createOrchestrator({ maxQueuedPerSession: 1 });
      const session = await newSession();
      orchestrator.submitJob(session.id, "running");
      orchestrator.submitJob(session.id, "queued");

      expect(() => orchestrator.submitJob(session.id, "overflow")).toThrow(
        `Session ${session.id} already has 1 queued jobs (limit 1)`
      );
      expect(orchestrator.listJobs({ sessionId: session.id })).toHaveLength(2);
    });
  });

  describe("cancelJob", () => {
    it("should cancel a queued job without running it", async () => {
      const session = await newSession();
      orchestrator.submitJob(session.id, "first");
      const { jobId } = orchestrator.submitJob(session.id, "second");

      const job = await orchestrator.cancelJob(jobId);

      expect(job).toMatchObject({ status: "canceled", errorType: "canceled", error: "Canceled: Canceled by user" });
    });

    it("should stop a running job and free the session", async () => {
      const session = await newSession();
      const { jobId } = orchestrator.submitJob(session.id, "first");
      await started();

      const job = await orchestrator.cancelJob(jobId, "changed my mind");

      expect(job).toMatchObject({ status: "canceled", error: "Canceled: changed my mind" });
      expect(spawner.latest().signals).toEqual(["SIGTERM"]);
      expect(orchestrator.getSession(session.id)).toMatchObject({ state: "idle", currentJobId: null });
    });

    it("should return finished jobs unchanged", async () => {
      const session = await newSession();
      const { jobId } = orchestrator.submitJob(session.id, "first");
      await started();
      spawner.latest().exit(0);
      await started();

      const job = await orchestrator.cancelJob(jobId);

      expect(job.status).toBe("done");
    });
  });

  describe("approvals", () => {
    let session: Session;
    let jobId: string;

    const requestPush = async (): Promise<void> => {
      spawner.latest().emitEvent({
        type: "approval_needed",
        tool_name: "Bash",
        tool_input: { command: "git push origin main" },
        request_id: "r1",
      });
      await flush();
    };

    beforeEach(async () => {
      session = await newSession();
      ({ jobId } = orchestrator.submitJob(session.id, "ship it"));
      await started();
    });

    it("should suspend the job until approved", async () => {
      await requestPush();

      expect(orchestrator.getJob(jobId)).toMatchObject({ status: "waiting_approval", approvalScope: "push" });
      expect(orchestrator.getSession(session.id).state).toBe("blocked");
      expect(orchestrator.listPendingApprovals().map((a) => a.jobId)).toEqual([jobId]);

      const job = orchestrator.approveJob(jobId);
      await flush();

      expect(job.status).toBe("running");
      expect(orchestrator.getSession(session.id).state).toBe("running");
      expect(spawner.latest().written).toEqual([
        '{"type":"approval_response","approved":true,"reason":null,"request_id":"r1"}',
      ]);

      spawner.latest().exit(0);
      await started();
      expect(orchestrator.getJob(jobId).status).toBe("done");
    });

    it("should end the job when denied", async () => {
      await requestPush();

      const job = await orchestrator.denyJob(jobId, "not now");

      expect(job).toMatchObject({ status: "canceled", errorType: "approval_denied", error: "Denied: not now" });
      expect(spawner.latest().signals).toEqual(["SIGTERM"]);
      expect(orchestrator.getSession(session.id).state).toBe("idle");
      expect(orchestrator.listPendingApprovals()).toEqual([]);
    });

    it("should keep a closing session closing while its last job waits", async () => {
      const closing = orchestrator.closeSession(session.id);
      await flush();
      expect(orchestrator.getSession(session.id).state).toBe("closing");

      await requestPush();

      expect(orchestrator.getJob(jobId)).toMatchObject({ status: "waiting_approval", approvalScope: "push" });
      expect(orchestrator.getSession(session.id).state).toBe("closing");

      expect(orchestrator.approveJob(jobId).status).toBe("running");
      expect(orchestrator.getSession(session.id).state).toBe("closing");
      await flush();
      expect(spawner.latest().written).toEqual([
        '{"type":"approval_response","approved":true,"reason":null,"request_id":"r1"}',
      ]);

      spawner.latest().exit(0);
      await closing;

      expect(() => orchestrator.getSession(session.id)).toThrow(NotFoundError);
    });

    it("should fail the job when a hook approval cannot be recorded", async () => {
      vi.spyOn(store, "openApproval").mockImplementation(() => {
        throw new StoreError("disk full");
      });

      await expect(
        orchestrator.handleApprovalSignal({
          transport: "hook",
          jobId,
          toolName: "Bash",
          toolInput: { command: "git push origin main" },
        })
      ).rejects.toThrow("disk full");
      await started();

      expect(orchestrator.getJob(jobId)).toMatchObject({
        status: "failed",
        errorType: "store_error",
        error: "Store write failed: disk full",
      });
      expect(spawner.latest().signals).toEqual(["SIGTERM"]);
      expect(orchestrator.getSession(session.id).state).toBe("idle");
    });

    it("should reject approving a job with nothing pending", () => {
      expect(() => orchestrator.approveJob(jobId)).toThrow(`No pending approval for job ${jobId}`);
    });

    it("should let read-only hook signals through", async () => {
      const verdict = await orchestrator.handleApprovalSignal({
        transport: "hook",
        jobId,
        toolName: "Read",
        toolInput: { file_path: "README.md" },
      });

      expect(verdict).toEqual({ decision: "approved", reason: null, grantedScope: null });
      expect(orchestrator.listPendingApprovals()).toEqual([]);
    });
  });

  describe("deadlines", () => {
    const requestPush = async (): Promise<void> => {
      spawner.latest().emitEvent({
        type: "approval_needed",
        tool_name: "Bash",
        tool_input: { command: "git push origin main" },
      });
      await flush();
    };

    beforeEach(() => {
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date"] });
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should fail a job past its deadline and free the session", async () => {
      const session = await newSession();
      const { jobId } = orchestrator.submitJob(session.id, "first");
      await started();

      await vi.advanceTimersByTimeAsync(3_600_000);
      await started();

      expect(orchestrator.getJob(jobId)).toMatchObject({
        status: "failed",
        errorType: "timeout",
        error: "Timed out after 3600s",
      });
      expect(spawner.latest().signals).toEqual(["SIGTERM"]);
      expect(orchestrator.getSession(session.id)).toMatchObject({ state: "idle", currentJobId: null });
    });

    it("should expire an undecided approval under the default timeouts", async () => {
      const session = await newSession();
      const { jobId } = orchestrator.submitJob(session.id, "ship it");
      await started();
      await vi.advanceTimersByTimeAsync(60_000);
      await requestPush();
      expect(orchestrator.getJob(jobId).status).toBe("waiting_approval");

      await vi.advanceTimersByTimeAsync(3_600_000);
      await started();

      expect(orchestrator.getJob(jobId)).toMatchObject({
        status: "canceled",
        errorType: "approval_expired",
        approvalState: "expired",
        error: "Approval expired after 3600s",
      });
      expect(spawner.latest().signals).toEqual(["SIGTERM"]);
      expect(orchestrator.getSession(session.id)).toMatchObject({ state: "idle", currentJobId: null });
    });

    it("should stop the deadline clock while a job waits for approval", async () => {
      const session = await newSession();
      const { jobId } = orchestrator.submitJob(session.id, "ship it");
      await started();
      await vi.advanceTimersByTimeAsync(60_000);
      await requestPush();
      await vi.advanceTimersByTimeAsync(3_000_000);
      expect(orchestrator.getJob(jobId).status).toBe("waiting_approval");

      orchestrator.approveJob(jobId);
      await started();
      // 3540s of the budget were left when the approval opened
      await vi.advanceTimersByTimeAsync(3_539_000);
      expect(orchestrator.getJob(jobId).status).toBe("running");

      await vi.advanceTimersByTimeAsync(2_000);
      await started();

      expect(orchestrator.getJob(jobId)).toMatchObject({
        status: "failed",
        errorType: "timeout",
        approvalState: "approved",
      });
    });
  });

  describe("logs and controls", () => {
    let session: Session;
    let jobId: string;

    beforeEach(async () => {
      session = await newSession();
      ({ jobId } = orchestrator.submitJob(session.id, "first"));
      await started();
    });

    it("should return the tail of the job log", () => {
      spawner.latest().emit("line 1");
      spawner.latest().emit("line 2");
      spawner.latest().emit("line 3");

      expect(orchestrator.getJobLogs(jobId, 2)).toEqual({ content: "line 2\nline 3", truncated: true });
      expect(() => orchestrator.getJobLogs(jobId, 0)).toThrow("tail must be a positive integer, got 0");
    });

    it("should pause and resume the tracker", async () => {
      const paused = await orchestrator.handleControl(`pause:${jobId}`);
      const resumed = await orchestrator.handleControl(`resume:${jobId}`);

      expect(paused.message).toBe("Tracker paused");
      expect(resumed.message).toBe("Tracker resumed");
    });

    it("should cancel from the display", async () => {
      const result = await orchestrator.handleControl(`cancel:${jobId}`);

      expect(result.message).toBe(`Job ${jobId} is canceled`);
      expect(result.job.error).toBe("Canceled: Canceled from display");
    });

    it("should summarize and show logs", async () => {
      spawner.latest().emit("hello");
      spawner.latest().emitEvent({ type: "result", subtype: "success", is_error: false, result: "Fixed it" });
      spawner.latest().exit(0);
      await started();

      const summary = await orchestrator.handleControl(`summary:${jobId}`);
      const logs = await orchestrator.handleControl(`logs:${jobId}`);

      expect(summary.message).toBe(`Job ${jobId}: done\nFixed it`);
      expect(logs.message.split("\n")[0]).toBe("hello");
    });

    it("should reject unknown tokens", async () => {
      await expect(orchestrator.handleControl("explode:1")).rejects.toThrow("Unknown control token: explode:1");
    });

    it("should refuse tracker controls once the job is over", async () => {
      spawner.latest().exit(0);
      await started();

      expect(() => orchestrator.pauseTracker(jobId)).toThrow(`No live tracker for job ${jobId}`);
    });
  });

  describe("recover", () => {
    it("should fail orphaned jobs and re-queue waiting ones", async () => {
      store.createSession({ id: "s1", workspace: testWorkspace("s1"), displayTarget: "chat-1" });
      const orphan = store.transitionJob(store.createJob({ sessionId: "s1", instruction: "old" }).id, "running", "x");
      store.transitionSession("s1", "running", "x", orphan.id);
      const waiting = store.createJob({ sessionId: "s1", instruction: "next" });

      const report = await orchestrator.start();
      await started();

      expect(report).toEqual({
        orphanedJobs: [orphan.id],
        requeuedJobs: [waiting.id],
        recoveredSessions: ["s1"],
        closedSessions: [],
      });
      expect(store.requireJob(orphan.id)).toMatchObject({
        status: "failed",
        errorType: "orphaned",
        error: "Orphaned: agent process lost on restart",
      });
      expect(store.requireJob(waiting.id).status).toBe("running");
      expect(spawner.latest().options.args).toEqual(["next"]);
    });

    it("should finish closing sessions left mid-close", async () => {
      store.createSession({ id: "s1", workspace: testWorkspace("s1"), displayTarget: "chat-1" });
      store.transitionSession("s1", "closing", "x");

      const report = await orchestrator.recover();

      expect(report.closedSessions).toEqual(["s1"]);
      expect(workspaces.destroyed).toEqual([testWorkspace("s1")]);
      expect(store.getSession("s1")).toBeNull();
    });
  });

  describe("shutdown", () => {
    it("should cancel running jobs and leave queued ones", async () => {
      const session = await newSession();
      const running = orchestrator.submitJob(session.id, "first");
      const queued = orchestrator.submitJob(session.id, "second");
      await started();

      await orchestrator.shutdown();

      const reopened = new StateManager(tempDir);
      try {
        expect(reopened.requireJob(running.jobId)).toMatchObject({
          status: "canceled",
          error: "Canceled: server shutting down",
        });
        expect(reopened.requireJob(queued.jobId).status).toBe("queued");
      } finally {
        reopened.close();
      }
    });
  });
});

describe("formatJobSummary", () => {
  const job = (overrides: Partial<Job>): Job => ({
    id: "j1",
    seq: 1,
    sessionId: "s1",
    instruction: "x",
    status: "done",
    approvalScope: null,
    approvalState: null,
    createdAt: new Date(0),
    startedAt: null,
    finishedAt: null,
    resultSummary: null,
    filesChanged: null,
    error: null,
    errorType: null,
    logPath: null,
    ...overrides,
  });

  it("should list the result and changed files", () => {
    expect(formatJobSummary(job({ resultSummary: "Fixed", filesChanged: ["a.ts", "b.ts"] }))).toBe(
      "Job j1: done\nFixed\nFiles changed: a.ts, b.ts"
    );
  });

  it("should include the error type", () => {
    expect(formatJobSummary(job({ status: "failed", error: "Timed out after 5s", errorType: "timeout" }))).toBe(
      "Job j1: failed\nTimed out after 5s (timeout)"
    );
  });
});
