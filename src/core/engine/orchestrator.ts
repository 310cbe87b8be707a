import { join } from "node:path";
import type { Config } from "../../types/config.js";
import type { ApprovalRequest, ApprovalSignal, ApprovalVerdict, GatedScope } from "../../types/approval.js";
import type { Job, JobListFilter, JobResult, SubmitJobResult } from "../../types/job.js";
import { isTerminalStatus } from "../../types/job.js";
import type { CreateSessionInput, Session, SessionState } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { ConflictError, StoreError, ValidationError, errorMessage } from "../../infra/errors.js";
import { jobLogPath, readLogTail, type LogTail } from "../../infra/job-log.js";
import { ApprovalGate } from "../approval/approval-gate.js";
import { HookServer } from "../approval/hook-server.js";
import { writeHookSettings } from "../hooks/hook-settings.js";
import { generateId, type StateManager } from "../state/state-manager.js";
import { parseControlToken, type ControlAction, type DisplayAdapter } from "../tracker/display.js";
import { TrackerManager } from "../tracker/tracker-manager.js";
import type { WorkspaceProvider } from "../workspace/workspace-provider.js";
import type { AgentProcessFactory } from "./agent-process.js";
import { JobExecutor } from "./job-executor.js";
import { JobScheduler } from "./job-scheduler.js";
import type { QueuedJob } from "./session-queue.js";

const DEFAULT_LOG_TAIL = 50;
const CONTROL_LOG_TAIL = 20;
const ORPHANED_ERROR = "Orphaned: agent process lost on restart";

export interface OrchestratorOptions {
  config: Config;
  store: StateManager;
  workspaces: WorkspaceProvider;
  display: DisplayAdapter;
  spawnAgent?: AgentProcessFactory;
  now?: () => number;
}

export interface CloseSessionOptions {
  /** Cancel the running job instead of waiting for it */
  force?: boolean;
}

export interface RecoveryReport {
  orphanedJobs: string[];
  requeuedJobs: string[];
  recoveredSessions: string[];
  closedSessions: string[];
}

export interface ControlResult {
  action: ControlAction;
  job: Job;
  /** Text to show the user who pressed the control */
  message: string;
}

/**
 * Orchestrator - Facade over scheduling, execution, approvals and tracking
 *
 * Provides:
 * - Job submission, inspection, cancellation and logs
 * - Approval decisions and the hook callback server
 * - Session lifecycle (create, close) bound to workspaces
 * - Tracker controls
 * - Startup recovery and shutdown
 *
 * The store is the source of truth; the scheduler only mirrors queued work.
 */
export class Orchestrator {
  private readonly store: StateManager;
  private readonly scheduler: JobScheduler;
  private readonly executor: JobExecutor;
  private readonly gate: ApprovalGate;
  private readonly tracker: TrackerManager;
  private readonly logDir: string;
  private hookServer: HookServer | null = null;
  private hookSettingsPath: string | null = null;
  /** Running jobs, settled once their bookkeeping is done */
  private active: Map<string, Promise<void>> = new Map();
  private closing: Map<string, Promise<void>> = new Map();
  private stopped = false;

  constructor(private readonly options: OrchestratorOptions) {
    const { config, store } = options;
    this.store = store;
    this.logDir = join(config.dataDir, "logs");

    this.tracker = new TrackerManager({
      config: config.tracker,
      display: options.display,
      ...(options.now ? { now: options.now } : {}),
    });

    this.executor = new JobExecutor({
      config: config.execution,
      store,
      workspaces: options.workspaces,
      logDir: this.logDir,
      ...(options.spawnAgent ? { spawnAgent: options.spawnAgent } : {}),
      ...(options.now ? { now: options.now } : {}),
      hookUrl: (jobId) => (this.hookServer?.isRunning() ? this.hookServer.hookUrl(jobId) : null),
      hookSettingsPath: () => this.hookSettingsPath,
    });

    this.gate = new ApprovalGate({
      store,
      config: config.approval,
      hooks: {
        onWaiting: (job) => {
          this.executor.suspendDeadline(job.id);
          this.tracker.setStatus(job.id, "waiting_approval");
        },
        onResumed: (job) => {
          this.executor.resumeDeadline(job.id);
          this.tracker.setStatus(job.id, "running");
        },
        terminate: (jobId, cause) => this.executor.terminate(jobId, { status: "canceled", ...cause }),
      },
    });

    this.scheduler = new JobScheduler({
      config: config.scheduler,
      canAdmit: (sessionId) => !this.stopped && this.store.getSession(sessionId)?.state === "idle",
      onAdmit: (job, sessionId) => this.startJob(job, sessionId),
    });
  }

  /**
   * Start the hook server (when enabled) and recover state left by a
   * previous run
   */
  async start(): Promise<RecoveryReport> {
    const hookConfig = this.options.config.approval.hookServer;
    if (hookConfig.enabled && !this.hookServer) {
      const server = new HookServer({
        config: hookConfig,
        onSignal: (signal) => this.handleApprovalSignal(signal),
      });
      await server.start();
      this.hookServer = server;
      logger.info(`Hook server listening on ${server.getBaseUrl()}`);

      const settingsPath = join(this.options.config.dataDir, "hooks", "settings.json");
      writeHookSettings(settingsPath, {
        command: hookConfig.command,
        approvalTimeoutSeconds: this.options.config.approval.timeoutSeconds,
      });
      this.hookSettingsPath = settingsPath;
    }
    return this.recover();
  }

  // ============ Jobs ============

  /**
   * Store a job and queue it behind the session's earlier work
   */
  submitJob(sessionId: string, instruction: string): SubmitJobResult {
    const text = instruction.trim();
    const max = this.options.config.execution.maxInstructionLength;
    if (text.length === 0) {
      throw new ValidationError("Instruction must not be empty");
    }
    if (text.length > max) {
      throw new ValidationError(`Instruction is ${text.length} characters (limit ${max})`);
    }

    const session = this.store.requireSession(sessionId);
    if (session.state === "closing") {
      throw new ConflictError(`Session ${sessionId} is closing`, "SESSION_CLOSING");
    }
    if (this.scheduler.isFull(sessionId)) {
      const limit = this.options.config.scheduler.maxQueuedPerSession;
      throw new ConflictError(
        `Session ${sessionId} already has ${limit} queued jobs (limit ${limit})`,
        "SESSION_BUSY_OVERFLOW"
      );
    }

    const job = this.store.createJob({ sessionId, instruction: text });
    const queuePosition = this.scheduler.enqueue(sessionId, { jobId: job.id, seq: job.seq });
    logger.info(`Job ${job.id} submitted to session ${sessionId}`);

    this.scheduler.pump();
    const current = this.store.requireJob(job.id);
    return { jobId: job.id, status: current.status, queuePosition };
  }

  getJob(jobId: string): Job {
    return this.store.requireJob(jobId);
  }

  /**
   * Jobs matching the filter, newest first
   */
  listJobs(filter: JobListFilter = {}): Job[] {
    return this.store.listJobs(filter);
  }

  /**
   * Cancel a job. Terminal jobs are returned unchanged; running and waiting
   * jobs resolve once the agent has exited.
   */
  async cancelJob(jobId: string, reason = "Canceled by user"): Promise<Job> {
    const job = this.store.requireJob(jobId);
    if (isTerminalStatus(job.status)) {
      return job;
    }

    if (job.status === "queued") {
      this.scheduler.remove(job.sessionId, jobId);
      logger.info(`Job ${jobId} canceled before start`);
      return this.store.transitionJob(jobId, "canceled", reason, {
        finishedAt: new Date(),
        error: `Canceled: ${reason}`,
        errorType: "canceled",
      });
    }

    if (job.status === "waiting_approval") {
      this.gate.cancelPending(jobId);
    }

    if (this.executor.isRunning(jobId)) {
      await this.executor.cancel(jobId, reason);
      await this.active.get(jobId);
      return this.store.requireJob(jobId);
    }

    // Active in the store without a process behind it
    logger.warn(`Job ${jobId} is ${job.status} but has no agent process; canceling directly`);
    return this.store.transitionJob(jobId, "canceled", reason, {
      finishedAt: new Date(),
      error: `Canceled: ${reason}`,
      errorType: "canceled",
    });
  }

  /**
   * Last lines of a job's raw agent output
   */
  getJobLogs(jobId: string, tail = DEFAULT_LOG_TAIL): LogTail {
    if (!Number.isInteger(tail) || tail < 1) {
      throw new ValidationError(`tail must be a positive integer, got ${tail}`);
    }
    const job = this.store.requireJob(jobId);
    const path = job.logPath ?? jobLogPath(this.logDir, jobId);
    return readLogTail(path, tail, this.options.config.execution.maxLogBytes);
  }

  // ============ Approvals ============

  listPendingApprovals(): ApprovalRequest[] {
    return this.store.listPendingApprovals();
  }

  approveJob(jobId: string, scope?: GatedScope): Job {
    this.store.requireJob(jobId);
    return this.gate.approve(jobId, scope);
  }

  /**
   * Deny the pending request; resolves once the agent has exited
   */
  async denyJob(jobId: string, reason?: string): Promise<Job> {
    this.store.requireJob(jobId);
    await this.gate.deny(jobId, reason);
    await this.active.get(jobId);
    return this.store.requireJob(jobId);
  }

  /**
   * Entry point for approvals raised over the hook transport
   */
  async handleApprovalSignal(signal: ApprovalSignal): Promise<ApprovalVerdict> {
    try {
      return await this.gate.handleSignal(signal);
    } catch (error) {
      // The approval could not be recorded; the job cannot go on
      if (error instanceof StoreError) {
        logger.error(`Store failure while job ${signal.jobId} requested approval: ${error.message}`, error);
        this.executor
          .terminate(signal.jobId, {
            status: "failed",
            errorType: "store_error",
            error: `Store write failed: ${error.message}`,
          })
          .catch((terminateError: unknown) => {
            logger.error(`Failed to terminate job ${signal.jobId}: ${errorMessage(terminateError)}`, terminateError);
          });
      }
      throw error;
    }
  }

  // ============ Sessions ============

  /**
   * Allocate a workspace and bind a new idle session to it
   */
  async createSession(input: CreateSessionInput): Promise<Session> {
    const repoPath = input.repoPath.trim();
    if (!repoPath) {
      throw new ValidationError("repoPath must not be empty");
    }

    const id = generateId();
    const workspace = await this.options.workspaces.allocate({
      sessionId: id,
      repoPath,
      ...(input.branch ? { branch: input.branch } : {}),
    });

    try {
      const session = this.store.createSession({
        id,
        workspace,
        displayTarget: input.displayTarget ?? `session-${id}`,
      });
      logger.info(`Session ${id} created on ${workspace.branch} at ${workspace.path}`);
      return session;
    } catch (error) {
      await this.options.workspaces.destroy(workspace).catch((destroyError: unknown) => {
        logger.warn(`Failed to release workspace ${workspace.path}: ${errorMessage(destroyError)}`);
      });
      throw error;
    }
  }

  getSession(sessionId: string): Session {
    return this.store.requireSession(sessionId);
  }

  listSessions(states?: SessionState[]): Session[] {
    return this.store.listSessions(states);
  }

  /**
   * Close a session: queued jobs are canceled, the running job is drained
   * (or canceled with `force`), then the workspace and the session go.
   */
  closeSession(sessionId: string, options: CloseSessionOptions = {}): Promise<void> {
    const inProgress = this.closing.get(sessionId);
    if (inProgress) {
      return inProgress;
    }

    const session = this.store.requireSession(sessionId);
    const closing = this.runClose(session, options.force ?? false).finally(() => {
      this.closing.delete(sessionId);
    });
    this.closing.set(sessionId, closing);
    return closing;
  }

  // ============ Tracker controls ============

  pauseTracker(jobId: string): void {
    this.store.requireJob(jobId);
    if (!this.tracker.pause(jobId)) {
      throw new ConflictError(`No live tracker for job ${jobId}`);
    }
  }

  resumeTracker(jobId: string): void {
    this.store.requireJob(jobId);
    if (!this.tracker.resume(jobId)) {
      throw new ConflictError(`No live tracker for job ${jobId}`);
    }
  }

  /**
   * Dispatch a display control token (`action:jobId`)
   */
  async handleControl(token: string): Promise<ControlResult> {
    const control = parseControlToken(token);
    if (!control) {
      throw new ValidationError(`Unknown control token: ${token}`);
    }
    const { action, jobId } = control;

    switch (action) {
      case "pause":
        this.pauseTracker(jobId);
        return { action, job: this.store.requireJob(jobId), message: "Tracker paused" };
      case "resume":
        this.resumeTracker(jobId);
        return { action, job: this.store.requireJob(jobId), message: "Tracker resumed" };
      case "cancel": {
        const job = await this.cancelJob(jobId, "Canceled from display");
        return { action, job, message: `Job ${jobId} is ${job.status}` };
      }
      case "approve": {
        const job = this.approveJob(jobId);
        return { action, job, message: `Approved job ${jobId}` };
      }
      case "deny": {
        const job = await this.denyJob(jobId);
        return { action, job, message: `Denied job ${jobId}` };
      }
      case "summary": {
        const job = this.store.requireJob(jobId);
        return { action, job, message: formatJobSummary(job) };
      }
      case "logs": {
        const logs = this.getJobLogs(jobId, CONTROL_LOG_TAIL);
        return { action, job: this.store.requireJob(jobId), message: logs.content || "(no output)" };
      }
    }
  }

  // ============ Lifecycle ============

  /**
   * Reconcile the store with the fact that no agent survives a restart,
   * then re-queue waiting work
   */
  async recover(): Promise<RecoveryReport> {
    const report: RecoveryReport = { orphanedJobs: [], requeuedJobs: [], recoveredSessions: [], closedSessions: [] };

    const expired = this.store.expirePendingApprovals(ORPHANED_ERROR);
    if (expired > 0) {
      logger.debug(`Expired ${expired} pending approval(s) left by a previous run`);
    }

    for (const job of this.store.getJobsByStatus(["running", "waiting_approval"])) {
      if (this.executor.isRunning(job.id)) {
        continue;
      }
      this.store.transitionJob(job.id, "failed", ORPHANED_ERROR, {
        finishedAt: new Date(),
        error: ORPHANED_ERROR,
        errorType: "orphaned",
      });
      report.orphanedJobs.push(job.id);
    }

    for (const session of this.store.listSessions(["running", "blocked"])) {
      if (session.currentJobId !== null && this.executor.isRunning(session.currentJobId)) {
        continue;
      }
      this.store.transitionSession(session.id, "idle", "Recovered after restart", null);
      report.recoveredSessions.push(session.id);
    }

    for (const session of this.store.listSessions(["closing"])) {
      await this.closeSession(session.id, { force: true });
      report.closedSessions.push(session.id);
    }

    for (const job of this.store.getJobsByStatus(["queued"])) {
      if (this.scheduler.positionOf(job.sessionId, job.id) >= 0) {
        continue;
      }
      try {
        this.scheduler.enqueue(job.sessionId, { jobId: job.id, seq: job.seq });
        report.requeuedJobs.push(job.id);
      } catch (error) {
        logger.warn(`Could not re-queue job ${job.id}: ${errorMessage(error)}`);
        this.store.transitionJob(job.id, "canceled", "Queue full on recovery", {
          finishedAt: new Date(),
          error: `Canceled: ${errorMessage(error)}`,
          errorType: "canceled",
        });
      }
    }

    this.scheduler.pump();

    if (report.orphanedJobs.length > 0 || report.requeuedJobs.length > 0 || report.closedSessions.length > 0) {
      logger.info(
        `Recovered: ${report.orphanedJobs.length} orphaned, ${report.requeuedJobs.length} re-queued, ` +
          `${report.closedSessions.length} session(s) closed`
      );
    }
    return report;
  }

  /**
   * Cancel running jobs, stop the hook server and close the store. Queued
   * jobs stay queued for the next start.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    const running = this.executor.runningJobIds();
    if (running.length > 0) {
      logger.info(`Stopping ${running.length} running job(s)...`);
    }
    for (const jobId of running) {
      this.gate.cancelPending(jobId, "Shutting down");
    }
    await this.executor.terminateAll({
      status: "canceled",
      errorType: "canceled",
      error: "Canceled: server shutting down",
    });
    await Promise.all(this.active.values());

    this.gate.dispose();
    this.tracker.dispose();
    if (this.hookServer) {
      await this.hookServer.stop();
      this.hookServer = null;
      this.hookSettingsPath = null;
    }
    this.store.close();
    logger.debug("Orchestrator stopped");
  }

  getHookBaseUrl(): string | null {
    return this.hookServer?.isRunning() ? this.hookServer.getBaseUrl() : null;
  }

  // ============ Internals ============

  /**
   * Admission callback: mark the job running and hand it to the executor
   */
  private startJob(queued: QueuedJob, sessionId: string): void {
    const session = this.store.requireSession(sessionId);
    const job = this.store.transitionJob(queued.jobId, "running", "Admitted", {
      startedAt: new Date(),
      logPath: jobLogPath(this.logDir, queued.jobId),
    });

    let running: Session;
    try {
      running = this.store.transitionSession(sessionId, "running", `Job ${job.id} started`, job.id);
    } catch (error) {
      this.store.transitionJob(job.id, "failed", "Session unavailable", {
        finishedAt: new Date(),
        error: `Session ${sessionId} could not start the job: ${errorMessage(error)}`,
        errorType: "store_error",
      });
      throw error;
    }

    logger.info(`Job ${job.id} started in session ${sessionId}`);
    this.tracker.start(job, running).catch((error: unknown) => {
      logger.warn(`Tracker for job ${job.id} failed to start: ${errorMessage(error)}`);
    });

    const done = this.executor
      .execute(job, session.workspace, {
        onEvent: (event) => this.tracker.handleEvent(job.id, event),
        onApprovalSignal: (signal) => this.gate.handleSignal(signal),
      })
      .then((result) => this.finishJob(result, sessionId))
      .catch((error: unknown) => {
        logger.error(`Bookkeeping for job ${job.id} failed: ${errorMessage(error)}`, error);
        this.scheduler.release(sessionId, job.id);
      })
      .finally(() => {
        this.active.delete(job.id);
      });
    this.active.set(job.id, done);
  }

  private async finishJob(result: JobResult, sessionId: string): Promise<void> {
    const { jobId } = result;
    this.gate.releaseJob(jobId);

    const session = this.store.getSession(sessionId);
    if (session) {
      const next = session.state === "closing" ? "closing" : "idle";
      this.store.transitionSession(sessionId, next, `Job ${jobId} ${result.status}`, null);
    }

    this.scheduler.release(sessionId, jobId);

    const job = this.store.getJob(jobId);
    if (job) {
      await this.tracker.finalize(job);
    }
  }

  private async runClose(session: Session, force: boolean): Promise<void> {
    const sessionId = session.id;
    if (session.state !== "closing") {
      this.store.transitionSession(sessionId, "closing", "Close requested");
    }
    logger.info(`Closing session ${sessionId}${force ? " (forced)" : ""}`);

    this.scheduler.drainSession(sessionId);
    for (const job of this.store.listJobs({ sessionId, statuses: ["queued"] })) {
      this.store.transitionJob(job.id, "canceled", "Session closed", {
        finishedAt: new Date(),
        error: "Canceled: session closed",
        errorType: "canceled",
      });
    }

    const runningId = this.scheduler.runningJob(sessionId) ?? session.currentJobId;
    if (runningId !== null) {
      if (force) {
        await this.cancelJob(runningId, "Session closed");
      } else {
        logger.info(`Waiting for job ${runningId} before closing session ${sessionId}`);
      }
      await this.active.get(runningId);
    }

    try {
      await this.options.workspaces.destroy(session.workspace);
    } catch (error) {
      logger.warn(`Failed to destroy workspace for session ${sessionId}: ${errorMessage(error)}`);
    }
    this.store.deleteSession(sessionId);
    logger.info(`Session ${sessionId} closed`);
  }
}

/**
 * Short text for the summary control
 */
export function formatJobSummary(job: Job): string {
  const lines = [`Job ${job.id}: ${job.status}`];
  if (job.resultSummary) {
    lines.push(job.resultSummary);
  }
  if (job.error) {
    lines.push(job.errorType ? `${job.error} (${job.errorType})` : job.error);
  }
  if (job.filesChanged && job.filesChanged.length > 0) {
    lines.push(`Files changed: ${job.filesChanged.join(", ")}`);
  }
  return lines.join("\n");
}
