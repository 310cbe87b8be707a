import Database from "better-sqlite3";
import { randomBytes } from "node:crypto";
import { join } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import { z } from "zod";
import { logger } from "../../infra/logger.js";
import {
  ConflictError,
  NotFoundError,
  StoreError,
  errorMessage,
  isRelayError,
  toError,
} from "../../infra/errors.js";
import {
  ApprovalDecisionSchema,
  ApprovalTransportSchema,
  GatedScopeSchema,
  type ApprovalDecision,
  type ApprovalRequest,
} from "../../types/approval.js";
import {
  JobApprovalStateSchema,
  JobErrorTypeSchema,
  JobStatusSchema,
  VALID_JOB_TRANSITIONS,
  type Job,
  type JobListFilter,
  type JobPatch,
  type JobStatus,
  type JobTransition,
} from "../../types/job.js";
import {
  SessionStateSchema,
  VALID_SESSION_TRANSITIONS,
  type Session,
  type SessionState,
  type Workspace,
} from "../../types/session.js";

const StringArraySchema = z.array(z.string());
const ToolInputSchema = z.record(z.unknown());

/**
 * 8 lowercase hex characters
 */
export function generateId(): string {
  return randomBytes(4).toString("hex");
}

function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL"); // Better concurrent access
    db.pragma("foreign_keys = ON");
    return db;
  } catch (error) {
    throw new StoreError(`Failed to open store at ${dbPath}: ${errorMessage(error)}`, toError(error));
  }
}

export interface NewSession {
  id: string;
  workspace: Workspace;
  displayTarget: string;
}

export interface NewJob {
  sessionId: string;
  instruction: string;
}

/**
 * StateManager - SQLite-backed persistence for sessions, jobs, and approvals
 *
 * Provides:
 * - Job and session state machines with validated transitions
 * - Audit log of every job transition
 * - Conditional approval resolution (a request is decided exactly once)
 * - Queries for recovery and reporting
 *
 * Every SQLite failure surfaces as a StoreError.
 */
export class StateManager {
  private db: Database.Database;

  constructor(dataDir: string) {
    const dbPath = join(dataDir, "state.db");

    // Ensure directory exists
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }

    this.db = openDatabase(dbPath);
    this.initSchema();

    logger.debug(`StateManager initialized with database: ${dbPath}`);
  }

  private initSchema(): void {
    this.guard("initSchema", () => this.db.exec(`
      -- Sessions table
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        workspace_path TEXT NOT NULL,
        branch TEXT NOT NULL,
        repo_path TEXT NOT NULL,
        display_target TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'idle',
        current_job_id TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      -- Jobs table
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        instruction TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'queued',
        approval_scope TEXT,
        approval_state TEXT,
        created_at TEXT NOT NULL,
        started_at TEXT,
        finished_at TEXT,
        result_summary TEXT,
        files_changed TEXT, -- JSON array
        error TEXT,
        error_type TEXT,
        log_path TEXT,
        seq INTEGER NOT NULL UNIQUE
      );

      -- Job transitions (audit log)
      CREATE TABLE IF NOT EXISTS job_transitions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        from_status TEXT NOT NULL,
        to_status TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        reason TEXT,
        FOREIGN KEY (job_id) REFERENCES jobs(id)
      );

      -- Approval requests
      CREATE TABLE IF NOT EXISTS approvals (
        id TEXT PRIMARY KEY,
        job_id TEXT NOT NULL,
        session_id TEXT NOT NULL,
        scope TEXT NOT NULL,
        action_description TEXT NOT NULL,
        tool_name TEXT NOT NULL,
        tool_input TEXT NOT NULL, -- JSON object
        transport TEXT NOT NULL,
        requested_at TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        decided_at TEXT,
        decision TEXT NOT NULL DEFAULT 'pending',
        reason TEXT,
        FOREIGN KEY (job_id) REFERENCES jobs(id)
      );

      -- Indexes for common queries
      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_jobs_session ON jobs(session_id);
      CREATE INDEX IF NOT EXISTS idx_approvals_job ON approvals(job_id);
      CREATE INDEX IF NOT EXISTS idx_approvals_decision ON approvals(decision);
    `));
  }

  // ============ Session Methods ============

  /**
   * Create a session in the idle state
   */
  createSession(input: NewSession): Session {
    const now = new Date();
    const session: Session = {
      id: input.id,
      workspace: input.workspace,
      displayTarget: input.displayTarget,
      state: "idle",
      currentJobId: null,
      createdAt: now,
      updatedAt: now,
    };

    this.guard("createSession", () => {
      this.db
        .prepare(
          `INSERT INTO sessions (id, workspace_path, branch, repo_path, display_target, state,
                                 current_job_id, created_at, updated_at)
           VALUES (@id, @workspacePath, @branch, @repoPath, @displayTarget, @state,
                   NULL, @createdAt, @updatedAt)`
        )
        .run({
          id: session.id,
          workspacePath: session.workspace.path,
          branch: session.workspace.branch,
          repoPath: session.workspace.repoPath,
          displayTarget: session.displayTarget,
          state: session.state,
          createdAt: now.toISOString(),
          updatedAt: now.toISOString(),
        });
    });

    logger.debug(`Created session ${session.id} at ${session.workspace.path}`);
    return session;
  }

  getSession(id: string): Session | null {
    const row = this.guard("getSession", () =>
      this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?").get(id)
    );
    return row ? this.rowToSession(row) : null;
  }

  /**
   * Get a session or throw NotFoundError
   */
  requireSession(id: string): Session {
    const session = this.getSession(id);
    if (!session) {
      throw new NotFoundError("session", id);
    }
    return session;
  }

  listSessions(states?: SessionState[]): Session[] {
    const rows = this.guard("listSessions", () =>
      this.db.prepare<[], SessionRow>("SELECT * FROM sessions ORDER BY created_at ASC, id ASC").all()
    );
    return rows
      .map((row) => this.rowToSession(row))
      .filter((session) => !states || states.includes(session.state));
  }

  /**
   * Move a session to a new state with validation. currentJobId is written
   * when given (null clears it).
   */
  transitionSession(
    sessionId: string,
    toState: SessionState,
    reason: string,
    currentJobId?: string | null
  ): Session {
    const session = this.requireSession(sessionId);

    if (session.state !== toState) {
      const validTargets = VALID_SESSION_TRANSITIONS[session.state];
      if (!validTargets.includes(toState)) {
        throw new ConflictError(
          `Invalid session transition: ${session.state} → ${toState}. Valid targets: ${validTargets.join(", ") || "none"}`,
          "INVALID_TRANSITION"
        );
      }
    }

    const now = new Date();
    const nextJobId = currentJobId === undefined ? session.currentJobId : currentJobId;

    this.guard("transitionSession", () => {
      this.db
        .prepare(
          "UPDATE sessions SET state = @state, current_job_id = @currentJobId, updated_at = @updatedAt WHERE id = @id"
        )
        .run({ state: toState, currentJobId: nextJobId, updatedAt: now.toISOString(), id: sessionId });
    });

    if (session.state !== toState) {
      logger.debug(`Session ${sessionId} transitioned: ${session.state} → ${toState} (${reason})`);
    }
    return { ...session, state: toState, currentJobId: nextJobId, updatedAt: now };
  }

  /**
   * Delete a closed session together with its jobs and approvals
   */
  deleteSession(sessionId: string): void {
    this.guard("deleteSession", () => {
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM approvals WHERE session_id = ?").run(sessionId);
        this.db
          .prepare("DELETE FROM job_transitions WHERE job_id IN (SELECT id FROM jobs WHERE session_id = ?)")
          .run(sessionId);
        this.db.prepare("DELETE FROM jobs WHERE session_id = ?").run(sessionId);
        this.db.prepare("DELETE FROM sessions WHERE id = ?").run(sessionId);
      })();
    });
    logger.debug(`Deleted session ${sessionId}`);
  }

  // ============ Job Methods ============

  /**
   * Store a new queued job with a fresh id and the next submission seq
   */
  createJob(input: NewJob): Job {
    return this.guard("createJob", () =>
      this.db.transaction(() => {
        let id = generateId();
        const exists = this.db.prepare<[string], { id: string }>("SELECT id FROM jobs WHERE id = ?");
        while (exists.get(id)) {
          id = generateId();
        }

        const seqRow = this.db
          .prepare<[], { next: number }>("SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM jobs")
          .get();
        const seq = seqRow?.next ?? 1;
        const now = new Date();

        this.db
          .prepare(
            `INSERT INTO jobs (id, session_id, instruction, status, created_at, seq)
             VALUES (?, ?, ?, 'queued', ?, ?)`
          )
          .run(id, input.sessionId, input.instruction, now.toISOString(), seq);

        const job: Job = {
          id,
          sessionId: input.sessionId,
          instruction: input.instruction,
          status: "queued",
          approvalScope: null,
          approvalState: null,
          createdAt: now,
          startedAt: null,
          finishedAt: null,
          resultSummary: null,
          filesChanged: null,
          error: null,
          errorType: null,
          logPath: null,
          seq,
        };
        logger.debug(`Created job ${id} (seq ${seq}) in session ${input.sessionId}`);
        return job;
      })()
    );
  }

  getJob(id: string): Job | null {
    const row = this.guard("getJob", () =>
      this.db.prepare<[string], JobRow>("SELECT * FROM jobs WHERE id = ?").get(id)
    );
    return row ? this.rowToJob(row) : null;
  }

  /**
   * Get a job or throw NotFoundError
   */
  requireJob(id: string): Job {
    const job = this.getJob(id);
    if (!job) {
      throw new NotFoundError("job", id);
    }
    return job;
  }

  /**
   * List jobs, newest first
   */
  listJobs(filter: JobListFilter = {}): Job[] {
    const where: string[] = [];
    const params: Record<string, string | number> = {};

    if (filter.sessionId !== undefined) {
      where.push("session_id = @sessionId");
      params["sessionId"] = filter.sessionId;
    }
    if (filter.statuses && filter.statuses.length > 0) {
      const names = filter.statuses.map((status, i) => {
        params[`status${i}`] = status;
        return `@status${i}`;
      });
      where.push(`status IN (${names.join(", ")})`);
    }

    let sql = "SELECT * FROM jobs";
    if (where.length > 0) {
      sql += ` WHERE ${where.join(" AND ")}`;
    }
    sql += " ORDER BY seq DESC";
    if (filter.limit !== undefined) {
      sql += " LIMIT @limit";
      params["limit"] = filter.limit;
    }

    const rows = this.guard("listJobs", () =>
      this.db.prepare<[Record<string, string | number>], JobRow>(sql).all(params)
    );
    return rows.map((row) => this.rowToJob(row));
  }

  /**
   * Jobs in any of the given statuses, in submission order
   */
  getJobsByStatus(statuses: JobStatus[]): Job[] {
    return this.listJobs({ statuses }).reverse();
  }

  /**
   * Transition a job with validation, writing patch fields in the same
   * transaction and recording the transition.
   */
  transitionJob(jobId: string, toStatus: JobStatus, reason: string, patch: JobPatch = {}): Job {
    return this.guard("transitionJob", () =>
      this.db.transaction(() => {
        const job = this.requireJob(jobId);

        const validTargets = VALID_JOB_TRANSITIONS[job.status];
        if (!validTargets.includes(toStatus)) {
          throw new ConflictError(
            `Invalid job transition: ${job.status} → ${toStatus}. Valid targets: ${validTargets.join(", ") || "none"}`,
            "INVALID_TRANSITION"
          );
        }

        const now = new Date();
        const updated = this.writeJob(job, { ...patch }, toStatus);

        this.db
          .prepare(
            `INSERT INTO job_transitions (job_id, from_status, to_status, timestamp, reason)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(jobId, job.status, toStatus, now.toISOString(), reason);

        logger.debug(`Job ${jobId} transitioned: ${job.status} → ${toStatus} (${reason})`);
        return updated;
      })()
    );
  }

  /**
   * Write patch fields without a status change
   */
  updateJob(jobId: string, patch: JobPatch): Job {
    return this.guard("updateJob", () => {
      const job = this.requireJob(jobId);
      return this.writeJob(job, patch, job.status);
    });
  }

  getJobTransitions(jobId: string): JobTransition[] {
    const rows = this.guard("getJobTransitions", () =>
      this.db
        .prepare<[string], JobTransitionRow>("SELECT * FROM job_transitions WHERE job_id = ? ORDER BY id ASC")
        .all(jobId)
    );

    return rows.map((row) => ({
      jobId: row.job_id,
      fromStatus: JobStatusSchema.parse(row.from_status),
      toStatus: JobStatusSchema.parse(row.to_status),
      timestamp: new Date(row.timestamp),
      reason: row.reason ?? "",
    }));
  }

  // ============ Approval Methods ============

  /**
   * Record a pending request and suspend its job and session in one
   * transaction. Returns the job as it now stands (waiting_approval).
   */
  openApproval(request: ApprovalRequest): Job {
    return this.guard("openApproval", () =>
      this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO approvals (id, job_id, session_id, scope, action_description, tool_name,
                                    tool_input, transport, requested_at, expires_at, decided_at,
                                    decision, reason)
             VALUES (@id, @jobId, @sessionId, @scope, @actionDescription, @toolName,
                     @toolInput, @transport, @requestedAt, @expiresAt, NULL, 'pending', NULL)`
          )
          .run({
            id: request.id,
            jobId: request.jobId,
            sessionId: request.sessionId,
            scope: request.scope,
            actionDescription: request.actionDescription,
            toolName: request.details.toolName,
            toolInput: JSON.stringify(request.details.toolInput),
            transport: request.transport,
            requestedAt: request.requestedAt.toISOString(),
            expiresAt: request.expiresAt.toISOString(),
          });

        const job = this.transitionJob(request.jobId, "waiting_approval", `Approval required: ${request.scope}`, {
          approvalScope: request.scope,
          approvalState: "pending",
        });
        // A closing session stays closing while its last job waits
        if (this.requireSession(request.sessionId).state !== "closing") {
          this.transitionSession(request.sessionId, "blocked", `Job ${request.jobId} awaiting approval`);
        }
        return job;
      })()
    );
  }

  getApproval(id: string): ApprovalRequest | null {
    const row = this.guard("getApproval", () =>
      this.db.prepare<[string], ApprovalRow>("SELECT * FROM approvals WHERE id = ?").get(id)
    );
    return row ? this.rowToApproval(row) : null;
  }

  getPendingApproval(jobId: string): ApprovalRequest | null {
    const row = this.guard("getPendingApproval", () =>
      this.db
        .prepare<[string], ApprovalRow>(
          "SELECT * FROM approvals WHERE job_id = ? AND decision = 'pending' ORDER BY requested_at DESC LIMIT 1"
        )
        .get(jobId)
    );
    return row ? this.rowToApproval(row) : null;
  }

  listPendingApprovals(): ApprovalRequest[] {
    const rows = this.guard("listPendingApprovals", () =>
      this.db
        .prepare<[], ApprovalRow>("SELECT * FROM approvals WHERE decision = 'pending' ORDER BY requested_at ASC")
        .all()
    );
    return rows.map((row) => this.rowToApproval(row));
  }

  listApprovals(jobId: string): ApprovalRequest[] {
    const rows = this.guard("listApprovals", () =>
      this.db
        .prepare<[string], ApprovalRow>("SELECT * FROM approvals WHERE job_id = ? ORDER BY requested_at ASC")
        .all(jobId)
    );
    return rows.map((row) => this.rowToApproval(row));
  }

  /**
   * Decide a request only if it is still pending.
   *
   * @returns true when this call made the decision
   */
  resolveApproval(id: string, decision: Exclude<ApprovalDecision, "pending">, reason: string | null): boolean {
    const result = this.guard("resolveApproval", () =>
      this.db
        .prepare(
          "UPDATE approvals SET decision = ?, reason = ?, decided_at = ? WHERE id = ? AND decision = 'pending'"
        )
        .run(decision, reason, new Date().toISOString(), id)
    );
    const decided = result.changes === 1;
    if (decided) {
      logger.debug(`Approval ${id} resolved: ${decision}${reason ? ` (${reason})` : ""}`);
    }
    return decided;
  }

  /**
   * Expire every pending request (startup recovery)
   */
  expirePendingApprovals(reason: string): number {
    const result = this.guard("expirePendingApprovals", () =>
      this.db
        .prepare("UPDATE approvals SET decision = 'expired', reason = ?, decided_at = ? WHERE decision = 'pending'")
        .run(reason, new Date().toISOString())
    );
    return result.changes;
  }

  // ============ Stats ============

  /**
   * Job counts per status
   */
  getJobCounts(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = {
      queued: 0,
      running: 0,
      waiting_approval: 0,
      done: 0,
      failed: 0,
      canceled: 0,
    };
    const rows = this.guard("getJobCounts", () =>
      this.db.prepare<[], { status: string; count: number }>(
        "SELECT status, COUNT(*) AS count FROM jobs GROUP BY status"
      ).all()
    );
    for (const row of rows) {
      counts[JobStatusSchema.parse(row.status)] = row.count;
    }
    return counts;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ============ Private Helpers ============

  /**
   * Run a store operation, converting SQLite failures to StoreError.
   * Domain errors (not found, conflicts) pass through unchanged.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isRelayError(error)) {
        throw error;
      }
      throw new StoreError(`Store operation ${operation} failed: ${errorMessage(error)}`, toError(error));
    }
  }

  private writeJob(job: Job, patch: JobPatch, status: JobStatus): Job {
    const updated: Job = { ...job, ...patch, status };

    this.db
      .prepare(
        `UPDATE jobs SET status = @status, approval_scope = @approvalScope, approval_state = @approvalState,
                         started_at = @startedAt, finished_at = @finishedAt, result_summary = @resultSummary,
                         files_changed = @filesChanged, error = @error, error_type = @errorType,
                         log_path = @logPath
         WHERE id = @id`
      )
      .run({
        id: updated.id,
        status: updated.status,
        approvalScope: updated.approvalScope,
        approvalState: updated.approvalState,
        startedAt: updated.startedAt?.toISOString() ?? null,
        finishedAt: updated.finishedAt?.toISOString() ?? null,
        resultSummary: updated.resultSummary,
        filesChanged: updated.filesChanged ? JSON.stringify(updated.filesChanged) : null,
        error: updated.error,
        errorType: updated.errorType,
        logPath: updated.logPath,
      });

    return updated;
  }

  private rowToSession(row: SessionRow): Session {
    return {
      id: row.id,
      workspace: {
        path: row.workspace_path,
        branch: row.branch,
        repoPath: row.repo_path,
      },
      displayTarget: row.display_target,
      state: SessionStateSchema.parse(row.state),
      currentJobId: row.current_job_id,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private rowToJob(row: JobRow): Job {
    return {
      id: row.id,
      sessionId: row.session_id,
      instruction: row.instruction,
      status: JobStatusSchema.parse(row.status),
      approvalScope: row.approval_scope ? GatedScopeSchema.parse(row.approval_scope) : null,
      approvalState: row.approval_state ? JobApprovalStateSchema.parse(row.approval_state) : null,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : null,
      finishedAt: row.finished_at ? new Date(row.finished_at) : null,
      resultSummary: row.result_summary,
      filesChanged: row.files_changed ? StringArraySchema.parse(JSON.parse(row.files_changed)) : null,
      error: row.error,
      errorType: row.error_type ? JobErrorTypeSchema.parse(row.error_type) : null,
      logPath: row.log_path,
      seq: row.seq,
    };
  }

  private rowToApproval(row: ApprovalRow): ApprovalRequest {
    return {
      id: row.id,
      jobId: row.job_id,
      sessionId: row.session_id,
      scope: GatedScopeSchema.parse(row.scope),
      actionDescription: row.action_description,
      details: {
        toolName: row.tool_name,
        toolInput: ToolInputSchema.parse(JSON.parse(row.tool_input)),
      },
      transport: ApprovalTransportSchema.parse(row.transport),
      requestedAt: new Date(row.requested_at),
      expiresAt: new Date(row.expires_at),
      decidedAt: row.decided_at ? new Date(row.decided_at) : null,
      decision: ApprovalDecisionSchema.parse(row.decision),
      reason: row.reason,
    };
  }
}

// Row types for SQLite results
interface SessionRow {
  id: string;
  workspace_path: string;
  branch: string;
  repo_path: string;
  display_target: string;
  state: string;
  current_job_id: string | null;
  created_at: string;
  updated_at: string;
}

interface JobRow {
  id: string;
  session_id: string;
  instruction: string;
  status: string;
  approval_scope: string | null;
  approval_state: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  result_summary: string | null;
  files_changed: string | null;
  error: string | null;
  error_type: string | null;
  log_path: string | null;
  seq: number;
}

interface JobTransitionRow {
  id: number;
  job_id: string;
  from_status: string;
  to_status: string;
  timestamp: string;
  reason: string | null;
}

interface ApprovalRow {
  id: string;
  job_id: string;
  session_id: string;
  scope: string;
  action_description: string;
  tool_name: string;
  tool_input: string;
  transport: string;
  requested_at: string;
  expires_at: string;
  decided_at: string | null;
  decision: string;
  reason: string | null;
}
