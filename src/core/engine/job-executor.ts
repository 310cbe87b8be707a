import type { ExecutionConfig } from "../../types/config.js";
import type { ApprovalSignal, ApprovalVerdict } from "../../types/approval.js";
import type { SessionEvent } from "../../types/events.js";
import type { Job, JobErrorType, JobResult } from "../../types/job.js";
import type { Workspace } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { StoreError, errorMessage, toError } from "../../infra/errors.js";
import { JobLog } from "../../infra/job-log.js";
import { CleanupManager, registerProcessCleanup } from "../../infra/cleanup-manager.js";
import { createJobDeadlineWatchdog, type Watchdog } from "../../infra/watchdog.js";
import { EventParser } from "../tracker/event-parser.js";
import type { StateManager } from "../state/state-manager.js";
import type { WorkspaceProvider } from "../workspace/workspace-provider.js";
import { spawnAgentProcess, type AgentProcess, type AgentProcessFactory } from "./agent-process.js";

const STDERR_TAIL_LINES = 20;
const STDERR_EXCERPT_CHARS = 500;

export interface ExecutionHooks {
  /** Every parsed event, in output order */
  onEvent: (event: SessionEvent) => void;
  /** Approval requested over the stream transport */
  onApprovalSignal: (signal: ApprovalSignal) => Promise<ApprovalVerdict>;
}

/**
 * Why a job was stopped from outside
 */
export interface TerminationCause {
  status: "failed" | "canceled";
  errorType: JobErrorType;
  error: string;
}

export interface JobExecutorOptions {
  config: ExecutionConfig;
  store: StateManager;
  workspaces: WorkspaceProvider;
  /** Directory holding per-job logs */
  logDir: string;
  spawnAgent?: AgentProcessFactory;
  /** Hook callback URL for a job, or null when the hook server is off */
  hookUrl?: (jobId: string) => string | null;
  /** Generated hook settings file handed to the agent with the hook URL */
  hookSettingsPath?: () => string | null;
  now?: () => number;
}

interface Outcome {
  status: JobResult["status"];
  resultSummary: string | null;
  filesChanged: string[] | null;
  error: string | null;
  errorType: JobErrorType | null;
}

/** What the run observed in the agent's output */
interface Observed {
  result: { text: string | null; isError: boolean } | null;
  speech: string | null;
  toolError: string | null;
  spawnError: Error | null;
  cleanupTaskId: string | null;
}

interface Run {
  job: Job;
  startedAt: number;
  process: AgentProcess | null;
  cause: TerminationCause | null;
  exited: boolean;
  killTimer: ReturnType<typeof setTimeout> | null;
  /** Armed while the agent runs; suspended while it waits for approval */
  deadline: Watchdog | null;
  deadlineBudgetMs: number;
  completion: Promise<JobResult>;
}

/**
 * JobExecutor - Runs one agent process per job
 *
 * Provides:
 * - Spawning the agent in the session workspace
 * - Raw output capture into the job log
 * - Event parsing and stream-transport approvals
 * - Deadline (paused during approval waits), cancel and graceful
 *   SIGTERM → SIGKILL termination
 * - The job's terminal transition
 */
export class JobExecutor {
  private runs: Map<string, Run> = new Map();
  private readonly spawnAgent: AgentProcessFactory;
  private readonly now: () => number;

  constructor(private readonly options: JobExecutorOptions) {
    this.spawnAgent = options.spawnAgent ?? spawnAgentProcess;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run the agent for a job that is already `running` in the store.
   * Resolves with the outcome once the job has reached a terminal status.
   */
  execute(job: Job, workspace: Workspace, hooks: ExecutionHooks): Promise<JobResult> {
    if (this.runs.has(job.id)) {
      return Promise.reject(new Error(`Job ${job.id} is already executing`));
    }

    let resolveCompletion: (result: JobResult) => void = () => undefined;
    const run: Run = {
      job,
      startedAt: this.now(),
      process: null,
      cause: null,
      exited: false,
      killTimer: null,
      deadline: null,
      deadlineBudgetMs: this.options.config.timeoutSeconds * 1000,
      completion: new Promise<JobResult>((resolve) => {
        resolveCompletion = resolve;
      }),
    };
    this.runs.set(job.id, run);

    void this.launch(run, workspace, hooks)
      .catch((error: unknown) => {
        logger.error(`Job ${job.id} execution failed: ${errorMessage(error)}`, error);
        return this.persist(
          run,
          { status: "failed", resultSummary: null, filesChanged: null, error: errorMessage(error), errorType: "process_error" },
          null,
          null
        );
      })
      .then((result) => {
        this.runs.delete(job.id);
        resolveCompletion(result);
      });

    return run.completion;
  }

  /**
   * Stop a job's agent. The first cause wins; resolves once the job has
   * finished. Unknown jobs are ignored.
   */
  async terminate(jobId: string, cause: TerminationCause): Promise<void> {
    const run = this.runs.get(jobId);
    if (!run) {
      return;
    }

    if (run.cause === null) {
      run.cause = cause;
      logger.info(`Terminating job ${jobId}: ${cause.error}`);
      this.kill(run);
    } else {
      logger.debug(`Job ${jobId} already terminating (${run.cause.errorType}); ignoring ${cause.errorType}`);
    }

    await run.completion;
  }

  cancel(jobId: string, reason: string): Promise<void> {
    return this.terminate(jobId, { status: "canceled", errorType: "canceled", error: `Canceled: ${reason}` });
  }

  isRunning(jobId: string): boolean {
    return this.runs.has(jobId);
  }

  runningJobIds(): string[] {
    return [...this.runs.keys()];
  }

  /**
   * Stop the job's deadline clock, keeping the time left
   */
  suspendDeadline(jobId: string): void {
    const run = this.runs.get(jobId);
    const deadline = run?.deadline;
    if (!run || !deadline) {
      return;
    }
    if (deadline.isRunning()) {
      run.deadlineBudgetMs = deadline.getRemainingMs();
    }
    deadline.stop();
    run.deadline = null;
    logger.debug(`Deadline for job ${jobId} suspended`, { remainingMs: run.deadlineBudgetMs });
  }

  /**
   * Restart the deadline clock with the time left when it was suspended
   */
  resumeDeadline(jobId: string): void {
    const run = this.runs.get(jobId);
    if (!run || run.exited || run.cause !== null || run.deadline !== null || run.process === null) {
      return;
    }
    this.armDeadline(run);
  }

  /**
   * Terminate every running job
   */
  async terminateAll(cause: TerminationCause): Promise<void> {
    await Promise.all(this.runningJobIds().map((jobId) => this.terminate(jobId, cause)));
  }

  // ============ Run lifecycle ============

  private async launch(run: Run, workspace: Workspace, hooks: ExecutionHooks): Promise<JobResult> {
    const { job } = run;
    const { config } = this.options;

    const baseline = await this.snapshot(workspace.path, job.id);

    if (run.cause) {
      return this.persist(run, this.causeOutcome(run.cause), null, null);
    }

    let log: JobLog;
    try {
      log = new JobLog({ logDir: this.options.logDir, jobId: job.id, maxBytes: config.maxLogBytes });
    } catch (error) {
      return this.persist(run, {
        status: "failed",
        resultSummary: null,
        filesChanged: null,
        error: `Store write failed: ${errorMessage(error)}`,
        errorType: "store_error",
      }, null, null);
    }

    const parser = new EventParser({ jobId: job.id, sessionId: job.sessionId });
    const stderrTail: string[] = [];
    const seen: Observed = { result: null, speech: null, toolError: null, spawnError: null, cleanupTaskId: null };

    const env: Record<string, string> = {
      AGENT_RELAY_JOB_ID: job.id,
      AGENT_RELAY_SESSION_ID: job.sessionId,
    };
    const args = config.agentArgs.map((arg) => arg.replaceAll("{instruction}", job.instruction));
    const hookUrl = this.options.hookUrl?.(job.id) ?? null;
    if (hookUrl) {
      env["AGENT_RELAY_HOOK_URL"] = hookUrl;
      const settingsPath = this.options.hookSettingsPath?.() ?? null;
      if (settingsPath) {
        args.push(...config.hookSettingsArgs.map((arg) => arg.replaceAll("{hookSettings}", settingsPath)));
      }
    }

    const exited = new Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }>((resolve) => {
      const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (run.exited) {
          return;
        }
        run.exited = true;
        resolve({ exitCode, signal });
      };

      const onStdoutLine = (line: string): void => {
        if (run.exited) {
          return;
        }
        try {
          log.appendLine(line);
        } catch (error) {
          this.failStore(run, error);
        }

        for (const event of parser.parseLine(line)) {
          if (event.type === "system-result") {
            seen.result = { text: event.result, isError: event.isError };
          } else if (event.type === "ai-speech") {
            seen.speech = event.text;
          } else if (event.type === "tool-error") {
            seen.toolError = event.error;
          }

          try {
            hooks.onEvent(event);
          } catch (error) {
            logger.warn(`Event handler failed for job ${job.id}: ${errorMessage(error)}`);
          }

          if (event.type === "approval-needed") {
            const signal: ApprovalSignal = {
              transport: "stream",
              jobId: job.id,
              toolName: event.toolName,
              toolInput: { ...event.toolInput },
            };
            if (event.scope !== null) {
              signal.scope = event.scope;
            }
            if (event.requestId !== null) {
              signal.requestId = event.requestId;
            }
            this.relayApproval(run, signal, hooks);
          }
        }
      };

      const onStderrLine = (line: string): void => {
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) {
          stderrTail.shift();
        }
      };

      const onError = (error: Error): void => {
        if (run.process === null || run.process.pid === null) {
          seen.spawnError = error;
          finish(null, null);
          return;
        }
        logger.warn(`Agent process error for job ${job.id}: ${error.message}`);
      };

      let proc: AgentProcess;
      try {
        proc = this.spawnAgent(
          {
            command: config.agentCommand,
            args,
            cwd: workspace.path,
            env,
          },
          { onStdoutLine, onStderrLine, onExit: finish, onError }
        );
      } catch (error) {
        seen.spawnError = toError(error);
        finish(null, null);
        return;
      }

      run.process = proc;
      if (run.exited) {
        return;
      }
      if (proc.pid !== null) {
        seen.cleanupTaskId = registerProcessCleanup(proc.pid);
        logger.debug(`Agent started for job ${job.id}`, { pid: proc.pid, cwd: workspace.path });
      }
      this.armDeadline(run);

      // A cause set while the process was starting
      if (run.cause) {
        this.kill(run);
      }
    });

    const { exitCode, signal } = await exited;

    run.deadline?.stop();
    run.deadline = null;
    if (run.killTimer) {
      clearTimeout(run.killTimer);
      run.killTimer = null;
    }
    if (seen.cleanupTaskId !== null) {
      CleanupManager.getInstance().unregister(seen.cleanupTaskId);
    }
    log.close();

    const cause = this.causeOf(run);
    let outcome: Outcome;
    if (cause) {
      outcome = this.causeOutcome(cause);
    } else if (seen.spawnError !== null) {
      outcome = {
        status: "failed",
        resultSummary: null,
        filesChanged: null,
        error: `Failed to start agent: ${seen.spawnError.message}`,
        errorType: "process_error",
      };
    } else if (exitCode === 0) {
      const summary = seen.result !== null && !seen.result.isError && seen.result.text ? seen.result.text : null;
      outcome = {
        status: "done",
        resultSummary: summary ?? seen.speech ?? "Completed",
        filesChanged: await this.changedFiles(workspace.path, baseline, job.id),
        error: null,
        errorType: null,
      };
    } else {
      const resultError = seen.result !== null && seen.result.isError && seen.result.text ? seen.result.text : null;
      const fallback =
        signal !== null ? `Agent terminated by ${signal}` : `Agent exited with code ${exitCode ?? "unknown"}`;
      outcome = {
        status: "failed",
        resultSummary: null,
        filesChanged: null,
        error: seen.toolError ?? resultError ?? stderrExcerpt(stderrTail) ?? fallback,
        errorType: "process_error",
      };
    }

    return this.persist(run, outcome, exitCode, signal);
  }

  private relayApproval(run: Run, signal: ApprovalSignal, hooks: ExecutionHooks): void {
    const jobId = run.job.id;
    hooks
      .onApprovalSignal(signal)
      .then((verdict) => {
        this.respond(run, signal, verdict.decision === "approved", verdict.reason);
      })
      .catch((error: unknown) => {
        if (error instanceof StoreError) {
          this.failStore(run, error);
          return;
        }
        logger.warn(`Approval handling failed for job ${jobId}: ${errorMessage(error)}`);
        this.respond(run, signal, false, errorMessage(error));
      });
  }

  private respond(run: Run, signal: ApprovalSignal, approved: boolean, reason: string | null): void {
    if (run.exited || !run.process) {
      return;
    }
    const response: Record<string, unknown> = { type: "approval_response", approved, reason };
    if (signal.requestId !== undefined) {
      response["request_id"] = signal.requestId;
    }
    run.process.write(JSON.stringify(response));
  }

  private failStore(run: Run, error: unknown): void {
    logger.error(`Store failure while job ${run.job.id} was running: ${errorMessage(error)}`, error);
    this.terminate(run.job.id, {
      status: "failed",
      errorType: "store_error",
      error: `Store write failed: ${errorMessage(error)}`,
    }).catch((terminateError: unknown) => {
      logger.error(`Failed to terminate job ${run.job.id}: ${errorMessage(terminateError)}`, terminateError);
    });
  }

  private armDeadline(run: Run): void {
    const jobId = run.job.id;
    const { timeoutSeconds } = this.options.config;
    const deadline = createJobDeadlineWatchdog(() => {
      this.terminate(jobId, {
        status: "failed",
        errorType: "timeout",
        error: `Timed out after ${timeoutSeconds}s`,
      }).catch((error: unknown) => {
        logger.error(`Failed to terminate job ${jobId} after its deadline: ${errorMessage(error)}`, error);
      });
    }, run.deadlineBudgetMs);
    run.deadline = deadline;
    deadline.start({ jobId });
  }

  /**
   * SIGTERM now, SIGKILL once the grace period has passed
   */
  private kill(run: Run): void {
    const proc = run.process;
    if (!proc || run.exited) {
      return;
    }
    proc.kill("SIGTERM");
    if (run.killTimer) {
      return;
    }
    run.killTimer = setTimeout(() => {
      run.killTimer = null;
      if (!run.exited) {
        logger.warn(`Job ${run.job.id} ignored SIGTERM; sending SIGKILL`);
        proc.kill("SIGKILL");
      }
    }, this.options.config.gracePeriodSeconds * 1000);
  }

  /** Cause recorded so far */
  private causeOf(run: Run): TerminationCause | null {
    return run.cause;
  }

  private causeOutcome(cause: TerminationCause): Outcome {
    return {
      status: cause.status,
      resultSummary: null,
      filesChanged: null,
      error: cause.error,
      errorType: cause.errorType,
    };
  }

  // ============ Persistence ============

  /**
   * Record the terminal transition and build the result
   */
  private persist(run: Run, outcome: Outcome, exitCode: number | null, signal: string | null): JobResult {
    const { store } = this.options;
    const jobId = run.job.id;
    let final = outcome;

    try {
      const current = store.requireJob(jobId);
      if (current.status === "waiting_approval" && final.status === "done") {
        final = {
          status: "failed",
          resultSummary: null,
          filesChanged: null,
          error: "Agent exited while waiting for approval",
          errorType: "process_error",
        };
      }

      store.transitionJob(jobId, final.status, final.error ?? "Agent finished", {
        finishedAt: new Date(this.now()),
        resultSummary: final.resultSummary,
        filesChanged: final.filesChanged,
        error: final.error,
        errorType: final.errorType,
      });
    } catch (error) {
      logger.error(`Failed to record outcome of job ${jobId}: ${errorMessage(error)}`, error);
      if (error instanceof StoreError) {
        final = {
          status: "failed",
          resultSummary: null,
          filesChanged: null,
          error: `Store write failed: ${errorMessage(error)}`,
          errorType: "store_error",
        };
        this.recordStoreFailure(jobId, final);
      }
    }

    const durationMs = this.now() - run.startedAt;
    logger.info(`Job ${jobId} finished: ${final.status}${final.error ? ` (${final.error})` : ""}`);

    return {
      jobId,
      status: final.status,
      exitCode,
      signal,
      resultSummary: final.resultSummary,
      filesChanged: final.filesChanged,
      error: final.error,
      errorType: final.errorType,
      durationMs,
    };
  }

  private recordStoreFailure(jobId: string, outcome: Outcome): void {
    try {
      this.options.store.transitionJob(jobId, "failed", outcome.error ?? "Store failure", {
        finishedAt: new Date(this.now()),
        error: outcome.error,
        errorType: "store_error",
      });
    } catch (error) {
      logger.error(`Could not mark job ${jobId} as failed: ${errorMessage(error)}`, error);
    }
  }

  // ============ Workspace ============

  private async snapshot(path: string, jobId: string): Promise<string | null> {
    try {
      return await this.options.workspaces.snapshot(path);
    } catch (error) {
      logger.warn(`Could not snapshot workspace for job ${jobId}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async changedFiles(path: string, baseline: string | null, jobId: string): Promise<string[] | null> {
    try {
      return await this.options.workspaces.changedFiles(path, baseline);
    } catch (error) {
      logger.warn(`Could not list changed files for job ${jobId}: ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Last stderr lines, capped for storage on the job
 */
export function stderrExcerpt(lines: readonly string[]): string | null {
  const text = lines.join("\n").trim();
  if (!text) {
    return null;
  }
  return text.length > STDERR_EXCERPT_CHARS ? `...${text.slice(-(STDERR_EXCERPT_CHARS - 3))}` : text;
}
