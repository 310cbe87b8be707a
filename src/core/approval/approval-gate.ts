import type { ApprovalConfig } from "../../types/config.js";
import type {
  ActionClassification,
  ApprovalRequest,
  ApprovalSignal,
  ApprovalVerdict,
  GatedScope,
} from "../../types/approval.js";
import type { Job } from "../../types/job.js";
import { logger } from "../../infra/logger.js";
import { ConflictError, ValidationError, errorMessage } from "../../infra/errors.js";
import { KeyedLock } from "../../infra/keyed-lock.js";
import { createApprovalExpiryWatchdog, type Watchdog } from "../../infra/watchdog.js";
import { generateId, type StateManager } from "../state/state-manager.js";
import { approvalPolicyFromConfig, classifyAction, needsApproval, type ApprovalPolicy } from "./approval-policy.js";

/**
 * How a rejected job must end
 */
export interface RejectionCause {
  errorType: "approval_denied" | "approval_expired";
  error: string;
}

export interface ApprovalGateHooks {
  /** The job is now waiting_approval */
  onWaiting?: (job: Job, request: ApprovalRequest) => void;
  /** The job is running again after an approval */
  onResumed?: (job: Job, request: ApprovalRequest) => void;
  /** Stop the job's agent; resolves once the process has exited */
  terminate: (jobId: string, cause: RejectionCause) => Promise<void>;
}

export interface ApprovalGateOptions {
  store: StateManager;
  config: ApprovalConfig;
  hooks: ApprovalGateHooks;
  now?: () => Date;
}

interface PendingDecision {
  request: ApprovalRequest;
  watchdog: Watchdog;
  resolve: (verdict: ApprovalVerdict) => void;
}

/**
 * ApprovalGate - Suspends jobs on gated actions until a human decides
 *
 * Signals for one job are handled one at a time: a signal that needs a
 * decision holds the job's lock until it is approved, denied, canceled, or
 * expires. approve/deny/cancel never take the lock, so they can settle the
 * request the lock holder is waiting on.
 */
export class ApprovalGate {
  private readonly lock = new KeyedLock();
  private readonly pending: Map<string, PendingDecision> = new Map();
  private readonly granted: Map<string, Set<GatedScope>> = new Map();
  private readonly policy: ApprovalPolicy;
  private readonly now: () => Date;

  constructor(private readonly options: ApprovalGateOptions) {
    this.policy = approvalPolicyFromConfig(options.config);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Evaluate one interception. Resolves immediately for actions that need
   * no decision, otherwise once the request is settled.
   */
  handleSignal(signal: ApprovalSignal): Promise<ApprovalVerdict> {
    return this.lock.run(signal.jobId, () => this.evaluate(signal));
  }

  /**
   * Classification for a signal, honouring a scope the agent claimed.
   * Whitelisted commands stay whitelisted whatever scope is claimed.
   */
  classify(signal: ApprovalSignal): ActionClassification {
    const classification = classifyAction(signal.toolName, signal.toolInput, this.policy);
    if (signal.scope === undefined || classification.kind === "whitelisted") {
      return classification;
    }
    if (classification.kind === "gated") {
      return { ...classification, scope: signal.scope };
    }
    return {
      kind: "gated",
      scope: signal.scope,
      description: `${signal.scope}: ${signal.toolName}`,
      alwaysGate: false,
    };
  }

  getPending(jobId: string): ApprovalRequest | null {
    return this.pending.get(jobId)?.request ?? null;
  }

  getGrantedScopes(jobId: string): GatedScope[] {
    return [...(this.granted.get(jobId) ?? [])];
  }

  /**
   * Approve the pending request of a job. A scope, when given, must match
   * the request and is granted for the rest of the job.
   */
  approve(jobId: string, scope?: GatedScope): Job {
    const entry = this.requirePending(jobId);
    const { request } = entry;

    if (scope !== undefined && scope !== request.scope) {
      throw new ValidationError(`Scope mismatch: pending request for job ${jobId} is ${request.scope}, not ${scope}`);
    }
    if (!this.options.store.resolveApproval(request.id, "approved", null)) {
      this.clearPending(jobId);
      throw new ConflictError(`Approval ${request.id} was already decided`, "NO_PENDING_APPROVAL");
    }
    this.clearPending(jobId);

    if (scope !== undefined) {
      const scopes = this.granted.get(jobId) ?? new Set<GatedScope>();
      scopes.add(scope);
      this.granted.set(jobId, scopes);
    }

    const job = this.options.store.transitionJob(jobId, "running", `Approved: ${request.scope}`, {
      approvalState: "approved",
    });
    this.resumeSession(job.sessionId, jobId);

    logger.info(`Job ${jobId} approved (${request.scope})`);
    this.options.hooks.onResumed?.(job, request);
    entry.resolve({ decision: "approved", reason: null, grantedScope: scope ?? null });
    return job;
  }

  /**
   * Deny the pending request and terminate the job. Resolves after the
   * agent process has exited.
   */
  async deny(jobId: string, reason?: string): Promise<Job> {
    const entry = this.requirePending(jobId);
    const { request } = entry;
    const why = reason?.trim() || "Denied by user";

    if (!this.options.store.resolveApproval(request.id, "denied", why)) {
      this.clearPending(jobId);
      throw new ConflictError(`Approval ${request.id} was already decided`, "NO_PENDING_APPROVAL");
    }
    this.clearPending(jobId);
    this.options.store.updateJob(jobId, { approvalState: "denied" });

    logger.info(`Job ${jobId} denied (${request.scope}): ${why}`);
    entry.resolve({ decision: "denied", reason: why, grantedScope: null });
    await this.options.hooks.terminate(jobId, { errorType: "approval_denied", error: `Denied: ${why}` });
    return this.options.store.requireJob(jobId);
  }

  /**
   * Settle a pending request as denied without terminating the job (the
   * caller is canceling it).
   *
   * @returns Whether a request was pending
   */
  cancelPending(jobId: string, reason = "canceled"): boolean {
    const entry = this.pending.get(jobId);
    if (!entry) {
      return false;
    }
    this.clearPending(jobId);
    if (this.options.store.resolveApproval(entry.request.id, "denied", reason)) {
      this.options.store.updateJob(jobId, { approvalState: "denied" });
    }
    entry.resolve({ decision: "denied", reason, grantedScope: null });
    return true;
  }

  /**
   * Forget a finished job. A request still pending is expired.
   */
  releaseJob(jobId: string): void {
    const entry = this.pending.get(jobId);
    if (entry) {
      this.clearPending(jobId);
      if (this.options.store.resolveApproval(entry.request.id, "expired", "Job ended")) {
        this.options.store.updateJob(jobId, { approvalState: "expired" });
      }
      entry.resolve({ decision: "expired", reason: "Job ended", grantedScope: null });
    }
    this.granted.delete(jobId);
  }

  /**
   * Stop every expiry timer and release waiting signals
   */
  dispose(): void {
    for (const [jobId, entry] of this.pending) {
      entry.watchdog.stop();
      entry.resolve({ decision: "denied", reason: "Shutting down", grantedScope: null });
      this.pending.delete(jobId);
    }
    this.granted.clear();
  }

  private async evaluate(signal: ApprovalSignal): Promise<ApprovalVerdict> {
    const { store } = this.options;
    const job = store.requireJob(signal.jobId);

    if (job.status !== "running") {
      return { decision: "denied", reason: `Job is ${job.status}`, grantedScope: null };
    }

    const classification = this.classify(signal);
    const grantedScopes = this.granted.get(job.id) ?? new Set<GatedScope>();

    if (classification.kind !== "gated") {
      logger.debug(`Job ${job.id}: ${signal.toolName} passes without approval (${classification.kind})`);
      return { decision: "approved", reason: null, grantedScope: null };
    }
    if (!needsApproval(classification, this.policy, grantedScopes)) {
      const reason = grantedScopes.has(classification.scope) ? "Scope already granted" : null;
      return { decision: "approved", reason, grantedScope: null };
    }

    const requestedAt = this.now();
    const timeoutMs = this.options.config.timeoutSeconds * 1000;
    const request: ApprovalRequest = {
      id: generateId(),
      jobId: job.id,
      sessionId: job.sessionId,
      scope: classification.scope,
      actionDescription: classification.description,
      details: { toolName: signal.toolName, toolInput: signal.toolInput },
      transport: signal.transport,
      requestedAt,
      expiresAt: new Date(requestedAt.getTime() + timeoutMs),
      decidedAt: null,
      decision: "pending",
      reason: null,
    };

    const waiting = store.openApproval(request);

    const verdict = new Promise<ApprovalVerdict>((resolve) => {
      const watchdog = createApprovalExpiryWatchdog(() => this.expire(job.id, request.id), timeoutMs);
      this.pending.set(job.id, { request, watchdog, resolve });
      watchdog.start({ jobId: job.id, requestId: request.id });
    });

    logger.info(`Job ${job.id} waiting for approval: ${request.actionDescription}`);
    this.options.hooks.onWaiting?.(waiting, request);
    return verdict;
  }

  private expire(jobId: string, requestId: string): void {
    const entry = this.pending.get(jobId);
    if (!entry || entry.request.id !== requestId) {
      return;
    }

    const seconds = this.options.config.timeoutSeconds;
    const reason = `Approval expired after ${seconds}s`;
    this.clearPending(jobId);

    try {
      if (this.options.store.resolveApproval(requestId, "expired", reason)) {
        this.options.store.updateJob(jobId, { approvalState: "expired" });
      }
    } catch (error) {
      logger.error(`Failed to record approval expiry for job ${jobId}: ${errorMessage(error)}`, error);
    }

    logger.warn(`Approval for job ${jobId} expired`);
    entry.resolve({ decision: "expired", reason, grantedScope: null });
    this.options.hooks.terminate(jobId, { errorType: "approval_expired", error: reason }).catch((error: unknown) => {
      logger.error(`Failed to terminate job ${jobId} after approval expiry: ${errorMessage(error)}`, error);
    });
  }

  private requirePending(jobId: string): PendingDecision {
    const entry = this.pending.get(jobId);
    if (!entry) {
      throw new ConflictError(`No pending approval for job ${jobId}`, "NO_PENDING_APPROVAL");
    }
    return entry;
  }

  private clearPending(jobId: string): void {
    const entry = this.pending.get(jobId);
    if (entry) {
      entry.watchdog.stop();
      this.pending.delete(jobId);
    }
  }

  private resumeSession(sessionId: string, jobId: string): void {
    const session = this.options.store.getSession(sessionId);
    if (session?.state === "blocked") {
      this.options.store.transitionSession(sessionId, "running", `Job ${jobId} approved`);
    }
  }
}
