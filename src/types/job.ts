import { z } from "zod";
import type { GatedScope } from "./approval.js";

export const JobStatusSchema = z.enum([
  "queued",
  "running",
  "waiting_approval",
  "done",
  "failed",
  "canceled",
]);

export type JobStatus = z.infer<typeof JobStatusSchema>;

/** Valid transitions for the job state machine */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running", "canceled"],
  running: ["done", "failed", "waiting_approval", "canceled"],
  waiting_approval: ["running", "canceled", "failed"],
  done: [],
  failed: [],
  canceled: [],
};

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ["done", "failed", "canceled"];

/** Statuses that hold the session's single running slot */
export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = ["running", "waiting_approval"];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export const JobApprovalStateSchema = z.enum(["pending", "approved", "denied", "expired"]);

export type JobApprovalState = z.infer<typeof JobApprovalStateSchema>;

export const JobErrorTypeSchema = z.enum([
  "process_error",
  "timeout",
  "orphaned",
  "store_error",
  "approval_denied",
  "approval_expired",
  "canceled",
]);

export type JobErrorType = z.infer<typeof JobErrorTypeSchema>;

export interface Job {
  id: string;
  sessionId: string;
  instruction: string;
  status: JobStatus;
  approvalScope: GatedScope | null;
  approvalState: JobApprovalState | null;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  resultSummary: string | null;
  filesChanged: string[] | null;
  error: string | null;
  errorType: JobErrorType | null;
  logPath: string | null;
  /** Submission order across all sessions */
  seq: number;
}

export interface JobTransition {
  jobId: string;
  fromStatus: JobStatus;
  toStatus: JobStatus;
  timestamp: Date;
  reason: string;
}

/**
 * Fields written together with a status change
 */
export interface JobPatch {
  approvalScope?: Job["approvalScope"];
  approvalState?: JobApprovalState | null;
  startedAt?: Date;
  finishedAt?: Date;
  resultSummary?: string | null;
  filesChanged?: string[] | null;
  error?: string | null;
  errorType?: JobErrorType | null;
  logPath?: string | null;
}

/**
 * Outcome of one agent run as reported by the executor
 */
export interface JobResult {
  jobId: string;
  status: Extract<JobStatus, "done" | "failed" | "canceled">;
  exitCode: number | null;
  signal: string | null;
  resultSummary: string | null;
  filesChanged: string[] | null;
  error: string | null;
  errorType: JobErrorType | null;
  durationMs: number;
}

export interface SubmitJobResult {
  jobId: string;
  status: JobStatus;
  /** Queued jobs ahead of this one in its session (0 = next) */
  queuePosition: number;
}

export interface JobListFilter {
  sessionId?: string;
  statuses?: JobStatus[];
  limit?: number;
}
