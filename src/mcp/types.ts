import { z } from "zod";
import { GatedScopeSchema } from "../types/approval.js";
import { JobStatusSchema } from "../types/job.js";
import { SessionStateSchema } from "../types/session.js";

// ============================================================================
// MCP Tool Input Schemas
// ============================================================================

export const EmptyInputSchema = z.object({});

// Job Tools
export const SubmitJobInputSchema = z.object({
  sessionId: z.string().min(1).describe("Session to run the job in"),
  instruction: z.string().describe("Instruction for the coding agent"),
});

export const JobIdInputSchema = z.object({
  jobId: z.string().min(1).describe("Job ID"),
});

export const ListJobsInputSchema = z.object({
  sessionId: z.string().min(1).optional().describe("Only jobs of this session"),
  statuses: z.array(JobStatusSchema).optional().describe("Only jobs in these statuses"),
  limit: z.number().int().positive().max(500).optional().describe("Maximum jobs to return"),
});

export const CancelJobInputSchema = z.object({
  jobId: z.string().min(1).describe("Job ID"),
  reason: z.string().optional().describe("Why the job is canceled"),
});

export const GetJobLogsInputSchema = z.object({
  jobId: z.string().min(1).describe("Job ID"),
  tail: z.number().int().positive().max(10000).optional().describe("Number of trailing lines"),
});

export const HandleControlInputSchema = z.object({
  token: z.string().min(1).describe("Control token of the form action:jobId"),
});

// Approval Tools
export const ApproveJobInputSchema = z.object({
  jobId: z.string().min(1).describe("Job ID"),
  scope: GatedScopeSchema.optional().describe("Grant this scope for the rest of the job"),
});

export const DenyJobInputSchema = z.object({
  jobId: z.string().min(1).describe("Job ID"),
  reason: z.string().optional().describe("Reason shown on the job"),
});

// Session Tools
export const CreateSessionInputSchema = z.object({
  repoPath: z.string().min(1).describe("Local git repository to work in"),
  branch: z.string().min(1).optional().describe("Branch to check out in the workspace"),
  displayTarget: z.string().min(1).optional().describe("Chat target for tracker displays"),
});

export const ListSessionsInputSchema = z.object({
  states: z.array(SessionStateSchema).optional().describe("Only sessions in these states"),
});

export const CloseSessionInputSchema = z.object({
  sessionId: z.string().min(1).describe("Session ID"),
  force: z.boolean().optional().describe("Cancel the running job instead of waiting for it"),
});

// ============================================================================
// MCP Tool Output Types
// ============================================================================

export interface ToolResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface JobInfo {
  id: string;
  sessionId: string;
  instruction: string;
  status: string;
  approvalScope: string | null;
  approvalState: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  resultSummary: string | null;
  filesChanged: string[] | null;
  error: string | null;
  errorType: string | null;
}

export interface SessionInfo {
  id: string;
  state: string;
  workspacePath: string;
  branch: string;
  repoPath: string;
  displayTarget: string;
  currentJobId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ApprovalInfo {
  id: string;
  jobId: string;
  sessionId: string;
  scope: string;
  actionDescription: string;
  toolName: string;
  transport: string;
  requestedAt: string;
  expiresAt: string;
}

// ============================================================================
// MCP Tool Names
// ============================================================================

export type MCPToolName =
  // Jobs
  | "submit_job"
  | "get_job"
  | "list_jobs"
  | "cancel_job"
  | "get_job_logs"
  | "handle_control"
  // Approvals
  | "list_pending_approvals"
  | "approve_job"
  | "deny_job"
  // Sessions
  | "create_session"
  | "list_sessions"
  | "close_session";

// ============================================================================
// MCP Server Context
// ============================================================================

export interface MCPContext {
  /** Check if the client went away while the tool ran */
  isCancelled: () => boolean;
}

// ============================================================================
// Input type inference helpers
// ============================================================================

export type SubmitJobInput = z.infer<typeof SubmitJobInputSchema>;
export type ListJobsInput = z.infer<typeof ListJobsInputSchema>;
export type CancelJobInput = z.infer<typeof CancelJobInputSchema>;
export type GetJobLogsInput = z.infer<typeof GetJobLogsInputSchema>;
export type ApproveJobInput = z.infer<typeof ApproveJobInputSchema>;
export type DenyJobInput = z.infer<typeof DenyJobInputSchema>;
export type CreateSessionToolInput = z.infer<typeof CreateSessionInputSchema>;
export type CloseSessionInput = z.infer<typeof CloseSessionInputSchema>;
