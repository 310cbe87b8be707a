import type { ApprovalRequest } from "../../types/approval.js";
import type { Job } from "../../types/job.js";
import type { Session } from "../../types/session.js";
import type { ApprovalInfo, JobInfo, SessionInfo } from "../types.js";

export function toJobInfo(job: Job): JobInfo {
  return {
    id: job.id,
    sessionId: job.sessionId,
    instruction: job.instruction,
    status: job.status,
    approvalScope: job.approvalScope,
    approvalState: job.approvalState,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString() ?? null,
    finishedAt: job.finishedAt?.toISOString() ?? null,
    resultSummary: job.resultSummary,
    filesChanged: job.filesChanged,
    error: job.error,
    errorType: job.errorType,
  };
}

export function toSessionInfo(session: Session): SessionInfo {
  return {
    id: session.id,
    state: session.state,
    workspacePath: session.workspace.path,
    branch: session.workspace.branch,
    repoPath: session.workspace.repoPath,
    displayTarget: session.displayTarget,
    currentJobId: session.currentJobId,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
  };
}

export function toApprovalInfo(request: ApprovalRequest): ApprovalInfo {
  return {
    id: request.id,
    jobId: request.jobId,
    sessionId: request.sessionId,
    scope: request.scope,
    actionDescription: request.actionDescription,
    toolName: request.details.toolName,
    transport: request.transport,
    requestedAt: request.requestedAt.toISOString(),
    expiresAt: request.expiresAt.toISOString(),
  };
}
