/**
 * MCP Approval Tools
 *
 * Implements list_pending_approvals, approve_job, deny_job
 */

import { ALL_GATED_SCOPES } from "../../types/approval.js";
import { ApproveJobInputSchema, DenyJobInputSchema, EmptyInputSchema } from "../types.js";
import type { RegisteredTool, ToolRegistryOptions } from "./index.js";
import { defineTool } from "./define-tool.js";
import { toApprovalInfo, toJobInfo } from "./serializers.js";

/**
 * Create approval tool handlers
 */
export function createApprovalTools(options: ToolRegistryOptions): RegisteredTool[] {
  const { orchestrator } = options;

  return [
    defineTool({
      name: "list_pending_approvals",
      description: "List actions waiting for a human decision",
      inputSchema: { type: "object", properties: {} },
      input: EmptyInputSchema,
      run: () => {
        const approvals = orchestrator.listPendingApprovals();
        return { count: approvals.length, approvals: approvals.map(toApprovalInfo) };
      },
    }),

    defineTool({
      name: "approve_job",
      description: "Approve the pending action of a job so the agent continues",
      inputSchema: {
        type: "object",
        properties: {
          jobId: { type: "string", description: "Job ID" },
          scope: {
            type: "string",
            enum: [...ALL_GATED_SCOPES],
            description: "Grant this scope for the rest of the job",
          },
        },
        required: ["jobId"],
      },
      input: ApproveJobInputSchema,
      run: (input) =>
        toJobInfo(
          input.scope !== undefined
            ? orchestrator.approveJob(input.jobId, input.scope)
            : orchestrator.approveJob(input.jobId)
        ),
    }),

    defineTool({
      name: "deny_job",
      description: "Deny the pending action of a job; the job is stopped",
      inputSchema: {
        type: "object",
        properties: {
          jobId: { type: "string", description: "Job ID" },
          reason: { type: "string", description: "Reason shown on the job" },
        },
        required: ["jobId"],
      },
      input: DenyJobInputSchema,
      run: async (input) => toJobInfo(await orchestrator.denyJob(input.jobId, input.reason)),
    }),
  ];
}
