import { z } from "zod";

export const GatedScopeSchema = z.enum([
  "write",
  "delete_file",
  "shell",
  "shell_sudo",
  "push",
  "force_push",
  "delete_branch",
  "deploy",
  "deploy_prod",
  "external_api",
  "network",
]);

export type GatedScope = z.infer<typeof GatedScopeSchema>;

export const ALL_GATED_SCOPES: readonly GatedScope[] = GatedScopeSchema.options;

export const ApprovalDecisionSchema = z.enum(["pending", "approved", "denied", "expired"]);

export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>;

export const ApprovalTransportSchema = z.enum(["stream", "hook"]);

/** How the agent delivered the interception */
export type ApprovalTransport = z.infer<typeof ApprovalTransportSchema>;

export interface ApprovalRequest {
  id: string;
  jobId: string;
  sessionId: string;
  scope: GatedScope;
  actionDescription: string;
  details: ApprovalDetails;
  transport: ApprovalTransport;
  requestedAt: Date;
  expiresAt: Date;
  decidedAt: Date | null;
  decision: ApprovalDecision;
  reason: string | null;
}

export interface ApprovalDetails {
  toolName: string;
  toolInput: Record<string, unknown>;
}

/**
 * A gated-action interception raised by the agent, whichever transport
 * carried it
 */
export interface ApprovalSignal {
  transport: ApprovalTransport;
  jobId: string;
  toolName: string;
  toolInput: Record<string, unknown>;
  /** Scope claimed by the agent; classification decides when absent */
  scope?: GatedScope;
  /** Agent-side correlation id, echoed back on stream responses */
  requestId?: string;
}

export interface ApprovalVerdict {
  decision: Exclude<ApprovalDecision, "pending">;
  reason: string | null;
  /** Set when the request was approved for its whole scope */
  grantedScope: GatedScope | null;
}

/**
 * Result of classifying one tool use against the approval policy
 */
export type ActionClassification =
  | { kind: "ungated" }
  | { kind: "whitelisted"; description: string }
  | { kind: "gated"; scope: GatedScope; description: string; alwaysGate: boolean };
