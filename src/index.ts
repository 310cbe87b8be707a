// agent-relay - Main entry point
// This file exports the public API for programmatic usage

export * from "./types/index.js";
export * from "./infra/index.js";

export { StateManager, generateId } from "./core/state/state-manager.js";
export type { WorkspaceProvider, AllocateWorkspaceOptions } from "./core/workspace/workspace-provider.js";
export { GitWorkspaceProvider } from "./core/workspace/git-workspace-provider.js";
export { ApprovalGate } from "./core/approval/approval-gate.js";
export { classifyAction, needsApproval, approvalPolicyFromConfig } from "./core/approval/approval-policy.js";
export { HookServer, toPreToolUseResponse } from "./core/approval/hook-server.js";
export { Orchestrator, formatJobSummary } from "./core/engine/orchestrator.js";
export type { OrchestratorOptions, RecoveryReport, ControlResult } from "./core/engine/orchestrator.js";
export { JobExecutor } from "./core/engine/job-executor.js";
export { spawnAgentProcess } from "./core/engine/agent-process.js";
export type { AgentProcess, AgentProcessFactory, AgentProcessHandlers } from "./core/engine/agent-process.js";
export { ConsoleDisplay, controlToken, parseControlToken } from "./core/tracker/display.js";
export type { DisplayAdapter, DisplayHandle, DisplayPayload } from "./core/tracker/display.js";
export { EventParser } from "./core/tracker/event-parser.js";
export { loadConfig, getDefaultConfig } from "./cli/config/loader.js";
export { MCPServer, createMCPServer } from "./mcp/server.js";
export { VERSION } from "./version.js";
