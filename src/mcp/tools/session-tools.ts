/**
 * MCP Session Tools
 *
 * Implements create_session, list_sessions, close_session
 */

import { SessionStateSchema, type CreateSessionInput } from "../../types/session.js";
import { CloseSessionInputSchema, CreateSessionInputSchema, ListSessionsInputSchema } from "../types.js";
import type { RegisteredTool, ToolRegistryOptions } from "./index.js";
import { defineTool } from "./define-tool.js";
import { toSessionInfo } from "./serializers.js";

/**
 * Create session tool handlers
 */
export function createSessionTools(options: ToolRegistryOptions): RegisteredTool[] {
  const { orchestrator } = options;

  return [
    defineTool({
      name: "create_session",
      description: "Bind a new session to an isolated worktree of a local repository",
      inputSchema: {
        type: "object",
        properties: {
          repoPath: { type: "string", description: "Local git repository to work in" },
          branch: { type: "string", description: "Branch to check out (a session branch is created if omitted)" },
          displayTarget: { type: "string", description: "Chat target for tracker displays" },
        },
        required: ["repoPath"],
      },
      input: CreateSessionInputSchema,
      run: async (input) => {
        const request: CreateSessionInput = { repoPath: input.repoPath };
        if (input.branch !== undefined) {
          request.branch = input.branch;
        }
        if (input.displayTarget !== undefined) {
          request.displayTarget = input.displayTarget;
        }
        return toSessionInfo(await orchestrator.createSession(request));
      },
    }),

    defineTool({
      name: "list_sessions",
      description: "List sessions and their workspaces",
      inputSchema: {
        type: "object",
        properties: {
          states: {
            type: "array",
            items: { type: "string", enum: [...SessionStateSchema.options] },
            description: "Only sessions in these states",
          },
        },
      },
      input: ListSessionsInputSchema,
      run: (input) => {
        const sessions = orchestrator.listSessions(input.states);
        return { count: sessions.length, sessions: sessions.map(toSessionInfo) };
      },
    }),

    defineTool({
      name: "close_session",
      description: "Close a session: cancel queued jobs, drain or cancel the running one, remove the workspace",
      inputSchema: {
        type: "object",
        properties: {
          sessionId: { type: "string", description: "Session ID" },
          force: { type: "boolean", description: "Cancel the running job instead of waiting for it" },
        },
        required: ["sessionId"],
      },
      input: CloseSessionInputSchema,
      run: async (input) => {
        await orchestrator.closeSession(input.sessionId, { force: input.force ?? false });
        return { sessionId: input.sessionId, closed: true };
      },
    }),
  ];
}
