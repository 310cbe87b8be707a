import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { Orchestrator } from "../../core/engine/orchestrator.js";
import type { MCPContext, ToolResult } from "../types.js";

import { createJobTools } from "./job-tools.js";
import { createApprovalTools } from "./approval-tools.js";
import { createSessionTools } from "./session-tools.js";

export interface ToolRegistryOptions {
  orchestrator: Orchestrator;
}

export type ToolHandler = (args: Record<string, unknown>, context: MCPContext) => Promise<ToolResult>;

export interface RegisteredTool {
  definition: Tool;
  handler: ToolHandler;
}

export interface ToolRegistry {
  listTools(): Tool[];
  getHandler(name: string): ToolHandler | undefined;
  register(tool: RegisteredTool): void;
}

/**
 * Create a tool registry with all MCP tools
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const tools = new Map<string, RegisteredTool>();

  for (const tool of [
    ...createJobTools(options),
    ...createApprovalTools(options),
    ...createSessionTools(options),
  ]) {
    tools.set(tool.definition.name, tool);
  }

  return {
    listTools(): Tool[] {
      return Array.from(tools.values()).map((t) => t.definition);
    },

    getHandler(name: string): ToolHandler | undefined {
      return tools.get(name)?.handler;
    },

    register(tool: RegisteredTool): void {
      tools.set(tool.definition.name, tool);
    },
  };
}
