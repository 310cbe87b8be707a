import type { ZodType, ZodTypeDef } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { MCPContext, MCPToolName } from "../types.js";
import type { RegisteredTool, ToolHandler } from "./index.js";
import { createErrorResult, createSuccessResult } from "../middleware/error-handler.js";
import { logger } from "../../infra/logger.js";
import { errorMessage } from "../../infra/errors.js";

export interface ToolSpec<TInput> {
  name: MCPToolName;
  description: string;
  inputSchema: Tool["inputSchema"];
  /** Validates the raw arguments */
  input: ZodType<TInput, ZodTypeDef, unknown>;
  run: (input: TInput, context: MCPContext) => Promise<unknown> | unknown;
}

/**
 * Build a tool whose handler validates its arguments and wraps the outcome
 * in a ToolResult. Failures become error results carrying the MCP code.
 */
export function defineTool<TInput>(spec: ToolSpec<TInput>): RegisteredTool {
  const handler: ToolHandler = async (args, context) => {
    try {
      const input = spec.input.parse(args);
      return createSuccessResult(await spec.run(input, context));
    } catch (error) {
      logger.debug(`${spec.name} failed: ${errorMessage(error)}`);
      return createErrorResult(error);
    }
  };

  return {
    definition: {
      name: spec.name,
      description: spec.description,
      inputSchema: spec.inputSchema,
    },
    handler,
  };
}
