import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import {
  RelayError,
  ConfigurationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../../infra/errors.js";
import type { ToolResult } from "../types.js";

/**
 * Maps the relay error hierarchy to MCP errors
 */
export function mapToMCPError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  // Unknown entities -> InvalidParams
  if (error instanceof NotFoundError) {
    return new McpError(ErrorCode.InvalidParams, error.message, {
      code: error.code,
      entity: error.entity,
      id: error.id,
    });
  }

  // Bad arguments -> InvalidParams
  if (error instanceof ValidationError) {
    return new McpError(ErrorCode.InvalidParams, error.message, { code: error.code });
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const message = issue ? `${issue.path.join(".") || "arguments"}: ${issue.message}` : "Invalid arguments";
    return new McpError(ErrorCode.InvalidParams, message, { code: "VALIDATION_ERROR" });
  }

  // State conflicts -> InvalidRequest
  if (error instanceof ConflictError) {
    return new McpError(ErrorCode.InvalidRequest, error.message, { code: error.code });
  }

  // Configuration errors -> InvalidRequest
  if (error instanceof ConfigurationError) {
    return new McpError(ErrorCode.InvalidRequest, error.message, { code: error.code });
  }

  // Any other relay error
  if (error instanceof RelayError) {
    return new McpError(ErrorCode.InternalError, error.message, { code: error.code });
  }

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(ErrorCode.InternalError, String(error));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Error response helper for tool results
 */
export function createErrorResult(error: unknown): ToolResult<never> {
  const mcpError = mapToMCPError(error);
  const result: ToolResult<never> = {
    success: false,
    error: {
      code: mcpError.code.toString(),
      // McpError prefixes its message with the code
      message: mcpError.message.replace(/^MCP error -?\d+: /, ""),
    },
  };

  if (result.error && isRecord(mcpError.data)) {
    result.error.details = mcpError.data;
  }

  return result;
}

/**
 * Success response helper for tool results
 */
export function createSuccessResult<T>(data: T): ToolResult<T> {
  return {
    success: true,
    data,
  };
}
