// MCP Server module
// Exposes the orchestrator as MCP tools

export { MCPServer, createMCPServer, type MCPServerOptions } from "./server.js";
export { createStdioTransport, startStdioServer } from "./transports/stdio-transport.js";
export {
  createToolRegistry,
  type ToolRegistry,
  type ToolHandler,
  type RegisteredTool,
  type ToolRegistryOptions,
} from "./tools/index.js";
export { defineTool, type ToolSpec } from "./tools/define-tool.js";
export { toJobInfo, toSessionInfo, toApprovalInfo } from "./tools/serializers.js";
export { mapToMCPError, createErrorResult, createSuccessResult } from "./middleware/error-handler.js";
export * from "./types.js";
