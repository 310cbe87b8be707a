import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

import type { Orchestrator } from "../core/engine/orchestrator.js";
import { logger } from "../infra/logger.js";
import { errorMessage } from "../infra/errors.js";
import { mapToMCPError } from "./middleware/error-handler.js";
import { createToolRegistry, type ToolRegistry } from "./tools/index.js";
import type { MCPContext } from "./types.js";

export interface MCPServerOptions {
  orchestrator: Orchestrator;
  name?: string;
  version?: string;
}

/**
 * MCP Server for agent-relay
 *
 * Exposes the orchestrator (jobs, approvals, sessions, tracker controls) as
 * MCP tools for any MCP-compatible client.
 */
export class MCPServer {
  private server: Server;
  private toolRegistry: ToolRegistry;
  private activeOperations: Map<string, AbortController> = new Map();
  private operationCounter = 0;

  constructor(options: MCPServerOptions) {
    this.server = new Server(
      {
        name: options.name ?? "agent-relay",
        version: options.version ?? "0.1.0",
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.toolRegistry = createToolRegistry({ orchestrator: options.orchestrator });

    this.setupToolHandlers();
    this.setupErrorHandlers();
  }

  /**
   * Connect the server to a transport
   */
  async connect(transport: Transport): Promise<void> {
    logger.debug("Connecting MCP server to transport");
    await this.server.connect(transport);
    logger.info("MCP server connected");
  }

  /**
   * Close the server and abort tool calls still running
   */
  async close(): Promise<void> {
    for (const [opId, controller] of this.activeOperations) {
      logger.debug(`Cancelling operation ${opId}`);
      controller.abort();
    }
    this.activeOperations.clear();

    await this.server.close();
    logger.info("MCP server closed");
  }

  getToolRegistry(): ToolRegistry {
    return this.toolRegistry;
  }

  /**
   * Set up tool request handlers
   */
  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.toolRegistry.listTools();
      logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      logger.debug(`Tool call: ${name}`, { args });

      const handler = this.toolRegistry.getHandler(name);
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      const operationId = `${name}-${++this.operationCounter}`;
      const abortController = new AbortController();
      this.activeOperations.set(operationId, abortController);

      const context: MCPContext = {
        isCancelled: () => abortController.signal.aborted,
      };

      try {
        const result = await handler(args ?? {}, context);
        logger.debug(`Tool ${name} completed`, { success: result.success });

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(result, null, 2),
            },
          ],
          isError: !result.success,
        };
      } catch (error) {
        logger.error(`Tool ${name} failed: ${errorMessage(error)}`, error);
        throw mapToMCPError(error);
      } finally {
        this.activeOperations.delete(operationId);
      }
    });
  }

  private setupErrorHandlers(): void {
    this.server.onerror = (error): void => {
      logger.error(`MCP server error: ${error.message}`, error);
    };
  }

  /**
   * Get the underlying MCP server instance
   */
  getServer(): Server {
    return this.server;
  }
}

/**
 * Create and configure an MCP server instance
 */
export function createMCPServer(options: MCPServerOptions): MCPServer {
  return new MCPServer(options);
}
