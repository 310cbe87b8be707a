import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { MCPServer } from "../server.js";
import { logger } from "../../infra/logger.js";

/**
 * Create and connect a stdio transport for the MCP server
 *
 * stdout carries the protocol; all logging goes to stderr.
 */
export async function createStdioTransport(server: MCPServer): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.debug("Stdio transport connected");
  return transport;
}

/**
 * Start the MCP server on stdio. Resolves once the client has closed the
 * connection.
 */
export async function startStdioServer(server: MCPServer): Promise<void> {
  const closed = new Promise<void>((resolve) => {
    server.getServer().onclose = () => {
      logger.info("MCP client disconnected");
      resolve();
    };
  });

  await createStdioTransport(server);
  logger.info("MCP server running (stdio mode)");

  await closed;
}
