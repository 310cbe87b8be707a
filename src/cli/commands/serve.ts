import { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { StateManager } from "../../core/state/state-manager.js";
import { GitWorkspaceProvider } from "../../core/workspace/git-workspace-provider.js";
import { ConsoleDisplay } from "../../core/tracker/display.js";
import { Orchestrator } from "../../core/engine/orchestrator.js";
import { createMCPServer } from "../../mcp/server.js";
import { startStdioServer } from "../../mcp/transports/stdio-transport.js";
import { CleanupManager, registerCustomCleanup } from "../../infra/cleanup-manager.js";
import { logger } from "../../infra/logger.js";
import { VERSION } from "../../version.js";

interface ServeOptions {
  hookServer: boolean;
  verbose: boolean;
}

export function createServeCommand(): Command {
  const command = new Command("serve")
    .description("Start the MCP server (stdio) that runs and tracks agent jobs")
    .option("--no-hook-server", "Do not start the approval hook server")
    .option("-v, --verbose", "Enable verbose output", false)
    .action(async (options: ServeOptions) => {
      try {
        await runServe(options);
      } catch (error) {
        logger.error("Failed to start MCP server", error);
        process.exit(1);
      }
    });

  return command;
}

async function runServe(options: ServeOptions): Promise<void> {
  const config = loadConfig();
  logger.configure({ level: config.logging.level, verbose: config.verbose });
  if (options.verbose || config.verbose) {
    logger.configure({ level: "debug", verbose: true });
  }
  if (!options.hookServer) {
    config.approval.hookServer.enabled = false;
  }

  const store = new StateManager(config.dataDir);
  const orchestrator = new Orchestrator({
    config,
    store,
    workspaces: new GitWorkspaceProvider(config.workspace, config.dataDir),
    display: new ConsoleDisplay(),
  });

  const cleanup = CleanupManager.getInstance();
  cleanup.installShutdownHandlers();
  // Runs before the per-process kill tasks so jobs end as canceled
  const shutdownTask = registerCustomCleanup("orchestrator", "Orchestrator shutdown", () => orchestrator.shutdown(), 30);

  await orchestrator.start();
  const hookUrl = orchestrator.getHookBaseUrl();
  if (hookUrl) {
    logger.debug(`Approval hooks post to ${hookUrl}`);
  }

  const server = createMCPServer({ orchestrator, version: VERSION });
  await startStdioServer(server);

  cleanup.unregister(shutdownTask);
  await orchestrator.shutdown();
}
