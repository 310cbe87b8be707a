import { Command } from "commander";
import pc from "picocolors";
import { loadConfig } from "../config/loader.js";
import { StateManager } from "../../core/state/state-manager.js";
import { logger } from "../../infra/logger.js";
import type { SessionState } from "../../types/session.js";

const STATE_COLORS: Record<SessionState, (text: string) => string> = {
  idle: pc.green,
  running: pc.cyan,
  blocked: pc.yellow,
  closing: pc.gray,
};

export function createSessionsCommand(): Command {
  return new Command("sessions")
    .description("List sessions and their workspaces")
    .option("--json", "Output as JSON", false)
    .action((options: { json: boolean }) => {
      const config = loadConfig();
      const store = new StateManager(config.dataDir);
      try {
        const sessions = store.listSessions();

        if (options.json) {
          console.log(JSON.stringify(sessions, null, 2));
          return;
        }

        logger.header("agent-relay - Sessions");
        if (sessions.length === 0) {
          console.error(pc.dim("  No sessions"));
          return;
        }
        for (const session of sessions) {
          const job = session.currentJobId ? pc.dim(` job ${session.currentJobId}`) : "";
          console.error(`  ${pc.bold(session.id)}  ${STATE_COLORS[session.state](session.state)}${job}`);
          console.error(pc.dim(`    ${session.workspace.path} (${session.workspace.branch})`));
        }
      } catch (error) {
        logger.error("Failed to list sessions", error);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });
}
