import { Command } from "commander";
import pc from "picocolors";
import { loadConfig } from "../config/loader.js";
import { StateManager } from "../../core/state/state-manager.js";
import { logger } from "../../infra/logger.js";

export function createApprovalsCommand(): Command {
  return new Command("approvals")
    .description("List approval requests waiting for a decision")
    .option("--json", "Output as JSON", false)
    .action((options: { json: boolean }) => {
      const config = loadConfig();
      const store = new StateManager(config.dataDir);
      try {
        const approvals = store.listPendingApprovals();

        if (options.json) {
          console.log(JSON.stringify(approvals, null, 2));
          return;
        }

        logger.header("agent-relay - Pending Approvals");
        if (approvals.length === 0) {
          console.error(pc.dim("  Nothing is waiting for approval"));
          return;
        }
        for (const approval of approvals) {
          console.error(`  ${pc.bold(approval.jobId)}  ${pc.yellow(approval.scope)}  ${approval.actionDescription}`);
          console.error(pc.dim(`    session ${approval.sessionId}, expires ${approval.expiresAt.toISOString()}`));
        }
      } catch (error) {
        logger.error("Failed to list approvals", error);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });
}
