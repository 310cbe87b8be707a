#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  createServeCommand,
  createJobsCommand,
  createJobCommand,
  createLogsCommand,
  createApprovalsCommand,
  createSessionsCommand,
  createConfigCommand,
  createHookCommand,
} from "./commands/index.js";
import { logger } from "../infra/logger.js";
import { VERSION } from "../version.js";

const program = new Command();

program
  .name("agent-relay")
  .description(pc.cyan("Run coding agents as tracked, approval-gated jobs"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts["verbose"]) {
      logger.configure({ level: "debug", verbose: true });
    }
  });

// Register commands
program.addCommand(createServeCommand());
program.addCommand(createJobsCommand());
program.addCommand(createJobCommand());
program.addCommand(createLogsCommand());
program.addCommand(createApprovalsCommand());
program.addCommand(createSessionsCommand());
program.addCommand(createConfigCommand());
program.addCommand(createHookCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.help") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  logger.error(`Command failed: ${err.message}`);
  process.exit(1);
});

// Parse and execute
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error instanceof Error ? error : undefined);
  process.exit(1);
});
