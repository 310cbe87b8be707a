import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { getConfigPath, loadConfig } from "../config/loader.js";

export function createConfigCommand(): Command {
  const command = new Command("config").description("View configuration");

  command
    .command("show")
    .description("Show the effective configuration")
    .option("--json", "Output as JSON", false)
    .action((options: { json: boolean }) => {
      try {
        const config = loadConfig();

        if (options.json) {
          console.log(JSON.stringify(config, null, 2));
          return;
        }

        logger.header("agent-relay - Configuration");
        console.error(pc.dim(`Config file: ${getConfigPath()}`));
        console.error("");
        console.error(JSON.stringify(config, null, 2));
      } catch (error) {
        logger.error("Failed to load configuration", error);
        process.exitCode = 1;
      }
    });

  command
    .command("path")
    .description("Print the config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  return command;
}
