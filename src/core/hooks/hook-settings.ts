/**
 * Hook settings for the agent
 *
 * Writes the settings file that registers `agent-relay hook pre-tool-use` as
 * the agent's PreToolUse hook. The file is passed to the agent on its command
 * line, so workspaces stay untouched.
 */

import { writeFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../../infra/logger.js";

/** Headroom past the approval timeout so the relay answers before the agent gives up */
const HOOK_TIMEOUT_MARGIN_SECONDS = 60;

export interface HookCommand {
  type: "command";
  command: string;
  timeout?: number;
}

/**
 * Agent settings structure (hooks section only)
 */
export interface AgentHookSettings {
  hooks: {
    PreToolUse: Array<{ matcher: string; hooks: HookCommand[] }>;
  };
}

export interface HookSettingsOptions {
  /** Command the agent runs for each tool call */
  command: string;
  /** How long an approval may stay open */
  approvalTimeoutSeconds: number;
}

export function buildHookSettings(options: HookSettingsOptions): AgentHookSettings {
  return {
    hooks: {
      PreToolUse: [
        {
          matcher: "*",
          hooks: [
            {
              type: "command",
              command: options.command,
              timeout: options.approvalTimeoutSeconds + HOOK_TIMEOUT_MARGIN_SECONDS,
            },
          ],
        },
      ],
    },
  };
}

/**
 * Write the settings file, creating its directory when needed
 */
export function writeHookSettings(outputPath: string, options: HookSettingsOptions): AgentHookSettings {
  const settings = buildHookSettings(options);

  const settingsDir = dirname(outputPath);
  if (!existsSync(settingsDir)) {
    mkdirSync(settingsDir, { recursive: true });
  }

  writeFileSync(outputPath, JSON.stringify(settings, null, 2), "utf-8");
  logger.debug(`Generated hook settings: ${outputPath}`);

  return settings;
}
