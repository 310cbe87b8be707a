import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { config as loadEnv } from "dotenv";
import { type Config, ConfigSchema } from "../../types/config.js";
import { ConfigurationError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

// Load .env file if it exists
loadEnv();

const DEFAULT_DATA_DIR = join(homedir(), ".agent-relay");
const CONFIG_FILE_NAME = "config.json";

type Env = Record<string, string | undefined>;

export function expandPath(path: string): string {
  if (path === "~" || path.startsWith("~/")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

export function getDataDir(env: Env = process.env): string {
  return expandPath(env["AGENT_RELAY_DATA_DIR"] ?? DEFAULT_DATA_DIR);
}

export function getConfigPath(env: Env = process.env): string {
  return join(getDataDir(env), CONFIG_FILE_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file: ${configPath}`, toError(error));
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${configPath}`);
  }
  logger.debug(`Loaded config from ${configPath}`);
  return parsed;
}

/**
 * Apply environment overrides on top of the file config
 */
function applyEnv(fileConfig: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...fileConfig };

  const maxJobs = env["AGENT_RELAY_MAX_CONCURRENT_JOBS"];
  if (maxJobs !== undefined && maxJobs !== "") {
    const value = Number(maxJobs);
    if (!Number.isInteger(value)) {
      throw new ConfigurationError(`AGENT_RELAY_MAX_CONCURRENT_JOBS must be an integer, got "${maxJobs}"`);
    }
    merged["scheduler"] = { ...section(fileConfig, "scheduler"), maxConcurrentJobs: value };
  }

  const agentCommand = env["AGENT_RELAY_AGENT_COMMAND"];
  if (agentCommand) {
    merged["execution"] = { ...section(fileConfig, "execution"), agentCommand };
  }

  const level = env["AGENT_RELAY_LOG_LEVEL"];
  if (level) {
    merged["logging"] = { ...section(fileConfig, "logging"), level };
  }

  if (env["AGENT_RELAY_VERBOSE"] === "true") {
    merged["verbose"] = true;
  }

  return merged;
}

/**
 * Load configuration: defaults < <dataDir>/config.json < environment.
 * The data directory always comes from AGENT_RELAY_DATA_DIR (or the
 * default), since the config file lives inside it.
 */
export function loadConfig(env: Env = process.env): Config {
  const dataDir = getDataDir(env);
  const merged = applyEnv(readConfigFile(getConfigPath(env)), env);
  merged["dataDir"] = dataDir;

  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({ dataDir: DEFAULT_DATA_DIR });
}
