import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { logger } from "../../infra/logger.js";

export interface AgentSpawnOptions {
  command: string;
  args: string[];
  cwd: string;
  /** Added to the parent environment */
  env: Record<string, string>;
}

export interface AgentProcessHandlers {
  onStdoutLine: (line: string) => void;
  onStderrLine: (line: string) => void;
  /** Called once all output has been delivered */
  onExit: (exitCode: number | null, signal: NodeJS.Signals | null) => void;
  /** Spawn failure */
  onError: (error: Error) => void;
}

/**
 * Handle on one running agent process
 */
export interface AgentProcess {
  readonly pid: number | null;
  /** Write one line to the agent's stdin */
  write(line: string): void;
  kill(signal: NodeJS.Signals): void;
}

export type AgentProcessFactory = (options: AgentSpawnOptions, handlers: AgentProcessHandlers) => AgentProcess;

/**
 * Spawn the agent as a child process with line-oriented stdout and stderr
 */
export const spawnAgentProcess: AgentProcessFactory = (options, handlers) => {
  const proc = spawn(options.command, options.args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: ["pipe", "pipe", "pipe"],
  });

  createInterface({ input: proc.stdout, crlfDelay: Infinity }).on("line", handlers.onStdoutLine);
  createInterface({ input: proc.stderr, crlfDelay: Infinity }).on("line", handlers.onStderrLine);

  // Writes after the agent exits fail with EPIPE
  proc.stdin.on("error", (error) => {
    logger.debug(`Agent stdin closed: ${error.message}`);
  });

  proc.on("error", handlers.onError);
  proc.on("close", handlers.onExit);

  return {
    pid: proc.pid ?? null,
    write(line: string): void {
      if (proc.stdin.writable) {
        proc.stdin.write(`${line}\n`);
      }
    },
    kill(signal: NodeJS.Signals): void {
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill(signal);
      }
    },
  };
};
