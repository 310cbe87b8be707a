import { describe, it, expect } from "vitest";
import { tmpdir } from "node:os";
import { spawnAgentProcess, type AgentProcessHandlers } from "../../../src/core/engine/agent-process.js";

interface Captured {
  stdout: string[];
  stderr: string[];
  exit: Promise<{ code: number | null; signal: NodeJS.Signals | null }>;
  error: Promise<Error>;
  handlers: AgentProcessHandlers;
}

function capture(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const settle: {
    exit: (value: { code: number | null; signal: NodeJS.Signals | null }) => void;
    error: (error: Error) => void;
  } = { exit: () => undefined, error: () => undefined };

  const exit = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve) => {
    settle.exit = resolve;
  });
  const error = new Promise<Error>((resolve) => {
    settle.error = resolve;
  });

  return {
    stdout,
    stderr,
    exit,
    error,
    handlers: {
      onStdoutLine: (line) => stdout.push(line),
      onStderrLine: (line) => stderr.push(line),
      onExit: (code, signal) => settle.exit({ code, signal }),
      onError: (err) => settle.error(err),
    },
  };
}

const ECHO_SCRIPT = [
  'const rl = require("node:readline").createInterface({ input: process.stdin });',
  'console.log("hello " + process.env.AGENT_RELAY_JOB_ID);',
  'console.error("warming up");',
  'rl.on("line", (line) => { console.log("got " + line); process.exit(3); });',
].join("\n");

describe("spawnAgentProcess", () => {
  it("should deliver output lines, accept stdin, and report the exit code", async () => {
    const captured = capture();

    const proc = spawnAgentProcess(
      { command: process.execPath, args: ["-e", ECHO_SCRIPT], cwd: tmpdir(), env: { AGENT_RELAY_JOB_ID: "j1" } },
      captured.handlers
    );
    proc.write("ping");

    await expect(captured.exit).resolves.toEqual({ code: 3, signal: null });
    expect(proc.pid).toEqual(expect.any(Number));
    expect(captured.stdout).toEqual(["hello j1", "got ping"]);
    expect(captured.stderr).toEqual(["warming up"]);
  });

  it("should report the signal that ended the process", async () => {
    const captured = capture();

    const proc = spawnAgentProcess(
      { command: process.execPath, args: ["-e", "setInterval(() => {}, 1000);"], cwd: tmpdir(), env: {} },
      captured.handlers
    );
    proc.kill("SIGTERM");

    await expect(captured.exit).resolves.toEqual({ code: null, signal: "SIGTERM" });
    expect(() => proc.kill("SIGKILL")).not.toThrow();
  });

  it("should report a command that cannot be started", async () => {
    const captured = capture();

    spawnAgentProcess(
      { command: "agent-relay-missing-binary", args: [], cwd: tmpdir(), env: {} },
      captured.handlers
    );

    const error = await captured.error;
    expect(error.message).toContain("ENOENT");
  });
});
