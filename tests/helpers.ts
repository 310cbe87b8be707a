/**
 * Shared test doubles: a temp-dir store, an in-memory workspace provider, a
 * recording display, and scripted agent processes.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StateManager } from "../src/core/state/state-manager.js";
import type { AllocateWorkspaceOptions, WorkspaceProvider } from "../src/core/workspace/workspace-provider.js";
import type { DisplayAdapter, DisplayHandle, DisplayPayload } from "../src/core/tracker/display.js";
import type {
  AgentProcess,
  AgentProcessFactory,
  AgentProcessHandlers,
  AgentSpawnOptions,
} from "../src/core/engine/agent-process.js";
import type { Workspace } from "../src/types/session.js";
import type {
  AiSpeechEvent,
  AiThinkingEvent,
  ApprovalNeededEvent,
  SystemResultEvent,
  ToolErrorEvent,
  ToolResultEvent,
  ToolStartEvent,
} from "../src/types/events.js";

/**
 * Create a temporary data directory with a StateManager
 */
export function createTestEnvironment(): {
  tempDir: string;
  store: StateManager;
  cleanup: () => void;
} {
  const tempDir = mkdtempSync(join(tmpdir(), "agent-relay-test-"));
  const store = new StateManager(tempDir);

  return {
    tempDir,
    store,
    cleanup: () => {
      store.close();
      rmSync(tempDir, { recursive: true, force: true });
    },
  };
}

export function testWorkspace(sessionId = "s1"): Workspace {
  return { path: `/tmp/workspaces/repo-${sessionId}`, branch: `relay/${sessionId}`, repoPath: "/tmp/repo" };
}

/**
 * Workspace provider that keeps everything in memory
 */
export class FakeWorkspaceProvider implements WorkspaceProvider {
  readonly allocated: Workspace[] = [];
  readonly destroyed: Workspace[] = [];
  changed: string[] = [];
  failAllocate: Error | null = null;

  async allocate(options: AllocateWorkspaceOptions): Promise<Workspace> {
    if (this.failAllocate) {
      throw this.failAllocate;
    }
    const workspace = {
      path: `/tmp/workspaces/repo-${options.sessionId}`,
      branch: options.branch ?? `relay/${options.sessionId}`,
      repoPath: options.repoPath,
    };
    this.allocated.push(workspace);
    return workspace;
  }

  async destroy(workspace: Workspace): Promise<void> {
    this.destroyed.push(workspace);
  }

  async snapshot(): Promise<string | null> {
    return "abc123";
  }

  async changedFiles(): Promise<string[]> {
    return [...this.changed];
  }
}

export interface RecordedDisplayCall {
  kind: "create" | "update" | "finalize";
  handle: DisplayHandle;
  payload: DisplayPayload;
}

/**
 * Display that records every call
 */
export class RecordingDisplay implements DisplayAdapter {
  readonly calls: RecordedDisplayCall[] = [];
  private counter = 0;

  async createDisplay(target: string, payload: DisplayPayload): Promise<DisplayHandle> {
    const handle = { target, id: `msg-${++this.counter}` };
    this.calls.push({ kind: "create", handle, payload });
    return handle;
  }

  async updateDisplay(handle: DisplayHandle, payload: DisplayPayload): Promise<void> {
    this.calls.push({ kind: "update", handle, payload });
  }

  async finalizeDisplay(handle: DisplayHandle, payload: DisplayPayload): Promise<void> {
    this.calls.push({ kind: "finalize", handle, payload });
  }

  last(): RecordedDisplayCall | undefined {
    return this.calls[this.calls.length - 1];
  }
}

/**
 * Agent process driven by the test: emit output lines and exit on demand.
 * A kill with SIGTERM exits the process unless `ignoreSigterm` is set.
 */
export class FakeAgentProcess implements AgentProcess {
  readonly pid: number | null = 4242;
  readonly written: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  ignoreSigterm = false;
  exited = false;

  constructor(
    readonly options: AgentSpawnOptions,
    private readonly handlers: AgentProcessHandlers
  ) {}

  write(line: string): void {
    this.written.push(line);
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.ignoreSigterm) {
      return;
    }
    this.exit(null, signal);
  }

  emit(line: string): void {
    this.handlers.onStdoutLine(line);
  }

  emitEvent(event: Record<string, unknown>): void {
    this.emit(JSON.stringify(event));
  }

  stderr(line: string): void {
    this.handlers.onStderrLine(line);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.handlers.onExit(code, signal);
  }

  fail(error: Error): void {
    this.handlers.onError(error);
  }
}

/**
 * Factory that records every spawned fake process
 */
export function createFakeSpawner(): {
  spawn: AgentProcessFactory;
  processes: FakeAgentProcess[];
  latest: () => FakeAgentProcess;
} {
  const processes: FakeAgentProcess[] = [];
  return {
    processes,
    spawn: (options, handlers) => {
      const proc = new FakeAgentProcess(options, handlers);
      processes.push(proc);
      return proc;
    },
    latest: () => {
      const proc = processes[processes.length - 1];
      if (!proc) {
        throw new Error("No agent process spawned");
      }
      return proc;
    },
  };
}

/**
 * Let pending promise callbacks and immediate timers run
 */
export async function flush(times = 5): Promise<void> {
  for (let i = 0; i < times; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

// ============ Events ============

let eventSeq = 0;

function eventBase(timestamp: number): { id: string; jobId: string; sessionId: string; timestamp: number } {
  eventSeq++;
  return { id: `job-1-${eventSeq}`, jobId: "job-1", sessionId: "s1", timestamp };
}

/**
 * Builders for parsed events of job-1 in session s1
 */
export const testEvents = {
  speech: (text: string, timestamp = 0): AiSpeechEvent => ({ ...eventBase(timestamp), type: "ai-speech", text }),

  thinking: (thinking: string, timestamp = 0): AiThinkingEvent => ({
    ...eventBase(timestamp),
    type: "ai-thinking",
    thinking,
  }),

  toolStart: (toolName: string, toolInput: Record<string, unknown> = {}, timestamp = 0): ToolStartEvent => ({
    ...eventBase(timestamp),
    type: "tool-start",
    toolName,
    toolUseId: `tu-${eventSeq}`,
    toolInput,
  }),

  toolResult: (toolName: string, result: string, timestamp = 0): ToolResultEvent => ({
    ...eventBase(timestamp),
    type: "tool-result",
    toolName,
    toolUseId: "tu-0",
    result,
  }),

  toolError: (toolName: string, error: string, timestamp = 0): ToolErrorEvent => ({
    ...eventBase(timestamp),
    type: "tool-error",
    toolName,
    toolUseId: "tu-0",
    error,
  }),

  result: (overrides: Partial<Omit<SystemResultEvent, "type" | "id" | "jobId" | "sessionId">> = {}): SystemResultEvent => ({
    ...eventBase(overrides.timestamp ?? 0),
    type: "system-result",
    subtype: "success",
    isError: false,
    result: "Done",
    costUsd: null,
    numTurns: null,
    durationMs: null,
    inputTokens: 0,
    outputTokens: 0,
    ...overrides,
  }),

  approval: (toolName: string, toolInput: Record<string, unknown> = {}, timestamp = 0): ApprovalNeededEvent => ({
    ...eventBase(timestamp),
    type: "approval-needed",
    toolName,
    toolInput,
    scope: null,
    requestId: null,
  }),
};
