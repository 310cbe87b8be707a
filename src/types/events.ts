import type { GatedScope } from "./approval.js";

export type SessionEventType =
  | "system-init"
  | "system-result"
  | "ai-speech"
  | "ai-thinking"
  | "tool-start"
  | "tool-result"
  | "tool-error"
  | "approval-needed";

interface BaseEvent {
  readonly id: string;
  readonly jobId: string;
  readonly sessionId: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export interface SystemInitEvent extends BaseEvent {
  readonly type: "system-init";
  readonly tools: readonly string[];
  readonly cwd: string | null;
  readonly model: string | null;
}

export interface SystemResultEvent extends BaseEvent {
  readonly type: "system-result";
  readonly subtype: string;
  readonly isError: boolean;
  readonly result: string | null;
  readonly costUsd: number | null;
  readonly numTurns: number | null;
  readonly durationMs: number | null;
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface AiSpeechEvent extends BaseEvent {
  readonly type: "ai-speech";
  readonly text: string;
}

export interface AiThinkingEvent extends BaseEvent {
  readonly type: "ai-thinking";
  readonly thinking: string;
}

export interface ToolStartEvent extends BaseEvent {
  readonly type: "tool-start";
  readonly toolName: string;
  readonly toolUseId: string;
  readonly toolInput: Readonly<Record<string, unknown>>;
}

export interface ToolResultEvent extends BaseEvent {
  readonly type: "tool-result";
  readonly toolName: string;
  readonly toolUseId: string;
  readonly result: string;
}

export interface ToolErrorEvent extends BaseEvent {
  readonly type: "tool-error";
  readonly toolName: string;
  readonly toolUseId: string;
  readonly error: string;
}

export interface ApprovalNeededEvent extends BaseEvent {
  readonly type: "approval-needed";
  readonly toolName: string;
  readonly toolInput: Readonly<Record<string, unknown>>;
  readonly scope: GatedScope | null;
  readonly requestId: string | null;
}

export type SessionEvent =
  | SystemInitEvent
  | SystemResultEvent
  | AiSpeechEvent
  | AiThinkingEvent
  | ToolStartEvent
  | ToolResultEvent
  | ToolErrorEvent
  | ApprovalNeededEvent;

/** Events that force an immediate buffer flush */
export function isUrgentEvent(event: SessionEvent): boolean {
  return event.type === "approval-needed" || event.type === "system-result";
}

export function isErrorEvent(event: SessionEvent): boolean {
  return event.type === "tool-error" || (event.type === "system-result" && event.isError);
}
