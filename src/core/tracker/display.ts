import { logger } from "../../infra/logger.js";

export type ControlAction = "pause" | "resume" | "cancel" | "approve" | "deny" | "summary" | "logs";

export const CONTROL_ACTIONS: readonly ControlAction[] = [
  "pause",
  "resume",
  "cancel",
  "approve",
  "deny",
  "summary",
  "logs",
];

export interface DisplayControl {
  label: string;
  /** Opaque callback token, `action:jobId` */
  token: string;
}

export interface DisplayPayload {
  text: string;
  controls: DisplayControl[];
}

export interface DisplayHandle {
  target: string;
  id: string;
}

/**
 * Chat-side display the tracker drives. Implementations talk to the chat
 * platform; the tracker only creates, edits, and finalizes one message per
 * job.
 */
export interface DisplayAdapter {
  createDisplay(target: string, payload: DisplayPayload): Promise<DisplayHandle>;
  updateDisplay(handle: DisplayHandle, payload: DisplayPayload): Promise<void>;
  finalizeDisplay(handle: DisplayHandle, payload: DisplayPayload): Promise<void>;
}

export function controlToken(action: ControlAction, jobId: string): string {
  return `${action}:${jobId}`;
}

/**
 * Split an `action:jobId` token. Returns null for anything else.
 */
export function parseControlToken(token: string): { action: ControlAction; jobId: string } | null {
  const index = token.indexOf(":");
  if (index <= 0 || index === token.length - 1) {
    return null;
  }
  const name = token.slice(0, index);
  const action = CONTROL_ACTIONS.find((candidate) => candidate === name);
  if (action === undefined) {
    return null;
  }
  return { action, jobId: token.slice(index + 1) };
}

/**
 * Display that prints payloads through the logger. Used when no chat
 * platform is attached (the MCP server and local runs).
 */
export class ConsoleDisplay implements DisplayAdapter {
  private counter = 0;

  async createDisplay(target: string, payload: DisplayPayload): Promise<DisplayHandle> {
    const handle = { target, id: `console-${++this.counter}` };
    this.print(handle, payload);
    return handle;
  }

  async updateDisplay(handle: DisplayHandle, payload: DisplayPayload): Promise<void> {
    this.print(handle, payload);
  }

  async finalizeDisplay(handle: DisplayHandle, payload: DisplayPayload): Promise<void> {
    this.print(handle, payload);
  }

  private print(handle: DisplayHandle, payload: DisplayPayload): void {
    const controls = payload.controls.map((control) => `[${control.label}]`).join(" ");
    logger.block(`${handle.target} #${handle.id}`, controls ? `${payload.text}\n${controls}` : payload.text);
  }
}
