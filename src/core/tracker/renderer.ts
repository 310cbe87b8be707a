import type { TrackerConfig, TrackerDisplayConfig } from "../../types/config.js";
import type { SessionEvent, ToolStartEvent } from "../../types/events.js";
import { isTerminalStatus, type JobStatus } from "../../types/job.js";
import { truncateText } from "./event-filter.js";
import { controlToken, type DisplayControl, type DisplayPayload } from "./display.js";
import { getToolIcon, getToolVerb, isCollapsibleTool } from "./tool-display.js";
import type { TrackerState } from "./tracker-state.js";

/** Hard cap on payload text */
export const MAX_PAYLOAD_LENGTH = 4000;

const INSTRUCTION_PREVIEW_LENGTH = 40;
const COMPLETION_PREVIEW_LENGTH = 150;
const PROGRESS_BAR_CELLS = 20;

const STATUS_ICONS: Record<JobStatus, string> = {
  queued: "🕐",
  running: "🔧",
  waiting_approval: "⏸️",
  done: "✅",
  failed: "❌",
  canceled: "⏹️",
};

export type RenderConfig = Pick<TrackerConfig, "filter" | "display">;

type RenderItem =
  | { kind: "event"; event: SessionEvent }
  | { kind: "group"; toolName: string; count: number };

/**
 * Render a tracker state to display text and controls. Pure: the same
 * state and config always produce the same payload.
 */
export function renderTracker(state: TrackerState, config: RenderConfig): DisplayPayload {
  const parts: string[] = [renderHeader(state), ""];

  const eventLines = renderEvents(state, config);
  if (eventLines.length > 0) {
    parts.push(...eventLines, "");
  }

  if (state.status === "running" && config.display.showProgressBar) {
    parts.push(renderProgressBar(state));
  }

  const stats = renderStats(state, config.display);
  if (stats) {
    parts.push(stats);
  }

  if (isTerminalStatus(state.status)) {
    parts.push("", renderCompletion(state));
  }

  let text = parts.join("\n").trimEnd();
  if (text.length > MAX_PAYLOAD_LENGTH) {
    text = `${text.slice(0, MAX_PAYLOAD_LENGTH - 50)}\n\n…truncated`;
  }

  return { text, controls: renderControls(state) };
}

function renderHeader(state: TrackerState): string {
  const instruction =
    state.instruction.length > INSTRUCTION_PREVIEW_LENGTH
      ? `${state.instruction.slice(0, INSTRUCTION_PREVIEW_LENGTH)}...`
      : state.instruction;
  return `${STATUS_ICONS[state.status]} Job ${state.jobId} • ${state.sessionId}\n📝 ${instruction}`;
}

function renderEvents(state: TrackerState, config: RenderConfig): string[] {
  const max = config.display.maxEventsDisplayed;
  const visible = state.events.slice(-max);
  const lines: string[] = [];

  const earlier = state.totalEvents - visible.length;
  if (earlier > 0) {
    lines.push(`+${earlier} earlier`);
  }

  const items = config.display.collapseRepeatedTools ? collapseRepeated(visible) : visible.map(asItem);
  for (const item of items) {
    const line = item.kind === "group" ? renderGroup(item.toolName, item.count) : renderEvent(item.event, config);
    if (line !== null) {
      lines.push(line);
    }
  }
  return lines;
}

function asItem(event: SessionEvent): RenderItem {
  return { kind: "event", event };
}

/**
 * Merge runs of consecutive starts of the same read-only tool
 */
function collapseRepeated(events: readonly SessionEvent[]): RenderItem[] {
  const items: RenderItem[] = [];
  for (const event of events) {
    const last = items[items.length - 1];
    if (event.type === "tool-start" && isCollapsibleTool(event.toolName) && last) {
      if (last.kind === "group" && last.toolName === event.toolName) {
        last.count++;
        continue;
      }
      if (last.kind === "event" && last.event.type === "tool-start" && last.event.toolName === event.toolName) {
        items[items.length - 1] = { kind: "group", toolName: event.toolName, count: 2 };
        continue;
      }
    }
    items.push(asItem(event));
  }
  return items;
}

function renderGroup(toolName: string, count: number): string {
  return `${getToolIcon(toolName)} ${toolName} ×${count}`;
}

function renderEvent(event: SessionEvent, config: RenderConfig): string | null {
  switch (event.type) {
    case "ai-speech":
      return `💬 ${event.text}`;
    case "ai-thinking":
      return `🧠 ${event.thinking}`;
    case "tool-start":
      return renderToolStart(event, config.display);
    case "tool-result": {
      if (config.display.parseTestOutput && event.toolName === "Bash") {
        const summary = summarizeTestOutput(event.result);
        if (summary) {
          return `   └─ ${summary}`;
        }
      }
      return event.result.trim() ? `   └─ ${event.result.trim()}` : null;
    }
    case "tool-error":
      return `   └─ ❌ ${event.error.trim() || "error"}`;
    case "approval-needed":
      return config.filter.showApprovals
        ? `⏸️ Waiting for approval: ${getToolIcon(event.toolName)} ${event.toolName}`
        : null;
    case "system-init":
    case "system-result":
      return null;
  }
}

function stringInput(event: ToolStartEvent, key: string): string | null {
  const value = event.toolInput[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function renderToolStart(event: ToolStartEvent, display: TrackerDisplayConfig): string {
  const icon = getToolIcon(event.toolName);
  if (display.toolDisplayMode === "minimal") {
    return icon;
  }

  const parts = [icon, getToolVerb(event.toolName)];
  const filePath = stringInput(event, "file_path") ?? stringInput(event, "notebook_path");
  const command = stringInput(event, "command");
  const pattern = stringInput(event, "pattern");
  const url = stringInput(event, "url");
  const query = stringInput(event, "query");
  const description = stringInput(event, "description");

  if (display.showFilePaths && filePath) {
    parts.push(truncatePath(filePath, display));
  } else if (display.showBashCommands && command) {
    parts.push(command);
  } else if (pattern) {
    parts.push(pattern.slice(0, 30));
  } else if (url) {
    parts.push(truncateText(url, 40));
  } else if (query) {
    parts.push(`"${query.slice(0, 30)}"`);
  } else if (description) {
    parts.push(description.slice(0, 40));
  }

  return parts.join(" ");
}

/**
 * Keep the tail of long paths; detailed mode shows them whole
 */
export function truncatePath(path: string, display: TrackerDisplayConfig): string {
  if (!display.truncatePaths || display.toolDisplayMode === "detailed") {
    return path;
  }
  const max = display.pathMaxLength;
  if (path.length <= max) {
    return path;
  }
  return `...${path.slice(-(max - 3))}`;
}

/**
 * One-line pass/fail summary of common test runner output
 */
export function summarizeTestOutput(output: string): string | null {
  const jest = /Tests:\s*(?:(\d+) failed,\s*)?(\d+) passed/.exec(output);
  if (jest) {
    return jest[1] ? `❌ ${jest[2]} passed, ${jest[1]} failed` : `✅ ${jest[2]} passed`;
  }

  const passed = /(\d+) passed/.exec(output);
  if (passed) {
    const failed = /(\d+) failed/.exec(output);
    return failed ? `❌ ${passed[1]} passed, ${failed[1]} failed` : `✅ ${passed[1]} passed`;
  }

  const lower = output.toLowerCase();
  if (lower.includes("error")) {
    return "❌ Error";
  }
  if (lower.includes("success")) {
    return "✅ Success";
  }
  return null;
}

function renderProgressBar(state: TrackerState): string {
  const filled = Math.min(state.totalEvents + state.turnCount, PROGRESS_BAR_CELLS);
  return `[${"█".repeat(filled)}${"░".repeat(PROGRESS_BAR_CELLS - filled)}]`;
}

export function formatElapsed(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}

function renderStats(state: TrackerState, display: TrackerDisplayConfig): string | null {
  const parts: string[] = [];

  if (display.showElapsedTime) {
    parts.push(`⏱️ ${formatElapsed(state.elapsedSeconds)}`);
  }

  const files = state.filesTouched.length;
  if (display.showFileCount && files > 0) {
    parts.push(`📝 ${files} file${files === 1 ? "" : "s"}`);
  }

  if (display.showTurnCount && state.turnCount > 0) {
    parts.push(`🔄 ${state.turnCount}`);
  }

  const tokens = state.inputTokens + state.outputTokens;
  if (display.showTokenCount && tokens > 0) {
    parts.push(tokens > 1000 ? `🔤 ${Math.floor(tokens / 1000)}k` : `🔤 ${tokens}`);
  }

  if (display.showCost && state.costUsd > 0) {
    parts.push(`💰 $${state.costUsd.toFixed(3)}`);
  }

  return parts.length > 0 ? parts.join(" • ") : null;
}

function renderCompletion(state: TrackerState): string {
  switch (state.status) {
    case "done":
      return `✅ Done\n${truncateText(state.finalResult ?? "Completed", COMPLETION_PREVIEW_LENGTH)}`;
    case "failed": {
      const label = state.errorType ? `❌ Failed (${state.errorType})` : "❌ Failed";
      return `${label}\n${truncateText(state.error ?? "Unknown error", COMPLETION_PREVIEW_LENGTH)}`;
    }
    case "canceled":
      return state.error
        ? `⏹️ Canceled\n${truncateText(state.error, COMPLETION_PREVIEW_LENGTH)}`
        : "⏹️ Canceled";
    default:
      return "";
  }
}

function renderControls(state: TrackerState): DisplayControl[] {
  const { jobId } = state;

  if (isTerminalStatus(state.status)) {
    return [
      { label: "📋 Summary", token: controlToken("summary", jobId) },
      { label: "📜 Logs", token: controlToken("logs", jobId) },
    ];
  }

  if (state.status === "waiting_approval") {
    return [
      { label: "✅ Approve", token: controlToken("approve", jobId) },
      { label: "❌ Deny", token: controlToken("deny", jobId) },
      { label: "⏹️ Cancel", token: controlToken("cancel", jobId) },
    ];
  }

  return [
    state.paused
      ? { label: "▶️ Resume", token: controlToken("resume", jobId) }
      : { label: "⏸️ Pause", token: controlToken("pause", jobId) },
    { label: "⏹️ Cancel", token: controlToken("cancel", jobId) },
  ];
}
