import type { TrackerFilterConfig } from "../../types/config.js";
import { isErrorEvent, type SessionEvent } from "../../types/events.js";

function toolAllowed(config: TrackerFilterConfig, toolName: string): boolean {
  if (config.toolDenylist.includes(toolName)) {
    return false;
  }
  return config.toolAllowlist === null || config.toolAllowlist.includes(toolName);
}

/**
 * Decide whether an event is observable under the given configuration.
 *
 * Errors (tool errors and failed results) always pass. System events and
 * approval requests always pass: they carry stats and state changes the
 * tracker needs even when their lines are not rendered.
 */
export function shouldShowEvent(config: TrackerFilterConfig, event: SessionEvent): boolean {
  if (isErrorEvent(event)) {
    return true;
  }

  switch (event.type) {
    case "system-init":
    case "system-result":
    case "approval-needed":
      return true;
    case "ai-speech":
      return config.showAiSpeech;
    case "ai-thinking":
      return config.showAiThinking;
    case "tool-start":
      return config.showToolStart && toolAllowed(config, event.toolName);
    case "tool-result":
      return (
        toolAllowed(config, event.toolName) &&
        (config.showToolResult || config.showResultForTools.includes(event.toolName))
      );
    case "tool-error":
      return true;
  }
}

/**
 * Cut text to max characters with a "..." suffix; 0 disables the limit
 */
export function truncateText(text: string, max: number): string {
  if (max <= 0 || text.length <= max) {
    return text;
  }
  return `${text.slice(0, max)}...`;
}

/**
 * Apply per-category length limits. Returns the same object when nothing
 * changes.
 */
export function truncateEvent(config: TrackerFilterConfig, event: SessionEvent): SessionEvent {
  switch (event.type) {
    case "ai-speech": {
      const text = truncateText(event.text, config.speechMaxLength);
      return text === event.text ? event : { ...event, text };
    }
    case "ai-thinking": {
      const thinking = truncateText(event.thinking, config.thinkingMaxLength);
      return thinking === event.thinking ? event : { ...event, thinking };
    }
    case "tool-result": {
      const result = truncateText(event.result, config.resultMaxLength);
      return result === event.result ? event : { ...event, result };
    }
    case "tool-error": {
      const error = truncateText(event.error, config.errorMaxLength);
      return error === event.error ? event : { ...event, error };
    }
    case "tool-start": {
      const command = event.toolInput["command"];
      if (typeof command !== "string") {
        return event;
      }
      const truncated = truncateText(command, config.commandMaxLength);
      return truncated === command
        ? event
        : { ...event, toolInput: { ...event.toolInput, command: truncated } };
    }
    default:
      return event;
  }
}

/**
 * Filter then truncate; null when the event is not observable
 */
export function filterEvent(config: TrackerFilterConfig, event: SessionEvent): SessionEvent | null {
  return shouldShowEvent(config, event) ? truncateEvent(config, event) : null;
}
