import { z } from "zod";
import { logger } from "../../infra/logger.js";
import { GatedScopeSchema } from "../../types/approval.js";
import type { SessionEvent } from "../../types/events.js";

// ============ Stream line shapes ============

const InputSchema = z.record(z.unknown());

const EnvelopeSchema = z.object({ type: z.string() }).passthrough();

const SystemLineSchema = z.object({
  subtype: z.string().optional(),
  tools: z.array(z.string()).catch([]),
  cwd: z.string().nullable().catch(null),
  model: z.string().nullable().catch(null),
});

const ResultLineSchema = z.object({
  subtype: z.string().catch("success"),
  is_error: z.boolean().catch(false),
  result: z.string().nullable().catch(null),
  total_cost_usd: z.number().optional().catch(undefined),
  cost_usd: z.number().optional().catch(undefined),
  num_turns: z.number().int().optional().catch(undefined),
  duration_ms: z.number().optional().catch(undefined),
  usage: z
    .object({
      input_tokens: z.number().catch(0),
      output_tokens: z.number().catch(0),
    })
    .optional()
    .catch(undefined),
});

const MessageLineSchema = z.object({
  message: z.object({
    content: z.union([z.string(), z.array(z.unknown())]),
  }),
});

const TextBlockSchema = z.object({ type: z.literal("text"), text: z.string() });

const ThinkingBlockSchema = z.object({ type: z.literal("thinking"), thinking: z.string() });

const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: InputSchema.catch({}),
});

const ToolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string(),
  content: z.unknown(),
  is_error: z.boolean().catch(false),
});

const ApprovalLineSchema = z.object({
  tool_name: z.string(),
  tool_input: InputSchema.catch({}),
  scope: GatedScopeSchema.nullable().catch(null),
  request_id: z.string().nullable().catch(null),
});

const APPROVAL_LINE_TYPES = new Set(["approval_needed", "approval_request"]);

// ============ Parser ============

export interface EventParserContext {
  jobId: string;
  sessionId: string;
  /** Clock for event timestamps (epoch ms) */
  now?: () => number;
}

/** Fields every event shares, filled in by the parser */
type EventBase = "id" | "jobId" | "sessionId" | "timestamp";

/**
 * Turns the agent's newline-delimited JSON output into SessionEvents.
 *
 * One parser per job: it numbers events and remembers tool names by
 * tool_use_id so results can be attributed. Unparseable lines yield no
 * events.
 */
export class EventParser {
  private seq = 0;
  private readonly toolNames = new Map<string, string>();
  private readonly now: () => number;

  constructor(private readonly context: EventParserContext) {
    this.now = context.now ?? Date.now;
  }

  parseLine(line: string): SessionEvent[] {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      this.logRaw(trimmed);
      return [];
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      this.logRaw(trimmed);
      return [];
    }

    const type = envelope.data.type;
    if (type === "system") {
      return this.parseSystem(json);
    }
    if (type === "result") {
      return this.parseResult(json);
    }
    if (type === "assistant") {
      return this.parseAssistant(json);
    }
    if (type === "user") {
      return this.parseUser(json);
    }
    if (APPROVAL_LINE_TYPES.has(type)) {
      return this.parseApproval(json);
    }

    logger.debug(`Ignoring agent event of type ${type}`, { jobId: this.context.jobId });
    return [];
  }

  /**
   * Number of events produced so far
   */
  eventCount(): number {
    return this.seq;
  }

  private parseSystem(json: unknown): SessionEvent[] {
    const parsed = SystemLineSchema.safeParse(json);
    if (!parsed.success || parsed.data.subtype !== "init") {
      return [];
    }
    return [
      {
        ...this.base(),
        type: "system-init",
        tools: parsed.data.tools,
        cwd: parsed.data.cwd,
        model: parsed.data.model,
      },
    ];
  }

  private parseResult(json: unknown): SessionEvent[] {
    const parsed = ResultLineSchema.safeParse(json);
    if (!parsed.success) {
      return [];
    }
    const data = parsed.data;
    return [
      {
        ...this.base(),
        type: "system-result",
        subtype: data.subtype,
        isError: data.is_error,
        result: data.result,
        costUsd: data.total_cost_usd ?? data.cost_usd ?? null,
        numTurns: data.num_turns ?? null,
        durationMs: data.duration_ms ?? null,
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
      },
    ];
  }

  private parseAssistant(json: unknown): SessionEvent[] {
    const parsed = MessageLineSchema.safeParse(json);
    if (!parsed.success) {
      return [];
    }
    const content = parsed.data.message.content;
    if (typeof content === "string") {
      return content.trim() ? [{ ...this.base(), type: "ai-speech", text: content.trim() }] : [];
    }

    const events: SessionEvent[] = [];
    for (const block of content) {
      const text = TextBlockSchema.safeParse(block);
      if (text.success) {
        if (text.data.text.trim()) {
          events.push({ ...this.base(), type: "ai-speech", text: text.data.text.trim() });
        }
        continue;
      }

      const thinking = ThinkingBlockSchema.safeParse(block);
      if (thinking.success) {
        if (thinking.data.thinking.trim()) {
          events.push({ ...this.base(), type: "ai-thinking", thinking: thinking.data.thinking.trim() });
        }
        continue;
      }

      const toolUse = ToolUseBlockSchema.safeParse(block);
      if (toolUse.success) {
        this.toolNames.set(toolUse.data.id, toolUse.data.name);
        events.push({
          ...this.base(),
          type: "tool-start",
          toolName: toolUse.data.name,
          toolUseId: toolUse.data.id,
          toolInput: toolUse.data.input,
        });
      }
    }
    return events;
  }

  private parseUser(json: unknown): SessionEvent[] {
    const parsed = MessageLineSchema.safeParse(json);
    if (!parsed.success || typeof parsed.data.message.content === "string") {
      return [];
    }

    const events: SessionEvent[] = [];
    for (const block of parsed.data.message.content) {
      const result = ToolResultBlockSchema.safeParse(block);
      if (!result.success) {
        continue;
      }
      const toolUseId = result.data.tool_use_id;
      const toolName = this.toolNames.get(toolUseId) ?? "unknown";
      const text = stringifyToolContent(result.data.content);

      if (result.data.is_error) {
        events.push({ ...this.base(), type: "tool-error", toolName, toolUseId, error: text });
      } else {
        events.push({ ...this.base(), type: "tool-result", toolName, toolUseId, result: text });
      }
    }
    return events;
  }

  private parseApproval(json: unknown): SessionEvent[] {
    const parsed = ApprovalLineSchema.safeParse(json);
    if (!parsed.success) {
      return [];
    }
    return [
      {
        ...this.base(),
        type: "approval-needed",
        toolName: parsed.data.tool_name,
        toolInput: parsed.data.tool_input,
        scope: parsed.data.scope,
        requestId: parsed.data.request_id,
      },
    ];
  }

  private base(): Pick<SessionEvent, EventBase> {
    this.seq++;
    return {
      id: `${this.context.jobId}-${this.seq}`,
      jobId: this.context.jobId,
      sessionId: this.context.sessionId,
      timestamp: this.now(),
    };
  }

  private logRaw(line: string): void {
    logger.debug("Unstructured agent output", {
      jobId: this.context.jobId,
      line: line.slice(0, 200),
    });
  }
}

/**
 * Flatten a tool_result content field to text
 */
export function stringifyToolContent(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const item of content) {
      const text = TextBlockSchema.safeParse(item);
      if (text.success) {
        parts.push(text.data.text);
      }
    }
    return parts.join("\n");
  }
  if (content === undefined || content === null) {
    return "";
  }
  return JSON.stringify(content);
}
