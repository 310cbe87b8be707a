import { z } from "zod";
import { ALL_GATED_SCOPES, GatedScopeSchema } from "./approval.js";

export const LoggingConfigSchema = z.object({
  // Console log level (stderr)
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ExecutionConfigSchema = z.object({
  // Agent binary, resolved from PATH
  agentCommand: z.string().min(1).default("claude"),
  // "{instruction}" is replaced with the job instruction
  agentArgs: z
    .array(z.string())
    .default(["-p", "{instruction}", "--output-format", "stream-json", "--verbose"]),
  // Wall-clock deadline per job
  timeoutSeconds: z.number().int().positive().max(14400).default(3600),
  // SIGTERM → SIGKILL grace period
  gracePeriodSeconds: z.number().int().nonnegative().default(30),
  // Per-job log cap (100 MiB)
  maxLogBytes: z
    .number()
    .int()
    .positive()
    .default(100 * 1024 * 1024),
  maxInstructionLength: z.number().int().positive().default(4000),
  // Appended while the hook server runs; "{hookSettings}" is the generated settings file
  hookSettingsArgs: z.array(z.string()).default(["--settings", "{hookSettings}"]),
});

export const SchedulerConfigSchema = z.object({
  // Running jobs across all sessions
  maxConcurrentJobs: z.number().int().positive().default(3),
  // Queued jobs per session before submissions are rejected
  maxQueuedPerSession: z.number().int().positive().default(10),
});

export const HookServerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().default("127.0.0.1"),
  // 0 picks a free port
  port: z.number().int().nonnegative().max(65535).default(0),
  // PreToolUse hook command run by the agent
  command: z.string().min(1).default("agent-relay hook pre-tool-use"),
});

export const ApprovalConfigSchema = z.object({
  timeoutSeconds: z.number().int().positive().max(86400).default(3600),
  gatedScopes: z
    .array(GatedScopeSchema)
    .default(() => ALL_GATED_SCOPES.filter((scope) => scope !== "write")),
  // Command prefixes added to the built-in read-only whitelist
  extraWhitelist: z.array(z.string()).default([]),
  hookServer: HookServerConfigSchema.default({}),
});

export const ToolDisplayModeSchema = z.enum(["minimal", "normal", "detailed"]);

export const TrackerFilterConfigSchema = z.object({
  showAiSpeech: z.boolean().default(true),
  showAiThinking: z.boolean().default(false),
  showToolStart: z.boolean().default(true),
  showToolResult: z.boolean().default(false),
  showApprovals: z.boolean().default(true),
  // null shows every tool
  toolAllowlist: z.array(z.string()).nullable().default(null),
  toolDenylist: z.array(z.string()).default([]),
  // Results shown for these tools even when showToolResult is off
  showResultForTools: z.array(z.string()).default(["Bash", "Edit"]),
  // 0 disables truncation
  speechMaxLength: z.number().int().nonnegative().default(150),
  thinkingMaxLength: z.number().int().nonnegative().default(80),
  resultMaxLength: z.number().int().nonnegative().default(100),
  errorMaxLength: z.number().int().nonnegative().default(200),
  commandMaxLength: z.number().int().nonnegative().default(50),
});

export const TrackerDisplayConfigSchema = z.object({
  toolDisplayMode: ToolDisplayModeSchema.default("normal"),
  showFilePaths: z.boolean().default(true),
  truncatePaths: z.boolean().default(true),
  pathMaxLength: z.number().int().positive().default(40),
  showBashCommands: z.boolean().default(true),
  parseTestOutput: z.boolean().default(true),
  showProgressBar: z.boolean().default(true),
  showElapsedTime: z.boolean().default(true),
  showFileCount: z.boolean().default(true),
  showTurnCount: z.boolean().default(true),
  showTokenCount: z.boolean().default(false),
  showCost: z.boolean().default(false),
  maxEventsDisplayed: z.number().int().positive().default(10),
  collapseRepeatedTools: z.boolean().default(true),
});

export const EventBufferConfigSchema = z.object({
  maxEvents: z.number().int().positive().default(3),
  flushIntervalMs: z.number().int().positive().default(2000),
});

export const RateLimitConfigSchema = z.object({
  minIntervalMs: z.number().int().nonnegative().default(1000),
  burstLimit: z.number().int().positive().default(3),
  burstWindowMs: z.number().int().positive().default(3000),
});

export const TrackerPresetSchema = z.enum(["minimal", "normal", "verbose", "debug", "speech", "tools"]);

export type TrackerPreset = z.infer<typeof TrackerPresetSchema>;

type PresetOverrides = {
  filter?: Partial<z.input<typeof TrackerFilterConfigSchema>>;
  display?: Partial<z.input<typeof TrackerDisplayConfigSchema>>;
};

export const TRACKER_PRESETS: Record<TrackerPreset, PresetOverrides> = {
  minimal: {
    filter: { showAiSpeech: false, showToolStart: true, showToolResult: false },
    display: { toolDisplayMode: "minimal", maxEventsDisplayed: 5, showTurnCount: false },
  },
  normal: {
    filter: { showAiSpeech: true, speechMaxLength: 100, showResultForTools: ["Bash"] },
    display: { toolDisplayMode: "normal", maxEventsDisplayed: 8 },
  },
  verbose: {
    filter: { showAiSpeech: true, speechMaxLength: 200, showToolResult: true },
    display: { toolDisplayMode: "detailed", maxEventsDisplayed: 15, showTokenCount: true },
  },
  debug: {
    filter: { showAiThinking: true, speechMaxLength: 0, showToolResult: true },
    display: {
      toolDisplayMode: "detailed",
      maxEventsDisplayed: 20,
      showTokenCount: true,
      showCost: true,
    },
  },
  speech: {
    filter: { showAiSpeech: true, speechMaxLength: 0, showToolStart: false, showToolResult: false },
    display: { maxEventsDisplayed: 5, showProgressBar: false },
  },
  tools: {
    filter: { showAiSpeech: false, showToolStart: true, showToolResult: true },
    display: { toolDisplayMode: "detailed", maxEventsDisplayed: 12 },
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Lay the named preset under the explicit filter/display settings
 */
function applyTrackerPreset(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const parsed = TrackerPresetSchema.safeParse(raw["preset"]);
  if (!parsed.success) {
    return raw;
  }
  const preset = TRACKER_PRESETS[parsed.data];
  const filter = isRecord(raw["filter"]) ? raw["filter"] : {};
  const display = isRecord(raw["display"]) ? raw["display"] : {};
  return {
    ...raw,
    filter: { ...preset.filter, ...filter },
    display: { ...preset.display, ...display },
  };
}

export const TrackerConfigSchema = z.preprocess(
  applyTrackerPreset,
  z.object({
    preset: TrackerPresetSchema.optional(),
    filter: TrackerFilterConfigSchema.default({}),
    display: TrackerDisplayConfigSchema.default({}),
    buffer: EventBufferConfigSchema.default({}),
    rateLimit: RateLimitConfigSchema.default({}),
  })
);

export const WorkspaceConfigSchema = z.object({
  // Worktree root; relative paths resolve under dataDir
  rootDir: z.string().default("workspaces"),
  branchPrefix: z.string().default("relay"),
});

export const ConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
  approval: ApprovalConfigSchema.default({}),
  tracker: TrackerConfigSchema.default({}),
  workspace: WorkspaceConfigSchema.default({}),
  dataDir: z.string().default("~/.agent-relay"),
  verbose: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type HookServerConfig = z.infer<typeof HookServerConfigSchema>;
export type ApprovalConfig = z.infer<typeof ApprovalConfigSchema>;
export type ToolDisplayMode = z.infer<typeof ToolDisplayModeSchema>;
export type TrackerFilterConfig = z.infer<typeof TrackerFilterConfigSchema>;
export type TrackerDisplayConfig = z.infer<typeof TrackerDisplayConfigSchema>;
export type EventBufferConfig = z.infer<typeof EventBufferConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
