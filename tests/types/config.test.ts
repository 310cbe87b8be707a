import { describe, it, expect } from "vitest";
import { ConfigSchema, TrackerConfigSchema, ExecutionConfigSchema } from "../../src/types/config.js";

describe("ConfigSchema", () => {
  it("should parse empty config with defaults", () => {
    const result = ConfigSchema.parse({});

    expect(result.scheduler.maxConcurrentJobs).toBe(3);
    expect(result.scheduler.maxQueuedPerSession).toBe(10);
    expect(result.execution.timeoutSeconds).toBe(3600);
    expect(result.execution.gracePeriodSeconds).toBe(30);
    expect(result.approval.timeoutSeconds).toBe(3600);
    expect(result.approval.hookServer).toEqual({
      enabled: true,
      host: "127.0.0.1",
      port: 0,
      command: "agent-relay hook pre-tool-use",
    });
    expect(result.execution.hookSettingsArgs).toEqual(["--settings", "{hookSettings}"]);
    expect(result.workspace).toEqual({ rootDir: "workspaces", branchPrefix: "relay" });
  });

  it("should gate every scope except write by default", () => {
    const result = ConfigSchema.parse({});

    expect(result.approval.gatedScopes).toEqual([
      "delete_file",
      "shell",
      "shell_sudo",
      "push",
      "force_push",
      "delete_branch",
      "deploy",
      "deploy_prod",
      "external_api",
      "network",
    ]);
  });

  it("should reject an unknown gated scope", () => {
    expect(() => ConfigSchema.parse({ approval: { gatedScopes: ["teleport"] } })).toThrow();
  });

  it("should reject a non-positive concurrency limit", () => {
    expect(() => ConfigSchema.parse({ scheduler: { maxConcurrentJobs: 0 } })).toThrow();
  });
});

describe("ExecutionConfigSchema", () => {
  it("should run the agent with stream-json output by default", () => {
    const result = ExecutionConfigSchema.parse({});

    expect(result.agentCommand).toBe("claude");
    expect(result.agentArgs).toEqual(["-p", "{instruction}", "--output-format", "stream-json", "--verbose"]);
    expect(result.maxLogBytes).toBe(104857600);
  });
});

describe("TrackerConfigSchema", () => {
  it("should use the plain defaults without a preset", () => {
    const result = TrackerConfigSchema.parse({});

    expect(result.preset).toBeUndefined();
    expect(result.filter.showAiSpeech).toBe(true);
    expect(result.filter.speechMaxLength).toBe(150);
    expect(result.display.toolDisplayMode).toBe("normal");
    expect(result.display.maxEventsDisplayed).toBe(10);
    expect(result.buffer).toEqual({ maxEvents: 3, flushIntervalMs: 2000 });
    expect(result.rateLimit).toEqual({ minIntervalMs: 1000, burstLimit: 3, burstWindowMs: 3000 });
  });

  it("should apply a preset", () => {
    const result = TrackerConfigSchema.parse({ preset: "minimal" });

    expect(result.filter.showAiSpeech).toBe(false);
    expect(result.display.toolDisplayMode).toBe("minimal");
    expect(result.display.maxEventsDisplayed).toBe(5);
    expect(result.display.showTurnCount).toBe(false);
  });

  it("should let explicit settings override the preset", () => {
    const result = TrackerConfigSchema.parse({
      preset: "debug",
      filter: { speechMaxLength: 300 },
      display: { maxEventsDisplayed: 4 },
    });

    expect(result.filter.showAiThinking).toBe(true);
    expect(result.filter.speechMaxLength).toBe(300);
    expect(result.display.maxEventsDisplayed).toBe(4);
    expect(result.display.showCost).toBe(true);
  });

  it("should reject an unknown preset", () => {
    expect(() => TrackerConfigSchema.parse({ preset: "loud" })).toThrow();
  });
});
