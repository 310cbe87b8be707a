import { describe, it, expect, vi } from "vitest";
import { forwardPreToolUse } from "../../../src/cli/commands/hook.js";

const payload = JSON.stringify({ tool_name: "Bash", tool_input: { command: "git push" } });
const hookUrl = "http://127.0.0.1:4000/hooks/pre-tool-use/job1?token=test-secret";

const allow = {
  hookSpecificOutput: {
    hookEventName: "PreToolUse",
    permissionDecision: "allow",
    permissionDecisionReason: "Approved",
  },
};

const denyReason = (response: Awaited<ReturnType<typeof forwardPreToolUse>>): string => {
  expect(response.hookSpecificOutput.permissionDecision).toBe("deny");
  return response.hookSpecificOutput.permissionDecisionReason;
};

describe("forwardPreToolUse", () => {
  it("should allow when not running under the relay", async () => {
    const post = vi.fn();

    const response = await forwardPreToolUse(payload, undefined, post);

    expect(response.hookSpecificOutput).toEqual({
      hookEventName: "PreToolUse",
      permissionDecision: "allow",
      permissionDecisionReason: "Not running under agent-relay",
    });
    expect(post).not.toHaveBeenCalled();
  });

  it("should pass the relay answer through", async () => {
    const post = vi.fn(async () => ({ status: 200, body: JSON.stringify(allow) }));

    await expect(forwardPreToolUse(payload, hookUrl, post)).resolves.toEqual(allow);
    expect(post).toHaveBeenCalledWith(hookUrl, payload);
  });

  it("should deny when the relay is unreachable", async () => {
    const post = vi.fn(async () => {
      throw new Error("connect ECONNREFUSED");
    });

    expect(denyReason(await forwardPreToolUse(payload, hookUrl, post))).toBe(
      "Approval relay unreachable: connect ECONNREFUSED"
    );
  });

  it("should deny on an error status", async () => {
    const post = vi.fn(async () => ({ status: 404, body: '{"error":"Job not found: job1"}' }));

    expect(denyReason(await forwardPreToolUse(payload, hookUrl, post))).toBe(
      'Approval relay answered 404: {"error":"Job not found: job1"}'
    );
  });

  it("should deny on a malformed answer", async () => {
    const invalid = vi.fn(async () => ({ status: 200, body: "not json" }));
    const unexpected = vi.fn(async () => ({ status: 200, body: '{"ok":true}' }));

    expect(denyReason(await forwardPreToolUse(payload, hookUrl, invalid))).toBe("Approval relay sent invalid JSON");
    expect(denyReason(await forwardPreToolUse(payload, hookUrl, unexpected))).toBe(
      "Approval relay sent an unexpected response"
    );
  });
});
