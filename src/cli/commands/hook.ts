import { Command } from "commander";
import { request } from "node:http";
import { z } from "zod";
import { toPreToolUseResponse, type PreToolUseResponse } from "../../core/approval/hook-server.js";
import { errorMessage } from "../../infra/errors.js";

const HOOK_URL_ENV = "AGENT_RELAY_HOOK_URL";

const PreToolUseResponseSchema = z.object({
  hookSpecificOutput: z.object({
    hookEventName: z.literal("PreToolUse"),
    permissionDecision: z.enum(["allow", "deny"]),
    permissionDecisionReason: z.string(),
  }),
});

interface HttpReply {
  status: number;
  body: string;
}

/**
 * POST a JSON body and wait for the reply. No timeout: the relay holds the
 * request open until a human decides.
 */
export function postJson(url: string, body: string): Promise<HttpReply> {
  return new Promise((resolve, reject) => {
    const req = request(
      url,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Content-Length": Buffer.byteLength(body),
        },
      },
      (res) => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => {
          data += chunk;
        });
        res.on("end", () => resolve({ status: res.statusCode ?? 0, body: data }));
        res.on("error", reject);
      }
    );
    req.on("error", reject);
    req.end(body);
  });
}

function deny(reason: string): PreToolUseResponse {
  return toPreToolUseResponse({ decision: "denied", reason, grantedScope: null });
}

/**
 * Forward one PreToolUse payload to the relay. Any failure denies the tool call.
 */
export async function forwardPreToolUse(
  payload: string,
  hookUrl: string | undefined,
  post: (url: string, body: string) => Promise<HttpReply> = postJson
): Promise<PreToolUseResponse> {
  if (!hookUrl) {
    // Not a relay job; leave the decision to the agent's own permissions
    return toPreToolUseResponse({ decision: "approved", reason: "Not running under agent-relay", grantedScope: null });
  }

  let reply: HttpReply;
  try {
    reply = await post(hookUrl, payload);
  } catch (error) {
    return deny(`Approval relay unreachable: ${errorMessage(error)}`);
  }

  if (reply.status !== 200) {
    return deny(`Approval relay answered ${reply.status}: ${reply.body.slice(0, 200)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(reply.body);
  } catch {
    return deny("Approval relay sent invalid JSON");
  }

  const parsed = PreToolUseResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : deny("Approval relay sent an unexpected response");
}

async function readStdin(): Promise<string> {
  let data = "";
  process.stdin.setEncoding("utf-8");
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

export function createHookCommand(): Command {
  const command = new Command("hook").description("Agent hook entry points");

  command
    .command("pre-tool-use")
    .description("PreToolUse hook: ask the relay whether a tool call may run")
    .action(async () => {
      const payload = await readStdin();
      const response = await forwardPreToolUse(payload, process.env[HOOK_URL_ENV]);
      console.log(JSON.stringify(response));
    });

  return command;
}
