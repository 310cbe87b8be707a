/**
 * Hook callback server
 *
 * Receives PreToolUse hook callbacks from agent processes and holds each
 * request open until the approval gate reaches a verdict.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { randomBytes, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { HookServerConfig } from "../../types/config.js";
import type { ApprovalSignal, ApprovalVerdict } from "../../types/approval.js";
import { logger } from "../../infra/logger.js";
import { errorMessage, isRelayError } from "../../infra/errors.js";

const MAX_BODY_BYTES = 1024 * 1024;
const HOOK_PATH = /^\/hooks\/pre-tool-use\/([A-Za-z0-9_-]+)$/;

export const PreToolUsePayloadSchema = z
  .object({
    tool_name: z.string().min(1),
    tool_input: z.record(z.unknown()).default({}),
  })
  .passthrough();

export interface PreToolUseResponse {
  hookSpecificOutput: {
    hookEventName: "PreToolUse";
    permissionDecision: "allow" | "deny";
    permissionDecisionReason: string;
  };
}

export type HookSignalHandler = (signal: ApprovalSignal) => Promise<ApprovalVerdict>;

export interface HookServerOptions {
  config: Pick<HookServerConfig, "host" | "port">;
  onSignal: HookSignalHandler;
  /** Shared secret expected in the `token` query parameter; generated when omitted */
  token?: string;
}

/**
 * Hook answer for a verdict
 */
export function toPreToolUseResponse(verdict: ApprovalVerdict): PreToolUseResponse {
  const allow = verdict.decision === "approved";
  return {
    hookSpecificOutput: {
      hookEventName: "PreToolUse",
      permissionDecision: allow ? "allow" : "deny",
      permissionDecisionReason: verdict.reason ?? (allow ? "Approved" : `Approval ${verdict.decision}`),
    },
  };
}

export class HookServer {
  private server: Server | null = null;
  private port: number | null = null;
  private readonly token: string;

  constructor(private readonly options: HookServerOptions) {
    this.token = options.token ?? randomBytes(16).toString("hex");
  }

  /**
   * Start listening. Resolves once the port is bound.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => this.handleRequest(req, res));

      server.once("error", (error) => {
        logger.error(`Hook server error: ${error.message}`);
        reject(error);
      });

      server.listen(this.options.config.port, this.options.config.host, () => {
        const address = server.address();
        this.port = typeof address === "object" && address !== null ? address.port : null;
        this.server = server;
        logger.debug(`Hook server listening on ${this.getBaseUrl()}`);
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      this.port = null;
      server.closeAllConnections();
      server.close(() => {
        logger.debug("Hook server stopped");
        resolve();
      });
    });
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getBaseUrl(): string {
    if (this.port === null) {
      throw new Error("Hook server is not running");
    }
    return `http://${this.options.config.host}:${this.port}`;
  }

  /**
   * URL an agent hook posts to for one job
   */
  hookUrl(jobId: string): string {
    return `${this.getBaseUrl()}/hooks/pre-tool-use/${encodeURIComponent(jobId)}?token=${this.token}`;
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    if (req.method !== "POST") {
      this.sendJson(res, 405, { error: "Method Not Allowed" });
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const match = HOOK_PATH.exec(url.pathname);
    const jobId = match?.[1];
    if (!jobId) {
      this.sendJson(res, 404, { error: "Not Found" });
      return;
    }

    if (!this.verifyToken(url.searchParams.get("token"))) {
      logger.warn(`Hook callback for job ${jobId} rejected: bad token`);
      this.sendJson(res, 401, { error: "Unauthorized" });
      return;
    }

    let body = "";
    let size = 0;
    let aborted = false;

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        aborted = true;
        this.sendJson(res, 413, { error: "Payload Too Large" });
        req.destroy();
        return;
      }
      body += chunk.toString();
    });

    req.on("end", () => {
      if (!aborted) {
        this.processHook(jobId, body, res).catch((error: unknown) => {
          logger.error(`Hook callback for job ${jobId} failed: ${errorMessage(error)}`, error);
        });
      }
    });
  }

  private async processHook(jobId: string, body: string, res: ServerResponse): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      this.sendJson(res, 400, { error: "Invalid JSON" });
      return;
    }

    const parsed = PreToolUsePayloadSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendJson(res, 400, { error: `Invalid hook payload: ${parsed.error.issues[0]?.message ?? "unknown"}` });
      return;
    }

    try {
      const verdict = await this.options.onSignal({
        transport: "hook",
        jobId,
        toolName: parsed.data.tool_name,
        toolInput: parsed.data.tool_input,
      });
      this.sendJson(res, 200, toPreToolUseResponse(verdict));
    } catch (error) {
      const status = isRelayError(error) && error.code === "NOT_FOUND" ? 404 : 500;
      this.sendJson(res, status, { error: errorMessage(error) });
    }
  }

  private verifyToken(candidate: string | null): boolean {
    if (candidate === null) {
      return false;
    }
    const expected = Buffer.from(this.token);
    const actual = Buffer.from(candidate);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  private sendJson(res: ServerResponse, status: number, payload: unknown): void {
    if (res.headersSent || res.writableEnded) {
      return;
    }
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(payload));
  }
}
