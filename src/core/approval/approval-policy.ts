import type { ApprovalConfig } from "../../types/config.js";
import type { ActionClassification, GatedScope } from "../../types/approval.js";

export interface ApprovalPolicy {
  /** Scopes that need a human decision */
  gatedScopes: readonly GatedScope[];
  /** Command prefixes treated like the built-in whitelist */
  extraWhitelist: readonly string[];
}

export function approvalPolicyFromConfig(config: ApprovalConfig): ApprovalPolicy {
  return { gatedScopes: config.gatedScopes, extraWhitelist: config.extraWhitelist };
}

/** Read-only commands that never need approval */
export const SHELL_WHITELIST: readonly string[] = [
  "git status",
  "git diff",
  "git log",
  "git branch",
  "git show",
  "ls",
  "pwd",
  "cat",
  "head",
  "tail",
  "wc",
  "echo",
  "pytest",
  "npm test",
  "npm run lint",
  "npm run build",
  "npx tsc --noemit",
  "python --version",
  "node --version",
  "which",
];

/** Substrings that always need approval, whatever the configured scopes */
export const DANGEROUS_SHELL_PATTERNS: readonly string[] = [
  "rm -rf",
  "rm -r /",
  "sudo",
  "chmod 777",
  "curl | bash",
  "wget | bash",
  "> /dev/",
  "mkfs",
  "dd if=",
  ":(){:|:&};:",
];

/** Path fragments whose edits always need approval */
export const SENSITIVE_PATH_PATTERNS: readonly string[] = [
  ".env",
  "credentials",
  "secret",
  "password",
  "private_key",
  ".ssh/",
  "/etc/",
];

const WRITE_TOOLS = new Set(["Write", "Edit", "MultiEdit", "NotebookEdit"]);
const CHAINING = /[;&|`<>\n]|\$\(/;
const GIT_BRANCH_DELETE = /\bgit\s+branch\b.*\s(-d|--delete)(\s|$)/;

function inputString(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  return typeof value === "string" ? value : "";
}

/**
 * Whether a command uses shell operators that could smuggle a second
 * command past a whitelist prefix
 */
export function hasShellChaining(command: string): boolean {
  return CHAINING.test(command);
}

export function isWhitelistedCommand(command: string, extraWhitelist: readonly string[] = []): boolean {
  const normalized = command.trim().toLowerCase();
  if (!normalized || hasShellChaining(normalized) || GIT_BRANCH_DELETE.test(normalized)) {
    return false;
  }
  return [...SHELL_WHITELIST, ...extraWhitelist.map((entry) => entry.trim().toLowerCase())].some(
    (safe) => safe.length > 0 && (normalized === safe || normalized.startsWith(`${safe} `))
  );
}

export function isDangerousCommand(command: string): boolean {
  const normalized = command.toLowerCase();
  return DANGEROUS_SHELL_PATTERNS.some((pattern) => normalized.includes(pattern));
}

export function isSensitivePath(path: string): boolean {
  const normalized = path.toLowerCase();
  return SENSITIVE_PATH_PATTERNS.some((pattern) => normalized.includes(pattern));
}

/**
 * Scope of a shell command that is not whitelisted
 */
export function shellScope(command: string): GatedScope {
  const normalized = command.toLowerCase();

  if (/\bsudo\b/.test(normalized)) {
    return "shell_sudo";
  }
  if (/\bgit\s+push\b/.test(normalized)) {
    if (/\s(--force|--force-with-lease|-f)(\s|=|$)/.test(normalized)) {
      return "force_push";
    }
    if (/\s(--delete|-d)(\s|$)/.test(normalized)) {
      return "delete_branch";
    }
    return "push";
  }
  if (GIT_BRANCH_DELETE.test(normalized)) {
    return "delete_branch";
  }
  if (/\bdeploy\b/.test(normalized)) {
    return /\b(prod|production)\b/.test(normalized) ? "deploy_prod" : "deploy";
  }
  if (/(^|[\s;&|(])rm\s/.test(normalized)) {
    return "delete_file";
  }
  if (/\b(curl|wget|ssh|scp|rsync|nc)\b/.test(normalized)) {
    return "network";
  }
  return "shell";
}

/**
 * Decide whether a tool use is gated, and under which scope
 */
export function classifyAction(
  toolName: string,
  toolInput: Record<string, unknown>,
  policy: Pick<ApprovalPolicy, "extraWhitelist"> = { extraWhitelist: [] }
): ActionClassification {
  if (toolName === "Bash") {
    const command = inputString(toolInput, "command");
    if (isWhitelistedCommand(command, policy.extraWhitelist)) {
      return { kind: "whitelisted", description: `Read-only command: \`${command.trim()}\`` };
    }
    const scope = shellScope(command);
    const label = scope === "push" || scope === "force_push" ? "Git push" : "Shell command";
    return {
      kind: "gated",
      scope,
      description: `${label}: \`${command}\``,
      alwaysGate: isDangerousCommand(command),
    };
  }

  if (WRITE_TOOLS.has(toolName)) {
    const path = inputString(toolInput, "file_path") || inputString(toolInput, "notebook_path");
    const sensitive = isSensitivePath(path);
    return {
      kind: "gated",
      scope: "write",
      description: sensitive ? `Edit sensitive file: \`${path}\`` : `Edit file: \`${path}\``,
      alwaysGate: sensitive,
    };
  }

  if (toolName === "WebFetch") {
    return {
      kind: "gated",
      scope: "network",
      description: `Fetch external URL: \`${inputString(toolInput, "url")}\``,
      alwaysGate: false,
    };
  }

  if (toolName === "WebSearch") {
    return {
      kind: "gated",
      scope: "network",
      description: `Web search: "${inputString(toolInput, "query")}"`,
      alwaysGate: false,
    };
  }

  if (toolName.startsWith("mcp__")) {
    return {
      kind: "gated",
      scope: "external_api",
      description: `External tool: ${toolName}`,
      alwaysGate: false,
    };
  }

  return { kind: "ungated" };
}

/**
 * Whether a classified action must wait for a decision. Scopes already
 * granted for the job pass, unless the action is always gated.
 */
export function needsApproval(
  classification: ActionClassification,
  policy: Pick<ApprovalPolicy, "gatedScopes">,
  grantedScopes: ReadonlySet<GatedScope> = new Set()
): boolean {
  if (classification.kind !== "gated") {
    return false;
  }
  if (classification.alwaysGate) {
    return true;
  }
  return policy.gatedScopes.includes(classification.scope) && !grantedScopes.has(classification.scope);
}
