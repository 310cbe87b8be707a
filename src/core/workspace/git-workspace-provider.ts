import { spawn } from "node:child_process";
import { existsSync, mkdirSync } from "node:fs";
import { basename, isAbsolute, join, resolve } from "node:path";
import type { WorkspaceConfig } from "../../types/config.js";
import type { Workspace } from "../../types/session.js";
import { logger } from "../../infra/logger.js";
import { WorkspaceError } from "../../infra/errors.js";
import type { AllocateWorkspaceOptions, WorkspaceProvider } from "./workspace-provider.js";

export type GitRunner = (args: string[], options: { cwd: string }) => Promise<string>;

/**
 * Run a git command and resolve with its stdout
 */
export const runGit: GitRunner = (args, options) => {
  return new Promise((resolvePromise, reject) => {
    const proc = spawn("git", args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code) => {
      if (code === 0) {
        resolvePromise(stdout);
      } else {
        reject(new WorkspaceError(`Git command failed: git ${args.join(" ")}\n${stderr || stdout}`));
      }
    });

    proc.on("error", (error) => {
      reject(new WorkspaceError(`Failed to spawn git: ${error.message}`, error));
    });
  });
};

function lines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * GitWorkspaceProvider - One git worktree per session
 *
 * Worktrees live under workspace.rootDir (relative paths resolve against the
 * data directory) and are named `<repo>-<sessionId>`.
 */
export class GitWorkspaceProvider implements WorkspaceProvider {
  private readonly rootDir: string;

  constructor(
    private readonly config: WorkspaceConfig,
    dataDir: string,
    private readonly git: GitRunner = runGit
  ) {
    this.rootDir = isAbsolute(config.rootDir) ? config.rootDir : join(dataDir, config.rootDir);
  }

  getRootDir(): string {
    return this.rootDir;
  }

  async allocate(options: AllocateWorkspaceOptions): Promise<Workspace> {
    const repoPath = resolve(options.repoPath);
    if (!existsSync(repoPath)) {
      throw new WorkspaceError(`Repository not found: ${repoPath}`);
    }

    const branch = options.branch ?? `${this.config.branchPrefix}/${options.sessionId}`;
    const path = join(this.rootDir, `${basename(repoPath)}-${options.sessionId}`);

    if (existsSync(path)) {
      logger.debug(`Worktree already exists: ${path}`);
      return { path, branch, repoPath };
    }

    if (!existsSync(this.rootDir)) {
      mkdirSync(this.rootDir, { recursive: true });
    }

    logger.info(`Creating worktree: ${path} (${branch})`);
    if (await this.branchExists(repoPath, branch)) {
      await this.git(["worktree", "add", path, branch], { cwd: repoPath });
    } else {
      await this.git(["worktree", "add", "-b", branch, path], { cwd: repoPath });
    }

    return { path, branch, repoPath };
  }

  async destroy(workspace: Workspace): Promise<void> {
    if (!existsSync(workspace.path)) {
      logger.debug(`Worktree does not exist: ${workspace.path}`);
      return;
    }

    logger.info(`Removing worktree: ${workspace.path}`);
    await this.git(["worktree", "remove", workspace.path, "--force"], { cwd: workspace.repoPath });
    await this.git(["worktree", "prune"], { cwd: workspace.repoPath });
  }

  async snapshot(workspacePath: string): Promise<string | null> {
    try {
      const sha = await this.git(["rev-parse", "HEAD"], { cwd: workspacePath });
      return sha.trim() || null;
    } catch {
      // No commits yet
      return null;
    }
  }

  async changedFiles(workspacePath: string, since: string | null): Promise<string[]> {
    const diffArgs = since ? ["diff", "--name-only", since] : ["diff", "--name-only"];
    const [diff, untracked] = await Promise.all([
      this.git(diffArgs, { cwd: workspacePath }),
      this.git(["ls-files", "--others", "--exclude-standard"], { cwd: workspacePath }),
    ]);
    return [...new Set([...lines(diff), ...lines(untracked)])].sort();
  }

  private async branchExists(repoPath: string, branch: string): Promise<boolean> {
    try {
      await this.git(["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`], { cwd: repoPath });
      return true;
    } catch {
      return false;
    }
  }
}
