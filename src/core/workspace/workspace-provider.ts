import type { Workspace } from "../../types/session.js";

export interface AllocateWorkspaceOptions {
  sessionId: string;
  repoPath: string;
  /** Branch to check out; a per-session branch is created when omitted */
  branch?: string;
}

/**
 * Capability that hands out isolated working directories. One workspace is
 * bound to each session for its whole life.
 */
export interface WorkspaceProvider {
  allocate(options: AllocateWorkspaceOptions): Promise<Workspace>;
  destroy(workspace: Workspace): Promise<void>;
  /**
   * Current commit of the workspace, or null when it has none
   */
  snapshot(workspacePath: string): Promise<string | null>;
  /**
   * Files that differ from the snapshot, including uncommitted and
   * untracked ones, sorted
   */
  changedFiles(workspacePath: string, since: string | null): Promise<string[]>;
}
