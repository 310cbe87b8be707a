import { z } from "zod";

export const SessionStateSchema = z.enum(["idle", "running", "blocked", "closing"]);

export type SessionState = z.infer<typeof SessionStateSchema>;

/** Valid transitions for the session state machine */
export const VALID_SESSION_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ["running", "closing"],
  running: ["idle", "blocked", "closing"],
  blocked: ["idle", "running", "closing"],
  closing: [],
};

/**
 * Isolated, branch-bound working directory
 */
export interface Workspace {
  path: string;
  branch: string;
  repoPath: string;
}

export interface Session {
  id: string;
  workspace: Workspace;
  /** Chat target the tracker display is created in */
  displayTarget: string;
  state: SessionState;
  currentJobId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateSessionInput {
  repoPath: string;
  branch?: string;
  displayTarget?: string;
}
