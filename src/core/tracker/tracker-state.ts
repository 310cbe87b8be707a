import type { JobErrorType, JobStatus } from "../../types/job.js";
import type { SessionEvent } from "../../types/events.js";

/** Events kept in memory per tracker; older ones only count toward "earlier" */
export const EVENT_WINDOW_LIMIT = 100;

/**
 * Renderable projection of one job. Treated as immutable: every update
 * returns a new object.
 */
export interface TrackerState {
  readonly jobId: string;
  readonly sessionId: string;
  readonly instruction: string;
  readonly events: readonly SessionEvent[];
  /** Events accepted so far, including those dropped from the window */
  readonly totalEvents: number;
  /** Epoch ms */
  readonly startedAt: number;
  readonly elapsedSeconds: number;
  readonly filesTouched: readonly string[];
  readonly turnCount: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly costUsd: number;
  readonly status: JobStatus;
  readonly paused: boolean;
  readonly finalResult: string | null;
  readonly error: string | null;
  readonly errorType: JobErrorType | null;
  readonly finalized: boolean;
}

export interface TrackerIdentity {
  jobId: string;
  sessionId: string;
  instruction: string;
  startedAt: number;
}

export interface TrackerCompletion {
  status: Extract<JobStatus, "done" | "failed" | "canceled">;
  resultSummary: string | null;
  error: string | null;
  errorType: JobErrorType | null;
  finishedAt: number;
}

export function createTrackerState(identity: TrackerIdentity): TrackerState {
  return {
    ...identity,
    events: [],
    totalEvents: 0,
    elapsedSeconds: 0,
    filesTouched: [],
    turnCount: 0,
    inputTokens: 0,
    outputTokens: 0,
    costUsd: 0,
    status: "running",
    paused: false,
    finalResult: null,
    error: null,
    errorType: null,
    finalized: false,
  };
}

function elapsedAt(state: TrackerState, at: number): number {
  return Math.max(state.elapsedSeconds, Math.floor((at - state.startedAt) / 1000));
}

function touchedPath(event: SessionEvent): string | null {
  if (event.type !== "tool-start") {
    return null;
  }
  const path = event.toolInput["file_path"] ?? event.toolInput["notebook_path"];
  return typeof path === "string" && path.length > 0 ? path : null;
}

/**
 * Fold a batch of accepted events into the state
 */
export function applyEvents(state: TrackerState, events: readonly SessionEvent[]): TrackerState {
  if (state.finalized || events.length === 0) {
    return state;
  }

  let { elapsedSeconds, turnCount, inputTokens, outputTokens, costUsd } = state;
  const files = [...state.filesTouched];

  for (const event of events) {
    elapsedSeconds = Math.max(elapsedSeconds, elapsedAt(state, event.timestamp));

    const path = touchedPath(event);
    if (path !== null && !files.includes(path)) {
      files.push(path);
    }

    if (event.type === "ai-speech") {
      turnCount++;
    } else if (event.type === "system-result") {
      if (event.numTurns !== null) {
        turnCount = event.numTurns;
      }
      inputTokens = event.inputTokens;
      outputTokens = event.outputTokens;
      if (event.costUsd !== null) {
        costUsd = event.costUsd;
      }
    }
  }

  const window = [...state.events, ...events];

  return {
    ...state,
    events: window.length > EVENT_WINDOW_LIMIT ? window.slice(-EVENT_WINDOW_LIMIT) : window,
    totalEvents: state.totalEvents + events.length,
    elapsedSeconds,
    filesTouched: files,
    turnCount,
    inputTokens,
    outputTokens,
    costUsd,
  };
}

export function withStatus(state: TrackerState, status: JobStatus, at?: number): TrackerState {
  if (state.finalized || state.status === status) {
    return state;
  }
  return {
    ...state,
    status,
    elapsedSeconds: at === undefined ? state.elapsedSeconds : elapsedAt(state, at),
  };
}

export function withPaused(state: TrackerState, paused: boolean): TrackerState {
  return state.paused === paused ? state : { ...state, paused };
}

/**
 * Freeze the state with the job's terminal outcome
 */
export function finalizeState(state: TrackerState, completion: TrackerCompletion): TrackerState {
  if (state.finalized) {
    return state;
  }
  return {
    ...state,
    status: completion.status,
    finalResult: completion.resultSummary,
    error: completion.error,
    errorType: completion.errorType,
    elapsedSeconds: elapsedAt(state, completion.finishedAt),
    paused: false,
    finalized: true,
  };
}
