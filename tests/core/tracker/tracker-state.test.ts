import { describe, it, expect } from "vitest";
import {
  EVENT_WINDOW_LIMIT,
  applyEvents,
  createTrackerState,
  finalizeState,
  withPaused,
  withStatus,
  type TrackerState,
} from "../../../src/core/tracker/tracker-state.js";
import { testEvents } from "../../helpers.js";

function initial(): TrackerState {
  return createTrackerState({ jobId: "job-1", sessionId: "s1", instruction: "fix the build", startedAt: 1000 });
}

describe("tracker state", () => {
  it("should start running and empty", () => {
    expect(initial()).toEqual({
      jobId: "job-1",
      sessionId: "s1",
      instruction: "fix the build",
      startedAt: 1000,
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
    });
  });

  describe("applyEvents", () => {
    it("should count turns and touched files", () => {
      const state = applyEvents(initial(), [
        testEvents.speech("Looking", 2000),
        testEvents.toolStart("Read", { file_path: "src/a.ts" }, 3000),
        testEvents.toolStart("Edit", { file_path: "src/a.ts" }, 4000),
        testEvents.toolStart("NotebookEdit", { notebook_path: "nb.ipynb" }, 5000),
        testEvents.toolStart("Bash", { command: "ls" }, 6500),
        testEvents.speech("Done", 6900),
      ]);

      expect(state.turnCount).toBe(2);
      expect(state.filesTouched).toEqual(["src/a.ts", "nb.ipynb"]);
      expect(state.totalEvents).toBe(6);
      expect(state.events).toHaveLength(6);
      expect(state.elapsedSeconds).toBe(5);
    });

    it("should take turns, tokens, and cost from the result", () => {
      const state = applyEvents(initial(), [
        testEvents.speech("one"),
        testEvents.result({ numTurns: 7, inputTokens: 1200, outputTokens: 300, costUsd: 0.25 }),
      ]);

      expect(state).toMatchObject({ turnCount: 7, inputTokens: 1200, outputTokens: 300, costUsd: 0.25 });
    });

    it("should keep counted turns when the result has none", () => {
      const state = applyEvents(initial(), [testEvents.speech("one"), testEvents.result()]);

      expect(state.turnCount).toBe(1);
      expect(state.costUsd).toBe(0);
    });

    it("should keep only the most recent events", () => {
      const events = Array.from({ length: EVENT_WINDOW_LIMIT + 1 }, (_, i) => testEvents.speech(`e${i}`));

      const state = applyEvents(initial(), events);

      expect(state.events).toHaveLength(EVENT_WINDOW_LIMIT);
      expect(state.totalEvents).toBe(EVENT_WINDOW_LIMIT + 1);
      expect(state.events[0]).toBe(events[1]);
    });

    it("should not modify the previous state", () => {
      const before = initial();

      const after = applyEvents(before, [testEvents.speech("hi")]);

      expect(before.events).toEqual([]);
      expect(after).not.toBe(before);
    });

    it("should ignore events once finalized", () => {
      const done = finalizeState(initial(), {
        status: "done",
        resultSummary: "ok",
        error: null,
        errorType: null,
        finishedAt: 2000,
      });

      expect(applyEvents(done, [testEvents.speech("late")])).toBe(done);
    });
  });

  describe("withStatus", () => {
    it("should return the same state when the status is unchanged", () => {
      const state = initial();

      expect(withStatus(state, "running")).toBe(state);
    });

    it("should update the status and elapsed time", () => {
      const state = withStatus(initial(), "waiting_approval", 4500);

      expect(state.status).toBe("waiting_approval");
      expect(state.elapsedSeconds).toBe(3);
    });
  });

  describe("withPaused", () => {
    it("should toggle the paused flag", () => {
      const paused = withPaused(initial(), true);

      expect(paused.paused).toBe(true);
      expect(withPaused(paused, true)).toBe(paused);
      expect(withPaused(paused, false).paused).toBe(false);
    });
  });

  describe("finalizeState", () => {
    it("should record the outcome and freeze the state", () => {
      const paused = withPaused(initial(), true);

      const state = finalizeState(paused, {
        status: "failed",
        resultSummary: null,
        error: "Timed out after 60s",
        errorType: "timeout",
        finishedAt: 61_000,
      });

      expect(state).toMatchObject({
        status: "failed",
        error: "Timed out after 60s",
        errorType: "timeout",
        elapsedSeconds: 60,
        paused: false,
        finalized: true,
      });
      expect(
        finalizeState(state, { status: "done", resultSummary: "x", error: null, errorType: null, finishedAt: 0 })
      ).toBe(state);
      expect(withStatus(state, "running")).toBe(state);
    });
  });
});
