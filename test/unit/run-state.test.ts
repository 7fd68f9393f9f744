import { describe, it, expect } from "vitest";
import { createRun, transition, canTransition, isTerminal } from "../../src/review/run-state.js";
import { IllegalTransitionError } from "../../src/review/errors.js";

describe("run state", () => {
  it("starts with the language hint and nothing else", () => {
    const run = createRun({ diff: "x", language: "go" });

    expect(run.phase).toBe("start");
    expect(run.language).toBe("go");
    expect(run.report).toBeNull();
    expect(run.error).toBeNull();
  });

  it("records each transition", () => {
    const run = createRun({ reference: "https://github.com/o/r/pull/1" });
    transition(run, "fetching");
    transition(run, "parsing");

    expect(run.phase).toBe("parsing");
    expect(run.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      "start->fetching",
      "fetching->parsing",
    ]);
  });

  it("rejects transitions the machine does not allow", () => {
    const run = createRun({ diff: "x" });

    expect(() => transition(run, "aggregating")).toThrow(IllegalTransitionError);
    expect(() => transition(run, "aggregating")).toThrow("Illegal run transition: start -> aggregating");
    expect(run.phase).toBe("start");
  });

  it("only lets fetch and parse fail", () => {
    expect(canTransition("fetching", "failed")).toBe(true);
    expect(canTransition("parsing", "failed")).toBe(true);
    expect(canTransition("dispatched", "failed")).toBe(false);
    expect(canTransition("aggregating", "failed")).toBe(false);
  });

  it("treats done and failed as terminal", () => {
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("dispatched")).toBe(false);
  });
});
