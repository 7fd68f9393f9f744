import type { FileDiff } from "../utils/diff-parser.js";
import { IllegalTransitionError, type ReviewError } from "./errors.js";
import type { Comment, PullRequestInfo, ReviewReport } from "./types.js";

export type RunPhase =
  | "start"
  | "fetching"
  | "parsing"
  | "dispatched"
  | "aggregating"
  | "done"
  | "failed";

const TRANSITIONS: Record<RunPhase, readonly RunPhase[]> = {
  start: ["fetching", "parsing"],
  fetching: ["parsing", "failed"],
  parsing: ["dispatched", "failed"],
  dispatched: ["aggregating"],
  aggregating: ["done"],
  done: [],
  failed: [],
};

export interface ReviewInput {
  /** Remote pull request reference; takes priority over `diff` */
  reference?: string;
  diff?: string;
  language?: string;
  context?: string;
  /** Per-request credential for the diff source. Never logged. */
  token?: string;
}

export type StageStatus = "ok" | "failed" | "timeout";

export interface StageOutcome {
  stageId: string;
  status: StageStatus;
  comments: Comment[];
  durationMs: number;
  error?: string;
}

export interface PhaseTransition {
  from: RunPhase;
  to: RunPhase;
  at: string;
}

/** The single state record threaded through one orchestrator run. */
export interface ReviewRun {
  readonly input: ReviewInput;
  phase: RunPhase;
  transitions: PhaseTransition[];
  prInfo: PullRequestInfo | null;
  language: string | null;
  files: readonly FileDiff[];
  stages: StageOutcome[];
  report: ReviewReport | null;
  error: ReviewError | null;
}

export function createRun(input: ReviewInput): ReviewRun {
  return {
    input,
    phase: "start",
    transitions: [],
    prInfo: null,
    language: input.language ?? null,
    files: [],
    stages: [],
    report: null,
    error: null,
  };
}

export function canTransition(from: RunPhase, to: RunPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(run: ReviewRun, to: RunPhase): void {
  if (!canTransition(run.phase, to)) {
    throw new IllegalTransitionError(run.phase, to);
  }
  run.transitions.push({ from: run.phase, to, at: new Date().toISOString() });
  run.phase = to;
}

export function isTerminal(phase: RunPhase): boolean {
  return TRANSITIONS[phase].length === 0;
}
