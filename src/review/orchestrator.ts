import { parseDiff, freezeFiles, displayPath, countChanges } from "../utils/diff-parser.js";
import { classifyPrimary, UNKNOWN_LANGUAGE } from "../utils/language.js";
import { withTimeout } from "../utils/timeout.js";
import { createChildLogger } from "../utils/logger.js";
import type { AnalysisStage } from "../stages/types.js";
import { aggregate, summarize } from "./aggregator.js";
import { buildSummaryText } from "./body-builder.js";
import {
  FetchError,
  ReviewError,
  StageError,
  StageTimeoutError,
  errorMessage,
} from "./errors.js";
import {
  createRun,
  transition,
  type ReviewInput,
  type ReviewRun,
  type StageOutcome,
} from "./run-state.js";
import type { PullRequestInfo, ReviewResponse } from "./types.js";
import type { FileDiff } from "../utils/diff-parser.js";

const log = createChildLogger({ module: "orchestrator" });

export const DEFAULT_STAGE_TIMEOUT_MS = 60_000;

export interface FetchedDiff {
  metadata: PullRequestInfo;
  diffText: string;
}

/** Retrieves diff text for a remote reference such as a pull request URL. */
export interface DiffSource {
  fetch(reference: string, options?: { token?: string }): Promise<FetchedDiff>;
}

export interface OrchestratorOptions {
  stages: AnalysisStage[];
  diffSource?: DiffSource;
  stageTimeoutMs?: number;
}

/**
 * Fetch (optional) → parse → fan out to every stage → join → aggregate.
 *
 * Only a fetch or parse failure fails the run. A stage that throws or
 * exceeds its timeout contributes no findings and is recorded on the run
 * as a diagnostic.
 */
export class ReviewOrchestrator {
  private readonly stages: AnalysisStage[];
  private readonly diffSource?: DiffSource;
  private readonly stageTimeoutMs: number;

  constructor(options: OrchestratorOptions) {
    this.stages = [...options.stages];
    this.diffSource = options.diffSource;
    this.stageTimeoutMs = options.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
  }

  get stageIds(): string[] {
    return this.stages.map((s) => s.id);
  }

  async run(input: ReviewInput): Promise<ReviewRun> {
    const startTime = Date.now();
    const run = createRun(input);

    let diffText = input.diff;
    if (input.reference) {
      transition(run, "fetching");
      try {
        const fetched = await this.fetch(input.reference, input.token);
        run.prInfo = fetched.metadata;
        diffText = fetched.diffText;
      } catch (err) {
        return this.fail(run, err instanceof FetchError ? err : toFetchError(err));
      }
    }

    transition(run, "parsing");
    let files: FileDiff[];
    try {
      files = parseDiff(diffText);
    } catch (err) {
      if (err instanceof ReviewError && err.fatal) return this.fail(run, err);
      throw err;
    }

    run.files = freezeFiles(files);
    run.language ??= classifyPrimary(files.map(displayPath));
    const changes = files.map(countChanges);
    log.info(
      {
        files: files.length,
        additions: changes.reduce((sum, c) => sum + c.additions, 0),
        deletions: changes.reduce((sum, c) => sum + c.deletions, 0),
        language: run.language,
        stages: this.stages.length,
      },
      "Diff parsed, dispatching stages"
    );

    transition(run, "dispatched");
    run.stages = await Promise.all(
      this.stages.map((stage) => this.invokeStage(stage, run))
    );

    transition(run, "aggregating");
    run.report = aggregate(run.stages.flatMap((s) => s.comments));
    transition(run, "done");

    const failed = run.stages.filter((s) => s.status !== "ok");
    log.info(
      {
        totalIssues: run.report.totalIssues,
        rawFindings: run.stages.reduce((sum, s) => sum + s.comments.length, 0),
        failedStages: failed.map((s) => `${s.stageId}:${s.status}`),
        durationMs: Date.now() - startTime,
      },
      "Review complete"
    );
    return run;
  }

  private async fetch(reference: string, token?: string) {
    if (!this.diffSource) {
      throw new FetchError("No diff source configured for remote references");
    }
    log.info({ reference, tokenProvided: Boolean(token) }, "Fetching remote diff");
    return this.diffSource.fetch(reference, { token });
  }

  private fail(run: ReviewRun, error: ReviewError): ReviewRun {
    transition(run, "failed");
    run.error = error;
    log.error({ code: error.code, phase: run.transitions.at(-1)?.from }, error.message);
    return run;
  }

  private async invokeStage(stage: AnalysisStage, run: ReviewRun): Promise<StageOutcome> {
    const startTime = Date.now();
    const timeoutMs = stage.timeoutMs ?? this.stageTimeoutMs;

    try {
      const comments = await withTimeout(
        (signal) =>
          stage.analyze({
            files: run.files,
            language: run.language ?? UNKNOWN_LANGUAGE,
            context: run.input.context,
            signal,
          }),
        timeoutMs,
        () => new StageTimeoutError(stage.id, timeoutMs)
      );
      const durationMs = Date.now() - startTime;
      log.debug({ stage: stage.id, findings: comments.length, durationMs }, "Stage finished");
      return { stageId: stage.id, status: "ok", comments, durationMs };
    } catch (err) {
      const durationMs = Date.now() - startTime;
      const error =
        err instanceof StageTimeoutError
          ? err
          : new StageError(stage.id, errorMessage(err), { cause: err });
      log.warn({ err: error, stage: stage.id, durationMs }, "Stage produced no findings");
      return {
        stageId: stage.id,
        status: err instanceof StageTimeoutError ? "timeout" : "failed",
        comments: [],
        durationMs,
        error: error.message,
      };
    }
  }
}

function toFetchError(err: unknown): FetchError {
  return new FetchError(errorMessage(err), { cause: err });
}

/**
 * Runs one review and shapes the outcome for a presentation layer. Fatal
 * errors become `status: "error"` with zero comments; stage diagnostics
 * stay on the run and in the logs.
 */
export async function runReview(
  orchestrator: ReviewOrchestrator,
  input: ReviewInput
): Promise<ReviewResponse> {
  const run = await orchestrator.run(input);

  if (run.error || !run.report) {
    return {
      status: "error",
      prInfo: run.prInfo,
      comments: [],
      totalIssues: 0,
      message: `Review failed: ${run.error?.message ?? "unknown error"}`,
      summary: summarize([]),
    };
  }

  return {
    status: "success",
    prInfo: run.prInfo,
    comments: run.report.comments,
    totalIssues: run.report.totalIssues,
    message: buildSummaryText(run.report),
    summary: run.report.summary,
  };
}
