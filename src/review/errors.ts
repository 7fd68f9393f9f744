export type ReviewErrorCode =
  | "FETCH_FAILED"
  | "PARSE_FAILED"
  | "STAGE_FAILED"
  | "STAGE_TIMEOUT"
  | "ILLEGAL_TRANSITION";

/** Base class for every error raised by the review pipeline. */
export class ReviewError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  /** Fatal errors end the run; stage errors only cost that stage's findings. */
  get fatal(): boolean {
    return this.code === "FETCH_FAILED" || this.code === "PARSE_FAILED";
  }
}

/** The remote diff could not be retrieved. */
export class FetchError extends ReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "FETCH_FAILED", options);
  }
}

/** No diff content was supplied. Malformed hunks are never a ParseError. */
export class ParseError extends ReviewError {
  constructor(message: string) {
    super(message, "PARSE_FAILED");
  }
}

export class StageError extends ReviewError {
  constructor(
    public readonly stageId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Stage ${stageId} failed: ${message}`, "STAGE_FAILED", options);
  }
}

export class StageTimeoutError extends ReviewError {
  constructor(
    public readonly stageId: string,
    public readonly timeoutMs: number
  ) {
    super(`Stage ${stageId} timed out after ${timeoutMs}ms`, "STAGE_TIMEOUT");
  }
}

export class IllegalTransitionError extends ReviewError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Illegal run transition: ${from} -> ${to}`, "ILLEGAL_TRANSITION");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
