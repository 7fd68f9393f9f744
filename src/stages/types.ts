import type { FileDiff } from "../utils/diff-parser.js";
import type { Comment } from "../review/types.js";

export interface StageContext {
  /** Shared, frozen snapshot of the parsed diff */
  files: readonly FileDiff[];
  language: string;
  context?: string;
  /** Aborted when the orchestrator gives up on the stage */
  signal: AbortSignal;
}

/**
 * One independent reviewer. The orchestrator runs every registered stage
 * concurrently on the same input and knows nothing about what they check.
 */
export interface AnalysisStage {
  id: string;
  name: string;
  /** Overrides the orchestrator's default timeout for this stage */
  timeoutMs?: number;
  analyze(ctx: StageContext): Promise<Comment[]>;
}
