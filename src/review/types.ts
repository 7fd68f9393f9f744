export const SEVERITIES = ["critical", "error", "warning", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Categories the built-in stages emit. Stages may use their own tags. */
export const REVIEW_CATEGORIES = [
  "logic",
  "security",
  "performance",
  "readability",
  "best_practices",
] as const;
export type ReviewCategory = (typeof REVIEW_CATEGORIES)[number];

/** A single finding produced by an analysis stage. Never mutated after creation. */
export interface Comment {
  readonly filePath: string;
  readonly lineNumber?: number;
  readonly severity: Severity;
  readonly category: string;
  readonly message: string;
  readonly suggestion?: string;
  /** Id of the stage that produced the finding */
  readonly sourceStage: string;
}

export interface ReviewSummary {
  total: number;
  bySeverity: Record<Severity, number>;
  byCategory: Record<string, number>;
}

export interface ReviewReport {
  comments: Comment[];
  totalIssues: number;
  summary: ReviewSummary;
}

/** Pull request metadata returned by a remote diff source */
export interface PullRequestInfo {
  number: number;
  title: string;
  description: string;
  author: string;
  state: string;
  baseBranch: string;
  headBranch: string;
  filesChanged: number;
  additions: number;
  deletions: number;
}

/** Presentation-facing outcome of one review run. */
export interface ReviewResponse {
  status: "success" | "error";
  prInfo: PullRequestInfo | null;
  comments: Comment[];
  totalIssues: number;
  /** Human-readable summary, or the fatal cause when status is "error" */
  message: string;
  summary: ReviewSummary;
}
