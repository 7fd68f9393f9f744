import { summarize } from "../review/aggregator.js";
import type {
  Comment,
  PullRequestInfo,
  ReviewResponse,
  ReviewSummary,
} from "../review/types.js";

export interface WireComment {
  file_path: string;
  line_number: number | null;
  severity: string;
  category: string;
  message: string;
  suggestion: string | null;
  source_stage: string;
}

export interface WirePullRequest {
  number: number;
  title: string;
  description: string;
  author: string;
  state: string;
  base_branch: string;
  head_branch: string;
  files_changed: number;
  additions: number;
  deletions: number;
}

export interface WireReviewResponse {
  status: "success" | "error" | "info";
  pr_info: WirePullRequest | null;
  comments: WireComment[];
  summary: string;
  total_issues: number;
  counts: {
    total: number;
    by_severity: Record<string, number>;
    by_category: Record<string, number>;
  };
}

export function toWireComment(c: Comment): WireComment {
  return {
    file_path: c.filePath,
    line_number: c.lineNumber ?? null,
    severity: c.severity,
    category: c.category,
    message: c.message,
    suggestion: c.suggestion ?? null,
    source_stage: c.sourceStage,
  };
}

function toWirePullRequest(pr: PullRequestInfo): WirePullRequest {
  return {
    number: pr.number,
    title: pr.title,
    description: pr.description,
    author: pr.author,
    state: pr.state,
    base_branch: pr.baseBranch,
    head_branch: pr.headBranch,
    files_changed: pr.filesChanged,
    additions: pr.additions,
    deletions: pr.deletions,
  };
}

function toWireCounts(summary: ReviewSummary): WireReviewResponse["counts"] {
  return {
    total: summary.total,
    by_severity: { ...summary.bySeverity },
    by_category: { ...summary.byCategory },
  };
}

export function toWireResponse(response: ReviewResponse): WireReviewResponse {
  return {
    status: response.status,
    pr_info: response.prInfo ? toWirePullRequest(response.prInfo) : null,
    comments: response.comments.map(toWireComment),
    summary: response.message,
    total_issues: response.totalIssues,
    counts: toWireCounts(response.summary),
  };
}

/** A canned reply for input that is not something to review. */
export function infoResponse(message: string): WireReviewResponse {
  return {
    status: "info",
    pr_info: null,
    comments: [],
    summary: message,
    total_issues: 0,
    counts: toWireCounts(summarize([])),
  };
}
