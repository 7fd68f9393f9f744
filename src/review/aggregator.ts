import type { Comment, ReviewReport, ReviewSummary, Severity } from "./types.js";

const SEVERITY_RANK: Record<string, number> = {
  critical: 0,
  error: 1,
  warning: 2,
  info: 3,
};
const UNKNOWN_SEVERITY_RANK = 4;

/**
 * Merges the findings of every stage into one report.
 *
 * Duplicates share a file and a message (trimmed, case-folded); line number
 * and severity are not part of the key, so the same finding reported a few
 * lines apart by two stages collapses to the first one seen. Survivors are
 * ordered by severity, then path, then line (absent = 0).
 */
export function aggregate(comments: readonly Comment[]): ReviewReport {
  const unique = deduplicate(comments);
  unique.sort(compareComments);

  return {
    comments: unique,
    totalIssues: unique.length,
    summary: summarize(unique),
  };
}

function deduplicate(comments: readonly Comment[]): Comment[] {
  const seen = new Set<string>();
  const unique: Comment[] = [];
  for (const comment of comments) {
    const key = `${comment.filePath}\u0000${normalizeMessage(comment.message)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(comment);
  }
  return unique;
}

function normalizeMessage(message: string): string {
  return message.trim().toLowerCase();
}

function compareComments(a: Comment, b: Comment): number {
  const bySeverity = severityRank(a.severity) - severityRank(b.severity);
  if (bySeverity !== 0) return bySeverity;
  if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
  return (a.lineNumber ?? 0) - (b.lineNumber ?? 0);
}

export function severityRank(severity: string): number {
  return Object.hasOwn(SEVERITY_RANK, severity) ? SEVERITY_RANK[severity] : UNKNOWN_SEVERITY_RANK;
}

export function summarize(comments: readonly Comment[]): ReviewSummary {
  const bySeverity: Record<Severity, number> = {
    critical: 0,
    error: 0,
    warning: 0,
    info: 0,
  };
  // Stage tags may collide with Object.prototype keys
  const byCategory = new Map<string, number>();

  for (const comment of comments) {
    if (Object.hasOwn(bySeverity, comment.severity)) bySeverity[comment.severity]++;
    byCategory.set(comment.category, (byCategory.get(comment.category) ?? 0) + 1);
  }

  return { total: comments.length, bySeverity, byCategory: Object.fromEntries(byCategory) };
}
