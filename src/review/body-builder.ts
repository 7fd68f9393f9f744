import { REVIEW_CATEGORIES, SEVERITIES, type ReviewReport, type Severity } from "./types.js";

const SEVERITY_LABELS: Record<Severity, (n: number) => string> = {
  critical: (n) => `${n} critical`,
  error: (n) => `${n} error(s)`,
  warning: (n) => `${n} warning(s)`,
  info: (n) => `${n} info`,
};

export const NO_ISSUES_TEXT = "✅ No issues found. Code looks good!";

/**
 * Builds the plain-text summary returned alongside the comments:
 *
 *   Found 3 issue(s): 1 critical, 2 warning(s)
 *   Categories:
 *     • Security: 1
 *     • Logic: 2
 *
 * Zero counts are omitted. Built-in categories come first in their fixed
 * order, then any custom tags in the order they were first seen.
 */
export function buildSummaryText(report: ReviewReport): string {
  if (report.totalIssues === 0) return NO_ISSUES_TEXT;

  const { bySeverity, byCategory } = report.summary;

  const severities = SEVERITIES.filter((s) => bySeverity[s] > 0).map((s) =>
    SEVERITY_LABELS[s](bySeverity[s])
  );

  const lines = [`Found ${report.totalIssues} issue(s): ${severities.join(", ")}`.trimEnd()];

  const categories = orderCategories(Object.keys(byCategory));
  if (categories.length > 0) {
    lines.push("Categories:");
    for (const category of categories) {
      lines.push(`  • ${formatCategory(category)}: ${byCategory[category]}`);
    }
  }

  return lines.join("\n");
}

function orderCategories(seen: string[]): string[] {
  const builtIn: string[] = REVIEW_CATEGORIES.filter((c) => seen.includes(c));
  const custom = seen.filter((c) => !builtIn.includes(c));
  return [...builtIn, ...custom];
}

/** `best_practices` → `Best Practices` */
export function formatCategory(category: string): string {
  return category
    .split(/[_\s-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
