import { describe, it, expect } from "vitest";
import { buildSummaryText, formatCategory, NO_ISSUES_TEXT } from "../../src/review/body-builder.js";
import { aggregate } from "../../src/review/aggregator.js";
import type { Comment } from "../../src/review/types.js";

function makeComment(overrides: Partial<Comment>): Comment {
  return {
    filePath: "test.ts",
    lineNumber: 1,
    severity: "warning",
    category: "logic",
    message: "Test issue",
    sourceStage: "logic",
    ...overrides,
  };
}

describe("buildSummaryText", () => {
  it("reports a clean review", () => {
    expect(buildSummaryText(aggregate([]))).toBe(NO_ISSUES_TEXT);
  });

  it("lists non-zero severities and categories", () => {
    const report = aggregate([
      makeComment({ severity: "critical", category: "security", message: "a" }),
      makeComment({ severity: "warning", category: "logic", message: "b" }),
      makeComment({ severity: "warning", category: "logic", message: "c" }),
    ]);

    expect(buildSummaryText(report)).toBe(
      [
        "Found 3 issue(s): 1 critical, 2 warning(s)",
        "Categories:",
        "  • Logic: 2",
        "  • Security: 1",
      ].join("\n")
    );
  });

  it("puts custom categories after the built-in ones", () => {
    const report = aggregate([
      makeComment({ severity: "info", category: "style_guide", message: "a" }),
      makeComment({ severity: "error", category: "performance", message: "b" }),
    ]);

    expect(buildSummaryText(report)).toBe(
      [
        "Found 2 issue(s): 1 error(s), 1 info",
        "Categories:",
        "  • Performance: 1",
        "  • Style Guide: 1",
      ].join("\n")
    );
  });
});

describe("formatCategory", () => {
  it("title-cases snake_case tags", () => {
    expect(formatCategory("best_practices")).toBe("Best Practices");
    expect(formatCategory("security")).toBe("Security");
  });
});
