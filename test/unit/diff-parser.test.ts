import { describe, it, expect } from "vitest";
import {
  parseDiff,
  countChanges,
  displayPath,
  freezeFiles,
} from "../../src/utils/diff-parser.js";
import { ParseError } from "../../src/review/errors.js";
import { PYTHON_DIFF, MULTI_FILE_DIFF, BINARY_ONLY_DIFF } from "../fixtures/sample-diff.js";

describe("parseDiff", () => {
  it("parses a single-file diff into files, hunks and changes", () => {
    const files = parseDiff(PYTHON_DIFF);

    expect(files).toHaveLength(1);
    expect(files[0].oldPath).toBe("test.py");
    expect(files[0].newPath).toBe("test.py");
    expect(files[0].language).toBe("python");
    expect(files[0].hunks).toHaveLength(1);
    expect(files[0].hunks[0].oldStart).toBe(1);
    expect(files[0].hunks[0].newStart).toBe(1);
    expect(files[0].hunks[0].changes).toEqual([
      { kind: "context", lineNumber: 1, content: "def test():" },
      { kind: "deletion", lineNumber: 1, content: "    pass" },
      { kind: "addition", lineNumber: 2, content: "    x = 1" },
      { kind: "addition", lineNumber: 3, content: "    return x" },
    ]);
  });

  it("splits multi-file diffs and ignores git preamble lines", () => {
    const files = parseDiff(MULTI_FILE_DIFF);

    expect(files.map(displayPath)).toEqual(["src/server.ts", "src/util.ts"]);
    expect(files.map((f) => f.language)).toEqual(["typescript", "typescript"]);
    expect(files[0].hunks).toHaveLength(1);
    expect(files[1].hunks).toHaveLength(2);
  });

  it("seeds counters from each hunk header", () => {
    const [, util] = parseDiff(MULTI_FILE_DIFF);

    expect(util.hunks[0].changes.at(-1)).toEqual({
      kind: "addition",
      lineNumber: 12,
      content: 'console.log("loaded");',
    });
    expect(util.hunks[1].changes).toEqual([
      { kind: "deletion", lineNumber: 40, content: "  return input.toLowerCase()" },
      { kind: "addition", lineNumber: 41, content: "  return input.toLowerCase();" },
      { kind: "context", lineNumber: 42, content: "}" },
    ]);
  });

  it("counts additions and deletions per file", () => {
    const [server, util] = parseDiff(MULTI_FILE_DIFF);

    expect(countChanges(server)).toEqual({ additions: 4, deletions: 1 });
    expect(countChanges(util)).toEqual({ additions: 2, deletions: 1 });
  });

  it("emits one change per +/- body line, excluding file markers", () => {
    const diff = [
      "--- a/app.js",
      "+++ b/app.js",
      "@@ -3,4 +3,5 @@",
      "-const a = 1;",
      "-const b = 2;",
      "+const a = 10;",
      "+const b = 20;",
      "+const c = 30;",
      " module.exports = { a, b };",
    ].join("\n");

    const changes = parseDiff(diff)[0].hunks[0].changes;

    expect(changes.filter((c) => c.kind === "addition")).toHaveLength(3);
    expect(changes.filter((c) => c.kind === "deletion")).toHaveLength(2);
  });

  it("numbers successive additions and deletions strictly by one", () => {
    const diff = [
      "--- a/app.js",
      "+++ b/app.js",
      "@@ -7,3 +20,3 @@",
      "-one",
      "+uno",
      "-two",
      "+dos",
      "-three",
      "+tres",
    ].join("\n");

    const changes = parseDiff(diff)[0].hunks[0].changes;

    expect(changes.filter((c) => c.kind === "deletion").map((c) => c.lineNumber)).toEqual([7, 8, 9]);
    expect(changes.filter((c) => c.kind === "addition").map((c) => c.lineNumber)).toEqual([20, 21, 22]);
  });

  it("reports post-image numbers for context-only hunks", () => {
    const diff = ["--- a/a.go", "+++ b/a.go", "@@ -5,3 +9,3 @@", " a", " b", " c"].join("\n");

    const changes = parseDiff(diff)[0].hunks[0].changes;

    expect(changes.map((c) => c.lineNumber)).toEqual([9, 10, 11]);
    expect(changes.map((c) => c.lineNumber - 9 + 5)).toEqual([5, 6, 7]);
  });

  it("returns structurally identical output when parsing twice", () => {
    expect(parseDiff(MULTI_FILE_DIFF)).toEqual(parseDiff(MULTI_FILE_DIFF));
  });

  it("drops file blocks without hunks", () => {
    expect(parseDiff(BINARY_ONLY_DIFF)).toEqual([]);

    const files = parseDiff(`${BINARY_ONLY_DIFF}\n${PYTHON_DIFF}`);
    expect(files.map(displayPath)).toEqual(["test.py"]);
  });

  it("skips malformed hunk headers and keeps parsing", () => {
    const diff = [
      "--- a/a.py",
      "+++ b/a.py",
      "@@ garbage @@",
      "+ignored",
      "@@ -1 +1 @@",
      "+kept",
    ].join("\n");

    const files = parseDiff(diff);

    expect(files[0].hunks).toHaveLength(1);
    expect(files[0].hunks[0].changes).toEqual([{ kind: "addition", lineNumber: 1, content: "kept" }]);
  });

  it("ignores hunk headers outside any file", () => {
    expect(parseDiff("@@ -1,2 +1,2 @@\n+orphan")).toEqual([]);
  });

  it("ends the hunk on an unrecognized line", () => {
    const diff = ["--- a/a.py", "+++ b/a.py", "@@ -1,1 +1,2 @@", "+one", "", "+two"].join("\n");

    const changes = parseDiff(diff)[0].hunks[0].changes;

    expect(changes).toEqual([{ kind: "addition", lineNumber: 1, content: "one" }]);
  });

  it("skips no-newline markers without closing the hunk", () => {
    const diff = [
      "--- a/a.py",
      "+++ b/a.py",
      "@@ -1 +1 @@",
      "-old",
      "\\ No newline at end of file",
      "+new",
    ].join("\n");

    const changes = parseDiff(diff)[0].hunks[0].changes;

    expect(changes.map((c) => c.kind)).toEqual(["deletion", "addition"]);
  });

  it("accepts CRLF line endings", () => {
    const files = parseDiff(PYTHON_DIFF.replace(/\n/g, "\r\n"));

    expect(files[0].hunks[0].changes[0]).toEqual({ kind: "context", lineNumber: 1, content: "def test():" });
  });

  it("treats /dev/null as the old path of a new file", () => {
    const diff = ["--- /dev/null", "+++ b/new.md", "@@ -0,0 +1 @@", "+# Title"].join("\n");

    const [file] = parseDiff(diff);

    expect(file.oldPath).toBe("/dev/null");
    expect(displayPath(file)).toBe("new.md");
    expect(file.language).toBe("markdown");
  });

  it("fails with ParseError on empty or absent input", () => {
    expect(() => parseDiff("")).toThrow(ParseError);
    expect(() => parseDiff(undefined)).toThrow("No diff content available to parse");
    expect(() => parseDiff(null)).toThrow(ParseError);
  });

  it("parses whitespace-only input to no files", () => {
    expect(parseDiff("  \n")).toEqual([]);
  });
});

describe("freezeFiles", () => {
  it("freezes every level of the parsed snapshot", () => {
    const files = freezeFiles(parseDiff(PYTHON_DIFF));

    expect(Object.isFrozen(files)).toBe(true);
    expect(Object.isFrozen(files[0])).toBe(true);
    expect(Object.isFrozen(files[0].hunks[0].changes)).toBe(true);
    expect(Object.isFrozen(files[0].hunks[0].changes[0])).toBe(true);
  });
});
