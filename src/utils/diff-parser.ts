import { ParseError } from "../review/errors.js";
import { classify } from "./language.js";

export type ChangeKind = "addition" | "deletion" | "context";

export interface ChangeLine {
  readonly kind: ChangeKind;
  /** Post-image number for additions and context, pre-image for deletions */
  readonly lineNumber: number;
  readonly content: string;
}

export interface Hunk {
  readonly oldStart: number;
  readonly newStart: number;
  readonly changes: ChangeLine[];
}

export interface FileDiff {
  readonly oldPath: string;
  /** Absent when the diff names no post-image (pure deletions) */
  readonly newPath?: string;
  readonly language: string;
  readonly hunks: Hunk[];
}

const OLD_FILE_MARKER = "--- a/";
const NEW_FILE_MARKER = "+++ b/";
const DEV_NULL_OLD = "--- /dev/null";
const DEV_NULL = "/dev/null";
const HUNK_HEADER = /^@@ -(\d+)(?:,\d+)? \+(\d+)(?:,\d+)? @@/;

interface OpenFile {
  oldPath: string;
  newPath?: string;
  hunks: Hunk[];
}

/**
 * Parses unified diff text into per-file change records.
 *
 * Single forward scan. Old/new line numbers come from running counters
 * seeded by each hunk header; header counts are never checked against the
 * body, so a diff with wrong counts desynchronizes rather than self-corrects.
 * Files without hunks (preambles, binary notices) are dropped.
 */
export function parseDiff(diffText: string | null | undefined): FileDiff[] {
  if (diffText === null || diffText === undefined || diffText.length === 0) {
    throw new ParseError("No diff content available to parse");
  }

  const files: FileDiff[] = [];
  let file: OpenFile | null = null;
  let hunk: Hunk | null = null;
  let oldLine = 0;
  let newLine = 0;

  const flush = () => {
    if (file && file.hunks.length > 0) files.push(toFileDiff(file));
    file = null;
    hunk = null;
  };

  for (const line of diffText.split(/\r?\n/)) {
    if (line.startsWith(OLD_FILE_MARKER) || line.startsWith(DEV_NULL_OLD)) {
      flush();
      file = {
        oldPath: line.startsWith(OLD_FILE_MARKER)
          ? line.slice(OLD_FILE_MARKER.length)
          : DEV_NULL,
        hunks: [],
      };
      continue;
    }

    if (line.startsWith(NEW_FILE_MARKER)) {
      if (file) file.newPath = line.slice(NEW_FILE_MARKER.length);
      hunk = null;
      continue;
    }

    if (line.startsWith("@@")) {
      hunk = null;
      if (!file) continue;
      const match = HUNK_HEADER.exec(line);
      if (!match) continue;

      hunk = {
        oldStart: parseInt(match[1], 10),
        newStart: parseInt(match[2], 10),
        changes: [],
      };
      file.hunks.push(hunk);
      oldLine = hunk.oldStart;
      newLine = hunk.newStart;
      continue;
    }

    if (!hunk) continue;

    if (line.startsWith("+") && !line.startsWith("+++")) {
      hunk.changes.push({ kind: "addition", lineNumber: newLine, content: line.slice(1) });
      newLine++;
    } else if (line.startsWith("-") && !line.startsWith("---")) {
      hunk.changes.push({ kind: "deletion", lineNumber: oldLine, content: line.slice(1) });
      oldLine++;
    } else if (line.startsWith(" ")) {
      hunk.changes.push({ kind: "context", lineNumber: newLine, content: line.slice(1) });
      oldLine++;
      newLine++;
    } else if (line.startsWith("\\")) {
      // "\ No newline at end of file" - skip
    } else {
      hunk = null;
    }
  }

  flush();
  return files;
}

function toFileDiff(file: OpenFile): FileDiff {
  return {
    oldPath: file.oldPath,
    newPath: file.newPath,
    language: classify(file.newPath ?? file.oldPath),
    hunks: file.hunks,
  };
}

/** The path a reviewer should attach comments to. */
export function displayPath(file: FileDiff): string {
  return file.newPath ?? file.oldPath;
}

export function countChanges(file: FileDiff): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;
  for (const hunk of file.hunks) {
    for (const change of hunk.changes) {
      if (change.kind === "addition") additions++;
      else if (change.kind === "deletion") deletions++;
    }
  }
  return { additions, deletions };
}

/** Freezes the parsed files in place so stages share one read-only snapshot. */
export function freezeFiles(files: FileDiff[]): readonly FileDiff[] {
  for (const file of files) {
    for (const hunk of file.hunks) {
      for (const change of hunk.changes) Object.freeze(change);
      Object.freeze(hunk.changes);
      Object.freeze(hunk);
    }
    Object.freeze(file.hunks);
    Object.freeze(file);
  }
  return Object.freeze(files);
}
