import type { ChangeLine, FileDiff } from "../utils/diff-parser.js";
import type { RuleConfig } from "../config-loader/schema.js";
import type { Severity } from "../review/types.js";

export interface RuleContext {
  file: FileDiff;
  config: RuleConfig;
}

/** What a rule reports; the engine adds path, severity, category and stage. */
export interface RuleHit {
  lineNumber?: number;
  message: string;
  suggestion?: string;
}

export interface Rule {
  id: string;
  name: string;
  description: string;
  category: string;
  defaultSeverity: Severity;
  run(ctx: RuleContext): RuleHit[];
}

export function addedLines(file: FileDiff): ChangeLine[] {
  return file.hunks.flatMap((h) => h.changes).filter((c) => c.kind === "addition");
}

const EXCERPT_LENGTH = 60;

/** Trimmed line content for a finding message, cut at a fixed width. */
export function excerpt(content: string): string {
  const text = content.trim();
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH - 1)}…` : text;
}
