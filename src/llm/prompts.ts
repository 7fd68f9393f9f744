import type { FileDiff } from "../utils/diff-parser.js";
import { displayPath } from "../utils/diff-parser.js";
import type { LlmFocus } from "../config-loader/schema.js";

interface FocusDefinition {
  specialty: string;
  checklist: string[];
  closing: string;
}

const FOCUS: Record<LlmFocus, FocusDefinition> = {
  logic: {
    specialty: "logic analysis",
    checklist: [
      "Logical errors and bugs",
      "Edge cases not handled",
      "Null or undefined references",
      "Incorrect algorithms or business logic",
      "Off-by-one errors",
      "Race conditions or concurrency issues",
    ],
    closing: "Focus only on logic issues.",
  },
  security: {
    specialty: "application security",
    checklist: [
      "SQL, command or template injection",
      "Cross-site scripting (XSS) and request forgery (CSRF)",
      "Hardcoded secrets, passwords or API keys",
      "Insecure authentication or authorization",
      "Weak or misused cryptography",
      "Path traversal",
      "Sensitive data exposure",
    ],
    closing: "Use \"critical\" for exploitable vulnerabilities. Focus only on security issues.",
  },
  performance: {
    specialty: "performance optimization",
    checklist: [
      "N+1 queries and unnecessary database calls",
      "Inefficient loops or nested iterations",
      "Memory leaks or excessive allocation",
      "Wrong time complexity for the job",
      "Blocking operations in async code",
      "Missing caching and redundant computation",
    ],
    closing: "Focus on significant performance impacts.",
  },
  readability: {
    specialty: "code readability and maintainability",
    checklist: [
      "Unclear variable or function names",
      "Missing documentation where intent is not obvious",
      "Overly long functions with too many responsibilities",
      "Duplicated code",
      "Magic numbers and hardcoded values",
      "Unclear control flow and poor error messages",
    ],
    closing: "Focus on maintainability and developer experience.",
  },
};

export function buildSystemPrompt(focus: LlmFocus, customInstructions?: string): string {
  const def = FOCUS[focus];
  let prompt = `You are an expert code reviewer specializing in ${def.specialty}.
Review the provided code changes and identify:
${def.checklist.map((item) => `- ${item}`).join("\n")}

Report every finding through the submit_findings tool. Reference the new-file
line numbers shown next to added lines. If there are no issues, submit an
empty list.

Be concise and actionable. ${def.closing}`;

  if (customInstructions) {
    prompt += `\n\n## Additional instructions\n${customInstructions}`;
  }
  return prompt;
}

export interface UserPromptInput {
  file: FileDiff;
  changes: string;
  language: string;
  context?: string;
}

export function buildUserPrompt({ file, changes, language, context }: UserPromptInput): string {
  return `Review these code changes:

File: ${displayPath(file)}

Changes:
${changes}

Language: ${language}
Context: ${context || "No additional context"}`;
}

/**
 * Renders the added and removed lines of a file, at most `limit` of them.
 * Additions carry their new-file line number; context lines are left out.
 */
export function renderChanges(file: FileDiff, limit: number): string {
  const lines: string[] = [];
  for (const hunk of file.hunks) {
    for (const change of hunk.changes) {
      if (change.kind === "addition") {
        lines.push(`+ ${change.content} (line ${change.lineNumber})`);
      } else if (change.kind === "deletion") {
        lines.push(`- ${change.content}`);
      }
      if (lines.length >= limit) return lines.join("\n");
    }
  }
  return lines.join("\n");
}
