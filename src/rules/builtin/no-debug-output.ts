import { addedLines, excerpt, type Rule, type RuleHit } from "../types.js";

// One pattern per ecosystem; the first match on a line wins.
const DEBUG_PATTERNS: { pattern: RegExp; label: string }[] = [
  { pattern: /\bconsole\.(log|debug|trace)\s*\(/, label: "console output" },
  { pattern: /^\s*debugger\s*;?\s*$/, label: "debugger statement" },
  { pattern: /^\s*print\s*\(/, label: "print() call" },
  { pattern: /\b(pdb|ipdb)\.set_trace\s*\(|^\s*breakpoint\s*\(\s*\)/, label: "debugger breakpoint" },
  { pattern: /\bSystem\.(out|err)\.print(ln)?\s*\(/, label: "System.out output" },
  { pattern: /\bfmt\.Print(ln|f)?\s*\(/, label: "fmt.Print output" },
  { pattern: /\b(var_dump|print_r)\s*\(/, label: "var_dump output" },
  { pattern: /\bbinding\.pry\b/, label: "binding.pry" },
];

export const noDebugOutput: Rule = {
  id: "no-debug-output",
  name: "No Debug Output",
  description: "Flags leftover debug prints and breakpoints in added lines",
  category: "readability",
  defaultSeverity: "info",
  run({ file }) {
    const hits: RuleHit[] = [];

    for (const line of addedLines(file)) {
      const match = DEBUG_PATTERNS.find(({ pattern }) => pattern.test(line.content));
      if (match) {
        hits.push({
          lineNumber: line.lineNumber,
          message: `Leftover ${match.label}: ${excerpt(line.content)}`,
          suggestion: "Remove it or route it through the project's logger.",
        });
      }
    }
    return hits;
  },
};
