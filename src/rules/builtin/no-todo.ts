import { addedLines, excerpt, type Rule, type RuleHit } from "../types.js";

const TODO_PATTERN = /\b(TODO|FIXME|HACK|XXX)\b/;

export const noTodo: Rule = {
  id: "no-todo",
  name: "No TODO",
  description: "Flags TODO/FIXME/HACK comments in added lines",
  category: "readability",
  defaultSeverity: "info",
  run({ file }) {
    const hits: RuleHit[] = [];

    for (const line of addedLines(file)) {
      const match = line.content.match(TODO_PATTERN);
      if (match) {
        hits.push({
          lineNumber: line.lineNumber,
          message: `${match[1]} comment added: ${excerpt(line.content)}`,
          suggestion: "Track this in an issue instead of leaving it in code.",
        });
      }
    }
    return hits;
  },
};
