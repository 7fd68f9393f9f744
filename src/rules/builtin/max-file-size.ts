import { addedLines, type Rule } from "../types.js";

const DEFAULT_MAX_LINES = 500;

export const maxFileSize: Rule = {
  id: "max-file-size",
  name: "Max File Size",
  description: "Warns when a file has too many added lines",
  category: "readability",
  defaultSeverity: "warning",
  run({ file, config }) {
    const maxLines = config.maxLines ?? DEFAULT_MAX_LINES;
    const added = addedLines(file);
    if (added.length <= maxLines) return [];

    return [
      {
        lineNumber: added[0].lineNumber,
        message: `This file adds ${added.length} lines (threshold: ${maxLines})`,
        suggestion: "Split the change into smaller, focused files.",
      },
    ];
  },
};
