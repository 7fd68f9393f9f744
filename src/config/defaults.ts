import type { ReviewConfig } from "../config-loader/schema.js";

export const DEFAULT_CONFIG: ReviewConfig = {
  stages: {
    rules: true,
    llm: ["logic", "security", "performance", "readability"],
  },
  rules: {
    "no-secrets": { enabled: true, severity: "critical" },
    "no-debug-output": { enabled: true, severity: "info" },
    "no-todo": { enabled: true, severity: "info" },
    "max-file-size": { enabled: true, severity: "warning", maxLines: 500 },
  },
  llm: {
    model: "claude-sonnet-4-20250514",
    temperature: 0,
    maxTokens: 4096,
    maxChangesPerFile: 200,
  },
  timeouts: {
    stageMs: 60_000,
    fetchMs: 30_000,
  },
};
