import type { FileDiff } from "../utils/diff-parser.js";
import { displayPath } from "../utils/diff-parser.js";
import type { RuleConfig } from "../config-loader/schema.js";
import type { Comment } from "../review/types.js";
import type { Rule } from "./types.js";
import { noSecrets } from "./builtin/no-secrets.js";
import { noDebugOutput } from "./builtin/no-debug-output.js";
import { noTodo } from "./builtin/no-todo.js";
import { maxFileSize } from "./builtin/max-file-size.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "rule-engine" });

export const BUILTIN_RULES: readonly Rule[] = [noSecrets, noDebugOutput, noTodo, maxFileSize];

export interface RunRulesOptions {
  rules?: readonly Rule[];
  config: Record<string, RuleConfig>;
  /** Stage id stamped on every comment */
  sourceStage: string;
}

export function runRules(
  files: readonly FileDiff[],
  { rules = BUILTIN_RULES, config, sourceStage }: RunRulesOptions
): { comments: Comment[]; rulesRun: number } {
  const comments: Comment[] = [];
  let rulesRun = 0;

  const enabledRules = rules.filter((rule) => config[rule.id]?.enabled !== false);

  for (const file of files) {
    const filePath = displayPath(file);
    for (const rule of enabledRules) {
      const ruleConfig = config[rule.id] ?? { enabled: true };
      try {
        for (const hit of rule.run({ file, config: ruleConfig })) {
          comments.push({
            filePath,
            lineNumber: hit.lineNumber,
            severity: ruleConfig.severity ?? rule.defaultSeverity,
            category: rule.category,
            message: hit.message,
            suggestion: hit.suggestion,
            sourceStage,
          });
        }
        rulesRun++;
      } catch (err) {
        log.warn({ err, rule: rule.id, file: filePath }, "Rule execution failed");
      }
    }
  }

  log.info(
    { rulesRun, findings: comments.length, files: files.length },
    "Rule engine complete"
  );
  return { comments, rulesRun };
}
