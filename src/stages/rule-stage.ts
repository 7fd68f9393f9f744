import type { RuleConfig } from "../config-loader/schema.js";
import type { Comment } from "../review/types.js";
import { runRules, BUILTIN_RULES } from "../rules/engine.js";
import type { Rule } from "../rules/types.js";
import type { AnalysisStage, StageContext } from "./types.js";

export const RULE_STAGE_ID = "rules";

/** Deterministic pattern checks over added lines. Needs no model. */
export class RuleStage implements AnalysisStage {
  readonly id = RULE_STAGE_ID;
  readonly name = "Rule checks";

  constructor(
    private readonly config: Record<string, RuleConfig>,
    private readonly rules: readonly Rule[] = BUILTIN_RULES
  ) {}

  async analyze({ files }: StageContext): Promise<Comment[]> {
    return runRules(files, {
      rules: this.rules,
      config: this.config,
      sourceStage: this.id,
    }).comments;
  }
}
