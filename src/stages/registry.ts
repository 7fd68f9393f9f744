import type { ReviewConfig } from "../config-loader/schema.js";
import type { ReviewModel } from "../llm/model.js";
import { createChildLogger } from "../utils/logger.js";
import { LlmStage } from "./llm-stage.js";
import { RuleStage } from "./rule-stage.js";
import type { AnalysisStage } from "./types.js";

const log = createChildLogger({ module: "stage-registry" });

/**
 * Builds the enabled stages from configuration. LLM stages are only
 * registered when a model is available.
 */
export function buildStages(config: ReviewConfig, model: ReviewModel | null): AnalysisStage[] {
  const stages: AnalysisStage[] = [];

  if (config.stages.rules) {
    stages.push(new RuleStage(config.rules));
  }

  if (model) {
    for (const focus of new Set(config.stages.llm)) {
      stages.push(
        new LlmStage({
          focus,
          model,
          maxChangesPerFile: config.llm.maxChangesPerFile,
          customInstructions: config.llm.customInstructions,
        })
      );
    }
  } else if (config.stages.llm.length > 0) {
    log.warn("No model configured, LLM stages disabled");
  }

  log.info({ stages: stages.map((s) => s.id) }, "Stages registered");
  return stages;
}
