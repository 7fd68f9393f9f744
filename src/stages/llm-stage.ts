import type { LlmFocus } from "../config-loader/schema.js";
import { buildSystemPrompt, buildUserPrompt, renderChanges } from "../llm/prompts.js";
import type { ReviewModel } from "../llm/model.js";
import { submitFindingsSchema } from "../llm/tools.js";
import type { Comment } from "../review/types.js";
import { displayPath } from "../utils/diff-parser.js";
import { createChildLogger } from "../utils/logger.js";
import type { AnalysisStage, StageContext } from "./types.js";

const log = createChildLogger({ module: "llm-stage" });

export interface LlmStageOptions {
  focus: LlmFocus;
  model: ReviewModel;
  maxChangesPerFile: number;
  customInstructions?: string;
  timeoutMs?: number;
}

/**
 * Asks the model for findings of one focus, file by file. A response that
 * fails validation costs that file's findings only; a model error fails the
 * whole stage.
 */
export class LlmStage implements AnalysisStage {
  readonly id: string;
  readonly name: string;
  readonly timeoutMs?: number;

  private readonly focus: LlmFocus;
  private readonly model: ReviewModel;
  private readonly maxChangesPerFile: number;
  private readonly systemPrompt: string;

  constructor(options: LlmStageOptions) {
    this.focus = options.focus;
    this.model = options.model;
    this.maxChangesPerFile = options.maxChangesPerFile;
    this.timeoutMs = options.timeoutMs;
    this.id = options.focus;
    this.name = `${options.focus} review`;
    this.systemPrompt = buildSystemPrompt(options.focus, options.customInstructions);
  }

  async analyze({ files, language, context, signal }: StageContext): Promise<Comment[]> {
    const comments: Comment[] = [];

    for (const file of files) {
      if (signal.aborted) break;

      const changes = renderChanges(file, this.maxChangesPerFile);
      if (!changes) continue;

      const filePath = displayPath(file);
      const raw = await this.model.submitFindings({
        system: this.systemPrompt,
        prompt: buildUserPrompt({ file, changes, language, context }),
        signal,
      });

      const parsed = submitFindingsSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn(
          { stage: this.id, file: filePath, issues: parsed.error.issues.length },
          "Discarding invalid model response"
        );
        continue;
      }

      for (const finding of parsed.data.findings) {
        comments.push({
          filePath,
          lineNumber: finding.line_number ?? undefined,
          severity: finding.severity,
          category: this.focus,
          message: finding.message,
          suggestion: finding.suggestion ?? undefined,
          sourceStage: this.id,
        });
      }
    }

    log.info({ stage: this.id, findings: comments.length }, "LLM stage complete");
    return comments;
  }
}
