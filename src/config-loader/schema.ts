import { z } from "zod";

const severity = z.enum(["critical", "error", "warning", "info"]);

const ruleConfigSchema = z.object({
  enabled: z.boolean().default(true),
  severity: severity.optional(),
  maxLines: z.number().int().positive().optional(),
});

export type RuleConfig = z.infer<typeof ruleConfigSchema>;

export const LLM_FOCUSES = ["logic", "security", "performance", "readability"] as const;
export type LlmFocus = (typeof LLM_FOCUSES)[number];

const reviewConfigSchema = z.object({
  stages: z
    .object({
      rules: z.boolean().default(true),
      llm: z.array(z.enum(LLM_FOCUSES)).default([...LLM_FOCUSES]),
    })
    .default({}),
  rules: z.record(z.string(), ruleConfigSchema).default({}),
  llm: z
    .object({
      model: z.string().default("claude-sonnet-4-20250514"),
      temperature: z.number().min(0).max(1).default(0),
      maxTokens: z.number().int().positive().default(4096),
      maxChangesPerFile: z.number().int().positive().default(200),
      customInstructions: z.string().optional(),
    })
    .default({}),
  timeouts: z
    .object({
      stageMs: z.number().int().positive().default(60_000),
      fetchMs: z.number().int().positive().default(30_000),
    })
    .default({}),
});

export type ReviewConfig = z.infer<typeof reviewConfigSchema>;

export function parseReviewConfig(raw: unknown): ReviewConfig {
  return reviewConfigSchema.parse(raw ?? {});
}
