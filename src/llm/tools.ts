import { z } from "zod";
import type Anthropic from "@anthropic-ai/sdk";

export const SUBMIT_FINDINGS_TOOL_NAME = "submit_findings";

export const SUBMIT_FINDINGS_TOOL: Anthropic.Tool = {
  name: SUBMIT_FINDINGS_TOOL_NAME,
  description:
    "Submit the review findings for the file under review. Call exactly once; pass an empty list when nothing needs attention.",
  input_schema: {
    type: "object" as const,
    properties: {
      findings: {
        type: "array",
        items: {
          type: "object",
          properties: {
            line_number: {
              type: "integer",
              description: "New-file line number the finding refers to, if any",
            },
            severity: {
              type: "string",
              enum: ["critical", "error", "warning", "info"],
            },
            message: {
              type: "string",
              description: "Clear description of the issue",
            },
            suggestion: {
              type: "string",
              description: "How to fix it",
            },
          },
          required: ["severity", "message"],
        },
      },
    },
    required: ["findings"],
  },
};

const findingSchema = z.object({
  line_number: z.number().int().positive().nullish(),
  severity: z.enum(["critical", "error", "warning", "info"]).catch("warning"),
  message: z.string().trim().min(1),
  suggestion: z.string().nullish(),
});

export const submitFindingsSchema = z.object({
  findings: z.array(findingSchema),
});
