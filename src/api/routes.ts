import { Hono, type Context } from "hono";
import { z } from "zod";
import { runReview, type ReviewOrchestrator } from "../review/orchestrator.js";
import { classifyInput } from "../utils/input-classifier.js";
import { createChildLogger } from "../utils/logger.js";
import { infoResponse, toWireResponse } from "./wire.js";

const log = createChildLogger({ module: "review-routes" });

const githubRequestSchema = z.object({
  pr_url: z.string(),
  github_token: z.string().min(1).optional(),
});

const diffRequestSchema = z.object({
  diff: z.string().min(1, "diff must not be empty"),
  language: z.string().min(1).optional(),
  context: z.string().optional(),
});

const CATEGORY_DESCRIPTIONS = [
  { name: "logic", description: "Logical errors, edge cases, and correctness issues" },
  { name: "security", description: "Security vulnerabilities and risks" },
  { name: "performance", description: "Performance issues and optimization opportunities" },
  { name: "readability", description: "Code readability, style, and maintainability" },
];

const SEVERITY_DESCRIPTIONS = [
  { level: "critical", description: "Critical issues that must be fixed immediately" },
  { level: "error", description: "Errors that should be fixed before merging" },
  { level: "warning", description: "Warnings that should be reviewed" },
  { level: "info", description: "Informational suggestions for improvement" },
];

export function createReviewRouter(orchestrator: ReviewOrchestrator): Hono {
  const app = new Hono();

  app.post("/github", async (c) => {
    const body = await readBody(c, githubRequestSchema);
    if (!body.success) return c.json({ error: body.error }, 400);

    const { pr_url, github_token } = body.data;
    log.info({ prUrl: pr_url, tokenProvided: Boolean(github_token) }, "GitHub review requested");

    const input = classifyInput(pr_url);
    if (input.kind !== "valid_pr_url") {
      return c.json(infoResponse(input.message));
    }

    const response = await runReview(orchestrator, {
      reference: input.url,
      token: github_token,
    });
    return c.json(toWireResponse(response), response.status === "error" ? 400 : 200);
  });

  app.post("/diff", async (c) => {
    const body = await readBody(c, diffRequestSchema);
    if (!body.success) return c.json({ error: body.error }, 400);

    const { diff, language, context } = body.data;
    log.info({ language: language ?? "auto", bytes: diff.length }, "Diff review requested");

    const response = await runReview(orchestrator, { diff, language, context });
    return c.json(toWireResponse(response), response.status === "error" ? 400 : 200);
  });

  app.get("/categories", (c) => c.json({ categories: CATEGORY_DESCRIPTIONS }));
  app.get("/severities", (c) => c.json({ severities: SEVERITY_DESCRIPTIONS }));

  return app;
}

type BodyResult<T> = { success: true; data: T } | { success: false; error: string };

async function readBody<T>(c: Context, schema: z.ZodType<T>): Promise<BodyResult<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { success: false, error: "Request body must be valid JSON" };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: result.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
    };
  }
  return { success: true, data: result.data };
}
