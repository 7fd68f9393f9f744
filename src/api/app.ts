import { Hono } from "hono";
import type { ReviewOrchestrator } from "../review/orchestrator.js";
import { createChildLogger } from "../utils/logger.js";
import { createReviewRouter } from "./routes.js";

const log = createChildLogger({ module: "http" });

export const VERSION = "0.1.0";

export function createApp(orchestrator: ReviewOrchestrator): Hono {
  const app = new Hono();

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      version: VERSION,
      stages: orchestrator.stageIds,
      timestamp: new Date().toISOString(),
    })
  );

  app.route("/api/v1/review", createReviewRouter(orchestrator));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, "Unhandled request error");
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
