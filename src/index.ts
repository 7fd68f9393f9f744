import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.js";
import { loadReviewConfig } from "./config-loader/loader.js";
import { createApp } from "./api/app.js";
import { GitHubDiffSource } from "./github/pulls.js";
import { createAnthropicClient } from "./llm/client.js";
import { AnthropicReviewModel } from "./llm/model.js";
import { ReviewOrchestrator } from "./review/orchestrator.js";
import { buildStages } from "./stages/registry.js";
import { getLogger } from "./utils/logger.js";

async function main() {
  const env = loadEnv();
  const log = getLogger();
  const config = await loadReviewConfig(env.REVIEW_CONFIG_PATH);

  const client = createAnthropicClient(env);
  const model = client
    ? new AnthropicReviewModel(client, {
        model: config.llm.model,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
      })
    : null;

  const orchestrator = new ReviewOrchestrator({
    stages: buildStages(config, model),
    diffSource: new GitHubDiffSource({
      defaultToken: env.GITHUB_TOKEN,
      timeoutMs: config.timeouts.fetchMs,
    }),
    stageTimeoutMs: config.timeouts.stageMs,
  });

  const app = createApp(orchestrator);

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port, stages: orchestrator.stageIds }, "diffsieve server started");
  });

  const shutdown = () => {
    log.info("Shutting down...");
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  getLogger().fatal({ err }, "Fatal startup error");
  process.exit(1);
});
