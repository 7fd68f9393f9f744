import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { parseReviewConfig, type ReviewConfig, type RuleConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { createChildLogger } from "../utils/logger.js";
import { errorMessage } from "../review/errors.js";

const log = createChildLogger({ module: "config-loader" });

/**
 * Reads the review configuration from a YAML file. A missing file yields
 * the defaults. An unreadable or invalid file throws.
 */
export async function loadReviewConfig(path: string): Promise<ReviewConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      log.debug({ path }, "No review config found, using defaults");
      return DEFAULT_CONFIG;
    }
    throw new Error(`Failed to read review config ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const config = parseReviewConfigText(content, path);
  log.info(
    { path, llmStages: config.stages.llm, rules: config.stages.rules },
    "Loaded review config"
  );
  return config;
}

export function parseReviewConfigText(content: string, source = "<inline>"): ReviewConfig {
  let parsed: ReviewConfig;
  try {
    parsed = parseReviewConfig(yaml.load(content));
  } catch (err) {
    throw new Error(`Invalid review config ${source}: ${errorMessage(err)}`, { cause: err });
  }
  return mergeConfigs(DEFAULT_CONFIG, parsed);
}

export function mergeConfigs(defaults: ReviewConfig, overrides: ReviewConfig): ReviewConfig {
  const rules: Record<string, RuleConfig> = { ...defaults.rules };
  for (const [id, rule] of Object.entries(overrides.rules)) {
    rules[id] = { ...defaults.rules[id], ...rule };
  }

  return {
    stages: { ...defaults.stages, ...overrides.stages },
    rules,
    llm: { ...defaults.llm, ...overrides.llm },
    timeouts: { ...defaults.timeouts, ...overrides.timeouts },
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
