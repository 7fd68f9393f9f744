import Anthropic from "@anthropic-ai/sdk";
import type { Env } from "../config/env.js";

/** Null when no API key is configured; the caller then runs without LLM stages. */
export function createAnthropicClient(env: Env): Anthropic | null {
  if (!env.ANTHROPIC_API_KEY) return null;
  return new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });
}
