import type Anthropic from "@anthropic-ai/sdk";
import { SUBMIT_FINDINGS_TOOL, SUBMIT_FINDINGS_TOOL_NAME } from "./tools.js";
import { withRetry, isTransientHttpError } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "review-model" });

export interface FindingsRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

/**
 * Anything that can turn a prompt into a raw `submit_findings` payload.
 * Callers validate the payload; implementations only transport it.
 */
export interface ReviewModel {
  readonly name: string;
  submitFindings(request: FindingsRequest): Promise<unknown>;
}

/** The slice of a Messages API response the model reads. */
interface MessageResponse {
  content: Array<{ type: string; name?: string; input?: unknown }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/** The slice of the Anthropic client the model calls; the SDK client satisfies it. */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): Promise<MessageResponse>;
  };
}

export interface AnthropicModelOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  retry?: { maxAttempts?: number; baseDelayMs?: number };
}

export class AnthropicReviewModel implements ReviewModel {
  constructor(
    private readonly client: MessagesClient,
    private readonly options: AnthropicModelOptions
  ) {}

  get name(): string {
    return this.options.model;
  }

  async submitFindings({ system, prompt, signal }: FindingsRequest): Promise<unknown> {
    const response = await withRetry(
      () =>
        this.client.messages.create(
          {
            model: this.options.model,
            max_tokens: this.options.maxTokens,
            temperature: this.options.temperature,
            system,
            messages: [{ role: "user", content: prompt }],
            tools: [SUBMIT_FINDINGS_TOOL],
            tool_choice: { type: "tool", name: SUBMIT_FINDINGS_TOOL_NAME },
          },
          { signal }
        ),
      {
        maxAttempts: this.options.retry?.maxAttempts ?? 2,
        baseDelayMs: this.options.retry?.baseDelayMs,
        retryOn: isTransientHttpError,
        signal,
      }
    );

    const block = response.content.find(
      (b) => b.type === "tool_use" && b.name === SUBMIT_FINDINGS_TOOL_NAME
    );

    if (!block) {
      log.warn(
        { stopReason: response.stop_reason, model: this.options.model },
        "Model returned no submit_findings call"
      );
      return { findings: [] };
    }

    log.debug(
      { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
      "Model call complete"
    );
    return block.input;
  }
}
