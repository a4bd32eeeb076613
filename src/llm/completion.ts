import type Anthropic from "@anthropic-ai/sdk";
import { getAnthropicClient } from "./client.js";
import { SYSTEM_PROMPT } from "./prompts.js";
import type { LLMConfig } from "../config-loader/schema.js";
import { getErrorStatus } from "../utils/errors.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "llm-completion" });

const RETRYABLE_STATUS = new Set([429, 500, 529]);

/** The slice of the Messages API this service uses. `Anthropic["messages"]` satisfies it. */
export interface MessagesApi {
  create(
    params: Anthropic.MessageCreateParamsNonStreaming
  ): Promise<{ content: ReadonlyArray<{ type: string; text?: string }> }>;
}

export interface CompletionOptions {
  messages?: MessagesApi;
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "sleep">;
}

/**
 * Sends one prompt and returns the reply's text blocks concatenated in order.
 * Tool-use and other non-text blocks are ignored.
 */
export async function requestCompletion(
  prompt: string,
  config: LLMConfig,
  opts: CompletionOptions = {}
): Promise<string> {
  const messages: MessagesApi = opts.messages ?? getAnthropicClient().messages;

  const response = await withRetry(
    () =>
      messages.create({
        model: config.model,
        max_tokens: config.maxTokens,
        temperature: config.temperature,
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
      }),
    {
      maxAttempts: 2,
      ...opts.retry,
      retryOn: (err) => RETRYABLE_STATUS.has(getErrorStatus(err) ?? 0),
    }
  );

  let text = "";
  for (const block of response.content) {
    if (block.type === "text" && typeof block.text === "string") text += block.text;
  }

  if (!text) {
    throw new Error("LLM reply contained no text content");
  }

  log.debug({ model: config.model, chars: text.length }, "Received completion");
  return text;
}
