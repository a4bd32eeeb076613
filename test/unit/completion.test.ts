import { describe, it, expect, vi } from "vitest";
import { requestCompletion, type MessagesApi } from "../../src/llm/completion.js";
import { SYSTEM_PROMPT } from "../../src/llm/prompts.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";

const noSleep = { sleep: async () => {} };

function fakeMessages(...replies: Array<Error | Array<{ type: string; text?: string }>>) {
  const create = vi.fn();
  for (const reply of replies) {
    if (reply instanceof Error) create.mockRejectedValueOnce(reply);
    else create.mockResolvedValueOnce({ content: reply });
  }
  const messages: MessagesApi = { create };
  return { messages, create };
}

function statusError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("requestCompletion", () => {
  it("concatenates the text blocks of the reply", async () => {
    const { messages } = fakeMessages([
      { type: "text", text: "SUMMARY:\n" },
      { type: "tool_use" },
      { type: "text", text: "LGTM" },
    ]);

    await expect(requestCompletion("prompt", DEFAULT_CONFIG.llm, { messages })).resolves.toBe("SUMMARY:\nLGTM");
  });

  it("sends the model settings, system prompt and user message", async () => {
    const { messages, create } = fakeMessages([{ type: "text", text: "ok" }]);
    await requestCompletion("Review this", { ...DEFAULT_CONFIG.llm, temperature: 0 }, { messages });

    expect(create).toHaveBeenCalledWith({
      model: "claude-3-7-sonnet-20250219",
      max_tokens: 4000,
      temperature: 0,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: "Review this" }],
    });
  });

  it("retries on overloaded responses", async () => {
    const { messages, create } = fakeMessages(statusError(529), [{ type: "text", text: "done" }]);

    await expect(
      requestCompletion("p", DEFAULT_CONFIG.llm, { messages, retry: noSleep })
    ).resolves.toBe("done");
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const { messages, create } = fakeMessages(statusError(400));

    await expect(
      requestCompletion("p", DEFAULT_CONFIG.llm, { messages, retry: noSleep })
    ).rejects.toThrow("HTTP 400");
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("rejects a reply without text", async () => {
    const { messages } = fakeMessages([{ type: "tool_use" }]);
    await expect(requestCompletion("p", DEFAULT_CONFIG.llm, { messages })).rejects.toThrow(
      "LLM reply contained no text content"
    );
  });
});
