/**
 * LM Studio native REST API provider (/api/v1/chat).
 */

import { z } from "zod";
import type { CoreMessage, CoreTool } from "ai";
import type { ILLMProvider } from "../../core/interfaces/llm-provider.js";
import type { LLMResponse } from "../../core/types/llm.js";
import { BackendError } from "../../core/errors.js";
import { messageText } from "./messages.js";
import { fetchJson, listLmStudioNativeModels, lmStudioServerRoot } from "./model-discovery.js";
import logger from "../../utils/logger.js";

const NativeChatResponseSchema = z.object({
  output: z
    .array(
      z
        .object({
          type: z.string().nullish(),
          content: z.string().nullish(),
        })
        .passthrough(),
    )
    .nullish(),
});

interface NativeInputItem {
  type: "message";
  content: string;
}

/**
 * Split messages into the native API's system prompt and input items.
 * Only the first system message is kept; tool results are marked as such.
 */
export function toNativeInput(messages: CoreMessage[]): { systemPrompt: string; input: NativeInputItem[] } {
  let systemPrompt: string | undefined;
  const input: NativeInputItem[] = [];

  for (const message of messages) {
    if (message.role === "system") {
      systemPrompt ??= message.content;
      continue;
    }

    const text = messageText(message);
    const content = message.role === "tool" ? `[Tool result] ${text}` : text;
    if (content !== "" || input.length === 0) {
      input.push({ type: "message", content });
    }
  }

  return { systemPrompt: systemPrompt ?? "", input };
}

/**
 * The native API takes no custom tools; replies carry text only.
 */
export class LmStudioNativeProvider implements ILLMProvider {
  readonly backend = "lmstudio" as const;
  private root: string;
  private defaultModel: string;

  constructor(options: { baseUrl: string; defaultModel: string }) {
    this.root = lmStudioServerRoot(options.baseUrl);
    this.defaultModel = options.defaultModel;
  }

  async chat(
    messages: CoreMessage[],
    tools?: Record<string, CoreTool>,
    model?: string,
  ): Promise<LLMResponse> {
    if (tools && Object.keys(tools).length > 0) {
      logger.debug("LM Studio native API does not take tools; sending messages only");
    }

    const { systemPrompt, input } = toNativeInput(messages);
    const url = `${this.root}/api/v1/chat`;
    const data = await fetchJson(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: model || this.defaultModel,
        input,
        system_prompt: systemPrompt,
        stream: false,
      }),
    });

    const parsed = NativeChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError(`unexpected response from ${url}`);
    }

    const content = (parsed.data.output ?? [])
      .filter((item) => item.type === "message")
      .map((item) => item.content ?? "")
      .join("");

    return {
      content: content || null,
      toolCalls: [],
      finishReason: "stop",
      usage: { promptTokens: 0, completionTokens: 0 },
    };
  }

  listModels(): Promise<string[]> {
    return listLmStudioNativeModels(this.root);
  }
}
