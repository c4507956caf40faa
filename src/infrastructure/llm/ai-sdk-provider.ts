/**
 * LLM provider over OpenAI-compatible endpoints using the Vercel AI SDK.
 */

import { randomUUID } from "crypto";
import {
  InvalidToolArgumentsError,
  NoSuchToolError,
  generateText,
  type CoreMessage,
  type CoreTool,
} from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import type { ILLMProvider } from "../../core/interfaces/llm-provider.js";
import type { BackendId, LLMResponse } from "../../core/types/llm.js";
import type { ToolCallRequest } from "../../core/types/tool.js";
import { BackendError, errorMessage } from "../../core/errors.js";
import { isRecord } from "../../tools/base.js";
import logger from "../../utils/logger.js";

export interface AIProviderOptions {
  backend: BackendId;
  /** OpenAI-compatible base URL (ending in /v1) */
  baseURL: string;
  defaultModel: string;
  /** Lists models the server offers */
  listModels: () => Promise<string[]>;
}

/**
 * Talks to Ollama and LM Studio through their OpenAI-compatible chat
 * completions endpoints. Tools are offered without execute functions, so
 * a single generateText call returns tool calls for the agent loop to run.
 */
export class AIProvider implements ILLMProvider {
  readonly backend: BackendId;
  private defaultModel: string;
  private openai: ReturnType<typeof createOpenAI>;
  private modelLister: () => Promise<string[]>;

  constructor(options: AIProviderOptions) {
    this.backend = options.backend;
    this.defaultModel = options.defaultModel;
    this.modelLister = options.listModels;
    this.openai = createOpenAI({
      name: options.backend,
      baseURL: options.baseURL,
      // Local servers ignore the key; the SDK requires one.
      apiKey: "local",
      compatibility: "compatible",
    });
  }

  async chat(
    messages: CoreMessage[],
    tools?: Record<string, CoreTool>,
    model?: string,
    maxTokens?: number,
    temperature?: number,
  ): Promise<LLMResponse> {
    const modelId = model || this.defaultModel;
    const hasTools = tools !== undefined && Object.keys(tools).length > 0;

    try {
      const result = await generateText({
        model: this.openai.chat(modelId),
        messages,
        tools: hasTools ? tools : undefined,
        maxTokens,
        temperature,
      });

      const toolCalls: ToolCallRequest[] = result.toolCalls.map((call) => ({
        id: call.toolCallId,
        name: call.toolName,
        arguments: isRecord(call.args) ? call.args : {},
      }));

      return {
        content: result.text || null,
        toolCalls,
        finishReason: result.finishReason,
        usage: {
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
        },
      };
    } catch (error) {
      const rejected = rejectedToolCall(error);
      if (rejected) {
        // Handed to the tool registry, which answers with an error result the model can correct.
        logger.warn({ backend: this.backend, model: modelId, tool: rejected.name }, "Model sent an unusable tool call");
        return {
          content: null,
          toolCalls: [rejected],
          finishReason: "tool-calls",
          usage: { promptTokens: 0, completionTokens: 0 },
        };
      }
      logger.error({ backend: this.backend, model: modelId, error: errorMessage(error) }, "LLM request failed");
      throw new BackendError(`${this.backend} request failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  listModels(): Promise<string[]> {
    return this.modelLister();
  }
}

/**
 * Tool call the SDK refused to parse: an unknown tool name, or arguments
 * that are not valid JSON.
 */
function rejectedToolCall(error: unknown): ToolCallRequest | undefined {
  if (NoSuchToolError.isInstance(error)) {
    return { id: `call_${randomUUID()}`, name: error.toolName, arguments: {} };
  }
  if (InvalidToolArgumentsError.isInstance(error)) {
    return { id: `call_${randomUUID()}`, name: error.toolName, arguments: error.toolArgs };
  }
  return undefined;
}
