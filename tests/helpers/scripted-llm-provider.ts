import type { CoreMessage, CoreTool } from "ai";
import type { ILLMProvider } from "../../src/core/interfaces/llm-provider.js";
import type { BackendId, LLMResponse } from "../../src/core/types/llm.js";
import type { ToolCallRequest } from "../../src/core/types/tool.js";

export interface ScriptedResponse {
  content: string | null;
  toolCalls?: ToolCallRequest[];
}

export interface CapturedCall {
  messages: CoreMessage[];
  tools?: Record<string, CoreTool>;
  model?: string;
}

export class ScriptedLLMProvider implements ILLMProvider {
  readonly capturedCalls: CapturedCall[] = [];
  models: string[] = ["scripted-model"];
  private callIndex = 0;

  constructor(
    private responses: ScriptedResponse[],
    readonly backend: BackendId = "ollama",
  ) {}

  async chat(messages: CoreMessage[], tools?: Record<string, CoreTool>, model?: string): Promise<LLMResponse> {
    this.capturedCalls.push({ messages, tools, model });

    const scripted = this.responses[this.callIndex++];
    if (!scripted) {
      throw new Error(`ScriptedLLMProvider: no more responses (called ${this.callIndex} times)`);
    }

    const toolCalls = scripted.toolCalls ?? [];
    return {
      content: scripted.content,
      toolCalls,
      finishReason: toolCalls.length > 0 ? "tool-calls" : "stop",
      usage: { promptTokens: 10, completionTokens: 10 },
    };
  }

  async listModels(): Promise<string[]> {
    return this.models;
  }

  get callCount(): number {
    return this.capturedCalls.length;
  }

  // --- Factory methods ---

  static fromStrings(strings: string[]): ScriptedLLMProvider {
    return new ScriptedLLMProvider(strings.map((content) => ({ content })));
  }

  static withToolCalls(calls: ToolCallRequest[], finalContent: string): ScriptedLLMProvider {
    return new ScriptedLLMProvider([{ content: null, toolCalls: calls }, { content: finalContent }]);
  }

  /**
   * A provider whose every call fails.
   */
  static withError(error: Error): ScriptedLLMProvider {
    const provider = new ScriptedLLMProvider([]);
    provider.chat = async (messages, tools, model) => {
      provider.capturedCalls.push({ messages, tools, model });
      throw error;
    };
    return provider;
  }
}
