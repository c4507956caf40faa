/**
 * LLM Provider interface.
 */

import type { CoreMessage, CoreTool } from "ai";
import type { BackendId, LLMResponse } from "../types/llm.js";

/**
 * Interface for LLM providers.
 */
export interface ILLMProvider {
  /**
   * Which model server this provider talks to.
   */
  readonly backend: BackendId;

  /**
   * Send a chat completion request.
   */
  chat(
    messages: CoreMessage[],
    tools?: Record<string, CoreTool>,
    model?: string,
    maxTokens?: number,
    temperature?: number,
  ): Promise<LLMResponse>;

  /**
   * List the models the server currently offers.
   */
  listModels(): Promise<string[]>;
}
