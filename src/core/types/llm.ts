/**
 * LLM-related types.
 */

import type { ToolCallRequest } from "./tool.js";

/**
 * Supported local model servers.
 */
export type BackendId = "ollama" | "lmstudio";

/**
 * LLM response structure.
 */
export interface LLMResponse {
  content: string | null;
  toolCalls: ToolCallRequest[];
  finishReason: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
}
