/**
 * Tool types and interfaces.
 */

import type { jsonSchema } from "ai";

/**
 * Tool call request from the LLM.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  /** Parsed arguments object, or the raw text when the model sent invalid JSON */
  arguments: unknown;
}

/**
 * JSON Schema (draft 7) of a tool's parameters object.
 */
export type ToolParametersSchema = Parameters<typeof jsonSchema>[0];

/**
 * Tool definition interface.
 */
export interface ITool {
  /** Tool name used in function calls */
  readonly name: string;
  /** Description of what the tool does */
  readonly description: string;
  /** JSON schema for tool parameters */
  readonly parameters: ToolParametersSchema;
  /** Execute the tool; throws ToolExecutionError on failure */
  execute(params: Record<string, unknown>): Promise<string>;
}

/**
 * Something that can run a tool call by name.
 */
export interface IToolExecutor {
  execute(name: string, params: unknown): Promise<string>;
}
