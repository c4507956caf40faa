/**
 * Base class for agent tools.
 */

import { jsonSchema, type CoreTool } from "ai";
import type { ITool, ToolParametersSchema } from "../core/types/tool.js";

/**
 * Abstract base class for agent tools.
 *
 * Tools are capabilities the model can call during a turn. Parameters are
 * described with JSON Schema so that descriptors loaded from disk and
 * built-in tools share one shape.
 */
export abstract class Tool implements ITool {
  /**
   * Tool name used in function calls.
   */
  abstract readonly name: string;

  /**
   * Description of what the tool does.
   */
  abstract readonly description: string;

  /**
   * JSON schema for tool parameters.
   */
  abstract readonly parameters: ToolParametersSchema;

  /**
   * Execute the tool with given parameters.
   */
  abstract execute(params: Record<string, unknown>): Promise<string>;

  /**
   * Convert tool to Vercel AI SDK CoreTool format.
   *
   * No execute function is attached: the agent loop runs tool calls itself
   * so it can bound the iterations and record every result in the session.
   */
  toCoreTool(): CoreTool {
    return {
      description: this.description,
      parameters: jsonSchema(this.parameters),
    };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
