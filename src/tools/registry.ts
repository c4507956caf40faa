/**
 * Tool registry for dynamic tool management.
 */

import type { CoreTool } from "ai";
import { isRecord, type Tool } from "./base.js";
import type { IToolExecutor } from "../core/types/tool.js";
import { ToolExecutionError, errorMessage } from "../core/errors.js";
import logger from "../utils/logger.js";

/**
 * Accept tool arguments as an object or a JSON string encoding one.
 */
export function normalizeArguments(params: unknown): Record<string, unknown> {
  let value = params;
  if (typeof value === "string") {
    try {
      value = value.trim() === "" ? {} : JSON.parse(value);
    } catch {
      throw new ToolExecutionError("arguments must be an object");
    }
  }
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ToolExecutionError("arguments must be an object");
  }
  return value;
}

/**
 * Registry for agent tools.
 *
 * Allows dynamic registration and execution of tools.
 */
export class ToolRegistry implements IToolExecutor {
  private tools: Map<string, Tool> = new Map();

  /**
   * Register a tool. A tool with the same name is replaced.
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, "Tool registered twice, keeping the later one");
    }
    this.tools.set(tool.name, tool);
  }

  /**
   * Unregister a tool by name.
   */
  unregister(name: string): void {
    this.tools.delete(name);
  }

  /**
   * Get a tool by name.
   */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Check if a tool is registered.
   */
  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get all tool definitions as CoreTool record for AI SDK.
   */
  getDefinitions(): Record<string, CoreTool> {
    const definitions: Record<string, CoreTool> = {};
    for (const [name, tool] of this.tools) {
      definitions[name] = tool.toCoreTool();
    }
    return definitions;
  }

  /**
   * Execute a tool by name. Failures are returned as `error: <message>`
   * so they can be fed back to the model.
   */
  async execute(name: string, params: unknown): Promise<string> {
    try {
      const tool = this.tools.get(name);
      if (!tool) {
        throw new ToolExecutionError(`unknown tool: ${name}`);
      }
      return await tool.execute(normalizeArguments(params));
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ tool: name, error: message }, "Tool execution failed");
      return `error: ${message}`;
    }
  }

  /**
   * Get list of registered tool names.
   */
  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Get number of registered tools.
   */
  get size(): number {
    return this.tools.size;
  }
}
