/**
 * Agent loop: runs one turn of a session against a model server.
 */

import type { ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { ISessionStore } from "../core/interfaces/storage.js";
import type { BackendId } from "../core/types/llm.js";
import type { ToolCallRequest } from "../core/types/tool.js";
import { BackendError } from "../core/errors.js";
import { defaultModelFor, normalizeBackend, parseBackend, type AgentsConfig } from "../infrastructure/config/schema.js";
import { createMessage } from "../infrastructure/storage/session-store.js";
import { ToolRegistry } from "../tools/registry.js";
import { buildMessages } from "./context-builder.js";
import { SessionLock } from "./session-lock.js";
import logger from "../utils/logger.js";

/**
 * Upper bound on model calls that return tool calls within one turn.
 */
export const MAX_TOOL_ITERATIONS = 5;

export interface TurnRequest {
  /** Existing session; a new one is created when absent or unknown */
  sessionId?: string;
  message: string;
  /** Backend override ("ollama" | "lmstudio") */
  backend?: string;
  /** Model override */
  model?: string;
}

export interface TurnResult {
  sessionId: string;
  /** Text of the last model response; empty when it only requested tools */
  content: string;
  /** Tool calls of the last model response */
  toolCalls: ToolCallRequest[];
}

export interface AgentLoopOptions {
  sessions: ISessionStore;
  providers: Partial<Record<BackendId, ILLMProvider>>;
  tools: ToolRegistry;
  agents: AgentsConfig;
  /** System context for each turn */
  systemContext: () => string;
  maxIterations?: number;
}

/**
 * The agent loop is the core processing engine.
 *
 * It:
 * 1. Appends the user message to the session
 * 2. Builds context with the system prompt and history
 * 3. Calls the LLM
 * 4. Executes tool calls and feeds the results back, up to a bound
 * 5. Returns the final response
 */
export class AgentLoop {
  private sessions: ISessionStore;
  private providers: Partial<Record<BackendId, ILLMProvider>>;
  private tools: ToolRegistry;
  private agents: AgentsConfig;
  private systemContext: () => string;
  private maxIterations: number;
  private lock = new SessionLock();

  constructor(options: AgentLoopOptions) {
    this.sessions = options.sessions;
    this.providers = options.providers;
    this.tools = options.tools;
    this.agents = options.agents;
    this.systemContext = options.systemContext;
    this.maxIterations = options.maxIterations ?? MAX_TOOL_ITERATIONS;
  }

  /**
   * Backend for a request: a valid override, else the configured default.
   */
  resolveBackend(requested?: string): BackendId {
    return parseBackend(requested) ?? normalizeBackend(this.agents.defaultBackend);
  }

  /**
   * Model for a request: override, then agents.defaultModel, then the backend's fallback.
   */
  resolveModel(backend: BackendId, requested?: string): string {
    const model = (requested ?? this.agents.defaultModel)?.trim();
    if (!model) {
      if (requested !== undefined) {
        logger.warn({ backend }, "Requested model was empty, using fallback");
      }
      return defaultModelFor(backend);
    }
    return model;
  }

  /**
   * Run one turn. Turns of the same session are serialized.
   */
  async handle(request: TurnRequest): Promise<TurnResult> {
    const session =
      request.sessionId !== undefined && request.sessionId !== ""
        ? this.sessions.getOrCreate(request.sessionId)
        : this.sessions.create();

    return this.lock.runExclusive(session.id, () => this.runTurn(session.id, request));
  }

  private async runTurn(sessionId: string, request: TurnRequest): Promise<TurnResult> {
    const backend = this.resolveBackend(request.backend);
    const provider = this.providers[backend];
    if (!provider) {
      throw new BackendError(`backend not available: ${backend}`);
    }

    const model = this.resolveModel(backend, request.model);

    this.sessions.append(sessionId, createMessage("user", request.message));

    const systemContext = this.systemContext();
    const tools = this.tools.size > 0 ? this.tools.getDefinitions() : undefined;
    logger.info({ sessionId, backend, model }, "Running turn");

    let iterations = 0;
    let lastContent = "";
    let lastToolCalls: ToolCallRequest[] = [];

    for (;;) {
      const history = this.sessions.get(sessionId)?.messages ?? [];
      const response = await provider.chat(buildMessages(systemContext, history), tools, model);

      lastContent = response.content ?? "";
      lastToolCalls = response.toolCalls;
      this.sessions.append(sessionId, createMessage("assistant", lastContent, { toolCalls: lastToolCalls }));

      if (lastToolCalls.length === 0) {
        break;
      }

      iterations++;
      if (iterations >= this.maxIterations) {
        logger.debug({ sessionId, iterations }, "Max tool iterations reached");
        break;
      }

      if (this.tools.size === 0) {
        logger.debug({ sessionId }, "Tool calls returned but no tools are registered");
        break;
      }

      for (const call of lastToolCalls) {
        logger.debug({ sessionId, tool: call.name }, "Executing tool");
        const result = await this.tools.execute(call.name, call.arguments);
        this.sessions.append(
          sessionId,
          createMessage("tool", result, { toolCallId: call.id, toolName: call.name }),
        );
      }
    }

    return { sessionId, content: lastContent, toolCalls: lastToolCalls };
  }
}
