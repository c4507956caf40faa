/**
 * Session types for conversation history.
 */

import type { ToolCallRequest } from "./tool.js";

export type MessageRole = "user" | "assistant" | "system" | "tool";

/**
 * A message in the session history.
 */
export interface SessionMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
  /** Tool calls requested by the model (assistant messages) */
  toolCalls?: ToolCallRequest[];
  /** Id of the call this message answers (tool messages) */
  toolCallId?: string;
  /** Name of the tool that produced this result (tool messages) */
  toolName?: string;
}

/**
 * A conversation session. Lives for the lifetime of the process.
 */
export interface Session {
  id: string;
  messages: SessionMessage[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A (channel, conversation) pair a session can be bound to.
 */
export interface ChannelBinding {
  channelId: string;
  conversationId: string;
}
