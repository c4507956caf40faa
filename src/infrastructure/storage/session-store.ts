/**
 * In-memory session store.
 */

import { randomUUID } from "crypto";
import type { ISessionStore } from "../../core/interfaces/storage.js";
import type { MessageRole, Session, SessionMessage } from "../../core/types/session.js";
import type { ToolCallRequest } from "../../core/types/tool.js";
import { SessionError } from "../../core/errors.js";

/**
 * Keeps conversation sessions for the lifetime of the process.
 */
export class SessionStore implements ISessionStore {
  private sessions: Map<string, Session> = new Map();

  create(): Session {
    return this.getOrCreate(`sess-${randomUUID()}`);
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  getOrCreate(id: string): Session {
    const existing = this.sessions.get(id);
    if (existing) {
      return existing;
    }

    const now = new Date();
    const session: Session = { id, messages: [], createdAt: now, updatedAt: now };
    this.sessions.set(id, session);
    return session;
  }

  append(id: string, message: SessionMessage): void {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionError(`session not found: ${id}`);
    }
    session.messages.push(message);
    session.updatedAt = new Date();
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Build a session message stamped with the current time.
 */
export function createMessage(
  role: MessageRole,
  content: string,
  extra: { toolCalls?: ToolCallRequest[]; toolCallId?: string; toolName?: string } = {},
): SessionMessage {
  const message: SessionMessage = { role, content, timestamp: new Date().toISOString() };
  if (extra.toolCalls && extra.toolCalls.length > 0) {
    message.toolCalls = extra.toolCalls;
  }
  if (extra.toolCallId !== undefined) {
    message.toolCallId = extra.toolCallId;
  }
  if (extra.toolName !== undefined) {
    message.toolName = extra.toolName;
  }
  return message;
}
