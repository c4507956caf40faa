/**
 * Storage interfaces.
 */

import type { ChannelBinding, Session, SessionMessage } from "../types/session.js";

/**
 * Interface for session storage.
 */
export interface ISessionStore {
  /**
   * Create a session with a generated id.
   */
  create(): Session;

  /**
   * Get a session by id.
   */
  get(id: string): Session | undefined;

  /**
   * Get an existing session or create one with the given id.
   */
  getOrCreate(id: string): Session;

  /**
   * Append a message to a session.
   */
  append(id: string, message: SessionMessage): void;

  /**
   * Delete a session.
   */
  remove(id: string): boolean;

  /**
   * Number of live sessions.
   */
  readonly size: number;
}

/**
 * Interface for the channel conversation to session mapping.
 */
export interface IBindingStore {
  bind(channelId: string, conversationId: string, sessionId: string): void;
  getSessionId(channelId: string, conversationId: string): string | undefined;
  getChannelBinding(sessionId: string): ChannelBinding | undefined;
}
