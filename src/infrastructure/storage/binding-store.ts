/**
 * Channel conversation <-> session bindings.
 */

import type { IBindingStore } from "../../core/interfaces/storage.js";
import type { ChannelBinding } from "../../core/types/session.js";

function bindingKey(channelId: string, conversationId: string): string {
  return JSON.stringify([channelId, conversationId]);
}

/**
 * Bidirectional map; binding either side again replaces the old pair.
 */
export class BindingStore implements IBindingStore {
  private byConversation: Map<string, string> = new Map();
  private bySession: Map<string, ChannelBinding> = new Map();

  bind(channelId: string, conversationId: string, sessionId: string): void {
    const key = bindingKey(channelId, conversationId);

    const previousSession = this.byConversation.get(key);
    if (previousSession !== undefined) {
      this.bySession.delete(previousSession);
    }

    const previousBinding = this.bySession.get(sessionId);
    if (previousBinding) {
      this.byConversation.delete(bindingKey(previousBinding.channelId, previousBinding.conversationId));
    }

    this.byConversation.set(key, sessionId);
    this.bySession.set(sessionId, { channelId, conversationId });
  }

  getSessionId(channelId: string, conversationId: string): string | undefined {
    return this.byConversation.get(bindingKey(channelId, conversationId));
  }

  getChannelBinding(sessionId: string): ChannelBinding | undefined {
    return this.bySession.get(sessionId);
  }
}
