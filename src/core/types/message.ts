/**
 * Message types for channel-gateway communication.
 */

/**
 * Message received from a chat channel.
 */
export interface InboundMessage {
  /** Channel identifier (telegram, ...) */
  channelId: string;
  /** Conversation within the channel (e.g. Telegram chat id) */
  conversationId: string;
  /** User identifier */
  senderId: string;
  /** Message text */
  text: string;
  timestamp: Date;
  /** Channel-specific metadata */
  metadata: Record<string, unknown>;
}
