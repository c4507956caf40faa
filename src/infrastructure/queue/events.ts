/**
 * Event factory functions for the message bus.
 */

import type { InboundMessage } from "../../core/types/message.js";

/**
 * Create an inbound message with defaults.
 */
export function createInboundMessage(
  partial: Partial<InboundMessage> & Pick<InboundMessage, "channelId" | "conversationId" | "senderId" | "text">
): InboundMessage {
  return {
    timestamp: new Date(),
    metadata: {},
    ...partial,
  };
}
