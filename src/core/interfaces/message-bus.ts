/**
 * Message bus interface.
 */

import type { InboundMessage } from "../types/message.js";

/**
 * Interface for message bus.
 */
export interface IMessageBus {
  /**
   * Publish a message from a channel to the gateway.
   */
  publishInbound(msg: InboundMessage): Promise<void>;

  /**
   * Consume the next inbound message with timeout.
   */
  consumeInboundWithTimeout(timeoutMs: number): Promise<InboundMessage | null>;

  /**
   * Stop accepting new messages.
   */
  stop(): void;

  /**
   * Whether the bus still accepts messages.
   */
  readonly isRunning: boolean;

  /**
   * Number of pending inbound messages.
   */
  readonly inboundSize: number;
}
