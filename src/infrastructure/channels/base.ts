/**
 * Base channel for chat platforms.
 */

import type { IChannel } from "../../core/interfaces/channel.js";
import type { IMessageBus } from "../../core/interfaces/message-bus.js";
import { createInboundMessage } from "../queue/events.js";

export interface BaseChannelConfig {
  /** Sender ids allowed to talk to the bot; empty allows everyone */
  allowFrom?: string[];
}

/**
 * Abstract base class for chat channel implementations.
 *
 * Each channel (Telegram, ...) implements this class to feed the
 * gateway's message bus and to deliver replies.
 */
export abstract class BaseChannel<TConfig extends BaseChannelConfig = BaseChannelConfig> implements IChannel {
  /**
   * Channel name identifier.
   */
  abstract readonly name: string;

  protected config: TConfig;
  protected bus: IMessageBus;
  protected _running = false;

  constructor(config: TConfig, bus: IMessageBus) {
    this.config = config;
    this.bus = bus;
  }

  /**
   * Start the channel and begin listening for messages.
   */
  abstract start(): Promise<void>;

  /**
   * Stop the channel and clean up resources.
   */
  abstract stop(): Promise<void>;

  /**
   * Send a text message to a conversation.
   */
  abstract send(conversationId: string, text: string): Promise<void>;

  /**
   * Check if a sender is allowed to use this bot.
   */
  isAllowed(senderId: string): boolean {
    const allowList = this.config.allowFrom ?? [];

    // If no allow list, allow everyone
    if (allowList.length === 0) {
      return true;
    }

    const senderStr = String(senderId);
    if (allowList.includes(senderStr)) {
      return true;
    }

    // Check parts separated by |
    if (senderStr.includes("|")) {
      for (const part of senderStr.split("|")) {
        if (part && allowList.includes(part)) {
          return true;
        }
      }
    }

    return false;
  }

  /**
   * Handle an incoming message from the chat platform.
   * Returns false when the sender was not allowed.
   */
  protected async handleMessage(
    senderId: string,
    conversationId: string,
    text: string,
    metadata?: Record<string, unknown>,
  ): Promise<boolean> {
    if (!this.isAllowed(senderId)) {
      return false;
    }

    const msg = createInboundMessage({
      channelId: this.name,
      conversationId: String(conversationId),
      senderId: String(senderId),
      text,
      metadata: metadata || {},
    });

    await this.bus.publishInbound(msg);
    return true;
  }

  /**
   * Check if the channel is running.
   */
  get isRunning(): boolean {
    return this._running;
  }
}
