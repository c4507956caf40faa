/**
 * Async message queue between channels and the gateway's inbound processor.
 */

import type { InboundMessage } from "../../core/types/message.js";
import type { IMessageBus } from "../../core/interfaces/message-bus.js";
import logger from "../../utils/logger.js";

/**
 * Simple async queue implementation.
 */
export class AsyncQueue<T> {
  private queue: T[] = [];
  private resolvers: ((value: T) => void)[] = [];

  push(item: T): void {
    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver(item);
    } else {
      this.queue.push(item);
    }
  }

  async popWithTimeout(timeoutMs: number): Promise<T | null> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return item;
    }

    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        const index = this.resolvers.indexOf(wrappedResolve);
        if (index !== -1) {
          this.resolvers.splice(index, 1);
        }
        resolve(null);
      }, timeoutMs);

      const wrappedResolve = (value: T) => {
        clearTimeout(timeout);
        resolve(value);
      };

      this.resolvers.push(wrappedResolve);
    });
  }

  get size(): number {
    return this.queue.length;
  }
}

/**
 * Message bus that decouples chat channels from the agent core.
 *
 * Channels push messages to the inbound queue; the gateway consumes them,
 * runs a turn and replies through the originating channel.
 */
export class MessageBus implements IMessageBus {
  private inbound = new AsyncQueue<InboundMessage>();
  private _running = true;

  /**
   * Publish a message from a channel. Dropped once the bus is stopped.
   */
  async publishInbound(msg: InboundMessage): Promise<void> {
    if (!this._running) {
      logger.warn({ channel: msg.channelId }, "Message bus stopped, dropping inbound message");
      return;
    }
    this.inbound.push(msg);
  }

  /**
   * Consume the next inbound message with timeout.
   */
  async consumeInboundWithTimeout(timeoutMs: number): Promise<InboundMessage | null> {
    return this.inbound.popWithTimeout(timeoutMs);
  }

  stop(): void {
    this._running = false;
  }

  get isRunning(): boolean {
    return this._running;
  }

  /**
   * Number of pending inbound messages.
   */
  get inboundSize(): number {
    return this.inbound.size;
  }
}
