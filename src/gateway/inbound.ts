/**
 * Inbound processor: turns channel messages into agent turns.
 */

import type { IBindingStore, ISessionStore } from "../core/interfaces/storage.js";
import type { IMessageBus } from "../core/interfaces/message-bus.js";
import type { InboundMessage } from "../core/types/message.js";
import type { AgentLoop } from "../application/agent-loop.js";
import type { ChannelRegistry } from "../infrastructure/channels/registry.js";
import { errorMessage } from "../core/errors.js";
import type { Broadcast, SessionMessageEvent } from "./protocol.js";
import logger from "../utils/logger.js";

export const NEW_SESSION_COMMAND = "/new";
export const SESSION_RESTARTED_REPLY = "session restarted. next message will start with a clean history.";

const POLL_INTERVAL_MS = 1000;

export function failureReply(error: unknown): string {
  return `something went wrong: ${errorMessage(error)}. check the gateway logs for details.`;
}

export interface InboundProcessorOptions {
  bus: IMessageBus;
  agent: AgentLoop;
  sessions: ISessionStore;
  bindings: IBindingStore;
  channels: ChannelRegistry;
  broadcast: Broadcast;
  /** How long one bus poll waits before re-checking for shutdown */
  pollIntervalMs?: number;
}

/**
 * Consumes the message bus. Each message runs in its own task; turns of one
 * session are serialized by the agent loop.
 */
export class InboundProcessor {
  private bus: IMessageBus;
  private agent: AgentLoop;
  private sessions: ISessionStore;
  private bindings: IBindingStore;
  private channels: ChannelRegistry;
  private broadcast: Broadcast;
  private pollIntervalMs: number;
  private loop: Promise<void> | null = null;
  private pending: Set<Promise<void>> = new Set();

  constructor(options: InboundProcessorOptions) {
    this.bus = options.bus;
    this.agent = options.agent;
    this.sessions = options.sessions;
    this.bindings = options.bindings;
    this.channels = options.channels;
    this.broadcast = options.broadcast;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.loop = this.run();
  }

  /**
   * Wait for the consume loop to notice the stopped bus and for in-flight
   * messages to finish.
   */
  async stop(): Promise<void> {
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await Promise.all(Array.from(this.pending));
  }

  private async run(): Promise<void> {
    while (this.bus.isRunning) {
      const msg = await this.bus.consumeInboundWithTimeout(this.pollIntervalMs);
      if (!msg) {
        continue;
      }
      const task = this.processMessage(msg).finally(() => {
        this.pending.delete(task);
      });
      this.pending.add(task);
    }
    logger.debug("Inbound processor stopped");
  }

  /**
   * Handle one channel message. Failures are reported back to the
   * conversation, never thrown.
   */
  async processMessage(msg: InboundMessage): Promise<void> {
    const { channelId, conversationId } = msg;
    logger.info({ channel: channelId, conversationId, senderId: msg.senderId }, "Inbound message");

    if (msg.text.trim().toLowerCase() === NEW_SESSION_COMMAND) {
      this.restartSession(channelId, conversationId);
      await this.reply(channelId, conversationId, SESSION_RESTARTED_REPLY);
      return;
    }

    let sessionId = this.bindings.getSessionId(channelId, conversationId);
    if (sessionId === undefined) {
      sessionId = this.sessions.create().id;
      this.bindings.bind(channelId, conversationId, sessionId);
    } else {
      this.sessions.getOrCreate(sessionId);
    }

    this.emit({ sessionId, role: "user", content: msg.text, channelId, conversationId });

    let reply: string;
    try {
      const result = await this.agent.handle({ sessionId, message: msg.text });
      reply = result.content;
    } catch (error) {
      logger.error({ sessionId, channel: channelId, error: errorMessage(error) }, "Turn failed");
      await this.reply(channelId, conversationId, failureReply(error));
      return;
    }

    if (reply.trim() === "") {
      return;
    }
    this.emit({ sessionId, role: "assistant", content: reply, channelId, conversationId });
    await this.reply(channelId, conversationId, reply);
  }

  private restartSession(channelId: string, conversationId: string): void {
    const previous = this.bindings.getSessionId(channelId, conversationId);
    const session = this.sessions.create();
    this.bindings.bind(channelId, conversationId, session.id);
    if (previous !== undefined) {
      this.sessions.remove(previous);
    }
    logger.info({ channel: channelId, conversationId, sessionId: session.id }, "Session restarted");
  }

  private emit(event: SessionMessageEvent): void {
    this.broadcast("session.message", event);
  }

  private async reply(channelId: string, conversationId: string, text: string): Promise<void> {
    const channel = this.channels.get(channelId);
    if (!channel) {
      logger.warn({ channel: channelId }, "Channel not registered, dropping reply");
      return;
    }
    try {
      await channel.send(conversationId, text);
    } catch (error) {
      logger.error({ channel: channelId, error: errorMessage(error) }, "Failed to send reply");
    }
  }
}
