/**
 * Telegram channel over the Bot API (long polling or webhook).
 */

import { setTimeout as sleep } from "timers/promises";
import { z } from "zod";
import type { IMessageBus } from "../../core/interfaces/message-bus.js";
import { BaseChannel, type BaseChannelConfig } from "./base.js";
import { errorMessage } from "../../core/errors.js";
import logger from "../../utils/logger.js";

export const DEFAULT_TELEGRAM_API_BASE = "https://api.telegram.org";
export const LONG_POLL_TIMEOUT_SECONDS = 30;
export const POLL_RETRY_DELAY_MS = 2000;

const TelegramUpdateSchema = z
  .object({
    update_id: z.number().int(),
    message: z
      .object({
        chat: z.object({ id: z.number().int() }).passthrough(),
        from: z
          .object({
            id: z.number().int(),
            username: z.string().optional(),
          })
          .passthrough()
          .optional(),
        text: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const GetUpdatesResponseSchema = z.object({
  ok: z.boolean(),
  result: z.array(TelegramUpdateSchema).default([]),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export interface TelegramChannelConfig extends BaseChannelConfig {
  token: string;
  /** Public URL Telegram posts updates to; long polling when unset */
  webhookUrl?: string;
  webhookSecret?: string;
  /** Bot API base, TELEGRAM_API_BASE or https://api.telegram.org */
  apiBase?: string;
}

export interface TelegramChannelOptions {
  fetch?: typeof fetch;
  retryDelayMs?: number;
}

/**
 * Highest update id + 1, or the current offset when there were no updates.
 */
export function nextOffset(updates: TelegramUpdate[], current: number | undefined): number | undefined {
  if (updates.length === 0) {
    return current;
  }
  return Math.max(...updates.map((update) => update.update_id)) + 1;
}

/**
 * Telegram channel. Only text messages are handled; the conversation id is
 * the chat id.
 */
export class TelegramChannel extends BaseChannel<TelegramChannelConfig> {
  readonly name = "telegram";

  private fetchImpl: typeof fetch;
  private retryDelayMs: number;
  private abort: AbortController | null = null;
  private pollTask: Promise<void> | null = null;

  constructor(config: TelegramChannelConfig, bus: IMessageBus, options: TelegramChannelOptions = {}) {
    super(config, bus);
    this.fetchImpl = options.fetch ?? fetch;
    this.retryDelayMs = options.retryDelayMs ?? POLL_RETRY_DELAY_MS;
  }

  get apiBase(): string {
    return (this.config.apiBase || process.env.TELEGRAM_API_BASE || DEFAULT_TELEGRAM_API_BASE).replace(/\/+$/, "");
  }

  get webhookMode(): boolean {
    return Boolean(this.config.webhookUrl);
  }

  /**
   * Register the webhook, or start the long-poll loop in the background.
   */
  async start(): Promise<void> {
    if (this._running) {
      return;
    }

    if (this.config.webhookUrl) {
      await this.setWebhook(this.config.webhookUrl, this.config.webhookSecret);
      this._running = true;
      logger.info("Telegram channel started (webhook mode)");
      return;
    }

    this._running = true;
    this.abort = new AbortController();
    this.pollTask = this.pollLoop(this.abort.signal);
    logger.info("Telegram channel started (long polling)");
  }

  async stop(): Promise<void> {
    this._running = false;
    this.abort?.abort();
    if (this.pollTask) {
      await this.pollTask;
      this.pollTask = null;
    }
    this.abort = null;
  }

  async send(conversationId: string, text: string): Promise<void> {
    await this.call("sendMessage", { chat_id: conversationId, text });
  }

  async setWebhook(url: string, secret?: string): Promise<void> {
    const body: Record<string, string> = { url };
    if (secret) {
      body.secret_token = secret;
    }
    await this.call("setWebhook", body);
  }

  async deleteWebhook(): Promise<void> {
    await this.call("deleteWebhook");
  }

  /**
   * Fetch one batch of updates.
   */
  async getUpdates(offset: number | undefined, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    let url = `${this.apiBase}/bot${this.config.token}/getUpdates?timeout=${LONG_POLL_TIMEOUT_SECONDS}`;
    if (offset !== undefined) {
      url += `&offset=${offset}`;
    }

    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`getUpdates failed: ${response.status} ${body}`.trim());
    }

    const parsed = GetUpdatesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("getUpdates returned an unexpected body");
    }
    if (!parsed.data.ok) {
      throw new Error("getUpdates returned ok: false");
    }
    return parsed.data.result;
  }

  /**
   * Publish the text message of an update (from polling or the webhook).
   * Returns false when the body is not an update.
   */
  async handleUpdate(body: unknown): Promise<boolean> {
    const parsed = TelegramUpdateSchema.safeParse(body);
    if (!parsed.success) {
      return false;
    }

    const message = parsed.data.message;
    if (!message || message.text === undefined) {
      return true;
    }

    const chatId = String(message.chat.id);
    const from = message.from;
    const senderId = from ? [String(from.id), from.username].filter(Boolean).join("|") : chatId;
    const accepted = await this.handleMessage(senderId, chatId, message.text, { updateId: parsed.data.update_id });
    if (!accepted) {
      logger.debug({ senderId, chatId }, "Telegram sender not allowed, ignoring message");
    }
    return true;
  }

  private async pollLoop(signal: AbortSignal): Promise<void> {
    let offset: number | undefined;

    while (this._running) {
      try {
        const updates = await this.getUpdates(offset, signal);
        offset = nextOffset(updates, offset);
        for (const update of updates) {
          await this.handleUpdate(update);
        }
      } catch (error) {
        if (!this._running) {
          break;
        }
        logger.debug({ error: errorMessage(error) }, "Telegram getUpdates error");
        try {
          await sleep(this.retryDelayMs, undefined, { signal });
        } catch {
          break;
        }
      }
    }

    logger.info("Telegram long-poll loop stopped");
  }

  private async call(method: string, body?: Record<string, string>): Promise<void> {
    const response = await this.fetchImpl(`${this.apiBase}/bot${this.config.token}/${method}`, {
      method: "POST",
      headers: body ? { "Content-Type": "application/json" } : undefined,
      body: body ? JSON.stringify(body) : undefined,
    });
    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new Error(`${method} failed: ${response.status} ${text}`.trim());
    }
  }
}
