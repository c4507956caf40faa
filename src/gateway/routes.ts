/**
 * HTTP routes of the gateway.
 *
 * Endpoints:
 * - GET  /                  - Liveness probe with the bound port
 * - POST /telegram/webhook  - Telegram update delivery in webhook mode
 */

import express, { Router, type Request, type Response } from "express";
import type { IMessageBus } from "../core/interfaces/message-bus.js";
import type { ChannelRegistry } from "../infrastructure/channels/registry.js";
import { TelegramChannel } from "../infrastructure/channels/telegram.js";
import { errorMessage } from "../core/errors.js";
import { PROTOCOL_VERSION } from "./protocol.js";
import logger from "../utils/logger.js";

export const TELEGRAM_SECRET_HEADER = "x-telegram-bot-api-secret-token";

export interface GatewayRoutesOptions {
  /** Port actually bound */
  port: () => number;
  channels: ChannelRegistry;
  bus: IMessageBus;
  /** Expected X-Telegram-Bot-Api-Secret-Token, when configured */
  webhookSecret?: string;
}

export function setupGatewayRoutes(options: GatewayRoutesOptions): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({ runtime: "running", protocol: PROTOCOL_VERSION, port: options.port() });
  });

  // Body is read as text so malformed JSON can be answered with 400.
  router.post(
    "/telegram/webhook",
    express.text({ type: () => true, limit: "1mb" }),
    async (req: Request, res: Response) => {
      if (options.webhookSecret && req.get(TELEGRAM_SECRET_HEADER) !== options.webhookSecret) {
        res.sendStatus(403);
        return;
      }

      const raw: unknown = req.body;
      let update: unknown;
      try {
        update = JSON.parse(typeof raw === "string" ? raw : "");
      } catch {
        res.sendStatus(400);
        return;
      }

      const channel = options.channels.get("telegram");
      if (!(channel instanceof TelegramChannel) || !options.bus.isRunning) {
        res.sendStatus(503);
        return;
      }

      try {
        const handled = await channel.handleUpdate(update);
        res.sendStatus(handled ? 200 : 400);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Telegram webhook error");
        res.sendStatus(500);
      }
    },
  );

  return router;
}
