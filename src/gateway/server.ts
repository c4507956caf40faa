/**
 * Gateway server: HTTP endpoints plus the WebSocket control protocol.
 */

import { createServer, type Server } from "http";
import { randomUUID } from "crypto";
import express, { type Express } from "express";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { IBindingStore, ISessionStore } from "../core/interfaces/storage.js";
import type { AgentLoop, TurnResult } from "../application/agent-loop.js";
import type { ContextBuilder } from "../application/context-builder.js";
import type { ChannelRegistry } from "../infrastructure/channels/registry.js";
import type { MessageBus } from "../infrastructure/queue/message-bus.js";
import type { DiscoveredModels } from "../infrastructure/llm/index.js";
import { TelegramChannel } from "../infrastructure/channels/telegram.js";
import { resolveEffectiveBackendAndModel, type AgentsConfig } from "../infrastructure/config/schema.js";
import { errorMessage } from "../core/errors.js";
import { InboundProcessor } from "./inbound.js";
import { setupGatewayRoutes } from "./routes.js";
import {
  AgentParamsSchema,
  ConnectParamsSchema,
  PROTOCOL_VERSION,
  RequestFrameSchema,
  SendParamsSchema,
  assertConnectToken,
  errorResponse,
  eventFrame,
  helloOk,
  okResponse,
  type RequestFrame,
  type ResponseFrame,
  type SessionMessageEvent,
} from "./protocol.js";
import logger from "../utils/logger.js";

export const WS_PATH = "/ws";

export interface GatewayServerOptions {
  bind: string;
  /** Port to listen on; 0 picks a free one */
  port: number;
  /** Token connect must present; undefined when auth is off */
  requiredToken?: string;
  webhookSecret?: string;
  agents: AgentsConfig;
  agent: AgentLoop;
  sessions: ISessionStore;
  bindings: IBindingStore;
  channels: ChannelRegistry;
  bus: MessageBus;
  context: ContextBuilder;
  models: DiscoveredModels;
  /** Inbound bus poll interval */
  pollIntervalMs?: number;
}

interface ConnectionState {
  connected: boolean;
}

function frameText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}

/**
 * Gateway server.
 *
 * Clients connect over WebSocket at /ws, receive a `connect.challenge`
 * event, and must send `connect` before any other method. Connected clients
 * receive `session.message` events for every session and a `shutdown` event
 * on graceful stop.
 */
export class GatewayServer {
  readonly app: Express;
  private options: GatewayServerOptions;
  private inbound: InboundProcessor;
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, ConnectionState> = new Map();
  private boundPort: number;

  constructor(options: GatewayServerOptions) {
    this.options = options;
    this.boundPort = options.port;
    this.app = express();
    this.app.use(
      setupGatewayRoutes({
        port: () => this.boundPort,
        channels: options.channels,
        bus: options.bus,
        webhookSecret: options.webhookSecret,
      }),
    );
    this.inbound = new InboundProcessor({
      bus: options.bus,
      agent: options.agent,
      sessions: options.sessions,
      bindings: options.bindings,
      channels: options.channels,
      broadcast: (event, payload) => this.broadcast(event, payload),
      pollIntervalMs: options.pollIntervalMs,
    });
  }

  get port(): number {
    return this.boundPort;
  }

  get isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Listen on bind:port and start consuming channel messages.
   *
   * @returns the bound port
   */
  async start(): Promise<number> {
    if (this.httpServer) {
      return this.boundPort;
    }

    const server = createServer(this.app);
    const wss = new WebSocketServer({ server, path: WS_PATH });
    wss.on("connection", (socket) => this.handleConnection(socket));

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.bind, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    if (address && typeof address === "object") {
      this.boundPort = address.port;
    }

    this.httpServer = server;
    this.wss = wss;
    this.inbound.start();

    logger.info({ bind: this.options.bind, port: this.boundPort }, "Gateway listening");
    return this.boundPort;
  }

  /**
   * Graceful shutdown: notify clients, stop channels, drain the bus and
   * close the listener.
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    logger.info("Gateway shutting down");

    const shutdown = JSON.stringify(eventFrame("shutdown", {}));
    for (const socket of this.clients.keys()) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(shutdown);
        socket.close(1001, "shutdown");
      }
    }

    const { channels, bus } = this.options;
    const telegram = channels.get("telegram");
    await channels.stopAll();
    if (telegram instanceof TelegramChannel && telegram.webhookMode) {
      try {
        await telegram.deleteWebhook();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, "Failed to delete Telegram webhook");
      }
    }

    bus.stop();
    await this.inbound.stop();

    await new Promise<void>((resolve) => {
      if (this.wss) {
        this.wss.close(() => resolve());
      } else {
        resolve();
      }
    });
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });

    this.httpServer = null;
    this.wss = null;
    this.clients.clear();
    logger.info("Gateway stopped");
  }

  /**
   * Send an event to every connected client.
   */
  broadcast(event: string, payload: unknown): void {
    const frame = JSON.stringify(eventFrame(event, payload));
    for (const [socket, state] of this.clients) {
      if (state.connected && socket.readyState === WebSocket.OPEN) {
        socket.send(frame);
      }
    }
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = { connected: false };
    this.clients.set(socket, state);
    logger.debug({ clients: this.clients.size }, "WebSocket client connected");

    socket.send(JSON.stringify(eventFrame("connect.challenge", { nonce: randomUUID(), ts: Date.now() })));

    socket.on("message", (data) => {
      this.handleFrame(socket, state, frameText(data)).catch((error) => {
        logger.error({ error: errorMessage(error) }, "WebSocket frame handling failed");
      });
    });

    socket.on("close", () => {
      this.clients.delete(socket);
      logger.debug({ clients: this.clients.size }, "WebSocket client disconnected");
    });

    socket.on("error", (error) => {
      logger.warn({ error: error.message }, "WebSocket error");
    });
  }

  private async handleFrame(socket: WebSocket, state: ConnectionState, text: string): Promise<void> {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      logger.debug("Ignoring non-JSON WebSocket frame");
      return;
    }

    const parsed = RequestFrameSchema.safeParse(data);
    if (!parsed.success || parsed.data.type !== "req") {
      return;
    }

    const response = await this.handleRequest(parsed.data, state);
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(response));
    }
  }

  /**
   * Answer one request frame.
   */
  private async handleRequest(frame: RequestFrame, state: ConnectionState): Promise<ResponseFrame> {
    const { id, method } = frame;

    if (method === "connect") {
      return this.handleConnect(frame, state);
    }
    if (!state.connected) {
      return errorResponse(id, "not connected: send connect first");
    }

    switch (method) {
      case "health":
        return okResponse(id, { runtime: "running", protocol: PROTOCOL_VERSION });
      case "status":
        return okResponse(id, this.status());
      case "send":
        return this.handleSend(frame);
      case "agent":
        return this.handleAgent(frame);
      default:
        return errorResponse(id, `unknown method: ${method}`);
    }
  }

  private handleConnect(frame: RequestFrame, state: ConnectionState): ResponseFrame {
    const params = ConnectParamsSchema.safeParse(frame.params);
    if (!params.success) {
      return errorResponse(frame.id, "invalid connect params");
    }

    try {
      assertConnectToken(params.data, this.options.requiredToken);
    } catch (error) {
      logger.warn({ client: params.data.client?.id }, "Rejected gateway connect");
      return errorResponse(frame.id, errorMessage(error));
    }

    state.connected = true;
    logger.info({ client: params.data.client?.id, role: params.data.role }, "Gateway client connected");
    return okResponse(frame.id, helloOk(params.data));
  }

  private status(): Record<string, unknown> {
    const { agents, context, models, requiredToken } = this.options;
    const { backend, model } = resolveEffectiveBackendAndModel(agents);
    return {
      runtime: "running",
      protocol: PROTOCOL_VERSION,
      port: this.boundPort,
      bind: this.options.bind,
      auth: requiredToken !== undefined ? "token" : "none",
      defaultBackend: backend,
      defaultModel: model,
      ollamaModels: models.ollama,
      lmStudioModels: models.lmstudio,
      agentContext: context.agentContext ?? null,
      systemContext: context.buildSystemContext(),
      date: context.date,
      skillsContext: context.skillsContext,
      contextMode: context.contextMode,
    };
  }

  private async handleSend(frame: RequestFrame): Promise<ResponseFrame> {
    const params = SendParamsSchema.safeParse(frame.params);
    if (!params.success) {
      return errorResponse(frame.id, "invalid send params");
    }

    const { channelId, conversationId, message } = params.data;
    const channel = this.options.channels.get(channelId);
    if (!channel) {
      return errorResponse(frame.id, "channel not found");
    }

    try {
      await channel.send(conversationId, message);
    } catch (error) {
      return errorResponse(frame.id, errorMessage(error));
    }
    return okResponse(frame.id, { sent: true });
  }

  private async handleAgent(frame: RequestFrame): Promise<ResponseFrame> {
    const params = AgentParamsSchema.safeParse(frame.params);
    if (!params.success) {
      return errorResponse(frame.id, "invalid agent params");
    }

    const { sessions, bindings, agent, channels } = this.options;
    const requested = params.data.sessionId?.trim();
    const session = requested ? sessions.getOrCreate(requested) : sessions.create();
    const binding = bindings.getChannelBinding(session.id);

    const event = (role: SessionMessageEvent["role"], content: string): SessionMessageEvent => ({
      sessionId: session.id,
      role,
      content,
      channelId: binding?.channelId ?? null,
      conversationId: binding?.conversationId ?? null,
    });

    this.broadcast("session.message", event("user", params.data.message));

    let result: TurnResult;
    try {
      result = await agent.handle({
        sessionId: session.id,
        message: params.data.message,
        backend: params.data.backend ?? undefined,
        model: params.data.model ?? undefined,
      });
    } catch (error) {
      logger.error({ sessionId: session.id, error: errorMessage(error) }, "Agent turn failed");
      return errorResponse(frame.id, errorMessage(error));
    }

    this.broadcast("session.message", event("assistant", result.content));

    if (binding && result.content.trim() !== "") {
      const channel = channels.get(binding.channelId);
      if (channel) {
        try {
          await channel.send(binding.conversationId, result.content);
        } catch (error) {
          logger.warn({ channel: binding.channelId, error: errorMessage(error) }, "Failed to deliver reply to channel");
        }
      }
    }

    return okResponse(frame.id, {
      reply: result.content,
      sessionId: result.sessionId,
      toolCalls: result.toolCalls,
    });
  }
}
