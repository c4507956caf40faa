/**
 * Gateway WebSocket protocol: frames and method params.
 */

import { z } from "zod";
import { AuthError } from "../core/errors.js";

export const PROTOCOL_VERSION = 1;
export const TICK_INTERVAL_MS = 15000;

export const RequestFrameSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    method: z.string(),
    params: z.unknown().optional(),
  })
  .passthrough();

export type RequestFrame = z.infer<typeof RequestFrameSchema>;

export const ConnectParamsSchema = z
  .object({
    minProtocol: z.number().int().nonnegative().optional(),
    maxProtocol: z.number().int().nonnegative().optional(),
    client: z
      .object({
        id: z.string().optional(),
        version: z.string().optional(),
        platform: z.string().optional(),
        mode: z.string().optional(),
      })
      .passthrough()
      .optional(),
    role: z.string().optional(),
    scopes: z.array(z.string()).optional(),
    auth: z
      .object({
        token: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const SendParamsSchema = z.object({
  channelId: z.string(),
  conversationId: z.string(),
  message: z.string(),
});

export const AgentParamsSchema = z.object({
  sessionId: z.string().nullish(),
  message: z.string(),
  backend: z.string().nullish(),
  model: z.string().nullish(),
});

export type ConnectParams = z.infer<typeof ConnectParamsSchema>;
export type SendParams = z.infer<typeof SendParamsSchema>;
export type AgentParams = z.infer<typeof AgentParamsSchema>;

export interface ResponseFrame {
  type: "res";
  id: string;
  ok: boolean;
  payload?: unknown;
  error?: string;
}

export interface EventFrame {
  type: "event";
  event: string;
  payload: unknown;
}

export interface HelloOk {
  type: "hello-ok";
  protocol: number;
  policy: { tickIntervalMs: number };
}

export function okResponse(id: string, payload: unknown): ResponseFrame {
  return { type: "res", id, ok: true, payload };
}

export function errorResponse(id: string, error: string): ResponseFrame {
  return { type: "res", id, ok: false, error };
}

export function eventFrame(event: string, payload: unknown): EventFrame {
  return { type: "event", event, payload };
}

/**
 * Negotiated protocol: the client's maximum, capped at ours.
 */
export function negotiateProtocol(params: ConnectParams): number {
  return Math.min(params.maxProtocol ?? PROTOCOL_VERSION, PROTOCOL_VERSION);
}

export function helloOk(params: ConnectParams): HelloOk {
  return {
    type: "hello-ok",
    protocol: negotiateProtocol(params),
    policy: { tickIntervalMs: TICK_INTERVAL_MS },
  };
}

/**
 * Check a connect token against the required one, when there is one.
 *
 * @throws AuthError when the token is missing or does not match
 */
export function assertConnectToken(params: ConnectParams, requiredToken: string | undefined): void {
  if (requiredToken === undefined) {
    return;
  }
  const provided = (params.auth?.token ?? "").trim();
  if (provided === "") {
    throw new AuthError("unauthorized: gateway token missing (set CHAI_GATEWAY_TOKEN or gateway.auth.token)");
  }
  if (provided !== requiredToken) {
    throw new AuthError("unauthorized: gateway token mismatch");
  }
}

/**
 * Payload of the `session.message` event.
 */
export interface SessionMessageEvent {
  sessionId: string;
  role: "user" | "assistant";
  content: string;
  channelId: string | null;
  conversationId: string | null;
}

export type Broadcast = (event: string, payload: unknown) => void;
