/**
 * Configuration schema (zod) with defaults.
 */

import { z } from "zod";
import type { BackendId } from "../../core/types/llm.js";

export const DEFAULT_GATEWAY_PORT = 15151;
export const DEFAULT_GATEWAY_BIND = "127.0.0.1";
export const DEFAULT_OLLAMA_BASE_URL = "http://127.0.0.1:11434";
export const DEFAULT_LMSTUDIO_BASE_URL = "http://127.0.0.1:1234/v1";
export const DEFAULT_OLLAMA_MODEL = "llama3.2:latest";
export const DEFAULT_LMSTUDIO_MODEL = "gpt-oss-20b";

export const GatewayAuthSchema = z.object({
  mode: z.enum(["none", "token"]).default("none"),
  token: z.string().optional(),
});

export const GatewayConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(DEFAULT_GATEWAY_PORT),
  bind: z.string().default(DEFAULT_GATEWAY_BIND),
  auth: GatewayAuthSchema.default({}),
});

export const TelegramConfigSchema = z.object({
  botToken: z.string().optional(),
  webhookUrl: z.string().optional(),
  webhookSecret: z.string().optional(),
  allowFrom: z.array(z.string()).default([]),
});

export const ChannelsConfigSchema = z.object({
  telegram: TelegramConfigSchema.default({}),
});

export const OllamaBackendSchema = z.object({
  baseUrl: z.string().optional(),
});

export const LmStudioBackendSchema = z.object({
  baseUrl: z.string().optional(),
  endpointType: z.enum(["openai", "native"]).default("openai"),
});

export const BackendsConfigSchema = z.object({
  ollama: OllamaBackendSchema.default({}),
  lmStudio: LmStudioBackendSchema.default({}),
});

export const AgentsConfigSchema = z.object({
  defaultBackend: z.string().optional(),
  defaultModel: z.string().optional(),
  enabledBackends: z.array(z.string()).optional(),
  workspace: z.string().optional(),
  backends: BackendsConfigSchema.default({}),
});

export const SkillsConfigSchema = z.object({
  directory: z.string().optional(),
  extraDirs: z.array(z.string()).default([]),
  enabled: z.array(z.string()).default([]),
  contextMode: z.enum(["full", "readOnDemand"]).default("full"),
  allowScripts: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  gateway: GatewayConfigSchema.default({}),
  channels: ChannelsConfigSchema.default({}),
  agents: AgentsConfigSchema.default({}),
  skills: SkillsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type AgentsConfig = z.infer<typeof AgentsConfigSchema>;
export type SkillsConfig = z.infer<typeof SkillsConfigSchema>;
export type ContextMode = SkillsConfig["contextMode"];

/**
 * Map a backend name to a known backend. Unknown or absent names mean ollama.
 */
export function normalizeBackend(name: string | undefined): BackendId {
  const normalized = (name ?? "").trim().toLowerCase();
  return normalized === "lmstudio" || normalized === "lm_studio" ? "lmstudio" : "ollama";
}

/**
 * Parse a backend name, or undefined when it names no known backend.
 */
export function parseBackend(name: string | undefined): BackendId | undefined {
  const normalized = (name ?? "").trim().toLowerCase();
  if (normalized === "ollama") return "ollama";
  if (normalized === "lmstudio" || normalized === "lm_studio") return "lmstudio";
  return undefined;
}

export function defaultModelFor(backend: BackendId): string {
  return backend === "lmstudio" ? DEFAULT_LMSTUDIO_MODEL : DEFAULT_OLLAMA_MODEL;
}

/**
 * Default backend and model, after falling back through the defaults.
 */
export function resolveEffectiveBackendAndModel(agents: AgentsConfig): { backend: BackendId; model: string } {
  const backend = normalizeBackend(agents.defaultBackend);
  const configured = agents.defaultModel?.trim();
  return { backend, model: configured ? configured : defaultModelFor(backend) };
}

/**
 * Whether models should be discovered from a backend at startup.
 * Without enabledBackends only the default backend is polled.
 */
export function backendDiscoveryEnabled(agents: AgentsConfig, backend: BackendId): boolean {
  const enabled = agents.enabledBackends ?? [];
  if (enabled.length === 0) {
    return normalizeBackend(agents.defaultBackend) === backend;
  }
  return enabled.some((name) => parseBackend(name) === backend);
}

export function resolveOllamaBaseUrl(agents: AgentsConfig): string {
  const configured = agents.backends.ollama.baseUrl?.trim();
  return configured ? configured : DEFAULT_OLLAMA_BASE_URL;
}

export function resolveLmStudioBaseUrl(agents: AgentsConfig): string {
  const configured = agents.backends.lmStudio.baseUrl?.trim();
  return configured ? configured : DEFAULT_LMSTUDIO_BASE_URL;
}

/**
 * True for loopback bind addresses.
 */
export function isLoopbackBind(bind: string): boolean {
  const value = bind.trim();
  return value === "127.0.0.1" || value === "::1" || value === "localhost";
}
