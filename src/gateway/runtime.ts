/**
 * Gateway runtime: builds the server and its collaborators from config.
 */

import type { ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { BackendId } from "../core/types/llm.js";
import { AgentLoop } from "../application/agent-loop.js";
import { ContextBuilder } from "../application/context-builder.js";
import { SkillsLoader, type Skill, type SkillRoot } from "../application/skills-loader.js";
import { ChannelRegistry, TelegramChannel } from "../infrastructure/channels/index.js";
import {
  getBundledSkillsDir,
  loadConfig,
  requireInitialized,
  resolveGatewayToken,
  resolveSkillsDir,
  resolveTelegramToken,
  resolveWorkspaceDir,
  validateGatewayBind,
  type Config,
} from "../infrastructure/config/index.js";
import { createProviders, discoverModels, type ProviderSet } from "../infrastructure/llm/index.js";
import { MessageBus } from "../infrastructure/queue/index.js";
import { BindingStore, SessionStore } from "../infrastructure/storage/index.js";
import { ReadSkillTool, ToolRegistry, createSkillTools } from "../tools/index.js";
import { errorMessage } from "../core/errors.js";
import { expandUser } from "../utils/paths.js";
import { GatewayServer } from "./server.js";
import logger from "../utils/logger.js";

export interface GatewayRuntimeOptions {
  configPath: string;
  /** Overrides gateway.port */
  port?: number;
  /** Model providers; built from agents config when absent */
  providers?: Partial<Record<BackendId, ILLMProvider>>;
  /** fetch used by the Telegram channel */
  fetch?: typeof fetch;
  pollIntervalMs?: number;
}

/**
 * Skill roots, lowest precedence first: extra dirs, bundled, primary.
 */
export function skillRoots(config: Config, configPath: string): SkillRoot[] {
  return [
    ...config.skills.extraDirs.map((dir): SkillRoot => ({ dir: expandUser(dir), source: "extra" })),
    { dir: getBundledSkillsDir(configPath), source: "bundled" },
    { dir: resolveSkillsDir(config, configPath), source: "primary" },
  ];
}

/**
 * Tool registry for the loaded skills: their descriptor tools, plus
 * read_skill in readOnDemand mode.
 */
export function buildToolRegistry(config: Config, skills: Skill[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of createSkillTools(skills, { allowScripts: config.skills.allowScripts })) {
    registry.register(tool);
  }
  if (config.skills.contextMode === "readOnDemand" && skills.length > 0) {
    registry.register(new ReadSkillTool(skills));
  }
  return registry;
}

async function startTelegram(
  config: Config,
  bus: MessageBus,
  channels: ChannelRegistry,
  fetchImpl: typeof fetch | undefined,
): Promise<void> {
  const token = resolveTelegramToken(config);
  if (!token) {
    logger.debug("Telegram bot token not set, channel disabled");
    return;
  }

  const telegram = config.channels.telegram;
  const channel = new TelegramChannel(
    {
      token,
      allowFrom: telegram.allowFrom,
      webhookUrl: telegram.webhookUrl,
      webhookSecret: telegram.webhookSecret,
    },
    bus,
    { fetch: fetchImpl },
  );

  try {
    await channel.start();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Failed to start Telegram channel");
    return;
  }
  await channels.register(channel);
}

/**
 * Load config, skills, providers and channels, and return a gateway server
 * ready to start. Fails with ConfigError when the config directory is not
 * initialized or the bind address is unsafe.
 */
export async function createGateway(options: GatewayRuntimeOptions): Promise<GatewayServer> {
  const { configPath } = options;
  requireInitialized(configPath);
  const config = loadConfig(configPath);
  validateGatewayBind(config);

  const skills = new SkillsLoader(skillRoots(config, configPath)).loadEnabled(config.skills.enabled);
  logger.info({ skills: skills.map((skill) => skill.name) }, "Loaded skills");

  const context = new ContextBuilder({
    workspace: resolveWorkspaceDir(config, configPath),
    skills,
    contextMode: config.skills.contextMode,
  });
  const tools = buildToolRegistry(config, skills);

  const sessions = new SessionStore();
  const bindings = new BindingStore();
  const bus = new MessageBus();
  const channels = new ChannelRegistry();

  const built: ProviderSet = createProviders(config.agents);
  const providers = options.providers ?? built;
  const models = await discoverModels({ ...built, ...providers }, config.agents);

  const agent = new AgentLoop({
    sessions,
    providers,
    tools,
    agents: config.agents,
    systemContext: () => context.buildSystemContext(),
  });

  await startTelegram(config, bus, channels, options.fetch);

  return new GatewayServer({
    bind: config.gateway.bind,
    port: options.port ?? config.gateway.port,
    requiredToken: config.gateway.auth.mode === "token" ? resolveGatewayToken(config) : undefined,
    webhookSecret: config.channels.telegram.webhookSecret,
    agents: config.agents,
    agent,
    sessions,
    bindings,
    channels,
    bus,
    context,
    models,
    pollIntervalMs: options.pollIntervalMs,
  });
}
