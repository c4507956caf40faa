/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  GatewayConfigSchema,
  TelegramConfigSchema,
  ChannelsConfigSchema,
  AgentsConfigSchema,
  SkillsConfigSchema,
  normalizeBackend,
  parseBackend,
  defaultModelFor,
  resolveEffectiveBackendAndModel,
  backendDiscoveryEnabled,
  resolveOllamaBaseUrl,
  resolveLmStudioBaseUrl,
  isLoopbackBind,
  type Config,
  type GatewayConfig,
  type TelegramConfig,
  type AgentsConfig,
  type SkillsConfig,
  type ContextMode,
} from "./schema.js";

export {
  loadConfig,
  saveConfig,
  parseConfig,
  getConfigPath,
  getConfigDir,
  getBundledSkillsDir,
  resolveSkillsDir,
  resolveWorkspaceDir,
  resolveGatewayToken,
  resolveTelegramToken,
  validateGatewayBind,
} from "./loader.js";

export {
  initConfigDir,
  requireInitialized,
  PACKAGE_ROOT,
  PACKAGED_SKILLS_DIR,
  PACKAGED_TEMPLATES_DIR,
  type InitOptions,
} from "./init.js";
