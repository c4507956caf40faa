/**
 * Configuration loading and path resolution.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join } from "path";
import { ConfigSchema, isLoopbackBind, type Config } from "./schema.js";
import { ConfigError, errorMessage } from "../../core/errors.js";
import { ensureDir, expandUser } from "../../utils/paths.js";
import logger from "../../utils/logger.js";

/**
 * Config file path: CHAI_CONFIG_PATH or ~/.chai/config.json.
 */
export function getConfigPath(): string {
  const fromEnv = process.env.CHAI_CONFIG_PATH?.trim();
  if (fromEnv) {
    return expandUser(fromEnv);
  }
  return join(homedir(), ".chai", "config.json");
}

/**
 * Directory holding the config file; bundled skills and the workspace live here.
 */
export function getConfigDir(configPath: string): string {
  return dirname(configPath);
}

export function getBundledSkillsDir(configPath: string): string {
  return join(getConfigDir(configPath), "bundled");
}

/**
 * Primary skill root: skills.directory (relative to the config dir) or <configDir>/skills.
 */
export function resolveSkillsDir(config: Config, configPath: string): string {
  const directory = config.skills.directory?.trim();
  if (!directory) {
    return join(getConfigDir(configPath), "skills");
  }
  const expanded = expandUser(directory);
  return isAbsolute(expanded) ? expanded : join(getConfigDir(configPath), expanded);
}

export function resolveWorkspaceDir(config: Config, configPath: string): string {
  const workspace = config.agents.workspace?.trim();
  if (!workspace) {
    return join(getConfigDir(configPath), "workspace");
  }
  const expanded = expandUser(workspace);
  return isAbsolute(expanded) ? expanded : join(getConfigDir(configPath), expanded);
}

function envOrConfig(envName: string, configured: string | undefined): string | undefined {
  const fromEnv = process.env[envName]?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const value = configured?.trim();
  return value ? value : undefined;
}

/**
 * Gateway token: CHAI_GATEWAY_TOKEN overrides gateway.auth.token.
 */
export function resolveGatewayToken(config: Config): string | undefined {
  return envOrConfig("CHAI_GATEWAY_TOKEN", config.gateway.auth.token);
}

/**
 * Telegram bot token: TELEGRAM_BOT_TOKEN overrides channels.telegram.botToken.
 */
export function resolveTelegramToken(config: Config): string | undefined {
  return envOrConfig("TELEGRAM_BOT_TOKEN", config.channels.telegram.botToken);
}

/**
 * Parse and validate a config object.
 */
export function parseConfig(data: unknown, source = "config"): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load configuration from file. A missing file yields the defaults.
 */
export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    logger.debug({ configPath }, "Config file not found, using defaults");
    return parseConfig({});
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`reading config from ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`parsing config from ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  return parseConfig(data, `config ${configPath}`);
}

/**
 * Write configuration to file.
 */
export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  ensureDir(dirname(configPath));
  writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n");
}

/**
 * Refuse to expose an unauthenticated gateway beyond loopback.
 */
export function validateGatewayBind(config: Config): void {
  if (isLoopbackBind(config.gateway.bind)) {
    return;
  }
  if (config.gateway.auth.mode !== "token" || !resolveGatewayToken(config)) {
    throw new ConfigError(
      `refusing to bind gateway to ${config.gateway.bind} without token auth; set gateway.auth.mode to "token" and provide gateway.auth.token or CHAI_GATEWAY_TOKEN`,
    );
  }
}
