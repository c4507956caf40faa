/**
 * Config directory initialization (`chai init`).
 */

import { cpSync, existsSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { getBundledSkillsDir, getConfigDir } from "./loader.js";
import { ConfigError } from "../../core/errors.js";
import { ensureDir } from "../../utils/paths.js";
import logger from "../../utils/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package root relative to this file (src/ or dist/ alike)
export const PACKAGE_ROOT = join(__dirname, "..", "..", "..");

export const PACKAGED_SKILLS_DIR = join(PACKAGE_ROOT, "skills");
export const PACKAGED_TEMPLATES_DIR = join(PACKAGE_ROOT, "templates");

export interface InitOptions {
  /** Source of the bundled skills copied on first init */
  skillsSource?: string;
  /** Source of the workspace AGENTS.md template */
  agentsTemplate?: string;
}

/**
 * Create the config directory, default config, workspace and bundled skills.
 * Existing files are left untouched. Returns the config directory.
 */
export function initConfigDir(configPath: string, options: InitOptions = {}): string {
  const configDir = ensureDir(getConfigDir(configPath));

  if (!existsSync(configPath)) {
    writeFileSync(configPath, "{}");
    logger.info({ configPath }, "Created default config");
  }

  const workspace = join(configDir, "workspace");
  if (!existsSync(workspace)) {
    ensureDir(workspace);
    logger.info({ workspace }, "Created workspace directory");
  }

  const agentsFile = join(workspace, "AGENTS.md");
  if (!existsSync(agentsFile)) {
    const template = options.agentsTemplate ?? join(PACKAGED_TEMPLATES_DIR, "AGENTS.md");
    writeFileSync(agentsFile, readFileSync(template, "utf-8"));
    logger.info({ path: agentsFile }, "Wrote default AGENTS.md");
  }

  const bundledDir = getBundledSkillsDir(configPath);
  if (!existsSync(bundledDir)) {
    const source = options.skillsSource ?? PACKAGED_SKILLS_DIR;
    ensureDir(bundledDir);
    if (existsSync(source)) {
      cpSync(source, bundledDir, { recursive: true });
    }
    logger.info({ bundledDir }, "Extracted default skills");
  } else {
    logger.debug({ bundledDir }, "Bundled skills directory already exists, skipping");
  }

  return configDir;
}

/**
 * Fail unless `chai init` has been run for this config path.
 */
export function requireInitialized(configPath: string): void {
  if (!existsSync(configPath)) {
    throw new ConfigError(
      `configuration not initialized; run \`chai init\` first (config file not found: ${configPath})`,
    );
  }
  const bundledDir = getBundledSkillsDir(configPath);
  if (!existsSync(bundledDir)) {
    throw new ConfigError(
      `configuration not initialized; run \`chai init\` first (bundled skills directory not found: ${bundledDir})`,
    );
  }
}
