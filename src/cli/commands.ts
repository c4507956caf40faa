/**
 * Command line interface: `chai version`, `chai init`, `chai gateway`.
 */

import { readFileSync } from "fs";
import { join, resolve } from "path";
import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { getConfigPath, initConfigDir, PACKAGE_ROOT } from "../infrastructure/config/index.js";
import { createGateway } from "../gateway/runtime.js";
import { errorMessage } from "../core/errors.js";
import { expandUser } from "../utils/paths.js";
import logger from "../utils/logger.js";

const PackageJsonSchema = z.object({ version: z.string() }).passthrough();

export function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(PACKAGE_ROOT, "package.json"), "utf-8"));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch (error) {
    logger.debug({ error: errorMessage(error) }, "Could not read package version");
    return "0.0.0";
  }
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("port must be an integer between 0 and 65535");
  }
  return port;
}

function configPathFrom(option: string | undefined): string {
  return option ? resolve(expandUser(option)) : getConfigPath();
}

/**
 * Resolve on the first SIGINT or SIGTERM.
 */
function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolveSignal) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolveSignal(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

async function runGateway(options: { config?: string; port?: number }): Promise<void> {
  const server = await createGateway({ configPath: configPathFrom(options.config), port: options.port });
  await server.start();

  const signal = await waitForShutdownSignal();
  logger.info({ signal }, "Received shutdown signal");
  await server.stop();
}

export function createProgram(): Command {
  const program = new Command();
  const version = packageVersion();

  program.name("chai").description("Local-first gateway for agents on Ollama and LM Studio").version(version);

  program
    .command("version")
    .description("Print the version")
    .action(() => {
      console.log(`chai ${version}`);
    });

  program
    .command("init")
    .description("Create the config directory, workspace and bundled skills")
    .option("-c, --config <path>", "Config file path")
    .action((options: { config?: string }) => {
      try {
        const configDir = initConfigDir(configPathFrom(options.config));
        console.log(`Initialized ${configDir}`);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Init failed");
        process.exit(1);
      }
    });

  program
    .command("gateway")
    .description("Run the gateway")
    .option("-c, --config <path>", "Config file path")
    .option("-p, --port <port>", "Port to listen on", parsePort)
    .action(async (options: { config?: string; port?: number }) => {
      try {
        await runGateway(options);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Gateway failed");
        process.exit(1);
      }
    });

  return program;
}
