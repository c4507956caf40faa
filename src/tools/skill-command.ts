/**
 * Tools declared by a skill's tools.json, run through the allowlist.
 */

import { existsSync, statSync } from "fs";
import { join } from "path";
import { Tool } from "./base.js";
import type { ToolParametersSchema } from "../core/types/tool.js";
import type { ArgMapping, ExecutionSpec, ToolSpec } from "../application/tool-descriptor.js";
import type { Skill } from "../application/skills-loader.js";
import {
  Allowlist,
  describeFailure,
  runProcess,
  type ProcessResult,
  type RunOptions,
} from "../infrastructure/exec/index.js";
import { ToolExecutionError, errorMessage } from "../core/errors.js";
import logger from "../utils/logger.js";

export interface ArgvContext {
  allowlist: Allowlist;
  /** Skill directory; scripts are looked up in its scripts/ folder */
  skillDir?: string;
  allowScripts: boolean;
  runOptions?: RunOptions;
}

/**
 * Literal `\n` and `\t` sequences become a newline and a tab.
 */
export function normalizeNewlines(value: string): string {
  return value.replaceAll("\\n", "\n").replaceAll("\\t", "\t");
}

function scalarToString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/**
 * true, "true" in any case, or a non-zero integer.
 */
export function parseBool(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.toLowerCase() === "true";
  if (typeof value === "number") return Number.isInteger(value) && value !== 0;
  return false;
}

function useOutput(output: string, original: string): string {
  const trimmed = output.trim();
  return trimmed === "" ? original : trimmed;
}

/**
 * Run `sh <skillDir>/scripts/<name>[.sh] args...` and return its stdout.
 */
export async function runSkillScript(
  skillDir: string,
  scriptName: string,
  args: string[],
  runOptions: RunOptions = {},
): Promise<string> {
  if (scriptName.includes("..") || scriptName.includes("/") || scriptName.includes("\\")) {
    throw new ToolExecutionError("invalid script name");
  }

  const scriptsDir = join(skillDir, "scripts");
  let scriptPath = join(scriptsDir, scriptName);
  if (!isFile(scriptPath)) {
    scriptPath = join(scriptsDir, `${scriptName.replace(/\.[^.]*$/, "")}.sh`);
    if (!isFile(scriptPath)) {
      throw new ToolExecutionError("script not found");
    }
  }

  let result: ProcessResult;
  try {
    result = await runProcess("sh", [scriptPath, ...args], runOptions);
  } catch (error) {
    throw new ToolExecutionError(`exec failed: ${errorMessage(error)}`, { cause: error });
  }
  if (result.code !== 0) {
    throw new ToolExecutionError(describeFailure({ ...result, stdout: "" }));
  }
  return result.stdout;
}

/**
 * Replace a value with the output of its resolveCommand. Any failure, or
 * empty output, keeps the value as it was.
 */
export async function resolveValue(value: string, mapping: ArgMapping, context: ArgvContext): Promise<string> {
  const command = mapping.resolveCommand;
  if (!command) {
    return value;
  }

  const args = command.args.map((arg) => arg.replaceAll("$param", value));

  if (context.allowScripts && context.skillDir && command.script) {
    try {
      return useOutput(await runSkillScript(context.skillDir, command.script, args, context.runOptions), value);
    } catch (error) {
      logger.debug({ script: command.script, error: errorMessage(error) }, "Value resolution script failed");
      return value;
    }
  }

  if (command.binary && command.subcommand) {
    try {
      return useOutput(await context.allowlist.run(command.binary, command.subcommand, args), value);
    } catch (error) {
      logger.debug({ binary: command.binary, error: errorMessage(error) }, "Value resolution command failed");
      return value;
    }
  }

  return value;
}

async function transformValue(value: string, mapping: ArgMapping, context: ArgvContext): Promise<string> {
  const normalized = mapping.normalizeNewlines ? normalizeNewlines(value) : value;
  return resolveValue(normalized, mapping, context);
}

/**
 * Build the argument vector (after the subcommand) from a tool call's arguments.
 */
export async function buildArgv(
  spec: ExecutionSpec,
  params: Record<string, unknown>,
  context: ArgvContext,
): Promise<string[]> {
  const argv: string[] = [];

  for (const mapping of spec.args) {
    const raw = params[mapping.param];

    switch (mapping.kind) {
      case "positional": {
        if (raw === undefined) {
          throw new ToolExecutionError(`missing parameter: ${mapping.param}`);
        }
        const value = scalarToString(raw);
        if (value === undefined) {
          throw new ToolExecutionError(`parameter ${mapping.param} must be a string, number, or boolean`);
        }
        argv.push(await transformValue(value, mapping, context));
        break;
      }
      case "flag": {
        if (raw === undefined || raw === null) {
          break;
        }
        const value = scalarToString(raw);
        if (value === undefined) {
          throw new ToolExecutionError(`parameter ${mapping.param} must be a string, number, or boolean`);
        }
        argv.push(`--${mapping.flag ?? mapping.param}`);
        argv.push(await transformValue(value, mapping, context));
        break;
      }
      case "flagifboolean": {
        const flag = parseBool(raw) ? mapping.flagIfTrue : mapping.flagIfFalse;
        if (flag !== undefined) {
          argv.push(flag);
        }
        break;
      }
    }
  }

  return argv;
}

/**
 * A model-facing tool backed by one execution entry of a descriptor.
 */
export class SkillCommandTool extends Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParametersSchema;

  private execution: ExecutionSpec;
  private context: ArgvContext;

  constructor(spec: ToolSpec, execution: ExecutionSpec, context: ArgvContext) {
    super();
    this.name = spec.name;
    this.description = spec.description ?? "";
    this.parameters = spec.parameters;
    this.execution = execution;
    this.context = context;
  }

  async execute(params: Record<string, unknown>): Promise<string> {
    const argv = await buildArgv(this.execution, params, this.context);
    return this.context.allowlist.run(this.execution.binary, this.execution.subcommand, argv);
  }
}

/**
 * Create the tools declared by the skills' descriptors. Each skill gets its
 * own allowlist, so one skill cannot run another skill's binaries.
 */
export function createSkillTools(
  skills: Skill[],
  options: { allowScripts: boolean; runOptions?: RunOptions },
): SkillCommandTool[] {
  const tools: SkillCommandTool[] = [];

  for (const skill of skills) {
    const descriptor = skill.descriptor;
    if (!descriptor) continue;

    const allowlist = new Allowlist(descriptor.allowlist, options.runOptions);
    const context: ArgvContext = {
      allowlist,
      skillDir: skill.dir,
      allowScripts: options.allowScripts,
      runOptions: options.runOptions,
    };

    for (const spec of descriptor.tools) {
      const execution = descriptor.execution.find((entry) => entry.tool === spec.name);
      if (!execution) {
        logger.warn({ skill: skill.name, tool: spec.name }, "Tool has no execution entry, skipping");
        continue;
      }
      tools.push(new SkillCommandTool(spec, execution, context));
    }
  }

  return tools;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}
