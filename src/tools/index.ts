/**
 * Tools module - tool implementations and registry.
 */

export { Tool, isRecord } from "./base.js";
export { ToolRegistry, normalizeArguments } from "./registry.js";
export { ReadSkillTool, READ_SKILL_TOOL_NAME } from "./read-skill.js";
export {
  SkillCommandTool,
  createSkillTools,
  buildArgv,
  resolveValue,
  runSkillScript,
  parseBool,
  normalizeNewlines,
  type ArgvContext,
} from "./skill-command.js";
