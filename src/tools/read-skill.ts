/**
 * Built-in tool that returns a skill's documentation on request.
 */

import { Tool } from "./base.js";
import type { ToolParametersSchema } from "../core/types/tool.js";
import { stripFrontmatter, type Skill } from "../application/skills-loader.js";
import { ToolExecutionError } from "../core/errors.js";

export const READ_SKILL_TOOL_NAME = "read_skill";

/**
 * Loads the body of a SKILL.md. Registered only in readOnDemand mode,
 * where the system context lists skills without their documentation.
 */
export class ReadSkillTool extends Tool {
  readonly name = READ_SKILL_TOOL_NAME;
  readonly description =
    "Load the full documentation (SKILL.md) for a skill. Call when the user's request clearly applies to that skill and you need the full instructions and tool usage details.";
  readonly parameters: ToolParametersSchema = {
    type: "object",
    required: ["skill_name"],
    properties: {
      skill_name: {
        type: "string",
        description: "Name of the skill. Use the exact name from the available skills list.",
      },
    },
  };

  private skills: Map<string, Skill>;

  constructor(skills: Skill[]) {
    super();
    this.skills = new Map(skills.map((skill) => [skill.name, skill]));
  }

  async execute(params: Record<string, unknown>): Promise<string> {
    const skillName = params.skill_name;
    if (typeof skillName !== "string") {
      throw new ToolExecutionError("missing skill_name");
    }

    const skill = this.skills.get(skillName);
    if (!skill) {
      throw new ToolExecutionError(`unknown skill: ${skillName}`);
    }
    return stripFrontmatter(skill.content);
  }
}
