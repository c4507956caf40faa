import { describe, it, expect, beforeEach } from "vitest";
import { ToolRegistry, normalizeArguments } from "../../../src/tools/registry.js";
import { ReadSkillTool, READ_SKILL_TOOL_NAME } from "../../../src/tools/read-skill.js";
import { Tool } from "../../../src/tools/base.js";
import type { ToolParametersSchema } from "../../../src/core/types/tool.js";
import type { Skill } from "../../../src/application/skills-loader.js";
import { ToolExecutionError } from "../../../src/core/errors.js";

class EchoTool extends Tool {
  readonly name = "echo";
  readonly description = "Echo the text parameter";
  readonly parameters: ToolParametersSchema = {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
  };

  async execute(params: Record<string, unknown>): Promise<string> {
    if (typeof params.text !== "string") {
      throw new ToolExecutionError("missing text");
    }
    return params.text;
  }
}

describe("normalizeArguments", () => {
  it("accepts objects and JSON strings", () => {
    expect(normalizeArguments({ a: 1 })).toEqual({ a: 1 });
    expect(normalizeArguments('{"a":1}')).toEqual({ a: 1 });
    expect(normalizeArguments("")).toEqual({});
    expect(normalizeArguments(null)).toEqual({});
    expect(normalizeArguments(undefined)).toEqual({});
  });

  it("rejects anything else", () => {
    expect(() => normalizeArguments([1])).toThrow("arguments must be an object");
    expect(() => normalizeArguments(3)).toThrow("arguments must be an object");
    expect(() => normalizeArguments("[1]")).toThrow("arguments must be an object");
    expect(() => normalizeArguments("{oops")).toThrow("arguments must be an object");
  });
});

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    registry.register(new EchoTool());
  });

  it("tracks registered tools", () => {
    expect(registry.has("echo")).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.toolNames).toEqual(["echo"]);

    registry.unregister("echo");
    expect(registry.size).toBe(0);
    expect(registry.get("echo")).toBeUndefined();
  });

  it("exposes definitions without an execute function", () => {
    const definitions = registry.getDefinitions();
    expect(Object.keys(definitions)).toEqual(["echo"]);
    expect(definitions.echo?.description).toBe("Echo the text parameter");
    expect(definitions.echo && "execute" in definitions.echo).toBe(false);
  });

  it("executes by name", async () => {
    await expect(registry.execute("echo", { text: "hi" })).resolves.toBe("hi");
    await expect(registry.execute("echo", '{"text":"from json"}')).resolves.toBe("from json");
  });

  it("returns failures as error results", async () => {
    await expect(registry.execute("nope", {})).resolves.toBe("error: unknown tool: nope");
    await expect(registry.execute("echo", {})).resolves.toBe("error: missing text");
    await expect(registry.execute("echo", "[]")).resolves.toBe("error: arguments must be an object");
  });
});

describe("ReadSkillTool", () => {
  const skills: Skill[] = [
    {
      name: "notes",
      description: "Notes",
      content: "---\nname: notes\n---\n# Notes\n\nUse notesmd.",
      dir: "/skills/notes",
      source: "bundled",
    },
  ];

  it("returns the skill body without frontmatter", async () => {
    const tool = new ReadSkillTool(skills);
    expect(tool.name).toBe(READ_SKILL_TOOL_NAME);
    await expect(tool.execute({ skill_name: "notes" })).resolves.toBe("# Notes\n\nUse notesmd.");
  });

  it("reports a missing or unknown skill", async () => {
    const tool = new ReadSkillTool(skills);
    await expect(tool.execute({})).rejects.toThrow("missing skill_name");
    await expect(tool.execute({ skill_name: "weather" })).rejects.toThrow("unknown skill: weather");
  });
});
