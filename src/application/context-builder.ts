/**
 * Context builder for assembling the system context of a turn.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import type { AssistantContent, CoreMessage } from "ai";
import type { SessionMessage } from "../core/types/session.js";
import { stripFrontmatter, type Skill } from "./skills-loader.js";
import type { ContextMode } from "../infrastructure/config/schema.js";
import { todayDate } from "../utils/paths.js";

const AGENT_CONTEXT_FILE = "AGENTS.md";

/**
 * Read AGENTS.md from the workspace. Blank or missing files yield undefined.
 */
export function loadAgentContext(workspace: string): string | undefined {
  const filePath = join(workspace, AGENT_CONTEXT_FILE);
  if (!existsSync(filePath)) {
    return undefined;
  }
  const content = readFileSync(filePath, "utf-8");
  return content.trim() === "" ? undefined : content;
}

/**
 * Every skill's full documentation.
 */
export function buildFullSkillContext(skills: Skill[]): string {
  if (skills.length === 0) {
    return "";
  }

  let out = "You have access to the following tools:\n\n";
  for (const skill of skills) {
    out += `- **${skill.name}:** `;
    if (skill.description !== "") {
      out += `${skill.description}\n\n`;
    }
    out += `${stripFrontmatter(skill.content)}\n\n`;
  }
  return out;
}

/**
 * Names and descriptions only; the model loads documentation with read_skill.
 */
export function buildCompactSkillContext(skills: Skill[]): string {
  if (skills.length === 0) {
    return "";
  }

  let out =
    "You have access to the following tools. Use the read_skill tool to load a skill's full documentation when it clearly applies to the user's request.\n\n";
  out += "## Available tools\n\n";
  for (const skill of skills) {
    const description = skill.description.trim() === "" ? "(no description)" : skill.description.trim();
    out += `- **${skill.name}**: ${description}\n`;
  }
  return out;
}

export interface ContextBuilderOptions {
  workspace: string;
  skills: Skill[];
  contextMode: ContextMode;
  /** Clock used for the date line */
  now?: () => Date;
}

/**
 * Builds the system context: today's date, the workspace AGENTS.md and the
 * skill documentation. AGENTS.md is re-read on every turn so edits apply
 * without a restart.
 */
export class ContextBuilder {
  readonly workspace: string;
  readonly skills: Skill[];
  readonly contextMode: ContextMode;
  private now: () => Date;
  private skillContext: string;

  constructor(options: ContextBuilderOptions) {
    this.workspace = options.workspace;
    this.skills = options.skills;
    this.contextMode = options.contextMode;
    this.now = options.now ?? (() => new Date());
    this.skillContext =
      this.contextMode === "readOnDemand"
        ? buildCompactSkillContext(this.skills)
        : buildFullSkillContext(this.skills);
  }

  get date(): string {
    return todayDate(this.now());
  }

  get agentContext(): string | undefined {
    return loadAgentContext(this.workspace);
  }

  /**
   * Skill section of the system context (empty without skills).
   */
  get skillsContext(): string {
    return this.skillContext;
  }

  /**
   * Build the system context for a turn.
   */
  buildSystemContext(): string {
    let out = `Today's date: ${this.date}\n\n`;

    const agentContext = this.agentContext?.trim();
    if (agentContext) {
      out += `${agentContext}\n\n`;
    }

    if (this.skillContext.trim() !== "") {
      out += this.skillContext;
    }
    return out;
  }
}

/**
 * Convert session history to model messages, with the system context first
 * when it is not blank.
 *
 * Tool calls that never received a result (the loop stopped at its bound)
 * are dropped, since model servers reject unanswered calls.
 */
export function buildMessages(systemContext: string | undefined, history: SessionMessage[]): CoreMessage[] {
  const messages: CoreMessage[] = [];
  if (systemContext !== undefined && systemContext.trim() !== "") {
    messages.push({ role: "system", content: systemContext });
  }

  const answered = new Set<string>();
  for (const msg of history) {
    if (msg.role === "tool" && msg.toolCallId !== undefined) {
      answered.add(msg.toolCallId);
    }
  }

  for (const msg of history) {
    switch (msg.role) {
      case "system":
        messages.push({ role: "system", content: msg.content });
        break;
      case "user":
        messages.push({ role: "user", content: msg.content });
        break;
      case "assistant": {
        const calls = (msg.toolCalls ?? []).filter((call) => answered.has(call.id));
        if (calls.length === 0) {
          messages.push({ role: "assistant", content: msg.content });
          break;
        }
        const content: Exclude<AssistantContent, string> = [];
        if (msg.content !== "") {
          content.push({ type: "text", text: msg.content });
        }
        for (const call of calls) {
          content.push({ type: "tool-call", toolCallId: call.id, toolName: call.name, args: call.arguments });
        }
        messages.push({ role: "assistant", content });
        break;
      }
      case "tool":
        if (msg.toolCallId === undefined) {
          messages.push({ role: "user", content: `[Tool result] ${msg.content}` });
          break;
        }
        messages.push({
          role: "tool",
          content: [
            {
              type: "tool-result",
              toolCallId: msg.toolCallId,
              toolName: msg.toolName ?? "",
              result: msg.content,
            },
          ],
        });
        break;
    }
  }

  return messages;
}
