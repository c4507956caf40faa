/**
 * Skills loader for agent capabilities.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "fs";
import { basename, join } from "path";
import matter from "gray-matter";
import { z } from "zod";
import { parseToolDescriptor, type ToolDescriptor } from "./tool-descriptor.js";
import { errorMessage } from "../core/errors.js";
import { binOnPath } from "../utils/paths.js";
import logger from "../utils/logger.js";

/**
 * Where a skill was found. Later sources override earlier ones by name.
 */
export type SkillSource = "extra" | "bundled" | "primary";

/**
 * A loaded skill.
 */
export interface Skill {
  name: string;
  description: string;
  /** Raw SKILL.md content, frontmatter included */
  content: string;
  /** Skill directory (holds SKILL.md, tools.json and scripts/) */
  dir: string;
  source: SkillSource;
  /** Parsed tools.json, when present and valid */
  descriptor?: ToolDescriptor;
}

export interface SkillRoot {
  dir: string;
  source: SkillSource;
}

/**
 * Skill frontmatter. Only the fields the gateway reads are declared.
 */
const SkillFrontmatterSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    metadata: z
      .object({
        requires: z
          .object({
            bins: z.array(z.string()).optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

interface ParsedFrontmatter {
  name: string;
  description: string;
  requiredBins: string[];
}

/**
 * Read name, description and required binaries from SKILL.md frontmatter.
 * Unparsable frontmatter falls back to the directory name.
 */
export function parseSkillFrontmatter(content: string, fallbackName: string): ParsedFrontmatter {
  const fallback: ParsedFrontmatter = { name: fallbackName, description: "", requiredBins: [] };
  if (!content.startsWith("---")) {
    return fallback;
  }

  let data: unknown;
  try {
    data = matter(content).data;
  } catch (error) {
    logger.debug({ skill: fallbackName, error: errorMessage(error) }, "Unparsable skill frontmatter");
    return fallback;
  }

  const result = SkillFrontmatterSchema.safeParse(data);
  if (!result.success) {
    return fallback;
  }

  return {
    name: result.data.name ?? fallbackName,
    description: result.data.description ?? "",
    requiredBins: result.data.metadata?.requires?.bins ?? [],
  };
}

/**
 * Remove leading YAML frontmatter blocks, including duplicated ones.
 */
export function stripFrontmatter(content: string): string {
  const trimmed = content.trimStart();
  if (!trimmed.startsWith("---")) {
    return trimmed;
  }

  const rest = trimmed.slice(3).trimStart();
  const end = rest.indexOf("\n---");
  if (end === -1) {
    return rest;
  }

  const after = rest.slice(end + 4).trimStart();
  return after.startsWith("---") ? stripFrontmatter(after) : after;
}

/**
 * Loader for agent skills.
 *
 * Skills are directories containing a SKILL.md (YAML frontmatter + markdown)
 * and optionally a tools.json descriptor. A skill listing binaries under
 * `metadata.requires.bins` is only loaded when all of them are on PATH.
 */
export class SkillsLoader {
  private roots: SkillRoot[];

  /**
   * @param roots skill roots, lowest precedence first
   */
  constructor(roots: SkillRoot[]) {
    this.roots = roots;
  }

  /**
   * Load all skills, later roots overriding earlier ones by name.
   */
  loadAll(): Skill[] {
    const merged = new Map<string, Skill>();
    for (const root of this.roots) {
      for (const skill of this.loadFromDir(root)) {
        merged.set(skill.name, skill);
      }
    }
    return Array.from(merged.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Load skills whose names are listed in `enabled`, in load order.
   */
  loadEnabled(enabled: string[]): Skill[] {
    const wanted = new Set(enabled);
    return this.loadAll().filter((skill) => wanted.has(skill.name));
  }

  /**
   * Load the skills of one root. A missing root yields nothing.
   */
  loadFromDir(root: SkillRoot): Skill[] {
    if (!existsSync(root.dir)) {
      return [];
    }

    const skills: Skill[] = [];
    for (const entry of readdirSync(root.dir).sort()) {
      const skillDir = join(root.dir, entry);
      if (!isDirectory(skillDir)) {
        continue;
      }

      const skillFile = join(skillDir, "SKILL.md");
      if (!existsSync(skillFile)) {
        continue;
      }

      let content: string;
      try {
        content = readFileSync(skillFile, "utf-8");
      } catch (error) {
        logger.warn({ skillFile, error: errorMessage(error) }, "Unreadable SKILL.md, skipping");
        continue;
      }

      const { name, description, requiredBins } = parseSkillFrontmatter(content, basename(skillDir));
      const missing = requiredBins.filter((bin) => !binOnPath(bin));
      if (missing.length > 0) {
        logger.debug({ skill: name, missing }, "Skipping skill, required bins not on PATH");
        continue;
      }

      skills.push({
        name,
        description,
        content,
        dir: skillDir,
        source: root.source,
        descriptor: this.loadDescriptor(name, skillDir),
      });
    }

    return skills;
  }

  private loadDescriptor(skillName: string, skillDir: string): ToolDescriptor | undefined {
    const descriptorFile = join(skillDir, "tools.json");
    if (!existsSync(descriptorFile)) {
      return undefined;
    }

    try {
      return parseToolDescriptor(readFileSync(descriptorFile, "utf-8"));
    } catch (error) {
      logger.warn({ skill: skillName, error: errorMessage(error) }, "Invalid tools.json, loading skill without tools");
      return undefined;
    }
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
