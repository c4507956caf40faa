/**
 * Skill tool descriptor (`tools.json`) schema.
 *
 * A descriptor declares the tools a skill offers to the model, which
 * binaries and subcommands may run, and how each tool's parameters map
 * onto an argument vector.
 */

import { z } from "zod";
import type { ToolParametersSchema } from "../core/types/tool.js";

const JsonSchemaObject = z.custom<ToolParametersSchema>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { message: "parameters must be a JSON schema object" },
);

export const ToolSpecSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: JsonSchemaObject.default({ type: "object", properties: {} }),
  })
  .strict();

export const ResolveCommandSchema = z
  .object({
    script: z.string().optional(),
    binary: z.string().optional(),
    subcommand: z.string().optional(),
    args: z.array(z.string()).default([]),
  })
  .strict();

export const ArgKindSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.toLowerCase() : value),
  z.enum(["positional", "flag", "flagifboolean"]),
);

export const ArgMappingSchema = z
  .object({
    param: z.string().min(1),
    kind: ArgKindSchema.default("positional"),
    flag: z.string().optional(),
    flagIfTrue: z.string().optional(),
    flagIfFalse: z.string().optional(),
    normalizeNewlines: z.boolean().optional(),
    resolveCommand: ResolveCommandSchema.optional(),
  })
  .strict();

export const ExecutionSpecSchema = z
  .object({
    tool: z.string().min(1),
    binary: z.string().min(1),
    subcommand: z.string(),
    args: z.array(ArgMappingSchema).default([]),
  })
  .strict();

export const ToolDescriptorSchema = z
  .object({
    tools: z.array(ToolSpecSchema).default([]),
    allowlist: z.record(z.array(z.string())).default({}),
    execution: z.array(ExecutionSpecSchema).default([]),
  })
  .strict();

export type ToolSpec = z.infer<typeof ToolSpecSchema>;
export type ResolveCommand = z.infer<typeof ResolveCommandSchema>;
export type ArgKind = z.infer<typeof ArgKindSchema>;
export type ArgMapping = z.infer<typeof ArgMappingSchema>;
export type ExecutionSpec = z.infer<typeof ExecutionSpecSchema>;
export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;

/**
 * Parse a descriptor from JSON text. Throws with the first problem found.
 */
export function parseToolDescriptor(raw: string): ToolDescriptor {
  const data: unknown = JSON.parse(raw);
  const result = ToolDescriptorSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new Error(`invalid tool descriptor: ${where}${issue ? issue.message : "unknown error"}`);
  }
  return result.data;
}
