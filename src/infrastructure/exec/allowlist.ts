/**
 * Allowlisted command execution.
 */

import { ToolExecutionError, errorMessage } from "../../core/errors.js";
import { describeFailure, runProcess, type ProcessResult, type RunOptions } from "./process.js";

/**
 * Maps each permitted binary to the subcommands it may be invoked with.
 * Only `binary subcommand args...` for a listed pair is ever executed.
 */
export class Allowlist {
  private bins: Map<string, Set<string>> = new Map();

  constructor(entries: Record<string, string[]> = {}, private readonly runOptions: RunOptions = {}) {
    for (const [binary, subcommands] of Object.entries(entries)) {
      this.allow(binary, subcommands);
    }
  }

  /**
   * Permit subcommands of a binary, adding to any already permitted.
   */
  allow(binary: string, subcommands: string[]): void {
    const existing = this.bins.get(binary) ?? new Set<string>();
    for (const subcommand of subcommands) {
      existing.add(subcommand);
    }
    this.bins.set(binary, existing);
  }

  isAllowed(binary: string, subcommand: string): boolean {
    return this.bins.get(binary)?.has(subcommand) ?? false;
  }

  /**
   * Run an allowlisted command and return its stdout.
   * Throws ToolExecutionError when not permitted, not startable, or on non-zero exit.
   */
  async run(binary: string, subcommand: string, args: string[]): Promise<string> {
    const allowed = this.bins.get(binary);
    if (!allowed) {
      throw new ToolExecutionError(`binary not allowlisted: ${binary}`);
    }
    if (!allowed.has(subcommand)) {
      throw new ToolExecutionError(`subcommand not allowlisted: ${binary} ${subcommand}`);
    }

    let result: ProcessResult;
    try {
      result = await runProcess(binary, [subcommand, ...args], this.runOptions);
    } catch (error) {
      throw new ToolExecutionError(`exec failed: ${errorMessage(error)}`, { cause: error });
    }

    if (result.code !== 0) {
      throw new ToolExecutionError(describeFailure(result));
    }
    return result.stdout;
  }
}
