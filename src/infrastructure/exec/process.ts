/**
 * Run a program with an argument vector. Never goes through a shell.
 */

import { spawn } from "child_process";

export interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export const DEFAULT_EXEC_TIMEOUT_MS = 60000;

/**
 * Spawn `program args...` and collect its output. Rejects when the process
 * cannot be started or exceeds the timeout.
 */
export function runProcess(program: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const stdoutParts: Buffer[] = [];
    const stderrParts: Buffer[] = [];
    let settled = false;

    const child = spawn(program, args, {
      shell: false,
      cwd: options.cwd,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const timeout = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      reject(new Error(`timed out after ${timeoutMs / 1000} seconds`));
    }, timeoutMs);

    child.stdout.on("data", (data: Buffer) => {
      stdoutParts.push(data);
    });

    child.stderr.on("data", (data: Buffer) => {
      stderrParts.push(data);
    });

    child.on("error", (error) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;
      reject(error);
    });

    child.on("close", (code, signal) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;
      resolve({
        code,
        signal,
        stdout: Buffer.concat(stdoutParts).toString("utf-8"),
        stderr: Buffer.concat(stderrParts).toString("utf-8"),
      });
    });
  });
}

/**
 * "exit <status>: <stdout>\n<stderr>" for a failed process.
 */
export function describeFailure(result: ProcessResult): string {
  const status = result.code !== null ? String(result.code) : `signal ${result.signal ?? "unknown"}`;
  let output = result.stdout;
  if (result.stderr.length > 0) {
    if (output.length > 0) {
      output += "\n";
    }
    output += result.stderr;
  }
  return `exit ${status}: ${output}`;
}
