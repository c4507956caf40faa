/**
 * Exec infrastructure exports.
 */

export { Allowlist } from "./allowlist.js";
export { runProcess, describeFailure, DEFAULT_EXEC_TIMEOUT_MS, type ProcessResult, type RunOptions } from "./process.js";
