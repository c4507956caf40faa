/**
 * Error taxonomy for the gateway.
 */

export type ErrorKind = "config" | "auth" | "backend" | "tool" | "session";

export class ChaiError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "ChaiError";
    this.kind = kind;
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigError extends ChaiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "config", options);
    this.name = "ConfigError";
  }
}

/**
 * Rejected gateway connect (token missing or mismatched).
 */
export class AuthError extends ChaiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "auth", options);
    this.name = "AuthError";
  }
}

/**
 * Model server unreachable or returned something unusable.
 */
export class BackendError extends ChaiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "backend", options);
    this.name = "BackendError";
  }
}

/**
 * A tool call could not be carried out. The message is fed back to the model.
 */
export class ToolExecutionError extends ChaiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "tool", options);
    this.name = "ToolExecutionError";
  }
}

export class SessionError extends ChaiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "session", options);
    this.name = "SessionError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
