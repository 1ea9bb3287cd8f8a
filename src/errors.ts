/**
 * Errors - Failure kinds and their process exit codes
 */

import { constants } from "os";

export type EnvkitErrorCode = "USAGE" | "NOT_FOUND" | "EXTERNAL_TOOL" | "INTERRUPTED";

export class EnvkitError extends Error {
  constructor(
    message: string,
    public readonly code: EnvkitErrorCode,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = "EnvkitError";
  }
}

/**
 * Required argument missing
 */
export class UsageError extends EnvkitError {
  constructor(message: string) {
    super(message, "USAGE", 1);
    this.name = "UsageError";
  }
}

/**
 * Definition file absent
 */
export class NotFoundError extends EnvkitError {
  constructor(public readonly path: string) {
    super(`Environment file not found: ${path}`, "NOT_FOUND", 1);
    this.name = "NotFoundError";
  }
}

/**
 * Package manager exited non-zero; its status becomes ours
 */
export class ExternalToolError extends EnvkitError {
  constructor(
    public readonly command: string,
    public readonly status: number,
    message: string = `Command "${command}" failed with exit code ${status}`
  ) {
    super(message, "EXTERNAL_TOOL", status);
    this.name = "ExternalToolError";
  }
}

/**
 * Operator pressed Ctrl-C at a prompt; exits like a shell killed by SIGINT
 */
export class InterruptedError extends EnvkitError {
  constructor() {
    super("Interrupted", "INTERRUPTED", 128 + constants.signals.SIGINT);
    this.name = "InterruptedError";
  }
}

/**
 * Map any thrown value to a process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof EnvkitError) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Message to show for a thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print a failure the way every command handler does and return its exit code
 */
export function reportFailure(error: unknown): number {
  if (error instanceof InterruptedError) {
    // The terminal already shows the interrupt
  } else if (error instanceof UsageError) {
    console.error(error.message);
  } else {
    console.error(`❌ ${errorMessage(error)}`);
  }
  return exitCodeFor(error);
}
