/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { SequenceError } from "@wrinkle-list/core";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/argument/unknown error
 * - 2: sequences diverged during verification
 * - 3: a sequence operation failed
 */
export function mapErrorToExitCode(error: unknown): number {
  // CliError and commander errors carry their own exit code
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof SequenceError) {
    return 3;
  }

  // Default to exit code 1 for unknown errors
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Keep one error to a screenful
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
