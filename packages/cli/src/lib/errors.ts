/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { DimensionMismatchError, FormatError, IOError, ValueRangeError } from "@sparsemat/sdk";

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
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/unknown error
 * - 2: matrix file could not be read or written
 * - 3: matrix file has wrong format
 * - 4: operand dimensions do not match
 * - 5: result value cannot be represented exactly
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // CliError and commander errors carry their own exit code
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof IOError) {
    return 2;
  }

  if (error instanceof FormatError) {
    return 3;
  }

  if (error instanceof DimensionMismatchError) {
    return 4;
  }

  if (error instanceof ValueRangeError) {
    return 5;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
