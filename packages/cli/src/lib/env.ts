/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import type { ValueType } from "@sparsemat/sdk";
import { CliError } from "./errors.js";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve a matrix file path to an absolute path
 */
export function resolveMatrixPath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Resolve the numeric type used when reading matrix files
 * Priority: --float flag > SPARSEMAT_VALUES env var > "integer"
 */
export function resolveValueType(floatFlag?: boolean): ValueType {
  if (floatFlag) {
    return "float";
  }

  const fromEnv = process.env.SPARSEMAT_VALUES?.trim();
  if (!fromEnv) {
    return "integer";
  }
  if (fromEnv === "integer" || fromEnv === "float") {
    return fromEnv;
  }
  throw new CliError(`SPARSEMAT_VALUES must be "integer" or "float", got "${fromEnv}"`);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SPARSEMAT_CLI_DEBUG === "1";
}
