/**
 * Matrix loading and saving for CLI commands
 * Thin wrappers that turn SDK results into thrown errors
 */

import { loadMatrix, saveMatrix, unwrap } from "@sparsemat/sdk";
import type { SparseMatrix, ValueType } from "@sparsemat/sdk";
import { resolveMatrixPath } from "./env.js";

/**
 * Load a matrix file, throwing IOError or FormatError on failure
 */
export async function readMatrixFile(file: string, values: ValueType): Promise<SparseMatrix> {
  return unwrap(await loadMatrix(resolveMatrixPath(file), { values }));
}

/**
 * Save a matrix file, throwing IOError on failure
 * @returns Absolute path written
 */
export async function writeMatrixFile(file: string, matrix: SparseMatrix): Promise<string> {
  const target = resolveMatrixPath(file);
  unwrap(await saveMatrix(target, matrix));
  return target;
}
