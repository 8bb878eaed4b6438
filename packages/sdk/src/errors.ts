/**
 * Error types for sparse matrix operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - I/O errors include the target path in the message
 */

import type { MatrixShape, ValueType } from "./types.js";

/**
 * Base class for all sparse matrix errors
 */
export abstract class SparseMatrixError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when matrix text cannot be parsed
 */
export class FormatError extends SparseMatrixError {
  readonly code = "E_FORMAT";

  constructor(
    public readonly source: string,
    public readonly reason: string,
    public readonly line?: number,
    options?: ErrorOptions
  ) {
    const location = line === undefined ? source : `${source}:${line}`;
    super(`Input has wrong format (${location}): ${reason}`, options);
  }
}

export type IOOperation = "read" | "write";

/**
 * Thrown when a matrix file cannot be read or written
 */
export class IOError extends SparseMatrixError {
  readonly code = "E_IO";

  constructor(
    public readonly operation: IOOperation,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to ${operation} matrix: ${path}`, options);
  }
}

/**
 * Thrown when operand shapes make an operation undefined
 */
export class DimensionMismatchError extends SparseMatrixError {
  readonly code = "E_DIMENSION";

  constructor(
    public readonly operation: string,
    public readonly left: MatrixShape,
    public readonly right: MatrixShape,
    options?: ErrorOptions
  ) {
    super(
      `Cannot ${operation} ${left.rows}x${left.cols} and ${right.rows}x${right.cols} matrices`,
      options
    );
  }
}

/**
 * Thrown when an element is written outside the declared shape
 */
export class IndexOutOfBoundsError extends SparseMatrixError {
  readonly code = "E_BOUNDS";

  constructor(
    public readonly row: number,
    public readonly col: number,
    public readonly shape: MatrixShape,
    options?: ErrorOptions
  ) {
    super(`Index (${row}, ${col}) is outside a ${shape.rows}x${shape.cols} matrix`, options);
  }
}

/**
 * Thrown when an arithmetic result cannot be represented exactly
 * (outside the safe integer range, or not finite)
 */
export class ValueRangeError extends SparseMatrixError {
  readonly code = "E_RANGE";

  constructor(
    public readonly operation: string,
    public readonly row: number,
    public readonly col: number,
    public readonly values: ValueType,
    options?: ErrorOptions
  ) {
    const limit = values === "integer" ? "is outside the safe integer range" : "is not a finite number";
    super(`Cannot ${operation}: result at (${row}, ${col}) ${limit}`, options);
  }
}
