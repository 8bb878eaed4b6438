/**
 * Core types for sparse matrices
 */

/**
 * Row and column counts of a matrix
 */
export interface MatrixShape {
  rows: number;
  cols: number;
}

/**
 * A single stored (row, col, value) triple
 */
export interface Entry {
  row: number;
  col: number;
  value: number;
}

/**
 * Numeric type used when reading entry values
 * - integer: signed integer literals only
 * - float: integer, decimal and exponent literals
 */
export type ValueType = "integer" | "float";

/**
 * How add/subtract treat operands of different shapes
 * - strict: fail with DimensionMismatchError
 * - lenient: use the left operand's shape, ignore right entries outside it
 */
export type DimensionPolicy = "strict" | "lenient";

/**
 * Outcome of a fallible operation
 */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface ParseOptions {
  /** Numeric type for entry values (default: "integer") */
  values?: ValueType;
  /** Name reported in format errors (default: "<input>") */
  source?: string;
}

export interface MultiplyOptions {
  /** Store positions whose result is exactly zero (default: false) */
  keepZeros?: boolean;
  /** Numeric type results must stay representable in (default: "integer") */
  values?: ValueType;
}

export interface ArithmeticOptions extends MultiplyOptions {
  /** Shape handling for add/subtract (default: "strict") */
  dimensions?: DimensionPolicy;
}
