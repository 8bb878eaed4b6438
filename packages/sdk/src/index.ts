/**
 * Sparse Matrix SDK
 *
 * Sparse storage, a line-oriented text codec and add/subtract/multiply
 */

// Re-export types
export type {
  MatrixShape,
  Entry,
  ValueType,
  DimensionPolicy,
  Result,
  ParseOptions,
  MultiplyOptions,
  ArithmeticOptions,
} from "./types.js";

export { SparseMatrix } from "./matrix.js";
export { add, subtract, multiply } from "./arithmetic.js";
export { parseMatrix, serializeMatrix } from "./codec.js";
export { ok, err, unwrap } from "./result.js";

// Re-export I/O operations
export type { LoadOptions } from "./io.js";
export { loadMatrix, saveMatrix, atomicWrite } from "./io.js";

// Re-export errors
export type { IOOperation } from "./errors.js";
export {
  SparseMatrixError,
  FormatError,
  IOError,
  DimensionMismatchError,
  IndexOutOfBoundsError,
  ValueRangeError,
} from "./errors.js";

export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export { logger } from "./observability/logs.js";
