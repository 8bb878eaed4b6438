/**
 * Sparse matrix arithmetic
 *
 * Invariants:
 * - Operands are never mutated; every operation returns a new matrix
 * - Work is proportional to stored entries, never to rows x cols
 * - Exactly-zero results are omitted unless keepZeros is set
 * - Integer results stay inside the safe integer range, float results stay finite
 */

import { DimensionMismatchError, ValueRangeError } from "./errors.js";
import { SparseMatrix } from "./matrix.js";
import { logger } from "./observability/logs.js";
import { err, ok } from "./result.js";
import { ArithmeticOptionsSchema, MultiplyOptionsSchema } from "./schemas.js";
import type { ArithmeticOptions, MultiplyOptions, Result, ValueType } from "./types.js";

type Combine = (left: number, right: number) => number;

/**
 * True when value is exact for the value type. Integer mode also lets
 * fractional values through, which only arise from non-integer operands.
 */
function representable(value: number, values: ValueType): boolean {
  if (values === "integer" && Number.isInteger(value)) {
    return Number.isSafeInteger(value);
  }
  return Number.isFinite(value);
}

function sameShape(a: SparseMatrix, b: SparseMatrix): boolean {
  return a.rows === b.rows && a.cols === b.cols;
}

/**
 * Element-wise combination over the union of stored keys.
 * Right entries outside the left operand's shape are skipped (lenient mode only).
 */
function combine(
  operation: "add" | "subtract",
  a: SparseMatrix,
  b: SparseMatrix,
  fn: Combine,
  options?: ArithmeticOptions
): Result<SparseMatrix, DimensionMismatchError | ValueRangeError> {
  const { dimensions, keepZeros, values } = ArithmeticOptionsSchema.parse(options ?? {});

  if (!sameShape(a, b)) {
    if (dimensions === "strict") {
      return err(new DimensionMismatchError(operation, a.shape, b.shape));
    }
    logger.warn("matrix.dimensions", {
      operation,
      message: `using ${a.rows}x${a.cols} result shape for ${b.rows}x${b.cols} operand`,
    });
  }

  const result = new SparseMatrix(a.rows, a.cols);
  const store = (row: number, col: number, value: number): ValueRangeError | undefined => {
    if (!representable(value, values)) {
      return new ValueRangeError(operation, row, col, values);
    }
    if (value !== 0 || keepZeros) {
      result.setElement(row, col, value);
    }
    return undefined;
  };

  for (const { row, col, value } of a.entries()) {
    const failure = store(row, col, fn(value, b.getElement(row, col)));
    if (failure) return err(failure);
  }

  for (const { row, col, value } of b.entries()) {
    if (!result.contains(row, col) || a.row(row).has(col)) continue;
    const failure = store(row, col, fn(0, value));
    if (failure) return err(failure);
  }

  logger.debug("matrix.arithmetic", {
    operation,
    details: { rows: result.rows, cols: result.cols, stored: result.storedCount },
  });

  return ok(result);
}

/**
 * Element-wise sum a + b
 */
export function add(
  a: SparseMatrix,
  b: SparseMatrix,
  options?: ArithmeticOptions
): Result<SparseMatrix, DimensionMismatchError | ValueRangeError> {
  return combine("add", a, b, (left, right) => left + right, options);
}

/**
 * Element-wise difference a - b
 */
export function subtract(
  a: SparseMatrix,
  b: SparseMatrix,
  options?: ArithmeticOptions
): Result<SparseMatrix, DimensionMismatchError | ValueRangeError> {
  return combine("subtract", a, b, (left, right) => left - right, options);
}

/**
 * Matrix product a x b
 *
 * Row-wise accumulation: for each stored a(r, k), every stored b(k, c)
 * contributes a(r, k) * b(k, c) to result(r, c). Every product and
 * partial sum must stay representable.
 */
export function multiply(
  a: SparseMatrix,
  b: SparseMatrix,
  options?: MultiplyOptions
): Result<SparseMatrix, DimensionMismatchError | ValueRangeError> {
  const { keepZeros, values } = MultiplyOptionsSchema.parse(options ?? {});

  if (a.cols !== b.rows) {
    return err(new DimensionMismatchError("multiply", a.shape, b.shape));
  }

  const result = new SparseMatrix(a.rows, b.cols);

  for (const row of a.rowIndices()) {
    const sums = new Map<number, number>();
    for (const [k, left] of a.row(row)) {
      for (const [col, right] of b.row(k)) {
        const product = left * right;
        const sum = (sums.get(col) ?? 0) + product;
        if (!representable(product, values) || !representable(sum, values)) {
          return err(new ValueRangeError("multiply", row, col, values));
        }
        sums.set(col, sum);
      }
    }
    for (const [col, sum] of sums) {
      if (sum !== 0 || keepZeros) {
        result.setElement(row, col, sum);
      }
    }
  }

  logger.debug("matrix.arithmetic", {
    operation: "multiply",
    details: { rows: result.rows, cols: result.cols, stored: result.storedCount },
  });

  return ok(result);
}
