/**
 * Sparse matrix storage
 *
 * Invariants:
 * - An absent (row, col) key means the value is exactly 0
 * - Every stored key lies inside [0, rows) x [0, cols)
 * - Explicit zeros written through setElement stay stored until compact()
 * - Iteration follows insertion order (rows map, then each row's columns map)
 */

import { IndexOutOfBoundsError } from "./errors.js";
import { MatrixShapeSchema, describeIssues } from "./schemas.js";
import type { Entry, MatrixShape } from "./types.js";

export class SparseMatrix {
  readonly #rows: number;
  readonly #cols: number;
  readonly #entries = new Map<number, Map<number, number>>();

  /**
   * Create an empty matrix
   * @throws RangeError if either dimension is not a non-negative safe integer
   */
  constructor(rows: number, cols: number) {
    const parsed = MatrixShapeSchema.safeParse({ rows, cols });
    if (!parsed.success) {
      throw new RangeError(`Invalid matrix shape: ${describeIssues(parsed.error)}`);
    }
    this.#rows = parsed.data.rows;
    this.#cols = parsed.data.cols;
  }

  /**
   * Build a matrix from entries; later duplicates overwrite earlier ones
   */
  static fromEntries(rows: number, cols: number, entries: Iterable<Entry>): SparseMatrix {
    const matrix = new SparseMatrix(rows, cols);
    for (const { row, col, value } of entries) {
      matrix.setElement(row, col, value);
    }
    return matrix;
  }

  get rows(): number {
    return this.#rows;
  }

  get cols(): number {
    return this.#cols;
  }

  get shape(): MatrixShape {
    return { rows: this.#rows, cols: this.#cols };
  }

  /**
   * Number of stored entries, explicit zeros included
   */
  get storedCount(): number {
    let count = 0;
    for (const row of this.#entries.values()) {
      count += row.size;
    }
    return count;
  }

  get nonZeroCount(): number {
    let count = 0;
    for (const row of this.#entries.values()) {
      for (const value of row.values()) {
        if (value !== 0) count++;
      }
    }
    return count;
  }

  /**
   * Value at (row, col), or 0 when nothing is stored there. Never throws.
   */
  getElement(row: number, col: number): number {
    return this.#entries.get(row)?.get(col) ?? 0;
  }

  /**
   * Insert or overwrite the value at (row, col). Storing 0 keeps the entry.
   * @throws IndexOutOfBoundsError when (row, col) is outside the matrix
   */
  setElement(row: number, col: number, value: number): void {
    if (!this.contains(row, col)) {
      throw new IndexOutOfBoundsError(row, col, this.shape);
    }

    let rowEntries = this.#entries.get(row);
    if (!rowEntries) {
      rowEntries = new Map();
      this.#entries.set(row, rowEntries);
    }
    rowEntries.set(col, value);
  }

  /**
   * True when (row, col) is a valid position in this matrix
   */
  contains(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      col >= 0 &&
      row < this.#rows &&
      col < this.#cols
    );
  }

  /**
   * Row indices that have an inner map, in insertion order
   */
  rowIndices(): number[] {
    return [...this.#entries.keys()];
  }

  /**
   * Read-only view of one row's stored columns (empty when the row is absent)
   */
  row(row: number): ReadonlyMap<number, number> {
    return this.#entries.get(row) ?? EMPTY_ROW;
  }

  /**
   * Iterate stored entries in insertion order
   */
  *entries(): IterableIterator<Entry> {
    for (const [row, rowEntries] of this.#entries) {
      for (const [col, value] of rowEntries) {
        yield { row, col, value };
      }
    }
  }

  /**
   * Remove stored zeros (and rows left empty)
   * @returns Number of entries removed
   */
  compact(): number {
    let removed = 0;
    for (const [row, rowEntries] of this.#entries) {
      for (const [col, value] of rowEntries) {
        if (value === 0) {
          rowEntries.delete(col);
          removed++;
        }
      }
      if (rowEntries.size === 0) {
        this.#entries.delete(row);
      }
    }
    return removed;
  }

  clone(): SparseMatrix {
    return SparseMatrix.fromEntries(this.#rows, this.#cols, this.entries());
  }

  /**
   * Element-wise equality: same shape and the same value at every position.
   * A stored zero equals an absent entry.
   */
  equals(other: SparseMatrix): boolean {
    if (this.#rows !== other.rows || this.#cols !== other.cols) {
      return false;
    }
    for (const { row, col, value } of this.entries()) {
      if (other.getElement(row, col) !== value) return false;
    }
    for (const { row, col, value } of other.entries()) {
      if (this.getElement(row, col) !== value) return false;
    }
    return true;
  }
}

const EMPTY_ROW: ReadonlyMap<number, number> = new Map();
