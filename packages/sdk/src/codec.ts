/**
 * Text codec for sparse matrices
 *
 * Format:
 *   rows=<count>
 *   cols=<count>
 *   (<row>, <col>, <value>)
 *   ...
 *
 * Invariants:
 * - Parsing is atomic: any malformed line fails the whole parse
 * - Blank entry lines are skipped; duplicate positions keep the last value
 * - Serialization writes every stored entry in insertion order, zeros included
 */

import { FormatError } from "./errors.js";
import { SparseMatrix } from "./matrix.js";
import { err, ok } from "./result.js";
import { ParseOptionsSchema } from "./schemas.js";
import type { ParseOptions, Result, ValueType } from "./types.js";

const COUNT_PATTERN = /^\+?\d+$/;
const INDEX_PATTERN = /^\+?\d+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

interface LineContext {
  source: string;
  line: number;
}

function fail(ctx: LineContext, reason: string): never {
  throw new FormatError(ctx.source, reason, ctx.line);
}

/**
 * Parse a `<key>=<count>` header line
 */
function parseHeader(text: string | undefined, key: "rows" | "cols", ctx: LineContext): number {
  if (text === undefined) {
    fail(ctx, `missing "${key}=<count>" header`);
  }

  const eq = text.indexOf("=");
  if (eq === -1) {
    fail(ctx, `expected "${key}=<count>" header, got "${text.trim()}"`);
  }

  const name = text.slice(0, eq).trim();
  if (name !== key) {
    fail(ctx, `expected "${key}=<count>" header, got "${text.trim()}"`);
  }

  const value = text.slice(eq + 1).trim();
  if (!COUNT_PATTERN.test(value)) {
    fail(ctx, `${key} must be a non-negative integer, got "${value}"`);
  }

  const count = Number(value);
  if (!Number.isSafeInteger(count)) {
    fail(ctx, `${key} is too large: ${value}`);
  }
  return count;
}

function parseIndex(token: string, label: "row" | "col", ctx: LineContext): number {
  if (!INDEX_PATTERN.test(token)) {
    fail(ctx, `${label} must be a non-negative integer, got "${token}"`);
  }
  const index = Number(token);
  if (!Number.isSafeInteger(index)) {
    fail(ctx, `${label} is too large: ${token}`);
  }
  return index;
}

function parseValue(token: string, type: ValueType, ctx: LineContext): number {
  const pattern = type === "integer" ? INTEGER_PATTERN : FLOAT_PATTERN;
  if (!pattern.test(token)) {
    fail(ctx, `value must be ${type === "integer" ? "an integer" : "a number"}, got "${token}"`);
  }

  const value = Number(token);
  if (type === "integer" && !Number.isSafeInteger(value)) {
    fail(ctx, `value is outside the safe integer range: ${token}`);
  }
  if (!Number.isFinite(value)) {
    fail(ctx, `value is not finite: ${token}`);
  }
  return value;
}

/**
 * Parse one `(row, col, value)` entry line (already trimmed)
 */
function parseEntry(
  text: string,
  type: ValueType,
  ctx: LineContext
): { row: number; col: number; value: number } {
  if (!text.startsWith("(") || !text.endsWith(")")) {
    fail(ctx, `entry must be wrapped in parentheses, got "${text}"`);
  }

  const tokens = text
    .slice(1, -1)
    .split(",")
    .map((token) => token.trim());
  if (tokens.length !== 3) {
    fail(ctx, `entry must have 3 values (row, col, value), got ${tokens.length}`);
  }

  const [rowToken = "", colToken = "", valueToken = ""] = tokens;
  return {
    row: parseIndex(rowToken, "row", ctx),
    col: parseIndex(colToken, "col", ctx),
    value: parseValue(valueToken, type, ctx),
  };
}

/**
 * Parse matrix text
 * @param text - Matrix in the rows=/cols=/(row, col, value) format
 * @param options - Value type and the source name used in errors
 * @returns The parsed matrix, or the FormatError describing the first bad line
 */
export function parseMatrix(text: string, options?: ParseOptions): Result<SparseMatrix, FormatError> {
  const { values, source } = ParseOptionsSchema.parse(options ?? {});

  // Strip BOM if present
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const lines = cleaned.split(/\r?\n/);

  try {
    const rows = parseHeader(lines[0], "rows", { source, line: 1 });
    const cols = parseHeader(lines[1], "cols", { source, line: 2 });
    const matrix = new SparseMatrix(rows, cols);

    for (let i = 2; i < lines.length; i++) {
      const trimmed = (lines[i] ?? "").trim();
      if (!trimmed) continue;

      const ctx = { source, line: i + 1 };
      const { row, col, value } = parseEntry(trimmed, values, ctx);
      if (!matrix.contains(row, col)) {
        fail(ctx, `entry (${row}, ${col}) is outside the declared ${rows}x${cols} shape`);
      }
      matrix.setElement(row, col, value);
    }

    return ok(matrix);
  } catch (error) {
    if (error instanceof FormatError) {
      return err(error);
    }
    throw error;
  }
}

// String() switches to exponent notation from 1e21 up
function formatValue(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) >= 1e21) {
    return BigInt(value).toString();
  }
  return String(value);
}

/**
 * Serialize a matrix to text
 * @returns Header lines followed by one line per stored entry, newline-terminated
 */
export function serializeMatrix(matrix: SparseMatrix): string {
  const lines = [`rows=${matrix.rows}`, `cols=${matrix.cols}`];
  for (const { row, col, value } of matrix.entries()) {
    lines.push(`(${row}, ${col}, ${formatValue(value)})`);
  }
  return lines.join("\n") + "\n";
}
