import { describe, it, expect } from "vitest";
import { parseMatrix, serializeMatrix } from "./codec.js";
import { FormatError } from "./errors.js";
import { SparseMatrix } from "./matrix.js";
import { unwrap } from "./result.js";

function parseError(text: string, values?: "integer" | "float"): FormatError {
  const result = parseMatrix(text, { values });
  if (result.ok) {
    throw new Error("expected parse to fail");
  }
  return result.error;
}

describe("parseMatrix", () => {
  it("should parse headers and entries", () => {
    const m = unwrap(parseMatrix("rows=2\ncols=2\n(0, 0, 5)\n(1, 1, 7)\n"));

    expect(m.rows).toBe(2);
    expect(m.cols).toBe(2);
    expect(m.getElement(0, 0)).toBe(5);
    expect(m.getElement(0, 1)).toBe(0);
    expect(m.getElement(1, 1)).toBe(7);
  });

  it("should tolerate whitespace, blank lines and CRLF", () => {
    const text = "\uFEFFrows = 3\r\n cols=4 \r\n\r\n  ( 2 ,3, -9 )  \r\n   \r\n(0,0,+1)";
    const m = unwrap(parseMatrix(text));

    expect(m.shape).toEqual({ rows: 3, cols: 4 });
    expect(m.getElement(2, 3)).toBe(-9);
    expect(m.getElement(0, 0)).toBe(1);
    expect(m.storedCount).toBe(2);
  });

  it("should keep the last value for duplicate positions", () => {
    const m = unwrap(parseMatrix("rows=1\ncols=1\n(0, 0, 1)\n(0, 0, 4)"));
    expect(m.getElement(0, 0)).toBe(4);
    expect(m.storedCount).toBe(1);
  });

  it("should accept a header-only matrix", () => {
    const m = unwrap(parseMatrix("rows=0\ncols=0"));
    expect(m.shape).toEqual({ rows: 0, cols: 0 });
    expect(m.storedCount).toBe(0);
  });

  it("should keep explicit zero entries", () => {
    const m = unwrap(parseMatrix("rows=2\ncols=2\n(1, 0, 0)"));
    expect(m.storedCount).toBe(1);
    expect(m.nonZeroCount).toBe(0);
  });

  it("should parse float values when requested", () => {
    const m = unwrap(parseMatrix("rows=2\ncols=2\n(0, 1, -2.5)\n(1, 0, 1e3)\n(1, 1, .25)", { values: "float" }));
    expect(m.getElement(0, 1)).toBe(-2.5);
    expect(m.getElement(1, 0)).toBe(1000);
    expect(m.getElement(1, 1)).toBe(0.25);
  });

  it("should reject float values in integer mode", () => {
    const error = parseError("rows=1\ncols=1\n(0, 0, 1.5)");
    expect(error.line).toBe(3);
    expect(error.reason).toBe('value must be an integer, got "1.5"');
  });

  it("should fail when the second line is not a cols header", () => {
    const error = parseError("rows=2\ncolumns=2\n(0, 0, 1)");
    expect(error).toBeInstanceOf(FormatError);
    expect(error.code).toBe("E_FORMAT");
    expect(error.line).toBe(2);
    expect(error.message).toBe(
      'Input has wrong format (<input>:2): expected "cols=<count>" header, got "columns=2"'
    );
  });

  it("should fail on a header without '='", () => {
    const error = parseError("rows 2\ncols=2");
    expect(error.line).toBe(1);
    expect(error.reason).toBe('expected "rows=<count>" header, got "rows 2"');
  });

  it("should fail on a non-numeric count", () => {
    expect(parseError("rows=two\ncols=2").reason).toBe('rows must be a non-negative integer, got "two"');
    expect(parseError("rows=2\ncols=-1").reason).toBe('cols must be a non-negative integer, got "-1"');
  });

  it("should fail on empty input", () => {
    const error = parseError("");
    expect(error.line).toBe(1);
    expect(error.reason).toBe('expected "rows=<count>" header, got ""');
  });

  it("should fail when the cols header is missing", () => {
    const error = parseError("rows=2");
    expect(error.line).toBe(2);
    expect(error.reason).toBe('missing "cols=<count>" header');
  });

  it("should fail on unbalanced parentheses", () => {
    const error = parseError("rows=2\ncols=2\n(0, 0, 1\n");
    expect(error.line).toBe(3);
    expect(error.reason).toBe('entry must be wrapped in parentheses, got "(0, 0, 1"');
  });

  it("should fail on the wrong token count", () => {
    expect(parseError("rows=2\ncols=2\n(0, 1)").reason).toBe(
      "entry must have 3 values (row, col, value), got 2"
    );
    expect(parseError("rows=2\ncols=2\n(0, 1, 2, 3)").reason).toBe(
      "entry must have 3 values (row, col, value), got 4"
    );
  });

  it("should fail on non-numeric indices", () => {
    expect(parseError("rows=2\ncols=2\n(a, 0, 1)").reason).toBe('row must be a non-negative integer, got "a"');
    expect(parseError("rows=2\ncols=2\n(0, -1, 1)").reason).toBe('col must be a non-negative integer, got "-1"');
  });

  it("should fail on entries outside the declared shape", () => {
    const error = parseError("rows=2\ncols=2\n(0, 0, 1)\n\n(2, 0, 1)");
    expect(error.line).toBe(5);
    expect(error.reason).toBe("entry (2, 0) is outside the declared 2x2 shape");
  });

  it("should report the source name in errors", () => {
    const result = parseMatrix("rows=x", { source: "left.txt" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.source).toBe("left.txt");
      expect(result.error.message).toContain("(left.txt:1)");
    }
  });
});

describe("serializeMatrix", () => {
  it("should write headers and entries in insertion order", () => {
    const m = new SparseMatrix(3, 3);
    m.setElement(2, 2, 9);
    m.setElement(0, 1, -3);
    m.setElement(2, 0, 0);

    expect(serializeMatrix(m)).toBe("rows=3\ncols=3\n(2, 2, 9)\n(2, 0, 0)\n(0, 1, -3)\n");
  });

  it("should write only headers for an empty matrix", () => {
    expect(serializeMatrix(new SparseMatrix(4, 1))).toBe("rows=4\ncols=1\n");
  });

  it("should round-trip through parseMatrix", () => {
    const m = SparseMatrix.fromEntries(5, 6, [
      { row: 4, col: 5, value: 12 },
      { row: 0, col: 0, value: -1 },
      { row: 3, col: 1, value: 100000 },
    ]);

    const parsed = unwrap(parseMatrix(serializeMatrix(m)));
    expect(parsed.shape).toEqual(m.shape);
    for (let r = 0; r < m.rows; r++) {
      for (let c = 0; c < m.cols; c++) {
        expect(parsed.getElement(r, c)).toBe(m.getElement(r, c));
      }
    }
  });

  it("should round-trip float values exactly", () => {
    const m = SparseMatrix.fromEntries(2, 2, [
      { row: 0, col: 0, value: 0.1 + 0.2 },
      { row: 1, col: 1, value: -1.5e-9 },
    ]);

    const parsed = unwrap(parseMatrix(serializeMatrix(m), { values: "float" }));
    expect(parsed.getElement(0, 0)).toBe(0.1 + 0.2);
    expect(parsed.getElement(1, 1)).toBe(-1.5e-9);
  });

  it("should write large integral values without exponent notation", () => {
    const m = SparseMatrix.fromEntries(1, 2, [
      { row: 0, col: 0, value: 1e22 },
      { row: 0, col: 1, value: -1e22 },
    ]);

    const text = serializeMatrix(m);
    expect(text).toBe("rows=1\ncols=2\n(0, 0, 10000000000000000000000)\n(0, 1, -10000000000000000000000)\n");

    const parsed = unwrap(parseMatrix(text, { values: "float" }));
    expect(parsed.equals(m)).toBe(true);
  });

  it("should keep the largest safe integer exact through integer parsing", () => {
    const m = SparseMatrix.fromEntries(1, 1, [{ row: 0, col: 0, value: Number.MAX_SAFE_INTEGER }]);

    const text = serializeMatrix(m);
    expect(text).toBe("rows=1\ncols=1\n(0, 0, 9007199254740991)\n");
    expect(unwrap(parseMatrix(text)).getElement(0, 0)).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("should report unsafe integers by range rather than notation", () => {
    const m = SparseMatrix.fromEntries(1, 1, [{ row: 0, col: 0, value: 1e22 }]);

    const result = parseMatrix(serializeMatrix(m));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Input has wrong format (<input>:3): value is outside the safe integer range: 10000000000000000000000"
      );
    }
  });
});
