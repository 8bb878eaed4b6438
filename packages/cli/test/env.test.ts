/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { resolveMatrixPath, resolveValueType, isVerbose } from "../src/lib/env.js";
import { CliError } from "../src/lib/errors.js";

describe("environment resolution", () => {
  let originalValues: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalValues = process.env.SPARSEMAT_VALUES;
    originalDebug = process.env.SPARSEMAT_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalValues !== undefined) {
      process.env.SPARSEMAT_VALUES = originalValues;
    } else {
      delete process.env.SPARSEMAT_VALUES;
    }
    if (originalDebug !== undefined) {
      process.env.SPARSEMAT_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.SPARSEMAT_CLI_DEBUG;
    }
  });

  describe("resolveMatrixPath", () => {
    it("should resolve relative paths to absolute", () => {
      expect(resolveMatrixPath("./a.txt")).toBe(path.resolve("./a.txt"));
    });

    it("should handle absolute paths", () => {
      expect(resolveMatrixPath("/data/a.txt")).toBe(path.resolve("/data/a.txt"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveMatrixPath("~")).toBe(path.resolve(homedir()));
      expect(resolveMatrixPath("~/m/a.txt")).toBe(path.join(homedir(), "m/a.txt"));
    });
  });

  describe("resolveValueType", () => {
    it("should prefer the --float flag", () => {
      process.env.SPARSEMAT_VALUES = "integer";
      expect(resolveValueType(true)).toBe("float");
    });

    it("should use SPARSEMAT_VALUES when the flag is absent", () => {
      process.env.SPARSEMAT_VALUES = "float";
      expect(resolveValueType()).toBe("float");
      expect(resolveValueType(false)).toBe("float");
    });

    it("should default to integer", () => {
      delete process.env.SPARSEMAT_VALUES;
      expect(resolveValueType()).toBe("integer");
    });

    it("should reject an unknown SPARSEMAT_VALUES", () => {
      process.env.SPARSEMAT_VALUES = "complex";
      expect(() => resolveValueType()).toThrow(CliError);
      expect(() => resolveValueType()).toThrow('SPARSEMAT_VALUES must be "integer" or "float", got "complex"');
    });
  });

  describe("isVerbose", () => {
    it("should follow SPARSEMAT_CLI_DEBUG", () => {
      process.env.SPARSEMAT_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
      delete process.env.SPARSEMAT_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
    });
  });
});
