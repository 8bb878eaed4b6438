/**
 * Zod schemas for validating shapes and operation options
 */

import { z } from "zod";

const DimensionSchema = z
  .number()
  .int("must be an integer")
  .min(0, "must be non-negative")
  .max(Number.MAX_SAFE_INTEGER, "must be a safe integer");

export const MatrixShapeSchema = z.object({
  rows: DimensionSchema,
  cols: DimensionSchema,
});

export const ParseOptionsSchema = z
  .object({
    values: z.enum(["integer", "float"]).default("integer"),
    source: z.string().min(1).default("<input>"),
  })
  .strict();

export const MultiplyOptionsSchema = z
  .object({
    keepZeros: z.boolean().default(false),
    values: z.enum(["integer", "float"]).default("integer"),
  })
  .strict();

export const ArithmeticOptionsSchema = MultiplyOptionsSchema.extend({
  dimensions: z.enum(["strict", "lenient"]).default("strict"),
});

/**
 * Render zod issues as a single line ("rows: must be non-negative; ...")
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
