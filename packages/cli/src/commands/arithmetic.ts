/**
 * add / subtract / multiply commands
 */

import type { Command } from "commander";
import { add, multiply, serializeMatrix, subtract, unwrap } from "@sparsemat/sdk";
import type {
  ArithmeticOptions,
  DimensionMismatchError,
  Result,
  SparseMatrix,
  ValueRangeError,
} from "@sparsemat/sdk";
import { resolveValueType } from "../lib/env.js";
import type { CliOutput } from "../lib/io.js";
import { readMatrixFile, writeMatrixFile } from "../lib/matrix.js";
import { withTiming } from "../lib/telemetry.js";
import type { GlobalOptions } from "./types.js";

interface OperationOptions {
  output?: string;
  float?: boolean;
  keepZeros?: boolean;
  lenient?: boolean;
}

interface Operation {
  name: "add" | "subtract" | "multiply";
  description: string;
  /** Accepts --lenient (element-wise operations only) */
  lenient: boolean;
  run(
    a: SparseMatrix,
    b: SparseMatrix,
    options: ArithmeticOptions
  ): Result<SparseMatrix, DimensionMismatchError | ValueRangeError>;
}

const OPERATIONS: Operation[] = [
  {
    name: "add",
    description: "Add two matrices element-wise",
    lenient: true,
    run: (a, b, options) => add(a, b, options),
  },
  {
    name: "subtract",
    description: "Subtract the right matrix from the left element-wise",
    lenient: true,
    run: (a, b, options) => subtract(a, b, options),
  },
  {
    name: "multiply",
    description: "Multiply two matrices (left.cols must equal right.rows)",
    lenient: false,
    run: (a, b, options) => multiply(a, b, { keepZeros: options.keepZeros, values: options.values }),
  },
];

/**
 * Register the arithmetic commands on the program
 */
export function registerArithmeticCommands(program: Command, output: CliOutput): void {
  for (const operation of OPERATIONS) {
    const command = program
      .command(`${operation.name} <left> <right>`)
      .description(operation.description)
      .option("-o, --output <path>", "Write the result to a file instead of stdout")
      .option("--float", "Parse entry values as floating point numbers")
      .option("--keep-zeros", "Store positions whose result is exactly zero");

    if (operation.lenient) {
      command.option("--lenient", "Use the left matrix's shape when shapes differ");
    }

    command.action(async (left: string, right: string, options: OperationOptions) => {
      await withTiming(`cli.${operation.name}`, async () => {
        const opts = program.opts<GlobalOptions>();
        const values = resolveValueType(options.float);

        const a = await readMatrixFile(left, values);
        const b = await readMatrixFile(right, values);
        const result = unwrap(
          operation.run(a, b, {
            dimensions: options.lenient ? "lenient" : "strict",
            keepZeros: options.keepZeros ?? false,
            values,
          })
        );

        if (!options.output) {
          output.stdout(serializeMatrix(result));
          return;
        }

        const target = await writeMatrixFile(options.output, result);
        if (!opts.quiet) {
          output.stdout(`Saved ${result.rows}x${result.cols} matrix to ${target}\n`);
        }
      });
    });
  }
}
