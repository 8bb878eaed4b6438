/**
 * inspect / get commands
 */

import type { Command } from "commander";
import { parseNonNegativeInt } from "../lib/arg.js";
import { resolveValueType } from "../lib/env.js";
import type { CliOutput } from "../lib/io.js";
import { readMatrixFile } from "../lib/matrix.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export function registerInspectCommands(program: Command, output: CliOutput): void {
  program
    .command("inspect <file>")
    .description("Show shape and entry counts of a matrix file")
    .option("--float", "Parse entry values as floating point numbers")
    .option("--json", "Output as JSON")
    .action(async (file: string, options: { float?: boolean; json?: boolean }) => {
      await withTiming("cli.inspect", async () => {
        const matrix = await readMatrixFile(file, resolveValueType(options.float));

        const cells = matrix.rows * matrix.cols;
        const density = cells === 0 ? 0 : matrix.nonZeroCount / cells;
        const summary = {
          rows: matrix.rows,
          cols: matrix.cols,
          stored: matrix.storedCount,
          nonZero: matrix.nonZeroCount,
          density,
        };

        if (options.json) {
          printJson(output, summary, { raw: true });
          return;
        }

        printLines(output, [
          `Rows: ${summary.rows}`,
          `Cols: ${summary.cols}`,
          `Stored entries: ${summary.stored}`,
          `Non-zero entries: ${summary.nonZero}`,
          `Density: ${(density * 100).toFixed(2)}%`,
        ]);
      });
    });

  program
    .command("get <file>")
    .description("Print the value at one position (0 when nothing is stored)")
    .argument("<row>", "Row index", (value: string) => parseNonNegativeInt(value, "row"))
    .argument("<col>", "Column index", (value: string) => parseNonNegativeInt(value, "col"))
    .option("--float", "Parse entry values as floating point numbers")
    .action(async (file: string, row: number, col: number, options: { float?: boolean }) => {
      await withTiming("cli.get", async () => {
        const matrix = await readMatrixFile(file, resolveValueType(options.float));
        output.stdout(`${matrix.getElement(row, col)}\n`);
      });
    });
}
