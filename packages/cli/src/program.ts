/**
 * Command tree for the sparsemat CLI
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { logger } from "@sparsemat/sdk";
import { registerArithmeticCommands } from "./commands/arithmetic.js";
import { registerInspectCommands } from "./commands/inspect.js";
import type { GlobalOptions } from "./commands/types.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { processOutput, type CliOutput } from "./lib/io.js";
import { colorize } from "./lib/render.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree
 * @param output - Where command output goes (default: process stdout/stderr)
 */
export function buildProgram(output: CliOutput = processOutput): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => output.stdout(str),
      writeErr: (str) => output.stderr(colorize(str, "red", { isTTY: output.stderrIsTTY })),
    })
    .exitOverride();

  program
    .name("sparsemat")
    .description("Sparse matrix toolkit - add, subtract and multiply matrix files")
    .version(readVersion())
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .addHelpText(
      "after",
      `
Examples:
  $ sparsemat add a.txt b.txt -o sum.txt
  $ sparsemat multiply a.txt b.txt --float
  $ sparsemat inspect a.txt --json`
    );

  // --quiet also silences SDK warnings
  program.hook("preAction", (thisCommand) => {
    logger.setEnabled(!thisCommand.opts<GlobalOptions>().quiet);
  });

  registerArithmeticCommands(program, output);
  registerInspectCommands(program, output);

  return program;
}

/**
 * Parse argv, run the selected command and map failures to an exit code
 * @param argv - Full process argv (node, script, ...args)
 * @returns Process exit code
 */
export async function runCli(argv: string[], output: CliOutput = processOutput): Promise<number> {
  const program = buildProgram(output);
  logger.setSink((_level, line) => output.stderr(`${line}\n`));

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already written its own message (or help/version output)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    const message = formatCliError(err, opts.verbose);
    output.stderr(colorize(`Error: ${message}`, "red", { isTTY: output.stderrIsTTY }) + "\n");

    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setSink();
    logger.setEnabled(true);
  }
}
