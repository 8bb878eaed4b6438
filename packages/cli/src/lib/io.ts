/**
 * I/O helpers for CLI
 */

/**
 * Destination for command output; tests substitute an in-memory buffer
 */
export interface CliOutput {
  stdout(content: string): void;
  stderr(content: string): void;
  /** Whether stderr is an interactive terminal (enables colored errors) */
  readonly stderrIsTTY?: boolean;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

export const processOutput: CliOutput = {
  stdout: writeStdout,
  stderr: writeStderr,
  get stderrIsTTY() {
    return process.stderr.isTTY ?? false;
  },
};
