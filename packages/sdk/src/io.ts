/**
 * Matrix file I/O with crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - File handles are closed on every exit path
 * - Reads are UTF-8 only
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { parseMatrix, serializeMatrix } from "./codec.js";
import { IOError } from "./errors.js";
import type { FormatError } from "./errors.js";
import type { SparseMatrix } from "./matrix.js";
import { logger } from "./observability/logs.js";
import { err, ok } from "./result.js";
import type { Result, ValueType } from "./types.js";

export interface LoadOptions {
  /** Numeric type for entry values (default: "integer") */
  values?: ValueType;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to a full sync where it is unsupported
    try {
      await fileHandle.datasync();
    } catch (syncErr) {
      const code = errnoCode(syncErr);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw syncErr;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    try {
      await fs.rename(tmp, filePath);
    } catch (renameErr) {
      // Windows: antivirus or indexing may hold the file briefly
      const code = errnoCode(renameErr);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw renameErr;
      }
    }

    await syncDirectory(dir);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.cleanup", { path: tmp, message: `close failed: ${messageOf(closeErr)}` });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup", { path: tmp, message: `unlink failed: ${messageOf(unlinkErr)}` });
      }
    });

    throw error;
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (syncErr) {
    // EINVAL/ENOTSUP/EBADF: directory fsync not supported on this platform
    const code = errnoCode(syncErr);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR" && code !== "EPERM") {
      logger.debug("io.cleanup", { path: dir, message: `directory fsync failed: ${messageOf(syncErr)}` });
    }
  }
}

/**
 * Read and parse a matrix file
 * @param filePath - File to read
 * @param options - Value type for entries
 * @returns The matrix, an IOError when the file cannot be read, or a FormatError
 */
export async function loadMatrix(
  filePath: string,
  options: LoadOptions = {}
): Promise<Result<SparseMatrix, IOError | FormatError>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    return err(new IOError("read", filePath, { cause: error }));
  }

  const parsed = parseMatrix(text, { values: options.values, source: filePath });
  if (parsed.ok) {
    logger.debug("matrix.load", {
      path: filePath,
      details: { rows: parsed.value.rows, cols: parsed.value.cols, stored: parsed.value.storedCount },
    });
  }
  return parsed;
}

/**
 * Serialize a matrix and write it atomically, replacing any existing file
 * @param filePath - Destination path (parent directories are created)
 */
export async function saveMatrix(filePath: string, matrix: SparseMatrix): Promise<Result<void, IOError>> {
  try {
    await atomicWrite(filePath, serializeMatrix(matrix));
  } catch (error) {
    return err(new IOError("write", filePath, { cause: error }));
  }

  logger.debug("matrix.save", {
    path: filePath,
    details: { rows: matrix.rows, cols: matrix.cols, stored: matrix.storedCount },
  });
  return ok(undefined);
}
