/**
 * Atomic file I/O operations for crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files throw DocumentNotFoundError
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
  errorCode,
} from "./errors.js";
import { logger } from "./observability/logs.js";

const DATASYNC_UNSUPPORTED = new Set(["ENOTSUP", "ENOSYS", "EINVAL"]);
const DIR_FSYNC_UNSUPPORTED = new Set(["EINVAL", "ENOTSUP", "EBADF", "EISDIR", "EPERM"]);

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    const code = errorCode(err);
    if (code === undefined || !DIR_FSYNC_UNSUPPORTED.has(code)) {
      logger.debug("io.dir_fsync_failed", {
        message: `Directory fsync failed for ${dir}`,
        details: { code },
      });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code !== undefined && DATASYNC_UNSUPPORTED.has(code)) {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { message: String(closeErr) });
      });
    }
    await fs.rm(tmp, { force: true });

    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Read a document from a file
 * @returns File contents as UTF-8 string
 * @throws DocumentNotFoundError if file doesn't exist
 * @throws DocumentReadError for other read failures
 */
export async function readDocument(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Read and parse a JSON document
 * @throws DocumentReadError when the contents are not valid JSON
 */
export async function readJsonDocument(filePath: string): Promise<unknown> {
  const content = await readDocument(filePath);
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Remove a document file (idempotent - no error if file doesn't exist)
 * @throws DocumentRemoveError if removal fails for reasons other than file not found
 */
export async function removeDocument(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return;
    }
    throw new DocumentRemoveError(filePath, { cause: err });
  }
}

/**
 * Recursively remove a directory (idempotent)
 */
export async function removeDirectory(dirPath: string): Promise<void> {
  try {
    await fs.rm(dirPath, { recursive: true, force: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Check whether a path exists and is a directory
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name)
      // Skip in-flight temp files from atomicWrite
      .filter((name) => !name.startsWith("."));

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    return files.sort();
  } catch (err) {
    // Return empty array if directory doesn't exist (simplifies callers)
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}

/**
 * List the immediate subdirectories of a directory
 * @returns Sorted directory names; empty when the directory doesn't exist
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}
