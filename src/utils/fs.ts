/**
 * File System Utilities
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}

/**
 * Read and parse a JSON file. Parse errors propagate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fsPromises.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/**
 * Node's "no such file or directory" failure
 */
export function isMissingFileError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
