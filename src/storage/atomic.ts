/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write JSON to a file atomically (temp file + rename).
 *
 * Creates parent directories as needed and uses 2-space indentation.
 *
 * @throws Error with the target path when the write fails
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // Cleanup is best effort; the write error is the one reported
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Read and parse a JSON file
 *
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (isNotFound(error)) {
      throw new Error(`File not found: ${filePath}`);
    }
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Read and parse a JSON file, or return undefined when it does not exist.
 *
 * @throws Error if the JSON is invalid
 */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) {
    return undefined;
  }
  return readJson(filePath);
}

/**
 * Check if a file exists (not a directory)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * fs errors can come from another realm (e.g. under Jest), so check the
 * code without relying on instanceof.
 */
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
