/**
 * File system operations.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { FileAccessError, ErrorCodes } from './errors.js';

export const TEXT_ENCODING = 'utf-8';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, TEXT_ENCODING);
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Resolve a path against a base directory (absolute paths pass through).
 */
export function resolvePath(basePath: string, relativePath: string): string {
  return path.resolve(basePath, relativePath);
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read a whole text file synchronously and strictly as UTF-8.
 *
 * The handle is closed before this returns. A byte order mark is kept as
 * U+FEFF in the result rather than stripped.
 */
export function readTextFileSync(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    const code = errnoCode(error);
    const cause = error instanceof Error ? error.message : String(error);
    if (code === 'ENOENT') {
      throw new FileAccessError(
        ErrorCodes.FILE_NOT_FOUND,
        `File not found: ${filePath}`,
        { path: filePath, errno: code, cause }
      );
    }
    throw new FileAccessError(
      ErrorCodes.FILE_UNREADABLE,
      `Cannot read file: ${filePath}${code ? ` (${code})` : ''}`,
      { path: filePath, errno: code, cause }
    );
  }

  try {
    return new TextDecoder(TEXT_ENCODING, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw new FileAccessError(
      ErrorCodes.FILE_NOT_DECODABLE,
      `File is not valid ${TEXT_ENCODING}: ${filePath}`,
      { path: filePath, cause: error instanceof Error ? error.message : String(error) }
    );
  }
}
