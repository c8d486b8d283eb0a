/**
 * File reading with path validation.
 *
 * Configuration and schema files are the only files tsbind reads; every path
 * goes through {@link validatePath} before it reaches the file system.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * The path must be a non-empty string without null bytes; it is resolved
 * against the working directory.
 *
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, not a string, or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Checks whether a file or directory exists after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}
