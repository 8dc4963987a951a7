import { readFileSync } from 'node:fs';

import { RunDataReadError } from '../types/errors.js';

/**
 * Reads a run input file in one call so the handle is released before
 * parsing starts.
 */
export function readRunFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new RunDataReadError({
      message: `Cannot read ${filePath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      path: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
