import fs from 'fs';
import path from 'path';
import { errorMessage, logger } from '../utils/logger';

export type JsonReadResult =
  | { status: 'ok'; value: unknown }
  | { status: 'missing' }
  | { status: 'corrupt'; error: string };

export function temporaryPathFor(filePath: string): string {
  return `${filePath}.tmp`;
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export function readJsonFile(filePath: string): JsonReadResult {
  let serialized: string;
  try {
    serialized = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return { status: 'missing' };
    }
    logger.warn('Unable to read JSON file', { filePath, error: errorMessage(error) });
    return { status: 'corrupt', error: errorMessage(error) };
  }

  try {
    return { status: 'ok', value: JSON.parse(serialized) };
  } catch (error) {
    logger.warn('Ignoring malformed JSON file', { filePath, error: errorMessage(error) });
    return { status: 'corrupt', error: errorMessage(error) };
  }
}

function removeTemporaryFile(tempPath: string): void {
  try {
    fs.rmSync(tempPath, { force: true });
  } catch (cleanupError) {
    logger.warn('Unable to remove temporary file', { tempPath, error: errorMessage(cleanupError) });
  }
}

/**
 * Writes `data` as JSON through a sibling temporary file that is fsynced and
 * renamed over `filePath`. On failure the previous file is left untouched,
 * the temporary file is removed and `false` is returned.
 */
export function writeJsonAtomic(filePath: string, data: unknown): boolean {
  const tempPath = temporaryPathFor(filePath);
  let descriptor: number | null = null;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    descriptor = fs.openSync(tempPath, 'w');
    fs.writeFileSync(descriptor, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    fs.fsyncSync(descriptor);
    fs.closeSync(descriptor);
    descriptor = null;
    fs.renameSync(tempPath, filePath);
    return true;
  } catch (error) {
    logger.error('Failed to write JSON file', { filePath, error: errorMessage(error) });
    if (descriptor !== null) {
      try {
        fs.closeSync(descriptor);
      } catch (closeError) {
        logger.warn('Unable to close temporary file', { tempPath, error: errorMessage(closeError) });
      }
    }
    removeTemporaryFile(tempPath);
    return false;
  }
}
