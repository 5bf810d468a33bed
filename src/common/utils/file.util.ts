/**
 * Small async file helpers used around downloads and scratch files
 */

import * as fs from 'fs/promises';
import { Logger } from '@nestjs/common';
import { errorMessage, isErrnoException } from '../errors';

const logger = new Logger('FileUtil');

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size in bytes, or null when the path does not exist or is not a regular file
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  const size = await fileSize(filePath);
  return size !== null && size > 0;
}

/**
 * Delete a file if present. Returns true when a file was removed.
 * A missing file is not an error; anything else is logged and reported as false.
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    logger.debug(`Removed file: ${filePath}`);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    logger.warn(`Could not remove file ${filePath}: ${errorMessage(error)}`);
    return false;
  }
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
