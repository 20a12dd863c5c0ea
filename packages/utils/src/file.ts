/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 * Writes land in a `.part` file that is renamed into place once complete.
 */

import {
  mkdir,
  stat,
  rename,
  rm,
  readdir,
  access,
} from 'node:fs/promises';
import { constants, createReadStream, createWriteStream } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { dirname, join } from 'node:path';
import { errorMessage, isDefined, isErrnoException } from './guards.js';
import { createLogger } from './logger.js';

const log = createLogger({ component: 'file' });

export const PART_SUFFIX = '.part';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Move a file to a new location
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}

/**
 * Fewer (or more) bytes arrived than the source declared
 */
export class IncompleteTransferError extends Error {
  constructor(
    public readonly expectedBytes: number,
    public readonly receivedBytes: number
  ) {
    super(`Incomplete transfer: expected ${expectedBytes} bytes, received ${receivedBytes}`);
    this.name = 'IncompleteTransferError';
  }
}

export interface AtomicWriteOptions {
  /** Fail unless exactly this many bytes were written */
  expectedBytes?: number;
}

/**
 * Stream chunks into `destination` atomically.
 *
 * @returns number of bytes written
 */
export async function writeStreamAtomic(
  destination: string,
  source: AsyncIterable<Uint8Array>,
  options: AtomicWriteOptions = {}
): Promise<number> {
  await ensureDir(dirname(destination));
  const tempPath = `${destination}.${randomUUID().slice(0, 8)}${PART_SUFFIX}`;
  let written = 0;

  async function* counted(): AsyncGenerator<Uint8Array> {
    for await (const chunk of source) {
      written += chunk.byteLength;
      yield chunk;
    }
  }

  try {
    await pipeline(Readable.from(counted()), createWriteStream(tempPath));

    if (isDefined(options.expectedBytes) && written !== options.expectedBytes) {
      throw new IncompleteTransferError(options.expectedBytes, written);
    }

    await rename(tempPath, destination);
    return written;
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read several files back to back as one stream of chunks
 */
export async function* concatFiles(paths: readonly string[]): AsyncGenerator<Uint8Array> {
  for (const path of paths) {
    for await (const chunk of createReadStream(path)) {
      if (chunk instanceof Uint8Array) {
        yield chunk;
      }
    }
  }
}

/**
 * Find a finished file named `<stem>.<ext>` in a directory.
 * Partial downloads are ignored.
 */
export async function findFileByStem(
  dirPath: string,
  stem: string
): Promise<string | null> {
  let entries: string[];
  try {
    entries = await readdir(dirPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const match = entries
    .filter((name) => name.startsWith(`${stem}.`) && !name.endsWith(PART_SUFFIX))
    .sort()[0];

  return match === undefined ? null : join(dirPath, match);
}

/**
 * Check that a directory exists (creating it if needed) and is writable
 */
export async function isDirectoryWritable(dirPath: string): Promise<boolean> {
  if (!dirPath) {
    return false;
  }
  try {
    await ensureDir(dirPath);
    await access(dirPath, constants.W_OK);
    return true;
  } catch (error) {
    log.warn({ dirPath, error: errorMessage(error) }, 'Directory is not writable');
    return false;
  }
}

/**
 * Delete every existing file in the list.
 *
 * Never throws: a file that cannot be removed is logged and skipped.
 *
 * @returns number of files removed
 */
export async function removeFiles(
  paths: ReadonlyArray<string | null | undefined>
): Promise<number> {
  let removed = 0;

  for (const filePath of paths.filter(isDefined)) {
    try {
      if (await pathExists(filePath)) {
        await rm(filePath, { force: true });
        removed++;
      }
    } catch (error) {
      log.warn({ filePath, error: errorMessage(error) }, 'Failed to remove file');
    }
  }

  return removed;
}
