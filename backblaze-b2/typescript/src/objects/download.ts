/**
 * Download helpers: re-chunking and saving to the local filesystem
 * @module backblaze-b2/objects/download
 */

import type { Stats } from 'fs';
import { open, rm, stat, type FileHandle } from 'fs/promises';
import * as path from 'path';
import { DownloadError, ValidationError } from '../errors/index.js';
import { releaseBody } from '../transport/index.js';

export interface SaveOptions {
  overwriteExisting: boolean;
  deleteOnFailure: boolean;
  /** When set, a different byte count counts as a failed transfer */
  expectedSize?: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function statOrUndefined(target: string): Promise<Stats | undefined> {
  try {
    return await stat(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * @throws {ValidationError} If chunkSize is not a positive integer
 */
export function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw ValidationError.invalidArgument('chunkSize', 'chunkSize must be a positive integer');
  }
}

/**
 * Re-slices a byte stream into chunks of exactly `chunkSize` bytes; only the
 * last chunk may be shorter. The stream is consumed once.
 *
 * @throws {ValidationError} If chunkSize is not a positive integer
 */
export function readInChunks(
  body: AsyncIterable<Uint8Array>,
  chunkSize: number
): AsyncGenerator<Uint8Array> {
  assertChunkSize(chunkSize);
  return rechunk(body, chunkSize);
}

async function* rechunk(
  body: AsyncIterable<Uint8Array>,
  chunkSize: number
): AsyncGenerator<Uint8Array> {
  let buffer = new Uint8Array(chunkSize);
  let filled = 0;

  for await (const chunk of body) {
    let offset = 0;
    while (offset < chunk.byteLength) {
      const take = Math.min(chunkSize - filled, chunk.byteLength - offset);
      buffer.set(chunk.subarray(offset, offset + take), filled);
      filled += take;
      offset += take;

      if (filled === chunkSize) {
        yield buffer;
        buffer = new Uint8Array(chunkSize);
        filled = 0;
      }
    }
  }

  if (filled > 0) {
    yield buffer.slice(0, filled);
  }
}

/**
 * Resolves the file to write: a directory destination gets the object name
 * appended.
 */
export async function resolveDestination(destinationPath: string, objectName: string): Promise<string> {
  const info = await statOrUndefined(destinationPath);
  if (info?.isDirectory()) {
    return path.join(destinationPath, objectName);
  }
  return destinationPath;
}

/**
 * Writes a byte stream to a file.
 *
 * Resolves false when the byte count disagrees with `expectedSize`. A stream
 * or write failure is rethrown. In both cases the partial file is removed
 * when `deleteOnFailure` is set. A body that is never read is released.
 *
 * @throws {DownloadError} If the file exists and overwriting is not allowed
 */
export async function saveToFile(
  body: AsyncIterable<Uint8Array>,
  filePath: string,
  options: SaveOptions
): Promise<boolean> {
  let handle: FileHandle;
  try {
    const existing = await statOrUndefined(filePath);
    if (existing && !options.overwriteExisting) {
      throw DownloadError.fileExists(filePath);
    }
    handle = await open(filePath, 'w');
  } catch (error) {
    await releaseBody(body);
    throw error;
  }
  let bytesWritten = 0;

  try {
    for await (const chunk of body) {
      await handle.write(chunk);
      bytesWritten += chunk.byteLength;
    }
  } catch (error) {
    await handle.close();
    if (options.deleteOnFailure) {
      await rm(filePath, { force: true });
    }
    throw error;
  }

  await handle.close();

  if (options.expectedSize !== undefined && options.expectedSize !== bytesWritten) {
    if (options.deleteOnFailure) {
      await rm(filePath, { force: true });
    }
    return false;
  }

  return true;
}
