/**
 * Filesystem primitives used by the action engine.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { copyFile, lstat, mkdir, rename, unlink } from 'fs/promises';
import { dirname } from 'path';
import { AppError } from './logger.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

export class DestinationExistsError extends AppError {
  constructor(destination: string) {
    super(`Destination already exists: ${destination}`, 'DESTINATION_EXISTS', 409, { destination });
    this.name = 'DestinationExistsError';
  }
}

/**
 * Move a file, creating the destination's parent directories. Falls back
 * to copy + unlink when source and destination are on different devices.
 */
export async function movePath(source: string, destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  if (await pathExists(destination)) {
    throw new DestinationExistsError(destination);
  }

  try {
    await rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') throw error;
    await copyFile(source, destination);
    await unlink(source);
  }
}

export function sha256File(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(path)
      .on('data', chunk => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

export async function sameContent(left: string, right: string): Promise<boolean> {
  const [leftStats, rightStats] = await Promise.all([lstat(left), lstat(right)]);
  if (!leftStats.isFile() || !rightStats.isFile() || leftStats.size !== rightStats.size) {
    return false;
  }
  const [leftHash, rightHash] = await Promise.all([sha256File(left), sha256File(right)]);
  return leftHash === rightHash;
}

/**
 * One holder per key at a time; waiters are served in arrival order.
 */
export class PathLocks {
  private tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
