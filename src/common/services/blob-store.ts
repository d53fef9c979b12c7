/**
 * Blob Store
 *
 * Raw uploaded file bytes, addressed by key. Which backend holds them
 * (local disk, object storage) is a deployment decision behind this interface.
 */

import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';

export interface BlobStore {
  put(key: string, bytes: Buffer): Promise<void>;
  /** null when nothing is stored under the key */
  get(key: string): Promise<Buffer | null>;
  delete(key: string): Promise<void>;
}

const SAFE_KEY = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function assertSafeKey(key: string): void {
  if (!SAFE_KEY.test(key)) {
    throw new Error(`Invalid blob key: ${key}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores each blob as a file in one directory
 */
export class LocalBlobStore implements BlobStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    assertSafeKey(key);
    await mkdir(this.directory, { recursive: true });
    await writeFile(join(this.directory, key), bytes);
  }

  async get(key: string): Promise<Buffer | null> {
    assertSafeKey(key);
    try {
      return await readFile(join(this.directory, key));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    assertSafeKey(key);
    await rm(join(this.directory, key), { force: true });
  }
}

export class InMemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  async put(key: string, bytes: Buffer): Promise<void> {
    assertSafeKey(key);
    this.blobs.set(key, Buffer.from(bytes));
  }

  async get(key: string): Promise<Buffer | null> {
    assertSafeKey(key);
    const bytes = this.blobs.get(key);
    return bytes ? Buffer.from(bytes) : null;
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }
}
