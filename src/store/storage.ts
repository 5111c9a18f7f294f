/**
 * State storage backends
 * One opaque blob per wallet id
 */

import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { StorageError } from '../errors';

/**
 * Storage backend interface
 */
export interface StateStorage {
  load(walletId: string): Promise<Uint8Array | null>;
  /** Must be durable when the promise resolves */
  save(walletId: string, data: Uint8Array): Promise<void>;
  clear(walletId: string): Promise<void>;
}

/**
 * In-memory storage backend for tests and ephemeral wallets
 */
export class MemoryStorage implements StateStorage {
  private store: Map<string, Uint8Array> = new Map();

  async load(walletId: string): Promise<Uint8Array | null> {
    const data = this.store.get(walletId);
    return data ? data.slice() : null;
  }

  async save(walletId: string, data: Uint8Array): Promise<void> {
    this.store.set(walletId, data.slice());
  }

  async clear(walletId: string): Promise<void> {
    this.store.delete(walletId);
  }
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * File storage backend: `<directory>/<walletId>.state`, replaced atomically
 * through a synced temporary file and a rename
 */
export class FileStorage implements StateStorage {
  constructor(readonly directory: string) {}

  path(walletId: string): string {
    return join(this.directory, `${walletId}.state`);
  }

  async load(walletId: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.path(walletId)));
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return null;
      }
      throw new StorageError(`Failed to read wallet state ${walletId}`, { cause: error });
    }
  }

  async save(walletId: string, data: Uint8Array): Promise<void> {
    const target = this.path(walletId);
    const temp = `${target}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      const handle = await open(temp, 'w');
      try {
        await handle.writeFile(data);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, target);
    } catch (error) {
      throw new StorageError(`Failed to write wallet state ${walletId}`, { cause: error });
    }
  }

  async clear(walletId: string): Promise<void> {
    await rm(this.path(walletId), { force: true });
  }
}
