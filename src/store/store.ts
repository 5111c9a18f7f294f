/**
 * Persistent cache
 *
 * Copy-on-commit: readers get the last published snapshot and never wait.
 * Writers are serialized; each one mutates a private draft that is checked,
 * encrypted, flushed and only then published. A failed flush leaves the
 * durable state unknown, so the store refuses all further access.
 */

import { chacha20poly1305 } from '@noble/ciphers/chacha';
import { randomBytes } from '@noble/hashes/utils';
import type { Network } from '../types/index';
import { PoisonedError, StorageError, WalletError, errorMessage } from '../errors';
import { bytesToHex, concatBytes, stringToBytes } from '../utils/bytes';
import { taggedHash } from '../utils/hash';
import { createLogger } from '../utils/logger';
import {
  cloneState,
  deserializeState,
  emptyState,
  findInconsistency,
  serializeState,
  type CacheState,
  type Snapshot
} from './cache';
import type { StateStorage } from './storage';

const log = createLogger('Store');

const NONCE_LENGTH = 12;

export interface StoreIdentity {
  /** Descriptor text the state belongs to */
  descriptor: string;
  network: Network;
}

/**
 * File name of a wallet's state
 */
export function walletId(identity: StoreIdentity): string {
  return bytesToHex(taggedHash('WalletStore/id', stringToBytes(identity.descriptor), stringToBytes(identity.network)));
}

function stateKey(identity: StoreIdentity): Uint8Array {
  return taggedHash('WalletStore/key', stringToBytes(identity.descriptor), stringToBytes(identity.network));
}

export class Store {
  private current: CacheState;
  private poisoned: unknown = null;
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly storage: StateStorage,
    readonly walletId: string,
    private readonly key: Uint8Array,
    state: CacheState
  ) {
    this.current = state;
  }

  /**
   * Load persisted state, or start empty when there is none
   */
  static async open(storage: StateStorage, identity: StoreIdentity): Promise<Store> {
    const id = walletId(identity);
    const key = stateKey(identity);
    const data = await storage.load(id);

    if (!data) {
      log.debug('no persisted state', { walletId: id });
      return new Store(storage, id, key, emptyState());
    }
    if (data.length <= NONCE_LENGTH) {
      throw new StorageError('Wallet state is truncated');
    }

    let plaintext: Uint8Array;
    try {
      plaintext = chacha20poly1305(key, data.subarray(0, NONCE_LENGTH)).decrypt(data.subarray(NONCE_LENGTH));
    } catch (error) {
      throw new StorageError('Cannot decrypt wallet state', { cause: error });
    }

    const state = deserializeState(new TextDecoder().decode(plaintext));
    log.debug('loaded state', { walletId: id, transactions: state.transactions.size });
    return new Store(storage, id, key, state);
  }

  get isPoisoned(): boolean {
    return this.poisoned !== null;
  }

  private ensureHealthy(): void {
    if (this.poisoned !== null) {
      throw new PoisonedError('Wallet state is unreliable after a failed write; reopen the wallet', {
        cause: this.poisoned
      });
    }
  }

  /**
   * Last committed snapshot
   */
  read(): Snapshot {
    this.ensureHealthy();
    return this.current;
  }

  /**
   * Run `fn` on a draft under the writer lock and commit its changes
   * atomically. If `fn` throws, nothing changes.
   */
  write<T>(fn: (draft: CacheState) => T | Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.commit(fn));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async commit<T>(fn: (draft: CacheState) => T | Promise<T>): Promise<T> {
    this.ensureHealthy();

    const draft = cloneState(this.current);
    const result = await fn(draft);

    const inconsistency = findInconsistency(draft);
    if (inconsistency) {
      throw new StorageError(`Refusing to commit inconsistent state: ${inconsistency}`);
    }

    const nonce = randomBytes(NONCE_LENGTH);
    const sealed = chacha20poly1305(this.key, nonce).encrypt(stringToBytes(serializeState(draft)));

    try {
      await this.storage.save(this.walletId, concatBytes(nonce, sealed));
    } catch (error) {
      this.poisoned = error;
      log.error('state flush failed, store poisoned', { walletId: this.walletId, error: errorMessage(error) });
      throw new PoisonedError('Failed to persist wallet state', {
        cause: error instanceof WalletError ? error : new StorageError(errorMessage(error), { cause: error })
      });
    }

    this.current = draft;
    return result;
  }
}
