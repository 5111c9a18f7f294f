/**
 * Wallet
 *
 * Facade over the deriver, the persistent cache and the syncer. Reads are
 * served from the last committed snapshot and never touch the network.
 */

import type { AddressResult, Balance, ChainTip, Network, Signer, WalletTx, WalletTxOut } from '../types/index';
import type { Transaction } from '../transactions/types';
import type { BlockchainBackend } from '../backend/types';
import { getNetworkParams, isNetwork, type NetworkParams } from '../config/networks';
import { parseDescriptor } from '../descriptor/descriptor';
import { AddressDeriver } from '../descriptor/deriver';
import { ConfidentialUnblinder, type Unblinder } from '../confidential/unblinder';
import { Store } from '../store/store';
import { FileStorage, type StateStorage } from '../store/storage';
import { computeBalance, listTransactions, listUtxos } from '../store/queries';
import { Syncer, type SyncResult, type SyncState } from '../sync/syncer';
import { computeTxid } from '../transactions/serialization';
import {
  ConfigError,
  NetworkMismatchError,
  ProtocolViolationError,
  TransportError,
  WalletError,
  errorMessage
} from '../errors';
import { bytesToHex, secureZero } from '../utils/bytes';
import { createLogger } from '../utils/logger';

const log = createLogger('Wallet');

export const DEFAULT_GAP_LIMIT = 20;
export const DEFAULT_HEADER_WINDOW = 100;

/**
 * Wallet configuration
 */
export interface WalletConfig {
  network: Network;
  /** CT descriptor, with or without checksum */
  descriptor: string;
  /** Where state is persisted; takes precedence over `dataDir` */
  storage?: StateStorage;
  /** Directory for file-backed state */
  dataDir?: string;
  /** Unused indices probed past the last used one (default 20) */
  gapLimit?: number;
  /** Blocks below the tip re-checked for reorgs (default 100) */
  headerWindow?: number;
  /** Defaults to range proof rewinding with secp256k1-zkp */
  unblinder?: Unblinder;
}

/**
 * A call joining a pass in flight receives its state changes too; the
 * pass stays bound to the signal of the call that started it.
 */
export interface SyncOptions {
  signal?: AbortSignal;
  onStateChange?: (state: SyncState) => void;
}

interface InflightSync {
  backend: BlockchainBackend;
  listeners: Set<(state: SyncState) => void>;
  pass: Promise<SyncResult>;
}

interface ResolvedConfig {
  params: NetworkParams;
  storage: StateStorage;
  gapLimit: number;
  headerWindow: number;
  unblinder: Unblinder;
}

function positiveInteger(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function resolveConfig(config: WalletConfig): Omit<ResolvedConfig, 'unblinder'> {
  if (typeof config.network !== 'string' || !isNetwork(config.network)) {
    throw new ConfigError(`Unknown network: ${String(config.network)}`);
  }
  if (typeof config.descriptor !== 'string' || config.descriptor.trim() === '') {
    throw new ConfigError('A descriptor is required');
  }

  let storage = config.storage;
  if (!storage) {
    if (!config.dataDir) {
      throw new ConfigError('Either storage or dataDir must be given');
    }
    storage = new FileStorage(config.dataDir);
  }

  return {
    params: getNetworkParams(config.network),
    storage,
    gapLimit: positiveInteger(config.gapLimit, DEFAULT_GAP_LIMIT, 'gapLimit'),
    headerWindow: positiveInteger(config.headerWindow, DEFAULT_HEADER_WINDOW, 'headerWindow')
  };
}

export class Wallet {
  private inflight: InflightSync | null = null;

  private constructor(
    private readonly config: ResolvedConfig,
    private readonly deriver: AddressDeriver,
    private readonly store: Store
  ) {}

  /**
   * Parse the descriptor, bind it to the network and load persisted state
   */
  static async open(config: WalletConfig): Promise<Wallet> {
    const resolved: ResolvedConfig = {
      ...resolveConfig(config),
      unblinder: config.unblinder ?? (await ConfidentialUnblinder.create())
    };
    const descriptor = parseDescriptor(config.descriptor);
    const deriver = new AddressDeriver(descriptor, resolved.params.network);
    const store = await Store.open(resolved.storage, {
      descriptor: descriptor.text,
      network: resolved.params.network
    });

    log.info('wallet opened', { network: resolved.params.network, walletId: store.walletId });
    return new Wallet(resolved, deriver, store);
  }

  get network(): Network {
    return this.config.params.network;
  }

  get walletId(): string {
    return this.store.walletId;
  }

  private ensureNetwork(network: Network): void {
    if (network !== this.network) {
      throw new NetworkMismatchError(this.network, network);
    }
  }

  // ============================================
  // Addresses
  // ============================================

  /**
   * Hand out the next unused address. No two calls return the same index.
   */
  async address(): Promise<AddressResult> {
    const index = await this.store.write(draft => {
      const next = (draft.lastIndex ?? -1) + 1;
      draft.lastIndex = next;
      return next;
    });
    return this.addressAt(index);
  }

  /**
   * Address at an index, without marking it used
   */
  addressAt(index: number): AddressResult {
    const derived = this.deriver.derive(index);
    secureZero(derived.blindingPrivateKey);
    return {
      index,
      address: derived.address,
      script: bytesToHex(derived.script)
    };
  }

  // ============================================
  // Sync
  // ============================================

  /**
   * Run one sync pass against the backend. Calls made while a pass is in
   * flight join it; joining with another backend is refused.
   */
  sync(backend: BlockchainBackend, options: SyncOptions = {}): Promise<SyncResult> {
    try {
      this.ensureNetwork(backend.network);
      this.store.read();
    } catch (error) {
      return Promise.reject(error);
    }

    if (this.inflight) {
      if (this.inflight.backend !== backend) {
        return Promise.reject(new ConfigError('A sync against another backend is in flight'));
      }
      log.debug('joining sync in flight');
      if (options.onStateChange) {
        this.inflight.listeners.add(options.onStateChange);
      }
      return this.inflight.pass;
    }

    const listeners = new Set<(state: SyncState) => void>();
    if (options.onStateChange) {
      listeners.add(options.onStateChange);
    }
    const syncer = new Syncer(this.store, this.deriver, backend, {
      gapLimit: this.config.gapLimit,
      headerWindow: this.config.headerWindow,
      unblinder: this.config.unblinder,
      signal: options.signal,
      onStateChange: state => listeners.forEach(listener => listener(state))
    });

    const pass = syncer.run().finally(() => {
      this.inflight = null;
    });
    this.inflight = { backend, listeners, pass };
    return pass;
  }

  // ============================================
  // Reads
  // ============================================

  balance(): Balance {
    return computeBalance(this.utxos(), this.config.params.policyAsset);
  }

  utxos(): WalletTxOut[] {
    return listUtxos(this.store.read());
  }

  /**
   * Unspent outputs of one asset
   */
  assetUtxos(asset: string): WalletTxOut[] {
    return this.utxos().filter(utxo => utxo.asset === asset);
  }

  transactions(): WalletTx[] {
    return listTransactions(this.store.read());
  }

  tip(): ChainTip | null {
    const { tip } = this.store.read();
    return tip ? { ...tip } : null;
  }

  policyAsset(): string {
    return this.config.params.policyAsset;
  }

  // ============================================
  // Outgoing
  // ============================================

  /**
   * Broadcast a transaction; the backend must answer with its txid
   */
  async broadcast(tx: Transaction, backend: BlockchainBackend): Promise<string> {
    this.ensureNetwork(backend.network);
    const expected = computeTxid(tx);

    let txid: string;
    try {
      txid = await backend.broadcast(tx);
    } catch (error) {
      if (error instanceof WalletError) throw error;
      throw new TransportError(`Broadcast failed: ${errorMessage(error)}`, { cause: error });
    }

    if (txid !== expected) {
      throw new ProtocolViolationError(`Broadcast returned ${txid}, expected ${expected}`);
    }
    log.info('transaction broadcast', { txid });
    return txid;
  }

  /**
   * Hand a PSET to a signer bound to the wallet's network
   */
  async signPset(pset: string, signer: Signer): Promise<string> {
    this.ensureNetwork(signer.network);
    return signer.sign(pset);
  }
}
