/**
 * Elements RPC Client
 * Backend over an Elements node's JSON-RPC interface
 *
 * Scripts are watched by importing their unconfidential address into the
 * node's wallet; histories and transaction bodies come from the node's
 * wallet view of them, so the node needs no transaction index.
 */

import type { BlockHeader, HistoryEntry, Network } from '../types/index';
import type { Transaction } from '../transactions/types';
import { decodeTransaction, transactionToHex } from '../transactions/serialization';
import { parseBlockHeader } from '../transactions/header';
import { getNetworkParams, type NetworkParams } from '../config/networks';
import { toUnconfidentialAddress } from '../address/confidentialAddress';
import { ProtocolViolationError, TransportError, errorMessage } from '../errors';
import { bytesEqual, hashToDisplayHex } from '../utils/bytes';
import { createLogger } from '../utils/logger';
import { electrumStatus, type BlockchainBackend } from './types';

const log = createLogger('ElementsRPC');

/** Upper bound of wallet entries requested from `listtransactions` */
const LIST_TRANSACTIONS_COUNT = 1000000;

export interface ElementsRpcConfig {
  url: string;
  credentials?: {
    username: string;
    password: string;
  };
  timeout?: number;
  retries?: number;
  retryDelay?: number;
}

interface WalletTransaction {
  height: number | null | undefined;
  tx: Transaction;
}

interface PendingSubscribe {
  script: Uint8Array;
  resolve: (status: string | null) => void;
  reject: (error: unknown) => void;
}

interface ResolvedConfig {
  url: string;
  credentials?: { username: string; password: string };
  timeout: number;
  retries: number;
  retryDelay: number;
}

/**
 * Error object returned by the node; never retried
 */
export class ElementsRpcError extends TransportError {
  constructor(
    readonly rpcCode: number,
    readonly method: string,
    message: string
  ) {
    super(`${method}: ${message} (code ${rpcCode})`);
    this.name = 'ElementsRpcError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, method: string): string {
  if (typeof value !== 'string') {
    throw new ProtocolViolationError(`Unexpected ${method} result`);
  }
  return value;
}

function expectNumber(value: unknown, method: string): number {
  if (typeof value !== 'number') {
    throw new ProtocolViolationError(`Unexpected ${method} result`);
  }
  return value;
}

function expectList(value: unknown, method: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ProtocolViolationError(`Unexpected ${method} result`);
  }
  return value;
}

export class ElementsRpcClient implements BlockchainBackend {
  private readonly config: ResolvedConfig;
  private readonly params: NetworkParams;
  private requestId = 0;
  private readonly imported = new Set<string>();
  private pendingSubscribes: PendingSubscribe[] = [];

  constructor(
    readonly network: Network,
    config: ElementsRpcConfig
  ) {
    this.config = {
      url: config.url,
      credentials: config.credentials,
      timeout: config.timeout ?? 30000,
      retries: config.retries ?? 3,
      retryDelay: config.retryDelay ?? 1000
    };
    this.params = getNetworkParams(network);
  }

  static fromCredentials(network: Network, url: string, username: string, password: string): ElementsRpcClient {
    return new ElementsRpcClient(network, { url, credentials: { username, password } });
  }

  /**
   * Send an RPC request, retrying transport failures
   */
  private async call(method: string, params: unknown[] = []): Promise<unknown> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.retries; attempt++) {
      try {
        return await this.makeRequest(method, params);
      } catch (error) {
        if (error instanceof ElementsRpcError || error instanceof ProtocolViolationError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        log.warn('request failed', { method, attempt, error: lastError.message });

        if (attempt < this.config.retries) {
          await this.delay(this.config.retryDelay * Math.pow(2, attempt));
        }
      }
    }

    throw new TransportError(`${method} failed after ${this.config.retries + 1} attempts`, { cause: lastError });
  }

  private async makeRequest(method: string, params: unknown[]): Promise<unknown> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json'
    };
    if (this.config.credentials) {
      const auth = btoa(`${this.config.credentials.username}:${this.config.credentials.password}`);
      headers['Authorization'] = `Basic ${auth}`;
    }

    const id = ++this.requestId;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let response: Response;
    let body: unknown;
    try {
      response = await fetch(this.config.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ jsonrpc: '1.0', id, method, params }),
        signal: controller.signal
      });
      const text = await response.text();
      try {
        body = JSON.parse(text);
      } catch {
        throw new TransportError(`HTTP ${response.status}: ${response.statusText}`);
      }
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`${method} timed out after ${this.config.timeout}ms`);
      }
      throw new TransportError(`Cannot connect to Elements RPC endpoint (${this.config.url})`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!isRecord(body)) {
      throw new ProtocolViolationError(`Malformed ${method} response`);
    }
    if (isRecord(body.error)) {
      const code = typeof body.error.code === 'number' ? body.error.code : -1;
      const message = typeof body.error.message === 'string' ? body.error.message : 'Unknown RPC error';
      throw new ElementsRpcError(code, method, message);
    }
    if (!response.ok) {
      throw new TransportError(`HTTP ${response.status}: ${response.statusText}`);
    }
    return body.result;
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Get the blockchain height
   */
  async height(): Promise<number> {
    return expectNumber(await this.call('getblockcount'), 'getblockcount');
  }

  private async headerByHash(hash: string): Promise<BlockHeader> {
    const hex = expectString(await this.call('getblockheader', [hash, false]), 'getblockheader');
    const header = parseBlockHeader(hex);
    if (header.hash !== hash) {
      throw new ProtocolViolationError(`Header for ${hash} hashes to ${header.hash}`);
    }
    return header;
  }

  // ============================================
  // BlockchainBackend
  // ============================================

  async tip(): Promise<BlockHeader> {
    const hash = expectString(await this.call('getbestblockhash'), 'getbestblockhash');
    return this.headerByHash(hash);
  }

  /**
   * Subscribes made in the same tick share one import round and one
   * wallet listing
   */
  subscribe(script: Uint8Array): Promise<string | null> {
    return new Promise((resolve, reject) => {
      this.pendingSubscribes.push({ script, resolve, reject });
      if (this.pendingSubscribes.length === 1) {
        void Promise.resolve().then(() => this.flushSubscribes());
      }
    });
  }

  private async flushSubscribes(): Promise<void> {
    const batch = this.pendingSubscribes.splice(0);
    try {
      const scripts = batch.map(request => request.script);
      await Promise.all(scripts.map(script => this.importAddress(script)));
      const histories = await this.histories(scripts);
      batch.forEach((request, i) =>
        request.resolve(electrumStatus(histories[i].map(entry => ({ txid: entry.txid, height: entry.height ?? 0 }))))
      );
    } catch (error) {
      batch.forEach(request => request.reject(error));
    }
  }

  private async importAddress(script: Uint8Array): Promise<void> {
    const address = toUnconfidentialAddress(script, this.params.address);
    if (this.imported.has(address)) {
      return;
    }
    try {
      await this.call('importaddress', [address, '', false, false]);
    } catch (error) {
      if (!(error instanceof ElementsRpcError && /already/i.test(error.message))) {
        throw error;
      }
      log.debug('address already imported', { address });
    }
    this.imported.add(address);
  }

  async histories(scripts: Uint8Array[]): Promise<HistoryEntry[][]> {
    if (scripts.length === 0) {
      return [];
    }

    const addresses = scripts.map(script => toUnconfidentialAddress(script, this.params.address));
    const received = await this.receivedByAddress();
    const txidSets = addresses.map(address => new Set(received.get(address) ?? []));

    const listing = new Map<string, Promise<WalletTransaction>>();
    const load = (txid: string): Promise<WalletTransaction> => {
      let entry = listing.get(txid);
      if (!entry) {
        entry = this.walletTransaction(txid);
        listing.set(txid, entry);
      }
      return entry;
    };

    await this.addSpends(scripts, txidSets, load);

    const heights = new Map<string, number | null | undefined>();
    for (const txid of new Set(txidSets.flatMap(set => [...set]))) {
      heights.set(txid, (await load(txid)).height);
    }

    return txidSets.map(set => {
      const entries: HistoryEntry[] = [];
      for (const txid of set) {
        const height = heights.get(txid);
        if (height !== undefined) {
          entries.push({ txid, height });
        }
      }
      return entries.sort(compareHistory);
    });
  }

  /**
   * Address to receiving txids, watch-only addresses included
   */
  private async receivedByAddress(): Promise<Map<string, string[]>> {
    const list = expectList(await this.call('listreceivedbyaddress', [0, true, true]), 'listreceivedbyaddress');
    const result = new Map<string, string[]>();
    for (const item of list) {
      if (!isRecord(item) || typeof item.address !== 'string' || !Array.isArray(item.txids)) {
        throw new ProtocolViolationError('Malformed listreceivedbyaddress entry');
      }
      result.set(
        item.address,
        item.txids.filter((txid): txid is string => typeof txid === 'string')
      );
    }
    return result;
  }

  /**
   * Add wallet transactions spending an output of a watched script to that
   * script's history
   */
  private async addSpends(
    scripts: Uint8Array[],
    txidSets: Set<string>[],
    load: (txid: string) => Promise<WalletTransaction>
  ): Promise<void> {
    const list = expectList(
      await this.call('listtransactions', ['*', LIST_TRANSACTIONS_COUNT, 0, true]),
      'listtransactions'
    );
    const sends = new Set<string>();
    for (const item of list) {
      if (isRecord(item) && item.category === 'send' && typeof item.txid === 'string') {
        sends.add(item.txid);
      }
    }

    for (const txid of sends) {
      const { tx } = await load(txid);
      for (const input of tx.inputs) {
        const prevTxid = hashToDisplayHex(input.prevHash);
        for (let i = 0; i < scripts.length; i++) {
          if (!txidSets[i].has(prevTxid)) continue;
          const spent = (await load(prevTxid)).tx.outputs[input.prevIndex];
          if (spent && bytesEqual(spent.script, scripts[i])) {
            txidSets[i].add(txid);
          }
        }
      }
    }
  }

  /**
   * A transaction from the node's wallet, which holds every transaction
   * touching an imported address. Height is undefined for conflicted
   * transactions.
   */
  private async walletTransaction(txid: string): Promise<WalletTransaction> {
    const info = await this.call('gettransaction', [txid, true]);
    if (!isRecord(info) || typeof info.confirmations !== 'number' || typeof info.hex !== 'string') {
      throw new ProtocolViolationError(`Malformed gettransaction result for ${txid}`);
    }

    let height: number | null | undefined;
    if (info.confirmations < 0) {
      height = undefined;
    } else if (info.confirmations === 0) {
      height = null;
    } else {
      height = expectNumber(info.blockheight, 'gettransaction');
    }
    return { height, tx: decodeTransaction(info.hex) };
  }

  async transactions(txids: string[]): Promise<Transaction[]> {
    return Promise.all(txids.map(async txid => (await this.walletTransaction(txid)).tx));
  }

  async headers(heights: number[]): Promise<BlockHeader[]> {
    return Promise.all(
      heights.map(async height => {
        const hash = expectString(await this.call('getblockhash', [height]), 'getblockhash');
        return this.headerByHash(hash);
      })
    );
  }

  async broadcast(tx: Transaction): Promise<string> {
    try {
      return expectString(await this.call('sendrawtransaction', [transactionToHex(tx)]), 'sendrawtransaction');
    } catch (error) {
      log.error('broadcast rejected', { error: errorMessage(error) });
      throw error;
    }
  }
}

/**
 * Confirmed entries by ascending height, then mempool; txid breaks ties
 */
function compareHistory(a: HistoryEntry, b: HistoryEntry): number {
  const ha = a.height ?? Number.MAX_SAFE_INTEGER;
  const hb = b.height ?? Number.MAX_SAFE_INTEGER;
  if (ha !== hb) return ha - hb;
  return a.txid < b.txid ? -1 : a.txid > b.txid ? 1 : 0;
}
