/**
 * In-memory chain
 *
 * A simulated Elements chain with a mempool, mining, reorganizations and
 * one-shot failure injection. Used as the test double of the syncer and
 * for embedding without a server.
 */

import type { BlockHeader, HistoryEntry, Network } from '../types/index';
import type { Transaction } from '../transactions/types';
import { computeTxid } from '../transactions/serialization';
import { blockHash, type RawBlockHeader } from '../transactions/header';
import { TransportError } from '../errors';
import { ByteWriter, bytesEqual, displayHexToHash, hashToDisplayHex } from '../utils/bytes';
import { doubleSha256 } from '../utils/hash';
import { electrumStatus, scriptHash, type BlockchainBackend } from './types';

export type BackendMethod = 'tip' | 'subscribe' | 'histories' | 'transactions' | 'headers' | 'broadcast';

interface Block {
  header: BlockHeader;
  txids: string[];
}

export interface MemoryBackendOptions {
  /** Height of the initial tip; blocks below it are empty */
  height?: number;
  /** Timestamp of the genesis block */
  genesisTime?: number;
}

const BLOCK_INTERVAL = 60;

export class MemoryBackend implements BlockchainBackend {
  private readonly blocks: Block[] = [];
  private mempool: string[] = [];
  private readonly txs: Map<string, Transaction> = new Map();
  private readonly failures: Map<BackendMethod, Error> = new Map();
  private readonly subscribed: Set<string> = new Set();
  private blockSalt = 0;

  /** Number of calls per method, failed ones included */
  readonly calls: Record<BackendMethod, number> = {
    tip: 0,
    subscribe: 0,
    histories: 0,
    transactions: 0,
    headers: 0,
    broadcast: 0
  };

  constructor(
    readonly network: Network,
    options: MemoryBackendOptions = {}
  ) {
    this.pushBlock([], options.genesisTime ?? 1700000000);
    this.mineEmpty(options.height ?? 0);
  }

  // ============================================
  // Chain simulation
  // ============================================

  get height(): number {
    return this.blocks.length - 1;
  }

  private pushBlock(txids: string[], time: number): BlockHeader {
    const height = this.blocks.length;
    const prev = this.blocks[height - 1];
    const rootPreimage = new ByteWriter().writeUInt32LE(this.blockSalt++);
    for (const txid of txids) {
      rootPreimage.writeBytes(displayHexToHash(txid));
    }

    const raw: RawBlockHeader = {
      version: 1,
      prevHash: prev ? displayHexToHash(prev.header.hash) : new Uint8Array(32),
      merkleRoot: doubleSha256(rootPreimage.toBytes()),
      time,
      height,
      ext: { type: 'proof', challenge: Uint8Array.of(0x51), solution: new Uint8Array(0) }
    };
    const header: BlockHeader = {
      version: raw.version,
      prevHash: hashToDisplayHex(raw.prevHash),
      merkleRoot: hashToDisplayHex(raw.merkleRoot),
      time,
      height,
      hash: blockHash(raw)
    };
    this.blocks.push({ header, txids });
    return header;
  }

  private nextTime(): number {
    return this.blocks[this.blocks.length - 1].header.time + BLOCK_INTERVAL;
  }

  /**
   * Add a transaction to the mempool; returns its txid
   */
  addToMempool(tx: Transaction): string {
    const txid = computeTxid(tx);
    if (!this.txs.has(txid)) {
      this.txs.set(txid, tx);
    }
    if (!this.mempool.includes(txid) && this.confirmedHeight(txid) === null) {
      this.mempool.push(txid);
    }
    return txid;
  }

  /**
   * Mine one block with the whole mempool, or only the given txids
   */
  mine(txids?: string[]): BlockHeader {
    const included = txids ?? this.mempool;
    for (const txid of included) {
      if (!this.txs.has(txid)) {
        throw new Error(`Cannot mine unknown transaction ${txid}`);
      }
    }
    this.mempool = this.mempool.filter(txid => !included.includes(txid));
    return this.pushBlock([...included], this.nextTime());
  }

  mineEmpty(count: number): void {
    for (let i = 0; i < count; i++) {
      this.pushBlock([], this.nextTime());
    }
  }

  /**
   * Disconnect the top `depth` blocks; their transactions return to the
   * mempool
   */
  disconnect(depth: number): void {
    if (depth >= this.blocks.length) {
      throw new Error('Cannot disconnect the genesis block');
    }
    const removed = this.blocks.splice(this.blocks.length - depth, depth);
    const returned = removed.flatMap(block => block.txids);
    this.mempool = [...returned, ...this.mempool];
  }

  /**
   * Remove a transaction from the mempool, as if it was evicted or
   * double spent
   */
  evict(txid: string): void {
    this.mempool = this.mempool.filter(id => id !== txid);
  }

  /**
   * Make the next call of a method fail with the given error
   */
  failNext(method: BackendMethod, error: Error = new TransportError(`${method} unavailable`)): void {
    this.failures.set(method, error);
  }

  private enter(method: BackendMethod): void {
    this.calls[method]++;
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }

  private confirmedHeight(txid: string): number | null {
    for (let height = this.blocks.length - 1; height >= 0; height--) {
      if (this.blocks[height].txids.includes(txid)) {
        return height;
      }
    }
    return null;
  }

  /**
   * Chain-ordered history of a script: transactions paying to it or
   * spending one of its outputs
   */
  private history(script: Uint8Array): HistoryEntry[] {
    const touches = (txid: string): boolean => {
      const tx = this.txs.get(txid);
      if (!tx) return false;
      if (tx.outputs.some(output => bytesEqual(output.script, script))) {
        return true;
      }
      return tx.inputs.some(input => {
        const prev = this.txs.get(hashToDisplayHex(input.prevHash));
        const spent = prev?.outputs[input.prevIndex];
        return spent !== undefined && bytesEqual(spent.script, script);
      });
    };

    const entries: HistoryEntry[] = [];
    this.blocks.forEach((block, height) => {
      for (const txid of block.txids) {
        if (touches(txid)) entries.push({ txid, height });
      }
    });
    for (const txid of this.mempool) {
      if (touches(txid)) entries.push({ txid, height: null });
    }
    return entries;
  }

  // ============================================
  // BlockchainBackend
  // ============================================

  async tip(): Promise<BlockHeader> {
    this.enter('tip');
    return this.blocks[this.blocks.length - 1].header;
  }

  async subscribe(script: Uint8Array): Promise<string | null> {
    this.enter('subscribe');
    this.subscribed.add(scriptHash(script));
    const history = this.history(script);
    return electrumStatus(history.map(entry => ({ txid: entry.txid, height: entry.height ?? 0 })));
  }

  async histories(scripts: Uint8Array[]): Promise<HistoryEntry[][]> {
    this.enter('histories');
    return scripts.map(script => this.history(script));
  }

  async transactions(txids: string[]): Promise<Transaction[]> {
    this.enter('transactions');
    return txids.map(txid => {
      const tx = this.txs.get(txid);
      if (!tx) {
        throw new TransportError(`No such mempool or blockchain transaction ${txid}`);
      }
      return tx;
    });
  }

  async headers(heights: number[]): Promise<BlockHeader[]> {
    this.enter('headers');
    return heights.map(height => {
      const block = this.blocks[height];
      if (!block) {
        throw new TransportError(`No block at height ${height}`);
      }
      return block.header;
    });
  }

  async broadcast(tx: Transaction): Promise<string> {
    this.enter('broadcast');
    return this.addToMempool(tx);
  }

  /**
   * Number of distinct scripts ever watched
   */
  get watchedScripts(): number {
    return this.subscribed.size;
  }
}
