/**
 * Blockchain backend capability
 *
 * The syncer depends only on this interface. Adapters: Electrum
 * (TCP/TLS line protocol), Elements node JSON-RPC and an in-memory chain.
 */

import type { BlockHeader, HistoryEntry, Network } from '../types/index';
import type { Transaction } from '../transactions/types';
import { bytesToHex, hashToDisplayHex, stringToBytes } from '../utils/bytes';
import { sha256 } from '../utils/hash';

export interface BlockchainBackend {
  readonly network: Network;

  /** Current chain head */
  tip(): Promise<BlockHeader>;

  /**
   * Watch a script and return its status fingerprint, or null when the
   * script has no history. Watching an already watched script is not an
   * error.
   */
  subscribe(script: Uint8Array): Promise<string | null>;

  /** One history per script, in input order */
  histories(scripts: Uint8Array[]): Promise<HistoryEntry[][]>;

  /** Raw transactions in input order; fails if any id is unknown */
  transactions(txids: string[]): Promise<Transaction[]>;

  headers(heights: number[]): Promise<BlockHeader[]>;

  /** Returns the txid the backend accepted */
  broadcast(tx: Transaction): Promise<string>;
}

/**
 * Electrum history item with the server's raw height: 0 in the mempool,
 * -1 in the mempool with unconfirmed parents
 */
export interface RawHistoryItem {
  txid: string;
  height: number;
}

/**
 * Electrum script hash: reversed SHA-256 of the script, hex
 */
export function scriptHash(script: Uint8Array): string {
  return hashToDisplayHex(sha256(script));
}

/**
 * Electrum status of a history: SHA-256 of the concatenated
 * `txid:height:` entries, or null for an empty history
 */
export function electrumStatus(history: RawHistoryItem[]): string | null {
  if (history.length === 0) {
    return null;
  }
  const preimage = history.map(item => `${item.txid}:${item.height}:`).join('');
  return bytesToHex(sha256(stringToBytes(preimage)));
}

/**
 * Map a raw server height to a confirmation height
 */
export function confirmationHeight(rawHeight: number): number | null {
  return rawHeight > 0 ? rawHeight : null;
}
