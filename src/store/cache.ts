/**
 * Wallet cache state
 *
 * The mutable draft a writer works on, the read-only snapshot readers see,
 * the consistency rules every committed state satisfies and the persisted
 * JSON form.
 */

import type { ChainTip, TxOutSecrets } from '../types/index';
import type { Transaction } from '../transactions/types';
import { computeTxid, decodeTransaction, transactionToHex } from '../transactions/serialization';
import { StorageError } from '../errors';

export interface HeaderRecord {
  hash: string;
  time: number;
}

export interface ScriptSubscription {
  /** Last status fingerprint reported by the backend */
  status: string | null;
  /** Txids the status covered */
  txids: string[];
}

export interface CacheState {
  tip: ChainTip | null;
  /** Height to header, for the tip and heights holding wallet transactions */
  headers: Map<number, HeaderRecord>;
  /** Script hex to derivation index */
  scripts: Map<string, number>;
  subscriptions: Map<string, ScriptSubscription>;
  transactions: Map<string, Transaction>;
  /** Txid to confirmation height, null while unconfirmed */
  heights: Map<string, number | null>;
  /** "txid:vout" to output secrets */
  unblinded: Map<string, TxOutSecrets>;
  lastIndex: number | undefined;
}

export interface Snapshot {
  readonly tip: ChainTip | null;
  readonly headers: ReadonlyMap<number, HeaderRecord>;
  readonly scripts: ReadonlyMap<string, number>;
  readonly subscriptions: ReadonlyMap<string, ScriptSubscription>;
  readonly transactions: ReadonlyMap<string, Transaction>;
  readonly heights: ReadonlyMap<string, number | null>;
  readonly unblinded: ReadonlyMap<string, TxOutSecrets>;
  readonly lastIndex: number | undefined;
}

export function emptyState(): CacheState {
  return {
    tip: null,
    headers: new Map(),
    scripts: new Map(),
    subscriptions: new Map(),
    transactions: new Map(),
    heights: new Map(),
    unblinded: new Map(),
    lastIndex: undefined
  };
}

/**
 * Copy the containers of a state; entries are shared and never mutated
 */
export function cloneState(state: Snapshot): CacheState {
  return {
    tip: state.tip,
    headers: new Map(state.headers),
    scripts: new Map(state.scripts),
    subscriptions: new Map(state.subscriptions),
    transactions: new Map(state.transactions),
    heights: new Map(state.heights),
    unblinded: new Map(state.unblinded),
    lastIndex: state.lastIndex
  };
}

/**
 * Returns the first consistency rule the state breaks, or null
 */
export function findInconsistency(state: Snapshot): string | null {
  for (const txid of state.heights.keys()) {
    if (!state.transactions.has(txid)) {
      return `height recorded for unknown transaction ${txid}`;
    }
  }
  for (const txid of state.transactions.keys()) {
    if (!state.heights.has(txid)) {
      return `transaction ${txid} has no height entry`;
    }
  }

  for (const key of state.unblinded.keys()) {
    const separator = key.lastIndexOf(':');
    const tx = state.transactions.get(key.slice(0, separator));
    const vout = Number(key.slice(separator + 1));
    if (!tx || !Number.isInteger(vout) || vout < 0 || vout >= tx.outputs.length) {
      return `unblinded output ${key} has no transaction output`;
    }
  }

  let maxHeight = -1;
  for (const height of state.heights.values()) {
    if (height !== null && height > maxHeight) {
      maxHeight = height;
    }
  }
  if (maxHeight >= 0 && (state.tip === null || state.tip.height < maxHeight)) {
    return `tip is below confirmed height ${maxHeight}`;
  }

  if (state.lastIndex !== undefined && (!Number.isInteger(state.lastIndex) || state.lastIndex < 0)) {
    return `invalid last index ${state.lastIndex}`;
  }

  return null;
}

// ============================================
// Persisted form
// ============================================

const FORMAT_VERSION = 1;

interface PersistedState {
  version: number;
  tip: ChainTip | null;
  headers: Array<[number, HeaderRecord]>;
  scripts: Array<[string, number]>;
  subscriptions: Array<[string, ScriptSubscription]>;
  transactions: Array<[string, string]>;
  heights: Array<[string, number | null]>;
  unblinded: Array<[string, TxOutSecrets]>;
  lastIndex: number | null;
}

export function serializeState(state: Snapshot): string {
  const persisted: PersistedState = {
    version: FORMAT_VERSION,
    tip: state.tip,
    headers: [...state.headers.entries()],
    scripts: [...state.scripts.entries()],
    subscriptions: [...state.subscriptions.entries()],
    transactions: [...state.transactions.entries()].map(([txid, tx]) => [txid, transactionToHex(tx)]),
    heights: [...state.heights.entries()],
    unblinded: [...state.unblinded.entries()],
    lastIndex: state.lastIndex ?? null
  };
  return JSON.stringify(persisted);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHeight(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function fail(what: string): never {
  throw new StorageError(`Corrupted wallet state: ${what}`);
}

function pairs(value: unknown, what: string): Array<[unknown, unknown]> {
  if (!Array.isArray(value)) fail(what);
  return value.map((entry: unknown): [unknown, unknown] => {
    if (!Array.isArray(entry) || entry.length !== 2) fail(what);
    return [entry[0], entry[1]];
  });
}

function parseTip(value: unknown): ChainTip | null {
  if (value === null) return null;
  if (!isRecord(value) || !isHeight(value.height) || typeof value.hash !== 'string') fail('tip');
  return { height: value.height, hash: value.hash };
}

function parseSecrets(value: unknown): TxOutSecrets {
  if (
    !isRecord(value) ||
    typeof value.asset !== 'string' ||
    typeof value.value !== 'number' ||
    typeof value.assetBlindingFactor !== 'string' ||
    typeof value.valueBlindingFactor !== 'string'
  ) {
    fail('unblinded output');
  }
  return {
    asset: value.asset,
    value: value.value,
    assetBlindingFactor: value.assetBlindingFactor,
    valueBlindingFactor: value.valueBlindingFactor
  };
}

function parseSubscription(value: unknown): ScriptSubscription {
  if (!isRecord(value) || !Array.isArray(value.txids)) fail('subscription');
  const status = value.status;
  if (status !== null && typeof status !== 'string') fail('subscription status');
  const txids = value.txids.filter((txid): txid is string => typeof txid === 'string');
  if (txids.length !== value.txids.length) fail('subscription txids');
  return { status, txids };
}

/**
 * Rebuild a state from its persisted JSON; decoded transactions must hash
 * to their recorded ids
 */
export function deserializeState(json: string): CacheState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new StorageError('Corrupted wallet state: not JSON', { cause: error });
  }
  if (!isRecord(parsed) || parsed.version !== FORMAT_VERSION) {
    fail('unsupported format version');
  }

  const state = emptyState();
  state.tip = parseTip(parsed.tip);

  for (const [height, header] of pairs(parsed.headers, 'headers')) {
    if (!isHeight(height) || !isRecord(header) || typeof header.hash !== 'string' || typeof header.time !== 'number') {
      fail('header');
    }
    state.headers.set(height, { hash: header.hash, time: header.time });
  }

  for (const [script, index] of pairs(parsed.scripts, 'scripts')) {
    if (typeof script !== 'string' || !isHeight(index)) fail('script');
    state.scripts.set(script, index);
  }

  for (const [script, subscription] of pairs(parsed.subscriptions, 'subscriptions')) {
    if (typeof script !== 'string') fail('subscription');
    state.subscriptions.set(script, parseSubscription(subscription));
  }

  for (const [txid, hex] of pairs(parsed.transactions, 'transactions')) {
    if (typeof txid !== 'string' || typeof hex !== 'string') fail('transaction');
    let tx: Transaction;
    try {
      tx = decodeTransaction(hex);
    } catch (error) {
      throw new StorageError(`Corrupted wallet state: transaction ${txid}`, { cause: error });
    }
    if (computeTxid(tx) !== txid) fail(`transaction ${txid} does not hash to its id`);
    state.transactions.set(txid, tx);
  }

  for (const [txid, height] of pairs(parsed.heights, 'heights')) {
    if (typeof txid !== 'string' || (height !== null && !isHeight(height))) fail('height');
    state.heights.set(txid, height);
  }

  for (const [key, secrets] of pairs(parsed.unblinded, 'unblinded')) {
    if (typeof key !== 'string') fail('unblinded output');
    state.unblinded.set(key, parseSecrets(secrets));
  }

  const lastIndex = parsed.lastIndex;
  if (lastIndex === null) {
    state.lastIndex = undefined;
  } else if (isHeight(lastIndex)) {
    state.lastIndex = lastIndex;
  } else {
    fail('last index');
  }

  const inconsistency = findInconsistency(state);
  if (inconsistency) fail(inconsistency);
  return state;
}
