/**
 * Syncer
 *
 * One synchronization pass, run to completion:
 *
 *   idle -> discovering-scripts -> fetching-histories
 *        -> fetching-bodies-and-headers -> unblinding
 *        -> reconciling-reorg -> committing -> idle
 *
 * All work before `committing` is pass-local. A failure or an abort at any
 * point leaves the store exactly as it was.
 */

import type { BlockHeader, ChainTip, HistoryEntry, TxOutSecrets } from '../types/index';
import type { Transaction } from '../transactions/types';
import type { BlockchainBackend } from '../backend/types';
import type { AddressDeriver } from '../descriptor/deriver';
import type { Unblinder } from '../confidential/unblinder';
import type { Store } from '../store/store';
import type { CacheState, HeaderRecord, ScriptSubscription, Snapshot } from '../store/cache';
import { computeTxid, outpointKey } from '../transactions/serialization';
import { ProtocolViolationError, SyncAbortedError, TransportError, WalletError, errorMessage } from '../errors';
import { bytesToHex, secureZero } from '../utils/bytes';
import { createLogger } from '../utils/logger';

const log = createLogger('Syncer');

const TXID_PATTERN = /^[0-9a-f]{64}$/;

export type SyncState =
  | 'idle'
  | 'discovering-scripts'
  | 'fetching-histories'
  | 'fetching-bodies-and-headers'
  | 'unblinding'
  | 'reconciling-reorg'
  | 'committing';

export interface SyncerOptions {
  /** Consecutive unused indices probed past the last used one */
  gapLimit: number;
  /** Depth below the tip within which stored headers are re-checked */
  headerWindow: number;
  unblinder: Unblinder;
  signal?: AbortSignal;
  onStateChange?: (state: SyncState) => void;
}

export interface SyncResult {
  /** Whether the pass committed anything */
  changed: boolean;
  tip: ChainTip;
  newTransactions: string[];
  /** Known transactions whose height changed */
  updatedHeights: string[];
  removed: string[];
  lastIndex: number | undefined;
}

interface ProbedScript {
  index: number;
  script: Uint8Array;
  hex: string;
  status: string | null;
}

interface ReorgCheck {
  /** Stored header heights the backend no longer agrees with */
  mismatched: Set<number>;
  /** Backend headers at the checked heights */
  headers: Map<number, HeaderRecord>;
  /** Transactions confirmed at or above the lowest mismatch */
  demoted: Set<string>;
}

/**
 * Everything a pass will commit
 */
interface PassChanges {
  tip: BlockHeader;
  scripts: ProbedScript[];
  subscriptions: Map<string, ScriptSubscription>;
  transactions: Map<string, Transaction>;
  heights: Map<string, number | null>;
  unblinded: Map<string, TxOutSecrets>;
  removed: string[];
  headers: Map<number, HeaderRecord>;
  mismatched: Set<number>;
  lastIndex: number | undefined;
}

function sameTxids(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((txid, i) => txid === b[i]);
}

export class Syncer {
  private current: SyncState = 'idle';

  constructor(
    private readonly store: Store,
    private readonly deriver: AddressDeriver,
    private readonly backend: BlockchainBackend,
    private readonly options: SyncerOptions
  ) {}

  get state(): SyncState {
    return this.current;
  }

  private transition(next: SyncState): void {
    if (next !== 'idle') {
      this.checkAborted();
    }
    log.debug(`${this.current} -> ${next}`);
    this.current = next;
    this.options.onStateChange?.(next);
  }

  private checkAborted(): void {
    if (this.options.signal?.aborted) {
      throw new SyncAbortedError();
    }
  }

  /**
   * Invoke the backend; failures that are not already classified become
   * transport errors
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof WalletError) throw error;
      throw new TransportError(`Backend ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async run(): Promise<SyncResult> {
    try {
      return await this.pass();
    } catch (error) {
      if (error instanceof ProtocolViolationError) {
        log.error('backend protocol violation', { error: error.message });
      } else {
        log.warn('sync pass failed', { error: errorMessage(error) });
      }
      throw error;
    } finally {
      this.transition('idle');
    }
  }

  private async pass(): Promise<SyncResult> {
    const snapshot = this.store.read();

    this.transition('discovering-scripts');
    let tip = await this.call('tip', () => this.backend.tip());
    const { probed, lastIndex } = await this.discover(snapshot);

    this.transition('fetching-histories');
    const reorg = await this.detectReorg(snapshot, tip);
    const { subscriptions, seen } = await this.fetchHistories(snapshot, probed, reorg);

    let maxHeight = -1;
    for (const height of seen.values()) {
      if (height !== null && height > maxHeight) maxHeight = height;
    }
    if (maxHeight > tip.height) {
      log.debug('history is ahead of the tip, refreshing', { height: maxHeight, tip: tip.height });
      tip = await this.call('tip', () => this.backend.tip());
      if (maxHeight > tip.height) {
        throw new ProtocolViolationError(`History height ${maxHeight} is above tip ${tip.height}`);
      }
    }

    const heights = new Map<string, number | null>();
    for (const [txid, height] of seen) {
      if (snapshot.heights.get(txid) !== height || reorg.demoted.has(txid) || !snapshot.heights.has(txid)) {
        heights.set(txid, height);
      }
    }

    this.transition('fetching-bodies-and-headers');
    const transactions = await this.fetchBodies(snapshot, heights);
    const headers = await this.fetchHeaders(snapshot, tip, heights, reorg);

    this.transition('unblinding');
    const unblinded = this.unblind(snapshot, probed, subscriptions, transactions);

    this.transition('reconciling-reorg');
    const removed = this.reconcile(snapshot, subscriptions, reorg);

    this.transition('committing');
    const changes: PassChanges = {
      tip,
      scripts: probed.filter(p => !snapshot.scripts.has(p.hex)),
      subscriptions,
      transactions,
      heights,
      unblinded,
      removed,
      headers,
      mismatched: reorg.mismatched,
      lastIndex
    };
    return this.commit(snapshot, changes);
  }

  // ============================================
  // Discovering scripts
  // ============================================

  /**
   * Probe indices until `gapLimit` consecutive indices past the highest
   * used one show no history. A descriptor without wildcard has a single
   * script, probed at index 0.
   */
  private async discover(snapshot: Snapshot): Promise<{ probed: ProbedScript[]; lastIndex: number | undefined }> {
    const probed: ProbedScript[] = [];
    let highest = snapshot.lastIndex ?? -1;
    let next = 0;

    for (;;) {
      const end = this.deriver.ranged ? highest + 1 + this.options.gapLimit : 1;
      if (next >= end) break;

      const window: number[] = [];
      for (let index = next; index < end; index++) window.push(index);
      next = end;

      const statuses = await Promise.all(
        window.map(index => this.call('subscribe', () => this.backend.subscribe(this.deriver.script(index))))
      );

      window.forEach((index, i) => {
        const status = statuses[i];
        if (status !== null && typeof status !== 'string') {
          throw new ProtocolViolationError(`Malformed status for index ${index}`);
        }
        probed.push({ index, script: this.deriver.script(index), hex: this.deriver.scriptHex(index), status });
        if (status !== null && index > highest) {
          highest = index;
        }
      });
      this.checkAborted();
    }

    log.debug('discovery finished', { probed: probed.length, highest });
    return { probed, lastIndex: highest >= 0 ? highest : undefined };
  }

  // ============================================
  // Fetching histories
  // ============================================

  /**
   * Compare stored headers near the tip with the backend's when the tip
   * moved
   */
  private async detectReorg(snapshot: Snapshot, tip: BlockHeader): Promise<ReorgCheck> {
    const check: ReorgCheck = { mismatched: new Set(), headers: new Map(), demoted: new Set() };
    if (!snapshot.tip || snapshot.tip.hash === tip.hash) {
      return check;
    }

    const floor = tip.height - this.options.headerWindow;
    const heights = [...snapshot.headers.keys()].filter(height => height >= floor).sort((a, b) => a - b);
    const below = heights.filter(height => height < tip.height);

    const fetched = below.length > 0 ? await this.call('headers', () => this.backend.headers(below)) : [];
    this.expectHeaders(below, fetched);
    for (const header of fetched) {
      check.headers.set(header.height, { hash: header.hash, time: header.time });
    }
    check.headers.set(tip.height, { hash: tip.hash, time: tip.time });

    for (const height of heights) {
      const current = check.headers.get(height);
      if (!current || current.hash !== snapshot.headers.get(height)?.hash) {
        check.mismatched.add(height);
      }
    }

    if (check.mismatched.size > 0) {
      const lowest = Math.min(...check.mismatched);
      for (const [txid, height] of snapshot.heights) {
        if (height !== null && height >= lowest) {
          check.demoted.add(txid);
        }
      }
      log.warn('reorg detected', { lowest, tip: tip.height, demoted: check.demoted.size });
    }
    return check;
  }

  private async fetchHistories(
    snapshot: Snapshot,
    probed: ProbedScript[],
    reorg: ReorgCheck
  ): Promise<{ subscriptions: Map<string, ScriptSubscription>; seen: Map<string, number | null> }> {
    const subscriptions = new Map<string, ScriptSubscription>();
    const toFetch: ProbedScript[] = [];

    for (const p of probed) {
      const stored = snapshot.subscriptions.get(p.hex);
      const touchesDemoted = stored?.txids.some(txid => reorg.demoted.has(txid)) ?? false;
      if ((stored?.status ?? null) !== p.status || touchesDemoted) {
        toFetch.push(p);
      } else if (!stored) {
        subscriptions.set(p.hex, { status: null, txids: [] });
      }
    }

    const histories =
      toFetch.length > 0 ? await this.call('histories', () => this.backend.histories(toFetch.map(p => p.script))) : [];
    if (histories.length !== toFetch.length) {
      throw new ProtocolViolationError(`Asked ${toFetch.length} histories, got ${histories.length}`);
    }

    const seen = new Map<string, number | null>();
    toFetch.forEach((p, i) => {
      const history = histories[i];
      for (const entry of history) {
        this.validateEntry(entry);
        const previous = seen.get(entry.txid);
        if (previous !== undefined && previous !== entry.height) {
          throw new ProtocolViolationError(`Transaction ${entry.txid} reported at two heights`);
        }
        seen.set(entry.txid, entry.height);
      }
      subscriptions.set(p.hex, { status: p.status, txids: history.map(entry => entry.txid) });
    });

    log.debug('histories fetched', { scripts: toFetch.length, transactions: seen.size });
    return { subscriptions, seen };
  }

  private validateEntry(entry: HistoryEntry): void {
    if (typeof entry.txid !== 'string' || !TXID_PATTERN.test(entry.txid)) {
      throw new ProtocolViolationError(`Malformed txid in history: ${String(entry.txid)}`);
    }
    if (entry.height !== null && (!Number.isInteger(entry.height) || entry.height <= 0)) {
      throw new ProtocolViolationError(`Malformed height ${entry.height} for ${entry.txid}`);
    }
  }

  // ============================================
  // Fetching bodies and headers
  // ============================================

  private async fetchBodies(snapshot: Snapshot, heights: Map<string, number | null>): Promise<Map<string, Transaction>> {
    const missing = [...heights.keys()].filter(txid => !snapshot.transactions.has(txid));
    const bodies = missing.length > 0 ? await this.call('transactions', () => this.backend.transactions(missing)) : [];
    if (bodies.length !== missing.length) {
      throw new ProtocolViolationError(`Asked ${missing.length} transactions, got ${bodies.length}`);
    }

    const transactions = new Map<string, Transaction>();
    bodies.forEach((tx, i) => {
      const txid = computeTxid(tx);
      if (txid !== missing[i]) {
        throw new ProtocolViolationError(`Asked transaction ${missing[i]}, got ${txid}`);
      }
      transactions.set(txid, tx);
    });
    return transactions;
  }

  private async fetchHeaders(
    snapshot: Snapshot,
    tip: BlockHeader,
    heights: Map<string, number | null>,
    reorg: ReorgCheck
  ): Promise<Map<number, HeaderRecord>> {
    const headers = new Map(reorg.headers);
    headers.set(tip.height, { hash: tip.hash, time: tip.time });

    const needed = new Set<number>();
    for (const height of heights.values()) {
      if (height === null || headers.has(height)) continue;
      if (snapshot.headers.has(height) && !reorg.mismatched.has(height)) continue;
      needed.add(height);
    }

    const wanted = [...needed].sort((a, b) => a - b);
    const fetched = wanted.length > 0 ? await this.call('headers', () => this.backend.headers(wanted)) : [];
    this.expectHeaders(wanted, fetched);
    for (const header of fetched) {
      headers.set(header.height, { hash: header.hash, time: header.time });
    }
    return headers;
  }

  private expectHeaders(heights: number[], headers: BlockHeader[]): void {
    if (headers.length !== heights.length) {
      throw new ProtocolViolationError(`Asked ${heights.length} headers, got ${headers.length}`);
    }
    headers.forEach((header, i) => {
      if (header.height !== heights[i]) {
        throw new ProtocolViolationError(`Asked header at ${heights[i]}, got one at ${header.height}`);
      }
    });
  }

  // ============================================
  // Unblinding
  // ============================================

  /**
   * Open wallet outputs of newly fetched transactions, and of stored
   * transactions paying a script this pass discovered
   */
  private unblind(
    snapshot: Snapshot,
    probed: ProbedScript[],
    subscriptions: Map<string, ScriptSubscription>,
    transactions: Map<string, Transaction>
  ): Map<string, TxOutSecrets> {
    const owned = new Set(snapshot.scripts.keys());
    const discovered = new Set<string>();
    for (const p of probed) {
      owned.add(p.hex);
      if (!snapshot.scripts.has(p.hex)) discovered.add(p.hex);
    }

    const unblinded = new Map<string, TxOutSecrets>();
    for (const [txid, tx] of transactions) {
      this.unblindOutputs(txid, tx, owned, unblinded);
    }

    const revisited = new Set<string>();
    for (const hex of discovered) {
      for (const txid of subscriptions.get(hex)?.txids ?? []) {
        const tx = snapshot.transactions.get(txid);
        if (!tx || transactions.has(txid) || revisited.has(txid)) continue;
        revisited.add(txid);
        this.unblindOutputs(txid, tx, discovered, unblinded);
      }
    }
    if (revisited.size > 0) {
      log.debug('stored transactions pay discovered scripts', { count: revisited.size });
    }
    return unblinded;
  }

  private unblindOutputs(
    txid: string,
    tx: Transaction,
    scripts: Set<string>,
    unblinded: Map<string, TxOutSecrets>
  ): void {
    tx.outputs.forEach((output, vout) => {
      if (!scripts.has(bytesToHex(output.script))) return;

      const key = this.deriver.blindingKey(output.script);
      try {
        const result = this.options.unblinder.unblind(output, key);
        if (result.status === 'unblinded') {
          unblinded.set(outpointKey(txid, vout), result.secrets);
        } else {
          log.debug('output not ours', { txid, vout, reason: result.reason });
        }
      } finally {
        secureZero(key);
      }
    });
  }

  // ============================================
  // Reconciling reorgs
  // ============================================

  /**
   * Transactions no history references any more. Unconfirmed ones were
   * evicted; confirmed ones may only vanish through a detected reorg.
   */
  private reconcile(
    snapshot: Snapshot,
    subscriptions: Map<string, ScriptSubscription>,
    reorg: ReorgCheck
  ): string[] {
    const referenced = new Set<string>();
    for (const [hex, subscription] of snapshot.subscriptions) {
      const txids = subscriptions.get(hex)?.txids ?? subscription.txids;
      txids.forEach(txid => referenced.add(txid));
    }
    for (const subscription of subscriptions.values()) {
      subscription.txids.forEach(txid => referenced.add(txid));
    }

    const removed: string[] = [];
    for (const [txid, height] of snapshot.heights) {
      if (referenced.has(txid)) continue;
      if (height !== null && !reorg.demoted.has(txid)) {
        throw new ProtocolViolationError(`Transaction ${txid} confirmed at ${height} vanished without a reorg`);
      }
      removed.push(txid);
    }

    if (removed.length > 0) {
      log.info('removing transactions no longer in any history', { count: removed.length });
    }
    return removed;
  }

  // ============================================
  // Committing
  // ============================================

  private async commit(snapshot: Snapshot, changes: PassChanges): Promise<SyncResult> {
    const tip: ChainTip = { height: changes.tip.height, hash: changes.tip.hash };

    const newTransactions = [...changes.transactions.keys()];
    const updatedHeights = [...changes.heights.entries()]
      .filter(([txid, height]) => snapshot.heights.has(txid) && snapshot.heights.get(txid) !== height)
      .map(([txid]) => txid);
    const subscriptionsChanged = [...changes.subscriptions].some(([hex, subscription]) => {
      const stored = snapshot.subscriptions.get(hex);
      return !stored || stored.status !== subscription.status || !sameTxids(stored.txids, subscription.txids);
    });
    const lastIndexChanged = changes.lastIndex !== undefined && changes.lastIndex > (snapshot.lastIndex ?? -1);

    const changed =
      snapshot.tip?.hash !== tip.hash ||
      snapshot.tip?.height !== tip.height ||
      changes.scripts.length > 0 ||
      subscriptionsChanged ||
      newTransactions.length > 0 ||
      updatedHeights.length > 0 ||
      changes.removed.length > 0 ||
      changes.unblinded.size > 0 ||
      changes.mismatched.size > 0 ||
      lastIndexChanged;

    if (!changed) {
      log.debug('nothing changed');
      return {
        changed: false,
        tip,
        newTransactions,
        updatedHeights,
        removed: [],
        lastIndex: snapshot.lastIndex
      };
    }

    this.checkAborted();
    const lastIndex = await this.store.write(draft => {
      applyChanges(draft, tip, changes);
      return draft.lastIndex;
    });

    log.info('sync committed', {
      tip: tip.height,
      newTransactions: newTransactions.length,
      updatedHeights: updatedHeights.length,
      removed: changes.removed.length
    });

    return {
      changed: true,
      tip,
      newTransactions,
      updatedHeights,
      removed: changes.removed,
      lastIndex
    };
  }
}

/**
 * Fold a pass into the writer's draft
 */
function applyChanges(draft: CacheState, tip: ChainTip, changes: PassChanges): void {
  draft.tip = tip;

  for (const p of changes.scripts) {
    draft.scripts.set(p.hex, p.index);
  }
  for (const [hex, subscription] of changes.subscriptions) {
    draft.subscriptions.set(hex, subscription);
  }

  for (const txid of changes.removed) {
    const tx = draft.transactions.get(txid);
    tx?.outputs.forEach((_, vout) => draft.unblinded.delete(outpointKey(txid, vout)));
    draft.transactions.delete(txid);
    draft.heights.delete(txid);
  }

  for (const [txid, tx] of changes.transactions) {
    draft.transactions.set(txid, tx);
  }
  for (const [txid, height] of changes.heights) {
    draft.heights.set(txid, height);
  }
  for (const [key, secrets] of changes.unblinded) {
    draft.unblinded.set(key, secrets);
  }

  const headers = new Map<number, HeaderRecord>();
  const keep = (height: number): void => {
    const record =
      changes.headers.get(height) ?? (changes.mismatched.has(height) ? undefined : draft.headers.get(height));
    if (record) headers.set(height, record);
  };
  keep(tip.height);
  for (const height of draft.heights.values()) {
    if (height !== null) keep(height);
  }
  draft.headers = headers;

  if (changes.lastIndex !== undefined && changes.lastIndex > (draft.lastIndex ?? -1)) {
    draft.lastIndex = changes.lastIndex;
  }
}
