/**
 * Derived views over a snapshot. Nothing here is stored.
 */

import type { Balance, WalletTx, WalletTxOut } from '../types/index';
import { outpointKey, spentOutpoints, transactionToHex } from '../transactions/serialization';
import { bytesToHex } from '../utils/bytes';
import type { Snapshot } from './cache';

/**
 * Wallet outputs spent by some known transaction
 */
export function spentIndex(snapshot: Snapshot): Set<string> {
  const spent = new Set<string>();
  for (const tx of snapshot.transactions.values()) {
    for (const key of spentOutpoints(tx)) {
      if (snapshot.unblinded.has(key)) {
        spent.add(key);
      }
    }
  }
  return spent;
}

/**
 * Unspent wallet outputs, largest first
 */
export function listUtxos(snapshot: Snapshot): WalletTxOut[] {
  const spent = spentIndex(snapshot);
  const utxos: WalletTxOut[] = [];

  for (const [key, secrets] of snapshot.unblinded) {
    if (spent.has(key)) continue;
    const separator = key.lastIndexOf(':');
    const txid = key.slice(0, separator);
    const vout = Number(key.slice(separator + 1));
    const output = snapshot.transactions.get(txid)?.outputs[vout];
    if (!output) continue;

    utxos.push({
      ...secrets,
      outpoint: { txid, vout },
      script: bytesToHex(output.script),
      height: snapshot.heights.get(txid) ?? null
    });
  }

  return utxos.sort((a, b) => {
    if (a.value !== b.value) return b.value - a.value;
    const ka = outpointKey(a.outpoint.txid, a.outpoint.vout);
    const kb = outpointKey(b.outpoint.txid, b.outpoint.vout);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}

/**
 * Sum of unspent values per asset; the policy asset is always present
 */
export function computeBalance(utxos: WalletTxOut[], policyAsset: string): Balance {
  const balance: Balance = { [policyAsset]: 0 };
  for (const utxo of utxos) {
    balance[utxo.asset] = (balance[utxo.asset] ?? 0) + utxo.value;
  }
  return balance;
}

/**
 * Wallet transactions, unconfirmed first, then by descending height;
 * ties by descending txid
 */
export function listTransactions(snapshot: Snapshot): WalletTx[] {
  const list: WalletTx[] = [];
  for (const [txid, tx] of snapshot.transactions) {
    const height = snapshot.heights.get(txid) ?? null;
    const header = height === null ? undefined : snapshot.headers.get(height);
    list.push({
      txid,
      hex: transactionToHex(tx),
      height,
      blockHash: header?.hash,
      timestamp: header?.time
    });
  }

  return list.sort((a, b) => {
    const ha = a.height ?? Number.MAX_SAFE_INTEGER;
    const hb = b.height ?? Number.MAX_SAFE_INTEGER;
    if (ha !== hb) return hb - ha;
    return a.txid < b.txid ? 1 : a.txid > b.txid ? -1 : 0;
  });
}
