/**
 * Core type definitions for the confidential wallet store
 */

export type Network = 'liquid' | 'liquid-testnet' | 'elements-regtest';

/**
 * Most recent block the store believes is the chain head
 */
export interface ChainTip {
  height: number;
  hash: string;  // Display (reversed) hex
}

/**
 * Parsed block header
 */
export interface BlockHeader {
  version: number;
  prevHash: string;
  merkleRoot: string;
  time: number;
  height: number;
  hash: string;
}

/**
 * One entry of a script history as reported by a backend.
 * `height` is null while the transaction sits in the mempool.
 */
export interface HistoryEntry {
  txid: string;
  height: number | null;
}

export interface OutPoint {
  txid: string;
  vout: number;
}

/**
 * Cleartext secrets of an output recovered by unblinding
 */
export interface TxOutSecrets {
  asset: string;  // Display hex asset id
  value: number;  // In satoshi
  assetBlindingFactor: string;
  valueBlindingFactor: string;
}

/**
 * Wallet-owned unspent output
 */
export interface WalletTxOut extends TxOutSecrets {
  outpoint: OutPoint;
  script: string;  // Hex script pubkey
  height: number | null;
}

/**
 * Transaction as listed by the wallet
 */
export interface WalletTx {
  txid: string;
  hex: string;
  height: number | null;
  blockHash?: string;
  timestamp?: number;
}

/**
 * Balance per asset id, in satoshi
 */
export type Balance = Record<string, number>;

/**
 * Derived receive address
 */
export interface AddressResult {
  index: number;
  address: string;
  script: string;
}

/**
 * Hardware or software signer consumed by the wallet
 */
export interface Signer {
  readonly network: Network;
  /** Returns the base64 PSET with the signer's signatures added */
  sign(pset: string): Promise<string>;
}
