/**
 * Elements transaction types
 *
 * Confidential fields (asset, value, nonce) keep their wire encoding,
 * prefix byte included, so a decoded transaction re-encodes byte for byte.
 */

export interface AssetIssuance {
  blindingNonce: Uint8Array;
  assetEntropy: Uint8Array;
  /** Confidential value of the issued amount */
  amount: Uint8Array;
  /** Confidential value of the reissuance tokens */
  inflationKeys: Uint8Array;
}

export interface TxInWitness {
  issuanceRangeProof: Uint8Array;
  inflationRangeProof: Uint8Array;
  scriptWitness: Uint8Array[];
  peginWitness: Uint8Array[];
}

export interface TxInput {
  /** Previous txid, internal byte order */
  prevHash: Uint8Array;
  prevIndex: number;
  isPegin: boolean;
  scriptSig: Uint8Array;
  sequence: number;
  issuance?: AssetIssuance;
  witness: TxInWitness;
}

export interface TxOutWitness {
  surjectionProof: Uint8Array;
  rangeProof: Uint8Array;
}

export interface TxOutput {
  asset: Uint8Array;
  value: Uint8Array;
  nonce: Uint8Array;
  script: Uint8Array;
  witness: TxOutWitness;
}

export interface Transaction {
  version: number;
  inputs: TxInput[];
  outputs: TxOutput[];
  locktime: number;
}

/** Encoding of an absent confidential field */
export const NULL_FIELD = Uint8Array.of(0x00);

export const EXPLICIT_PREFIX = 0x01;
export const ASSET_COMMITMENT_PREFIXES = [0x0a, 0x0b];
export const VALUE_COMMITMENT_PREFIXES = [0x08, 0x09];
export const NONCE_COMMITMENT_PREFIXES = [0x02, 0x03];

export function emptyInputWitness(): TxInWitness {
  return {
    issuanceRangeProof: new Uint8Array(0),
    inflationRangeProof: new Uint8Array(0),
    scriptWitness: [],
    peginWitness: []
  };
}

export function emptyOutputWitness(): TxOutWitness {
  return {
    surjectionProof: new Uint8Array(0),
    rangeProof: new Uint8Array(0)
  };
}
