/**
 * Shared test fixtures: descriptors, transaction builders and wallet setup
 */

import type { Transaction, TxInput, TxOutput } from '../../src/transactions/types';
import { emptyInputWitness } from '../../src/transactions/types';
import { OutputBlinder, explicitOutput } from '../../src/confidential/blinder';
import { computeTxid, outpointKey } from '../../src/transactions/serialization';
import { emptyState, type CacheState } from '../../src/store/cache';
import { AddressDeriver } from '../../src/descriptor/deriver';
import { parseDescriptor } from '../../src/descriptor/descriptor';
import { NETWORKS } from '../../src/config/networks';
import { bytesToHex, displayHexToHash, stringToBytes } from '../../src/utils/bytes';
import { encodeBlockHeader, type RawBlockHeader } from '../../src/transactions/header';
import { sha256 } from '../../src/utils/hash';

export const SLIP77_KEY = '9c8e4f05c7711a98c838be228bcb84924d4570ca53f35fa1c793e58841d47023';

/** Single-key descriptor, one script for every index */
export const REGTEST_DESCRIPTOR =
  'ct(slip77(9c8e4f05c7711a98c838be228bcb84924d4570ca53f35fa1c793e58841d47023),elwpkh(tpubDD7tXK8KeQ3YY83yWq755fHY2JW8Ha8Q765tknUM5rSvjPcGWfUppDFMpQ1ScziKfW3ZNtZvAD7M3u7bSs7HofjTD3KP3YxPK7X6hwV8Rk2))#qw2qy2ml';

export const REGTEST_ADDRESS =
  'el1qqthj9zn320epzlcgd07kktp5ae2xgx82fkm42qqxaqg80l0fszueszj4mdsceqqfpv24x0cmkvd8awux8agrc32m9nj9sp0hk';

/** Ranged descriptor */
export const TESTNET_DESCRIPTOR =
  'ct(slip77(9c8e4f05c7711a98c838be228bcb84924d4570ca53f35fa1c793e58841d47023),elsh(wpkh(tpubDC2Q4xK4XH72GLdvD62W5NsFiD3HmTScXpopTsf3b4AUqkQwBd7wmWAJki61sov1MVuyU4MuGLJHF7h3j1b3e1FY2wvUVVx7vagmxdPvVsv/0/*)))#yfhwtmd8';

export const TESTNET_ADDRESS_0 =
  'vjTwLVioiKrDJ7zZZn9iQQrxP6RPpcvpHBhzZrbdZKKVZE29FuXSnkXdKcxK3qD5t1rYsdxcm9KYRMji';
export const TESTNET_ADDRESS_1 =
  'vjTuhaPWWbywbSy2EeRWWQ8bN2pPLmM4gFQTkA7DPX7uaCApKuav1e6LW1GKHuLUHdbv9Eag5MybsZoy';

export const REGTEST_POLICY = NETWORKS['elements-regtest'].policyAsset;
export const TESTNET_POLICY = NETWORKS['liquid-testnet'].policyAsset;
export const OTHER_ASSET = 'aa'.repeat(32);

/** Script nobody in the tests owns */
export const FOREIGN_SCRIPT = Uint8Array.of(0x51);

let blinder: OutputBlinder | null = null;

/**
 * Load the blinder behind `payTo`; run before any test builds outputs
 */
export async function prepareFixtures(): Promise<void> {
  if (!blinder) {
    blinder = await OutputBlinder.create();
  }
}

export function outputBlinder(): OutputBlinder {
  if (!blinder) {
    throw new Error('prepareFixtures() has not run');
  }
  return blinder;
}

export function testnetDeriver(): AddressDeriver {
  return new AddressDeriver(parseDescriptor(TESTNET_DESCRIPTOR), 'liquid-testnet');
}

export function regtestDeriver(): AddressDeriver {
  return new AddressDeriver(parseDescriptor(REGTEST_DESCRIPTOR), 'elements-regtest');
}

/**
 * Input spending an output of a transaction outside the tests' view; the
 * label keeps txids distinct
 */
export function externalInput(label: string): TxInput {
  return {
    prevHash: sha256(stringToBytes(label)),
    prevIndex: 0,
    isPegin: false,
    scriptSig: new Uint8Array(0),
    sequence: 0xffffffff,
    witness: emptyInputWitness()
  };
}

export function spend(txid: string, vout: number): TxInput {
  return {
    prevHash: displayHexToHash(txid),
    prevIndex: vout,
    isPegin: false,
    scriptSig: new Uint8Array(0),
    sequence: 0xffffffff,
    witness: emptyInputWitness()
  };
}

export function makeTx(inputs: TxInput[], outputs: TxOutput[]): Transaction {
  return { version: 2, inputs, outputs, locktime: 0 };
}

/**
 * Confidential output paying the wallet address at `index`
 */
export function payTo(deriver: AddressDeriver, index: number, asset: string, value: number): TxOutput {
  const derived = deriver.derive(index);
  return outputBlinder().blind({
    asset,
    value,
    script: derived.script,
    blindingPublicKey: derived.blindingPublicKey
  });
}

export function feeOutput(asset: string, value: number): TxOutput {
  return explicitOutput(asset, value, new Uint8Array(0));
}

/**
 * Transaction funding the wallet address at `index` from outside
 */
export function fundingTx(
  deriver: AddressDeriver,
  index: number,
  asset: string,
  value: number,
  label = `funding-${index}-${asset}-${value}`
): Transaction {
  return makeTx([externalInput(label)], [payTo(deriver, index, asset, value), feeOutput(asset, 100)]);
}

/**
 * Consistent cache state holding one confirmed wallet output of 5000
 */
export function sampleState(): CacheState {
  const deriver = testnetDeriver();
  const tx = fundingTx(deriver, 0, TESTNET_POLICY, 5000, 'sample');
  const txid = computeTxid(tx);
  const state = emptyState();

  state.tip = { height: 10, hash: 'ab'.repeat(32) };
  state.headers.set(10, { hash: 'ab'.repeat(32), time: 1700000600 });
  state.scripts.set(deriver.scriptHex(0), 0);
  state.subscriptions.set(deriver.scriptHex(0), { status: 'cd'.repeat(32), txids: [txid] });
  state.transactions.set(txid, tx);
  state.heights.set(txid, 10);
  state.unblinded.set(outpointKey(txid, 0), {
    asset: TESTNET_POLICY,
    value: 5000,
    assetBlindingFactor: '01'.repeat(32),
    valueBlindingFactor: '02'.repeat(32)
  });
  state.lastIndex = 0;
  return state;
}

/**
 * Proof-extension header at `height`; `salt` varies its merkle root
 */
export function rawHeader(height: number, salt = 0): RawBlockHeader {
  return {
    version: 1,
    prevHash: new Uint8Array(32),
    merkleRoot: sha256(stringToBytes(`root-${height}-${salt}`)),
    time: 1700000000 + height * 60,
    height,
    ext: { type: 'proof', challenge: Uint8Array.of(0x51), solution: new Uint8Array(0) }
  };
}

export function headerHex(height: number, salt = 0): string {
  return bytesToHex(encodeBlockHeader(rawHeader(height, salt)));
}
