/**
 * Unblinder
 *
 * Recovers the cleartext asset, value and blinding factors of a wallet
 * output by rewinding its range proof with the nonce shared through the
 * output's ephemeral key. The range proof message carries the asset id
 * and asset blinding factor; the recovered opening must reproduce both
 * commitments. Any failure along the way means the output is not ours.
 */

import type { TxOutSecrets } from '../types/index';
import type { TxOutput } from '../transactions/types';
import {
  ASSET_COMMITMENT_PREFIXES,
  EXPLICIT_PREFIX,
  NONCE_COMMITMENT_PREFIXES,
  VALUE_COMMITMENT_PREFIXES
} from '../transactions/types';
import { explicitAsset, explicitValue } from '../transactions/serialization';
import { bytesEqual, bytesToHex, hashToDisplayHex, secureZero } from '../utils/bytes';
import { loadZkp, rangeProofNonce, type Zkp } from './zkp';

export type UnblindResult =
  | { status: 'unblinded'; secrets: TxOutSecrets }
  | { status: 'not-ours'; reason: string };

/**
 * Opens wallet outputs
 */
export interface Unblinder {
  unblind(output: TxOutput, blindingPrivateKey: Uint8Array): UnblindResult;
}

export const ZERO_FACTOR = '00'.repeat(32);

interface Rewound {
  value: bigint;
  asset: Uint8Array;
  abf: Uint8Array;
  vbf: Uint8Array;
}

function notOurs(reason: string): UnblindResult {
  return { status: 'not-ours', reason };
}

export class ConfidentialUnblinder implements Unblinder {
  constructor(private readonly zkp: Zkp) {}

  static async create(): Promise<ConfidentialUnblinder> {
    return new ConfidentialUnblinder(await loadZkp());
  }

  unblind(output: TxOutput, blindingPrivateKey: Uint8Array): UnblindResult {
    const explicitAssetId = explicitAsset(output);
    const explicitAmount = explicitValue(output);
    if (explicitAssetId !== null && explicitAmount !== null) {
      return this.openExplicit(explicitAssetId, explicitAmount);
    }
    if (output.asset[0] === EXPLICIT_PREFIX || output.value[0] === EXPLICIT_PREFIX) {
      return notOurs('partially blinded output');
    }
    if (
      output.asset.length !== 33 ||
      output.value.length !== 33 ||
      !ASSET_COMMITMENT_PREFIXES.includes(output.asset[0]) ||
      !VALUE_COMMITMENT_PREFIXES.includes(output.value[0])
    ) {
      return notOurs('malformed commitment');
    }
    if (output.nonce.length !== 33 || !NONCE_COMMITMENT_PREFIXES.includes(output.nonce[0])) {
      return notOurs('output has no ephemeral key');
    }
    if (output.witness.rangeProof.length === 0) {
      return notOurs('output has no range proof');
    }

    let nonce: Uint8Array;
    try {
      nonce = rangeProofNonce(this.zkp, output.nonce, blindingPrivateKey);
    } catch {
      return notOurs('invalid ephemeral key');
    }

    let rewound: Rewound;
    try {
      rewound = this.rewind(output, nonce);
    } catch {
      return notOurs('range proof does not rewind under this key');
    } finally {
      secureZero(nonce);
    }

    try {
      return this.verifyOpening(output, rewound);
    } finally {
      secureZero(rewound.abf);
      secureZero(rewound.vbf);
    }
  }

  private rewind(output: TxOutput, nonce: Uint8Array): Rewound {
    const { value, blinder, message } = this.zkp.rangeproof.rewind(
      output.witness.rangeProof,
      output.value,
      output.asset,
      nonce,
      output.script
    );
    if (message.length < 64) {
      throw new Error('Range proof message too short');
    }
    return {
      value: BigInt(value),
      asset: message.slice(0, 32),
      abf: message.slice(32, 64),
      vbf: Uint8Array.from(blinder)
    };
  }

  private verifyOpening(output: TxOutput, opening: Rewound): UnblindResult {
    let expectedAsset: Uint8Array;
    try {
      expectedAsset = this.zkp.generator.generateBlinded(opening.asset, opening.abf);
    } catch {
      return notOurs('asset commitment mismatch');
    }
    if (!bytesEqual(expectedAsset, output.asset)) {
      return notOurs('asset commitment mismatch');
    }

    const expectedValue = this.zkp.pedersen.commitment(opening.value.toString(), expectedAsset, opening.vbf);
    if (!bytesEqual(expectedValue, output.value)) {
      return notOurs('value commitment mismatch');
    }
    if (opening.value > BigInt(Number.MAX_SAFE_INTEGER)) {
      return notOurs('value out of range');
    }

    return {
      status: 'unblinded',
      secrets: {
        asset: hashToDisplayHex(opening.asset),
        value: Number(opening.value),
        assetBlindingFactor: bytesToHex(opening.abf),
        valueBlindingFactor: bytesToHex(opening.vbf)
      }
    };
  }

  private openExplicit(asset: string, value: bigint): UnblindResult {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      return notOurs('value out of range');
    }
    return {
      status: 'unblinded',
      secrets: {
        asset,
        value: Number(value),
        assetBlindingFactor: ZERO_FACTOR,
        valueBlindingFactor: ZERO_FACTOR
      }
    };
  }
}
