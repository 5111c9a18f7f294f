/**
 * Output blinding, the sending side of the unblinder
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { randomBytes } from '@noble/hashes/utils';
import type { TxOutput } from '../transactions/types';
import { EXPLICIT_PREFIX, NULL_FIELD, emptyOutputWitness } from '../transactions/types';
import { ByteWriter, concatBytes, displayHexToHash, hexToBytes, secureZero } from '../utils/bytes';
import { loadZkp, rangeProofNonce, type Zkp } from './zkp';

export interface BlindOutputParams {
  /** Asset id, display hex */
  asset: string;
  value: number | bigint;
  script: Uint8Array;
  /** Receiver's blinding public key */
  blindingPublicKey: Uint8Array;
  ephemeralPrivateKey?: Uint8Array;
  assetBlindingFactor?: string;
  valueBlindingFactor?: string;
}

/** Elements' default range proof parameters */
const RANGE_PROOF_MIN_VALUE = '1';
const RANGE_PROOF_EXPONENT = '0';
const RANGE_PROOF_MIN_BITS = '52';

export class OutputBlinder {
  constructor(private readonly zkp: Zkp) {}

  static async create(): Promise<OutputBlinder> {
    return new OutputBlinder(await loadZkp());
  }

  /**
   * Build a confidential output only the holder of the blinding key can
   * open. The range proof message carries asset id and asset blinding
   * factor.
   */
  blind(params: BlindOutputParams): TxOutput {
    const ephemeral = params.ephemeralPrivateKey ?? secp256k1.utils.randomPrivateKey();
    const asset = displayHexToHash(params.asset);
    const abf = params.assetBlindingFactor ? hexToBytes(params.assetBlindingFactor) : randomBytes(32);
    const vbf = params.valueBlindingFactor ? hexToBytes(params.valueBlindingFactor) : randomBytes(32);
    const value = BigInt(params.value).toString();

    const assetCommit = this.zkp.generator.generateBlinded(asset, abf);
    const valueCommit = this.zkp.pedersen.commitment(value, assetCommit, vbf);
    const nonce = rangeProofNonce(this.zkp, params.blindingPublicKey, ephemeral);
    const rangeProof = this.zkp.rangeproof.sign(
      value,
      valueCommit,
      assetCommit,
      vbf,
      nonce,
      RANGE_PROOF_MIN_VALUE,
      RANGE_PROOF_EXPONENT,
      RANGE_PROOF_MIN_BITS,
      concatBytes(asset, abf),
      params.script
    );
    secureZero(nonce);

    return {
      asset: Uint8Array.from(assetCommit),
      value: Uint8Array.from(valueCommit),
      nonce: secp256k1.getPublicKey(ephemeral, true),
      script: params.script,
      witness: { surjectionProof: new Uint8Array(0), rangeProof: Uint8Array.from(rangeProof) }
    };
  }
}

/**
 * Build an unblinded output, e.g. a fee output (empty script)
 */
export function explicitOutput(asset: string, value: number | bigint, script: Uint8Array): TxOutput {
  return {
    asset: concatBytes(Uint8Array.of(EXPLICIT_PREFIX), displayHexToHash(asset)),
    value: new ByteWriter().writeUInt8(EXPLICIT_PREFIX).writeUInt64BE(BigInt(value)).toBytes(),
    nonce: NULL_FIELD,
    script,
    witness: emptyOutputWitness()
  };
}
