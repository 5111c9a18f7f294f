/**
 * Descriptor & Address Deriver
 *
 * Deterministically derives, for a derivation index, the spending script,
 * its confidential address and the blinding key pair of that script.
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { mod } from '@noble/curves/abstract/modular';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/abstract/utils';
import type { Network } from '../types/index';
import { getNetworkParams, type NetworkParams } from '../config/networks';
import { toConfidentialAddress } from '../address/confidentialAddress';
import { DescriptorError, UnsupportedBlindingError } from '../errors';
import { ByteWriter, bytesToHex, concatBytes } from '../utils/bytes';
import { hash160, hmacSha256, taggedHash } from '../utils/hash';
import type { BlindingKey, ConfidentialDescriptor, DescriptorKey } from './descriptor';

export interface DerivedAddress {
  index: number;
  script: Uint8Array;
  address: string;
  blindingPublicKey: Uint8Array;
  blindingPrivateKey: Uint8Array;
}

const MAX_INDEX = 0x7fffffff;
const VIEW_KEY_TWEAK_TAG = 'CT-Blinding-Key/1.0';

function checkIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX) {
    throw new DescriptorError(`Derivation index out of range: ${index}`);
  }
}

function derivePublicKey(key: DescriptorKey, index: number): Uint8Array {
  if (key.type === 'single') {
    return key.publicKey;
  }

  let node = key.xpub;
  for (const step of key.path) {
    node = node.deriveChild(step);
  }
  if (key.wildcard) {
    node = node.deriveChild(index);
  }
  if (!node.publicKey) {
    throw new DescriptorError('Derived key has no public key');
  }
  return node.publicKey;
}

/**
 * Script pubkey of the descriptor at an index
 */
export function deriveScript(descriptor: ConfidentialDescriptor, index: number): Uint8Array {
  checkIndex(index);
  const pubkeyHash = hash160(derivePublicKey(descriptor.key, index));
  const wpkh = concatBytes(Uint8Array.of(0x00, 0x14), pubkeyHash);

  switch (descriptor.kind) {
    case 'elwpkh':
      return wpkh;
    case 'elsh-wpkh':
      return concatBytes(Uint8Array.of(0xa9, 0x14), hash160(wpkh), Uint8Array.of(0x87));
    case 'elpkh':
      return concatBytes(Uint8Array.of(0x76, 0xa9, 0x14), pubkeyHash, Uint8Array.of(0x88, 0xac));
  }
}

/**
 * Blinding private key of a script under the descriptor's blinding key
 */
export function deriveBlindingPrivateKey(blindingKey: BlindingKey, script: Uint8Array): Uint8Array {
  switch (blindingKey.type) {
    case 'slip77':
      return hmacSha256(blindingKey.masterKey, script);
    case 'view': {
      const viewPublicKey = secp256k1.getPublicKey(blindingKey.privateKey, true);
      const encodedScript = new ByteWriter().writeVarBytes(script).toBytes();
      const tweak = bytesToNumberBE(taggedHash(VIEW_KEY_TWEAK_TAG, viewPublicKey, encodedScript));
      const tweaked = mod(bytesToNumberBE(blindingKey.privateKey) + tweak, secp256k1.CURVE.n);
      if (tweaked === 0n) {
        throw new DescriptorError('View key tweak produced an invalid key');
      }
      return numberToBytesBE(tweaked, 32);
    }
    case 'bare':
      throw new UnsupportedBlindingError();
  }
}

/**
 * Derive script, address and blinding keys for an index
 */
export function deriveAddress(
  descriptor: ConfidentialDescriptor,
  index: number,
  network: Network
): DerivedAddress {
  const params = getNetworkParams(network);
  const script = deriveScript(descriptor, index);
  const blindingPrivateKey = deriveBlindingPrivateKey(descriptor.blindingKey, script);
  const blindingPublicKey = secp256k1.getPublicKey(blindingPrivateKey, true);

  return {
    index,
    script,
    address: toConfidentialAddress(script, blindingPublicKey, params.address),
    blindingPublicKey,
    blindingPrivateKey
  };
}

/**
 * Descriptor bound to a network, with script derivation memoized
 */
export class AddressDeriver {
  private readonly params: NetworkParams;
  private readonly scripts: Map<number, Uint8Array> = new Map();

  constructor(
    readonly descriptor: ConfidentialDescriptor,
    readonly network: Network
  ) {
    if (descriptor.blindingKey.type === 'bare') {
      throw new UnsupportedBlindingError();
    }
    this.params = getNetworkParams(network);
  }

  /** Whether different indices yield different scripts */
  get ranged(): boolean {
    return this.descriptor.key.type === 'extended' && this.descriptor.key.wildcard;
  }

  derive(index: number): DerivedAddress {
    return deriveAddress(this.descriptor, index, this.params.network);
  }

  script(index: number): Uint8Array {
    let script = this.scripts.get(index);
    if (!script) {
      script = deriveScript(this.descriptor, index);
      this.scripts.set(index, script);
    }
    return script;
  }

  scriptHex(index: number): string {
    return bytesToHex(this.script(index));
  }

  blindingKey(script: Uint8Array): Uint8Array {
    return deriveBlindingPrivateKey(this.descriptor.blindingKey, script);
  }
}
