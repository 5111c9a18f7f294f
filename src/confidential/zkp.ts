/**
 * secp256k1-zkp loader
 *
 * The library is WebAssembly and initializes asynchronously; every
 * caller shares one instance.
 */

import secp256k1Zkp from '@vulpemventures/secp256k1-zkp';
import { sha256 } from '../utils/hash';
import { secureZero } from '../utils/bytes';

export type Zkp = Awaited<ReturnType<typeof secp256k1Zkp>>;

let loading: Promise<Zkp> | null = null;

export function loadZkp(): Promise<Zkp> {
  if (!loading) {
    loading = secp256k1Zkp().catch((error: unknown) => {
      loading = null;
      throw error;
    });
  }
  return loading;
}

/**
 * Range proof nonce shared by the sender's ephemeral key and the
 * receiver's blinding key: SHA-256 of their ECDH secret
 */
export function rangeProofNonce(zkp: Zkp, publicKey: Uint8Array, privateKey: Uint8Array): Uint8Array {
  const shared = zkp.ecdh(publicKey, privateKey);
  const nonce = sha256(shared);
  secureZero(shared);
  return nonce;
}
