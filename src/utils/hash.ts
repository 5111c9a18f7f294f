/**
 * Hash Utilities
 */

import { sha256 as sha256Noble } from '@noble/hashes/sha256';
import { ripemd160 } from '@noble/hashes/ripemd160';
import { hmac } from '@noble/hashes/hmac';
import { concatBytes, stringToBytes } from './bytes';

/**
 * SHA-256 hash
 */
export function sha256(data: Uint8Array): Uint8Array {
  return sha256Noble(data);
}

/**
 * Double SHA-256 hash (txids, block hashes, base58 checksums)
 */
export function doubleSha256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data));
}

/**
 * HASH160 (SHA256 + RIPEMD160)
 */
export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data));
}

/**
 * HMAC-SHA256
 */
export function hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array {
  return hmac(sha256Noble, key, message);
}

/**
 * BIP-340 style tagged hash: sha256(sha256(tag) || sha256(tag) || msg)
 */
export function taggedHash(tag: string, ...messages: Uint8Array[]): Uint8Array {
  const tagHash = sha256(stringToBytes(tag));
  return sha256(concatBytes(tagHash, tagHash, ...messages));
}
