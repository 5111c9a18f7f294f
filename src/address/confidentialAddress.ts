/**
 * Address encoding
 *
 * Confidential addresses embed the blinding public key in front of the
 * script payload: blech32 for segwit programs, base58check with the
 * network's blinded prefix otherwise.
 */

import { base58check, bech32, bech32m } from '@scure/base';
import { sha256 } from '@noble/hashes/sha256';
import type { AddressParams } from '../config/networks';
import { AddressError } from '../errors';
import { concatBytes } from '../utils/bytes';
import { decodeConfidentialSegwit, encodeConfidentialSegwit } from './blech32';

const b58check = base58check(sha256);

export type ScriptPayload =
  | { type: 'p2pkh'; hash: Uint8Array }
  | { type: 'p2sh'; hash: Uint8Array }
  | { type: 'segwit'; version: number; program: Uint8Array };

const OP_0 = 0x00;
const OP_1 = 0x51;
const OP_16 = 0x60;
const OP_DUP = 0x76;
const OP_HASH160 = 0xa9;
const OP_EQUAL = 0x87;
const OP_EQUALVERIFY = 0x88;
const OP_CHECKSIG = 0xac;

/**
 * Classify a script pubkey into an address payload
 */
export function scriptPayload(script: Uint8Array): ScriptPayload {
  if (
    script.length === 25 &&
    script[0] === OP_DUP &&
    script[1] === OP_HASH160 &&
    script[2] === 0x14 &&
    script[23] === OP_EQUALVERIFY &&
    script[24] === OP_CHECKSIG
  ) {
    return { type: 'p2pkh', hash: script.slice(3, 23) };
  }

  if (script.length === 23 && script[0] === OP_HASH160 && script[1] === 0x14 && script[22] === OP_EQUAL) {
    return { type: 'p2sh', hash: script.slice(2, 22) };
  }

  if (script.length >= 4 && script.length <= 42 && script[1] === script.length - 2) {
    const opcode = script[0];
    if (opcode === OP_0 || (opcode >= OP_1 && opcode <= OP_16)) {
      return {
        type: 'segwit',
        version: opcode === OP_0 ? 0 : opcode - OP_1 + 1,
        program: script.slice(2)
      };
    }
  }

  throw new AddressError('Script has no address form');
}

/**
 * Build the script pubkey an address payload pays to
 */
export function payloadScript(payload: ScriptPayload): Uint8Array {
  switch (payload.type) {
    case 'p2pkh':
      return concatBytes(Uint8Array.of(OP_DUP, OP_HASH160, 0x14), payload.hash, Uint8Array.of(OP_EQUALVERIFY, OP_CHECKSIG));
    case 'p2sh':
      return concatBytes(Uint8Array.of(OP_HASH160, 0x14), payload.hash, Uint8Array.of(OP_EQUAL));
    case 'segwit': {
      const opcode = payload.version === 0 ? OP_0 : OP_1 + payload.version - 1;
      return concatBytes(Uint8Array.of(opcode, payload.program.length), payload.program);
    }
  }
}

/**
 * Encode the confidential address of a script
 */
export function toConfidentialAddress(
  script: Uint8Array,
  blindingPubkey: Uint8Array,
  params: AddressParams
): string {
  const payload = scriptPayload(script);
  if (payload.type === 'segwit') {
    return encodeConfidentialSegwit(params.blech32Hrp, payload.version, blindingPubkey, payload.program);
  }

  if (blindingPubkey.length !== 33) {
    throw new AddressError('Blinding public key must be 33 bytes');
  }
  const prefix = payload.type === 'p2pkh' ? params.p2pkhPrefix : params.p2shPrefix;
  return b58check.encode(concatBytes(Uint8Array.of(params.blindedPrefix, prefix), blindingPubkey, payload.hash));
}

/**
 * Encode the unconfidential address of a script
 */
export function toUnconfidentialAddress(script: Uint8Array, params: AddressParams): string {
  const payload = scriptPayload(script);
  switch (payload.type) {
    case 'segwit': {
      const words = [payload.version, ...bech32.toWords(payload.program)];
      return payload.version === 0
        ? bech32.encode(params.bech32Hrp, words)
        : bech32m.encode(params.bech32Hrp, words);
    }
    case 'p2pkh':
      return b58check.encode(concatBytes(Uint8Array.of(params.p2pkhPrefix), payload.hash));
    case 'p2sh':
      return b58check.encode(concatBytes(Uint8Array.of(params.p2shPrefix), payload.hash));
  }
}

export interface DecodedConfidentialAddress {
  script: Uint8Array;
  blindingPubkey: Uint8Array;
}

/**
 * Decode a confidential address of the given network
 */
export function decodeConfidentialAddress(address: string, params: AddressParams): DecodedConfidentialAddress {
  const lower = address.toLowerCase();
  if (lower.startsWith(`${params.blech32Hrp}1`)) {
    const decoded = decodeConfidentialSegwit(address);
    if (decoded.hrp !== params.blech32Hrp) {
      throw new AddressError(`Address HRP ${decoded.hrp} does not match network`);
    }
    return {
      script: payloadScript({ type: 'segwit', version: decoded.witnessVersion, program: decoded.program }),
      blindingPubkey: decoded.blindingPubkey
    };
  }

  let bytes: Uint8Array;
  try {
    bytes = b58check.decode(address);
  } catch {
    throw new AddressError('Invalid base58check address');
  }
  if (bytes.length !== 2 + 33 + 20 || bytes[0] !== params.blindedPrefix) {
    throw new AddressError('Not a confidential address of this network');
  }

  const blindingPubkey = bytes.slice(2, 35);
  const hash = bytes.slice(35);
  if (bytes[1] === params.p2pkhPrefix) {
    return { script: payloadScript({ type: 'p2pkh', hash }), blindingPubkey };
  }
  if (bytes[1] === params.p2shPrefix) {
    return { script: payloadScript({ type: 'p2sh', hash }), blindingPubkey };
  }
  throw new AddressError(`Unknown address prefix ${bytes[1]}`);
}
