/**
 * Blech32 Encoding/Decoding for Confidential Addresses
 *
 * Blech32 is the Elements variant of Bech32 with a 12-character checksum,
 * long enough to cover the 33-byte blinding key carried in confidential
 * segwit addresses. Blech32m is used for witness versions above 0.
 */

import { AddressError } from '../errors';

const CHARSET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';

/**
 * Blech32 generator polynomial
 */
const GENERATOR = [
  0x7d52fba40bd886n,
  0x5e8dbf1a03950cn,
  0x1c3a3c74072a18n,
  0x385d72fa0e5139n,
  0x7093e5a608865bn
];

const CHECKSUM_LENGTH = 12;
const MAX_LENGTH = 1000;

export type Blech32Variant = 'blech32' | 'blech32m';

const VARIANT_CONSTANT: Record<Blech32Variant, bigint> = {
  blech32: 1n,
  blech32m: 0x455972a3350f7a1n
};

function polymod(values: number[]): bigint {
  let chk = 1n;
  for (const v of values) {
    const top = chk >> 55n;
    chk = ((chk & 0x7fffffffffffffn) << 5n) ^ BigInt(v);
    for (let i = 0; i < 5; i++) {
      if ((top >> BigInt(i)) & 1n) {
        chk ^= GENERATOR[i];
      }
    }
  }
  return chk;
}

function hrpExpand(hrp: string): number[] {
  const result: number[] = [];
  for (let i = 0; i < hrp.length; i++) {
    result.push(hrp.charCodeAt(i) >> 5);
  }
  result.push(0);
  for (let i = 0; i < hrp.length; i++) {
    result.push(hrp.charCodeAt(i) & 31);
  }
  return result;
}

function createChecksum(hrp: string, data: number[], variant: Blech32Variant): number[] {
  const values = hrpExpand(hrp).concat(data).concat(new Array<number>(CHECKSUM_LENGTH).fill(0));
  const mod = polymod(values) ^ VARIANT_CONSTANT[variant];
  const result: number[] = [];
  for (let i = 0; i < CHECKSUM_LENGTH; i++) {
    result.push(Number((mod >> BigInt(5 * (CHECKSUM_LENGTH - 1 - i))) & 31n));
  }
  return result;
}

function verifyChecksum(hrp: string, data: number[]): Blech32Variant | null {
  const check = polymod(hrpExpand(hrp).concat(data));
  if (check === VARIANT_CONSTANT.blech32) return 'blech32';
  if (check === VARIANT_CONSTANT.blech32m) return 'blech32m';
  return null;
}

/**
 * Regroup bits, e.g. 8-bit bytes into 5-bit words
 */
export function convertBits(
  data: ArrayLike<number>,
  fromBits: number,
  toBits: number,
  pad: boolean
): number[] | null {
  let acc = 0;
  let bits = 0;
  const result: number[] = [];
  const maxv = (1 << toBits) - 1;

  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    if (value < 0 || value >> fromBits !== 0) {
      return null;
    }
    acc = ((acc << fromBits) | value) & 0xffffff;
    bits += fromBits;
    while (bits >= toBits) {
      bits -= toBits;
      result.push((acc >> bits) & maxv);
    }
  }

  if (pad) {
    if (bits > 0) {
      result.push((acc << (toBits - bits)) & maxv);
    }
  } else if (bits >= fromBits || ((acc << (toBits - bits)) & maxv) !== 0) {
    return null;
  }

  return result;
}

export function encodeBlech32(hrp: string, data: number[], variant: Blech32Variant): string {
  const hrpLower = hrp.toLowerCase();
  const combined = data.concat(createChecksum(hrpLower, data, variant));
  let result = hrpLower + '1';
  for (const d of combined) {
    result += CHARSET[d];
  }
  return result;
}

export function decodeBlech32(str: string): { hrp: string; data: number[]; variant: Blech32Variant } | null {
  const lower = str.toLowerCase();
  if (str !== lower && str !== str.toUpperCase()) {
    return null;
  }

  const pos = lower.lastIndexOf('1');
  if (pos < 1 || pos + CHECKSUM_LENGTH + 1 > lower.length || lower.length > MAX_LENGTH) {
    return null;
  }

  const hrp = lower.substring(0, pos);
  const data: number[] = [];
  for (const c of lower.substring(pos + 1)) {
    const d = CHARSET.indexOf(c);
    if (d === -1) {
      return null;
    }
    data.push(d);
  }

  const variant = verifyChecksum(hrp, data);
  if (!variant) {
    return null;
  }

  return { hrp, data: data.slice(0, -CHECKSUM_LENGTH), variant };
}

/**
 * Encode a confidential segwit address: witness version, then the blinding
 * public key followed by the witness program.
 */
export function encodeConfidentialSegwit(
  hrp: string,
  witnessVersion: number,
  blindingPubkey: Uint8Array,
  program: Uint8Array
): string {
  if (blindingPubkey.length !== 33) {
    throw new AddressError('Blinding public key must be 33 bytes');
  }
  const payload = new Uint8Array(33 + program.length);
  payload.set(blindingPubkey, 0);
  payload.set(program, 33);

  const words = convertBits(payload, 8, 5, true);
  if (!words) {
    throw new AddressError('Failed to convert payload to blech32 words');
  }
  return encodeBlech32(hrp, [witnessVersion, ...words], witnessVersion === 0 ? 'blech32' : 'blech32m');
}

export function decodeConfidentialSegwit(
  address: string
): { hrp: string; witnessVersion: number; blindingPubkey: Uint8Array; program: Uint8Array } {
  const decoded = decodeBlech32(address);
  if (!decoded || decoded.data.length === 0) {
    throw new AddressError('Invalid blech32 address format or checksum verification failed');
  }

  const [witnessVersion, ...words] = decoded.data;
  const expected: Blech32Variant = witnessVersion === 0 ? 'blech32' : 'blech32m';
  if (decoded.variant !== expected) {
    throw new AddressError(`Witness version ${witnessVersion} requires ${expected} checksum`);
  }

  const bytes = convertBits(words, 5, 8, false);
  if (!bytes || bytes.length < 33 + 2) {
    throw new AddressError('Invalid confidential address payload');
  }

  return {
    hrp: decoded.hrp,
    witnessVersion,
    blindingPubkey: new Uint8Array(bytes.slice(0, 33)),
    program: new Uint8Array(bytes.slice(33))
  };
}
