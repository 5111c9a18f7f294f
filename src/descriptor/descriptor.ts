/**
 * Confidential Descriptor Parsing
 *
 * Supports `ct(<blinding key>, <script descriptor>)` with:
 * - blinding keys: `slip77(<hex>)`, a view private key (hex or xprv/tprv),
 *   or a bare public key (hex or xpub/tpub, parsed but not usable);
 * - script descriptors: `elwpkh(KEY)`, `elsh(wpkh(KEY))`, `elpkh(KEY)`.
 */

import { HDKey } from '@scure/bip32';
import { secp256k1 } from '@noble/curves/secp256k1';
import { DescriptorError } from '../errors';
import { hexToBytes } from '../utils/bytes';

export type BlindingKey =
  | { type: 'slip77'; masterKey: Uint8Array }
  | { type: 'view'; privateKey: Uint8Array }
  | { type: 'bare'; publicKey: Uint8Array };

export type ScriptKind = 'elwpkh' | 'elsh-wpkh' | 'elpkh';

export interface KeyOrigin {
  fingerprint: string;
  path: string;
}

export type DescriptorKey =
  | { type: 'single'; origin?: KeyOrigin; publicKey: Uint8Array }
  | { type: 'extended'; origin?: KeyOrigin; xpub: HDKey; path: number[]; wildcard: boolean };

export interface ConfidentialDescriptor {
  /** Descriptor text without checksum */
  text: string;
  blindingKey: BlindingKey;
  kind: ScriptKind;
  key: DescriptorKey;
}

const HARDENED_OFFSET = 0x80000000;
const CHECKSUM_CHARSET = /^[qpzry9x8gf2tvdw0s3jn54khce6mua7l]{8}$/;

const VERSIONS = {
  mainnet: { public: 0x0488b21e, private: 0x0488ade4 },
  testnet: { public: 0x043587cf, private: 0x04358394 }
};

function extendedVersions(key: string): { public: number; private: number } | null {
  if (key.startsWith('xpub') || key.startsWith('xprv')) return VERSIONS.mainnet;
  if (key.startsWith('tpub') || key.startsWith('tprv')) return VERSIONS.testnet;
  return null;
}

function parseExtendedKey(key: string): HDKey {
  const versions = extendedVersions(key);
  if (!versions) {
    throw new DescriptorError(`Unrecognized extended key: ${key.slice(0, 4)}`);
  }
  try {
    return HDKey.fromExtendedKey(key, versions);
  } catch (error) {
    throw new DescriptorError(`Invalid extended key`, { cause: error });
  }
}

function isHex(value: string, length: number): boolean {
  return value.length === length && /^[0-9a-fA-F]+$/.test(value);
}

function parsePublicKeyHex(hex: string): Uint8Array {
  try {
    const bytes = hexToBytes(hex);
    secp256k1.ProjectivePoint.fromHex(bytes);
    return bytes;
  } catch (error) {
    throw new DescriptorError('Invalid public key', { cause: error });
  }
}

/**
 * Split `name(args)` into its parts, or return null when the text is not a
 * call of that name
 */
function unwrap(text: string, name: string): string | null {
  if (!text.startsWith(`${name}(`) || !text.endsWith(')')) {
    return null;
  }
  return text.slice(name.length + 1, -1);
}

/**
 * Split on the first comma outside parentheses and brackets
 */
function splitTopLevel(text: string): [string, string] {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === '(' || c === '[') depth++;
    else if (c === ')' || c === ']') depth--;
    else if (c === ',' && depth === 0) {
      return [text.slice(0, i), text.slice(i + 1)];
    }
  }
  throw new DescriptorError('ct() expects two arguments');
}

function parseBlindingKey(text: string): BlindingKey {
  const slip77 = unwrap(text, 'slip77');
  if (slip77 !== null) {
    if (!isHex(slip77, 64)) {
      throw new DescriptorError('slip77() expects a 32-byte hex master blinding key');
    }
    return { type: 'slip77', masterKey: hexToBytes(slip77) };
  }

  if (isHex(text, 64)) {
    const privateKey = hexToBytes(text);
    if (!secp256k1.utils.isValidPrivateKey(privateKey)) {
      throw new DescriptorError('Invalid view key');
    }
    return { type: 'view', privateKey };
  }

  if (isHex(text, 66)) {
    return { type: 'bare', publicKey: parsePublicKeyHex(text) };
  }

  if (extendedVersions(text)) {
    const hd = parseExtendedKey(text);
    if (hd.privateKey) {
      return { type: 'view', privateKey: hd.privateKey };
    }
    if (hd.publicKey) {
      return { type: 'bare', publicKey: hd.publicKey };
    }
  }

  throw new DescriptorError(`Unsupported blinding key: ${text.slice(0, 12)}`);
}

function parsePathStep(step: string): number {
  const hardened = step.endsWith('h') || step.endsWith("'");
  const digits = hardened ? step.slice(0, -1) : step;
  if (!/^\d+$/.test(digits)) {
    throw new DescriptorError(`Invalid derivation step: ${step}`);
  }
  const value = Number(digits);
  if (value >= HARDENED_OFFSET) {
    throw new DescriptorError(`Derivation step out of range: ${step}`);
  }
  return hardened ? value + HARDENED_OFFSET : value;
}

function parseKey(text: string): DescriptorKey {
  let origin: KeyOrigin | undefined;
  let rest = text;

  if (rest.startsWith('[')) {
    const end = rest.indexOf(']');
    if (end === -1) {
      throw new DescriptorError('Unterminated key origin');
    }
    const [fingerprint, ...path] = rest.slice(1, end).split('/');
    if (!isHex(fingerprint, 8)) {
      throw new DescriptorError('Key origin fingerprint must be 4 bytes of hex');
    }
    path.forEach(parsePathStep);
    origin = { fingerprint: fingerprint.toLowerCase(), path: path.join('/') };
    rest = rest.slice(end + 1);
  }

  const [keyText, ...steps] = rest.split('/');

  if (isHex(keyText, 66)) {
    if (steps.length > 0) {
      throw new DescriptorError('Single public keys cannot have derivation steps');
    }
    return { type: 'single', origin, publicKey: parsePublicKeyHex(keyText) };
  }

  const xpub = parseExtendedKey(keyText);
  if (xpub.privateKey) {
    throw new DescriptorError('Watch-only descriptors must not contain private keys');
  }

  let wildcard = false;
  const path: number[] = [];
  steps.forEach((step, i) => {
    if (step === '*') {
      if (i !== steps.length - 1) {
        throw new DescriptorError('Wildcard must be the last derivation step');
      }
      wildcard = true;
      return;
    }
    if (step === '*h' || step === "*'") {
      throw new DescriptorError('Hardened wildcards cannot be derived from a public key');
    }
    const index = parsePathStep(step);
    if (index >= HARDENED_OFFSET) {
      throw new DescriptorError('Hardened steps cannot be derived from a public key');
    }
    path.push(index);
  });

  return { type: 'extended', origin, xpub, path, wildcard };
}

function parseScript(text: string): { kind: ScriptKind; key: DescriptorKey } {
  const elwpkh = unwrap(text, 'elwpkh');
  if (elwpkh !== null) {
    return { kind: 'elwpkh', key: parseKey(elwpkh) };
  }

  const elsh = unwrap(text, 'elsh');
  if (elsh !== null) {
    const wpkh = unwrap(elsh, 'wpkh');
    if (wpkh === null) {
      throw new DescriptorError('Only elsh(wpkh(...)) is supported');
    }
    return { kind: 'elsh-wpkh', key: parseKey(wpkh) };
  }

  const elpkh = unwrap(text, 'elpkh');
  if (elpkh !== null) {
    return { kind: 'elpkh', key: parseKey(elpkh) };
  }

  throw new DescriptorError(`Unsupported script descriptor: ${text.split('(')[0]}`);
}

/**
 * Parse a confidential descriptor string
 */
export function parseDescriptor(descriptor: string): ConfidentialDescriptor {
  const trimmed = descriptor.trim();
  const hashPos = trimmed.indexOf('#');
  const text = hashPos === -1 ? trimmed : trimmed.slice(0, hashPos);
  if (hashPos !== -1 && !CHECKSUM_CHARSET.test(trimmed.slice(hashPos + 1))) {
    throw new DescriptorError('Malformed descriptor checksum');
  }

  const inner = unwrap(text, 'ct');
  if (inner === null) {
    throw new DescriptorError('Descriptor must be wrapped in ct()');
  }

  const [blindingText, scriptText] = splitTopLevel(inner);
  const { kind, key } = parseScript(scriptText);

  return {
    text,
    blindingKey: parseBlindingKey(blindingText),
    kind,
    key
  };
}
