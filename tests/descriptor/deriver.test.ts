/**
 * Tests for script, address and blinding key derivation
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { parseDescriptor } from '../../src/descriptor/descriptor';
import { AddressDeriver, deriveAddress, deriveBlindingPrivateKey, deriveScript } from '../../src/descriptor/deriver';
import { DescriptorError, UnsupportedBlindingError } from '../../src/errors';
import { bytesToHex, hexToBytes } from '../../src/utils/bytes';
import { hmacSha256 } from '../../src/utils/hash';
import {
  REGTEST_ADDRESS,
  REGTEST_DESCRIPTOR,
  SLIP77_KEY,
  TESTNET_ADDRESS_0,
  TESTNET_ADDRESS_1,
  TESTNET_DESCRIPTOR
} from '../helpers/fixtures';

const TPUB =
  'tpubDD7tXK8KeQ3YY83yWq755fHY2JW8Ha8Q765tknUM5rSvjPcGWfUppDFMpQ1ScziKfW3ZNtZvAD7M3u7bSs7HofjTD3KP3YxPK7X6hwV8Rk2';

describe('deriveAddress', () => {
  test('derives the regtest elwpkh address', () => {
    const derived = deriveAddress(parseDescriptor(REGTEST_DESCRIPTOR), 0, 'elements-regtest');
    expect(derived.address).toBe(REGTEST_ADDRESS);
  });

  test('a descriptor without wildcard has one address for every index', () => {
    const descriptor = parseDescriptor(REGTEST_DESCRIPTOR);
    expect(deriveAddress(descriptor, 7, 'elements-regtest').address).toBe(REGTEST_ADDRESS);
  });

  test('derives the testnet elsh(wpkh) addresses', () => {
    const descriptor = parseDescriptor(TESTNET_DESCRIPTOR);
    expect(deriveAddress(descriptor, 0, 'liquid-testnet').address).toBe(TESTNET_ADDRESS_0);
    expect(deriveAddress(descriptor, 1, 'liquid-testnet').address).toBe(TESTNET_ADDRESS_1);
  });

  test('the blinding public key belongs to the private key', () => {
    const derived = deriveAddress(parseDescriptor(TESTNET_DESCRIPTOR), 3, 'liquid-testnet');
    expect(derived.blindingPublicKey).toEqual(secp256k1.getPublicKey(derived.blindingPrivateKey, true));
  });

  test('slip77 blinding keys are an HMAC of the script', () => {
    const descriptor = parseDescriptor(TESTNET_DESCRIPTOR);
    const derived = deriveAddress(descriptor, 2, 'liquid-testnet');
    expect(derived.blindingPrivateKey).toEqual(hmacSha256(hexToBytes(SLIP77_KEY), derived.script));
  });

  test('rejects indices outside the non-hardened range', () => {
    const descriptor = parseDescriptor(TESTNET_DESCRIPTOR);
    expect(() => deriveScript(descriptor, -1)).toThrow(DescriptorError);
    expect(() => deriveScript(descriptor, 0x80000000)).toThrow('Derivation index out of range: 2147483648');
  });
});

describe('deriveScript', () => {
  test('shapes of the three script kinds', () => {
    const wpkh = deriveScript(parseDescriptor(`ct(slip77(${SLIP77_KEY}),elwpkh(${TPUB}))`), 0);
    const shwpkh = deriveScript(parseDescriptor(`ct(slip77(${SLIP77_KEY}),elsh(wpkh(${TPUB})))`), 0);
    const pkh = deriveScript(parseDescriptor(`ct(slip77(${SLIP77_KEY}),elpkh(${TPUB}))`), 0);

    expect(bytesToHex(wpkh).slice(0, 4)).toBe('0014');
    expect(wpkh.length).toBe(22);
    expect(bytesToHex(shwpkh).slice(0, 4)).toBe('a914');
    expect(shwpkh[22]).toBe(0x87);
    expect(bytesToHex(pkh).slice(0, 6)).toBe('76a914');
    expect(bytesToHex(pkh).slice(46)).toBe('88ac');
    expect(bytesToHex(pkh).slice(6, 46)).toBe(bytesToHex(wpkh).slice(4));
  });
});

describe('view key blinding', () => {
  const viewKey = '01'.repeat(32);
  const descriptor = parseDescriptor(`ct(${viewKey},elwpkh(${TPUB}/0/*))`);

  test('tweaks the view key per script', () => {
    const first = deriveBlindingPrivateKey(descriptor.blindingKey, deriveScript(descriptor, 0));
    const second = deriveBlindingPrivateKey(descriptor.blindingKey, deriveScript(descriptor, 1));

    expect(first.length).toBe(32);
    expect(bytesToHex(first)).not.toBe(viewKey);
    expect(bytesToHex(first)).not.toBe(bytesToHex(second));
    expect(secp256k1.utils.isValidPrivateKey(first)).toBe(true);
  });

  test('is deterministic', () => {
    const script = deriveScript(descriptor, 4);
    expect(deriveBlindingPrivateKey(descriptor.blindingKey, script)).toEqual(
      deriveBlindingPrivateKey(descriptor.blindingKey, script)
    );
  });
});

describe('AddressDeriver', () => {
  test('refuses bare blinding keys', () => {
    const bare = parseDescriptor(
      `ct(0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798,elwpkh(${TPUB}))`
    );
    expect(() => new AddressDeriver(bare, 'liquid')).toThrow(UnsupportedBlindingError);
    expect(() => deriveAddress(bare, 0, 'liquid')).toThrow(UnsupportedBlindingError);
  });

  test('memoizes scripts and matches derive()', () => {
    const deriver = new AddressDeriver(parseDescriptor(TESTNET_DESCRIPTOR), 'liquid-testnet');
    expect(deriver.script(5)).toBe(deriver.script(5));
    expect(deriver.scriptHex(5)).toBe(bytesToHex(deriver.derive(5).script));
    expect(deriver.blindingKey(deriver.script(5))).toEqual(deriver.derive(5).blindingPrivateKey);
  });

  test('reports whether the descriptor is ranged', () => {
    expect(new AddressDeriver(parseDescriptor(TESTNET_DESCRIPTOR), 'liquid-testnet').ranged).toBe(true);
    expect(new AddressDeriver(parseDescriptor(REGTEST_DESCRIPTOR), 'elements-regtest').ranged).toBe(false);
  });
});
