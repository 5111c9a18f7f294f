/**
 * Tests for confidential and unconfidential address encoding
 */

import { bech32 } from '@scure/base';
import {
  decodeConfidentialAddress,
  payloadScript,
  scriptPayload,
  toConfidentialAddress,
  toUnconfidentialAddress
} from '../../src/address/confidentialAddress';
import { NETWORKS } from '../../src/config/networks';
import { AddressError } from '../../src/errors';
import { bytesToHex, hexToBytes } from '../../src/utils/bytes';
import { REGTEST_ADDRESS, TESTNET_ADDRESS_0, regtestDeriver, testnetDeriver } from '../helpers/fixtures';

const regtest = NETWORKS['elements-regtest'].address;
const testnet = NETWORKS['liquid-testnet'].address;

describe('scriptPayload', () => {
  test('classifies p2pkh, p2sh and segwit scripts', () => {
    const hash = '11'.repeat(20);
    expect(scriptPayload(hexToBytes(`76a914${hash}88ac`)).type).toBe('p2pkh');
    expect(scriptPayload(hexToBytes(`a914${hash}87`)).type).toBe('p2sh');
    expect(scriptPayload(hexToBytes(`0014${hash}`))).toEqual({
      type: 'segwit',
      version: 0,
      program: hexToBytes(hash)
    });
    expect(scriptPayload(hexToBytes(`5120${'22'.repeat(32)}`))).toMatchObject({ type: 'segwit', version: 1 });
  });

  test('rejects scripts without an address form', () => {
    expect(() => scriptPayload(Uint8Array.of(0x51))).toThrow('Script has no address form');
  });

  test('payloadScript inverts scriptPayload', () => {
    const script = hexToBytes(`a914${'33'.repeat(20)}87`);
    expect(payloadScript(scriptPayload(script))).toEqual(script);
  });
});

describe('confidential addresses', () => {
  test('decodes a blech32 address to its script and blinding key', () => {
    const derived = regtestDeriver().derive(0);
    const decoded = decodeConfidentialAddress(REGTEST_ADDRESS, regtest);
    expect(decoded.script).toEqual(derived.script);
    expect(decoded.blindingPubkey).toEqual(derived.blindingPublicKey);
  });

  test('decodes a base58 p2sh address to its script and blinding key', () => {
    const derived = testnetDeriver().derive(0);
    const decoded = decodeConfidentialAddress(TESTNET_ADDRESS_0, testnet);
    expect(decoded.script).toEqual(derived.script);
    expect(decoded.blindingPubkey).toEqual(derived.blindingPublicKey);
  });

  test('re-encodes to the same address', () => {
    const decoded = decodeConfidentialAddress(TESTNET_ADDRESS_0, testnet);
    expect(toConfidentialAddress(decoded.script, decoded.blindingPubkey, testnet)).toBe(TESTNET_ADDRESS_0);
  });

  test('rejects addresses of another network', () => {
    expect(() => decodeConfidentialAddress(TESTNET_ADDRESS_0, regtest)).toThrow(
      'Not a confidential address of this network'
    );
    expect(() => decodeConfidentialAddress(REGTEST_ADDRESS, NETWORKS.liquid.address)).toThrow(AddressError);
  });

  test('requires a 33-byte blinding key for base58 addresses', () => {
    expect(() => toConfidentialAddress(hexToBytes(`a914${'33'.repeat(20)}87`), new Uint8Array(32), testnet)).toThrow(
      'Blinding public key must be 33 bytes'
    );
  });
});

describe('toUnconfidentialAddress', () => {
  test('segwit v0 scripts become bech32 addresses', () => {
    const program = '44'.repeat(20);
    const address = toUnconfidentialAddress(hexToBytes(`0014${program}`), regtest);
    const decoded = bech32.decode(address);

    expect(decoded.prefix).toBe('ert');
    expect(decoded.words[0]).toBe(0);
    expect(bytesToHex(bech32.fromWords(decoded.words.slice(1)))).toBe(program);
  });

  test('p2sh scripts use the network prefix', () => {
    const address = toUnconfidentialAddress(hexToBytes(`a914${'55'.repeat(20)}87`), testnet);
    // Version byte 19 encodes to a leading '8'
    expect(address[0]).toBe('8');
  });
});
