/**
 * Tests for hash utilities
 */

import { bytesToHex, concatBytes, stringToBytes } from '../../src/utils/bytes';
import { doubleSha256, hash160, hmacSha256, sha256, taggedHash } from '../../src/utils/hash';

describe('hash functions', () => {
  test('sha256 of the empty string', () => {
    expect(bytesToHex(sha256(new Uint8Array(0)))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  test('sha256 of "abc"', () => {
    expect(bytesToHex(sha256(stringToBytes('abc')))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  test('doubleSha256 of the empty string', () => {
    expect(bytesToHex(doubleSha256(new Uint8Array(0)))).toBe(
      '5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456'
    );
  });

  test('hash160 of the empty string', () => {
    expect(bytesToHex(hash160(new Uint8Array(0)))).toBe('b472a266d0bd89c13706a4132ccfb16f7c3b9fcb');
  });

  test('hmacSha256 matches RFC 4231 case 2', () => {
    const mac = hmacSha256(stringToBytes('Jefe'), stringToBytes('what do ya want for nothing?'));
    expect(bytesToHex(mac)).toBe('5bdcc146bf60754e6a042426089575c75a003f089d2739839dec58b964ec3843');
  });

  test('taggedHash prefixes the tag hash twice', () => {
    const tag = sha256(stringToBytes('Example/1.0'));
    const message = Uint8Array.of(1, 2, 3);
    expect(taggedHash('Example/1.0', message)).toEqual(sha256(concatBytes(tag, tag, message)));
  });

  test('taggedHash depends on the tag', () => {
    const message = Uint8Array.of(1);
    expect(bytesToHex(taggedHash('A', message))).not.toBe(bytesToHex(taggedHash('B', message)));
  });
});
