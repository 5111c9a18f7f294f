/**
 * Tests for the block header codec
 */

import {
  blockHash,
  decodeBlockHeader,
  encodeBlockHeader,
  parseBlockHeader,
  type RawBlockHeader
} from '../../src/transactions/header';
import { ProtocolViolationError } from '../../src/errors';
import { bytesToHex, hashToDisplayHex } from '../../src/utils/bytes';
import { doubleSha256 } from '../../src/utils/hash';

function proofHeader(solution: Uint8Array): RawBlockHeader {
  return {
    version: 0x20000000,
    prevHash: new Uint8Array(32).fill(1),
    merkleRoot: new Uint8Array(32).fill(2),
    time: 1700000000,
    height: 150,
    ext: { type: 'proof', challenge: Uint8Array.of(0x51), solution }
  };
}

function dynafedHeader(): RawBlockHeader {
  return {
    version: 0x20000000,
    prevHash: new Uint8Array(32).fill(3),
    merkleRoot: new Uint8Array(32).fill(4),
    time: 1700000060,
    height: 151,
    ext: {
      type: 'dynafed',
      current: {
        type: 'compact',
        signblockScript: Uint8Array.of(0x51),
        signblockWitnessLimit: 1416,
        elidedRoot: new Uint8Array(32).fill(9)
      },
      proposed: { type: 'null' },
      signblockWitness: [new Uint8Array(0), Uint8Array.of(0x30, 0x44)]
    }
  };
}

describe('proof headers', () => {
  test('encode the fixed fields little-endian', () => {
    const hex = bytesToHex(encodeBlockHeader(proofHeader(new Uint8Array(0))));
    expect(hex.slice(0, 8)).toBe('00000020');
    expect(hex.slice(136, 144)).toBe('00f15365');
    expect(hex.slice(144, 152)).toBe('96000000');
    expect(hex.slice(152)).toBe('0151' + '00');
  });

  test('round-trip', () => {
    const header = proofHeader(Uint8Array.of(0xaa, 0xbb));
    expect(decodeBlockHeader(encodeBlockHeader(header))).toEqual(header);
  });

  test('the hash does not cover the solution', () => {
    expect(blockHash(proofHeader(Uint8Array.of(1)))).toBe(blockHash(proofHeader(Uint8Array.of(2))));
  });

  test('the hash is the reversed double SHA-256 of the witness-free encoding', () => {
    const header = proofHeader(Uint8Array.of(1));
    expect(blockHash(header)).toBe(hashToDisplayHex(doubleSha256(encodeBlockHeader(header, false))));
  });
});

describe('dynafed headers', () => {
  test('set the version bit on the wire and clear it when decoding', () => {
    const encoded = encodeBlockHeader(dynafedHeader());
    expect(bytesToHex(encoded.slice(0, 4))).toBe('000000a0');
    expect(decodeBlockHeader(encoded)).toEqual(dynafedHeader());
  });

  test('the hash does not cover the signblock witness', () => {
    const other = dynafedHeader();
    if (other.ext.type === 'dynafed') {
      other.ext.signblockWitness = [];
    }
    expect(blockHash(other)).toBe(blockHash(dynafedHeader()));
  });

  test('round-trip full params', () => {
    const header = dynafedHeader();
    if (header.ext.type === 'dynafed') {
      header.ext.proposed = {
        type: 'full',
        signblockScript: Uint8Array.of(0x52),
        signblockWitnessLimit: 2000,
        fedpegProgram: Uint8Array.of(0x00, 0x20),
        fedpegScript: Uint8Array.of(0x51),
        extensionSpace: [Uint8Array.of(1, 2, 3)]
      };
    }
    expect(decodeBlockHeader(encodeBlockHeader(header))).toEqual(header);
  });
});

describe('parseBlockHeader', () => {
  test('summarizes a header with display hashes', () => {
    const raw = proofHeader(new Uint8Array(0));
    const parsed = parseBlockHeader(bytesToHex(encodeBlockHeader(raw)));

    expect(parsed).toEqual({
      version: 0x20000000,
      prevHash: '01'.repeat(32),
      merkleRoot: '02'.repeat(32),
      time: 1700000000,
      height: 150,
      hash: blockHash(raw)
    });
  });

  test('rejects malformed headers', () => {
    expect(() => parseBlockHeader('00')).toThrow(ProtocolViolationError);
    const valid = bytesToHex(encodeBlockHeader(proofHeader(new Uint8Array(0))));
    expect(() => parseBlockHeader(valid + '00')).toThrow('Malformed block header');
  });
});
