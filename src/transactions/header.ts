/**
 * Block header codec
 *
 * Elements headers carry either a signed-block proof (challenge + solution)
 * or, when the version's top bit is set, dynamic federation parameters and a
 * signblock witness. The block hash covers everything except the solution
 * and the witness.
 */

import type { BlockHeader } from '../types/index';
import { ProtocolViolationError } from '../errors';
import { ByteReader, ByteWriter, hashToDisplayHex, hexToBytes } from '../utils/bytes';
import { doubleSha256 } from '../utils/hash';

const DYNAFED_BIT = 0x80000000;

export type DynafedParams =
  | { type: 'null' }
  | {
      type: 'compact';
      signblockScript: Uint8Array;
      signblockWitnessLimit: number;
      elidedRoot: Uint8Array;
    }
  | {
      type: 'full';
      signblockScript: Uint8Array;
      signblockWitnessLimit: number;
      fedpegProgram: Uint8Array;
      fedpegScript: Uint8Array;
      extensionSpace: Uint8Array[];
    };

export type HeaderExtension =
  | { type: 'proof'; challenge: Uint8Array; solution: Uint8Array }
  | { type: 'dynafed'; current: DynafedParams; proposed: DynafedParams; signblockWitness: Uint8Array[] };

export interface RawBlockHeader {
  /** Version without the dynafed bit */
  version: number;
  prevHash: Uint8Array;
  merkleRoot: Uint8Array;
  time: number;
  height: number;
  ext: HeaderExtension;
}

function readParams(reader: ByteReader): DynafedParams {
  const type = reader.readUInt8();
  switch (type) {
    case 0:
      return { type: 'null' };
    case 1:
      return {
        type: 'compact',
        signblockScript: reader.readVarBytes(),
        signblockWitnessLimit: reader.readUInt32LE(),
        elidedRoot: reader.readBytes(32)
      };
    case 2:
      return {
        type: 'full',
        signblockScript: reader.readVarBytes(),
        signblockWitnessLimit: reader.readUInt32LE(),
        fedpegProgram: reader.readVarBytes(),
        fedpegScript: reader.readVarBytes(),
        extensionSpace: reader.readVector()
      };
    default:
      throw new RangeError(`unknown dynafed params type ${type}`);
  }
}

function writeParams(writer: ByteWriter, params: DynafedParams): void {
  switch (params.type) {
    case 'null':
      writer.writeUInt8(0);
      return;
    case 'compact':
      writer
        .writeUInt8(1)
        .writeVarBytes(params.signblockScript)
        .writeUInt32LE(params.signblockWitnessLimit)
        .writeBytes(params.elidedRoot);
      return;
    case 'full':
      writer
        .writeUInt8(2)
        .writeVarBytes(params.signblockScript)
        .writeUInt32LE(params.signblockWitnessLimit)
        .writeVarBytes(params.fedpegProgram)
        .writeVarBytes(params.fedpegScript)
        .writeVector(params.extensionSpace);
      return;
  }
}

/**
 * Encode a header. Without witness data the result is the block hash
 * preimage.
 */
export function encodeBlockHeader(header: RawBlockHeader, withWitness = true): Uint8Array {
  const writer = new ByteWriter();
  const dynafed = header.ext.type === 'dynafed';
  const version = dynafed ? (header.version | DYNAFED_BIT) >>> 0 : header.version >>> 0;

  writer
    .writeUInt32LE(version)
    .writeBytes(header.prevHash)
    .writeBytes(header.merkleRoot)
    .writeUInt32LE(header.time)
    .writeUInt32LE(header.height);

  if (header.ext.type === 'proof') {
    writer.writeVarBytes(header.ext.challenge);
    if (withWitness) {
      writer.writeVarBytes(header.ext.solution);
    }
  } else {
    writeParams(writer, header.ext.current);
    writeParams(writer, header.ext.proposed);
    if (withWitness) {
      writer.writeVector(header.ext.signblockWitness);
    }
  }

  return writer.toBytes();
}

export function decodeBlockHeader(data: Uint8Array | string): RawBlockHeader {
  try {
    const bytes = typeof data === 'string' ? hexToBytes(data) : data;
    const reader = new ByteReader(bytes);

    const rawVersion = reader.readUInt32LE();
    const prevHash = reader.readBytes(32);
    const merkleRoot = reader.readBytes(32);
    const time = reader.readUInt32LE();
    const height = reader.readUInt32LE();

    let ext: HeaderExtension;
    if ((rawVersion & DYNAFED_BIT) !== 0) {
      ext = {
        type: 'dynafed',
        current: readParams(reader),
        proposed: readParams(reader),
        signblockWitness: reader.readVector()
      };
    } else {
      ext = { type: 'proof', challenge: reader.readVarBytes(), solution: reader.readVarBytes() };
    }

    if (reader.remaining !== 0) {
      throw new RangeError(`${reader.remaining} trailing bytes after header`);
    }

    return {
      version: (rawVersion & ~DYNAFED_BIT) >>> 0,
      prevHash,
      merkleRoot,
      time,
      height,
      ext
    };
  } catch (error) {
    throw new ProtocolViolationError('Malformed block header', { cause: error });
  }
}

export function blockHash(header: RawBlockHeader): string {
  return hashToDisplayHex(doubleSha256(encodeBlockHeader(header, false)));
}

/**
 * Decode a header and summarize it with its hash
 */
export function parseBlockHeader(data: Uint8Array | string): BlockHeader {
  const raw = decodeBlockHeader(data);
  return {
    version: raw.version,
    prevHash: hashToDisplayHex(raw.prevHash),
    merkleRoot: hashToDisplayHex(raw.merkleRoot),
    time: raw.time,
    height: raw.height,
    hash: blockHash(raw)
  };
}
