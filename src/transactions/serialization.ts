/**
 * Transaction Serialization
 * Encodes and decodes Elements transactions in consensus wire format
 *
 * Layout: version (i32) | flags (u8) | inputs | outputs | locktime (u32)
 * | witnesses when `flags & 1`, inputs first, then outputs.
 */

import { ProtocolViolationError } from '../errors';
import {
  ByteReader,
  ByteWriter,
  bytesToHex,
  hashToDisplayHex,
  hexToBytes
} from '../utils/bytes';
import { doubleSha256 } from '../utils/hash';
import {
  ASSET_COMMITMENT_PREFIXES,
  EXPLICIT_PREFIX,
  NONCE_COMMITMENT_PREFIXES,
  VALUE_COMMITMENT_PREFIXES,
  emptyInputWitness,
  emptyOutputWitness,
  type AssetIssuance,
  type Transaction,
  type TxInput,
  type TxOutput
} from './types';

const COINBASE_INDEX = 0xffffffff;
const ISSUANCE_FLAG = 0x80000000;
const PEGIN_FLAG = 0x40000000;
const INDEX_MASK = 0x3fffffff;

/**
 * Read a confidential field: null, explicit or committed
 */
function readConfidential(reader: ByteReader, explicitSize: number, commitmentPrefixes: number[]): Uint8Array {
  const prefix = reader.peekUInt8();
  if (prefix === 0x00) {
    return reader.readBytes(1);
  }
  if (prefix === EXPLICIT_PREFIX) {
    return reader.readBytes(1 + explicitSize);
  }
  if (commitmentPrefixes.includes(prefix)) {
    return reader.readBytes(33);
  }
  throw new RangeError(`invalid confidential prefix 0x${prefix.toString(16)}`);
}

function readIssuance(reader: ByteReader): AssetIssuance {
  return {
    blindingNonce: reader.readBytes(32),
    assetEntropy: reader.readBytes(32),
    amount: readConfidential(reader, 8, VALUE_COMMITMENT_PREFIXES),
    inflationKeys: readConfidential(reader, 8, VALUE_COMMITMENT_PREFIXES)
  };
}

function readInput(reader: ByteReader): TxInput {
  const prevHash = reader.readBytes(32);
  const rawIndex = reader.readUInt32LE();
  const scriptSig = reader.readVarBytes();
  const sequence = reader.readUInt32LE();

  let prevIndex = rawIndex;
  let hasIssuance = false;
  let isPegin = false;
  if (rawIndex !== COINBASE_INDEX) {
    hasIssuance = (rawIndex & ISSUANCE_FLAG) !== 0;
    isPegin = (rawIndex & PEGIN_FLAG) !== 0;
    prevIndex = rawIndex & INDEX_MASK;
  }

  return {
    prevHash,
    prevIndex,
    isPegin,
    scriptSig,
    sequence,
    issuance: hasIssuance ? readIssuance(reader) : undefined,
    witness: emptyInputWitness()
  };
}

function readOutput(reader: ByteReader): TxOutput {
  return {
    asset: readConfidential(reader, 32, ASSET_COMMITMENT_PREFIXES),
    value: readConfidential(reader, 8, VALUE_COMMITMENT_PREFIXES),
    nonce: readConfidential(reader, 32, NONCE_COMMITMENT_PREFIXES),
    script: reader.readVarBytes(),
    witness: emptyOutputWitness()
  };
}

/**
 * Decode a transaction from bytes or hex
 */
export function decodeTransaction(data: Uint8Array | string): Transaction {
  try {
    const bytes = typeof data === 'string' ? hexToBytes(data) : data;
    const reader = new ByteReader(bytes);

    const version = reader.readInt32LE();
    const flags = reader.readUInt8();
    if (flags > 1) {
      throw new RangeError(`unsupported transaction flags ${flags}`);
    }

    const inputCount = reader.readCompactSize();
    const inputs: TxInput[] = [];
    for (let i = 0; i < inputCount; i++) {
      inputs.push(readInput(reader));
    }

    const outputCount = reader.readCompactSize();
    const outputs: TxOutput[] = [];
    for (let i = 0; i < outputCount; i++) {
      outputs.push(readOutput(reader));
    }

    const locktime = reader.readUInt32LE();

    if (flags === 1) {
      for (const input of inputs) {
        input.witness = {
          issuanceRangeProof: reader.readVarBytes(),
          inflationRangeProof: reader.readVarBytes(),
          scriptWitness: reader.readVector(),
          peginWitness: reader.readVector()
        };
      }
      for (const output of outputs) {
        output.witness = {
          surjectionProof: reader.readVarBytes(),
          rangeProof: reader.readVarBytes()
        };
      }
    }

    if (reader.remaining !== 0) {
      throw new RangeError(`${reader.remaining} trailing bytes after transaction`);
    }

    return { version, inputs, outputs, locktime };
  } catch (error) {
    if (error instanceof ProtocolViolationError) throw error;
    throw new ProtocolViolationError('Malformed transaction', { cause: error });
  }
}

function hasWitness(tx: Transaction): boolean {
  return (
    tx.inputs.some(
      input =>
        input.witness.issuanceRangeProof.length > 0 ||
        input.witness.inflationRangeProof.length > 0 ||
        input.witness.scriptWitness.length > 0 ||
        input.witness.peginWitness.length > 0
    ) ||
    tx.outputs.some(output => output.witness.surjectionProof.length > 0 || output.witness.rangeProof.length > 0)
  );
}

function writeInput(writer: ByteWriter, input: TxInput): void {
  let rawIndex = input.prevIndex;
  if (rawIndex !== COINBASE_INDEX) {
    if (input.issuance) rawIndex |= ISSUANCE_FLAG;
    if (input.isPegin) rawIndex |= PEGIN_FLAG;
  }

  writer
    .writeBytes(input.prevHash)
    .writeUInt32LE(rawIndex >>> 0)
    .writeVarBytes(input.scriptSig)
    .writeUInt32LE(input.sequence);

  if (input.issuance) {
    writer
      .writeBytes(input.issuance.blindingNonce)
      .writeBytes(input.issuance.assetEntropy)
      .writeBytes(input.issuance.amount)
      .writeBytes(input.issuance.inflationKeys);
  }
}

function writeOutput(writer: ByteWriter, output: TxOutput): void {
  writer
    .writeBytes(output.asset)
    .writeBytes(output.value)
    .writeBytes(output.nonce)
    .writeVarBytes(output.script);
}

/**
 * Encode a transaction; `withWitness` false gives the txid preimage
 */
export function encodeTransaction(tx: Transaction, withWitness = true): Uint8Array {
  const witness = withWitness && hasWitness(tx);
  const writer = new ByteWriter();

  writer.writeInt32LE(tx.version).writeUInt8(witness ? 1 : 0);

  writer.writeCompactSize(tx.inputs.length);
  for (const input of tx.inputs) {
    writeInput(writer, input);
  }

  writer.writeCompactSize(tx.outputs.length);
  for (const output of tx.outputs) {
    writeOutput(writer, output);
  }

  writer.writeUInt32LE(tx.locktime);

  if (witness) {
    for (const input of tx.inputs) {
      writer
        .writeVarBytes(input.witness.issuanceRangeProof)
        .writeVarBytes(input.witness.inflationRangeProof)
        .writeVector(input.witness.scriptWitness)
        .writeVector(input.witness.peginWitness);
    }
    for (const output of tx.outputs) {
      writer.writeVarBytes(output.witness.surjectionProof).writeVarBytes(output.witness.rangeProof);
    }
  }

  return writer.toBytes();
}

export function transactionToHex(tx: Transaction): string {
  return bytesToHex(encodeTransaction(tx));
}

const txidCache = new WeakMap<Transaction, string>();

/**
 * Transaction id in display hex (reversed double-SHA256 of the witness-free
 * encoding). Memoized per transaction object; transactions are not mutated
 * after decoding.
 */
export function computeTxid(tx: Transaction): string {
  let txid = txidCache.get(tx);
  if (txid === undefined) {
    txid = hashToDisplayHex(doubleSha256(encodeTransaction(tx, false)));
    txidCache.set(tx, txid);
  }
  return txid;
}

/**
 * Explicit value of an output in satoshi, or null when blinded
 */
export function explicitValue(output: TxOutput): bigint | null {
  if (output.value.length !== 9 || output.value[0] !== EXPLICIT_PREFIX) {
    return null;
  }
  return new ByteReader(output.value.subarray(1)).readUInt64BE();
}

/**
 * Explicit asset id of an output in display hex, or null when blinded
 */
export function explicitAsset(output: TxOutput): string | null {
  if (output.asset.length !== 33 || output.asset[0] !== EXPLICIT_PREFIX) {
    return null;
  }
  return hashToDisplayHex(output.asset.subarray(1));
}

/**
 * Fee outputs carry an empty script
 */
export function isFeeOutput(output: TxOutput): boolean {
  return output.script.length === 0;
}

/**
 * Outpoint key used across the store: "txid:vout"
 */
export function outpointKey(txid: string, vout: number): string {
  return `${txid}:${vout}`;
}

/**
 * Outpoints spent by a transaction's inputs, pegins and coinbase excluded
 */
export function spentOutpoints(tx: Transaction): string[] {
  return tx.inputs
    .filter(input => !input.isPegin && input.prevIndex !== COINBASE_INDEX)
    .map(input => outpointKey(hashToDisplayHex(input.prevHash), input.prevIndex));
}
