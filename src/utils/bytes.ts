/**
 * Byte Utilities
 * Low-level byte manipulation used by the transaction and header codecs
 */

/**
 * Convert hex string to Uint8Array
 * Handles '0x' prefix and validates input
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.startsWith('0x') ? hex.slice(2) : hex;

  if (clean.length % 2 !== 0) {
    throw new Error('hexToBytes: invalid hex string length');
  }
  if (!/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error('hexToBytes: invalid hex character');
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < clean.length; i += 2) {
    bytes[i / 2] = parseInt(clean.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Compare two Uint8Arrays for equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a[i] ^ b[i];
  }
  return result === 0;
}

/**
 * Reverse a Uint8Array (hashes are displayed byte-reversed)
 */
export function reverseBytes(bytes: Uint8Array): Uint8Array {
  const result = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    result[i] = bytes[bytes.length - 1 - i];
  }
  return result;
}

/**
 * Internal byte order hash -> display hex
 */
export function hashToDisplayHex(hash: Uint8Array): string {
  return bytesToHex(reverseBytes(hash));
}

/**
 * Display hex -> internal byte order hash
 */
export function displayHexToHash(hex: string): Uint8Array {
  const bytes = hexToBytes(hex);
  if (bytes.length !== 32) {
    throw new Error(`expected 32-byte hash, got ${bytes.length} bytes`);
  }
  return reverseBytes(bytes);
}

/**
 * Convert UTF-8 string to Uint8Array
 */
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/**
 * Zero out a Uint8Array (secure erase)
 */
export function secureZero(bytes: Uint8Array): void {
  bytes.fill(0);
}

/**
 * Calculate compact size encoding length
 */
export function compactSizeLength(value: number): number {
  if (value < 0xfd) return 1;
  if (value <= 0xffff) return 3;
  if (value <= 0xffffffff) return 5;
  return 9;
}

/**
 * Growable little-endian writer
 */
export class ByteWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  writeBytes(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.length += bytes.length;
    return this;
  }

  writeUInt8(value: number): this {
    return this.writeBytes(Uint8Array.of(value & 0xff));
  }

  writeUInt32LE(value: number): this {
    const bytes = new Uint8Array(4);
    new DataView(bytes.buffer).setUint32(0, value >>> 0, true);
    return this.writeBytes(bytes);
  }

  writeInt32LE(value: number): this {
    const bytes = new Uint8Array(4);
    new DataView(bytes.buffer).setInt32(0, value, true);
    return this.writeBytes(bytes);
  }

  writeUInt64BE(value: bigint): this {
    const bytes = new Uint8Array(8);
    new DataView(bytes.buffer).setBigUint64(0, value, false);
    return this.writeBytes(bytes);
  }

  writeCompactSize(value: number): this {
    if (value < 0xfd) {
      return this.writeUInt8(value);
    }
    if (value <= 0xffff) {
      const bytes = new Uint8Array(3);
      const view = new DataView(bytes.buffer);
      view.setUint8(0, 0xfd);
      view.setUint16(1, value, true);
      return this.writeBytes(bytes);
    }
    if (value <= 0xffffffff) {
      const bytes = new Uint8Array(5);
      const view = new DataView(bytes.buffer);
      view.setUint8(0, 0xfe);
      view.setUint32(1, value, true);
      return this.writeBytes(bytes);
    }
    const bytes = new Uint8Array(9);
    const view = new DataView(bytes.buffer);
    view.setUint8(0, 0xff);
    view.setBigUint64(1, BigInt(value), true);
    return this.writeBytes(bytes);
  }

  writeVarBytes(bytes: Uint8Array): this {
    return this.writeCompactSize(bytes.length).writeBytes(bytes);
  }

  writeVector(items: Uint8Array[]): this {
    this.writeCompactSize(items.length);
    for (const item of items) {
      this.writeVarBytes(item);
    }
    return this;
  }

  toBytes(): Uint8Array {
    return concatBytes(...this.chunks);
  }

  get size(): number {
    return this.length;
  }
}

/**
 * Bounds-checked little-endian reader
 */
export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  private ensure(length: number): void {
    if (this.offset + length > this.bytes.length) {
      throw new RangeError(
        `unexpected end of data: need ${length} bytes at offset ${this.offset}, have ${this.remaining}`
      );
    }
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length);
    const out = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  peekUInt8(): number {
    this.ensure(1);
    return this.view.getUint8(this.offset);
  }

  readUInt8(): number {
    const value = this.peekUInt8();
    this.offset += 1;
    return value;
  }

  readUInt32LE(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readInt32LE(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readUInt64BE(): bigint {
    this.ensure(8);
    const value = this.view.getBigUint64(this.offset, false);
    this.offset += 8;
    return value;
  }

  readCompactSize(): number {
    const first = this.readUInt8();
    if (first < 0xfd) {
      return first;
    }
    if (first === 0xfd) {
      this.ensure(2);
      const value = this.view.getUint16(this.offset, true);
      this.offset += 2;
      return value;
    }
    if (first === 0xfe) {
      return this.readUInt32LE();
    }
    this.ensure(8);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new RangeError('compact size out of range');
    }
    return Number(value);
  }

  readVarBytes(): Uint8Array {
    return this.readBytes(this.readCompactSize());
  }

  readVector(): Uint8Array[] {
    const count = this.readCompactSize();
    const items: Uint8Array[] = [];
    for (let i = 0; i < count; i++) {
      items.push(this.readVarBytes());
    }
    return items;
  }
}
