/**
 * Bounds-checked byte access shared by the container codecs
 */

import { MetadataError, type CodecName } from '../lib/errors.js';

/**
 * Throw OffsetOutOfBounds unless `[offset, offset + length)` lies inside the buffer
 */
export function assertRange(
  buffer: Buffer,
  offset: number,
  length: number,
  what: string,
  codec: CodecName
): void {
  if (!Number.isInteger(offset) || offset < 0 || length < 0 || offset + length > buffer.length) {
    throw new MetadataError(
      'OffsetOutOfBounds',
      `${what} at offset ${offset} (length ${length}) lies outside the ${buffer.length}-byte buffer`,
      { codec }
    );
  }
}

/**
 * Endian-aware reader that validates every access against the buffer length
 */
export class ByteReader {
  constructor(
    readonly buffer: Buffer,
    readonly littleEndian: boolean,
    private readonly codec: CodecName
  ) {}

  get length(): number {
    return this.buffer.length;
  }

  u8(offset: number, what = 'byte'): number {
    assertRange(this.buffer, offset, 1, what, this.codec);
    return this.buffer.readUInt8(offset);
  }

  u16(offset: number, what = 'uint16'): number {
    assertRange(this.buffer, offset, 2, what, this.codec);
    return this.littleEndian ? this.buffer.readUInt16LE(offset) : this.buffer.readUInt16BE(offset);
  }

  u32(offset: number, what = 'uint32'): number {
    assertRange(this.buffer, offset, 4, what, this.codec);
    return this.littleEndian ? this.buffer.readUInt32LE(offset) : this.buffer.readUInt32BE(offset);
  }

  i16(offset: number): number {
    assertRange(this.buffer, offset, 2, 'int16', this.codec);
    return this.littleEndian ? this.buffer.readInt16LE(offset) : this.buffer.readInt16BE(offset);
  }

  i32(offset: number): number {
    assertRange(this.buffer, offset, 4, 'int32', this.codec);
    return this.littleEndian ? this.buffer.readInt32LE(offset) : this.buffer.readInt32BE(offset);
  }

  f32(offset: number): number {
    assertRange(this.buffer, offset, 4, 'float', this.codec);
    return this.littleEndian ? this.buffer.readFloatLE(offset) : this.buffer.readFloatBE(offset);
  }

  f64(offset: number): number {
    assertRange(this.buffer, offset, 8, 'double', this.codec);
    return this.littleEndian ? this.buffer.readDoubleLE(offset) : this.buffer.readDoubleBE(offset);
  }

  slice(offset: number, length: number, what = 'value'): Buffer {
    assertRange(this.buffer, offset, length, what, this.codec);
    return this.buffer.subarray(offset, offset + length);
  }
}

export function writeU16(target: Buffer, offset: number, value: number, littleEndian: boolean): void {
  if (littleEndian) {
    target.writeUInt16LE(value, offset);
  } else {
    target.writeUInt16BE(value, offset);
  }
}

export function writeU32(target: Buffer, offset: number, value: number, littleEndian: boolean): void {
  if (littleEndian) {
    target.writeUInt32LE(value, offset);
  } else {
    target.writeUInt32BE(value, offset);
  }
}

export function startsWith(buffer: Buffer, prefix: Buffer, offset = 0): boolean {
  if (offset + prefix.length > buffer.length) {
    return false;
  }
  return buffer.subarray(offset, offset + prefix.length).equals(prefix);
}

/**
 * True when every code point fits in a single Latin-1 byte
 */
export function isLatin1(text: string): boolean {
  return /^[\u0000-\u00ff]*$/.test(text);
}
