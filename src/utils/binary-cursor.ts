/**
 * Sequential little-endian reader over a byte buffer.
 */

import { TruncatedDataError } from '../errors.js';

/**
 * Reads fixed-width fields from a buffer, advancing a position after each read.
 * Every read is bounds-checked against the end of the buffer.
 */
export class BinaryCursor {
  private offset: number;

  constructor(private readonly buffer: Buffer, offset: number = 0) {
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.buffer.length;
  }

  remaining(): number {
    return this.buffer.length - this.offset;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.buffer.length) {
      throw new TruncatedDataError(`Cannot seek to ${offset}: buffer holds ${this.buffer.length} bytes`);
    }
    this.offset = offset;
  }

  skip(byteCount: number): void {
    this.ensureAvailable(byteCount);
    this.offset += byteCount;
  }

  readUInt8(): number {
    this.ensureAvailable(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUInt16(): number {
    this.ensureAvailable(2);
    const value = this.buffer.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  readUInt32(): number {
    this.ensureAvailable(4);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readUInt64(): bigint {
    this.ensureAvailable(8);
    const value = this.buffer.readBigUInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  /**
   * Returns a view of the next `byteCount` bytes. The view shares memory with the
   * underlying buffer.
   */
  readBytes(byteCount: number): Buffer {
    this.ensureAvailable(byteCount);
    const bytes = this.buffer.subarray(this.offset, this.offset + byteCount);
    this.offset += byteCount;
    return bytes;
  }

  readFixedString(byteCount: number, encoding: BufferEncoding = 'ascii'): string {
    return this.readBytes(byteCount).toString(encoding);
  }

  /** Reads a u32 byte length followed by that many UTF-8 bytes. */
  readLengthPrefixedString(): string {
    const start = this.offset;
    const byteLength = this.readUInt32();
    if (byteLength > this.remaining()) {
      this.offset = start;
      throw new TruncatedDataError(
        `String length ${byteLength} at offset ${start} exceeds the ${this.remaining() - 4} bytes remaining`
      );
    }
    return this.readBytes(byteLength).toString('utf8');
  }

  private ensureAvailable(byteCount: number): void {
    if (byteCount < 0 || this.offset + byteCount > this.buffer.length) {
      throw new TruncatedDataError(
        `Read of ${byteCount} bytes at offset ${this.offset} exceeds buffer length ${this.buffer.length}`
      );
    }
  }
}
