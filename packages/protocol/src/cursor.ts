/**
 * Byte Cursor
 *
 * Read/write primitive over a growing buffer of received bytes.
 * Reads either succeed completely or consume nothing.
 *
 * All numeric reads use Big Endian (network byte order).
 */

import { InsufficientDataError } from "./errors.js";

export class ByteCursor {
  private buffer: Buffer;

  constructor(initial?: Buffer) {
    this.buffer = initial ?? Buffer.alloc(0);
  }

  /**
   * Number of unconsumed bytes
   */
  get available(): number {
    return this.buffer.length;
  }

  /**
   * Grow the buffer with newly received data
   */
  append(chunk: Buffer): void {
    if (chunk.length === 0) return;

    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Read a u32 at `offset` without consuming
   */
  peekUInt32BE(offset: number = 0): number {
    this.ensure(offset + 4);
    return this.buffer.readUInt32BE(offset);
  }

  /**
   * Consume and return exactly `n` bytes
   */
  take(n: number): Buffer {
    this.ensure(n);
    const taken = this.buffer.subarray(0, n);
    this.buffer = this.buffer.subarray(n);
    return taken;
  }

  readUInt8(): number {
    return this.take(1).readUInt8(0);
  }

  readUInt32BE(): number {
    return this.take(4).readUInt32BE(0);
  }

  /**
   * Read a u64 as a number. Values past Number.MAX_SAFE_INTEGER
   * cannot be represented exactly and are returned as null.
   */
  readUInt64BE(): number | null {
    const value = this.take(8).readBigUInt64BE(0);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      return null;
    }
    return Number(value);
  }

  readDoubleBE(): number {
    return this.take(8).readDoubleBE(0);
  }

  private ensure(n: number): void {
    if (this.buffer.length < n) {
      throw new InsufficientDataError(n, this.buffer.length);
    }
  }
}
