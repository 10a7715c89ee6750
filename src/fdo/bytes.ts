/**
 * Byte buffer helpers for stream encoding and decoding
 */

import { DecodeError } from '../errors.js';

export class ByteWriter {
  private readonly bytes: number[] = [];

  get length(): number {
    return this.bytes.length;
  }

  u8(value: number): void {
    this.bytes.push(value & 0xff);
  }

  /** Big-endian */
  u16(value: number): void {
    this.bytes.push((value >>> 8) & 0xff, value & 0xff);
  }

  /** Big-endian; negative values are written in two's complement */
  u32(value: number): void {
    const unsigned = value >>> 0;
    this.bytes.push((unsigned >>> 24) & 0xff, (unsigned >>> 16) & 0xff, (unsigned >>> 8) & 0xff, unsigned & 0xff);
  }

  append(data: ArrayLike<number>): void {
    for (let i = 0; i < data.length; i++) {
      this.bytes.push(data[i] & 0xff);
    }
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

/**
 * Bounded reader; offsets are absolute positions in the underlying buffer
 */
export class ByteReader {
  private position: number;

  constructor(
    private readonly data: Uint8Array,
    start = 0,
    private readonly end = data.length
  ) {
    this.position = start;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.end - this.position;
  }

  private need(count: number, what: string): void {
    if (count > this.remaining) {
      throw new DecodeError(this.position, `truncated ${what}: need ${count} byte(s), ${this.remaining} left`);
    }
  }

  u8(what = 'byte'): number {
    this.need(1, what);
    return this.data[this.position++];
  }

  u16(what = 'u16'): number {
    this.need(2, what);
    const value = (this.data[this.position] << 8) | this.data[this.position + 1];
    this.position += 2;
    return value;
  }

  /** Unsigned big-endian */
  u32(what = 'u32'): number {
    this.need(4, what);
    const p = this.position;
    const value = ((this.data[p] << 24) | (this.data[p + 1] << 16) | (this.data[p + 2] << 8) | this.data[p + 3]) >>> 0;
    this.position += 4;
    return value;
  }

  take(count: number, what = 'data'): Uint8Array {
    this.need(count, what);
    const slice = this.data.subarray(this.position, this.position + count);
    this.position += count;
    return slice;
  }

  /** Reader over the next `count` bytes; this reader skips past them */
  sub(count: number, what = 'record'): ByteReader {
    this.need(count, what);
    const reader = new ByteReader(this.data, this.position, this.position + count);
    this.position += count;
    return reader;
  }
}

/**
 * Latin-1 bytes for a string, or null when a character falls outside Latin-1
 */
export function encodeLatin1(text: string): Uint8Array | null {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) {
      return null;
    }
    bytes[i] = code;
  }
  return bytes;
}

export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('latin1');
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * Space-separated lowercase hex for bytes[start, end)
 */
export function toHex(bytes: Uint8Array, start = 0, end = bytes.length): string {
  const parts: string[] = [];
  for (let i = Math.max(0, start); i < Math.min(end, bytes.length); i++) {
    parts.push(bytes[i].toString(16).padStart(2, '0'));
  }
  return parts.join(' ');
}

/**
 * Parse space-separated or contiguous hex text
 */
export function fromHex(text: string): Uint8Array {
  const digits = text.replace(/\s+/g, '');
  if (digits.length % 2 !== 0 || /[^0-9a-fA-F]/.test(digits)) {
    throw new DecodeError(0, 'invalid hex text');
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
