// reader.ts — bounds-checked big-endian cursor with a one-byte pushback slot

import { PushbackError, UnexpectedEndOfStreamError } from "./errors";

export type ByteInput = ArrayBufferLike | Uint8Array;

export class ByteReader {
  private readonly view: DataView;
  private offset = 0;
  // Set only while the last operation was a readUint8, so exactly one byte can be pushed back.
  private unreadable = false;

  constructor(input: ByteInput) {
    if (input instanceof Uint8Array) {
      this.view = new DataView(input.buffer, input.byteOffset, input.byteLength);
    } else {
      this.view = new DataView(input);
    }
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.view.byteLength;
  }

  get remaining(): number {
    return this.view.byteLength - this.offset;
  }

  get isAtEnd(): boolean {
    return this.offset >= this.view.byteLength;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.view.byteLength) {
      throw new RangeError(`Seek target ${offset} outside 0..${this.view.byteLength}`);
    }
    this.offset = offset;
    this.unreadable = false;
  }

  private ensureAvailable(n: number) {
    if (n > this.remaining) {
      throw new UnexpectedEndOfStreamError(this.offset, n);
    }
  }

  readUint8(): number {
    this.ensureAvailable(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    this.unreadable = true;
    return value;
  }

  /** Steps back over the byte returned by the immediately preceding readUint8. */
  unreadUint8(): void {
    if (!this.unreadable) {
      throw new PushbackError(this.offset);
    }
    this.offset -= 1;
    this.unreadable = false;
  }

  readUint16(): number {
    this.ensureAvailable(2);
    const value = this.view.getUint16(this.offset, false); // big-endian
    this.offset += 2;
    this.unreadable = false;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4);
    const value = this.view.getUint32(this.offset, false); // big-endian
    this.offset += 4;
    this.unreadable = false;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensureAvailable(length);
    const bytes = new Uint8Array(
      this.view.buffer,
      this.view.byteOffset + this.offset,
      length,
    );
    this.offset += length;
    this.unreadable = false;
    return bytes;
  }

  readFourCC(): string {
    const bytes = this.readBytes(4);
    let s = "";
    for (const byte of bytes) s += String.fromCharCode(byte);
    return s;
  }
}

/**
 * Reads a MIDI variable-length quantity: 7 bits per byte, most significant
 * group first, bit 7 set on every byte but the last.
 *
 * No byte-count limit is applied; the result is kept as an unsigned 32-bit
 * integer, so over-long quantities wrap instead of going negative.
 */
export function readVariableLengthQuantity(reader: ByteReader): number {
  let byte = reader.readUint8();
  let value = byte & 0x7f;
  while (byte & 0x80) {
    byte = reader.readUint8();
    value = ((value << 7) | (byte & 0x7f)) >>> 0;
  }
  return value;
}

export function decodeVariableLengthQuantity(
  bytes: ArrayLike<number>,
  offset = 0,
): { value: number; length: number } {
  const source = Uint8Array.from(bytes);
  if (offset > source.length) {
    throw new UnexpectedEndOfStreamError(offset, 1);
  }
  const reader = new ByteReader(source);
  reader.seek(offset);
  const value = readVariableLengthQuantity(reader);
  return { value, length: reader.position - offset };
}
