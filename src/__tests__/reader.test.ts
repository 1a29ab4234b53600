import { describe, expect, it } from "vitest";
import { ByteReader, PushbackError, UnexpectedEndOfStreamError } from "../index";

describe("ByteReader", () => {
  it("should read big-endian integers regardless of host byte order", () => {
    const reader = new ByteReader(new Uint8Array([0x12, 0x34, 0x00, 0x00, 0x01, 0xe0, 0xab]));
    expect(reader.readUint16()).toBe(0x1234);
    expect(reader.readUint32()).toBe(480);
    expect(reader.readUint8()).toBe(0xab);
    expect(reader.isAtEnd).toBe(true);
  });

  it("should honour the byteOffset of a Uint8Array view", () => {
    const backing = new Uint8Array([0xde, 0xad, 0x4d, 0x54, 0x72, 0x6b]);
    const reader = new ByteReader(backing.subarray(2));
    expect(reader.length).toBe(4);
    expect(reader.readFourCC()).toBe("MTrk");
  });

  it("should accept a plain ArrayBuffer", () => {
    const reader = new ByteReader(new Uint8Array([0x01, 0x02]).buffer);
    expect(reader.remaining).toBe(2);
    expect(Array.from(reader.readBytes(2))).toEqual([1, 2]);
  });

  it("should detect truncation before reading out of bounds", () => {
    const reader = new ByteReader(new Uint8Array([0x00, 0x01, 0x02]));
    reader.readUint8();
    expect(() => reader.readUint32()).toThrow(UnexpectedEndOfStreamError);
    expect(() => reader.readUint32()).toThrow("Unexpected EOF: need 4 bytes (at 0x1)");
    // A failed read leaves the cursor where it was
    expect(reader.position).toBe(1);
  });

  describe("pushback", () => {
    it("should step back over the byte just read", () => {
      const reader = new ByteReader(new Uint8Array([0x3c, 0x40]));
      expect(reader.readUint8()).toBe(0x3c);
      reader.unreadUint8();
      expect(reader.position).toBe(0);
      expect(reader.readUint8()).toBe(0x3c);
    });

    it("should allow only one byte of pushback", () => {
      const reader = new ByteReader(new Uint8Array([0x3c, 0x40]));
      reader.readUint8();
      reader.readUint8();
      reader.unreadUint8();
      expect(() => reader.unreadUint8()).toThrow(PushbackError);
    });

    it("should refuse pushback after a multi-byte read", () => {
      const reader = new ByteReader(new Uint8Array([0x00, 0x01]));
      reader.readUint16();
      expect(() => reader.unreadUint8()).toThrow(PushbackError);
    });
  });

  it("should reject seeks outside the source", () => {
    const reader = new ByteReader(new Uint8Array(4));
    reader.seek(4);
    expect(reader.isAtEnd).toBe(true);
    expect(() => reader.seek(5)).toThrow(RangeError);
  });
});
