// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Serializable, Serializer, ensureBoolean } from "../../src/bcs/serializer";

const bytesOf = (write: (serializer: Serializer) => void, capacity?: number) => {
  const serializer = new Serializer(capacity);
  write(serializer);
  return Array.from(serializer.toUint8Array());
};

const ff = (n: number) => new Array<number>(n).fill(0xff);

class Entry extends Serializable {
  constructor(
    public key: string,
    public flag: boolean,
  ) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeStr(this.key);
    serializer.serializeBool(this.flag);
  }
}

describe("Serializer", () => {
  describe("strings and bytes", () => {
    it("prefixes UTF-8 strings with their byte length", () => {
      expect(bytesOf((s) => s.serializeStr("move"))).toEqual([4, 0x6d, 0x6f, 0x76, 0x65]);
      // é is two bytes, ∑ is three
      expect(bytesOf((s) => s.serializeStr("é∑"))).toEqual([5, 0xc3, 0xa9, 0xe2, 0x88, 0x91]);
      expect(bytesOf((s) => s.serializeStr(""))).toEqual([0]);
    });

    it("prefixes byte strings with their length", () => {
      expect(bytesOf((s) => s.serializeBytes(Uint8Array.of(9, 8, 7)))).toEqual([3, 9, 8, 7]);
      expect(bytesOf((s) => s.serializeBytes(new Uint8Array(0)))).toEqual([0]);
    });

    it("writes fixed bytes as they are", () => {
      expect(bytesOf((s) => s.serializeFixedBytes(Uint8Array.of(9, 8, 7)))).toEqual([9, 8, 7]);
      expect(bytesOf((s) => s.serializeFixedBytes(new Uint8Array(0)))).toEqual([]);
    });

    it("uses a two byte length from 128 bytes on", () => {
      const out = bytesOf((s) => s.serializeBytes(new Uint8Array(200)));
      expect(out.slice(0, 2)).toEqual([0xc8, 0x01]);
      expect(out).toHaveLength(202);
    });
  });

  describe("booleans", () => {
    it("writes one byte", () => {
      expect(bytesOf((s) => s.serializeBool(true))).toEqual([1]);
      expect(bytesOf((s) => s.serializeBool(false))).toEqual([0]);
    });

    it("refuses anything else", () => {
      expect(() => ensureBoolean(12)).toThrow("12 is not a boolean value");
      expect(() => ensureBoolean("true")).toThrow("true is not a boolean value");
    });
  });

  describe("unsigned integers", () => {
    it.each([
      ["u8 max", (s: Serializer) => s.serializeU8(255), [0xff]],
      ["u16", (s: Serializer) => s.serializeU16(0x1234), [0x34, 0x12]],
      ["u16 max", (s: Serializer) => s.serializeU16(65535), ff(2)],
      ["u32", (s: Serializer) => s.serializeU32(0x01020304), [4, 3, 2, 1]],
      ["u32 max", (s: Serializer) => s.serializeU32(4294967295), ff(4)],
      ["u64", (s: Serializer) => s.serializeU64(BigInt("0x0102030405060708")), [8, 7, 6, 5, 4, 3, 2, 1]],
      ["u64 from a number", (s: Serializer) => s.serializeU64(300), [0x2c, 1, 0, 0, 0, 0, 0, 0]],
      ["u64 max", (s: Serializer) => s.serializeU64(BigInt("18446744073709551615")), ff(8)],
      ["u128", (s: Serializer) => s.serializeU128(BigInt(1) << BigInt(64)), [0, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0]],
      ["u128 max", (s: Serializer) => s.serializeU128((BigInt(1) << BigInt(128)) - BigInt(1)), ff(16)],
      ["u256 max", (s: Serializer) => s.serializeU256((BigInt(1) << BigInt(256)) - BigInt(1)), ff(32)],
    ])("writes %s little endian", (_, write, expected) => {
      expect(bytesOf(write)).toEqual(expected);
    });

    it("puts the high bit of a u256 in the last byte", () => {
      const out = bytesOf((s) => s.serializeU256(BigInt(1) << BigInt(255)));
      expect(out[31]).toEqual(0x80);
      expect(out.slice(0, 31).every((b) => b === 0)).toBe(true);
    });

    it.each([
      ["u8", (s: Serializer) => s.serializeU8(256), "256 is out of range: [0, 255]"],
      ["u8", (s: Serializer) => s.serializeU8(-1), "-1 is out of range: [0, 255]"],
      ["u16", (s: Serializer) => s.serializeU16(65536), "65536 is out of range: [0, 65535]"],
      ["u32", (s: Serializer) => s.serializeU32(4294967296), "4294967296 is out of range: [0, 4294967295]"],
      ["u64", (s: Serializer) => s.serializeU64(-1), "-1 is out of range: [0, 18446744073709551615]"],
      ["u64", (s: Serializer) => s.serializeU64(BigInt("18446744073709551616")), "18446744073709551616 is out of range"],
      ["u128", (s: Serializer) => s.serializeU128(BigInt(1) << BigInt(128)), "is out of range"],
      ["u256", (s: Serializer) => s.serializeU256(BigInt(-1)), "-1 is out of range"],
    ])("refuses an out of range %s", (_, write, message) => {
      expect(() => bytesOf(write)).toThrow(message);
    });

    it("refuses fractions", () => {
      expect(() => bytesOf((s) => s.serializeU8(1.5))).toThrow("1.5 is not an integer");
      expect(() => bytesOf((s) => s.serializeU64(2.25))).toThrow("2.25 is not an integer");
    });
  });

  describe("signed integers", () => {
    it.each([
      ["i8 -1", (s: Serializer) => s.serializeI8(-1), [0xff]],
      ["i8 min", (s: Serializer) => s.serializeI8(-128), [0x80]],
      ["i8 max", (s: Serializer) => s.serializeI8(127), [0x7f]],
      ["i16 -2", (s: Serializer) => s.serializeI16(-2), [0xfe, 0xff]],
      ["i32 -1", (s: Serializer) => s.serializeI32(-1), ff(4)],
      ["i32 min", (s: Serializer) => s.serializeI32(-2147483648), [0, 0, 0, 0x80]],
      ["i64 -1", (s: Serializer) => s.serializeI64(BigInt(-1)), ff(8)],
      ["i64 from a number", (s: Serializer) => s.serializeI64(-256), [0, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]],
      ["i128 -1", (s: Serializer) => s.serializeI128(BigInt(-1)), ff(16)],
      ["i256 -1", (s: Serializer) => s.serializeI256(BigInt(-1)), ff(32)],
    ])("writes %s as two's complement", (_, write, expected) => {
      expect(bytesOf(write)).toEqual(expected);
    });

    it.each([
      [(s: Serializer) => s.serializeI8(128), "128 is out of range: [-128, 127]"],
      [(s: Serializer) => s.serializeI16(-32769), "-32769 is out of range: [-32768, 32767]"],
      [(s: Serializer) => s.serializeI64(BigInt(2) ** BigInt(63)), "9223372036854775808 is out of range"],
    ])("refuses out of range value %#", (write, message) => {
      expect(() => bytesOf(write)).toThrow(message);
    });
  });

  describe("uleb128", () => {
    it.each([
      [0, [0x00]],
      [1, [0x01]],
      [127, [0x7f]],
      [128, [0x80, 0x01]],
      [16383, [0xff, 0x7f]],
      [16384, [0x80, 0x80, 0x01]],
      [65535, [0xff, 0xff, 0x03]],
      [104543565, [0xcd, 0xea, 0xec, 0x31]],
      [4294967295, [0xff, 0xff, 0xff, 0xff, 0x0f]],
    ])("encodes %d as a u32", (value, expected) => {
      expect(bytesOf((s) => s.serializeU32AsUleb128(value))).toEqual(expected);
    });

    it("encodes u64 values past 32 bits", () => {
      expect(bytesOf((s) => s.serializeU64AsUleb128(BigInt(2) ** BigInt(35)))).toEqual([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]);
      expect(bytesOf((s) => s.serializeU64AsUleb128(BigInt("18446744073709551615")))).toEqual([...ff(9), 0x01]);
    });

    it("refuses values outside u32 for the u32 form", () => {
      expect(() => bytesOf((s) => s.serializeU32AsUleb128(4294967296))).toThrow("is out of range");
      expect(() => bytesOf((s) => s.serializeU32AsUleb128(-1))).toThrow("is out of range");
    });
  });

  describe("composites", () => {
    it("writes a vector as a count and its items", () => {
      const out = bytesOf((s) => s.serializeVector([new Entry("a", true), new Entry("bc", false)]));
      expect(out).toEqual([2, 1, 0x61, 1, 2, 0x62, 0x63, 0]);
    });

    it("writes plain values through a callback", () => {
      const out = bytesOf((s) => s.serializeVectorWith([1, 2, 300], (inner, n) => inner.serializeU16(n)));
      expect(out).toEqual([3, 1, 0, 2, 0, 0x2c, 0x01]);
    });

    it("writes an option as a flag and the value", () => {
      expect(bytesOf((s) => s.serializeOption(new Entry("", true)))).toEqual([1, 0, 1]);
      expect(bytesOf((s) => s.serializeOption<Entry>(undefined))).toEqual([0]);
    });

    it("nests Serializable values in field order", () => {
      class Pair extends Serializable {
        constructor(
          public left: Entry,
          public right: number,
        ) {
          super();
        }

        serialize(serializer: Serializer): void {
          serializer.serialize(this.left);
          serializer.serializeU32(this.right);
        }
      }
      const pair = new Pair(new Entry("k", false), 7);
      expect(Array.from(pair.bcsToBytes())).toEqual([1, 0x6b, 0, 7, 0, 0, 0]);
      expect(pair.bcsToHex().toString()).toEqual("0x016b0007000000");
    });
  });

  describe("buffer", () => {
    it("grows past its initial capacity", () => {
      const out = bytesOf((s) => {
        for (let i = 0; i < 10; i += 1) {
          s.serializeU32(i);
        }
      }, 1);
      expect(out).toHaveLength(40);
      expect(out.slice(36)).toEqual([9, 0, 0, 0]);
    });

    it("needs a positive capacity", () => {
      expect(() => new Serializer(0)).toThrow("Length needs to be greater than 0");
      expect(() => new Serializer(-1)).toThrow("Length needs to be greater than 0");
    });

    it("returns a copy of what was written so far", () => {
      const serializer = new Serializer();
      serializer.serializeU8(1);
      const first = serializer.toUint8Array();
      serializer.serializeU8(2);
      expect(Array.from(first)).toEqual([1]);
      expect(Array.from(serializer.toUint8Array())).toEqual([1, 2]);
    });
  });
});
