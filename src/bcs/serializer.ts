// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable no-bitwise */
import {
  MAX_I128_BIG_INT,
  MAX_I16_NUMBER,
  MAX_I256_BIG_INT,
  MAX_I32_NUMBER,
  MAX_I64_BIG_INT,
  MAX_I8_NUMBER,
  MAX_U128_BIG_INT,
  MAX_U16_NUMBER,
  MAX_U32_NUMBER,
  MAX_U64_BIG_INT,
  MAX_U8_NUMBER,
  MAX_U256_BIG_INT,
  MIN_I128_BIG_INT,
  MIN_I16_NUMBER,
  MIN_I256_BIG_INT,
  MIN_I32_NUMBER,
  MIN_I64_BIG_INT,
  MIN_I8_NUMBER,
} from "./consts";
import { Hex } from "../core/hex";
import { AnyNumber, Int16, Int32, Int8, Uint16, Uint32, Uint8 } from "../types";

/**
 * Base class of everything with a BCS encoding. Subclasses write themselves into a
 * `Serializer`; the helpers here give the standalone bytes.
 */
export abstract class Serializable {
  abstract serialize(serializer: Serializer): void;

  /**
   * The value's BCS bytes, as `bcs::to_bytes` gives them on chain.
   */
  bcsToBytes(): Uint8Array {
    const serializer = new Serializer();
    serializer.serialize(this);
    return serializer.toUint8Array();
  }

  bcsToHex(): Hex {
    return new Hex({ data: this.bcsToBytes() });
  }
}

export function ensureBoolean(value: unknown): asserts value is boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${value} is not a boolean value`);
  }
}

export const outOfRangeErrorMessage = (value: AnyNumber, min: AnyNumber, max: AnyNumber) =>
  `${value} is out of range: [${min}, ${max}]`;

export function validateNumberInRange(value: AnyNumber, minValue: AnyNumber, maxValue: AnyNumber) {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new Error(`${value} is not an integer`);
  }
  const n = BigInt(value);
  if (n < BigInt(minValue) || n > BigInt(maxValue)) {
    throw new Error(outOfRangeErrorMessage(value, minValue, maxValue));
  }
}

/**
 * Method decorator: the single argument must be an integer (number or bigint) in
 * [minValue, maxValue].
 */
function checkNumberRange(minValue: AnyNumber, maxValue: AnyNumber) {
  return (target: unknown, propertyKey: string, descriptor: PropertyDescriptor) => {
    const write = descriptor.value;
    // eslint-disable-next-line no-param-reassign
    descriptor.value = function checked(this: Serializer, value: AnyNumber): void {
      if (typeof value !== "number" && typeof value !== "bigint") {
        throw new Error(`${value} is not a number`);
      }
      validateNumberInRange(value, minValue, maxValue);
      write.call(this, value);
    };
    return descriptor;
  };
}

/**
 * Appends BCS encodings to a growing byte buffer. Integers are little endian, and
 * sequence lengths and enum tags are uleb128.
 *
 * @example
 * ```ts
 * const serializer = new Serializer();
 * serializer.serializeU16(4660);
 * serializer.serializeStr("hi");
 * serializer.toUint8Array(); // [0x34, 0x12, 2, 0x68, 0x69]
 * ```
 */
export class Serializer {
  private bytes: Uint8Array;

  private length = 0;

  /**
   * @param capacity initial buffer size in bytes, doubled whenever it runs out
   */
  constructor(capacity: number = 64) {
    if (capacity <= 0) {
      throw new Error("Length needs to be greater than 0");
    }
    this.bytes = new Uint8Array(capacity);
  }

  protected appendToBuffer(values: Uint8Array) {
    let capacity = this.bytes.length;
    while (capacity < this.length + values.length) {
      capacity *= 2;
    }
    if (capacity !== this.bytes.length) {
      const grown = new Uint8Array(capacity);
      grown.set(this.bytes.subarray(0, this.length));
      this.bytes = grown;
    }
    this.bytes.set(values, this.length);
    this.length += values.length;
  }

  // `size` bytes of `value`, lowest first
  private writeLittleEndian(value: AnyNumber, size: number) {
    let rest = BigInt(value);
    const out = new Uint8Array(size);
    for (let i = 0; i < size; i += 1) {
      out[i] = Number(rest & BigInt(0xff));
      rest >>= BigInt(8);
    }
    this.appendToBuffer(out);
  }

  private writeUleb128(value: bigint) {
    const out: number[] = [];
    let rest = value;
    do {
      const low = Number(rest & BigInt(0x7f));
      rest >>= BigInt(7);
      out.push(rest === BigInt(0) ? low : low | 0x80);
    } while (rest !== BigInt(0));
    this.appendToBuffer(Uint8Array.from(out));
  }

  // UTF-8 bytes with a uleb128 length: "1234abcd" is [8, 49, 50, 51, 52, 97, 98, 99, 100]
  serializeStr(value: string) {
    this.serializeBytes(new TextEncoder().encode(value));
  }

  serializeBytes(value: Uint8Array) {
    this.serializeU32AsUleb128(value.length);
    this.appendToBuffer(value);
  }

  /**
   * Bytes with no length prefix; the reader has to know how many to take.
   */
  serializeFixedBytes(value: Uint8Array) {
    this.appendToBuffer(value);
  }

  serializeBool(value: boolean) {
    ensureBoolean(value);
    this.appendToBuffer(Uint8Array.of(value ? 1 : 0));
  }

  @checkNumberRange(0, MAX_U8_NUMBER)
  serializeU8(value: Uint8) {
    this.appendToBuffer(Uint8Array.of(value));
  }

  @checkNumberRange(0, MAX_U16_NUMBER)
  serializeU16(value: Uint16) {
    this.writeLittleEndian(value, 2);
  }

  @checkNumberRange(0, MAX_U32_NUMBER)
  serializeU32(value: Uint32) {
    this.writeLittleEndian(value, 4);
  }

  @checkNumberRange(BigInt(0), MAX_U64_BIG_INT)
  serializeU64(value: AnyNumber) {
    this.writeLittleEndian(value, 8);
  }

  @checkNumberRange(BigInt(0), MAX_U128_BIG_INT)
  serializeU128(value: AnyNumber) {
    this.writeLittleEndian(value, 16);
  }

  @checkNumberRange(BigInt(0), MAX_U256_BIG_INT)
  serializeU256(value: AnyNumber) {
    this.writeLittleEndian(value, 32);
  }

  // Signed integers go out as the two's complement of the same width.

  @checkNumberRange(MIN_I8_NUMBER, MAX_I8_NUMBER)
  serializeI8(value: Int8) {
    this.writeLittleEndian(BigInt.asUintN(8, BigInt(value)), 1);
  }

  @checkNumberRange(MIN_I16_NUMBER, MAX_I16_NUMBER)
  serializeI16(value: Int16) {
    this.writeLittleEndian(BigInt.asUintN(16, BigInt(value)), 2);
  }

  @checkNumberRange(MIN_I32_NUMBER, MAX_I32_NUMBER)
  serializeI32(value: Int32) {
    this.writeLittleEndian(BigInt.asUintN(32, BigInt(value)), 4);
  }

  @checkNumberRange(MIN_I64_BIG_INT, MAX_I64_BIG_INT)
  serializeI64(value: AnyNumber) {
    this.writeLittleEndian(BigInt.asUintN(64, BigInt(value)), 8);
  }

  @checkNumberRange(MIN_I128_BIG_INT, MAX_I128_BIG_INT)
  serializeI128(value: AnyNumber) {
    this.writeLittleEndian(BigInt.asUintN(128, BigInt(value)), 16);
  }

  @checkNumberRange(MIN_I256_BIG_INT, MAX_I256_BIG_INT)
  serializeI256(value: AnyNumber) {
    this.writeLittleEndian(BigInt.asUintN(256, BigInt(value)), 32);
  }

  /**
   * Seven bits per byte, lowest group first, high bit set on every byte but the last.
   * Used for sequence lengths and enum variant indices.
   */
  @checkNumberRange(0, MAX_U32_NUMBER)
  serializeU32AsUleb128(val: Uint32) {
    this.writeUleb128(BigInt(val));
  }

  @checkNumberRange(BigInt(0), MAX_U64_BIG_INT)
  serializeU64AsUleb128(val: AnyNumber) {
    this.writeUleb128(BigInt(val));
  }

  toUint8Array(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }

  serialize<T extends Serializable>(value: T) {
    value.serialize(this);
  }

  serializeVector<T extends Serializable>(values: ReadonlyArray<T>) {
    this.serializeVectorWith(values, (serializer, item) => serializer.serialize(item));
  }

  /**
   * A uleb128 count, then each item written by `serializeItem`.
   */
  serializeVectorWith<T>(values: ReadonlyArray<T>, serializeItem: (serializer: Serializer, item: T) => void) {
    this.serializeU32AsUleb128(values.length);
    values.forEach((item) => serializeItem(this, item));
  }

  // 0 when absent, 1 and the value when present
  serializeOption<T extends Serializable>(value?: T) {
    this.serializeBool(value !== undefined);
    if (value !== undefined) {
      this.serialize(value);
    }
  }
}
