// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable no-bitwise */
import { MAX_U32_NUMBER, MAX_U64_BIG_INT } from "./consts";
import { ParsingError } from "../core/common";
import { Hex } from "../core/hex";
import { HexInput, Int128, Int16, Int256, Int32, Int64, Int8, Uint128, Uint16, Uint256, Uint32, Uint64, Uint8 } from "../types";

export enum BcsInvalidReason {
  SHORT_BUFFER = "short_buffer",
  INVALID_BOOL = "invalid_bool",
  INVALID_ULEB128 = "invalid_uleb128",
  INVALID_VALUE = "invalid_value",
  UNKNOWN_VARIANT = "unknown_variant",
  UNSUPPORTED_VARIANT = "unsupported_variant",
  LENGTH_MISMATCH = "length_mismatch",
  TRAILING_BYTES = "trailing_bytes",
}

export class BcsError extends ParsingError<BcsInvalidReason> {
  constructor(message: string, invalidReason: BcsInvalidReason) {
    super(message, invalidReason);
    this.name = "BcsError";
  }
}

/**
 * A class, or any object, with a static-style `deserialize`.
 */
export interface Deserializable<T> {
  deserialize(deserializer: Deserializer): T;
}

/**
 * Reads BCS values out of a byte buffer.
 *
 * Primitive reads never throw. The first failure (running out of bytes, a bool that
 * is not 0 or 1, a bad uleb128) is kept in `error()` and the read returns zero. From
 * then on every read returns zero without touching the buffer.
 *
 * Composite types that cannot build a value call `fail` and throw the result, which
 * is always the first error recorded. `deserializeFromBytes` is the entry point that
 * turns a recorded error into an exception.
 */
export class Deserializer {
  private readonly bytes: Uint8Array;

  private offset = 0;

  private firstError?: Error;

  constructor(data: Uint8Array) {
    // own copy, so the caller can reuse its buffer
    this.bytes = Uint8Array.from(data);
  }

  static fromHex(hexInput: HexInput): Deserializer {
    return new Deserializer(Hex.fromHexInput({ hexInput }).toUint8Array());
  }

  error(): Error | undefined {
    return this.firstError;
  }

  setError(err: Error): void {
    this.firstError ??= err;
  }

  /**
   * Records `err` if nothing is recorded yet, and returns the recorded error.
   */
  fail(err: Error): Error {
    this.setError(err);
    return this.firstError ?? err;
  }

  remaining(): number {
    return this.bytes.length - this.offset;
  }

  // `length` bytes, or `length` zero bytes once an error is recorded
  private take(length: number): Uint8Array {
    if (this.firstError === undefined && length > this.remaining()) {
      this.setError(
        new BcsError(
          `Reached the end of the buffer: needed ${length} bytes, ${this.remaining()} left`,
          BcsInvalidReason.SHORT_BUFFER,
        ),
      );
    }
    if (this.firstError !== undefined) {
      return new Uint8Array(length);
    }
    const chunk = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return chunk;
  }

  // little-endian unsigned integer of `size` bytes
  private takeUint(size: number): bigint {
    return this.take(size).reduceRight((acc, byte) => (acc << BigInt(8)) | BigInt(byte), BigInt(0));
  }

  deserializeBytes(): Uint8Array {
    const length = this.deserializeUleb128AsU32();
    if (this.firstError === undefined && length > this.remaining()) {
      this.setError(
        new BcsError(`Byte array length ${length} exceeds the ${this.remaining()} bytes left`, BcsInvalidReason.SHORT_BUFFER),
      );
    }
    return this.firstError === undefined ? this.take(length) : new Uint8Array(0);
  }

  deserializeFixedBytes(len: number): Uint8Array {
    return this.take(len);
  }

  // UTF-8, length prefixed
  deserializeStr(): string {
    return new TextDecoder().decode(this.deserializeBytes());
  }

  deserializeBool(): boolean {
    const [byte] = this.take(1);
    if (byte > 1) {
      this.setError(new BcsError(`Invalid boolean value ${byte}`, BcsInvalidReason.INVALID_BOOL));
      return false;
    }
    return byte === 1;
  }

  deserializeU8(): Uint8 {
    return this.take(1)[0];
  }

  deserializeU16(): Uint16 {
    return Number(this.takeUint(2));
  }

  deserializeU32(): Uint32 {
    return Number(this.takeUint(4));
  }

  deserializeU64(): Uint64 {
    return this.takeUint(8);
  }

  deserializeU128(): Uint128 {
    return this.takeUint(16);
  }

  deserializeU256(): Uint256 {
    return this.takeUint(32);
  }

  // Signed integers are the two's complement of the unsigned read of the same width.
  deserializeI8(): Int8 {
    return Number(BigInt.asIntN(8, this.takeUint(1)));
  }

  deserializeI16(): Int16 {
    return Number(BigInt.asIntN(16, this.takeUint(2)));
  }

  deserializeI32(): Int32 {
    return Number(BigInt.asIntN(32, this.takeUint(4)));
  }

  deserializeI64(): Int64 {
    return BigInt.asIntN(64, this.takeUint(8));
  }

  deserializeI128(): Int128 {
    return BigInt.asIntN(128, this.takeUint(16));
  }

  deserializeI256(): Int256 {
    return BigInt.asIntN(256, this.takeUint(32));
  }

  private deserializeUleb128(max: bigint): bigint {
    let value = BigInt(0);
    for (let shift = 0; ; shift += 7) {
      if (shift > 63) {
        this.setError(new BcsError("uleb128 value does not fit in 64 bits", BcsInvalidReason.INVALID_ULEB128));
        return BigInt(0);
      }
      const byte = this.deserializeU8();
      if (this.firstError !== undefined) {
        return BigInt(0);
      }
      value |= BigInt(byte & 0x7f) << BigInt(shift);
      if ((byte & 0x80) === 0) {
        break;
      }
    }
    if (value > max) {
      this.setError(new BcsError(`Overflow while parsing uleb128-encoded value ${value}`, BcsInvalidReason.INVALID_ULEB128));
      return BigInt(0);
    }
    return value;
  }

  /**
   * The uleb128 used for sequence lengths and enum variant indices.
   */
  deserializeUleb128AsU32(): Uint32 {
    return Number(this.deserializeUleb128(BigInt(MAX_U32_NUMBER)));
  }

  deserializeUleb128AsU64(): Uint64 {
    return this.deserializeUleb128(MAX_U64_BIG_INT);
  }

  /**
   * `deserializer.deserialize(Cls)` is `Cls.deserialize(deserializer)`.
   */
  deserialize<T>(cls: Deserializable<T>): T {
    return cls.deserialize(this);
  }

  deserializeVector<T>(cls: Deserializable<T>): Array<T> {
    return this.deserializeVectorWith((deserializer) => cls.deserialize(deserializer));
  }

  /**
   * A uleb128 length and that many items read by `deserializeItem`. Stops at the first
   * recorded error.
   */
  deserializeVectorWith<T>(deserializeItem: (deserializer: Deserializer) => T): Array<T> {
    const length = this.deserializeUleb128AsU32();
    // each item is at least one byte
    if (this.firstError === undefined && length > this.remaining()) {
      this.setError(
        new BcsError(`Sequence length ${length} exceeds the ${this.remaining()} bytes left`, BcsInvalidReason.SHORT_BUFFER),
      );
    }
    const items: T[] = [];
    while (items.length < length && this.firstError === undefined) {
      items.push(deserializeItem(this));
    }
    return items;
  }

  // 0 for none, 1 and the value for some
  deserializeOption<T>(cls: Deserializable<T>): T | undefined {
    if (!this.deserializeBool() || this.firstError !== undefined) {
      return undefined;
    }
    return cls.deserialize(this);
  }
}

/**
 * Decodes exactly one `cls` from `bytes`: throws the first recorded error, and a
 * TRAILING_BYTES error when input is left over.
 */
export function deserializeFromBytes<T>(bytes: HexInput, cls: Deserializable<T>): T {
  const deserializer = Deserializer.fromHex(bytes);
  const value = cls.deserialize(deserializer);
  const error = deserializer.error();
  if (error !== undefined) {
    throw error;
  }
  const left = deserializer.remaining();
  if (left !== 0) {
    throw new BcsError(`${left} unexpected trailing bytes`, BcsInvalidReason.TRAILING_BYTES);
  }
  return value;
}
