// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Serializable, Serializer } from "../serializer";
import { BcsError, BcsInvalidReason, Deserializable, Deserializer } from "../deserializer";
import { Bool, U128, U16, U256, U32, U64, U8 } from "./move-primitives";
import { AnyNumber, HexInput } from "../../types";
import { Hex } from "../../core/hex";

/**
 * A Move `vector<T>` whose elements are themselves `Serializable`.
 *
 * @example
 * // vector<u8> [1, 2, 3, 4]
 * const bytes = MoveVector.U8([1, 2, 3, 4]).bcsToBytes(); // [4, 1, 2, 3, 4]
 *
 * // vector<String> ["hello", "world"]
 * const strings = MoveVector.MoveString(["hello", "world"]);
 */
export class MoveVector<T extends Serializable> extends Serializable {
  public values: Array<T>;

  constructor(values: Array<T>) {
    super();
    this.values = values;
  }

  /**
   * A `vector<u8>` from a list of numbers, raw bytes or a hex string.
   */
  static U8(values: Array<number> | HexInput): MoveVector<U8> {
    const numbers = Array.isArray(values) ? values : Array.from(Hex.fromHexInput({ hexInput: values }).toUint8Array());
    return new MoveVector<U8>(numbers.map((v) => new U8(v)));
  }

  static U16(values: Array<number>): MoveVector<U16> {
    return new MoveVector<U16>(values.map((v) => new U16(v)));
  }

  static U32(values: Array<number>): MoveVector<U32> {
    return new MoveVector<U32>(values.map((v) => new U32(v)));
  }

  static U64(values: Array<AnyNumber>): MoveVector<U64> {
    return new MoveVector<U64>(values.map((v) => new U64(v)));
  }

  static U128(values: Array<AnyNumber>): MoveVector<U128> {
    return new MoveVector<U128>(values.map((v) => new U128(v)));
  }

  static U256(values: Array<AnyNumber>): MoveVector<U256> {
    return new MoveVector<U256>(values.map((v) => new U256(v)));
  }

  static Bool(values: Array<boolean>): MoveVector<Bool> {
    return new MoveVector<Bool>(values.map((v) => new Bool(v)));
  }

  static MoveString(values: Array<string>): MoveVector<MoveString> {
    return new MoveVector<MoveString>(values.map((v) => new MoveString(v)));
  }

  serialize(serializer: Serializer): void {
    serializer.serializeVector(this.values);
  }

  /**
   * Reads a vector of `cls` values. Only one level deep: the element type is fixed by `cls`.
   *
   * @example
   * const vec = MoveVector.deserialize(deserializer, U64);
   */
  static deserialize<T extends Serializable>(deserializer: Deserializer, cls: Deserializable<T>): MoveVector<T> {
    return new MoveVector(deserializer.deserializeVector(cls));
  }
}

/**
 * `0x1::string::String`: the UTF-8 bytes, length prefixed.
 */
export class MoveString extends Serializable {
  public value: string;

  constructor(value: string) {
    super();
    this.value = value;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeStr(this.value);
  }

  static deserialize(deserializer: Deserializer): MoveString {
    return new MoveString(deserializer.deserializeStr());
  }
}

/**
 * `0x1::option::Option<T>`, which on the wire is a vector holding zero or one value.
 */
export class MoveOption<T extends Serializable> extends Serializable {
  public readonly value?: T;

  constructor(value?: T | null) {
    super();
    this.value = value ?? undefined;
  }

  /**
   * The inner value. Throws on a none.
   */
  unwrap(): T {
    if (this.value === undefined) {
      throw new Error("Called unwrap on a MoveOption with no value");
    }
    return this.value;
  }

  isSome(): boolean {
    return this.value !== undefined;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeVector(this.value === undefined ? [] : [this.value]);
  }

  static U8(value?: number | null): MoveOption<U8> {
    return new MoveOption<U8>(value !== null && value !== undefined ? new U8(value) : undefined);
  }

  static U64(value?: AnyNumber | null): MoveOption<U64> {
    return new MoveOption<U64>(value !== null && value !== undefined ? new U64(value) : undefined);
  }

  static Bool(value?: boolean | null): MoveOption<Bool> {
    return new MoveOption<Bool>(value !== null && value !== undefined ? new Bool(value) : undefined);
  }

  static MoveString(value?: string | null): MoveOption<MoveString> {
    return new MoveOption<MoveString>(value !== null && value !== undefined ? new MoveString(value) : undefined);
  }

  static deserialize<U extends Serializable>(deserializer: Deserializer, cls: Deserializable<U>): MoveOption<U> {
    const length = deserializer.deserializeUleb128AsU32();
    if (length > 1) {
      throw deserializer.fail(
        new BcsError(`Option vector has ${length} elements, expected 0 or 1`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    return new MoveOption(length === 1 ? cls.deserialize(deserializer) : undefined);
  }
}

/**
 * Bytes that are already BCS encoded. Inside an entry function argument list they are
 * written as-is; on their own they serialize as a byte vector.
 */
export class Serialized extends Serializable {
  public readonly value: Uint8Array;

  constructor(value: HexInput) {
    super();
    this.value = Hex.fromHexInput({ hexInput: value }).toUint8Array();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.value);
  }

  static deserialize(deserializer: Deserializer): Serialized {
    return new Serialized(deserializer.deserializeBytes());
  }
}
