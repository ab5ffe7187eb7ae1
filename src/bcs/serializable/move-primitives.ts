// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
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
} from "../consts";
import { AnyNumber, Int16, Int32, Int8, Uint16, Uint32, Uint8 } from "../../types";
import { Deserializer } from "../deserializer";
import { Serializable, Serializer, ensureBoolean, validateNumberInRange } from "../serializer";

// The wide integers keep a bigint whatever they were built from.
function bigIntInRange(value: AnyNumber, min: AnyNumber, max: AnyNumber): bigint {
  validateNumberInRange(value, min, max);
  return BigInt(value);
}

/**
 * Move primitives as `Serializable` values, for entry function arguments and
 * `MoveVector` / `MoveOption` elements. Constructors check the range.
 */
export class Bool extends Serializable {
  constructor(public readonly value: boolean) {
    super();
    ensureBoolean(value);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBool(this.value);
  }

  static deserialize(deserializer: Deserializer): Bool {
    return new Bool(deserializer.deserializeBool());
  }
}

export class U8 extends Serializable {
  constructor(public readonly value: Uint8) {
    super();
    validateNumberInRange(value, 0, MAX_U8_NUMBER);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU8(this.value);
  }

  static deserialize(deserializer: Deserializer): U8 {
    return new U8(deserializer.deserializeU8());
  }
}

export class U16 extends Serializable {
  constructor(public readonly value: Uint16) {
    super();
    validateNumberInRange(value, 0, MAX_U16_NUMBER);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU16(this.value);
  }

  static deserialize(deserializer: Deserializer): U16 {
    return new U16(deserializer.deserializeU16());
  }
}

export class U32 extends Serializable {
  constructor(public readonly value: Uint32) {
    super();
    validateNumberInRange(value, 0, MAX_U32_NUMBER);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32(this.value);
  }

  static deserialize(deserializer: Deserializer): U32 {
    return new U32(deserializer.deserializeU32());
  }
}

export class U64 extends Serializable {
  public readonly value: bigint;

  constructor(value: AnyNumber) {
    super();
    this.value = bigIntInRange(value, BigInt(0), MAX_U64_BIG_INT);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU64(this.value);
  }

  static deserialize(deserializer: Deserializer): U64 {
    return new U64(deserializer.deserializeU64());
  }
}

export class U128 extends Serializable {
  public readonly value: bigint;

  constructor(value: AnyNumber) {
    super();
    this.value = bigIntInRange(value, BigInt(0), MAX_U128_BIG_INT);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU128(this.value);
  }

  static deserialize(deserializer: Deserializer): U128 {
    return new U128(deserializer.deserializeU128());
  }
}

export class U256 extends Serializable {
  public readonly value: bigint;

  constructor(value: AnyNumber) {
    super();
    this.value = bigIntInRange(value, BigInt(0), MAX_U256_BIG_INT);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU256(this.value);
  }

  static deserialize(deserializer: Deserializer): U256 {
    return new U256(deserializer.deserializeU256());
  }
}

export class I8 extends Serializable {
  constructor(public readonly value: Int8) {
    super();
    validateNumberInRange(value, MIN_I8_NUMBER, MAX_I8_NUMBER);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeI8(this.value);
  }

  static deserialize(deserializer: Deserializer): I8 {
    return new I8(deserializer.deserializeI8());
  }
}

export class I16 extends Serializable {
  constructor(public readonly value: Int16) {
    super();
    validateNumberInRange(value, MIN_I16_NUMBER, MAX_I16_NUMBER);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeI16(this.value);
  }

  static deserialize(deserializer: Deserializer): I16 {
    return new I16(deserializer.deserializeI16());
  }
}

export class I32 extends Serializable {
  constructor(public readonly value: Int32) {
    super();
    validateNumberInRange(value, MIN_I32_NUMBER, MAX_I32_NUMBER);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeI32(this.value);
  }

  static deserialize(deserializer: Deserializer): I32 {
    return new I32(deserializer.deserializeI32());
  }
}

export class I64 extends Serializable {
  public readonly value: bigint;

  constructor(value: AnyNumber) {
    super();
    this.value = bigIntInRange(value, MIN_I64_BIG_INT, MAX_I64_BIG_INT);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeI64(this.value);
  }

  static deserialize(deserializer: Deserializer): I64 {
    return new I64(deserializer.deserializeI64());
  }
}

export class I128 extends Serializable {
  public readonly value: bigint;

  constructor(value: AnyNumber) {
    super();
    this.value = bigIntInRange(value, MIN_I128_BIG_INT, MAX_I128_BIG_INT);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeI128(this.value);
  }

  static deserialize(deserializer: Deserializer): I128 {
    return new I128(deserializer.deserializeI128());
  }
}

export class I256 extends Serializable {
  public readonly value: bigint;

  constructor(value: AnyNumber) {
    super();
    this.value = bigIntInRange(value, MIN_I256_BIG_INT, MAX_I256_BIG_INT);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeI256(this.value);
  }

  static deserialize(deserializer: Deserializer): I256 {
    return new I256(deserializer.deserializeI256());
  }
}
