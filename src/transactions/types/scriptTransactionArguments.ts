// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
import { BcsError, BcsInvalidReason, Serializer, Deserializer, Serializable } from "../../bcs";
import { AccountAddress } from "../../core";
import { AnyNumber, HexInput, ScriptTransactionArgumentVariants, Uint16, Uint32, Uint8 } from "../../types";
import { U8, U16, U32, U64, U128, U256, Bool } from "../../bcs/serializable/move-primitives";
import { MoveVector } from "../../bcs/serializable/move-structs";

/**
 * An argument to a Move script. Unlike entry function arguments these carry their
 * type on the wire: a uleb128 variant index, then the value.
 */
export abstract class ScriptTransactionArgument extends Serializable {
  abstract serialize(serializer: Serializer): void;

  static deserialize(deserializer: Deserializer): ScriptTransactionArgument {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case ScriptTransactionArgumentVariants.U8:
        return new ScriptTransactionArgumentU8(deserializer.deserializeU8());
      case ScriptTransactionArgumentVariants.U16:
        return new ScriptTransactionArgumentU16(deserializer.deserializeU16());
      case ScriptTransactionArgumentVariants.U32:
        return new ScriptTransactionArgumentU32(deserializer.deserializeU32());
      case ScriptTransactionArgumentVariants.U64:
        return new ScriptTransactionArgumentU64(deserializer.deserializeU64());
      case ScriptTransactionArgumentVariants.U128:
        return new ScriptTransactionArgumentU128(deserializer.deserializeU128());
      case ScriptTransactionArgumentVariants.U256:
        return new ScriptTransactionArgumentU256(deserializer.deserializeU256());
      case ScriptTransactionArgumentVariants.Address:
        return new ScriptTransactionArgumentAddress(AccountAddress.deserialize(deserializer));
      case ScriptTransactionArgumentVariants.U8Vector:
        return new ScriptTransactionArgumentU8Vector(deserializer.deserializeBytes());
      case ScriptTransactionArgumentVariants.Bool:
        return new ScriptTransactionArgumentBool(deserializer.deserializeBool());
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for ScriptTransactionArgument: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }

  /**
   * Wraps an already typed value. Only `vector<u8>` is accepted among vectors.
   */
  static fromMovePrimitive(
    arg: U8 | U16 | U32 | U64 | U128 | U256 | Bool | MoveVector<U8> | AccountAddress,
  ): ScriptTransactionArgument {
    if (arg instanceof MoveVector) {
      if (!arg.values.every((v) => v instanceof U8)) {
        throw new Error("Unsupported vector type");
      }
      return new ScriptTransactionArgumentU8Vector(arg.values.map((v) => v.value));
    }
    if (arg instanceof AccountAddress) {
      return new ScriptTransactionArgumentAddress(arg);
    }
    if (arg instanceof Bool) {
      return new ScriptTransactionArgumentBool(arg.value);
    }
    if (arg instanceof U8) {
      return new ScriptTransactionArgumentU8(arg.value);
    }
    if (arg instanceof U16) {
      return new ScriptTransactionArgumentU16(arg.value);
    }
    if (arg instanceof U32) {
      return new ScriptTransactionArgumentU32(arg.value);
    }
    if (arg instanceof U64) {
      return new ScriptTransactionArgumentU64(arg.value);
    }
    if (arg instanceof U128) {
      return new ScriptTransactionArgumentU128(arg.value);
    }
    return new ScriptTransactionArgumentU256(arg.value);
  }
}

// Variant index, then the wrapped value's own encoding.
abstract class TaggedScriptArgument<T extends Serializable> extends ScriptTransactionArgument {
  protected abstract readonly variant: ScriptTransactionArgumentVariants;

  constructor(public readonly value: T) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(this.variant);
    serializer.serialize(this.value);
  }
}

export class ScriptTransactionArgumentU8 extends TaggedScriptArgument<U8> {
  protected readonly variant = ScriptTransactionArgumentVariants.U8;

  constructor(value: Uint8) {
    super(new U8(value));
  }
}

export class ScriptTransactionArgumentU16 extends TaggedScriptArgument<U16> {
  protected readonly variant = ScriptTransactionArgumentVariants.U16;

  constructor(value: Uint16) {
    super(new U16(value));
  }
}

export class ScriptTransactionArgumentU32 extends TaggedScriptArgument<U32> {
  protected readonly variant = ScriptTransactionArgumentVariants.U32;

  constructor(value: Uint32) {
    super(new U32(value));
  }
}

export class ScriptTransactionArgumentU64 extends TaggedScriptArgument<U64> {
  protected readonly variant = ScriptTransactionArgumentVariants.U64;

  constructor(value: AnyNumber) {
    super(new U64(value));
  }
}

export class ScriptTransactionArgumentU128 extends TaggedScriptArgument<U128> {
  protected readonly variant = ScriptTransactionArgumentVariants.U128;

  constructor(value: AnyNumber) {
    super(new U128(value));
  }
}

export class ScriptTransactionArgumentU256 extends TaggedScriptArgument<U256> {
  protected readonly variant = ScriptTransactionArgumentVariants.U256;

  constructor(value: AnyNumber) {
    super(new U256(value));
  }
}

export class ScriptTransactionArgumentAddress extends TaggedScriptArgument<AccountAddress> {
  protected readonly variant = ScriptTransactionArgumentVariants.Address;
}

// Written like Move's `vector<u8>`: a uleb128 length and the bytes.
export class ScriptTransactionArgumentU8Vector extends TaggedScriptArgument<MoveVector<U8>> {
  protected readonly variant = ScriptTransactionArgumentVariants.U8Vector;

  constructor(values: Array<number> | HexInput) {
    super(MoveVector.U8(values));
  }
}

export class ScriptTransactionArgumentBool extends TaggedScriptArgument<Bool> {
  protected readonly variant = ScriptTransactionArgumentVariants.Bool;

  constructor(value: boolean) {
    super(new Bool(value));
  }
}
