// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
import { AccountAddress } from "../../core";
import { BcsError, BcsInvalidReason, Deserializer, Serializable, Serializer } from "../../bcs";
import { Identifier } from "./identifier";
import { TypeTagVariants } from "../../types";
import { parseTypeTag } from "./typeTagParser";

/**
 * A Move type. The BCS form is the uleb128 variant index followed by the variant's
 * payload, if it has one.
 */
export abstract class TypeTag extends Serializable {
  abstract serialize(serializer: Serializer): void;

  /**
   * The type in Move syntax, e.g. `vector<u8>` or `0x1::option::Option<u64>`.
   */
  abstract toString(): string;

  static deserialize(deserializer: Deserializer): TypeTag {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case TypeTagVariants.Vector:
        return new TypeTagVector(TypeTag.deserialize(deserializer));
      case TypeTagVariants.Struct:
        return new TypeTagStruct(StructTag.deserialize(deserializer));
      case TypeTagVariants.Reference:
        return new TypeTagReference(TypeTag.deserialize(deserializer));
      case TypeTagVariants.Generic:
        return new TypeTagGeneric(deserializer.deserializeU32());
      default: {
        const primitive = primitiveTypeTag(index);
        if (primitive === undefined) {
          throw deserializer.fail(
            new BcsError(`Unknown variant index for TypeTag: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
          );
        }
        return primitive;
      }
    }
  }
}

/**
 * Types with no payload: the integers, bool, address and signer.
 */
abstract class PrimitiveTypeTag extends TypeTag {
  protected abstract readonly variant: TypeTagVariants;

  protected abstract readonly moveName: string;

  toString(): string {
    return this.moveName;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(this.variant);
  }
}

export class TypeTagBool extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.Bool;

  protected readonly moveName = "bool";
}

export class TypeTagU8 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.U8;

  protected readonly moveName = "u8";
}

export class TypeTagU16 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.U16;

  protected readonly moveName = "u16";
}

export class TypeTagU32 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.U32;

  protected readonly moveName = "u32";
}

export class TypeTagU64 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.U64;

  protected readonly moveName = "u64";
}

export class TypeTagU128 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.U128;

  protected readonly moveName = "u128";
}

export class TypeTagU256 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.U256;

  protected readonly moveName = "u256";
}

export class TypeTagI8 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.I8;

  protected readonly moveName = "i8";
}

export class TypeTagI16 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.I16;

  protected readonly moveName = "i16";
}

export class TypeTagI32 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.I32;

  protected readonly moveName = "i32";
}

export class TypeTagI64 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.I64;

  protected readonly moveName = "i64";
}

export class TypeTagI128 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.I128;

  protected readonly moveName = "i128";
}

export class TypeTagI256 extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.I256;

  protected readonly moveName = "i256";
}

export class TypeTagAddress extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.Address;

  protected readonly moveName = "address";
}

export class TypeTagSigner extends PrimitiveTypeTag {
  protected readonly variant = TypeTagVariants.Signer;

  protected readonly moveName = "signer";
}

function primitiveTypeTag(index: number): TypeTag | undefined {
  switch (index) {
    case TypeTagVariants.Bool:
      return new TypeTagBool();
    case TypeTagVariants.U8:
      return new TypeTagU8();
    case TypeTagVariants.U16:
      return new TypeTagU16();
    case TypeTagVariants.U32:
      return new TypeTagU32();
    case TypeTagVariants.U64:
      return new TypeTagU64();
    case TypeTagVariants.U128:
      return new TypeTagU128();
    case TypeTagVariants.U256:
      return new TypeTagU256();
    case TypeTagVariants.I8:
      return new TypeTagI8();
    case TypeTagVariants.I16:
      return new TypeTagI16();
    case TypeTagVariants.I32:
      return new TypeTagI32();
    case TypeTagVariants.I64:
      return new TypeTagI64();
    case TypeTagVariants.I128:
      return new TypeTagI128();
    case TypeTagVariants.I256:
      return new TypeTagI256();
    case TypeTagVariants.Address:
      return new TypeTagAddress();
    case TypeTagVariants.Signer:
      return new TypeTagSigner();
    default:
      return undefined;
  }
}

// `&T`, only seen in function signatures such as `&signer`
export class TypeTagReference extends TypeTag {
  constructor(public readonly value: TypeTag) {
    super();
  }

  toString(): string {
    return `&${this.value}`;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TypeTagVariants.Reference);
    serializer.serialize(this.value);
  }
}

/**
 * Type parameter `T<index>` of a function signature. It stands for the call's
 * type argument at that index.
 */
export class TypeTagGeneric extends TypeTag {
  constructor(public readonly value: number) {
    super();
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Generic type parameter index must be a non-negative integer, got ${value}`);
    }
  }

  toString(): string {
    return `T${this.value}`;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TypeTagVariants.Generic);
    serializer.serializeU32(this.value);
  }
}

export class TypeTagVector extends TypeTag {
  constructor(public readonly value: TypeTag) {
    super();
  }

  static u8(): TypeTagVector {
    return new TypeTagVector(new TypeTagU8());
  }

  toString(): string {
    return `vector<${this.value}>`;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TypeTagVariants.Vector);
    serializer.serialize(this.value);
  }
}

export class TypeTagStruct extends TypeTag {
  constructor(public readonly value: StructTag) {
    super();
  }

  toString(): string {
    return this.value.toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TypeTagVariants.Struct);
    serializer.serialize(this.value);
  }

  /**
   * Whether this is `<address>::<moduleName>::<structName>`, with any type arguments.
   */
  is(address: AccountAddress, moduleName: string, structName: string): boolean {
    const { value } = this;
    return value.address.equals(address) && value.moduleName.identifier === moduleName && value.name.identifier === structName;
  }

  isString(): boolean {
    return this.is(AccountAddress.ONE, "string", "String");
  }

  isOption(): boolean {
    return this.is(AccountAddress.ONE, "option", "Option");
  }

  isObject(): boolean {
    return this.is(AccountAddress.ONE, "object", "Object");
  }
}

export class StructTag extends Serializable {
  constructor(
    public readonly address: AccountAddress,
    public readonly moduleName: Identifier,
    public readonly name: Identifier,
    public readonly typeArgs: Array<TypeTag>,
  ) {
    super();
  }

  /**
   * Parses a struct type such as `0x1::coin::Coin<0x1::aptos_coin::AptosCoin>`.
   *
   * @throws TypeTagParserError when the string is not a type, Error when it is not a struct
   */
  static fromString(structTag: string): StructTag {
    const typeTag = parseTypeTag(structTag, { allowGenerics: false });
    if (!(typeTag instanceof TypeTagStruct)) {
      throw new Error(`'${structTag}' is not a struct type`);
    }
    return typeTag.value;
  }

  // special addresses print short, e.g. 0x1::string::String
  toString(): string {
    const path = [this.address.toString(), this.moduleName.identifier, this.name.identifier].join("::");
    return this.typeArgs.length === 0 ? path : `${path}<${this.typeArgs.join(", ")}>`;
  }

  serialize(serializer: Serializer): void {
    serializer.serialize(this.address);
    serializer.serialize(this.moduleName);
    serializer.serialize(this.name);
    serializer.serializeVector(this.typeArgs);
  }

  static deserialize(deserializer: Deserializer): StructTag {
    return new StructTag(
      AccountAddress.deserialize(deserializer),
      Identifier.deserialize(deserializer),
      Identifier.deserialize(deserializer),
      deserializer.deserializeVector(TypeTag),
    );
  }
}
