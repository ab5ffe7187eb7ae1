// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import {
  Deserializer,
  MAX_I128_BIG_INT,
  MAX_I16_NUMBER,
  MAX_I256_BIG_INT,
  MAX_I32_NUMBER,
  MAX_I64_BIG_INT,
  MAX_I8_NUMBER,
  MAX_U128_BIG_INT,
  MAX_U16_NUMBER,
  MAX_U256_BIG_INT,
  MAX_U32_NUMBER,
  MAX_U64_BIG_INT,
  MAX_U8_NUMBER,
  MIN_I128_BIG_INT,
  MIN_I16_NUMBER,
  MIN_I256_BIG_INT,
  MIN_I32_NUMBER,
  MIN_I64_BIG_INT,
  MIN_I8_NUMBER,
  Serializable,
  Serialized,
  Serializer,
} from "../../bcs";
import { AccountAddress, Hex, ParsingError, errorMessage } from "../../core";
import {
  ScriptTransactionArgument,
  ScriptTransactionArgumentAddress,
  ScriptTransactionArgumentBool,
  ScriptTransactionArgumentU128,
  ScriptTransactionArgumentU16,
  ScriptTransactionArgumentU256,
  ScriptTransactionArgumentU32,
  ScriptTransactionArgumentU64,
  ScriptTransactionArgumentU8,
  ScriptTransactionArgumentU8Vector,
} from "../types/scriptTransactionArguments";
import {
  TypeTag,
  TypeTagAddress,
  TypeTagBool,
  TypeTagGeneric,
  TypeTagI128,
  TypeTagI16,
  TypeTagI256,
  TypeTagI32,
  TypeTagI64,
  TypeTagI8,
  TypeTagReference,
  TypeTagSigner,
  TypeTagStruct,
  TypeTagU128,
  TypeTagU16,
  TypeTagU256,
  TypeTagU32,
  TypeTagU64,
  TypeTagU8,
  TypeTagVector,
} from "../types/typeTag";
import { ConvertArgOptions, MoveArgumentValue } from "./types";

export enum ArgumentInvalidReason {
  OUT_OF_RANGE = "out_of_range",
  NULL_VALUE = "null_value",
  WRONG_TYPE = "wrong_type",
  GENERIC_OUT_OF_BOUNDS = "generic_out_of_bounds",
  UNSUPPORTED_TYPE = "unsupported_type",
  ARITY_MISMATCH = "arity_mismatch",
  INVALID_OPTION = "invalid_option",
}

export class ArgumentInvalidError extends ParsingError<ArgumentInvalidReason> {
  constructor(message: string, invalidReason: ArgumentInvalidReason) {
    super(message, invalidReason);
    this.name = "ArgumentInvalidError";
  }
}

type IntegerKind = {
  min: bigint;
  max: bigint;
  write: (serializer: Serializer, value: bigint) => void;
  read: (deserializer: Deserializer) => bigint;
};

function integerKind(typeTag: TypeTag): IntegerKind | undefined {
  if (typeTag instanceof TypeTagU8) {
    return {
      min: 0n,
      max: BigInt(MAX_U8_NUMBER),
      write: (s, v) => s.serializeU8(Number(v)),
      read: (d) => BigInt(d.deserializeU8()),
    };
  }
  if (typeTag instanceof TypeTagU16) {
    return {
      min: 0n,
      max: BigInt(MAX_U16_NUMBER),
      write: (s, v) => s.serializeU16(Number(v)),
      read: (d) => BigInt(d.deserializeU16()),
    };
  }
  if (typeTag instanceof TypeTagU32) {
    return {
      min: 0n,
      max: BigInt(MAX_U32_NUMBER),
      write: (s, v) => s.serializeU32(Number(v)),
      read: (d) => BigInt(d.deserializeU32()),
    };
  }
  if (typeTag instanceof TypeTagU64) {
    return { min: 0n, max: MAX_U64_BIG_INT, write: (s, v) => s.serializeU64(v), read: (d) => d.deserializeU64() };
  }
  if (typeTag instanceof TypeTagU128) {
    return { min: 0n, max: MAX_U128_BIG_INT, write: (s, v) => s.serializeU128(v), read: (d) => d.deserializeU128() };
  }
  if (typeTag instanceof TypeTagU256) {
    return { min: 0n, max: MAX_U256_BIG_INT, write: (s, v) => s.serializeU256(v), read: (d) => d.deserializeU256() };
  }
  if (typeTag instanceof TypeTagI8) {
    return {
      min: BigInt(MIN_I8_NUMBER),
      max: BigInt(MAX_I8_NUMBER),
      write: (s, v) => s.serializeI8(Number(v)),
      read: (d) => BigInt(d.deserializeI8()),
    };
  }
  if (typeTag instanceof TypeTagI16) {
    return {
      min: BigInt(MIN_I16_NUMBER),
      max: BigInt(MAX_I16_NUMBER),
      write: (s, v) => s.serializeI16(Number(v)),
      read: (d) => BigInt(d.deserializeI16()),
    };
  }
  if (typeTag instanceof TypeTagI32) {
    return {
      min: BigInt(MIN_I32_NUMBER),
      max: BigInt(MAX_I32_NUMBER),
      write: (s, v) => s.serializeI32(Number(v)),
      read: (d) => BigInt(d.deserializeI32()),
    };
  }
  if (typeTag instanceof TypeTagI64) {
    return {
      min: MIN_I64_BIG_INT,
      max: MAX_I64_BIG_INT,
      write: (s, v) => s.serializeI64(v),
      read: (d) => d.deserializeI64(),
    };
  }
  if (typeTag instanceof TypeTagI128) {
    return {
      min: MIN_I128_BIG_INT,
      max: MAX_I128_BIG_INT,
      write: (s, v) => s.serializeI128(v),
      read: (d) => d.deserializeI128(),
    };
  }
  if (typeTag instanceof TypeTagI256) {
    return {
      min: MIN_I256_BIG_INT,
      max: MAX_I256_BIG_INT,
      write: (s, v) => s.serializeI256(v),
      read: (d) => d.deserializeI256(),
    };
  }
  return undefined;
}

const DECIMAL_REGEX = /^-?[0-9]+$/;

function wrongType(value: MoveArgumentValue, typeTag: TypeTag): ArgumentInvalidError {
  const shown = typeof value === "string" ? `'${value}'` : typeof value;
  return new ArgumentInvalidError(
    `Cannot convert ${shown} to ${typeTag.toString()}`,
    ArgumentInvalidReason.WRONG_TYPE,
  );
}

function nullValue(typeTag: TypeTag): ArgumentInvalidError {
  return new ArgumentInvalidError(`Missing value for ${typeTag.toString()}`, ArgumentInvalidReason.NULL_VALUE);
}

function toInteger(value: MoveArgumentValue, typeTag: TypeTag, kind: IntegerKind): bigint {
  let result: bigint;
  if (typeof value === "bigint") {
    result = value;
  } else if (typeof value === "number") {
    if (!Number.isInteger(value)) {
      throw wrongType(value, typeTag);
    }
    result = BigInt(value);
  } else if (typeof value === "string" && DECIMAL_REGEX.test(value)) {
    result = BigInt(value);
  } else if (value === null || value === undefined) {
    throw nullValue(typeTag);
  } else {
    throw wrongType(value, typeTag);
  }

  if (result < kind.min || result > kind.max) {
    throw new ArgumentInvalidError(
      `${result} is out of range for ${typeTag.toString()} [${kind.min}, ${kind.max}]`,
      ArgumentInvalidReason.OUT_OF_RANGE,
    );
  }
  return result;
}

function toBool(value: MoveArgumentValue, typeTag: TypeTag): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  if (value === null || value === undefined) {
    throw nullValue(typeTag);
  }
  throw wrongType(value, typeTag);
}

function toAddress(value: MoveArgumentValue, typeTag: TypeTag): AccountAddress {
  if (value instanceof AccountAddress) {
    return value;
  }
  if (typeof value === "string") {
    try {
      return AccountAddress.fromStringRelaxed({ input: value });
    } catch (e) {
      throw new ArgumentInvalidError(
        `Cannot convert '${value}' to ${typeTag.toString()}: ${errorMessage(e)}`,
        ArgumentInvalidReason.WRONG_TYPE,
      );
    }
  }
  if (value === null || value === undefined) {
    throw nullValue(typeTag);
  }
  throw wrongType(value, typeTag);
}

function isArgumentArray(value: MoveArgumentValue): value is ReadonlyArray<MoveArgumentValue> {
  return Array.isArray(value);
}

/**
 * Resolves `T<i>` against the call's type arguments and strips references.
 */
function resolveTypeTag(typeTag: TypeTag, generics: ReadonlyArray<TypeTag>): TypeTag {
  if (typeTag instanceof TypeTagReference) {
    return resolveTypeTag(typeTag.value, generics);
  }
  if (typeTag instanceof TypeTagGeneric) {
    const resolved = generics[typeTag.value];
    if (resolved === undefined) {
      throw new ArgumentInvalidError(
        `Generic type parameter T${typeTag.value} out of bounds, ${generics.length} type arguments given`,
        ArgumentInvalidReason.GENERIC_OUT_OF_BOUNDS,
      );
    }
    return resolveTypeTag(resolved, generics);
  }
  return typeTag;
}

/**
 * Writes `value` into `serializer` as a Move value of type `typeTag`.
 *
 * @throws ArgumentInvalidError when the value does not fit the type
 */
export function serializeArg(
  value: MoveArgumentValue,
  typeTag: TypeTag,
  serializer: Serializer,
  options: ConvertArgOptions = {},
): void {
  if (value instanceof Serialized) {
    serializer.serializeFixedBytes(value.value);
    return;
  }
  if (value instanceof Serializable) {
    serializer.serialize(value);
    return;
  }

  const generics = options.generics ?? [];
  const resolved = resolveTypeTag(typeTag, generics);

  if (resolved instanceof TypeTagStruct && resolved.isOption()) {
    serializeOptionArg(value, resolved, serializer, options);
    return;
  }

  const kind = integerKind(resolved);
  if (kind !== undefined) {
    kind.write(serializer, toInteger(value, resolved, kind));
    return;
  }
  if (resolved instanceof TypeTagBool) {
    serializer.serializeBool(toBool(value, resolved));
    return;
  }
  if (resolved instanceof TypeTagAddress || resolved instanceof TypeTagSigner) {
    serializer.serialize(toAddress(value, resolved));
    return;
  }
  if (resolved instanceof TypeTagVector) {
    serializeVectorArg(value, resolved, serializer, options);
    return;
  }
  if (resolved instanceof TypeTagStruct) {
    if (resolved.isString()) {
      if (typeof value === "string") {
        serializer.serializeStr(value);
        return;
      }
      if (value === null || value === undefined) {
        throw nullValue(resolved);
      }
      throw wrongType(value, resolved);
    }
    if (resolved.isObject()) {
      serializer.serialize(toAddress(value, resolved));
      return;
    }
  }
  throw new ArgumentInvalidError(
    `Unsupported argument type ${resolved.toString()}`,
    ArgumentInvalidReason.UNSUPPORTED_TYPE,
  );
}

function serializeVectorArg(
  value: MoveArgumentValue,
  typeTag: TypeTagVector,
  serializer: Serializer,
  options: ConvertArgOptions,
): void {
  const inner = resolveTypeTag(typeTag.value, options.generics ?? []);
  if (inner instanceof TypeTagU8) {
    if (value instanceof Uint8Array) {
      serializer.serializeBytes(value);
      return;
    }
    if (typeof value === "string") {
      serializer.serializeBytes(new TextEncoder().encode(value));
      return;
    }
  }
  if (value === null || value === undefined) {
    throw nullValue(typeTag);
  }
  if (!isArgumentArray(value)) {
    throw wrongType(value, typeTag);
  }
  serializer.serializeU32AsUleb128(value.length);
  value.forEach((item) => serializeArg(item, inner, serializer, options));
}

function serializeOptionArg(
  value: MoveArgumentValue,
  typeTag: TypeTagStruct,
  serializer: Serializer,
  options: ConvertArgOptions,
): void {
  const typeArgs = typeTag.value.typeArgs;
  if (typeArgs.length !== 1) {
    throw new ArgumentInvalidError(
      `Option must have exactly one type argument, got ${typeArgs.length}`,
      ArgumentInvalidReason.INVALID_OPTION,
    );
  }
  const [inner] = typeArgs;

  if (value === null || value === undefined) {
    serializer.serializeU32AsUleb128(0);
    return;
  }
  if (options.compatibilityMode && typeof value === "string") {
    reencodeSerializedOption(value, inner, serializer, options.generics ?? []);
    return;
  }
  serializer.serializeU32AsUleb128(1);
  serializeArg(value, inner, serializer, options);
}

/**
 * Compatibility mode: `value` is the hex of an Option's BCS. It is decoded against the
 * inner type and written again, so a malformed encoding is caught here rather than on chain.
 */
function reencodeSerializedOption(
  value: string,
  inner: TypeTag,
  serializer: Serializer,
  generics: ReadonlyArray<TypeTag>,
): void {
  let bytes: Uint8Array;
  try {
    bytes = Hex.fromHexInput({ hexInput: value }).toUint8Array();
  } catch (e) {
    throw new ArgumentInvalidError(
      `Invalid serialized option '${value}': ${errorMessage(e)}`,
      ArgumentInvalidReason.INVALID_OPTION,
    );
  }

  const deserializer = new Deserializer(bytes);
  const out = new Serializer();
  reencodeOption(inner, deserializer, out, generics);

  const error = deserializer.error();
  if (error !== undefined) {
    throw new ArgumentInvalidError(
      `Invalid serialized option '${value}': ${error.message}`,
      ArgumentInvalidReason.INVALID_OPTION,
    );
  }
  if (deserializer.remaining() !== 0) {
    throw new ArgumentInvalidError(
      `Invalid serialized option '${value}': ${deserializer.remaining()} trailing bytes`,
      ArgumentInvalidReason.INVALID_OPTION,
    );
  }
  serializer.serializeFixedBytes(out.toUint8Array());
}

function reencodeOption(
  inner: TypeTag,
  deserializer: Deserializer,
  serializer: Serializer,
  generics: ReadonlyArray<TypeTag>,
): void {
  const length = deserializer.deserializeUleb128AsU32();
  if (length > 1) {
    throw new ArgumentInvalidError(`Option holds at most one value, got ${length}`, ArgumentInvalidReason.INVALID_OPTION);
  }
  serializer.serializeU32AsUleb128(length);
  if (length === 1) {
    reencodeValue(inner, deserializer, serializer, generics);
  }
}

function reencodeValue(
  typeTag: TypeTag,
  deserializer: Deserializer,
  serializer: Serializer,
  generics: ReadonlyArray<TypeTag>,
): void {
  const resolved = resolveTypeTag(typeTag, generics);

  const kind = integerKind(resolved);
  if (kind !== undefined) {
    kind.write(serializer, kind.read(deserializer));
    return;
  }
  if (resolved instanceof TypeTagBool) {
    serializer.serializeBool(deserializer.deserializeBool());
    return;
  }
  if (resolved instanceof TypeTagAddress) {
    serializer.serializeFixedBytes(deserializer.deserializeFixedBytes(AccountAddress.LENGTH));
    return;
  }
  if (resolved instanceof TypeTagVector) {
    const length = deserializer.deserializeUleb128AsU32();
    serializer.serializeU32AsUleb128(length);
    for (let i = 0; i < length && deserializer.error() === undefined; i += 1) {
      reencodeValue(resolved.value, deserializer, serializer, generics);
    }
    return;
  }
  if (resolved instanceof TypeTagStruct) {
    if (resolved.isString()) {
      serializer.serializeBytes(deserializer.deserializeBytes());
      return;
    }
    if (resolved.isObject()) {
      serializer.serializeFixedBytes(deserializer.deserializeFixedBytes(AccountAddress.LENGTH));
      return;
    }
    if (resolved.isOption() && resolved.value.typeArgs.length === 1) {
      reencodeOption(resolved.value.typeArgs[0], deserializer, serializer, generics);
      return;
    }
  }
  throw new ArgumentInvalidError(
    `Unsupported type ${resolved.toString()} in a serialized option`,
    ArgumentInvalidReason.UNSUPPORTED_TYPE,
  );
}

/**
 * BCS bytes of `value` as a Move value of type `typeTag`.
 */
export function convertArg(value: MoveArgumentValue, typeTag: TypeTag, options: ConvertArgOptions = {}): Uint8Array {
  const serializer = new Serializer();
  serializeArg(value, typeTag, serializer, options);
  return serializer.toUint8Array();
}

/**
 * Converts each value against the type at the same position.
 */
export function convertArgs(
  values: ReadonlyArray<MoveArgumentValue>,
  typeTags: ReadonlyArray<TypeTag>,
  options: ConvertArgOptions = {},
): Array<Uint8Array> {
  if (values.length !== typeTags.length) {
    throw new ArgumentInvalidError(
      `Expected ${typeTags.length} arguments, got ${values.length}`,
      ArgumentInvalidReason.ARITY_MISMATCH,
    );
  }
  return values.map((value, i) => convertArg(value, typeTags[i], options));
}

/**
 * Script arguments carry their own type on the wire, so only the types a script
 * argument can hold are accepted.
 */
export function argToScriptArgument(value: MoveArgumentValue, typeTag: TypeTag): ScriptTransactionArgument {
  if (value instanceof ScriptTransactionArgument) {
    return value;
  }
  const kind = integerKind(typeTag);
  if (kind !== undefined) {
    const integer = toInteger(value, typeTag, kind);
    if (typeTag instanceof TypeTagU8) {
      return new ScriptTransactionArgumentU8(Number(integer));
    }
    if (typeTag instanceof TypeTagU16) {
      return new ScriptTransactionArgumentU16(Number(integer));
    }
    if (typeTag instanceof TypeTagU32) {
      return new ScriptTransactionArgumentU32(Number(integer));
    }
    if (typeTag instanceof TypeTagU64) {
      return new ScriptTransactionArgumentU64(integer);
    }
    if (typeTag instanceof TypeTagU128) {
      return new ScriptTransactionArgumentU128(integer);
    }
    if (typeTag instanceof TypeTagU256) {
      return new ScriptTransactionArgumentU256(integer);
    }
  }
  if (typeTag instanceof TypeTagBool) {
    return new ScriptTransactionArgumentBool(toBool(value, typeTag));
  }
  if (typeTag instanceof TypeTagAddress) {
    return new ScriptTransactionArgumentAddress(toAddress(value, typeTag));
  }
  if (typeTag instanceof TypeTagVector && typeTag.value instanceof TypeTagU8) {
    // Same encoding as the entry function path, minus the length prefix.
    const serializer = new Serializer();
    serializeVectorArg(value, typeTag, serializer, {});
    const deserializer = new Deserializer(serializer.toUint8Array());
    return new ScriptTransactionArgumentU8Vector(deserializer.deserializeBytes());
  }
  throw new ArgumentInvalidError(
    `Type ${typeTag.toString()} cannot be a script argument`,
    ArgumentInvalidReason.UNSUPPORTED_TYPE,
  );
}
