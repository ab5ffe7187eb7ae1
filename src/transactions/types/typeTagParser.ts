// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../../core";
import { ParsingError } from "../../core/common";
import { Identifier } from "./identifier";
import {
  StructTag,
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
} from "./typeTag";

export enum TypeTagParserErrorType {
  InvalidTypeTag = "unknown type",
  UnexpectedEnd = "unexpected end of input",
  UnexpectedTypeArgumentClose = "unexpected '>'",
  UnexpectedComma = "unexpected ','",
  MissingTypeArgumentClose = "missing '>'",
  TypeArgumentCountMismatch = "type argument list is empty",
  UnexpectedPrimitiveTypeArguments = "primitive types cannot have type arguments",
  UnexpectedVectorTypeArgumentCount = "vector takes exactly one type argument",
  UnexpectedStructFormat = "struct types have the form address::module::name",
  InvalidAddress = "struct address is not a valid address",
  UnexpectedGenericType = "generic types are not allowed here",
  TrailingTokens = "unexpected input after the type",
}

export class TypeTagParserError extends ParsingError<TypeTagParserErrorType> {
  constructor(typeTagStr: string, invalidReason: TypeTagParserErrorType) {
    super(`Failed to parse typeTag '${typeTagStr}': ${invalidReason}`, invalidReason);
    this.name = "TypeTagParserError";
  }
}

type TokenType = "IDENT" | "COLON" | "LT" | "GT" | "COMMA" | "AMP";

/**
 * A Token is two strings: [token type, token value]
 * @example const token: Token = ["COMMA", ","];
 */
type Token = [TokenType, string];

const PRIMITIVES = new Map<string, () => TypeTag>([
  ["bool", () => new TypeTagBool()],
  ["u8", () => new TypeTagU8()],
  ["u16", () => new TypeTagU16()],
  ["u32", () => new TypeTagU32()],
  ["u64", () => new TypeTagU64()],
  ["u128", () => new TypeTagU128()],
  ["u256", () => new TypeTagU256()],
  ["i8", () => new TypeTagI8()],
  ["i16", () => new TypeTagI16()],
  ["i32", () => new TypeTagI32()],
  ["i64", () => new TypeTagI64()],
  ["i128", () => new TypeTagI128()],
  ["i256", () => new TypeTagI256()],
  ["address", () => new TypeTagAddress()],
  ["signer", () => new TypeTagSigner()],
]);

const GENERIC_REGEX = /^T\d+$/;

/**
 * Recursive descent parser over the tokens of a Move type string.
 */
class TypeTagParser {
  private readonly tokens: Token[];

  private position = 0;

  constructor(
    private readonly typeTagStr: string,
    private readonly allowGenerics: boolean,
  ) {
    this.tokens = tokenize(typeTagStr, (reason) => this.bail(reason));
  }

  parse(): TypeTag {
    const typeTag = this.parseTypeTag();
    const trailing = this.peek();
    if (trailing !== undefined) {
      switch (trailing[0]) {
        case "GT":
          this.bail(TypeTagParserErrorType.UnexpectedTypeArgumentClose);
          break;
        case "COMMA":
          this.bail(TypeTagParserErrorType.UnexpectedComma);
          break;
        default:
          this.bail(TypeTagParserErrorType.TrailingTokens);
      }
    }
    return typeTag;
  }

  private bail(reason: TypeTagParserErrorType): never {
    throw new TypeTagParserError(this.typeTagStr, reason);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (token === undefined) {
      this.bail(TypeTagParserErrorType.UnexpectedEnd);
    }
    this.position += 1;
    return token;
  }

  private nextIs(type: TokenType): boolean {
    return this.peek()?.[0] === type;
  }

  private parseTypeTag(): TypeTag {
    const [tokenTy, tokenVal] = this.next();

    switch (tokenTy) {
      case "AMP":
        return new TypeTagReference(this.parseTypeTag());
      case "GT":
        return this.bail(TypeTagParserErrorType.UnexpectedTypeArgumentClose);
      case "COMMA":
        return this.bail(TypeTagParserErrorType.UnexpectedComma);
      case "IDENT":
        break;
      default:
        return this.bail(TypeTagParserErrorType.InvalidTypeTag);
    }

    const primitive = PRIMITIVES.get(tokenVal);
    if (primitive !== undefined) {
      if (this.nextIs("LT")) {
        this.bail(TypeTagParserErrorType.UnexpectedPrimitiveTypeArguments);
      }
      return primitive();
    }

    if (tokenVal === "vector") {
      const typeArgs = this.nextIs("LT") ? this.parseTypeArguments() : [];
      if (typeArgs.length !== 1) {
        this.bail(TypeTagParserErrorType.UnexpectedVectorTypeArgumentCount);
      }
      return new TypeTagVector(typeArgs[0]);
    }

    if (this.nextIs("COLON")) {
      return new TypeTagStruct(this.parseStructTag(tokenVal));
    }

    if (GENERIC_REGEX.test(tokenVal)) {
      if (!this.allowGenerics) {
        this.bail(TypeTagParserErrorType.UnexpectedGenericType);
      }
      if (this.nextIs("LT")) {
        this.bail(TypeTagParserErrorType.UnexpectedPrimitiveTypeArguments);
      }
      return new TypeTagGeneric(Number(tokenVal.substring(1)));
    }

    return this.bail(TypeTagParserErrorType.InvalidTypeTag);
  }

  private parseStructTag(addressStr: string): StructTag {
    let address: AccountAddress;
    try {
      address = AccountAddress.fromStringRelaxed({ input: addressStr });
    } catch {
      return this.bail(TypeTagParserErrorType.InvalidAddress);
    }

    const moduleName = this.parseStructPart();
    const name = this.parseStructPart();
    if (this.nextIs("COLON")) {
      this.bail(TypeTagParserErrorType.UnexpectedStructFormat);
    }

    const typeArgs = this.nextIs("LT") ? this.parseTypeArguments() : [];
    return new StructTag(address, new Identifier(moduleName), new Identifier(name), typeArgs);
  }

  // `::` and a name. Module and struct names are any run of [A-Za-z0-9_], leading digits included.
  private parseStructPart(): string {
    const separator = this.peek();
    if (separator === undefined || separator[0] !== "COLON") {
      this.bail(TypeTagParserErrorType.UnexpectedStructFormat);
    }
    this.position += 1;
    const part = this.peek();
    if (part === undefined || part[0] !== "IDENT") {
      this.bail(TypeTagParserErrorType.UnexpectedStructFormat);
    }
    this.position += 1;
    return part[1];
  }

  // `<` T (`,` T)* `>`, no trailing comma.
  private parseTypeArguments(): TypeTag[] {
    this.position += 1;
    if (this.nextIs("GT")) {
      this.bail(TypeTagParserErrorType.TypeArgumentCountMismatch);
    }

    const typeArgs: TypeTag[] = [];
    for (;;) {
      if (this.peek() === undefined) {
        this.bail(TypeTagParserErrorType.MissingTypeArgumentClose);
      }
      typeArgs.push(this.parseTypeTag());

      const token = this.peek();
      if (token === undefined) {
        this.bail(TypeTagParserErrorType.MissingTypeArgumentClose);
      }
      this.position += 1;
      if (token[0] === "GT") {
        return typeArgs;
      }
      if (token[0] !== "COMMA") {
        this.bail(TypeTagParserErrorType.MissingTypeArgumentClose);
      }
      if (this.nextIs("GT") || this.nextIs("COMMA")) {
        this.bail(TypeTagParserErrorType.UnexpectedComma);
      }
    }
  }
}

function isWhiteSpace(c: string): boolean {
  return /\s/.test(c);
}

function isValidAlphabetic(c: string): boolean {
  return /[_A-Za-z0-9]/.test(c);
}

function tokenize(tagStr: string, bail: (reason: TypeTagParserErrorType) => never): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < tagStr.length) {
    const c = tagStr[pos];
    if (isWhiteSpace(c)) {
      pos += 1;
    } else if (c === ":") {
      if (tagStr.slice(pos, pos + 2) !== "::") {
        bail(TypeTagParserErrorType.UnexpectedStructFormat);
      }
      tokens.push(["COLON", "::"]);
      pos += 2;
    } else if (c === "<") {
      tokens.push(["LT", c]);
      pos += 1;
    } else if (c === ">") {
      tokens.push(["GT", c]);
      pos += 1;
    } else if (c === ",") {
      tokens.push(["COMMA", c]);
      pos += 1;
    } else if (c === "&") {
      tokens.push(["AMP", c]);
      pos += 1;
    } else if (isValidAlphabetic(c)) {
      let end = pos;
      while (end < tagStr.length && isValidAlphabetic(tagStr[end])) {
        end += 1;
      }
      tokens.push(["IDENT", tagStr.slice(pos, end)]);
      pos = end;
    } else {
      bail(TypeTagParserErrorType.InvalidTypeTag);
    }
  }
  return tokens;
}

/**
 * Parses a Move type string such as `u64`, `vector<address>`, `&signer` or
 * `0x1::coin::Coin<0x1::aptos_coin::AptosCoin>`. Whitespace between tokens is ignored.
 *
 * `T0`, `T1`, ... parse to generic type parameters unless `allowGenerics` is false.
 *
 * @throws TypeTagParserError
 */
export function parseTypeTag(typeTagStr: string, options?: { allowGenerics?: boolean }): TypeTag {
  const allowGenerics = options?.allowGenerics ?? true;
  return new TypeTagParser(typeTagStr, allowGenerics).parse();
}
