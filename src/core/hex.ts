// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { HexInput } from "../types";
import { ParsingError, ParsingResult, toParsingResult } from "./common";

export enum HexInvalidReason {
  TOO_SHORT = "too_short",
  INVALID_LENGTH = "invalid_length",
  INVALID_HEX_CHARS = "invalid_hex_chars",
}

/**
 * Arbitrary byte data and its `0x` string form. Use `AccountAddress` for addresses,
 * which have their own formatting rules.
 *
 * Functions taking bytes accept a `HexInput` and normalize it here:
 *
 * ```ts
 * const bytes = Hex.fromHexInput({ hexInput: "0x0102" }).toUint8Array();
 * ```
 */
export class Hex {
  private readonly data: Uint8Array;

  constructor(args: { data: Uint8Array }) {
    this.data = args.data;
  }

  toUint8Array(): Uint8Array {
    return this.data;
  }

  toStringWithoutPrefix(): string {
    return bytesToHex(this.data);
  }

  toString(): string {
    return `0x${bytesToHex(this.data)}`;
  }

  /**
   * Parses an even number of hex digits, upper or lower case, with an optional `0x`
   * or `0X`. The empty string is refused.
   */
  static fromString(args: { str: string }): Hex {
    const { str } = args;
    const digits = /^0[xX]/.test(str) ? str.slice(2) : str;

    if (digits.length === 0) {
      throw new ParsingError("Hex string is empty", HexInvalidReason.TOO_SHORT);
    }
    if (digits.length % 2 === 1) {
      throw new ParsingError(
        `Hex string has an odd number of digits (${digits.length})`,
        HexInvalidReason.INVALID_LENGTH,
      );
    }
    if (!/^[0-9a-fA-F]*$/.test(digits)) {
      throw new ParsingError(`'${str}' is not a hex string`, HexInvalidReason.INVALID_HEX_CHARS);
    }
    return new Hex({ data: hexToBytes(digits) });
  }

  static fromHexInput(args: { hexInput: HexInput }): Hex {
    const { hexInput } = args;
    return typeof hexInput === "string" ? Hex.fromString({ str: hexInput }) : new Hex({ data: hexInput });
  }

  static isValid(args: { str: string }): ParsingResult<HexInvalidReason> {
    try {
      Hex.fromString(args);
    } catch (e) {
      return toParsingResult<HexInvalidReason>(e);
    }
    return { valid: true };
  }

  equals(other: Hex): boolean {
    const bytes = other.toUint8Array();
    return bytes.length === this.data.length && this.data.every((byte, i) => byte === bytes[i]);
  }
}
