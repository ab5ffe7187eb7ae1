// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { Serializable, Serializer } from "../bcs/serializer";
import { Deserializer } from "../bcs/deserializer";
import { HexInput } from "../types";
import { ParsingError, ParsingResult, toParsingResult } from "./common";

export enum AddressInvalidReason {
  INCORRECT_NUMBER_OF_BYTES = "incorrect_number_of_bytes",
  INVALID_HEX_CHARS = "invalid_hex_chars",
  TOO_SHORT = "too_short",
  TOO_LONG = "too_long",
  LEADING_ZERO_X_REQUIRED = "leading_zero_x_required",
  LONG_FORM_REQUIRED_UNLESS_SPECIAL = "long_form_required_unless_special",
  INVALID_PADDING_ZEROES = "invalid_padding_zeroes",
}

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * Splits off an optional `0x` and checks what is left is 1 to 64 hex digits.
 */
function addressDigits(input: string): string {
  const digits = input.startsWith("0x") ? input.slice(2) : input;
  if (digits.length === 0) {
    throw new ParsingError(`Address '${input}' has no hex digits`, AddressInvalidReason.TOO_SHORT);
  }
  if (digits.length > AccountAddress.LONG_STRING_LENGTH) {
    throw new ParsingError(
      `Address '${input}' has ${digits.length} hex digits, at most ${AccountAddress.LONG_STRING_LENGTH} are allowed`,
      AddressInvalidReason.TOO_LONG,
    );
  }
  if (!HEX_DIGITS.test(digits)) {
    throw new ParsingError(`Address '${input}' is not hex`, AddressInvalidReason.INVALID_HEX_CHARS);
  }
  return digits;
}

/**
 * A 32 byte account address, formatted and parsed per AIP-40.
 *
 * Addresses 0x0 to 0xf are "special": `toString` prints them as `0x` and a single
 * digit. Every other address prints in its long form, `0x` and 64 digits.
 */
export class AccountAddress extends Serializable {
  static readonly LENGTH: number = 32;

  static readonly LONG_STRING_LENGTH: number = 64;

  static ZERO: AccountAddress = AccountAddress.special(0);

  static ONE: AccountAddress = AccountAddress.special(1);

  static TWO: AccountAddress = AccountAddress.special(2);

  static THREE: AccountAddress = AccountAddress.special(3);

  static FOUR: AccountAddress = AccountAddress.special(4);

  readonly data: Uint8Array;

  constructor(args: { data: Uint8Array }) {
    super();
    if (args.data.length !== AccountAddress.LENGTH) {
      throw new ParsingError(
        `An address is ${AccountAddress.LENGTH} bytes, got ${args.data.length}`,
        AddressInvalidReason.INCORRECT_NUMBER_OF_BYTES,
      );
    }
    this.data = args.data;
  }

  private static special(value: number): AccountAddress {
    const data = new Uint8Array(AccountAddress.LENGTH);
    data[AccountAddress.LENGTH - 1] = value;
    return new AccountAddress({ data });
  }

  isSpecial(): boolean {
    const last = this.data.length - 1;
    return this.data[last] < 16 && this.data.subarray(0, last).every((byte) => byte === 0);
  }

  /**
   * AIP-40 form: short for special addresses, long for the rest.
   */
  toString(): string {
    return this.isSpecial() ? `0x${this.data[this.data.length - 1].toString(16)}` : this.toStringLong();
  }

  toStringLong(): string {
    return `0x${bytesToHex(this.data)}`;
  }

  /**
   * `0x` and the hex with every leading zero removed, for any address.
   */
  toStringShort(): string {
    const stripped = bytesToHex(this.data).replace(/^0+/, "");
    return `0x${stripped || "0"}`;
  }

  toUint8Array(): Uint8Array {
    return this.data;
  }

  /**
   * Strict parse. Takes the long form, or `0x0` to `0xf` for special addresses, and
   * nothing else: the `0x` is required and short non-special addresses are refused.
   */
  static fromString(args: { input: string }): AccountAddress {
    const { input } = args;
    if (!input.startsWith("0x")) {
      throw new ParsingError(`Address '${input}' must start with 0x`, AddressInvalidReason.LEADING_ZERO_X_REQUIRED);
    }
    const address = AccountAddress.fromStringRelaxed(args);
    const digits = input.length - 2;
    if (digits === AccountAddress.LONG_STRING_LENGTH) {
      return address;
    }
    if (!address.isSpecial()) {
      throw new ParsingError(
        `Address '${input}' must be written in long form, only 0x0 to 0xf may be short`,
        AddressInvalidReason.LONG_FORM_REQUIRED_UNLESS_SPECIAL,
      );
    }
    if (digits !== 1) {
      throw new ParsingError(
        `Special address '${input}' must be written as a single digit`,
        AddressInvalidReason.INVALID_PADDING_ZEROES,
      );
    }
    return address;
  }

  /**
   * Relaxed parse: 1 to 64 hex digits, `0x` optional, left-padded with zeroes.
   */
  static fromStringRelaxed(args: { input: string }): AccountAddress {
    const digits = addressDigits(args.input);
    return new AccountAddress({ data: hexToBytes(digits.padStart(AccountAddress.LONG_STRING_LENGTH, "0")) });
  }

  static fromHexInput(args: { input: HexInput }): AccountAddress {
    const { input } = args;
    return input instanceof Uint8Array ? new AccountAddress({ data: input }) : AccountAddress.fromString({ input });
  }

  static fromHexInputRelaxed(args: { input: HexInput }): AccountAddress {
    const { input } = args;
    return input instanceof Uint8Array
      ? new AccountAddress({ data: input })
      : AccountAddress.fromStringRelaxed({ input });
  }

  static isValid(args: { input: string; relaxed?: boolean }): ParsingResult<AddressInvalidReason> {
    try {
      if (args.relaxed === true) {
        AccountAddress.fromStringRelaxed({ input: args.input });
      } else {
        AccountAddress.fromString({ input: args.input });
      }
      return { valid: true };
    } catch (e) {
      return toParsingResult<AddressInvalidReason>(e);
    }
  }

  equals(other: AccountAddress): boolean {
    return this.data.every((byte, i) => byte === other.data[i]);
  }

  // Always the 32 raw bytes, no length prefix
  serialize(serializer: Serializer): void {
    serializer.serializeFixedBytes(this.data);
  }

  static deserialize(deserializer: Deserializer): AccountAddress {
    return new AccountAddress({ data: deserializer.deserializeFixedBytes(AccountAddress.LENGTH) });
  }
}
