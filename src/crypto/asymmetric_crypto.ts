// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { BcsError, BcsInvalidReason, Deserializer } from "../bcs/deserializer";
import { Serializable, Serializer } from "../bcs/serializer";
import { Hex } from "../core/hex";
import { HexInput } from "../types";

export abstract class PublicKey extends Serializable {
  /**
   * Whether `signature` over `message` comes from the matching private key. A
   * signature of another scheme, or input that does not parse, gives false.
   */
  abstract verifySignature(args: { message: HexInput; signature: Signature }): boolean;

  abstract toUint8Array(): Uint8Array;

  // 0x-prefixed hex of toUint8Array()
  abstract toString(): string;

  abstract serialize(serializer: Serializer): void;
}

export abstract class PrivateKey extends Serializable {
  abstract sign(args: { message: HexInput }): Signature;

  abstract toUint8Array(): Uint8Array;

  abstract toString(): string;

  /**
   * The AIP-80 form, `<scheme>-priv-0x<hex>`.
   */
  abstract toAIP80String(): string;

  abstract serialize(serializer: Serializer): void;

  abstract publicKey(): PublicKey;
}

export abstract class Signature extends Serializable {
  abstract toUint8Array(): Uint8Array;

  abstract toString(): string;

  abstract serialize(serializer: Serializer): void;
}

/**
 * The bytes of `hexInput`, which must be exactly `length` long. `what` names the
 * value in the error, e.g. "PublicKey length should be 32".
 */
export function bytesOfLength(hexInput: HexInput, length: number, what: string): Uint8Array {
  const bytes = Hex.fromHexInput({ hexInput }).toUint8Array();
  if (bytes.length !== length) {
    throw new Error(`${what} length should be ${length}`);
  }
  return bytes;
}

/**
 * Reads a length-prefixed byte string that must be `length` long, failing the
 * deserializer otherwise.
 */
export function deserializeBytesOfLength(deserializer: Deserializer, length: number, what: string): Uint8Array {
  const bytes = deserializer.deserializeBytes();
  if (bytes.length !== length) {
    throw deserializer.fail(
      new BcsError(`${what} must be ${length} bytes, got ${bytes.length}`, BcsInvalidReason.LENGTH_MISMATCH),
    );
  }
  return bytes;
}

/**
 * Message bytes for verification, or undefined when the message is not valid hex.
 */
export function messageBytes(message: HexInput): Uint8Array | undefined {
  if (typeof message !== "string") {
    return message;
  }
  return Hex.isValid({ str: message }).valid ? Hex.fromString({ str: message }).toUint8Array() : undefined;
}
