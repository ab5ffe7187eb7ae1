// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { sha3_256 as sha3Hash } from "@noble/hashes/sha3";
import { bytesToNumberBE } from "@noble/curves/abstract/utils";
import { secp256k1 } from "@noble/curves/secp256k1";
import { BcsError, BcsInvalidReason, Deserializer } from "../bcs/deserializer";
import { Serializer } from "../bcs/serializer";
import { Hex } from "../core/hex";
import { HexInput } from "../types";
import {
  PrivateKey,
  PublicKey,
  Signature,
  bytesOfLength,
  deserializeBytesOfLength,
  messageBytes,
} from "./asymmetric_crypto";
import { PrivateKeyVariants, formatPrivateKey, parsePrivateKeyHexInput } from "./private_key";

const HALF_ORDER = secp256k1.CURVE.n >> BigInt(1);

// s is the second 32 bytes of r || s
const isHighS = (signature: Uint8Array) => bytesToNumberBE(signature.subarray(32)) > HALF_ORDER;

/**
 * An uncompressed secp256k1 point: 0x04, then x and y.
 */
export class Secp256k1PublicKey extends PublicKey {
  static readonly LENGTH: number = 65;

  private readonly key: Uint8Array;

  constructor(args: { hexInput: HexInput }) {
    super();
    this.key = bytesOfLength(args.hexInput, Secp256k1PublicKey.LENGTH, "PublicKey");
  }

  toUint8Array(): Uint8Array {
    return this.key;
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.key }).toString();
  }

  /**
   * ECDSA over SHA3-256 of the message. High-S signatures do not verify.
   */
  verifySignature(args: { message: HexInput; signature: Signature }): boolean {
    const { signature } = args;
    const message = messageBytes(args.message);
    if (message === undefined || !(signature instanceof Secp256k1Signature)) {
      return false;
    }
    try {
      return secp256k1.verify(signature.toUint8Array(), sha3Hash(message), this.key, { lowS: true });
    } catch (e) {
      // not a curve point, or r / s out of range
      return false;
    }
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.key);
  }

  static deserialize(deserializer: Deserializer): Secp256k1PublicKey {
    const hexInput = deserializeBytesOfLength(deserializer, Secp256k1PublicKey.LENGTH, "Secp256k1 public key");
    return new Secp256k1PublicKey({ hexInput });
  }
}

export class Secp256k1PrivateKey extends PrivateKey {
  static readonly LENGTH: number = 32;

  private readonly key: Uint8Array;

  /**
   * @param args.hexInput the scalar as bytes, hex, or `secp256k1-priv-0x...`
   * @param args.strict as for Ed25519PrivateKey
   */
  constructor(args: { hexInput: HexInput; strict?: boolean }) {
    super();
    this.key = parsePrivateKeyHexInput(args.hexInput, PrivateKeyVariants.Secp256k1, args.strict).toUint8Array();
  }

  static generate(): Secp256k1PrivateKey {
    return new Secp256k1PrivateKey({ hexInput: secp256k1.utils.randomPrivateKey() });
  }

  toUint8Array(): Uint8Array {
    return this.key;
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.key }).toString();
  }

  toAIP80String(): string {
    return formatPrivateKey(this.key, PrivateKeyVariants.Secp256k1);
  }

  publicKey(): Secp256k1PublicKey {
    return new Secp256k1PublicKey({ hexInput: secp256k1.getPublicKey(this.key, false) });
  }

  /**
   * Deterministic (RFC 6979) signature of SHA3-256(message), as compact r || s with
   * low S.
   */
  sign(args: { message: HexInput }): Secp256k1Signature {
    const digest = sha3Hash(Hex.fromHexInput({ hexInput: args.message }).toUint8Array());
    const signature = secp256k1.sign(digest, this.key, { lowS: true });
    return new Secp256k1Signature({ hexInput: signature.toCompactRawBytes() });
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.key);
  }

  static deserialize(deserializer: Deserializer): Secp256k1PrivateKey {
    const hexInput = deserializeBytesOfLength(deserializer, Secp256k1PrivateKey.LENGTH, "Secp256k1 private key");
    return new Secp256k1PrivateKey({ hexInput, strict: false });
  }
}

export class Secp256k1Signature extends Signature {
  static readonly LENGTH = 64;

  private readonly data: Uint8Array;

  /**
   * Throws on a signature whose S is in the upper half of the curve order.
   */
  constructor(args: { hexInput: HexInput }) {
    super();
    const data = bytesOfLength(args.hexInput, Secp256k1Signature.LENGTH, "Signature");
    if (isHighS(data)) {
      throw new Error("Signature S value must be in the lower half of the curve order");
    }
    this.data = data;
  }

  toUint8Array(): Uint8Array {
    return this.data;
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.data }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.data);
  }

  static deserialize(deserializer: Deserializer): Secp256k1Signature {
    const hexInput = deserializeBytesOfLength(deserializer, Secp256k1Signature.LENGTH, "Secp256k1 signature");
    if (isHighS(hexInput)) {
      throw deserializer.fail(
        new BcsError("Secp256k1 signature S value is in the upper half of the curve order", BcsInvalidReason.INVALID_VALUE),
      );
    }
    return new Secp256k1Signature({ hexInput });
  }
}
