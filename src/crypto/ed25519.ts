// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import nacl from "tweetnacl";
import { Deserializer } from "../bcs/deserializer";
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

export class Ed25519PublicKey extends PublicKey {
  static readonly LENGTH: number = 32;

  private readonly key: Uint8Array;

  constructor(args: { hexInput: HexInput }) {
    super();
    this.key = bytesOfLength(args.hexInput, Ed25519PublicKey.LENGTH, "PublicKey");
  }

  toUint8Array(): Uint8Array {
    return this.key;
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.key }).toString();
  }

  /**
   * Pure Ed25519 over the raw message, no prehash.
   */
  verifySignature(args: { message: HexInput; signature: Signature }): boolean {
    const { signature } = args;
    const message = messageBytes(args.message);
    if (message === undefined || !(signature instanceof Ed25519Signature)) {
      return false;
    }
    return nacl.sign.detached.verify(message, signature.toUint8Array(), this.key);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.key);
  }

  static deserialize(deserializer: Deserializer): Ed25519PublicKey {
    const hexInput = deserializeBytesOfLength(deserializer, Ed25519PublicKey.LENGTH, "Ed25519 public key");
    return new Ed25519PublicKey({ hexInput });
  }
}

/**
 * An Ed25519 signing key, held as its 32 byte seed.
 */
export class Ed25519PrivateKey extends PrivateKey {
  static readonly LENGTH: number = 32;

  private readonly keyPair: nacl.SignKeyPair;

  /**
   * @param args.hexInput the seed as bytes, hex, or `ed25519-priv-0x...`
   * @param args.strict true to take only the AIP-80 form for strings, false to take
   * bare hex without the warning
   */
  constructor(args: { hexInput: HexInput; strict?: boolean }) {
    super();
    const seed = parsePrivateKeyHexInput(args.hexInput, PrivateKeyVariants.Ed25519, args.strict);
    this.keyPair = nacl.sign.keyPair.fromSeed(seed.toUint8Array());
  }

  static generate(): Ed25519PrivateKey {
    return new Ed25519PrivateKey({ hexInput: nacl.randomBytes(Ed25519PrivateKey.LENGTH) });
  }

  // tweetnacl keeps seed || public key as the secret key
  toUint8Array(): Uint8Array {
    return this.keyPair.secretKey.slice(0, Ed25519PrivateKey.LENGTH);
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  toAIP80String(): string {
    return formatPrivateKey(this.toUint8Array(), PrivateKeyVariants.Ed25519);
  }

  publicKey(): Ed25519PublicKey {
    return new Ed25519PublicKey({ hexInput: this.keyPair.publicKey });
  }

  sign(args: { message: HexInput }): Ed25519Signature {
    const message = Hex.fromHexInput({ hexInput: args.message }).toUint8Array();
    return new Ed25519Signature({ hexInput: nacl.sign.detached(message, this.keyPair.secretKey) });
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.toUint8Array());
  }

  static deserialize(deserializer: Deserializer): Ed25519PrivateKey {
    const hexInput = deserializeBytesOfLength(deserializer, Ed25519PrivateKey.LENGTH, "Ed25519 private key");
    return new Ed25519PrivateKey({ hexInput, strict: false });
  }
}

export class Ed25519Signature extends Signature {
  static readonly LENGTH = 64;

  private readonly data: Uint8Array;

  constructor(args: { hexInput: HexInput }) {
    super();
    this.data = bytesOfLength(args.hexInput, Ed25519Signature.LENGTH, "Signature");
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

  static deserialize(deserializer: Deserializer): Ed25519Signature {
    const hexInput = deserializeBytesOfLength(deserializer, Ed25519Signature.LENGTH, "Ed25519 signature");
    return new Ed25519Signature({ hexInput });
  }
}
