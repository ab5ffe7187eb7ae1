// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { BcsError, BcsInvalidReason, Deserializer } from "../bcs/deserializer";
import { Serializer } from "../bcs/serializer";
import { Hex } from "../core/hex";
import { AnyPublicKeyVariant, AnySignatureVariant, HexInput } from "../types";
import { PublicKey, Signature } from "./asymmetric_crypto";
import { Ed25519PublicKey, Ed25519Signature } from "./ed25519";
import { Secp256k1PublicKey, Secp256k1Signature } from "./secp256k1";

/**
 * The public key of a keyless account: the OIDC issuer and the identity commitment.
 * It is carried through BCS unchanged; signatures against it cannot be checked here.
 */
export class KeylessPublicKey extends PublicKey {
  static readonly ID_COMMITMENT_LENGTH: number = 32;

  public readonly iss: string;

  public readonly idCommitment: Uint8Array;

  constructor(args: { iss: string; idCommitment: HexInput }) {
    super();
    const idCommitment = Hex.fromHexInput({ hexInput: args.idCommitment }).toUint8Array();
    if (idCommitment.length !== KeylessPublicKey.ID_COMMITMENT_LENGTH) {
      throw new Error(`Identity commitment length should be ${KeylessPublicKey.ID_COMMITMENT_LENGTH}`);
    }
    this.iss = args.iss;
    this.idCommitment = idCommitment;
  }

  verifySignature(): boolean {
    return false;
  }

  toUint8Array(): Uint8Array {
    return this.bcsToBytes();
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeStr(this.iss);
    serializer.serializeBytes(this.idCommitment);
  }

  static deserialize(deserializer: Deserializer): KeylessPublicKey {
    const iss = deserializer.deserializeStr();
    const idCommitment = deserializer.deserializeBytes();
    if (idCommitment.length !== KeylessPublicKey.ID_COMMITMENT_LENGTH) {
      throw deserializer.fail(
        new BcsError(`Keyless identity commitment must be ${KeylessPublicKey.ID_COMMITMENT_LENGTH} bytes`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    return new KeylessPublicKey({ iss, idCommitment });
  }
}

/**
 * A public key of any single-key scheme, tagged with its variant. This is what a
 * SingleKey account's authentication key is derived from.
 */
export class AnyPublicKey extends PublicKey {
  public readonly publicKey: PublicKey;

  public readonly variant: AnyPublicKeyVariant;

  constructor(publicKey: PublicKey) {
    super();
    this.publicKey = publicKey;
    if (publicKey instanceof Ed25519PublicKey) {
      this.variant = AnyPublicKeyVariant.Ed25519;
    } else if (publicKey instanceof Secp256k1PublicKey) {
      this.variant = AnyPublicKeyVariant.Secp256k1;
    } else if (publicKey instanceof KeylessPublicKey) {
      this.variant = AnyPublicKeyVariant.Keyless;
    } else {
      throw new Error("Unsupported public key type");
    }
  }

  /**
   * Accepts either an `AnySignature` or the bare signature of the inner scheme. The
   * variants must match.
   */
  verifySignature(args: { message: HexInput; signature: Signature }): boolean {
    const { message } = args;
    const signature = args.signature instanceof AnySignature ? args.signature.signature : args.signature;
    return this.publicKey.verifySignature({ message, signature });
  }

  toUint8Array(): Uint8Array {
    return this.bcsToBytes();
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(this.variant);
    this.publicKey.serialize(serializer);
  }

  static deserialize(deserializer: Deserializer): AnyPublicKey {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case AnyPublicKeyVariant.Ed25519:
        return new AnyPublicKey(Ed25519PublicKey.deserialize(deserializer));
      case AnyPublicKeyVariant.Secp256k1:
        return new AnyPublicKey(Secp256k1PublicKey.deserialize(deserializer));
      case AnyPublicKeyVariant.Keyless:
        return new AnyPublicKey(KeylessPublicKey.deserialize(deserializer));
      case AnyPublicKeyVariant.Secp256r1:
        throw deserializer.fail(
          new BcsError("Secp256r1 public keys are not supported", BcsInvalidReason.UNSUPPORTED_VARIANT),
        );
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for AnyPublicKey: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }

  static isPublicKey(publicKey: PublicKey): publicKey is AnyPublicKey {
    return publicKey instanceof AnyPublicKey;
  }
}

/**
 * A signature of any single-key scheme, tagged with its variant.
 */
export class AnySignature extends Signature {
  public readonly signature: Signature;

  public readonly variant: AnySignatureVariant;

  constructor(signature: Signature) {
    super();
    this.signature = signature;
    if (signature instanceof Ed25519Signature) {
      this.variant = AnySignatureVariant.Ed25519;
    } else if (signature instanceof Secp256k1Signature) {
      this.variant = AnySignatureVariant.Secp256k1;
    } else {
      throw new Error("Unsupported signature type");
    }
  }

  toUint8Array(): Uint8Array {
    return this.bcsToBytes();
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(this.variant);
    this.signature.serialize(serializer);
  }

  static deserialize(deserializer: Deserializer): AnySignature {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case AnySignatureVariant.Ed25519:
        return new AnySignature(Ed25519Signature.deserialize(deserializer));
      case AnySignatureVariant.Secp256k1:
        return new AnySignature(Secp256k1Signature.deserialize(deserializer));
      case AnySignatureVariant.WebAuthn:
      case AnySignatureVariant.Keyless:
        throw deserializer.fail(
          new BcsError(`AnySignature variant ${index} is not supported`, BcsInvalidReason.UNSUPPORTED_VARIANT),
        );
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for AnySignature: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }
}
