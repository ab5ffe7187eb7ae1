// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { BcsError, BcsInvalidReason, Deserializer } from "../bcs/deserializer";
import { Serializer } from "../bcs/serializer";
import { Hex } from "../core/hex";
import { HexInput } from "../types";
import { PublicKey, Signature } from "./asymmetric_crypto";
import { bitmapToIndices, bitsToBitmap } from "./multi_ed25519";
import { AnyPublicKey, AnySignature } from "./single_key";

/**
 * A K-of-N public key over keys of any single-key scheme, which may be mixed.
 */
export class MultiKey extends PublicKey {
  static readonly MAX_KEYS = 32;

  public readonly publicKeys: AnyPublicKey[];

  public readonly signaturesRequired: number;

  /**
   * @param args.publicKeys the keys; bare keys are wrapped in `AnyPublicKey`
   * @param args.signaturesRequired the threshold, between 1 and the number of keys
   */
  constructor(args: { publicKeys: Array<PublicKey>; signaturesRequired: number }) {
    super();
    const { publicKeys, signaturesRequired } = args;

    if (publicKeys.length < 1 || publicKeys.length > MultiKey.MAX_KEYS) {
      throw new Error(`Must have between 1 and ${MultiKey.MAX_KEYS} public keys, inclusive`);
    }
    if (!Number.isInteger(signaturesRequired) || signaturesRequired < 1 || signaturesRequired > publicKeys.length) {
      throw new Error(`signaturesRequired must be between 1 and ${publicKeys.length}, inclusive`);
    }

    this.publicKeys = publicKeys.map((key) => (key instanceof AnyPublicKey ? key : new AnyPublicKey(key)));
    this.signaturesRequired = signaturesRequired;
  }

  /**
   * Index of `publicKey` in this MultiKey. Throws when it is not one of the keys.
   */
  getIndex(publicKey: PublicKey): number {
    const wrapped = publicKey instanceof AnyPublicKey ? publicKey : new AnyPublicKey(publicKey);
    const target = wrapped.toString();
    const index = this.publicKeys.findIndex((key) => key.toString() === target);
    if (index === -1) {
      throw new Error("Public key not found in MultiKey");
    }
    return index;
  }

  /**
   * A bitmap just long enough to cover every key, with `bits` set.
   */
  createBitmap(args: { bits: number[] }): Uint8Array {
    return bitsToBitmap(args.bits, Math.ceil(this.publicKeys.length / 8));
  }

  /**
   * Same rule as MultiEd25519: the bitmap names as many keys as there are signatures,
   * all of them in range, and at least `signaturesRequired` verify.
   */
  verifySignature(args: { message: HexInput; signature: Signature }): boolean {
    const { message, signature } = args;
    if (!(signature instanceof MultiKeySignature)) {
      return false;
    }
    const indices = bitmapToIndices(signature.bitmap);
    if (indices.length !== signature.signatures.length || indices.length < this.signaturesRequired) {
      return false;
    }
    if (indices.some((index) => index >= this.publicKeys.length)) {
      return false;
    }
    const valid = indices.filter((index, i) =>
      this.publicKeys[index].verifySignature({ message, signature: signature.signatures[i] }),
    ).length;
    return valid >= this.signaturesRequired;
  }

  toUint8Array(): Uint8Array {
    return this.bcsToBytes();
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeVector(this.publicKeys);
    serializer.serializeU8(this.signaturesRequired);
  }

  static deserialize(deserializer: Deserializer): MultiKey {
    const publicKeys = deserializer.deserializeVector(AnyPublicKey);
    const signaturesRequired = deserializer.deserializeU8();
    if (deserializer.error() !== undefined) {
      throw deserializer.fail(new BcsError("Invalid MultiKey", BcsInvalidReason.SHORT_BUFFER));
    }
    if (publicKeys.length < 1 || publicKeys.length > MultiKey.MAX_KEYS) {
      throw deserializer.fail(
        new BcsError(`MultiKey must have 1 to ${MultiKey.MAX_KEYS} keys, got ${publicKeys.length}`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    if (signaturesRequired < 1 || signaturesRequired > publicKeys.length) {
      throw deserializer.fail(
        new BcsError(`Invalid MultiKey threshold ${signaturesRequired}`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    return new MultiKey({ publicKeys, signaturesRequired });
  }
}

/**
 * The signatures of a subset of a MultiKey's keys, and the bitmap saying which.
 */
export class MultiKeySignature extends Signature {
  // Up to 32 keys, so at most 4 bitmap bytes
  static BITMAP_LEN: number = 4;

  static MAX_SIGNATURES_SUPPORTED = MultiKeySignature.BITMAP_LEN * 8;

  public readonly signatures: AnySignature[];

  public readonly bitmap: Uint8Array;

  constructor(args: { signatures: AnySignature[]; bitmap: Uint8Array | number[] }) {
    super();
    const { signatures } = args;
    const bitmap =
      args.bitmap instanceof Uint8Array ? args.bitmap : MultiKeySignature.createBitmap({ bits: args.bitmap });

    if (bitmap.length > MultiKeySignature.BITMAP_LEN) {
      throw new Error(`"bitmap" length should not exceed ${MultiKeySignature.BITMAP_LEN}`);
    }
    if (signatures.length > MultiKeySignature.MAX_SIGNATURES_SUPPORTED) {
      throw new Error(
        `The number of signatures cannot be greater than ${MultiKeySignature.MAX_SIGNATURES_SUPPORTED}`,
      );
    }
    const setBits = bitmapToIndices(bitmap).length;
    if (setBits !== signatures.length) {
      throw new Error(`Expecting ${setBits} signatures from the bitmap, got ${signatures.length}`);
    }

    this.signatures = signatures;
    this.bitmap = bitmap;
  }

  /**
   * Builds the signature from signatures tagged with the index of their key, in any
   * order. The bitmap is as short as the highest index allows.
   */
  static fromIndexedSignatures(indexed: Array<{ index: number; signature: Signature }>): MultiKeySignature {
    const sorted = [...indexed].sort((a, b) => a.index - b.index);
    const highest = sorted.length === 0 ? 0 : sorted[sorted.length - 1].index;
    const bitmap = bitsToBitmap(
      sorted.map(({ index }) => index),
      Math.min(Math.floor(highest / 8) + 1, MultiKeySignature.BITMAP_LEN),
    );
    const signatures = sorted.map(({ signature }) =>
      signature instanceof AnySignature ? signature : new AnySignature(signature),
    );
    return new MultiKeySignature({ signatures, bitmap });
  }

  /**
   * A bitmap of the full 4 bytes with `bits` set.
   */
  static createBitmap(args: { bits: number[] }): Uint8Array {
    return bitsToBitmap(args.bits, MultiKeySignature.BITMAP_LEN);
  }

  toUint8Array(): Uint8Array {
    return this.bcsToBytes();
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeVector(this.signatures);
    serializer.serializeBytes(this.bitmap);
  }

  static deserialize(deserializer: Deserializer): MultiKeySignature {
    const signatures = deserializer.deserializeVector(AnySignature);
    const bitmap = deserializer.deserializeBytes();
    if (deserializer.error() !== undefined) {
      throw deserializer.fail(new BcsError("Invalid MultiKeySignature", BcsInvalidReason.SHORT_BUFFER));
    }
    if (bitmap.length > MultiKeySignature.BITMAP_LEN) {
      throw deserializer.fail(
        new BcsError(`MultiKey bitmap must be at most ${MultiKeySignature.BITMAP_LEN} bytes`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    if (bitmapToIndices(bitmap).length !== signatures.length) {
      throw deserializer.fail(
        new BcsError("MultiKey bitmap does not match the number of signatures", BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    return new MultiKeySignature({ signatures, bitmap });
  }
}
