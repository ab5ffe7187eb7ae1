// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable no-bitwise */
/* eslint-disable max-classes-per-file */
import { BcsError, BcsInvalidReason, Deserializer } from "../bcs/deserializer";
import { Serializer } from "../bcs/serializer";
import { Hex } from "../core/hex";
import { HexInput } from "../types";
import { PublicKey, Signature } from "./asymmetric_crypto";
import { Ed25519PublicKey, Ed25519Signature } from "./ed25519";

// Index 0 is the most significant bit of the first byte.
const bitMask = (index: number) => 0x80 >> index % 8;

/**
 * The key indices set in a signer bitmap, ascending.
 */
export function bitmapToIndices(bitmap: Uint8Array): number[] {
  const indices: number[] = [];
  for (let index = 0; index < bitmap.length * 8; index += 1) {
    if ((bitmap[Math.floor(index / 8)] & bitMask(index)) !== 0) {
      indices.push(index);
    }
  }
  return indices;
}

/**
 * A bitmap of `length` bytes with `bits` set. Throws on a duplicate or an index that does
 * not fit.
 */
export function bitsToBitmap(bits: ReadonlyArray<number>, length: number): Uint8Array {
  const bitmap = new Uint8Array(length);
  bits.forEach((bit) => {
    if (!Number.isInteger(bit) || bit < 0 || bit >= length * 8) {
      throw new Error(`Cannot have a signature larger than ${length * 8 - 1}.`);
    }
    const byte = Math.floor(bit / 8);
    if ((bitmap[byte] & bitMask(bit)) !== 0) {
      throw new Error("Duplicate bits detected.");
    }
    bitmap[byte] |= bitMask(bit);
  });
  return bitmap;
}

// Fixed-size items back to back, then a trailer.
function pack(items: ReadonlyArray<Uint8Array>, trailer: Uint8Array): Uint8Array {
  const out = new Uint8Array(items.reduce((n, item) => n + item.length, 0) + trailer.length);
  let offset = 0;
  items.forEach((item) => {
    out.set(item, offset);
    offset += item.length;
  });
  out.set(trailer, offset);
  return out;
}

function unpack(bytes: Uint8Array, itemLength: number, trailerLength: number): [Uint8Array[], Uint8Array] | undefined {
  const body = bytes.length - trailerLength;
  if (body < 0 || body % itemLength !== 0) {
    return undefined;
  }
  const items: Uint8Array[] = [];
  for (let offset = 0; offset < body; offset += itemLength) {
    items.push(bytes.slice(offset, offset + itemLength));
  }
  return [items, bytes.slice(body)];
}

/**
 * A K-of-N Ed25519 key: 2 to 32 keys, of which `threshold` must sign.
 *
 * Bytes: the keys back to back, then the threshold as one byte.
 */
export class MultiEd25519PublicKey extends PublicKey {
  static readonly MAX_KEYS = 32;

  static readonly MIN_KEYS = 2;

  static readonly MIN_THRESHOLD = 1;

  public readonly publicKeys: Ed25519PublicKey[];

  public readonly threshold: number;

  constructor(args: { publicKeys: Ed25519PublicKey[]; threshold: number }) {
    super();
    const { publicKeys, threshold } = args;
    const { MIN_KEYS, MAX_KEYS, MIN_THRESHOLD } = MultiEd25519PublicKey;

    if (publicKeys.length < MIN_KEYS || publicKeys.length > MAX_KEYS) {
      throw new Error(`Must have between ${MIN_KEYS} and ${MAX_KEYS} public keys, inclusive`);
    }
    if (!Number.isInteger(threshold) || threshold < MIN_THRESHOLD || threshold > publicKeys.length) {
      throw new Error(`Threshold must be between ${MIN_THRESHOLD} and ${publicKeys.length}, inclusive`);
    }
    this.publicKeys = publicKeys;
    this.threshold = threshold;
  }

  toUint8Array(): Uint8Array {
    return pack(
      this.publicKeys.map((key) => key.toUint8Array()),
      Uint8Array.of(this.threshold),
    );
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  /**
   * True when the bitmap names one existing key per signature and at least `threshold`
   * of those signatures verify.
   */
  verifySignature(args: { message: HexInput; signature: Signature }): boolean {
    const { message, signature } = args;
    if (!(signature instanceof MultiEd25519Signature)) {
      return false;
    }
    const signers = bitmapToIndices(signature.bitmap);
    if (signers.length !== signature.signatures.length || signers.length < this.threshold) {
      return false;
    }
    let valid = 0;
    for (let i = 0; i < signers.length; i += 1) {
      const key = this.publicKeys[signers[i]];
      if (key === undefined) {
        return false;
      }
      if (key.verifySignature({ message, signature: signature.signatures[i] })) {
        valid += 1;
      }
    }
    return valid >= this.threshold;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.toUint8Array());
  }

  static deserialize(deserializer: Deserializer): MultiEd25519PublicKey {
    const bytes = deserializer.deserializeBytes();
    const parts = unpack(bytes, Ed25519PublicKey.LENGTH, 1);
    const { MIN_KEYS, MAX_KEYS, MIN_THRESHOLD } = MultiEd25519PublicKey;
    if (parts === undefined || parts[0].length < MIN_KEYS || parts[0].length > MAX_KEYS) {
      throw deserializer.fail(
        new BcsError(`Invalid MultiEd25519 public key length ${bytes.length}`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    const [keys, [threshold]] = parts;
    if (threshold < MIN_THRESHOLD || threshold > keys.length) {
      throw deserializer.fail(
        new BcsError(`Invalid MultiEd25519 threshold ${threshold} for ${keys.length} keys`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    return new MultiEd25519PublicKey({
      publicKeys: keys.map((hexInput) => new Ed25519PublicKey({ hexInput })),
      threshold,
    });
  }
}

/**
 * Signatures of a subset of a `MultiEd25519PublicKey`'s keys, ordered by key index, and a
 * 4-byte bitmap marking which keys signed.
 *
 * Bytes: the signatures back to back, then the bitmap.
 */
export class MultiEd25519Signature extends Signature {
  static MAX_SIGNATURES_SUPPORTED = 32;

  static BITMAP_LEN: number = 4;

  public readonly signatures: Ed25519Signature[];

  public readonly bitmap: Uint8Array;

  /**
   * @param args.bitmap the 4 bitmap bytes, or the key indices to set in one
   */
  constructor(args: { signatures: Ed25519Signature[]; bitmap: Uint8Array | number[] }) {
    super();
    const { signatures } = args;
    const bitmap = args.bitmap instanceof Uint8Array ? args.bitmap : MultiEd25519Signature.createBitmap({ bits: args.bitmap });

    if (bitmap.length !== MultiEd25519Signature.BITMAP_LEN) {
      throw new Error(`"bitmap" length should be ${MultiEd25519Signature.BITMAP_LEN}`);
    }
    if (signatures.length > MultiEd25519Signature.MAX_SIGNATURES_SUPPORTED) {
      throw new Error(
        `The number of signatures cannot be greater than ${MultiEd25519Signature.MAX_SIGNATURES_SUPPORTED}`,
      );
    }
    const expected = bitmapToIndices(bitmap).length;
    if (expected !== signatures.length) {
      throw new Error(`Expecting ${expected} signatures from the bitmap, got ${signatures.length}`);
    }
    this.signatures = signatures;
    this.bitmap = bitmap;
  }

  toUint8Array(): Uint8Array {
    return pack(
      this.signatures.map((signature) => signature.toUint8Array()),
      this.bitmap,
    );
  }

  toString(): string {
    return Hex.fromHexInput({ hexInput: this.toUint8Array() }).toString();
  }

  /**
   * A bitmap with the given key indices set, 0 to 31.
   *
   * @example
   * `[0, 2, 31]` gives `[0b10100000, 0, 0, 0b00000001]`
   */
  static createBitmap(args: { bits: number[] }): Uint8Array {
    return bitsToBitmap(args.bits, MultiEd25519Signature.BITMAP_LEN);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.toUint8Array());
  }

  static deserialize(deserializer: Deserializer): MultiEd25519Signature {
    const bytes = deserializer.deserializeBytes();
    const parts = unpack(bytes, Ed25519Signature.LENGTH, MultiEd25519Signature.BITMAP_LEN);
    if (parts === undefined) {
      throw deserializer.fail(
        new BcsError(`Invalid MultiEd25519 signature length ${bytes.length}`, BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    const [signatures, bitmap] = parts;
    if (bitmapToIndices(bitmap).length !== signatures.length) {
      throw deserializer.fail(
        new BcsError("MultiEd25519 bitmap does not match the number of signatures", BcsInvalidReason.LENGTH_MISMATCH),
      );
    }
    return new MultiEd25519Signature({
      signatures: signatures.map((hexInput) => new Ed25519Signature({ hexInput })),
      bitmap,
    });
  }
}
