// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { BcsError, BcsInvalidReason, Deserializer } from "../../src/bcs/deserializer";
import { Serializer } from "../../src/bcs/serializer";
import { Ed25519PrivateKey, Ed25519PublicKey, Ed25519Signature } from "../../src/crypto/ed25519";
import {
  MultiEd25519PublicKey,
  MultiEd25519Signature,
  bitmapToIndices,
  bitsToBitmap,
} from "../../src/crypto/multi_ed25519";
import { multiEd25519 } from "./helper";

const publicKey = new MultiEd25519PublicKey({
  publicKeys: multiEd25519.publicKeys.map((hexInput) => new Ed25519PublicKey({ hexInput })),
  threshold: multiEd25519.threshold,
});

const signatureOf = (signatures: string[], bitmap: number[]) =>
  new MultiEd25519Signature({
    signatures: signatures.map((hexInput) => new Ed25519Signature({ hexInput })),
    bitmap,
  });

const fixtureSignature = () => signatureOf(multiEd25519.signatures, multiEd25519.signers);

describe("bitmaps", () => {
  it("sets bits from the most significant end", () => {
    expect(bitsToBitmap([0, 2, 31], 4)).toEqual(new Uint8Array([0b10100000, 0, 0, 0b00000001]));
    expect(bitsToBitmap([9], 2)).toEqual(new Uint8Array([0, 0b01000000]));
  });

  it("lists the set bits in order", () => {
    expect(bitmapToIndices(new Uint8Array([0b10100000, 0, 0, 0b00000001]))).toEqual([0, 2, 31]);
    expect(bitmapToIndices(new Uint8Array(4))).toEqual([]);
  });

  it("refuses an index past the end", () => {
    expect(() => MultiEd25519Signature.createBitmap({ bits: [32] })).toThrow("Cannot have a signature larger than 31.");
    expect(() => bitsToBitmap([-1], 1)).toThrow("Cannot have a signature larger than 7.");
  });

  it("refuses a duplicate index", () => {
    expect(() => MultiEd25519Signature.createBitmap({ bits: [2, 2] })).toThrow("Duplicate bits detected.");
  });
});

describe("MultiEd25519PublicKey", () => {
  it("packs the keys and the threshold", () => {
    expect(publicKey.toString()).toEqual(multiEd25519.publicKeyBytes);
    expect(publicKey.toUint8Array().length).toEqual(3 * 32 + 1);
  });

  it("matches the keys derived from the seeds", () => {
    const derived = multiEd25519.seeds.map((hexInput) => new Ed25519PrivateKey({ hexInput }).publicKey().toString());
    expect(derived).toEqual(multiEd25519.publicKeys);
  });

  it("reads back what it writes", () => {
    const decoded = MultiEd25519PublicKey.deserialize(new Deserializer(publicKey.bcsToBytes()));
    expect(decoded.threshold).toEqual(2);
    expect(decoded.publicKeys.map((key) => key.toString())).toEqual(multiEd25519.publicKeys);
  });

  it.each([
    [1, 1, "Must have between 2 and 32 public keys, inclusive"],
    [3, 0, "Threshold must be between 1 and 3, inclusive"],
    [3, 4, "Threshold must be between 1 and 3, inclusive"],
  ])("with %i keys refuses threshold %i", (keys, threshold, message) => {
    const publicKeys = multiEd25519.publicKeys.slice(0, keys).map((hexInput) => new Ed25519PublicKey({ hexInput }));
    expect(() => new MultiEd25519PublicKey({ publicKeys, threshold })).toThrow(message);
  });

  it("fails the deserializer on a threshold above the key count", () => {
    const bytes = publicKey.toUint8Array();
    bytes[bytes.length - 1] = 4;
    const serializer = new Serializer();
    serializer.serializeBytes(bytes);
    const deserializer = new Deserializer(serializer.toUint8Array());
    expect(() => MultiEd25519PublicKey.deserialize(deserializer)).toThrow("Invalid MultiEd25519 threshold 4 for 3 keys");
    const error = deserializer.error();
    expect(error instanceof BcsError && error.invalidReason).toEqual(BcsInvalidReason.LENGTH_MISMATCH);
  });

  it("fails the deserializer on a length that is not keys plus one byte", () => {
    const deserializer = Deserializer.fromHex(`0x21${"00".repeat(33)}`);
    expect(() => MultiEd25519PublicKey.deserialize(deserializer)).toThrow("Invalid MultiEd25519 public key length 33");
  });

  describe("verifySignature", () => {
    it("accepts the fixture signature", () => {
      expect(publicKey.verifySignature({ message: multiEd25519.message, signature: fixtureSignature() })).toBe(true);
    });

    it("refuses another message", () => {
      expect(publicKey.verifySignature({ message: "0x00", signature: fixtureSignature() })).toBe(false);
    });

    it("refuses fewer signatures than the threshold", () => {
      const one = signatureOf(multiEd25519.signatures.slice(0, 1), [0]);
      expect(publicKey.verifySignature({ message: multiEd25519.message, signature: one })).toBe(false);
    });

    it("refuses signatures credited to the wrong keys", () => {
      const swapped = signatureOf(multiEd25519.signatures, [0, 1]);
      expect(publicKey.verifySignature({ message: multiEd25519.message, signature: swapped })).toBe(false);
    });

    it("refuses a bitmap naming a key it does not have", () => {
      const outside = signatureOf(multiEd25519.signatures, [0, 5]);
      expect(publicKey.verifySignature({ message: multiEd25519.message, signature: outside })).toBe(false);
    });

    it("refuses a signature of another kind", () => {
      const signature = new Ed25519Signature({ hexInput: multiEd25519.signatures[0] });
      expect(publicKey.verifySignature({ message: multiEd25519.message, signature })).toBe(false);
    });
  });
});

describe("MultiEd25519Signature", () => {
  it("packs the signatures and the bitmap", () => {
    const signature = fixtureSignature();
    expect(signature.bitmap).toEqual(new Uint8Array([0b10100000, 0, 0, 0]));
    expect(signature.toString()).toEqual(multiEd25519.signatureBytes);
  });

  it("reads back what it writes", () => {
    const decoded = MultiEd25519Signature.deserialize(new Deserializer(fixtureSignature().bcsToBytes()));
    expect(decoded.toString()).toEqual(multiEd25519.signatureBytes);
    expect(decoded.signatures.map((s) => s.toString())).toEqual(multiEd25519.signatures);
  });

  it("needs one signature per set bit", () => {
    expect(() => signatureOf(multiEd25519.signatures, [0])).toThrow("Expecting 1 signatures from the bitmap, got 2");
  });

  it("needs a 4 byte bitmap", () => {
    const signatures = multiEd25519.signatures.map((hexInput) => new Ed25519Signature({ hexInput }));
    expect(() => new MultiEd25519Signature({ signatures, bitmap: new Uint8Array([0b11000000]) })).toThrow(
      '"bitmap" length should be 4',
    );
  });

  it("fails the deserializer when the bitmap disagrees with the signatures", () => {
    const bytes = fixtureSignature().toUint8Array();
    bytes[bytes.length - 4] = 0b10000000;
    const serializer = new Serializer();
    serializer.serializeBytes(bytes);
    expect(() => MultiEd25519Signature.deserialize(new Deserializer(serializer.toUint8Array()))).toThrow(
      "MultiEd25519 bitmap does not match the number of signatures",
    );
  });
});
