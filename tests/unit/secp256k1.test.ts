// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { sha3_256 as sha3Hash } from "@noble/hashes/sha3";
import { secp256k1 as curve } from "@noble/curves/secp256k1";
import { BcsError, BcsInvalidReason, Deserializer } from "../../src/bcs/deserializer";
import { Hex } from "../../src/core/hex";
import { Secp256k1PrivateKey, Secp256k1PublicKey, Secp256k1Signature } from "../../src/crypto/secp256k1";
import { secp256k1 } from "./helper";

// the fixture signature with S replaced by n - S
const HIGH_S_SIGNATURE =
  "0xd0d634e843b61339473b028105930ace022980708b2855954b977da09df84a77f3f4973d63735e4abf65af7a4f13d9c2d2a099aa2b4ba95d044f6b4851c45377";

const prefixed = (lengthByte: string, hex: string) => `0x${lengthByte}${hex.slice(2)}`;

describe("Secp256k1PublicKey", () => {
  const publicKey = new Secp256k1PublicKey({ hexInput: secp256k1.publicKey });

  it("holds the uncompressed point", () => {
    expect(publicKey.toString()).toEqual(secp256k1.publicKey);
    expect(publicKey.toUint8Array()[0]).toEqual(0x04);
  });

  it("refuses a compressed point", () => {
    const compressed = curve.getPublicKey(Hex.fromHexInput({ hexInput: secp256k1.privateKey }).toUint8Array(), true);
    expect(() => new Secp256k1PublicKey({ hexInput: compressed })).toThrowError("PublicKey length should be 65");
  });

  it("writes and reads the key with a 65 byte length", () => {
    const encoded = prefixed("41", secp256k1.publicKey);
    expect(publicKey.bcsToHex().toString()).toEqual(encoded);
    expect(Secp256k1PublicKey.deserialize(Deserializer.fromHex(encoded)).toString()).toEqual(secp256k1.publicKey);
  });

  describe("verifySignature", () => {
    const signature = new Secp256k1Signature({ hexInput: secp256k1.signature });

    it("accepts the signature over the SHA3-256 digest", () => {
      expect(publicKey.verifySignature({ message: secp256k1.message, signature })).toBe(true);
      const digest = sha3Hash(Hex.fromHexInput({ hexInput: secp256k1.message }).toUint8Array());
      expect(curve.verify(signature.toUint8Array(), digest, publicKey.toUint8Array())).toBe(true);
    });

    it("refuses another message", () => {
      expect(publicKey.verifySignature({ message: "0x68656c6c6f", signature })).toBe(false);
    });

    it("refuses a signature from another key", () => {
      const other = Secp256k1PrivateKey.generate().sign({ message: secp256k1.message });
      expect(publicKey.verifySignature({ message: secp256k1.message, signature: other })).toBe(false);
    });

    it.each(["abc", "0xg1", ""])("returns false for the message %p, which is not hex", (message) => {
      expect(publicKey.verifySignature({ message, signature })).toBe(false);
    });
  });
});

describe("Secp256k1PrivateKey", () => {
  const privateKey = new Secp256k1PrivateKey({ hexInput: secp256k1.privateKey });

  it("derives the public key", () => {
    expect(privateKey.publicKey().toString()).toEqual(secp256k1.publicKey);
  });

  it("signs SHA3-256 of the message with a low S", () => {
    expect(privateKey.sign({ message: secp256k1.message }).toString()).toEqual(secp256k1.signature);
  });

  it("refuses a key of the wrong length", () => {
    expect(() => new Secp256k1PrivateKey({ hexInput: "0x0102" })).toThrowError("PrivateKey length should be 32");
  });

  it("writes and reads the scalar", () => {
    const encoded = prefixed("20", secp256k1.privateKey);
    expect(privateKey.bcsToHex().toString()).toEqual(encoded);
    expect(Secp256k1PrivateKey.deserialize(Deserializer.fromHex(encoded)).toString()).toEqual(secp256k1.privateKey);
  });

  it("round trips the AIP-80 form", () => {
    const aip80 = privateKey.toAIP80String();
    expect(aip80).toEqual(`secp256k1-priv-${secp256k1.privateKey}`);
    expect(new Secp256k1PrivateKey({ hexInput: aip80, strict: true }).toString()).toEqual(secp256k1.privateKey);
  });
});

describe("Secp256k1Signature", () => {
  it("refuses anything but 64 bytes", () => {
    expect(() => new Secp256k1Signature({ hexInput: new Uint8Array(65) })).toThrowError("Signature length should be 64");
  });

  it("refuses a high S value", () => {
    expect(() => new Secp256k1Signature({ hexInput: HIGH_S_SIGNATURE })).toThrowError(
      "Signature S value must be in the lower half of the curve order",
    );
  });

  it("writes and reads the signature", () => {
    const encoded = prefixed("40", secp256k1.signature);
    expect(new Secp256k1Signature({ hexInput: secp256k1.signature }).bcsToHex().toString()).toEqual(encoded);
    expect(Secp256k1Signature.deserialize(Deserializer.fromHex(encoded)).toString()).toEqual(secp256k1.signature);
  });

  it("fails the deserializer on a high S value", () => {
    const deserializer = Deserializer.fromHex(prefixed("40", HIGH_S_SIGNATURE));
    expect(() => Secp256k1Signature.deserialize(deserializer)).toThrowError(
      "Secp256k1 signature S value is in the upper half of the curve order",
    );
    const error = deserializer.error();
    expect(error).toBeInstanceOf(BcsError);
    expect(error instanceof BcsError && error.invalidReason).toEqual(BcsInvalidReason.INVALID_VALUE);
  });

  it("fails the deserializer on a short signature", () => {
    const deserializer = Deserializer.fromHex("0x03010203");
    expect(() => Secp256k1Signature.deserialize(deserializer)).toThrowError(
      "Secp256k1 signature must be 64 bytes, got 3",
    );
    const error = deserializer.error();
    expect(error instanceof BcsError && error.invalidReason).toEqual(BcsInvalidReason.LENGTH_MISMATCH);
  });
});
