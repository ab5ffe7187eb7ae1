// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Deserializer } from "../../src/bcs/deserializer";
import { Ed25519PrivateKey, Ed25519Signature } from "../../src/crypto/ed25519";
import { MultiKey, MultiKeySignature } from "../../src/crypto/multi_key";
import { Secp256k1PrivateKey, Secp256k1Signature } from "../../src/crypto/secp256k1";
import { AnyPublicKey, AnySignature } from "../../src/crypto/single_key";
import { ed25519, secp256k1 } from "./helper";

describe("MultiKey", () => {
  const edKey = new Ed25519PrivateKey({ hexInput: ed25519.privateKey });
  const secpKey = new Secp256k1PrivateKey({ hexInput: secp256k1.privateKey });
  const otherKey = new Ed25519PrivateKey({ hexInput: new Uint8Array(32).fill(1) });
  const multiKey = new MultiKey({
    publicKeys: [edKey.publicKey(), secpKey.publicKey(), otherKey.publicKey()],
    signaturesRequired: 2,
  });
  const message = "0x68656c6c6f";

  it("wraps bare keys in AnyPublicKey", () => {
    expect(multiKey.publicKeys.every((key) => key instanceof AnyPublicKey)).toBe(true);
    expect(multiKey.getIndex(secpKey.publicKey())).toEqual(1);
    expect(multiKey.getIndex(new AnyPublicKey(otherKey.publicKey()))).toEqual(2);
  });

  it("throws for a key it does not hold", () => {
    expect(() => multiKey.getIndex(Ed25519PrivateKey.generate().publicKey())).toThrowError(
      "Public key not found in MultiKey",
    );
  });

  it("serializes the keys then the threshold", () => {
    const bytes = multiKey.bcsToBytes();
    expect(bytes[0]).toEqual(3);
    expect(bytes[bytes.length - 1]).toEqual(2);

    const decoded = MultiKey.deserialize(new Deserializer(bytes));
    expect(decoded.signaturesRequired).toEqual(2);
    expect(decoded.publicKeys.map((key) => key.toString())).toEqual(multiKey.publicKeys.map((key) => key.toString()));
  });

  it("validates the threshold", () => {
    expect(() => new MultiKey({ publicKeys: [edKey.publicKey()], signaturesRequired: 2 })).toThrowError(
      "signaturesRequired must be between 1 and 1, inclusive",
    );
  });

  it("verifies when enough signatures are valid", () => {
    const signature = MultiKeySignature.fromIndexedSignatures([
      { index: 2, signature: otherKey.sign({ message }) },
      { index: 0, signature: edKey.sign({ message }) },
    ]);
    expect(signature.bitmap).toEqual(new Uint8Array([0b10100000]));
    expect(multiKey.verifySignature({ message, signature })).toBe(true);
    expect(multiKey.verifySignature({ message: "0x00", signature })).toBe(false);
  });

  it("rejects too few signatures", () => {
    const signature = MultiKeySignature.fromIndexedSignatures([{ index: 1, signature: secpKey.sign({ message }) }]);
    expect(multiKey.verifySignature({ message, signature })).toBe(false);
  });

  it("rejects a signature placed at the wrong index", () => {
    const signature = MultiKeySignature.fromIndexedSignatures([
      { index: 0, signature: otherKey.sign({ message }) },
      { index: 2, signature: edKey.sign({ message }) },
    ]);
    expect(multiKey.verifySignature({ message, signature })).toBe(false);
  });
});

describe("MultiKeySignature", () => {
  const signer = new Ed25519PrivateKey({ hexInput: ed25519.privateKey });

  it("needs one signature per set bit", () => {
    const signature = new AnySignature(signer.sign({ message: ed25519.message }));
    expect(() => new MultiKeySignature({ signatures: [signature], bitmap: [0, 1] })).toThrowError(
      "Expecting 2 signatures from the bitmap, got 1",
    );
  });

  it("reads back what it writes", () => {
    const signature = MultiKeySignature.fromIndexedSignatures([
      { index: 9, signature: signer.sign({ message: ed25519.message }) },
    ]);
    expect(signature.bitmap).toEqual(new Uint8Array([0, 0b01000000]));

    const decoded = MultiKeySignature.deserialize(new Deserializer(signature.bcsToBytes()));
    expect(decoded.bitmap).toEqual(signature.bitmap);
    expect(decoded.signatures[0].signature.toString()).toEqual(ed25519.signedMessage);
  });

  it("decodes a signature encoded by other clients", () => {
    const secpPart =
      "118d6ebe543aaf3a541453f98a5748ab5b9e3f96d781b8c0a43740af2b65c03529fdf62b7de7aad9150770e0994dc4e0714795fdebf312be66cd0550c607755e";
    const edPart =
      "1a90421453aa53fa5a7aa3dfe70d913823cbf087bf372a762219ccc824d3a0eeecccaa9d34f22db4366aec61fb6c204d2440f4ed288bc7cc7e407b766723a609";
    // two signatures (secp256k1, then ed25519) and a one-byte bitmap 0b11000000
    const encoded = `0x020140${secpPart}0040${edPart}01c0`;

    const decoded = MultiKeySignature.deserialize(Deserializer.fromHex(encoded));
    expect(decoded.signatures.map((s) => s.signature)).toEqual([
      new Secp256k1Signature({ hexInput: `0x${secpPart}` }),
      new Ed25519Signature({ hexInput: `0x${edPart}` }),
    ]);
    expect(decoded.bitmap).toEqual(new Uint8Array([0xc0]));
    expect(decoded.toString()).toEqual(encoded);
    expect(decoded.bcsToBytes().length).toEqual(135);
  });
});
