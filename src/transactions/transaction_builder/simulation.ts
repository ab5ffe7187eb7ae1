// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { PublicKey, Signature } from "../../crypto/asymmetric_crypto";
import { Ed25519PublicKey, Ed25519Signature } from "../../crypto/ed25519";
import { MultiEd25519PublicKey, MultiEd25519Signature } from "../../crypto/multi_ed25519";
import { MultiKey, MultiKeySignature } from "../../crypto/multi_key";
import { Secp256k1PublicKey, Secp256k1Signature } from "../../crypto/secp256k1";
import { AnyPublicKey, AnySignature } from "../../crypto/single_key";
import {
  AccountAuthenticator,
  AccountAuthenticatorEd25519,
  AccountAuthenticatorMultiEd25519,
  AccountAuthenticatorMultiKey,
  AccountAuthenticatorSingleKey,
} from "../authenticator/account";
import { SimulationPublicKey } from "./types";

/**
 * An all-zero signature of the scheme of `publicKey`.
 */
export function zeroSignature(publicKey: PublicKey): Signature {
  if (publicKey instanceof Ed25519PublicKey) {
    return new Ed25519Signature({ hexInput: new Uint8Array(Ed25519Signature.LENGTH) });
  }
  if (publicKey instanceof Secp256k1PublicKey) {
    return new Secp256k1Signature({ hexInput: new Uint8Array(Secp256k1Signature.LENGTH) });
  }
  if (publicKey instanceof AnyPublicKey) {
    return new AnySignature(zeroSignature(publicKey.publicKey));
  }
  throw new Error(`Cannot simulate a signature for ${publicKey.constructor.name}`);
}

function firstBits(count: number): Array<number> {
  return Array.from({ length: count }, (_, i) => i);
}

/**
 * The authenticator a simulation sends for `publicKey`: the real key with zero
 * signatures. For multi keys `bits` picks the keys that "sign"; by default the first
 * `threshold` of them.
 */
export function simulationAuthenticator(publicKey: SimulationPublicKey, bits?: Array<number>): AccountAuthenticator {
  if (publicKey instanceof Ed25519PublicKey) {
    return new AccountAuthenticatorEd25519(
      publicKey,
      new Ed25519Signature({ hexInput: new Uint8Array(Ed25519Signature.LENGTH) }),
    );
  }
  if (publicKey instanceof AnyPublicKey) {
    return new AccountAuthenticatorSingleKey(publicKey, new AnySignature(zeroSignature(publicKey.publicKey)));
  }
  if (publicKey instanceof MultiEd25519PublicKey) {
    const signers = bits ?? firstBits(publicKey.threshold);
    const signatures = signers.map(
      () => new Ed25519Signature({ hexInput: new Uint8Array(Ed25519Signature.LENGTH) }),
    );
    return new AccountAuthenticatorMultiEd25519(publicKey, new MultiEd25519Signature({ signatures, bitmap: signers }));
  }
  if (publicKey instanceof MultiKey) {
    const signers = bits ?? firstBits(publicKey.signaturesRequired);
    const signatures = MultiKeySignature.fromIndexedSignatures(
      signers.map((index) => ({ index, signature: zeroSignature(publicKey.publicKeys[index]) })),
    );
    return new AccountAuthenticatorMultiKey(publicKey, signatures);
  }
  throw new Error("Unsupported public key for simulation");
}
