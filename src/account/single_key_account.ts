// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { AuthenticationKey } from "../crypto/authentication_key";
import { Ed25519PrivateKey } from "../crypto/ed25519";
import { Secp256k1PrivateKey } from "../crypto/secp256k1";
import { AnyPublicKey, AnySignature } from "../crypto/single_key";
import { HexInput, SigningScheme, SigningSchemeInput } from "../types";
import { AccountAuthenticatorSingleKey } from "../transactions/authenticator/account";
import { getSigningMessage } from "../transactions/transaction_builder/transaction_builder";
import { simulationAuthenticator } from "../transactions/transaction_builder/simulation";
import { AnyRawTransaction } from "../transactions/transaction_builder/types";
import { Signer } from "./signer";

export type SingleKeyPrivateKey = Ed25519PrivateKey | Secp256k1PrivateKey;

/**
 * An account on the SingleKey scheme. The public key is tagged with its scheme, so the
 * same account type covers Ed25519 and Secp256k1 keys.
 */
export class SingleKeyAccount implements Signer {
  readonly privateKey: SingleKeyPrivateKey;

  readonly publicKey: AnyPublicKey;

  readonly accountAddress: AccountAddress;

  readonly signingScheme = SigningScheme.SingleKey;

  constructor(args: { privateKey: SingleKeyPrivateKey; address?: AccountAddress }) {
    const { privateKey, address } = args;
    this.privateKey = privateKey;
    this.publicKey = new AnyPublicKey(privateKey.publicKey());
    this.accountAddress = address ?? this.authKey().derivedAddress();
  }

  static generate(args?: { scheme?: SigningSchemeInput }): SingleKeyAccount {
    const scheme = args?.scheme ?? SigningSchemeInput.Ed25519;
    const privateKey =
      scheme === SigningSchemeInput.Secp256k1Ecdsa ? Secp256k1PrivateKey.generate() : Ed25519PrivateKey.generate();
    return new SingleKeyAccount({ privateKey });
  }

  authKey(): AuthenticationKey {
    return AuthenticationKey.fromPublicKey({ publicKey: this.publicKey });
  }

  sign(message: HexInput): AccountAuthenticatorSingleKey {
    return new AccountAuthenticatorSingleKey(this.publicKey, new AnySignature(this.privateKey.sign({ message })));
  }

  signTransaction(transaction: AnyRawTransaction): AccountAuthenticatorSingleKey {
    return this.sign(getSigningMessage(transaction));
  }

  verifySignature(args: { message: HexInput; signature: AnySignature }): boolean {
    return this.publicKey.verifySignature(args);
  }

  simulationAuthenticator(): AccountAuthenticatorSingleKey {
    const authenticator = simulationAuthenticator(this.publicKey);
    if (!(authenticator instanceof AccountAuthenticatorSingleKey)) {
      throw new Error("Expected a SingleKey simulation authenticator");
    }
    return authenticator;
  }
}
