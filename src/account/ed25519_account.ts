// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { AuthenticationKey } from "../crypto/authentication_key";
import { Ed25519PrivateKey, Ed25519PublicKey, Ed25519Signature } from "../crypto/ed25519";
import { HexInput, SigningScheme } from "../types";
import { AccountAuthenticatorEd25519 } from "../transactions/authenticator/account";
import { getSigningMessage } from "../transactions/transaction_builder/transaction_builder";
import { AnyRawTransaction } from "../transactions/transaction_builder/types";
import { Signer } from "./signer";

/**
 * An account on the legacy Ed25519 scheme: the authentication key hashes the bare
 * public key.
 *
 * Note: Creating an account instance does not create the account onchain.
 */
export class Ed25519Account implements Signer {
  readonly privateKey: Ed25519PrivateKey;

  readonly publicKey: Ed25519PublicKey;

  readonly accountAddress: AccountAddress;

  readonly signingScheme = SigningScheme.Ed25519;

  /**
   * @param args.privateKey The account's private key
   * @param args.address optional. Defaults to the address derived from the key; pass it
   * for an account whose key was rotated
   */
  constructor(args: { privateKey: Ed25519PrivateKey; address?: AccountAddress }) {
    const { privateKey, address } = args;
    this.privateKey = privateKey;
    this.publicKey = privateKey.publicKey();
    this.accountAddress = address ?? this.authKey().derivedAddress();
  }

  static generate(): Ed25519Account {
    return new Ed25519Account({ privateKey: Ed25519PrivateKey.generate() });
  }

  authKey(): AuthenticationKey {
    return AuthenticationKey.fromPublicKey({ publicKey: this.publicKey, legacy: true });
  }

  sign(message: HexInput): AccountAuthenticatorEd25519 {
    return new AccountAuthenticatorEd25519(this.publicKey, this.privateKey.sign({ message }));
  }

  signTransaction(transaction: AnyRawTransaction): AccountAuthenticatorEd25519 {
    return this.sign(getSigningMessage(transaction));
  }

  verifySignature(args: { message: HexInput; signature: Ed25519Signature }): boolean {
    return this.publicKey.verifySignature(args);
  }

  simulationAuthenticator(): AccountAuthenticatorEd25519 {
    return new AccountAuthenticatorEd25519(
      this.publicKey,
      new Ed25519Signature({ hexInput: new Uint8Array(Ed25519Signature.LENGTH) }),
    );
  }
}
