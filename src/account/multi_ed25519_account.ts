// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { AuthenticationKey } from "../crypto/authentication_key";
import { Ed25519PrivateKey } from "../crypto/ed25519";
import { MultiEd25519PublicKey, MultiEd25519Signature } from "../crypto/multi_ed25519";
import { HexInput, SigningScheme } from "../types";
import { AccountAuthenticatorMultiEd25519 } from "../transactions/authenticator/account";
import { simulationAuthenticator } from "../transactions/transaction_builder/simulation";
import { getSigningMessage } from "../transactions/transaction_builder/transaction_builder";
import { AnyRawTransaction } from "../transactions/transaction_builder/types";
import { Signer } from "./signer";

/**
 * A K-of-N legacy multisig account. It holds the private keys of some of the N keys,
 * at least K, and signs with all of them.
 */
export class MultiEd25519Account implements Signer {
  readonly publicKey: MultiEd25519PublicKey;

  readonly accountAddress: AccountAddress;

  readonly signingScheme = SigningScheme.MultiEd25519;

  /**
   * The held keys in ascending order of their position in `publicKey`.
   */
  private readonly signers: Array<{ index: number; privateKey: Ed25519PrivateKey }>;

  constructor(args: { publicKey: MultiEd25519PublicKey; signers: Array<Ed25519PrivateKey>; address?: AccountAddress }) {
    const { publicKey, signers, address } = args;
    const positions = publicKey.publicKeys.map((key) => key.toString());
    this.signers = signers
      .map((privateKey) => {
        const index = positions.indexOf(privateKey.publicKey().toString());
        if (index === -1) {
          throw new Error("Signer is not one of the keys of the MultiEd25519 public key");
        }
        return { index, privateKey };
      })
      .sort((a, b) => a.index - b.index);

    if (new Set(this.signers.map(({ index }) => index)).size !== this.signers.length) {
      throw new Error("Duplicate signers");
    }
    if (this.signers.length < publicKey.threshold) {
      throw new Error(`At least ${publicKey.threshold} signers are required, got ${this.signers.length}`);
    }

    this.publicKey = publicKey;
    this.accountAddress = address ?? this.authKey().derivedAddress();
  }

  authKey(): AuthenticationKey {
    return AuthenticationKey.fromPublicKey({ publicKey: this.publicKey });
  }

  get signerIndices(): Array<number> {
    return this.signers.map(({ index }) => index);
  }

  sign(message: HexInput): AccountAuthenticatorMultiEd25519 {
    const signatures = this.signers.map(({ privateKey }) => privateKey.sign({ message }));
    return new AccountAuthenticatorMultiEd25519(
      this.publicKey,
      new MultiEd25519Signature({ signatures, bitmap: this.signerIndices }),
    );
  }

  signTransaction(transaction: AnyRawTransaction): AccountAuthenticatorMultiEd25519 {
    return this.sign(getSigningMessage(transaction));
  }

  simulationAuthenticator(): AccountAuthenticatorMultiEd25519 {
    const authenticator = simulationAuthenticator(this.publicKey, this.signerIndices);
    if (!(authenticator instanceof AccountAuthenticatorMultiEd25519)) {
      throw new Error("Expected a MultiEd25519 simulation authenticator");
    }
    return authenticator;
  }
}
