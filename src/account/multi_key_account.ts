// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { AuthenticationKey } from "../crypto/authentication_key";
import { MultiKey, MultiKeySignature } from "../crypto/multi_key";
import { HexInput, SigningScheme } from "../types";
import { AccountAuthenticatorMultiKey } from "../transactions/authenticator/account";
import { simulationAuthenticator } from "../transactions/transaction_builder/simulation";
import { getSigningMessage } from "../transactions/transaction_builder/transaction_builder";
import { AnyRawTransaction } from "../transactions/transaction_builder/types";
import { Ed25519Account } from "./ed25519_account";
import { Signer } from "./signer";
import { SingleKeyAccount } from "./single_key_account";

/**
 * A K-of-N account over keys of any single-key scheme. It is built from the MultiKey
 * and the single-key accounts of the keys it holds.
 *
 * @example
 * ```
 * const multiKey = new MultiKey({ publicKeys: [a.publicKey, b.publicKey, c.publicKey], signaturesRequired: 2 });
 * const account = new MultiKeyAccount({ multiKey, signers: [a, c] });
 * ```
 */
export class MultiKeyAccount implements Signer {
  readonly publicKey: MultiKey;

  readonly accountAddress: AccountAddress;

  readonly signingScheme = SigningScheme.MultiKey;

  private readonly signers: Array<{ index: number; signer: Ed25519Account | SingleKeyAccount }>;

  constructor(args: {
    multiKey: MultiKey;
    signers: Array<Ed25519Account | SingleKeyAccount>;
    address?: AccountAddress;
  }) {
    const { multiKey, signers, address } = args;
    this.signers = signers
      .map((signer) => ({ index: multiKey.getIndex(signer.publicKey), signer }))
      .sort((a, b) => a.index - b.index);

    if (new Set(this.signers.map(({ index }) => index)).size !== this.signers.length) {
      throw new Error("Duplicate signers");
    }
    if (this.signers.length < multiKey.signaturesRequired) {
      throw new Error(`At least ${multiKey.signaturesRequired} signers are required, got ${this.signers.length}`);
    }

    this.publicKey = multiKey;
    this.accountAddress = address ?? this.authKey().derivedAddress();
  }

  authKey(): AuthenticationKey {
    return AuthenticationKey.fromPublicKey({ publicKey: this.publicKey });
  }

  get signerIndices(): Array<number> {
    return this.signers.map(({ index }) => index);
  }

  sign(message: HexInput): AccountAuthenticatorMultiKey {
    const signatures = MultiKeySignature.fromIndexedSignatures(
      this.signers.map(({ index, signer }) => ({ index, signature: signer.privateKey.sign({ message }) })),
    );
    return new AccountAuthenticatorMultiKey(this.publicKey, signatures);
  }

  signTransaction(transaction: AnyRawTransaction): AccountAuthenticatorMultiKey {
    return this.sign(getSigningMessage(transaction));
  }

  simulationAuthenticator(): AccountAuthenticatorMultiKey {
    const authenticator = simulationAuthenticator(this.publicKey, this.signerIndices);
    if (!(authenticator instanceof AccountAuthenticatorMultiKey)) {
      throw new Error("Expected a MultiKey simulation authenticator");
    }
    return authenticator;
  }
}
