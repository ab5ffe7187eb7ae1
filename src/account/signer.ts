// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { AuthenticationKey } from "../crypto/authentication_key";
import { HexInput } from "../types";
import { AccountAuthenticator } from "../transactions/authenticator/account";
import { AnyRawTransaction, SimulationPublicKey } from "../transactions/transaction_builder/types";

/**
 * Anything that can authorize a transaction for an account.
 */
export interface Signer {
  readonly accountAddress: AccountAddress;

  readonly publicKey: SimulationPublicKey;

  authKey(): AuthenticationKey;

  /**
   * Signs `message` as-is and wraps the signature with the public key.
   */
  sign(message: HexInput): AccountAuthenticator;

  /**
   * Signs the signing message of `transaction`.
   */
  signTransaction(transaction: AnyRawTransaction): AccountAuthenticator;

  /**
   * This account's authenticator with zero signatures, for simulating a transaction.
   */
  simulationAuthenticator(): AccountAuthenticator;
}
