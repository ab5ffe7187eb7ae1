// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { sha3_256 as sha3Hash } from "@noble/hashes/sha3";
import { Serializer, Deserializer, Serializable } from "../../bcs";
import { Hex } from "../../core/hex";
import { TRANSACTION_SALT } from "../../utils/const";
import { concatBytes } from "../../utils/helpers";
import {
  TransactionAuthenticator,
  TransactionAuthenticatorFeePayer,
  TransactionAuthenticatorMultiAgent,
} from "../authenticator/transaction";
import { FeePayerRawTransaction, MultiAgentRawTransaction, RawTransaction, RawTransactionWithData } from "./rawTransaction";
import { generateSigningMessage, signingMessagePrefix } from "./signingMessage";

// index of the user transaction in the chain's Transaction enum
const USER_TRANSACTION_VARIANT = 0;

/**
 * A raw transaction and the authenticator proving its signers agreed to it. This is
 * the BCS body submitted to a node.
 */
export class SignedTransaction extends Serializable {
  constructor(
    public readonly rawTxn: RawTransaction,
    public readonly authenticator: TransactionAuthenticator,
  ) {
    super();
  }

  /**
   * What the authenticator's signatures cover. Multi-agent and fee-payer bodies are
   * rebuilt from the addresses the authenticator lists.
   */
  signedBody(): RawTransaction | RawTransactionWithData {
    const { authenticator, rawTxn } = this;
    if (authenticator instanceof TransactionAuthenticatorMultiAgent) {
      return new MultiAgentRawTransaction(rawTxn, authenticator.secondarySignerAddresses);
    }
    if (authenticator instanceof TransactionAuthenticatorFeePayer) {
      return new FeePayerRawTransaction(rawTxn, authenticator.secondarySignerAddresses, authenticator.feePayer.address);
    }
    return rawTxn;
  }

  verify(): boolean {
    return this.authenticator.verify(generateSigningMessage(this.signedBody()));
  }

  /**
   * The hash a node reports for this transaction once it is submitted.
   */
  hash(): string {
    const bytes = concatBytes(
      signingMessagePrefix(TRANSACTION_SALT),
      Uint8Array.of(USER_TRANSACTION_VARIANT),
      this.bcsToBytes(),
    );
    return Hex.fromHexInput({ hexInput: sha3Hash(bytes) }).toString();
  }

  serialize(serializer: Serializer): void {
    serializer.serialize(this.rawTxn);
    serializer.serialize(this.authenticator);
  }

  static deserialize(deserializer: Deserializer): SignedTransaction {
    return new SignedTransaction(RawTransaction.deserialize(deserializer), TransactionAuthenticator.deserialize(deserializer));
  }
}
