// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { ViewFunctionPayload } from "../transactions/types/transactionPayload";
import { AnyNumber, MoveValue, TransactionDefaults, TransactionResponse, WaitForTransactionOptions } from "../types";

/**
 * What the transaction builder needs from a node. `HttpTransport` talks to the REST API;
 * tests and other hosts can supply their own.
 */
export interface Transport {
  /**
   * Gas and expiration used by `buildTransaction` when neither its options nor its
   * `defaults` argument set them.
   */
  readonly transactionDefaults?: TransactionDefaults;

  getChainId(): Promise<number>;

  /**
   * The next sequence number of `address`. An account that does not exist yet is at 0.
   */
  getSequenceNumber(address: AccountAddress): Promise<bigint>;

  /**
   * Submits BCS signed transaction bytes and resolves to the transaction hash.
   */
  submitSignedTransaction(signedTransaction: Uint8Array): Promise<string>;

  waitForTransaction(hash: string, options?: WaitForTransactionOptions): Promise<TransactionResponse>;

  view(payload: ViewFunctionPayload, ledgerVersion?: AnyNumber): Promise<Array<MoveValue>>;
}
