// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/**
 * This file contains the transaction calls of the transport: submit, look up by hash and
 * wait for a transaction to leave the mempool.
 */

import { NodeConfig } from "../api/node_config";
import { ApiError, getFullNode, postFullNode } from "../client";
import {
  MimeType,
  PendingTransactionResponse,
  TransactionResponse,
  WaitForTransactionOptions,
  isPendingTransaction,
} from "../types";
import { DEFAULT_TXN_TIMEOUT_SEC, TXN_POLL_INTERVAL_MS } from "../utils/const";
import { sleep } from "../utils/helpers";

export async function submitTransaction(args: {
  config: NodeConfig;
  signedTransaction: Uint8Array;
}): Promise<PendingTransactionResponse> {
  const { config, signedTransaction } = args;
  const { data } = await postFullNode<PendingTransactionResponse>({
    config,
    originMethod: "submitTransaction",
    path: "transactions",
    contentType: MimeType.BCS_SIGNED_TRANSACTION,
    body: signedTransaction,
  });
  return data;
}

export async function getTransactionByHash(args: { config: NodeConfig; txnHash: string }): Promise<TransactionResponse> {
  const { config, txnHash } = args;
  const { data } = await getFullNode<TransactionResponse>({
    config,
    path: `transactions/by_hash/${txnHash}`,
    originMethod: "getTransactionByHash",
  });
  return data;
}

/**
 * Long-polls the node once; it answers when the transaction commits or after its own
 * short timeout, in which case the transaction may still be pending.
 */
async function waitByHash(args: { config: NodeConfig; txnHash: string }): Promise<TransactionResponse> {
  const { config, txnHash } = args;
  const { data } = await getFullNode<TransactionResponse>({
    config,
    path: `transactions/wait_by_hash/${txnHash}`,
    originMethod: "waitByHash",
  });
  return data;
}

// Retried: not found yet (404) and server errors. Other 4xx are final.
function isRetryable(e: unknown): boolean {
  return e instanceof ApiError && (e.status === 404 || e.status >= 500);
}

/**
 * Polls until `txnHash` leaves the pending state, first through the long-poll
 * `wait_by_hash` endpoint and then every poll interval by hash.
 *
 * Resolves with the committed transaction. Throws the `ApiError` of a rejected request,
 * a `WaitForTransactionError` once `timeoutSecs` (default 20) pass, and a
 * `FailedTransactionError` for a committed but aborted transaction unless
 * `checkSuccess` is false.
 */
export async function waitForTransaction(args: {
  config: NodeConfig;
  txnHash: string;
  options?: WaitForTransactionOptions;
}): Promise<TransactionResponse> {
  const { config, txnHash, options } = args;
  const timeoutSecs = options?.timeoutSecs ?? DEFAULT_TXN_TIMEOUT_SEC;
  const checkSuccess = options?.checkSuccess ?? true;
  const deadline = Date.now() + timeoutSecs * 1000;

  let latest: TransactionResponse | undefined;
  try {
    latest = await waitByHash({ config, txnHash });
  } catch (e) {
    if (!isRetryable(e)) {
      throw e;
    }
  }

  while ((latest === undefined || isPendingTransaction(latest)) && Date.now() < deadline) {
    // eslint-disable-next-line no-await-in-loop
    await sleep(TXN_POLL_INTERVAL_MS);
    try {
      // eslint-disable-next-line no-await-in-loop
      latest = await getTransactionByHash({ config, txnHash });
    } catch (e) {
      if (!isRetryable(e)) {
        throw e;
      }
    }
  }

  if (latest === undefined || isPendingTransaction(latest)) {
    throw new WaitForTransactionError(
      `Waiting for transaction ${txnHash} timed out after ${timeoutSecs} seconds`,
      latest,
    );
  }
  if (checkSuccess && !latest.success) {
    throw new FailedTransactionError(`Transaction ${txnHash} failed with an error: ${latest.vm_status}`, latest);
  }
  return latest;
}

// Carries the last response seen, if any, before the deadline.
export class WaitForTransactionError extends Error {
  constructor(
    message: string,
    public readonly lastSubmittedTransaction?: TransactionResponse,
  ) {
    super(message);
    this.name = "WaitForTransactionError";
  }
}

// A committed transaction whose execution did not succeed.
export class FailedTransactionError extends Error {
  constructor(
    message: string,
    public readonly transaction: TransactionResponse,
  ) {
    super(message);
    this.name = "FailedTransactionError";
  }
}
