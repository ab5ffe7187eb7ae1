// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/**
 * This file contains the node calls that are not about one account or one transaction.
 * The transport and the transaction builder share them.
 */

import { NodeConfig } from "../api/node_config";
import { getFullNode, postFullNode } from "../client";
import { ViewFunctionPayload } from "../transactions/types/transactionPayload";
import { AnyNumber, LedgerInfo, MimeType, MoveValue } from "../types";

export async function getLedgerInfo(args: { config: NodeConfig }): Promise<LedgerInfo> {
  const { config } = args;
  const { data } = await getFullNode<LedgerInfo>({
    config,
    originMethod: "getLedgerInfo",
    path: "",
  });
  return data;
}

/**
 * Runs a view function through its BCS request body. The node answers in JSON.
 */
export async function view(args: {
  config: NodeConfig;
  payload: ViewFunctionPayload;
  ledgerVersion?: AnyNumber;
}): Promise<Array<MoveValue>> {
  const { config, payload, ledgerVersion } = args;
  const { data } = await postFullNode<Array<MoveValue>>({
    config,
    originMethod: "view",
    path: "view",
    contentType: MimeType.BCS_VIEW_FUNCTION,
    params: { ledger_version: ledgerVersion?.toString() },
    body: payload.bcsToBytes(),
  });
  return data;
}
