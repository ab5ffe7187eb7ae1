// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/**
 * This file contains the account queries of the transport.
 */

import { NodeConfig } from "../api/node_config";
import { ApiError, getFullNode } from "../client";
import { AccountAddress } from "../core";
import { AccountData, AnyNumber, MoveModuleBytecode } from "../types";

export async function getInfo(args: { config: NodeConfig; accountAddress: AccountAddress }): Promise<AccountData> {
  const { config, accountAddress } = args;
  const { data } = await getFullNode<AccountData>({
    config,
    originMethod: "getInfo",
    path: `accounts/${accountAddress.toStringLong()}`,
  });
  return data;
}

/**
 * The sequence number the next transaction of the account must carry. An account the
 * node does not know yet starts at 0.
 */
export async function getSequenceNumber(args: { config: NodeConfig; accountAddress: AccountAddress }): Promise<bigint> {
  try {
    const { sequence_number: sequenceNumber } = await getInfo(args);
    return BigInt(sequenceNumber);
  } catch (e) {
    if (e instanceof ApiError && e.status === 404) {
      return 0n;
    }
    throw e;
  }
}

/**
 * Queries for a move module given account address and module name
 *
 * @param args.accountAddress The account the module is published under
 * @param args.moduleName The name of the module
 * @param args.ledgerVersion Specifies ledger version of transactions. By default latest version will be used
 * @returns The move module, with its ABI when the node returns one.
 */
export async function getModule(args: {
  config: NodeConfig;
  accountAddress: AccountAddress;
  moduleName: string;
  ledgerVersion?: AnyNumber;
}): Promise<MoveModuleBytecode> {
  const { config, accountAddress, moduleName, ledgerVersion } = args;
  const { data } = await getFullNode<MoveModuleBytecode>({
    config,
    originMethod: "getModule",
    path: `accounts/${accountAddress.toStringLong()}/module/${moduleName}`,
    params: { ledger_version: ledgerVersion?.toString() },
  });
  return data;
}
