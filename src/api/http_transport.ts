// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { getModule, getSequenceNumber } from "../internal/account";
import { getLedgerInfo, view } from "../internal/general";
import { submitTransaction, waitForTransaction } from "../internal/transaction";
import { ViewFunctionPayload } from "../transactions/types/transactionPayload";
import {
  AnyNumber,
  MoveModule,
  MoveModuleId,
  MoveValue,
  NodeSettings,
  TransactionDefaults,
  TransactionResponse,
  WaitForTransactionOptions,
} from "../types";
import { memoizeAsync } from "../utils/memoize";
import { NodeConfig } from "./node_config";
import { Transport } from "./transport";

/**
 * A `Transport` over the fullnode REST API.
 *
 * @example
 * ```
 * const transport = new HttpTransport({ fullnode: "http://127.0.0.1:8080/v1" });
 * const chainId = await transport.getChainId();
 * ```
 */
export class HttpTransport implements Transport {
  readonly config: NodeConfig;

  private readonly fetchChainId: () => Promise<number>;

  constructor(settings: NodeSettings | NodeConfig) {
    this.config = settings instanceof NodeConfig ? settings : new NodeConfig(settings);
    this.fetchChainId = memoizeAsync(async () => {
      const { chain_id: chainId } = await getLedgerInfo({ config: this.config });
      return chainId;
    });
  }

  get transactionDefaults(): TransactionDefaults {
    return this.config.transactionDefaults;
  }

  async getChainId(): Promise<number> {
    if (this.config.chainId !== undefined) {
      return this.config.chainId;
    }
    return this.fetchChainId();
  }

  async getSequenceNumber(address: AccountAddress): Promise<bigint> {
    return getSequenceNumber({ config: this.config, accountAddress: address });
  }

  async submitSignedTransaction(signedTransaction: Uint8Array): Promise<string> {
    const { hash } = await submitTransaction({ config: this.config, signedTransaction });
    return hash;
  }

  async waitForTransaction(hash: string, options?: WaitForTransactionOptions): Promise<TransactionResponse> {
    return waitForTransaction({ config: this.config, txnHash: hash, options });
  }

  async view(payload: ViewFunctionPayload, ledgerVersion?: AnyNumber): Promise<Array<MoveValue>> {
    return view({ config: this.config, payload, ledgerVersion });
  }

  /**
   * The ABI of a published module, for binding entry and view function arguments.
   */
  async getModuleAbi(moduleId: MoveModuleId): Promise<MoveModule> {
    const [address, moduleName] = moduleId.split("::");
    const { abi } = await getModule({
      config: this.config,
      accountAddress: AccountAddress.fromStringRelaxed({ input: address }),
      moduleName,
    });
    if (abi === undefined) {
      throw new Error(`The node returned no ABI for module ${moduleId}`);
    }
    return abi;
  }
}
