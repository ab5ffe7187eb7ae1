// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { ClientConfig, NodeSettings, TransactionDefaults } from "../types";
import { Logger, defaultLogger } from "../utils/logger";

/**
 * This class holds the config information for a node connection.
 *
 * @public
 */
export class NodeConfig {
  /** The fullnode REST API base URL, without a trailing slash. */
  readonly fullnode: string;

  /** Set when the chain id is known up front; it is then never fetched. */
  readonly chainId?: number;

  readonly clientConfig: ClientConfig;

  readonly logger: Logger;

  readonly transactionDefaults: TransactionDefaults;

  constructor(settings: NodeSettings) {
    if (settings.fullnode.length === 0) {
      throw new Error("Please provide a fullnode url");
    }
    this.fullnode = settings.fullnode.replace(/\/+$/, "");
    this.chainId = settings.chainId;
    this.clientConfig = settings.clientConfig ?? {};
    this.logger = settings.logger ?? defaultLogger;
    this.transactionDefaults = settings.transactionDefaults ?? {};
  }

  /**
   * Returns the URL of `path` on the fullnode.
   *
   * @internal
   */
  getRequestUrl(path: string): string {
    return path.length === 0 ? this.fullnode : `${this.fullnode}/${path}`;
  }
}
