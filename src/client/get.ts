// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { NodeResponse } from "./types";
import { nodeRequest } from "./core";
import { AnyNumber, ClientConfig, MimeType } from "../types";
import { NodeConfig } from "../api/node_config";

export type GetRequestOptions = {
  /**
   * The config for the API client
   */
  config: NodeConfig;
  /**
   * The name of the API method
   */
  originMethod: string;
  /**
   * The URL path to the API method
   */
  path: string;
  /**
   * The accepted content type of the response of the API
   */
  acceptType?: MimeType;
  /**
   * The query parameters for the request
   */
  params?: Record<string, string | AnyNumber | boolean | undefined>;
  /**
   * Specific client overrides for this request to override the config
   */
  overrides?: ClientConfig;
};

/**
 * Main function to do a Get request on the fullnode
 *
 * @param options GetRequestOptions
 * @returns
 */
export async function getFullNode<Res>(options: GetRequestOptions): Promise<NodeResponse<Res>> {
  const { config, overrides, params, acceptType, path, originMethod } = options;

  return nodeRequest<Res>(
    {
      url: config.fullnode,
      method: "GET",
      originMethod,
      path,
      acceptType: acceptType?.valueOf(),
      params,
      overrides: {
        ...config.clientConfig,
        ...overrides,
      },
    },
    config,
  );
}
