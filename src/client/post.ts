// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { NodeConfig } from "../api/node_config";
import { AnyNumber, ClientConfig, MimeType } from "../types";
import { nodeRequest } from "./core";
import { NodeResponse } from "./types";

export type PostRequestOptions = {
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
   * The content type of the request
   */
  contentType: MimeType;
  /**
   * The query parameters for the request
   */
  params?: Record<string, string | AnyNumber | boolean | undefined>;
  /**
   * The BCS body of the request
   */
  body: Uint8Array;
  /**
   * Specific client overrides for this request to override the config
   */
  overrides?: ClientConfig;
};

/**
 * Main function to do a Post request on the fullnode
 *
 * @param options PostRequestOptions
 * @returns
 */
export async function postFullNode<Res>(options: PostRequestOptions): Promise<NodeResponse<Res>> {
  const { originMethod, path, body, contentType, params, config, overrides } = options;

  return nodeRequest<Res>(
    {
      url: config.fullnode,
      method: "POST",
      originMethod,
      path,
      body,
      contentType: contentType.valueOf(),
      acceptType: MimeType.JSON,
      params,
      overrides: {
        ...config.clientConfig,
        ...overrides,
      },
    },
    config,
  );
}
