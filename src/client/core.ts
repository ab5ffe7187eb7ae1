// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import aptosClient from "@aptos-labs/aptos-client";
import { ApiError, NodeResponse } from "./types";
import { VERSION } from "../version";
import { ClientConfig, MimeType, NodeRequest } from "../types";
import { NodeConfig } from "../api/node_config";

/**
 * Meaningful errors map
 */
const errors: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  429: "Too Many Requests",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
};

function buildHeaders(contentType?: string, acceptType?: string, overrides?: ClientConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  Object.entries(overrides?.HEADERS ?? {}).forEach(([key, value]) => {
    headers[key] = String(value);
  });
  headers["x-aptos-client"] = `move-txn-core/${VERSION}`;
  headers["content-type"] = contentType ?? MimeType.JSON;
  if (acceptType !== undefined) {
    headers.accept = acceptType;
  }
  if (overrides?.TOKEN) {
    headers.Authorization = `Bearer ${overrides.TOKEN}`;
  }
  return headers;
}

/**
 * The main function to use when doing an API request.
 *
 * @param options NodeRequest
 * @param config The config of the node connection
 * @returns the response, or throws ApiError for a non-2xx status
 */
export async function nodeRequest<Res>(options: NodeRequest, config: NodeConfig): Promise<NodeResponse<Res>> {
  const { url, path, method, body, contentType, acceptType, params, overrides, originMethod } = options;
  const fullUrl = path === undefined || path.length === 0 ? url : `${url}/${path}`;

  /**
   * make a call using the @aptos-labs/aptos-client package
   * {@link https://www.npmjs.com/package/@aptos-labs/aptos-client}
   */
  const response = await aptosClient<Res>({
    url: fullUrl,
    method,
    body,
    params,
    headers: buildHeaders(contentType, acceptType, overrides),
    overrides,
  });
  const result: NodeResponse<Res> = {
    status: response.status,
    statusText: response.statusText,
    data: response.data,
    url: fullUrl,
  };

  config.logger.debug({ method, path: path ?? "", status: result.status, originMethod }, "node request");

  if (result.status >= 200 && result.status < 300) {
    return result;
  }
  const errorMessage = errors[result.status];
  throw new ApiError(options, result, errorMessage ?? "Generic Error");
}
