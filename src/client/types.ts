// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { NodeRequest } from "../types";

/**
 * The API response type
 *
 * @param status - the response status. i.e 200
 * @param statusText - the response message
 * @param data the response data
 * @param url the url the request was made to
 */
export interface NodeResponse<Res> {
  status: number;
  statusText: string;
  data: Res;
  url: string;
}

/**
 * The type returned from an API error
 *
 * @param name - the error name "ApiError"
 * @param url the url the request was made to
 * @param status - the response status. i.e 400
 * @param statusText - the response message
 * @param data the decoded response body
 * @param request - the NodeRequest
 */
export class ApiError extends Error {
  readonly url: string;

  readonly status: number;

  readonly statusText: string;

  readonly data: unknown;

  readonly request: NodeRequest;

  constructor(request: NodeRequest, response: NodeResponse<unknown>, message: string) {
    super(message);

    this.name = "ApiError";
    this.url = response.url;
    this.status = response.status;
    this.statusText = response.statusText;
    this.data = response.data;
    this.request = request;
  }
}
