// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./http_transport";
export * from "./node_config";
export * from "./transport";
