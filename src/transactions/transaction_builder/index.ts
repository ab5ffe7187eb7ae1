// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./builder_utils";
export * from "./function_abi";
export * from "./simulation";
export * from "./transaction_builder";
export * from "./types";
