// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./authenticator";
export * from "./transaction_builder";
export * from "./types";
