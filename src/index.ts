// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./account";
export * from "./api";
export * from "./bcs";
export * from "./client";
export * from "./core";
export * from "./crypto";
export { FailedTransactionError, WaitForTransactionError } from "./internal/transaction";
export * from "./transactions";
export * from "./types";
export * from "./utils";
export * from "./version";
