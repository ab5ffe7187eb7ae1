// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./chainId";
export * from "./identifier";
export * from "./moduleId";
export * from "./rawTransaction";
export * from "./scriptTransactionArguments";
export * from "./signedTransaction";
export * from "./signingMessage";
export * from "./transactionPayload";
export * from "./typeTag";
export * from "./typeTagParser";
