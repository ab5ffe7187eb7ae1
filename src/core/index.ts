// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./account_address";
export * from "./common";
export * from "./hex";
