// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./const";
export * from "./helpers";
export * from "./logger";
export * from "./memoize";
