// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./core";
export * from "./get";
export * from "./post";
export * from "./types";
