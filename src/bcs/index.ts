// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./consts";
export * from "./deserializer";
export * from "./serializer";
export * from "./serializable/move-primitives";
export * from "./serializable/move-structs";
