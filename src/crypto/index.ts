// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./asymmetric_crypto";
export * from "./authentication_key";
export * from "./ed25519";
export * from "./multi_ed25519";
export * from "./multi_key";
export * from "./private_key";
export * from "./secp256k1";
export * from "./single_key";
