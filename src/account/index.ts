// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./account";
export * from "./ed25519_account";
export * from "./multi_ed25519_account";
export * from "./multi_key_account";
export * from "./signer";
export * from "./single_key_account";
