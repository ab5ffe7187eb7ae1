// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./account";
export * from "./transaction";
