// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/**
 * The current version of the package. Sent to the node in the client header.
 */
export const VERSION = "0.1.0";
