// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import pino from "pino";

export type Logger = pino.Logger;

/**
 * A JSON logger on stdout. `LOG_LEVEL` in the environment wins over `level`.
 */
export const makeLogger = (level: pino.LevelWithSilent = "warn"): Logger =>
  pino({
    name: "move-txn-core",
    level: process.env.LOG_LEVEL ?? level,
  });

// Used by code that is not handed a logger through its config.
export const defaultLogger: Logger = makeLogger();
