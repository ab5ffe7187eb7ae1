// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export const DEFAULT_TXN_TIMEOUT_SEC = 20;

export const DEFAULT_MAX_GAS_AMOUNT = 100000;
export const DEFAULT_GAS_UNIT_PRICE = 100;
// Transaction expire timestamp
export const DEFAULT_TXN_EXP_SEC_FROM_NOW = 300;

// Interval between by-hash polls while a transaction is pending
export const TXN_POLL_INTERVAL_MS = 200;

export const RAW_TRANSACTION_SALT = "APTOS::RawTransaction";
export const RAW_TRANSACTION_WITH_DATA_SALT = "APTOS::RawTransactionWithData";
export const TRANSACTION_SALT = "APTOS::Transaction";
