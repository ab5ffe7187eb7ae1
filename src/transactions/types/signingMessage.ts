// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { sha3_256 as sha3Hash } from "@noble/hashes/sha3";
import { RAW_TRANSACTION_SALT, RAW_TRANSACTION_WITH_DATA_SALT } from "../../utils/const";
import { concatBytes } from "../../utils/helpers";
import { RawTransaction, RawTransactionWithData } from "./rawTransaction";

/**
 * The 32-byte domain separator of a salt, `SHA3-256(salt)`.
 */
export function signingMessagePrefix(salt: string): Uint8Array {
  return sha3Hash(salt);
}

/**
 * The bytes a signer signs for a transaction body: the domain separator of its kind
 * followed by its BCS. A plain raw transaction uses `APTOS::RawTransaction`; multi-agent
 * and fee-payer bodies use `APTOS::RawTransactionWithData`.
 */
export function generateSigningMessage(body: RawTransaction | RawTransactionWithData): Uint8Array {
  const salt = body instanceof RawTransaction ? RAW_TRANSACTION_SALT : RAW_TRANSACTION_WITH_DATA_SALT;
  return concatBytes(signingMessagePrefix(salt), body.bcsToBytes());
}
