// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress } from "../core";
import { Ed25519PrivateKey } from "../crypto/ed25519";
import { Secp256k1PrivateKey } from "../crypto/secp256k1";
import { SigningSchemeInput } from "../types";
import { Ed25519Account } from "./ed25519_account";
import { MultiEd25519Account } from "./multi_ed25519_account";
import { MultiKeyAccount } from "./multi_key_account";
import { SingleKeyAccount, SingleKeyPrivateKey } from "./single_key_account";

/**
 * Any account that can sign for itself.
 */
export type Account = Ed25519Account | SingleKeyAccount | MultiEd25519Account | MultiKeyAccount;

/**
 * Creates an account of a random key.
 *
 * Ed25519 keys default to the legacy scheme. Pass `legacy: false` for a SingleKey account;
 * Secp256k1 keys always take the SingleKey scheme.
 *
 * Note: Creating an account instance does not create the account onchain.
 */
export function generateAccount(args?: { scheme?: SigningSchemeInput; legacy?: boolean }): Ed25519Account | SingleKeyAccount {
  const scheme = args?.scheme ?? SigningSchemeInput.Ed25519;
  const legacy = args?.legacy ?? true;
  if (scheme === SigningSchemeInput.Ed25519 && legacy) {
    return Ed25519Account.generate();
  }
  return SingleKeyAccount.generate({ scheme });
}

/**
 * Creates an account of a known private key. Pass `address` for an account whose key was rotated.
 */
export function accountFromPrivateKey(args: {
  privateKey: SingleKeyPrivateKey;
  address?: AccountAddress;
  legacy?: boolean;
}): Ed25519Account | SingleKeyAccount {
  const { privateKey, address } = args;
  const legacy = args.legacy ?? true;
  if (privateKey instanceof Ed25519PrivateKey && legacy) {
    return new Ed25519Account({ privateKey, address });
  }
  if (privateKey instanceof Ed25519PrivateKey || privateKey instanceof Secp256k1PrivateKey) {
    return new SingleKeyAccount({ privateKey, address });
  }
  throw new Error("Unsupported private key type");
}
