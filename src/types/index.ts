// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import type { Logger } from "pino";

export type AnyNumber = number | bigint;
export type HexInput = string | Uint8Array;

export type Uint8 = number;
export type Uint16 = number;
export type Uint32 = number;
export type Uint64 = bigint;
export type Uint128 = bigint;
export type Uint256 = bigint;

export type Int8 = number;
export type Int16 = number;
export type Int32 = number;
export type Int64 = bigint;
export type Int128 = bigint;
export type Int256 = bigint;

/**
 * BCS discriminants of the TypeTag enum.
 */
export enum TypeTagVariants {
  Bool = 0,
  U8 = 1,
  U64 = 2,
  U128 = 3,
  Address = 4,
  Signer = 5,
  Vector = 6,
  Struct = 7,
  U16 = 8,
  U32 = 9,
  U256 = 10,
  I8 = 11,
  I16 = 12,
  I32 = 13,
  I64 = 14,
  I128 = 15,
  I256 = 16,
  Generic = 254,
  Reference = 255,
}

export enum ScriptTransactionArgumentVariants {
  U8 = 0,
  U64 = 1,
  U128 = 2,
  Address = 3,
  U8Vector = 4,
  Bool = 5,
  U16 = 6,
  U32 = 7,
  U256 = 8,
}

export enum TransactionPayloadVariants {
  Script = 0,
  // Deprecated on chain, never produced or accepted.
  ModuleBundle = 1,
  EntryFunction = 2,
  Multisig = 3,
}

export enum MultisigTransactionPayloadVariants {
  EntryFunction = 0,
}

export enum TransactionVariants {
  MultiAgentTransaction = 0,
  FeePayerTransaction = 1,
}

export enum TransactionAuthenticatorVariant {
  Ed25519 = 0,
  MultiEd25519 = 1,
  MultiAgent = 2,
  FeePayer = 3,
  SingleSender = 4,
}

export enum AccountAuthenticatorVariant {
  Ed25519 = 0,
  MultiEd25519 = 1,
  SingleKey = 2,
  MultiKey = 3,
  NoAccountAuthenticator = 4,
}

export enum AnyPublicKeyVariant {
  Ed25519 = 0,
  Secp256k1 = 1,
  Secp256r1 = 2,
  Keyless = 3,
}

export enum AnySignatureVariant {
  Ed25519 = 0,
  Secp256k1 = 1,
  WebAuthn = 2,
  Keyless = 3,
}

/**
 * Scheme byte appended to public key bytes before hashing into an authentication key.
 */
export enum SigningScheme {
  Ed25519 = 0,
  MultiEd25519 = 1,
  SingleKey = 2,
  MultiKey = 3,
}

/**
 * Scheme bytes for addresses that are not derived from a public key.
 */
export enum DeriveScheme {
  DeriveObjectAddressFromObject = 0xfc,
  DeriveObjectAddressFromGuid = 0xfd,
  DeriveObjectAddressFromSeed = 0xfe,
  DeriveResourceAccountAddress = 0xff,
}

export type AuthenticationKeyScheme = SigningScheme | DeriveScheme;

/**
 * The signing scheme an account signer uses, which picks the authenticator variant it produces.
 */
export enum SigningSchemeInput {
  Ed25519 = "ed25519",
  Secp256k1Ecdsa = "secp256k1",
}

export enum MimeType {
  JSON = "application/json",
  BCS_SIGNED_TRANSACTION = "application/x.aptos.signed_transaction+bcs",
  BCS_VIEW_FUNCTION = "application/x.aptos.view_function+bcs",
}

/**
 * Optional headers and bearer token applied to every request.
 */
export type ClientConfig = {
  TOKEN?: string;
  HEADERS?: Record<string, string | number | boolean>;
};

export type NodeSettings = {
  /** Base URL of the fullnode REST API, e.g. http://127.0.0.1:8080/v1 */
  readonly fullnode: string;

  /** When set, the chain id is never fetched. */
  readonly chainId?: number;

  readonly clientConfig?: ClientConfig;

  readonly logger?: Logger;

  readonly transactionDefaults?: TransactionDefaults;
};

export type TransactionDefaults = {
  maxGasAmount?: AnyNumber;
  gasUnitPrice?: AnyNumber;
  expirationSeconds?: number;
};

export type NodeRequest = {
  url: string;
  method: "GET" | "POST";
  path?: string;
  body?: Uint8Array;
  contentType?: string;
  acceptType?: string;
  params?: Record<string, string | AnyNumber | boolean | undefined>;
  originMethod?: string;
  overrides?: ClientConfig;
};

/**
 * A decoded JSON value as returned by a view function.
 */
export type MoveValue = boolean | number | string | null | MoveValue[] | { [key: string]: MoveValue };

export type MoveType = string;

export type MoveFunctionVisibility = "private" | "public" | "friend";

export type MoveAbility = "copy" | "drop" | "store" | "key";

export type MoveFunctionGenericTypeParam = {
  constraints: Array<MoveAbility>;
};

export type MoveFunction = {
  name: string;
  visibility: MoveFunctionVisibility;
  is_entry: boolean;
  is_view: boolean;
  generic_type_params: Array<MoveFunctionGenericTypeParam>;
  params: Array<MoveType>;
  return: Array<MoveType>;
};

export type MoveModuleId = `${string}::${string}`;

export type MoveFunctionId = `${string}::${string}::${string}`;

export type MoveModule = {
  address: string;
  name: string;
  friends: Array<MoveModuleId>;
  exposed_functions: Array<MoveFunction>;
};

export type MoveModuleBytecode = {
  bytecode: string;
  abi?: MoveModule;
};

export type AccountData = {
  sequence_number: string;
  authentication_key: string;
};

export type LedgerInfo = {
  chain_id: number;
  epoch: string;
  ledger_version: string;
  ledger_timestamp: string;
  block_height: string;
};

export type PendingTransactionResponse = {
  type: "pending_transaction";
  hash: string;
  sender: string;
  sequence_number: string;
};

export type CommittedTransactionResponse = {
  type: string;
  hash: string;
  version: string;
  success: boolean;
  vm_status: string;
  gas_used: string;
};

export type TransactionResponse = PendingTransactionResponse | CommittedTransactionResponse;

export function isPendingTransaction(response: TransactionResponse): response is PendingTransactionResponse {
  return response.type === "pending_transaction";
}

export type WaitForTransactionOptions = {
  timeoutSecs?: number;
  checkSuccess?: boolean;
};
