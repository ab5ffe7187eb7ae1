// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Serializable } from "../../bcs";
import { AccountAddress } from "../../core";
import { Ed25519PublicKey } from "../../crypto/ed25519";
import { MultiEd25519PublicKey } from "../../crypto/multi_ed25519";
import { MultiKey } from "../../crypto/multi_key";
import { AnyPublicKey } from "../../crypto/single_key";
import { AnyNumber, HexInput, MoveFunction, MoveFunctionId, MoveModule } from "../../types";
import { RawTransaction } from "../types/rawTransaction";
import { ScriptTransactionArgument } from "../types/scriptTransactionArguments";
import { TypeTag } from "../types/typeTag";

/**
 * A value the marshaller can encode against a Move type. Arrays nest for vectors.
 * Any `Serializable` is taken as the already-typed value and written as its BCS.
 */
export type MoveArgumentValue =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Serializable
  | null
  | undefined
  | ReadonlyArray<MoveArgumentValue>;

export type ConvertArgOptions = {
  /**
   * Type arguments of the call, indexed by `T<i>` in the parameter types.
   */
  generics?: Array<TypeTag>;

  /**
   * Also accept an `Option` argument given as the hex of its BCS encoding.
   */
  compatibilityMode?: boolean;
};

/**
 * Type arguments as strings such as `0x1::aptos_coin::AptosCoin` or already parsed.
 */
export type TypeArgument = TypeTag | string;

/**
 * Entry function call. Without an ABI every argument must already be a `Serializable`
 * or the BCS bytes of one.
 */
export type EntryFunctionData = {
  function: MoveFunctionId;
  typeArguments?: Array<TypeArgument>;
  functionArguments: Array<MoveArgumentValue>;
  abi?: MoveModule | MoveFunction;
  compatibilityMode?: boolean;
};

export type MultiSigData = EntryFunctionData & {
  multisigAddress: AccountAddress | string;
};

export type ScriptData = {
  bytecode: HexInput;
  typeArguments?: Array<TypeArgument>;
  functionArguments: Array<ScriptTransactionArgument>;
};

export type GenerateTransactionPayloadData = EntryFunctionData | MultiSigData | ScriptData;

export type ViewFunctionData = {
  function: MoveFunctionId;
  typeArguments?: Array<TypeArgument>;
  functionArguments: Array<MoveArgumentValue>;
  abi?: MoveModule | MoveFunction;
  compatibilityMode?: boolean;
};

export type GenerateTransactionOptions = {
  maxGasAmount?: AnyNumber;
  gasUnitPrice?: AnyNumber;
  /**
   * Seconds from now until the transaction expires.
   */
  expirationSeconds?: number;
  sequenceNumber?: AnyNumber;
  chainId?: number;
  feePayer?: AccountAddress;
  additionalSigners?: Array<AccountAddress>;
};

export type SimpleTransaction = {
  rawTransaction: RawTransaction;
  secondarySignerAddresses?: undefined;
  feePayerAddress?: undefined;
};

export type MultiAgentTransaction = {
  rawTransaction: RawTransaction;
  secondarySignerAddresses: Array<AccountAddress>;
  feePayerAddress?: undefined;
};

export type FeePayerTransaction = {
  rawTransaction: RawTransaction;
  secondarySignerAddresses: Array<AccountAddress>;
  feePayerAddress: AccountAddress;
};

export type AnyRawTransaction = SimpleTransaction | MultiAgentTransaction | FeePayerTransaction;

/**
 * A public key a simulation can stand a zero signature in for.
 */
export type SimulationPublicKey = Ed25519PublicKey | AnyPublicKey | MultiEd25519PublicKey | MultiKey;

export type SimulateTransactionData = {
  transaction: AnyRawTransaction;
  signerPublicKey: SimulationPublicKey;
  secondarySignersPublicKeys?: Array<SimulationPublicKey>;
  feePayerPublicKey?: SimulationPublicKey;
};
