// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/**
 * Payload, raw transaction, signing message, authenticator and signed transaction:
 * each step of building a transaction is one function here.
 */
import { sha3_256 as sha3Hash } from "@noble/hashes/sha3";
import { Signer } from "../../account/signer";
import { Transport } from "../../api/transport";
import { AccountAddress, Hex } from "../../core";
import { TransactionDefaults } from "../../types";
import { DEFAULT_GAS_UNIT_PRICE, DEFAULT_MAX_GAS_AMOUNT, DEFAULT_TXN_EXP_SEC_FROM_NOW } from "../../utils/const";
import { Logger, defaultLogger } from "../../utils/logger";
import {
  AccountAuthenticator,
  AccountAuthenticatorEd25519,
  AccountAuthenticatorMultiEd25519,
  AccountAuthenticatorMultiKey,
  AccountAuthenticatorSingleKey,
} from "../authenticator/account";
import {
  TransactionAuthenticator,
  TransactionAuthenticatorEd25519,
  TransactionAuthenticatorFeePayer,
  TransactionAuthenticatorMultiAgent,
  TransactionAuthenticatorMultiEd25519,
  TransactionAuthenticatorSingleSender,
} from "../authenticator/transaction";
import { ChainId } from "../types/chainId";
import { FeePayerRawTransaction, MultiAgentRawTransaction, RawTransaction } from "../types/rawTransaction";
import { SignedTransaction } from "../types/signedTransaction";
import { generateSigningMessage } from "../types/signingMessage";
import {
  MultiSig,
  MultiSigTransactionPayload,
  Script,
  TransactionPayload,
  TransactionPayloadEntryFunction,
  TransactionPayloadMultisig,
  TransactionPayloadScript,
} from "../types/transactionPayload";
import { ArgumentInvalidError, ArgumentInvalidReason } from "./builder_utils";
import { entryFunctionFromAbi, standardizeTypeTags } from "./function_abi";
import { simulationAuthenticator } from "./simulation";
import {
  AnyRawTransaction,
  EntryFunctionData,
  GenerateTransactionOptions,
  GenerateTransactionPayloadData,
  MultiSigData,
  ScriptData,
  SimulateTransactionData,
} from "./types";

// The payload class follows from the shape of `args`.
export function generateTransactionPayload(args: ScriptData): TransactionPayloadScript;
export function generateTransactionPayload(args: MultiSigData): TransactionPayloadMultisig;
export function generateTransactionPayload(args: EntryFunctionData): TransactionPayloadEntryFunction;
export function generateTransactionPayload(args: GenerateTransactionPayloadData): TransactionPayload;
/**
 * A script payload for `bytecode`, a multisig payload for `multisigAddress`, and an
 * entry function payload otherwise.
 *
 * With `abi` set the function arguments are encoded by the parameter types, otherwise
 * they must already be `Serializable` values or BCS bytes.
 */
export function generateTransactionPayload(args: GenerateTransactionPayloadData): TransactionPayload {
  if ("bytecode" in args) {
    return new TransactionPayloadScript(
      new Script(
        Hex.fromHexInput({ hexInput: args.bytecode }).toUint8Array(),
        standardizeTypeTags(args.typeArguments ?? []),
        args.functionArguments,
      ),
    );
  }

  const entryFunction = entryFunctionFromAbi(args);

  if ("multisigAddress" in args) {
    const multisigAddress =
      typeof args.multisigAddress === "string"
        ? AccountAddress.fromStringRelaxed({ input: args.multisigAddress })
        : args.multisigAddress;
    return new TransactionPayloadMultisig(
      new MultiSig(multisigAddress, new MultiSigTransactionPayload(entryFunction)),
    );
  }

  return new TransactionPayloadEntryFunction(entryFunction);
}

/**
 * Builds a raw transaction and wraps it with its extra signers.
 *
 * The sequence number and the chain id are fetched from `transport` when the options do
 * not carry them; both fetches run concurrently.
 *
 * @param args.transport Where to fetch what the options leave out
 * @param args.sender The transaction's sender account address
 * @param args.payload The transaction payload - can create by using generateTransactionPayload()
 * @param args.options optional. Gas, expiration and the extra signers
 * @param args.defaults optional. Defaults applied before the built-in ones; the transport's
 *   `transactionDefaults` when left out
 * @param args.logger optional. Receives debug lines for the fetches
 */
export async function buildTransaction(args: {
  transport: Transport;
  sender: AccountAddress | string;
  payload: TransactionPayload;
  options?: GenerateTransactionOptions;
  defaults?: TransactionDefaults;
  logger?: Logger;
}): Promise<AnyRawTransaction> {
  const { transport, payload, options, logger = defaultLogger } = args;
  const defaults = args.defaults ?? transport.transactionDefaults;
  const sender =
    typeof args.sender === "string" ? AccountAddress.fromStringRelaxed({ input: args.sender }) : args.sender;

  const expirationSeconds =
    options?.expirationSeconds ?? defaults?.expirationSeconds ?? DEFAULT_TXN_EXP_SEC_FROM_NOW;
  if (!Number.isFinite(expirationSeconds) || expirationSeconds < 0) {
    throw new ArgumentInvalidError(
      `expirationSeconds must be a non-negative number, got ${expirationSeconds}`,
      ArgumentInvalidReason.OUT_OF_RANGE,
    );
  }

  const fetchSequenceNumber = async (): Promise<bigint> => {
    logger.debug({ sender: sender.toString() }, "fetching sequence number");
    return transport.getSequenceNumber(sender);
  };
  const fetchChainId = async (): Promise<number> => {
    logger.debug("fetching chain id");
    return transport.getChainId();
  };

  const [sequenceNumber, chainId] = await Promise.all([
    options?.sequenceNumber !== undefined ? BigInt(options.sequenceNumber) : fetchSequenceNumber(),
    options?.chainId ?? fetchChainId(),
  ]);

  const maxGasAmount = options?.maxGasAmount ?? defaults?.maxGasAmount ?? DEFAULT_MAX_GAS_AMOUNT;
  const gasUnitPrice = options?.gasUnitPrice ?? defaults?.gasUnitPrice ?? DEFAULT_GAS_UNIT_PRICE;
  const expireTimestamp = BigInt(Math.floor(Date.now() / 1000 + expirationSeconds));

  const rawTransaction = new RawTransaction(
    sender,
    sequenceNumber,
    payload,
    BigInt(maxGasAmount),
    BigInt(gasUnitPrice),
    expireTimestamp,
    new ChainId(chainId),
  );

  if (options?.feePayer !== undefined) {
    return {
      rawTransaction,
      secondarySignerAddresses: options.additionalSigners ?? [],
      feePayerAddress: options.feePayer,
    };
  }
  if (options?.additionalSigners !== undefined) {
    return { rawTransaction, secondarySignerAddresses: options.additionalSigners };
  }
  return { rawTransaction };
}

/**
 * The body the signers sign: the raw transaction alone, or wrapped with the addresses of
 * the other signers.
 */
export function deriveTransactionType(
  transaction: AnyRawTransaction,
): RawTransaction | MultiAgentRawTransaction | FeePayerRawTransaction {
  if (transaction.feePayerAddress !== undefined) {
    return new FeePayerRawTransaction(
      transaction.rawTransaction,
      transaction.secondarySignerAddresses,
      transaction.feePayerAddress,
    );
  }
  if (transaction.secondarySignerAddresses !== undefined) {
    return new MultiAgentRawTransaction(transaction.rawTransaction, transaction.secondarySignerAddresses);
  }
  return transaction.rawTransaction;
}

/**
 * The bytes every signer of `transaction` signs.
 */
export function getSigningMessage(transaction: AnyRawTransaction): Uint8Array {
  return generateSigningMessage(deriveTransactionType(transaction));
}

export function hashSigningMessage(transaction: AnyRawTransaction): Uint8Array {
  return sha3Hash(getSigningMessage(transaction));
}

/**
 * `signer`'s authenticator over the signing message of `transaction`.
 */
export function signTransaction(args: { signer: Signer; transaction: AnyRawTransaction }): AccountAuthenticator {
  const { signer, transaction } = args;
  return signer.signTransaction(transaction);
}

function singleSignerAuthenticator(authenticator: AccountAuthenticator): TransactionAuthenticator {
  if (authenticator instanceof AccountAuthenticatorEd25519) {
    return new TransactionAuthenticatorEd25519(authenticator.publicKey, authenticator.signature);
  }
  if (authenticator instanceof AccountAuthenticatorMultiEd25519) {
    return new TransactionAuthenticatorMultiEd25519(authenticator.publicKey, authenticator.signature);
  }
  if (authenticator instanceof AccountAuthenticatorSingleKey || authenticator instanceof AccountAuthenticatorMultiKey) {
    return new TransactionAuthenticatorSingleSender(authenticator);
  }
  throw new Error("The sender authenticator carries no signature");
}

/**
 * Assembles a transaction and its authenticators into the transaction to submit.
 *
 * @param args.transaction The transaction that was signed
 * @param args.senderAuthenticator What the sender signed with
 * @param args.additionalSignersAuthenticators One per secondary signer, in the same order
 * @param args.feePayerAuthenticator Required for a fee payer transaction
 */
export function generateSignedTransaction(args: {
  transaction: AnyRawTransaction;
  senderAuthenticator: AccountAuthenticator;
  additionalSignersAuthenticators?: Array<AccountAuthenticator>;
  feePayerAuthenticator?: AccountAuthenticator;
}): SignedTransaction {
  const { transaction, senderAuthenticator, additionalSignersAuthenticators, feePayerAuthenticator } = args;
  const { rawTransaction } = transaction;

  if (transaction.secondarySignerAddresses !== undefined) {
    const expected = transaction.secondarySignerAddresses.length;
    const secondarySigners = additionalSignersAuthenticators ?? [];
    if (secondarySigners.length !== expected) {
      throw new Error(`Expected ${expected} additional signer authenticators, got ${secondarySigners.length}`);
    }

    if (transaction.feePayerAddress !== undefined) {
      if (feePayerAuthenticator === undefined) {
        throw new Error("A fee payer transaction needs the fee payer authenticator");
      }
      return new SignedTransaction(
        rawTransaction,
        new TransactionAuthenticatorFeePayer(senderAuthenticator, transaction.secondarySignerAddresses, secondarySigners, {
          address: transaction.feePayerAddress,
          authenticator: feePayerAuthenticator,
        }),
      );
    }

    return new SignedTransaction(
      rawTransaction,
      new TransactionAuthenticatorMultiAgent(senderAuthenticator, transaction.secondarySignerAddresses, secondarySigners),
    );
  }

  return new SignedTransaction(rawTransaction, singleSignerAuthenticator(senderAuthenticator));
}

/**
 * A signed transaction for the simulation endpoint: every signer is represented by its
 * real public key and zero signatures. The node derives the authentication keys from
 * the public keys, so they must be the real ones.
 */
export function generateSignedTransactionForSimulation(args: SimulateTransactionData): SignedTransaction {
  const { transaction, signerPublicKey, secondarySignersPublicKeys, feePayerPublicKey } = args;
  return generateSignedTransaction({
    transaction,
    senderAuthenticator: simulationAuthenticator(signerPublicKey),
    additionalSignersAuthenticators: secondarySignersPublicKeys?.map((publicKey) => simulationAuthenticator(publicKey)),
    feePayerAuthenticator: feePayerPublicKey === undefined ? undefined : simulationAuthenticator(feePayerPublicKey),
  });
}

/**
 * Submits a signed transaction and resolves to its hash.
 */
export async function submitTransaction(args: {
  transport: Transport;
  signedTransaction: SignedTransaction;
}): Promise<string> {
  const { transport, signedTransaction } = args;
  return transport.submitSignedTransaction(signedTransaction.bcsToBytes());
}

/**
 * Signs with the sender and every other signer the transaction names, then submits.
 *
 * @param args.additionalSigners One per secondary signer address, in the same order
 * @param args.feePayer The fee payer, for a fee payer transaction
 */
export async function signAndSubmitTransaction(args: {
  transport: Transport;
  signer: Signer;
  transaction: AnyRawTransaction;
  additionalSigners?: Array<Signer>;
  feePayer?: Signer;
}): Promise<string> {
  const { transport, signer, transaction, additionalSigners, feePayer } = args;
  const signedTransaction = generateSignedTransaction({
    transaction,
    senderAuthenticator: signer.signTransaction(transaction),
    additionalSignersAuthenticators: additionalSigners?.map((additional) => additional.signTransaction(transaction)),
    feePayerAuthenticator: feePayer?.signTransaction(transaction),
  });
  return submitTransaction({ transport, signedTransaction });
}
