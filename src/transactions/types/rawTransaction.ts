// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
import { BcsError, BcsInvalidReason, Deserializer, Serializable, Serializer } from "../../bcs";
import { AccountAddress } from "../../core";
import { TransactionVariants } from "../../types";
import { ChainId } from "./chainId";
import { TransactionPayload } from "./transactionPayload";

/**
 * An unsigned transaction: who sends it, what it runs, what it may spend and where
 * it is valid. Fields are written in declaration order.
 */
export class RawTransaction extends Serializable {
  /**
   * @param sequenceNumber must equal the sender's on-chain sequence number when it executes
   * @param maxGasAmount the most gas units the sender will pay for
   * @param expirationTimestampSecs chain time, in seconds, after which it is discarded
   */
  constructor(
    public readonly sender: AccountAddress,
    public readonly sequenceNumber: bigint,
    public readonly payload: TransactionPayload,
    public readonly maxGasAmount: bigint,
    public readonly gasUnitPrice: bigint,
    public readonly expirationTimestampSecs: bigint,
    public readonly chainId: ChainId,
  ) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serialize(this.sender);
    serializer.serializeU64(this.sequenceNumber);
    serializer.serialize(this.payload);
    serializer.serializeU64(this.maxGasAmount);
    serializer.serializeU64(this.gasUnitPrice);
    serializer.serializeU64(this.expirationTimestampSecs);
    serializer.serialize(this.chainId);
  }

  static deserialize(deserializer: Deserializer): RawTransaction {
    return new RawTransaction(
      AccountAddress.deserialize(deserializer),
      deserializer.deserializeU64(),
      TransactionPayload.deserialize(deserializer),
      deserializer.deserializeU64(),
      deserializer.deserializeU64(),
      deserializer.deserializeU64(),
      ChainId.deserialize(deserializer),
    );
  }
}

/**
 * The body multi-agent and fee-payer transactions are signed over: the raw transaction
 * and the addresses of its other signers.
 */
export abstract class RawTransactionWithData extends Serializable {
  abstract serialize(serializer: Serializer): void;

  static deserialize(deserializer: Deserializer): RawTransactionWithData {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case TransactionVariants.MultiAgentTransaction:
        return new MultiAgentRawTransaction(
          RawTransaction.deserialize(deserializer),
          deserializer.deserializeVector(AccountAddress),
        );
      case TransactionVariants.FeePayerTransaction:
        return new FeePayerRawTransaction(
          RawTransaction.deserialize(deserializer),
          deserializer.deserializeVector(AccountAddress),
          AccountAddress.deserialize(deserializer),
        );
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for RawTransactionWithData: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }
}

export class MultiAgentRawTransaction extends RawTransactionWithData {
  constructor(
    public readonly rawTxn: RawTransaction,
    public readonly secondarySignerAddresses: Array<AccountAddress>,
  ) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionVariants.MultiAgentTransaction);
    serializer.serialize(this.rawTxn);
    serializer.serializeVector(this.secondarySignerAddresses);
  }
}

// secondarySignerAddresses may be empty
export class FeePayerRawTransaction extends RawTransactionWithData {
  constructor(
    public readonly rawTxn: RawTransaction,
    public readonly secondarySignerAddresses: Array<AccountAddress>,
    public readonly feePayerAddress: AccountAddress,
  ) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionVariants.FeePayerTransaction);
    serializer.serialize(this.rawTxn);
    serializer.serializeVector(this.secondarySignerAddresses);
    serializer.serialize(this.feePayerAddress);
  }
}
