// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
import { BcsError, BcsInvalidReason, Deserializer, Serializable, Serializer } from "../../bcs";
import { AccountAddress } from "../../core";
import { Ed25519PublicKey, Ed25519Signature } from "../../crypto/ed25519";
import { MultiEd25519PublicKey, MultiEd25519Signature } from "../../crypto/multi_ed25519";
import { HexInput, TransactionAuthenticatorVariant } from "../../types";
import { AccountAuthenticator } from "./account";

export interface FeePayerSigner {
  address: AccountAddress;
  authenticator: AccountAuthenticator;
}

// The secondary signer lists read off the wire must pair up.
function readSecondarySigners(deserializer: Deserializer): [AccountAddress[], AccountAuthenticator[]] {
  const addresses = deserializer.deserializeVector(AccountAddress);
  const signers = deserializer.deserializeVector(AccountAuthenticator);
  if (addresses.length !== signers.length) {
    throw deserializer.fail(
      new BcsError("Secondary signer addresses and authenticators differ in length", BcsInvalidReason.LENGTH_MISMATCH),
    );
  }
  return [addresses, signers];
}

function checkSecondarySigners(addresses: ReadonlyArray<AccountAddress>, signers: ReadonlyArray<AccountAuthenticator>) {
  if (addresses.length !== signers.length) {
    throw new Error(`Expected ${addresses.length} secondary signer authenticators, got ${signers.length}`);
  }
}

/**
 * What a signed transaction carries besides its raw transaction. Single-signer variants
 * sign the raw transaction itself; multi-agent and fee-payer sign it together with the
 * extra signer addresses.
 */
export abstract class TransactionAuthenticator extends Serializable {
  abstract serialize(serializer: Serializer): void;

  /**
   * `message` is the signing message of the body this authenticator covers.
   */
  abstract verify(message: HexInput): boolean;

  static deserialize(deserializer: Deserializer): TransactionAuthenticator {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case TransactionAuthenticatorVariant.Ed25519:
        return new TransactionAuthenticatorEd25519(
          Ed25519PublicKey.deserialize(deserializer),
          Ed25519Signature.deserialize(deserializer),
        );
      case TransactionAuthenticatorVariant.MultiEd25519:
        return new TransactionAuthenticatorMultiEd25519(
          MultiEd25519PublicKey.deserialize(deserializer),
          MultiEd25519Signature.deserialize(deserializer),
        );
      case TransactionAuthenticatorVariant.MultiAgent: {
        const sender = AccountAuthenticator.deserialize(deserializer);
        const [addresses, signers] = readSecondarySigners(deserializer);
        return new TransactionAuthenticatorMultiAgent(sender, addresses, signers);
      }
      case TransactionAuthenticatorVariant.FeePayer: {
        const sender = AccountAuthenticator.deserialize(deserializer);
        const [addresses, signers] = readSecondarySigners(deserializer);
        const address = AccountAddress.deserialize(deserializer);
        const authenticator = AccountAuthenticator.deserialize(deserializer);
        return new TransactionAuthenticatorFeePayer(sender, addresses, signers, { address, authenticator });
      }
      case TransactionAuthenticatorVariant.SingleSender:
        return new TransactionAuthenticatorSingleSender(AccountAuthenticator.deserialize(deserializer));
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for TransactionAuthenticator: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }
}

export class TransactionAuthenticatorEd25519 extends TransactionAuthenticator {
  constructor(
    public readonly publicKey: Ed25519PublicKey,
    public readonly signature: Ed25519Signature,
  ) {
    super();
  }

  verify(message: HexInput): boolean {
    return this.publicKey.verifySignature({ message, signature: this.signature });
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionAuthenticatorVariant.Ed25519);
    serializer.serialize(this.publicKey);
    serializer.serialize(this.signature);
  }
}

export class TransactionAuthenticatorMultiEd25519 extends TransactionAuthenticator {
  constructor(
    public readonly publicKey: MultiEd25519PublicKey,
    public readonly signature: MultiEd25519Signature,
  ) {
    super();
  }

  verify(message: HexInput): boolean {
    return this.publicKey.verifySignature({ message, signature: this.signature });
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionAuthenticatorVariant.MultiEd25519);
    serializer.serialize(this.publicKey);
    serializer.serialize(this.signature);
  }
}

/**
 * Sender plus secondary signers; `secondarySigners[i]` signs for `secondarySignerAddresses[i]`.
 */
export class TransactionAuthenticatorMultiAgent extends TransactionAuthenticator {
  constructor(
    public readonly sender: AccountAuthenticator,
    public readonly secondarySignerAddresses: Array<AccountAddress>,
    public readonly secondarySigners: Array<AccountAuthenticator>,
  ) {
    super();
    checkSecondarySigners(secondarySignerAddresses, secondarySigners);
  }

  verify(message: HexInput): boolean {
    return this.sender.verify(message) && this.secondarySigners.every((signer) => signer.verify(message));
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionAuthenticatorVariant.MultiAgent);
    serializer.serialize(this.sender);
    serializer.serializeVector(this.secondarySignerAddresses);
    serializer.serializeVector(this.secondarySigners);
  }
}

export class TransactionAuthenticatorFeePayer extends TransactionAuthenticator {
  constructor(
    public readonly sender: AccountAuthenticator,
    public readonly secondarySignerAddresses: Array<AccountAddress>,
    public readonly secondarySigners: Array<AccountAuthenticator>,
    public readonly feePayer: FeePayerSigner,
  ) {
    super();
    checkSecondarySigners(secondarySignerAddresses, secondarySigners);
  }

  verify(message: HexInput): boolean {
    return (
      this.sender.verify(message) &&
      this.secondarySigners.every((signer) => signer.verify(message)) &&
      this.feePayer.authenticator.verify(message)
    );
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionAuthenticatorVariant.FeePayer);
    serializer.serialize(this.sender);
    serializer.serializeVector(this.secondarySignerAddresses);
    serializer.serializeVector(this.secondarySigners);
    serializer.serialize(this.feePayer.address);
    serializer.serialize(this.feePayer.authenticator);
  }
}

// A SingleKey or MultiKey account authenticator for the sender alone.
export class TransactionAuthenticatorSingleSender extends TransactionAuthenticator {
  constructor(public readonly sender: AccountAuthenticator) {
    super();
  }

  verify(message: HexInput): boolean {
    return this.sender.verify(message);
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionAuthenticatorVariant.SingleSender);
    serializer.serialize(this.sender);
  }
}
