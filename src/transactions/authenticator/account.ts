// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
import { BcsError, BcsInvalidReason, Deserializer, Serializable, Serializer } from "../../bcs";
import { PublicKey, Signature } from "../../crypto/asymmetric_crypto";
import { Ed25519PublicKey, Ed25519Signature } from "../../crypto/ed25519";
import { MultiEd25519PublicKey, MultiEd25519Signature } from "../../crypto/multi_ed25519";
import { MultiKey, MultiKeySignature } from "../../crypto/multi_key";
import { AnyPublicKey, AnySignature } from "../../crypto/single_key";
import { AccountAuthenticatorVariant, HexInput } from "../../types";

/**
 * The proof one account gives for a transaction: its public key(s) and signature(s).
 */
export abstract class AccountAuthenticator extends Serializable {
  abstract serialize(serializer: Serializer): void;

  /**
   * Whether the signature(s) verify against the public key(s) for `message`.
   */
  abstract verify(message: HexInput): boolean;

  static deserialize(deserializer: Deserializer): AccountAuthenticator {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case AccountAuthenticatorVariant.Ed25519:
        return new AccountAuthenticatorEd25519(
          Ed25519PublicKey.deserialize(deserializer),
          Ed25519Signature.deserialize(deserializer),
        );
      case AccountAuthenticatorVariant.MultiEd25519:
        return new AccountAuthenticatorMultiEd25519(
          MultiEd25519PublicKey.deserialize(deserializer),
          MultiEd25519Signature.deserialize(deserializer),
        );
      case AccountAuthenticatorVariant.SingleKey:
        return new AccountAuthenticatorSingleKey(
          AnyPublicKey.deserialize(deserializer),
          AnySignature.deserialize(deserializer),
        );
      case AccountAuthenticatorVariant.MultiKey:
        return new AccountAuthenticatorMultiKey(MultiKey.deserialize(deserializer), MultiKeySignature.deserialize(deserializer));
      case AccountAuthenticatorVariant.NoAccountAuthenticator:
        return new AccountAuthenticatorNoAccountAuthenticator();
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for AccountAuthenticator: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }
}

// A key and a signature of the same scheme, after the variant index.
abstract class KeyAndSignature<K extends PublicKey, S extends Signature> extends AccountAuthenticator {
  protected abstract readonly variant: AccountAuthenticatorVariant;

  constructor(
    public readonly publicKey: K,
    public readonly signature: S,
  ) {
    super();
  }

  verify(message: HexInput): boolean {
    return this.publicKey.verifySignature({ message, signature: this.signature });
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(this.variant);
    serializer.serialize(this.publicKey);
    serializer.serialize(this.signature);
  }
}

export class AccountAuthenticatorEd25519 extends KeyAndSignature<Ed25519PublicKey, Ed25519Signature> {
  protected readonly variant = AccountAuthenticatorVariant.Ed25519;
}

export class AccountAuthenticatorMultiEd25519 extends KeyAndSignature<MultiEd25519PublicKey, MultiEd25519Signature> {
  protected readonly variant = AccountAuthenticatorVariant.MultiEd25519;
}

/**
 * One key of any scheme. The transaction authenticator around it is SingleSender.
 */
export class AccountAuthenticatorSingleKey extends KeyAndSignature<AnyPublicKey, AnySignature> {
  protected readonly variant = AccountAuthenticatorVariant.SingleKey;

  // a signature of another scheme never verifies
  verify(message: HexInput): boolean {
    return this.publicKey.variant.valueOf() === this.signature.variant.valueOf() && super.verify(message);
  }
}

export class AccountAuthenticatorMultiKey extends AccountAuthenticator {
  constructor(
    public readonly publicKeys: MultiKey,
    public readonly signatures: MultiKeySignature,
  ) {
    super();
  }

  verify(message: HexInput): boolean {
    return this.publicKeys.verifySignature({ message, signature: this.signatures });
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(AccountAuthenticatorVariant.MultiKey);
    serializer.serialize(this.publicKeys);
    serializer.serialize(this.signatures);
  }
}

/**
 * Carries no key and no signature, e.g. for a fee payer that has not signed yet. It
 * never verifies.
 */
export class AccountAuthenticatorNoAccountAuthenticator extends AccountAuthenticator {
  verify(): boolean {
    return false;
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(AccountAuthenticatorVariant.NoAccountAuthenticator);
  }
}
