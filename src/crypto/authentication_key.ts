// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { sha3_256 as sha3Hash } from "@noble/hashes/sha3";
import { Serializer } from "../bcs/serializer";
import { AccountAddress } from "../core/account_address";
import { Hex } from "../core/hex";
import { AnyNumber, AuthenticationKeyScheme, DeriveScheme, HexInput, SigningScheme } from "../types";
import { MultiEd25519PublicKey } from "./multi_ed25519";
import { PublicKey } from "./asymmetric_crypto";
import { Ed25519PublicKey } from "./ed25519";
import { Secp256k1PublicKey } from "./secp256k1";
import { AnyPublicKey, KeylessPublicKey } from "./single_key";
import { MultiKey } from "./multi_key";
import { concatBytes } from "../utils/helpers";

// The bytes hashed for a public key and the scheme byte appended to them.
function keyMaterial(publicKey: PublicKey, legacy: boolean): { bytes: Uint8Array; scheme: SigningScheme } {
  if (publicKey instanceof Ed25519PublicKey && legacy) {
    return { bytes: publicKey.toUint8Array(), scheme: SigningScheme.Ed25519 };
  }
  if (publicKey instanceof MultiEd25519PublicKey) {
    return { bytes: publicKey.toUint8Array(), scheme: SigningScheme.MultiEd25519 };
  }
  if (publicKey instanceof MultiKey) {
    return { bytes: publicKey.bcsToBytes(), scheme: SigningScheme.MultiKey };
  }
  if (publicKey instanceof AnyPublicKey) {
    return { bytes: publicKey.bcsToBytes(), scheme: SigningScheme.SingleKey };
  }
  if (
    publicKey instanceof Ed25519PublicKey ||
    publicKey instanceof Secp256k1PublicKey ||
    publicKey instanceof KeylessPublicKey
  ) {
    return { bytes: new AnyPublicKey(publicKey).bcsToBytes(), scheme: SigningScheme.SingleKey };
  }
  throw new Error("No supported authentication scheme for public key");
}

/**
 * `SHA3-256(key bytes || scheme byte)`, stored on chain by every account. A new
 * account's address is its authentication key; rotating keys changes the key but not
 * the address.
 */
export class AuthenticationKey {
  static readonly LENGTH: number = 32;

  public readonly data: Hex;

  constructor(args: { data: HexInput }) {
    const data = Hex.fromHexInput({ hexInput: args.data });
    if (data.toUint8Array().length !== AuthenticationKey.LENGTH) {
      throw new Error(`Authentication Key length should be ${AuthenticationKey.LENGTH}`);
    }
    this.data = data;
  }

  toString(): string {
    return this.data.toString();
  }

  toUint8Array(): Uint8Array {
    return this.data.toUint8Array();
  }

  /**
   * Hashes `bytes` with the scheme byte appended. Object and resource addresses are
   * built this way too, with a derive scheme.
   */
  static fromSchemeAndBytes(args: { bytes: HexInput; scheme: AuthenticationKeyScheme }): AuthenticationKey {
    const input = Hex.fromHexInput({ hexInput: args.bytes }).toUint8Array();
    return new AuthenticationKey({ data: sha3Hash(concatBytes(input, Uint8Array.of(args.scheme))) });
  }

  /**
   * The key type picks the scheme. A bare Ed25519 key uses the legacy Ed25519 scheme
   * unless `legacy` is false; Secp256k1 and keyless keys are wrapped in `AnyPublicKey`
   * and use SingleKey.
   */
  static fromPublicKey(args: { publicKey: PublicKey; legacy?: boolean }): AuthenticationKey {
    return AuthenticationKey.fromSchemeAndBytes(keyMaterial(args.publicKey, args.legacy ?? true));
  }

  derivedAddress(): AccountAddress {
    return new AccountAddress({ data: this.data.toUint8Array() });
  }
}

function toAddress(value: AccountAddress | HexInput): AccountAddress {
  return value instanceof AccountAddress ? value : AccountAddress.fromHexInputRelaxed({ input: value });
}

function toSeedBytes(seed: HexInput): Uint8Array {
  return typeof seed === "string" ? new TextEncoder().encode(seed) : seed;
}

function deriveAddress(parts: Array<Uint8Array>, scheme: DeriveScheme): AccountAddress {
  const serializer = new Serializer();
  parts.forEach((part) => serializer.serializeFixedBytes(part));
  return AuthenticationKey.fromSchemeAndBytes({ bytes: serializer.toUint8Array(), scheme }).derivedAddress();
}

/**
 * Address of a named object: `SHA3-256(creator || seed || 0xFE)`. A string seed is
 * taken as its UTF-8 bytes.
 */
export function createObjectAddress(creator: AccountAddress | HexInput, seed: HexInput): AccountAddress {
  return deriveAddress(
    [toAddress(creator).toUint8Array(), toSeedBytes(seed)],
    DeriveScheme.DeriveObjectAddressFromSeed,
  );
}

/**
 * Address of an object created from a GUID: `SHA3-256(u64 LE creation number || creator || 0xFD)`.
 */
export function createGuidObjectAddress(creator: AccountAddress | HexInput, creationNum: AnyNumber): AccountAddress {
  const serializer = new Serializer();
  serializer.serializeU64(creationNum);
  serializer.serialize(toAddress(creator));
  return deriveAddress([serializer.toUint8Array()], DeriveScheme.DeriveObjectAddressFromGuid);
}

/**
 * Address of an object derived from another object: `SHA3-256(source || derivedFrom || 0xFC)`.
 */
export function createUserDerivedObjectAddress(
  source: AccountAddress | HexInput,
  derivedFrom: AccountAddress | HexInput,
): AccountAddress {
  return deriveAddress(
    [toAddress(source).toUint8Array(), toAddress(derivedFrom).toUint8Array()],
    DeriveScheme.DeriveObjectAddressFromObject,
  );
}

/**
 * Address of a resource account: `SHA3-256(creator || seed || 0xFF)`.
 */
export function createResourceAddress(creator: AccountAddress | HexInput, seed: HexInput): AccountAddress {
  return deriveAddress(
    [toAddress(creator).toUint8Array(), toSeedBytes(seed)],
    DeriveScheme.DeriveResourceAccountAddress,
  );
}
