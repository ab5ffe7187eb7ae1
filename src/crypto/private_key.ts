// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Hex } from "../core/hex";
import { ParsingError } from "../core/common";
import { HexInput } from "../types";
import { defaultLogger } from "../utils/logger";

/**
 * The key schemes that have an AIP-80 string form.
 */
export enum PrivateKeyVariants {
  Ed25519 = "ed25519",
  Secp256k1 = "secp256k1",
}

/**
 * AIP-80 prefixes, followed by `0x` and the key hex.
 */
export const AIP80_PREFIXES = {
  [PrivateKeyVariants.Ed25519]: "ed25519-priv-",
  [PrivateKeyVariants.Secp256k1]: "secp256k1-priv-",
} as const;

export enum PrivateKeyInvalidReason {
  UNKNOWN_PREFIX = "unknown_prefix",
  PREFIX_REQUIRED = "prefix_required",
  INVALID_LENGTH = "invalid_length",
}

const PRIVATE_KEY_LENGTH = 32;

/**
 * Formats a private key in the AIP-80 compliant form, e.g. `ed25519-priv-0x1234...`.
 * An input that already carries a prefix has it replaced.
 */
export function formatPrivateKey(privateKey: HexInput, variant: PrivateKeyVariants): string {
  const prefix = AIP80_PREFIXES[variant];
  let formatted = typeof privateKey === "string" ? privateKey : Hex.fromHexInput({ hexInput: privateKey }).toString();

  const existing = Object.values(AIP80_PREFIXES).find((p) => formatted.startsWith(p));
  if (existing !== undefined) {
    formatted = formatted.slice(existing.length);
  }

  return `${prefix}${Hex.fromHexInput({ hexInput: formatted }).toString()}`;
}

/**
 * Reads a private key given as bytes, as hex (with or without 0x) or in the AIP-80
 * form, and returns its 32 bytes.
 *
 * A prefix for another scheme is rejected. Hex without a prefix is rejected when
 * `strict` is true, accepted silently when it is false, and accepted with a warning
 * when it is left undefined.
 */
export function parsePrivateKeyHexInput(value: HexInput, variant: PrivateKeyVariants, strict?: boolean): Hex {
  let data: Hex;

  if (typeof value === "string") {
    const prefix = AIP80_PREFIXES[variant];
    if (value.startsWith(prefix)) {
      data = Hex.fromHexInput({ hexInput: value.slice(prefix.length) });
    } else {
      const other = Object.values(AIP80_PREFIXES).find((p) => value.startsWith(p));
      if (other !== undefined) {
        throw new ParsingError(
          `Private key prefix ${other} does not match the ${variant} scheme`,
          PrivateKeyInvalidReason.UNKNOWN_PREFIX,
        );
      }
      if (strict === true) {
        throw new ParsingError(
          `Private key must be AIP-80 compliant and start with ${prefix}`,
          PrivateKeyInvalidReason.PREFIX_REQUIRED,
        );
      }
      if (strict === undefined) {
        defaultLogger.warn(
          { scheme: variant },
          "Private key is not AIP-80 compliant; expected the form %s0x<hex>",
          prefix,
        );
      }
      data = Hex.fromHexInput({ hexInput: value });
    }
  } else {
    data = Hex.fromHexInput({ hexInput: value });
  }

  if (data.toUint8Array().length !== PRIVATE_KEY_LENGTH) {
    throw new ParsingError(`PrivateKey length should be ${PRIVATE_KEY_LENGTH}`, PrivateKeyInvalidReason.INVALID_LENGTH);
  }
  return data;
}
