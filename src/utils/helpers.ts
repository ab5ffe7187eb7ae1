// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export async function sleep(timeMs: number): Promise<null> {
  return new Promise((resolve) => {
    setTimeout(() => resolve(null), timeMs);
  });
}

/**
 * Concatenates byte arrays into a new one.
 */
export function concatBytes(...parts: Array<Uint8Array>): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  parts.forEach((part) => {
    out.set(part, offset);
    offset += part.length;
  });
  return out;
}
