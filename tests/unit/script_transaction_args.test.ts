// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Deserializer, deserializeFromBytes } from "../../src/bcs";
import { AccountAddress } from "../../src/core";
import {
  ScriptTransactionArgument,
  ScriptTransactionArgumentAddress,
  ScriptTransactionArgumentBool,
  ScriptTransactionArgumentU128,
  ScriptTransactionArgumentU16,
  ScriptTransactionArgumentU256,
  ScriptTransactionArgumentU32,
  ScriptTransactionArgumentU64,
  ScriptTransactionArgumentU8,
  ScriptTransactionArgumentU8Vector,
} from "../../src/transactions/types";
import { Bool, U128, U16, U256, U32, U64, U8 } from "../../src/bcs/serializable/move-primitives";
import { MoveVector } from "../../src/bcs/serializable/move-structs";

const zeros = (n: number) => new Array<number>(n).fill(0);

describe("ScriptTransactionArgument", () => {
  it.each([
    ["u8", new ScriptTransactionArgumentU8(1), [0, 1]],
    ["u64", new ScriptTransactionArgumentU64(4), [1, 4, ...zeros(7)]],
    ["u128", new ScriptTransactionArgumentU128(5), [2, 5, ...zeros(15)]],
    ["address", new ScriptTransactionArgumentAddress(AccountAddress.FOUR), [3, ...zeros(31), 4]],
    ["vector<u8>", new ScriptTransactionArgumentU8Vector([1, 2, 3]), [4, 3, 1, 2, 3]],
    ["bool true", new ScriptTransactionArgumentBool(true), [5, 1]],
    ["bool false", new ScriptTransactionArgumentBool(false), [5, 0]],
    ["u16", new ScriptTransactionArgumentU16(0x0102), [6, 2, 1]],
    ["u32", new ScriptTransactionArgumentU32(3), [7, 3, 0, 0, 0]],
    ["u256", new ScriptTransactionArgumentU256(6), [8, 6, ...zeros(31)]],
  ])("writes a %s argument as its variant and value", (_, arg, expected) => {
    expect(Array.from(arg.bcsToBytes())).toEqual(expected);
  });

  it("reads every variant back", () => {
    const args = [
      new ScriptTransactionArgumentU8(7),
      new ScriptTransactionArgumentU16(300),
      new ScriptTransactionArgumentU32(70000),
      new ScriptTransactionArgumentU64(BigInt(2) ** BigInt(40)),
      new ScriptTransactionArgumentU128(9),
      new ScriptTransactionArgumentU256(10),
      new ScriptTransactionArgumentBool(true),
      new ScriptTransactionArgumentAddress(AccountAddress.THREE),
      new ScriptTransactionArgumentU8Vector("0xbeef"),
    ];
    args.forEach((arg) => {
      const decoded = deserializeFromBytes(arg.bcsToBytes(), ScriptTransactionArgument);
      expect(decoded).toBeInstanceOf(arg.constructor);
      expect(decoded.bcsToHex().toString()).toEqual(arg.bcsToHex().toString());
    });
  });

  it("keeps the decoded values", () => {
    const decoded = deserializeFromBytes(Uint8Array.of(4, 2, 0xbe, 0xef), ScriptTransactionArgument);
    if (!(decoded instanceof ScriptTransactionArgumentU8Vector)) {
      throw new Error("expected a vector<u8> argument");
    }
    expect(decoded.value.values.map((v) => v.value)).toEqual([0xbe, 0xef]);

    const flag = deserializeFromBytes(Uint8Array.of(5, 1), ScriptTransactionArgument);
    expect(flag instanceof ScriptTransactionArgumentBool && flag.value.value).toBe(true);
  });

  it("rejects an unknown variant", () => {
    const deserializer = new Deserializer(Uint8Array.of(9));
    expect(() => ScriptTransactionArgument.deserialize(deserializer)).toThrow(
      "Unknown variant index for ScriptTransactionArgument: 9",
    );
    expect(deserializer.error()).toBeDefined();
  });

  it("rejects a bool byte other than 0 or 1", () => {
    expect(() => deserializeFromBytes(Uint8Array.of(5, 2), ScriptTransactionArgument)).toThrow("Invalid boolean value 2");
  });

  describe("fromMovePrimitive", () => {
    it.each([
      [new U8(1), ScriptTransactionArgumentU8],
      [new U16(2), ScriptTransactionArgumentU16],
      [new U32(3), ScriptTransactionArgumentU32],
      [new U64(4), ScriptTransactionArgumentU64],
      [new U128(5), ScriptTransactionArgumentU128],
      [new U256(6), ScriptTransactionArgumentU256],
      [new Bool(false), ScriptTransactionArgumentBool],
      [AccountAddress.FOUR, ScriptTransactionArgumentAddress],
      [MoveVector.U8([1, 2]), ScriptTransactionArgumentU8Vector],
    ])("wraps %p", (primitive, cls) => {
      const arg = ScriptTransactionArgument.fromMovePrimitive(primitive);
      expect(arg).toBeInstanceOf(cls);
      // the variant index is the only byte added
      expect(Array.from(arg.bcsToBytes()).slice(1)).toEqual(Array.from(primitive.bcsToBytes()));
    });

    it("refuses vectors of anything but u8", () => {
      const vector = new MoveVector<U8>([new U8(1)]);
      vector.values.push(new U16(1));
      expect(() => ScriptTransactionArgument.fromMovePrimitive(vector)).toThrow("Unsupported vector type");
    });
  });
});
