// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Deserializer } from "../../src/bcs/deserializer";
import { Bool, I128, I16, I32, I64, I8, U128, U16, U256, U32, U64, U8 } from "../../src/bcs/serializable/move-primitives";
import { MoveOption, MoveString, MoveVector, Serialized } from "../../src/bcs/serializable/move-structs";
import { Serializer } from "../../src/bcs/serializer";
import { AccountAddress } from "../../src/core";

describe("Move primitives", () => {
  let serializer: Serializer;

  beforeEach(() => {
    serializer = new Serializer();
  });

  it("serializes the same way with all methods of serialization", () => {
    const values = [
      new U8(1),
      new U16(1),
      new U32(1),
      new U64(1),
      new U128(1),
      new U256(1),
      new Bool(true),
      new MoveString("some string"),
    ];

    let bytes = new Uint8Array();
    const serializer2 = new Serializer();
    values.forEach((value) => {
      value.serialize(serializer);
      serializer2.serialize(value);
      bytes = new Uint8Array([...bytes, ...value.bcsToBytes()]);
    });
    expect(serializer.toUint8Array()).toEqual(serializer2.toUint8Array());
    expect(serializer.toUint8Array()).toEqual(bytes);
  });

  it("encodes signed integers as two's complement", () => {
    expect(new I8(-1).bcsToBytes()).toEqual(new Uint8Array([0xff]));
    expect(new I16(-2).bcsToBytes()).toEqual(new Uint8Array([0xfe, 0xff]));
    expect(new I32(-128).bcsToBytes()).toEqual(new Uint8Array([0x80, 0xff, 0xff, 0xff]));
    expect(new I64(1).bcsToBytes()).toEqual(new Uint8Array([1, 0, 0, 0, 0, 0, 0, 0]));
    expect(new I128(-1).bcsToBytes()).toEqual(new Uint8Array(16).fill(0xff));
  });

  it("reads back signed integers", () => {
    expect(I8.deserialize(new Deserializer(new Uint8Array([0x80]))).value).toEqual(-128);
    expect(I64.deserialize(new Deserializer(new I64(-42).bcsToBytes())).value).toEqual(BigInt(-42));
  });

  it("rejects values outside the type's range", () => {
    expect(() => new U8(256)).toThrow("256 is out of range: [0, 255]");
    expect(() => new I8(128)).toThrow("128 is out of range: [-128, 127]");
    expect(() => new U64(-1)).toThrow("-1 is out of range");
  });

  it("writes the bcsToHex form with a prefix", () => {
    expect(new U16(4660).bcsToHex().toString()).toEqual("0x3412");
  });
});

describe("MoveVector", () => {
  it("length prefixes its elements", () => {
    expect(MoveVector.U8([1, 2, 3, 4]).bcsToBytes()).toEqual(new Uint8Array([4, 1, 2, 3, 4]));
    expect(MoveVector.U16([1, 2]).bcsToBytes()).toEqual(new Uint8Array([2, 1, 0, 2, 0]));
    expect(MoveVector.Bool([true, false]).bcsToBytes()).toEqual(new Uint8Array([2, 1, 0]));
    expect(MoveVector.MoveString(["ab", ""]).bcsToBytes()).toEqual(new Uint8Array([2, 2, 0x61, 0x62, 0]));
  });

  it("takes a vector<u8> as hex", () => {
    expect(MoveVector.U8("0x0102").bcsToBytes()).toEqual(new Uint8Array([2, 1, 2]));
  });

  it("reads back what it writes", () => {
    const vector = MoveVector.U64([1, BigInt(2), 3]);
    const decoded = MoveVector.deserialize(new Deserializer(vector.bcsToBytes()), U64);
    expect(decoded.values.map((v) => v.value)).toEqual([BigInt(1), BigInt(2), BigInt(3)]);
  });

  it("serializes vectors of addresses", () => {
    const vector = new MoveVector([AccountAddress.ONE, AccountAddress.TWO]);
    const bytes = vector.bcsToBytes();
    expect(bytes.length).toEqual(1 + 2 * AccountAddress.LENGTH);
    expect(bytes[0]).toEqual(2);
    expect(bytes[32]).toEqual(1);
    expect(bytes[64]).toEqual(2);
  });
});

describe("MoveOption", () => {
  it("writes a none as an empty vector and a some as a single element vector", () => {
    expect(MoveOption.U8().bcsToBytes()).toEqual(new Uint8Array([0]));
    expect(MoveOption.U8(7).bcsToBytes()).toEqual(new Uint8Array([1, 7]));
    expect(MoveOption.MoveString("a").bcsToBytes()).toEqual(new Uint8Array([1, 1, 0x61]));
    expect(new MoveOption<Bool>(null).isSome()).toBe(false);
  });

  it("throws when unwrapping a none, before and after serialization", () => {
    const none = MoveOption.U64();
    expect(() => none.unwrap()).toThrow("Called unwrap on a MoveOption with no value");
    const decoded = MoveOption.deserialize(new Deserializer(none.bcsToBytes()), U64);
    expect(() => decoded.unwrap()).toThrow("Called unwrap on a MoveOption with no value");
  });

  it("reads back a some", () => {
    const decoded = MoveOption.deserialize(new Deserializer(MoveOption.Bool(true).bcsToBytes()), Bool);
    expect(decoded.unwrap().value).toBe(true);
  });

  it("rejects an option vector longer than one", () => {
    expect(() => MoveOption.deserialize(new Deserializer(new Uint8Array([2, 1, 1])), Bool)).toThrow(
      "Option vector has 2 elements, expected 0 or 1",
    );
  });

  it("nests inside vectors", () => {
    const vector = new MoveVector([MoveOption.Bool(true), MoveOption.Bool(false), MoveOption.Bool()]);
    expect(vector.bcsToBytes()).toEqual(new Uint8Array([3, 1, 1, 1, 0, 0]));
  });
});

describe("Serialized", () => {
  it("serializes as a byte vector on its own", () => {
    expect(new Serialized("0x0102").bcsToBytes()).toEqual(new Uint8Array([2, 1, 2]));
  });

  it("reads back its bytes", () => {
    const decoded = Serialized.deserialize(new Deserializer(new Uint8Array([3, 9, 8, 7])));
    expect(decoded.value).toEqual(new Uint8Array([9, 8, 7]));
  });
});
