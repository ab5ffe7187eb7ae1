// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { memoizeAsync } from "../../src/utils/memoize";

describe("memoizeAsync", () => {
  let now = 1_000;

  beforeEach(() => {
    now = 1_000;
    jest.spyOn(Date, "now").mockImplementation(() => now);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("it does not execute function again before TTL has passed", async () => {
    let calls = 0;
    const memoized = memoizeAsync(async () => {
      calls += 1;
      return calls;
    }, 200);

    expect(await memoized()).toBe(1);
    now += 50;
    expect(await memoized()).toBe(1);
    expect(calls).toBe(1);
  });

  test("it executes function again after TTL has passed", async () => {
    let calls = 0;
    const memoized = memoizeAsync(async () => {
      calls += 1;
      return calls;
    }, 200);

    expect(await memoized()).toBe(1);
    now += 201;
    expect(await memoized()).toBe(2);
  });

  test("it caches forever without a TTL", async () => {
    const func = jest.fn(async () => "value");
    const memoized = memoizeAsync(func);

    await memoized();
    now += 1_000_000;
    await memoized();
    expect(func).toHaveBeenCalledTimes(1);
  });

  test("it shares a call in flight", async () => {
    const func = jest.fn(async () => 7);
    const memoized = memoizeAsync(func);

    const results = await Promise.all([memoized(), memoized(), memoized()]);
    expect(results).toEqual([7, 7, 7]);
    expect(func).toHaveBeenCalledTimes(1);
  });

  test("it does not cache a rejection", async () => {
    const func = jest.fn<Promise<number>, []>().mockRejectedValueOnce(new Error("node down")).mockResolvedValueOnce(3);
    const memoized = memoizeAsync(func);

    await expect(memoized()).rejects.toThrow("node down");
    await expect(memoized()).resolves.toBe(3);
    expect(func).toHaveBeenCalledTimes(2);
  });
});
