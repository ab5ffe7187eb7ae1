// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

type CacheEntry<T> = { value: T; timestamp: number };

/**
 * Wraps an async function of no arguments so its result is computed once and then
 * reused for `ttlMs` milliseconds (forever when `ttlMs` is undefined).
 *
 * A rejected call is not cached, and concurrent callers share the call in flight.
 */
export function memoizeAsync<T>(func: () => Promise<T>, ttlMs?: number): () => Promise<T> {
  let cached: CacheEntry<T> | undefined;
  let inFlight: Promise<T> | undefined;

  return async () => {
    if (cached !== undefined && (ttlMs === undefined || Date.now() - cached.timestamp <= ttlMs)) {
      return cached.value;
    }
    if (inFlight === undefined) {
      inFlight = func()
        .then((value) => {
          cached = { value, timestamp: Date.now() };
          return value;
        })
        .finally(() => {
          inFlight = undefined;
        });
    }
    return inFlight;
  };
}
