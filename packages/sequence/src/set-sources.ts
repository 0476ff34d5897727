/**
 * Set operator sources.
 *
 * Each builder validates its arguments immediately and returns an
 * `OperatorSource` that does nothing until iterated. Every iteration runs
 * the operator from scratch with its own membership set, so traversals are
 * independent and see the inputs' current contents.
 *
 * Deduplication is stable: the first element of each equivalence class wins.
 */

import { createLogger, requireFunction, requireIterable } from "@setwise/core";
import { resolveEquality, type EqualityLike } from "@setwise/equality";
import { HashSet } from "@setwise/collections";
import type { OperatorSource } from "./types.js";

const log = createLogger("sequence");

function operatorSource<T>(operator: string, run: () => Generator<T>): OperatorSource<T> {
  return {
    operator,
    [Symbol.iterator]() {
      log.debug(`${operator}: traversal started`);
      return run();
    },
  };
}

// ============================================================================
// Element equality
// ============================================================================

export function unionSource<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  equality?: EqualityLike<T> | null
): OperatorSource<T> {
  requireIterable("union", "first", first);
  requireIterable("union", "second", second);
  const eq = resolveEquality("union", "equality", equality);
  return operatorSource("union", function* () {
    const seen = new HashSet<T>(eq);
    for (const item of first) {
      if (seen.tryAdd(item)) yield item;
    }
    for (const item of second) {
      if (seen.tryAdd(item)) yield item;
    }
  });
}

export function intersectSource<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  equality?: EqualityLike<T> | null
): OperatorSource<T> {
  requireIterable("intersect", "first", first);
  requireIterable("intersect", "second", second);
  const eq = resolveEquality("intersect", "equality", equality);
  return operatorSource("intersect", function* () {
    // Removing on match keeps each class to one output element
    const remaining = HashSet.from(second, eq);
    for (const item of first) {
      if (remaining.delete(item)) yield item;
    }
  });
}

export function exceptSource<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  equality?: EqualityLike<T> | null
): OperatorSource<T> {
  requireIterable("except", "first", first);
  requireIterable("except", "second", second);
  const eq = resolveEquality("except", "equality", equality);
  return operatorSource("except", function* () {
    const seen = HashSet.from(second, eq);
    for (const item of first) {
      if (seen.tryAdd(item)) yield item;
    }
  });
}

export function concatSource<T>(first: Iterable<T>, second: Iterable<T>): OperatorSource<T> {
  requireIterable("concat", "first", first);
  requireIterable("concat", "second", second);
  return operatorSource("concat", function* () {
    yield* first;
    yield* second;
  });
}

export function distinctSource<T>(
  source: Iterable<T>,
  equality?: EqualityLike<T> | null
): OperatorSource<T> {
  requireIterable("distinct", "source", source);
  const eq = resolveEquality("distinct", "equality", equality);
  return operatorSource("distinct", function* () {
    const seen = new HashSet<T>(eq);
    for (const item of source) {
      if (seen.tryAdd(item)) yield item;
    }
  });
}

// ============================================================================
// Key selectors
// ============================================================================

export function distinctBySource<T, K>(
  source: Iterable<T>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): OperatorSource<T> {
  requireIterable("distinctBy", "source", source);
  requireFunction("distinctBy", "key", key);
  const eq = resolveEquality("distinctBy", "keyEquality", keyEquality);
  return operatorSource("distinctBy", function* () {
    const seen = new HashSet<K>(eq);
    for (const item of source) {
      if (seen.tryAdd(key(item))) yield item;
    }
  });
}

export function unionBySource<T, K>(
  first: Iterable<T>,
  second: Iterable<T>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): OperatorSource<T> {
  requireIterable("unionBy", "first", first);
  requireIterable("unionBy", "second", second);
  requireFunction("unionBy", "key", key);
  const eq = resolveEquality("unionBy", "keyEquality", keyEquality);
  return operatorSource("unionBy", function* () {
    const seen = new HashSet<K>(eq);
    for (const item of first) {
      if (seen.tryAdd(key(item))) yield item;
    }
    for (const item of second) {
      if (seen.tryAdd(key(item))) yield item;
    }
  });
}

export function intersectBySource<T, K>(
  first: Iterable<T>,
  keys: Iterable<K>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): OperatorSource<T> {
  requireIterable("intersectBy", "first", first);
  requireIterable("intersectBy", "keys", keys);
  requireFunction("intersectBy", "key", key);
  const eq = resolveEquality("intersectBy", "keyEquality", keyEquality);
  return operatorSource("intersectBy", function* () {
    const remaining = HashSet.from(keys, eq);
    for (const item of first) {
      if (remaining.delete(key(item))) yield item;
    }
  });
}

export function exceptBySource<T, K>(
  first: Iterable<T>,
  keys: Iterable<K>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): OperatorSource<T> {
  requireIterable("exceptBy", "first", first);
  requireIterable("exceptBy", "keys", keys);
  requireFunction("exceptBy", "key", key);
  const eq = resolveEquality("exceptBy", "keyEquality", keyEquality);
  return operatorSource("exceptBy", function* () {
    const seen = HashSet.from(keys, eq);
    for (const item of first) {
      if (seen.tryAdd(key(item))) yield item;
    }
  });
}
