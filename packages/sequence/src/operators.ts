/**
 * Set operators as free functions.
 *
 * Each validates its arguments at call time, throwing `InvalidArgumentError`
 * for an absent or non-iterable source, and returns a `LazySequence` that
 * reads nothing until traversed. The equality defaults to
 * `defaultEquality()`.
 *
 * @example
 * ```typescript
 * const a = ["Carrots", "Tofu", "Lettuce", "Cucumbers"];
 * const b = ["Cucumbers", "Cheeseburgers", "Tofu", "Pizza", "Bacon"];
 *
 * intersect(a, b).toArray(); // ["Tofu", "Cucumbers"]
 * except(a, b).toArray();    // ["Carrots", "Lettuce"]
 * ```
 */

import type { EqualityLike } from "@setwise/equality";
import { LazySequence } from "./lazy.js";
import {
  concatSource,
  distinctBySource,
  distinctSource,
  exceptBySource,
  exceptSource,
  intersectBySource,
  intersectSource,
  unionBySource,
  unionSource,
} from "./set-sources.js";

export function union<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  equality?: EqualityLike<T> | null
): LazySequence<T> {
  return LazySequence.from(unionSource(first, second, equality));
}

export function intersect<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  equality?: EqualityLike<T> | null
): LazySequence<T> {
  return LazySequence.from(intersectSource(first, second, equality));
}

export function except<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  equality?: EqualityLike<T> | null
): LazySequence<T> {
  return LazySequence.from(exceptSource(first, second, equality));
}

export function concat<T>(first: Iterable<T>, second: Iterable<T>): LazySequence<T> {
  return LazySequence.from(concatSource(first, second));
}

export function distinct<T>(source: Iterable<T>, equality?: EqualityLike<T> | null): LazySequence<T> {
  return LazySequence.from(distinctSource(source, equality));
}

/** Keep the first element for each distinct key */
export function distinctBy<T, K>(
  source: Iterable<T>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): LazySequence<T> {
  return LazySequence.from(distinctBySource(source, key, keyEquality));
}

/** Union where elements are identified by a key */
export function unionBy<T, K>(
  first: Iterable<T>,
  second: Iterable<T>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): LazySequence<T> {
  return LazySequence.from(unionBySource(first, second, key, keyEquality));
}

/** Elements of `first` whose key appears in `keys`, once per key */
export function intersectBy<T, K>(
  first: Iterable<T>,
  keys: Iterable<K>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): LazySequence<T> {
  return LazySequence.from(intersectBySource(first, keys, key, keyEquality));
}

/** Elements of `first` whose key does not appear in `keys`, once per key */
export function exceptBy<T, K>(
  first: Iterable<T>,
  keys: Iterable<K>,
  key: (item: T) => K,
  keyEquality?: EqualityLike<K> | null
): LazySequence<T> {
  return LazySequence.from(exceptBySource(first, keys, key, keyEquality));
}
