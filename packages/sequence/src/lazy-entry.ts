/**
 * Entry points for creating lazy sequences.
 *
 * `sequence()` wraps any iterable; `of()`, `empty()`, `range()`,
 * `iterate()` and `repeat()` create common source patterns. The built-in
 * sources restart on every traversal. A generator object passed to
 * `sequence()` does not: it can only be walked once.
 */

import { InvalidArgumentError, requireFunction } from "@setwise/core";
import { LazySequence } from "./lazy.js";

/** Create a lazy sequence from any iterable */
export function sequence<T>(source: Iterable<T>): LazySequence<T> {
  return LazySequence.from(source);
}

/** Create a lazy sequence over the given items */
export function of<T>(...items: T[]): LazySequence<T> {
  return LazySequence.from(items);
}

export function empty<T>(): LazySequence<T> {
  return LazySequence.from<T>([]);
}

/** Create a lazy sequence over a numeric range [start, end) with optional step */
export function range(start: number, end: number, step: number = 1): LazySequence<number> {
  if (step === 0 || Number.isNaN(step)) {
    throw new InvalidArgumentError("range", "step", "out_of_range", "must not be zero");
  }
  return LazySequence.from(restartable(() => rangeIterable(start, end, step)));
}

/** Create an infinite sequence by repeatedly applying `f` to a seed */
export function iterate<T>(seed: T, f: (value: T) => T): LazySequence<T> {
  requireFunction("iterate", "f", f);
  return LazySequence.from(restartable(() => iterateIterable(seed, f)));
}

/** Create an infinite sequence that repeats a single value */
export function repeat<T>(value: T): LazySequence<T> {
  return LazySequence.from(restartable(() => repeatIterable(value)));
}

// ---------------------------------------------------------------------------
// Internal iterable factories
// ---------------------------------------------------------------------------

function restartable<T>(open: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: open };
}

function* rangeIterable(start: number, end: number, step: number): Generator<number> {
  if (step > 0) {
    for (let i = start; i < end; i += step) yield i;
  } else {
    for (let i = start; i > end; i += step) yield i;
  }
}

function* iterateIterable<T>(seed: T, f: (value: T) => T): Generator<T> {
  let current = seed;
  while (true) {
    yield current;
    current = f(current);
  }
}

function* repeatIterable<T>(value: T): Generator<T> {
  while (true) yield value;
}
