/**
 * Lazy sequences with single-pass fusion
 *
 * Collects chained operations (.map, .filter, .union, etc.) and executes
 * them only when the sequence is traversed. Element-wise steps are fused
 * into one pass over the source; set operators wrap the sequence in a new
 * re-openable source.
 */

import { requireCount, requireFunction, requireIterable } from "@setwise/core";
import { resolveEquality, type EqualityLike } from "@setwise/equality";
import { HashSet } from "@setwise/collections";
import type { PipelineStep } from "./types.js";
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

/**
 * A lazy, re-traversable sequence.
 *
 * Nothing is read from the source until the sequence is iterated or a
 * terminal operation (`toArray`, `count`, `first`, ...) is called. Each
 * traversal starts over, so a sequence built on a mutable collection
 * reflects the collection's contents at traversal time. Stopping early
 * (`break`, `take`, `first`) closes the underlying iterators.
 *
 * @example
 * ```typescript
 * const result = sequence(["Carrots", "Tofu", "Lettuce"])
 *   .union(["Tofu", "Pizza"])
 *   .filter((food) => food !== "Lettuce")
 *   .toArray(); // ["Carrots", "Tofu", "Pizza"]
 * ```
 */
export class LazySequence<T> implements Iterable<T> {
  private readonly source: Iterable<unknown>;
  private readonly steps: readonly PipelineStep[];

  private constructor(source: Iterable<unknown>, steps: readonly PipelineStep[]) {
    this.source = source;
    this.steps = steps;
  }

  /** Wrap any iterable. Re-traversal re-iterates `source`. */
  static from<T>(source: Iterable<T>): LazySequence<T> {
    requireIterable("sequence", "source", source);
    return new LazySequence<T>(source, []);
  }

  private chain<U>(step: PipelineStep): LazySequence<U> {
    return new LazySequence<U>(this.source, [...this.steps, step]);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.execute();
  }

  // ---------------------------------------------------------------------------
  // Element-wise steps - fused into one pass
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (value: T) => U): LazySequence<U> {
    requireFunction("map", "f", f);
    return this.chain<U>({ type: "map", f });
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (value: T) => boolean): LazySequence<T> {
    requireFunction("filter", "predicate", predicate);
    return this.chain<T>({ type: "filter", predicate });
  }

  /** Map each element to an iterable and flatten */
  flatMap<U>(f: (value: T) => Iterable<U>): LazySequence<U> {
    requireFunction("flatMap", "f", f);
    return this.chain<U>({ type: "flatMap", f });
  }

  /** Take the first `count` elements */
  take(count: number): LazySequence<T> {
    requireCount("take", "count", count);
    return this.chain<T>({ type: "take", count });
  }

  /** Skip the first `count` elements */
  drop(count: number): LazySequence<T> {
    requireCount("drop", "count", count);
    return this.chain<T>({ type: "drop", count });
  }

  /** Take elements while predicate holds, stop at first failure */
  takeWhile(predicate: (value: T) => boolean): LazySequence<T> {
    requireFunction("takeWhile", "predicate", predicate);
    return this.chain<T>({ type: "takeWhile", predicate });
  }

  /** Skip elements while predicate holds, emit once it fails */
  dropWhile(predicate: (value: T) => boolean): LazySequence<T> {
    requireFunction("dropWhile", "predicate", predicate);
    return this.chain<T>({ type: "dropWhile", predicate });
  }

  // ---------------------------------------------------------------------------
  // Set operators - this sequence is the first operand
  // ---------------------------------------------------------------------------

  /** First occurrences from this sequence, then unseen elements of `other` */
  union(other: Iterable<T>, equality?: EqualityLike<T> | null): LazySequence<T> {
    return LazySequence.from(unionSource(this, other, equality));
  }

  /** Elements of this sequence that have an equivalent in `other`, once each */
  intersect(other: Iterable<T>, equality?: EqualityLike<T> | null): LazySequence<T> {
    return LazySequence.from(intersectSource(this, other, equality));
  }

  /** Elements of this sequence with no equivalent in `other`, once each */
  except(other: Iterable<T>, equality?: EqualityLike<T> | null): LazySequence<T> {
    return LazySequence.from(exceptSource(this, other, equality));
  }

  /** All of this sequence followed by all of `other`, duplicates kept */
  concat(other: Iterable<T>): LazySequence<T> {
    return LazySequence.from(concatSource(this, other));
  }

  /** First occurrence of each equivalence class */
  distinct(equality?: EqualityLike<T> | null): LazySequence<T> {
    return LazySequence.from(distinctSource(this, equality));
  }

  distinctBy<K>(key: (value: T) => K, keyEquality?: EqualityLike<K> | null): LazySequence<T> {
    return LazySequence.from(distinctBySource(this, key, keyEquality));
  }

  unionBy<K>(
    other: Iterable<T>,
    key: (value: T) => K,
    keyEquality?: EqualityLike<K> | null
  ): LazySequence<T> {
    return LazySequence.from(unionBySource(this, other, key, keyEquality));
  }

  intersectBy<K>(
    keys: Iterable<K>,
    key: (value: T) => K,
    keyEquality?: EqualityLike<K> | null
  ): LazySequence<T> {
    return LazySequence.from(intersectBySource(this, keys, key, keyEquality));
  }

  exceptBy<K>(
    keys: Iterable<K>,
    key: (value: T) => K,
    keyEquality?: EqualityLike<K> | null
  ): LazySequence<T> {
    return LazySequence.from(exceptBySource(this, keys, key, keyEquality));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations - these drive execution
  // ---------------------------------------------------------------------------

  /** Collect all results into an array */
  toArray(): T[] {
    const result: T[] = [];
    for (const value of this.execute()) {
      result.push(value);
    }
    return result;
  }

  /** Collect into a HashSet; equivalent elements after the first are dropped */
  toSet(equality?: EqualityLike<T> | null): HashSet<T> {
    return HashSet.from(this.execute(), resolveEquality("toSet", "equality", equality));
  }

  /** Fold elements left-to-right into a single value */
  reduce<Acc>(f: (acc: Acc, value: T) => Acc, init: Acc): Acc {
    requireFunction("reduce", "f", f);
    let acc = init;
    for (const value of this.execute()) {
      acc = f(acc, value);
    }
    return acc;
  }

  /** Find the first element matching the predicate */
  find(predicate: (value: T) => boolean): T | null {
    requireFunction("find", "predicate", predicate);
    for (const value of this.execute()) {
      if (predicate(value)) return value;
    }
    return null;
  }

  /** True if any element satisfies the predicate */
  some(predicate: (value: T) => boolean): boolean {
    requireFunction("some", "predicate", predicate);
    for (const value of this.execute()) {
      if (predicate(value)) return true;
    }
    return false;
  }

  /** True if all elements satisfy the predicate */
  every(predicate: (value: T) => boolean): boolean {
    requireFunction("every", "predicate", predicate);
    for (const value of this.execute()) {
      if (!predicate(value)) return false;
    }
    return true;
  }

  /** True if some element is equivalent to `target` */
  includes(target: T, equality?: EqualityLike<T> | null): boolean {
    const eq = resolveEquality("includes", "equality", equality);
    for (const value of this.execute()) {
      if (eq.equals(value, target)) return true;
    }
    return false;
  }

  /** Count the number of elements */
  count(): number {
    let n = 0;
    for (const _value of this.execute()) {
      n++;
    }
    return n;
  }

  /** Execute a side effect for each element */
  forEach(f: (value: T) => void): void {
    requireFunction("forEach", "f", f);
    for (const value of this.execute()) {
      f(value);
    }
  }

  /** First element, or null if empty */
  first(): T | null {
    for (const value of this.execute()) {
      return value;
    }
    return null;
  }

  /** Last element, or null if empty */
  last(): T | null {
    let result: T | null = null;
    for (const value of this.execute()) {
      result = value;
    }
    return result;
  }

  /**
   * True when both sequences have the same length and pairwise equivalent
   * elements in the same order.
   */
  sequenceEqual(other: Iterable<T>, equality?: EqualityLike<T> | null): boolean {
    requireIterable("sequenceEqual", "other", other);
    const eq = resolveEquality("sequenceEqual", "equality", equality);
    const left = this.execute();
    const right = other[Symbol.iterator]();
    try {
      for (;;) {
        const a = left.next();
        const b = right.next();
        if (a.done || b.done) return Boolean(a.done) === Boolean(b.done);
        if (!eq.equals(a.value, b.value)) return false;
      }
    } finally {
      left.return(undefined);
      right.return?.();
    }
  }

  // ---------------------------------------------------------------------------
  // Execution engine - single-pass, fused iteration
  // ---------------------------------------------------------------------------

  /**
   * Walks the source once, running every step on each element inline.
   *
   * `state[i]` holds the remaining count for a take/drop step and 1 while a
   * dropWhile step is still dropping. Values produced by flatMap wait on a
   * stack tagged with the step they resume at; a value's children always
   * resume further along than anything queued below them, so the stack is
   * ordered by resume index from bottom to top.
   */
  private *execute(): Generator<T> {
    const steps = this.steps;
    if (steps.some((step) => step.type === "take" && step.count === 0)) return;

    const state = steps.map((step) => {
      if (step.type === "take" || step.type === "drop") return step.count;
      return step.type === "dropWhile" ? 1 : 0;
    });

    for (const raw of this.source) {
      const queue: QueuedValue[] = [{ value: raw, from: 0 }];

      for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
        let value = entry.value;
        let emit = true;

        for (let i = entry.from; emit && i < steps.length; i++) {
          const step = steps[i];
          switch (step.type) {
            case "map":
              value = step.f(value);
              break;

            case "filter":
              emit = step.predicate(value);
              break;

            case "flatMap": {
              const children: QueuedValue[] = [];
              for (const child of step.f(value)) {
                children.push({ value: child, from: i + 1 });
              }
              queue.push(...children.reverse());
              emit = false;
              break;
            }

            case "take":
              if (state[i] === 0) return;
              state[i]--;
              break;

            case "drop":
              if (state[i] > 0) {
                state[i]--;
                emit = false;
              }
              break;

            case "takeWhile":
              if (!step.predicate(value)) return;
              break;

            case "dropWhile":
              if (state[i] === 1) {
                if (step.predicate(value)) emit = false;
                else state[i] = 0;
              }
              break;
          }
        }

        if (!emit) continue;
        yield value as T;

        // A spent take only ends the traversal once nothing queued resumes past it
        const resumeFrom = queue.length > 0 ? queue[queue.length - 1].from : 0;
        for (let i = resumeFrom; i < steps.length; i++) {
          if (steps[i].type === "take" && state[i] === 0) return;
        }
      }
    }
  }
}

interface QueuedValue {
  value: unknown;
  from: number;
}
