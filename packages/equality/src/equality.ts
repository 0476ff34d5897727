/**
 * Equality - an Eq paired with a Hash that agrees with it.
 *
 * Set operations test membership by bucketing on `hash` and confirming with
 * `equals`, so the two must always travel together. A pair whose hash
 * disagrees with its equality is a caller contract violation and is not
 * detected.
 */

import { config, InvalidArgumentError, requireFunction, requirePresent } from "@setwise/core";
import { eqSameValueZero, eqStrict, eqStringIgnoreCase, type Eq } from "./eq.js";
import { hashIntrinsic, hashStringIgnoreCase, type Hash } from "./hash.js";

export interface Equality<A> extends Eq<A>, Hash<A> {}

/**
 * The two functions a caller supplies to define a custom equality.
 */
export interface Comparer<A> {
  equals: (a: A, b: A) => boolean;
  hash: (a: A) => number;
}

/**
 * Pair an Eq instance with a Hash instance.
 */
export function fromInstances<A>(eq: Eq<A>, hash: Hash<A>): Equality<A> {
  return {
    equals: (a, b) => eq.equals(a, b),
    notEquals: (a, b) => eq.notEquals(a, b),
    hash: (a) => hash.hash(a),
  };
}

/**
 * Intrinsic JS value equality, as used by `Set`: `NaN` equals `NaN`,
 * `+0` equals `-0`, objects compare by reference.
 */
export function sameValueZero<A>(): Equality<A> {
  return fromInstances(eqSameValueZero<A>(), hashIntrinsic<A>());
}

/**
 * `===` equality: like `sameValueZero` except that `NaN` never equals itself.
 */
export function strictEquality<A>(): Equality<A> {
  return fromInstances(eqStrict<A>(), hashIntrinsic<A>());
}

/**
 * The equality operators fall back to when none is given, selected by the
 * `equality.default` configuration key.
 */
export function defaultEquality<A>(): Equality<A> {
  return config.get("equality.default") === "strict" ? strictEquality<A>() : sameValueZero<A>();
}

/**
 * Build an Equality from an `equals` and a `hash` function.
 *
 * @example
 * ```typescript
 * const byName = equality<Food>({
 *   equals: (a, b) => a.name.toLowerCase() === b.name.toLowerCase(),
 *   hash: (f) => hashString.hash(f.name.toLowerCase()),
 * });
 * ```
 */
export function equality<A>(comparer: Comparer<A>): Equality<A> {
  requirePresent("equality", "comparer", comparer);
  requireFunction("equality", "equals", comparer.equals);
  requireFunction("equality", "hash", comparer.hash);
  const { equals, hash } = comparer;
  return {
    equals: (a, b) => equals(a, b),
    notEquals: (a, b) => !equals(a, b),
    hash: (a) => hash(a),
  };
}

/**
 * Compare values by a projected key.
 *
 * @example
 * ```typescript
 * const byId = equalityBy((user: User) => user.id);
 * ```
 */
export function equalityBy<A, K>(
  key: (a: A) => K,
  inner: Equality<K> = defaultEquality<K>()
): Equality<A> {
  requireFunction("equalityBy", "key", key);
  return {
    equals: (a, b) => inner.equals(key(a), key(b)),
    notEquals: (a, b) => inner.notEquals(key(a), key(b)),
    hash: (a) => inner.hash(key(a)),
  };
}

/**
 * Case-insensitive string equality.
 */
export const ignoreCase: Equality<string> = fromInstances(eqStringIgnoreCase, hashStringIgnoreCase);

export function isEquality<A = unknown>(value: unknown): value is Equality<A> {
  if (typeof value !== "object" || value === null) return false;
  return (
    typeof Reflect.get(value, "equals") === "function" &&
    typeof Reflect.get(value, "notEquals") === "function" &&
    typeof Reflect.get(value, "hash") === "function"
  );
}

/**
 * Anything an operation accepts as its equality argument: a full Equality,
 * or the bare `{ equals, hash }` pair that `equality()` would build one from.
 */
export type EqualityLike<A> = Equality<A> | Comparer<A>;

function isComparer(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return false;
  return (
    typeof Reflect.get(value, "equals") === "function" &&
    typeof Reflect.get(value, "hash") === "function"
  );
}

/**
 * Return the equality an operation should use: the default for an absent
 * argument, the argument itself when it is a complete Equality, and a
 * wrapped Equality for a bare `{ equals, hash }` comparer.
 */
export function resolveEquality<A>(
  operation: string,
  argument: string,
  value: EqualityLike<A> | null | undefined
): Equality<A> {
  if (value === null || value === undefined) return defaultEquality<A>();
  if (!isComparer(value)) {
    throw new InvalidArgumentError(
      operation,
      argument,
      "invalid_equality",
      "must provide equals and hash functions; build one with equality({ equals, hash })"
    );
  }
  if (isEquality<A>(value)) return value;
  return equality<A>(value);
}
