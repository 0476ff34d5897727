/**
 * @setwise/equality - pluggable equality for set operations.
 *
 * An `Equality<A>` pairs an equivalence predicate with a hash consistent
 * with it. Operators default to intrinsic value equality; pass your own to
 * compare records by a field, strings case-insensitively, and so on.
 *
 * @example
 * ```typescript
 * import { equalityBy, ignoreCase } from "@setwise/equality";
 *
 * const byName = equalityBy((food: Food) => food.name, ignoreCase);
 * ```
 */

export type { Eq } from "./eq.js";
export {
  eqNumber,
  eqBigInt,
  eqString,
  eqBoolean,
  eqDate,
  eqStringIgnoreCase,
  makeEq,
  eqStrict,
  eqSameValueZero,
  sameValueZeroEquals,
  eqBy,
  eqArray,
} from "./eq.js";

export type { Hash } from "./hash.js";
export {
  hashString,
  hashNumber,
  hashBoolean,
  hashBigInt,
  hashDate,
  hashStringIgnoreCase,
  hashIdentity,
  hashIntrinsic,
  hashBy,
  hashArray,
} from "./hash.js";

export type { Equality, Comparer, EqualityLike } from "./equality.js";
export {
  fromInstances,
  sameValueZero,
  strictEquality,
  defaultEquality,
  equality,
  equalityBy,
  ignoreCase,
  isEquality,
  resolveEquality,
} from "./equality.js";
