/**
 * Eq - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBoolean: Eq<boolean> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqDate: Eq<Date> = {
  equals: (a, b) => a.getTime() === b.getTime(),
  notEquals: (a, b) => a.getTime() !== b.getTime(),
};

/**
 * Strings compared after lower-casing both sides.
 */
export const eqStringIgnoreCase: Eq<string> = {
  equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
  notEquals: (a, b) => a.toLowerCase() !== b.toLowerCase(),
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

/**
 * Eq using strict equality (===).
 */
export function eqStrict<A>(): Eq<A> {
  return {
    equals: (a, b) => a === b,
    notEquals: (a, b) => a !== b,
  };
}

/**
 * The SameValueZero algorithm used by `Set` and `Map`:
 * `===`, except that `NaN` equals `NaN`.
 */
export function sameValueZeroEquals(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

export function eqSameValueZero<A>(): Eq<A> {
  return {
    equals: (a, b) => sameValueZeroEquals(a, b),
    notEquals: (a, b) => !sameValueZeroEquals(a, b),
  };
}

/**
 * Create an Eq instance by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqStrict()): Eq<A> {
  return {
    equals: (a, b) => E.equals(f(a), f(b)),
    notEquals: (a, b) => E.notEquals(f(a), f(b)),
  };
}

/**
 * Eq for arrays (element-wise comparison).
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    equals: (xs, ys) => {
      if (xs.length !== ys.length) return false;
      return xs.every((x, i) => E.equals(x, ys[i]));
    },
    notEquals: (xs, ys) => {
      if (xs.length !== ys.length) return true;
      return xs.some((x, i) => E.notEquals(x, ys[i]));
    },
  };
}
