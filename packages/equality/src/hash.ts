/**
 * Hash - 32-bit hash codes consistent with an Eq instance.
 *
 * Law: `equals(a, b) => hash(a) === hash(b)`. Collisions are allowed;
 * they only cost extra equality checks.
 */
export interface Hash<A> {
  hash(a: A): number;
}

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    // -0 | 0 is 0, so +0 and -0 share a bucket
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) {
      return a | 0;
    }
    return hashString.hash(String(a));
  },
};

export const hashBoolean: Hash<boolean> = {
  hash: (a) => (a ? 1 : 0),
};

export const hashBigInt: Hash<bigint> = {
  hash: (a) => hashString.hash(a.toString()),
};

export const hashDate: Hash<Date> = {
  hash: (a) => hashNumber.hash(a.getTime()),
};

export const hashStringIgnoreCase: Hash<string> = {
  hash: (a) => hashString.hash(a.toLowerCase()),
};

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

/**
 * Hash by reference: every distinct object gets its own stable code for as
 * long as it is alive.
 */
export const hashIdentity: Hash<object> = {
  hash: (a) => {
    let id = identities.get(a);
    if (id === undefined) {
      id = nextIdentity++ | 0;
      identities.set(a, id);
    }
    return id;
  },
};

function intrinsicHash(value: unknown): number {
  switch (typeof value) {
    case "number":
      return hashNumber.hash(value);
    case "string":
      return hashString.hash(value);
    case "boolean":
      return hashBoolean.hash(value);
    case "bigint":
      return hashBigInt.hash(value);
    case "symbol":
      return hashString.hash(value.description ?? "");
    case "undefined":
      return 1;
  }
  if (typeof value === "object" || typeof value === "function") {
    return value === null ? 0 : hashIdentity.hash(value);
  }
  return 0;
}

/**
 * Hash for any JS value, consistent with both SameValueZero and `===`:
 * primitives hash by value, objects and functions by identity.
 */
export function hashIntrinsic<A>(): Hash<A> {
  return { hash: (a) => intrinsicHash(a) };
}

/**
 * Create a Hash instance by mapping to a hashable value.
 */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B> = hashIntrinsic()): Hash<A> {
  return { hash: (a) => H.hash(f(a)) };
}

export function hashArray<A>(H: Hash<A>): Hash<readonly A[]> {
  return {
    hash: (arr) => {
      let hash = arr.length;
      for (const x of arr) {
        hash = ((hash << 5) + hash) ^ H.hash(x);
      }
      return hash >>> 0;
    },
  };
}
