import { describe, it, expect, afterEach } from "vitest";
import { config, InvalidArgumentError } from "@setwise/core";
import {
  defaultEquality,
  equality,
  equalityBy,
  fromInstances,
  ignoreCase,
  isEquality,
  resolveEquality,
  sameValueZero,
  strictEquality,
  eqNumber,
  hashNumber,
  hashString,
  type Comparer,
  type Equality,
} from "../src/index.js";

interface Food {
  name: string;
  calories: number;
}

describe("built-in equalities", () => {
  afterEach(() => {
    config.reset();
  });

  it("sameValueZero matches Set semantics", () => {
    const E = sameValueZero<number>();
    expect(E.equals(NaN, NaN)).toBe(true);
    expect(E.equals(0, -0)).toBe(true);
    expect(E.hash(0)).toBe(E.hash(-0));
  });

  it("strictEquality never equates NaN", () => {
    const E = strictEquality<number>();
    expect(E.equals(NaN, NaN)).toBe(false);
    expect(E.notEquals(NaN, NaN)).toBe(true);
  });

  it("defaultEquality follows the equality.default setting", () => {
    expect(defaultEquality<number>().equals(NaN, NaN)).toBe(true);
    config.set({ equality: { default: "strict" } });
    expect(defaultEquality<number>().equals(NaN, NaN)).toBe(false);
  });

  it("ignoreCase equates and hashes strings regardless of case", () => {
    expect(ignoreCase.equals("Carrot", "CARROT")).toBe(true);
    expect(ignoreCase.hash("Carrot")).toBe(ignoreCase.hash("carrot"));
    expect(ignoreCase.notEquals("Carrot", "Celery")).toBe(true);
  });

  it("fromInstances pairs an Eq with a Hash", () => {
    const E = fromInstances(eqNumber, hashNumber);
    expect(E.equals(3, 3)).toBe(true);
    expect(E.hash(3)).toBe(3);
  });
});

describe("equality()", () => {
  it("builds an Equality from both functions", () => {
    const byName = equality<Food>({
      equals: (a, b) => a.name.toLowerCase() === b.name.toLowerCase(),
      hash: (f) => hashString.hash(f.name.toLowerCase()),
    });
    const a = { name: "Cucumber", calories: 201 };
    const b = { name: "cucumber", calories: 202 };
    expect(byName.equals(a, b)).toBe(true);
    expect(byName.notEquals(a, b)).toBe(false);
    expect(byName.hash(a)).toBe(byName.hash(b));
  });

  it("rejects an equals supplied without a hash", () => {
    const halfComparer: unknown = { equals: (a: string, b: string) => a === b };
    expect(() => equality(halfComparer as Comparer<string>)).toThrow(
      'equality: argument "hash" must not be undefined'
    );
  });

  it("rejects a hash supplied without an equals", () => {
    const halfComparer: unknown = { hash: (a: string) => a.length };
    expect(() => equality(halfComparer as Comparer<string>)).toThrow(InvalidArgumentError);
  });
});

describe("equalityBy()", () => {
  it("compares by key with the default equality", () => {
    const byCalories = equalityBy((f: Food) => f.calories);
    expect(byCalories.equals({ name: "a", calories: 1 }, { name: "b", calories: 1 })).toBe(true);
    expect(byCalories.hash({ name: "a", calories: 1 })).toBe(1);
  });

  it("compares by key with an inner equality", () => {
    const byName = equalityBy((f: Food) => f.name, ignoreCase);
    expect(byName.equals({ name: "Tofu", calories: 1 }, { name: "TOFU", calories: 2 })).toBe(true);
  });
});

describe("isEquality / resolveEquality", () => {
  it("recognises complete equalities only", () => {
    expect(isEquality(ignoreCase)).toBe(true);
    expect(isEquality({ equals: () => true, hash: () => 0 })).toBe(false);
    expect(isEquality(null)).toBe(false);
  });

  it("falls back to the default for absent values", () => {
    const E = resolveEquality<number>("union", "equality", undefined);
    expect(E.equals(NaN, NaN)).toBe(true);
    expect(resolveEquality<number>("union", "equality", null).equals(1, 1)).toBe(true);
  });

  it("returns a supplied equality unchanged", () => {
    expect(resolveEquality("union", "equality", ignoreCase)).toBe(ignoreCase);
  });

  it("wraps a bare equals/hash comparer into a full equality", () => {
    const comparer: Comparer<string> = {
      equals: (a, b) => a.length === b.length,
      hash: (a) => a.length,
    };
    const E = resolveEquality("distinct", "equality", comparer);
    expect(isEquality(E)).toBe(true);
    expect(E.equals("ab", "cd")).toBe(true);
    expect(E.notEquals("ab", "c")).toBe(true);
    expect(E.hash("abc")).toBe(3);
  });

  it("rejects malformed equalities", () => {
    const malformed: unknown = { equals: () => true };
    expect(() =>
      resolveEquality("union", "equality", malformed as Equality<string>)
    ).toThrow(
      'union: argument "equality" must provide equals and hash functions; build one with equality({ equals, hash })'
    );
  });
});
