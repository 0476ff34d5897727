import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "@setwise/core";
import {
  equality,
  equalityBy,
  hashString,
  ignoreCase,
  strictEquality,
  type Equality,
} from "@setwise/equality";
import {
  union,
  intersect,
  except,
  concat,
  distinct,
  distinctBy,
  unionBy,
  intersectBy,
  exceptBy,
} from "../operators.js";

const a = ["Carrots", "Tofu", "Lettuce", "Cucumbers"];
const b = ["Cucumbers", "Cheeseburgers", "Tofu", "Pizza", "Bacon"];

interface Food {
  name: string;
  calories: number;
}

const foods: Food[] = [
  { name: "Carrot", calories: 100 },
  { name: "Celery", calories: -10 },
  { name: "Cucumber", calories: 201 },
  { name: "cucumber", calories: 202 },
  { name: "CUCUMBER", calories: 203 },
];

describe("union", () => {
  it("yields first occurrences of a, then unseen elements of b", () => {
    expect(union(a, b).toArray()).toEqual([
      "Carrots",
      "Tofu",
      "Lettuce",
      "Cucumbers",
      "Cheeseburgers",
      "Pizza",
      "Bacon",
    ]);
  });

  it("removes duplicates inside each operand", () => {
    expect(union([1, 1, 2], [2, 3, 3]).toArray()).toEqual([1, 2, 3]);
  });

  it("is empty for two empty inputs", () => {
    expect(union<number>([], []).toArray()).toEqual([]);
  });

  it("keeps the first spelling under a case-insensitive equality", () => {
    expect(union(["Tofu"], ["TOFU", "pizza"], ignoreCase).toArray()).toEqual(["Tofu", "pizza"]);
  });

  it("treats NaN as one element by default and as distinct under strict equality", () => {
    expect(union([NaN], [NaN]).toArray()).toEqual([NaN]);
    expect(union([NaN], [NaN], strictEquality()).toArray()).toEqual([NaN, NaN]);
  });

  it("treats an explicit null equality as the default", () => {
    expect(union([1, 2], [2, 3], null).toArray()).toEqual([1, 2, 3]);
  });
});

describe("intersect", () => {
  it("yields elements of a present in b, in a's order", () => {
    expect(intersect(a, b).toArray()).toEqual(["Tofu", "Cucumbers"]);
  });

  it("yields each common element once", () => {
    expect(intersect([1, 1, 2, 2, 3], [2, 1, 1]).toArray()).toEqual([1, 2]);
  });

  it("is empty when b is empty", () => {
    expect(intersect(a, []).toArray()).toEqual([]);
  });

  it("yields the element from a, not its equivalent from b", () => {
    expect(intersect(["Tofu", "Pizza"], ["PIZZA"], ignoreCase).toArray()).toEqual(["Pizza"]);
  });
});

describe("except", () => {
  it("yields elements of a absent from b", () => {
    expect(except(a, b).toArray()).toEqual(["Carrots", "Lettuce"]);
  });

  it("is not symmetric", () => {
    expect(except(b, a).toArray()).toEqual(["Cheeseburgers", "Pizza", "Bacon"]);
  });

  it("also removes duplicates from a", () => {
    expect(except([1, 1, 2, 3, 3], [2]).toArray()).toEqual([1, 3]);
  });

  it("is the distinct elements of a when b is empty", () => {
    expect(except([3, 1, 3], []).toArray()).toEqual([3, 1]);
  });
});

describe("concat", () => {
  it("keeps every element and duplicates", () => {
    const result = concat(a, b).toArray();
    expect(result).toHaveLength(9);
    expect(result).toEqual([...a, ...b]);
  });
});

describe("distinct", () => {
  it("keeps the first occurrence of each element", () => {
    expect(distinct([3, 1, 3, 2, 1]).toArray()).toEqual([3, 1, 2]);
  });

  it("collapses +0 and -0 by default", () => {
    expect(distinct([0, -0]).toArray()).toEqual([0]);
  });

  it("compares objects by reference by default", () => {
    const x = { id: 1 };
    expect(distinct([x, { id: 1 }, x]).toArray()).toEqual([x, { id: 1 }]);
  });

  it("uses a custom equality built from a key", () => {
    const byName = equalityBy((f: Food) => f.name, ignoreCase);
    expect(distinct(foods, byName).toArray()).toEqual([
      { name: "Carrot", calories: 100 },
      { name: "Celery", calories: -10 },
      { name: "Cucumber", calories: 201 },
    ]);
  });

  it("uses a custom equality built from equals and hash", () => {
    const byName = equality<Food>({
      equals: (x, y) => x.name.toLowerCase() === y.name.toLowerCase(),
      hash: (f) => hashString.hash(f.name.toLowerCase()),
    });
    expect(distinct(foods, byName).count()).toBe(3);
  });

  it("accepts a bare equals/hash comparer", () => {
    const byLength = {
      equals: (x: string, y: string) => x.length === y.length,
      hash: (x: string) => x.length,
    };
    expect(distinct(["ab", "cd", "e", "fgh"], byLength).toArray()).toEqual(["ab", "e", "fgh"]);
    expect(intersect(["ab", "xyz"], ["q", "rst"], byLength).toArray()).toEqual(["xyz"]);
  });

  it("stays correct when every element shares one hash", () => {
    const mod3 = equality<number>({ equals: (x, y) => x % 3 === y % 3, hash: () => 7 });
    expect(distinct([1, 4, 2, 5, 3, 6], mod3).toArray()).toEqual([1, 2, 3]);
  });
});

describe("key-selector variants", () => {
  it("distinctBy keeps the first food per name, ignoring case", () => {
    expect(distinctBy(foods, (f) => f.name, ignoreCase).toArray()).toEqual([
      { name: "Carrot", calories: 100 },
      { name: "Celery", calories: -10 },
      { name: "Cucumber", calories: 201 },
    ]);
  });

  it("distinctBy with the default key equality is case-sensitive", () => {
    expect(distinctBy(foods, (f) => f.name).count()).toBe(5);
  });

  it("unionBy identifies elements by key", () => {
    const first = [
      { id: 1, label: "a" },
      { id: 2, label: "b" },
    ];
    const second = [
      { id: 2, label: "B" },
      { id: 3, label: "c" },
    ];
    expect(
      unionBy(first, second, (x) => x.id)
        .map((x) => x.label)
        .toArray()
    ).toEqual(["a", "b", "c"]);
  });

  it("intersectBy matches a's keys against a collection of keys", () => {
    const items = [
      { id: 1, label: "one" },
      { id: 2, label: "two" },
      { id: 3, label: "three" },
      { id: 2, label: "two again" },
    ];
    expect(
      intersectBy(items, [2, 3, 3], (x) => x.id)
        .map((x) => x.label)
        .toArray()
    ).toEqual(["two", "three"]);
  });

  it("exceptBy drops elements whose key is listed", () => {
    const items = [
      { id: 1, label: "one" },
      { id: 2, label: "two" },
      { id: 3, label: "three" },
      { id: 1, label: "one again" },
      { id: 4, label: "four" },
    ];
    expect(
      exceptBy(items, [2], (x) => x.id)
        .map((x) => x.label)
        .toArray()
    ).toEqual(["one", "three", "four"]);
  });
});

describe("argument validation", () => {
  const missing: unknown = null;
  const nothing = missing as Iterable<string>;

  it("rejects an absent first source at call time", () => {
    expect(() => union(nothing, b)).toThrow('union: argument "first" must not be null');
  });

  it("rejects an absent second source at call time", () => {
    expect(() => intersect(a, nothing)).toThrow('intersect: argument "second" must not be null');
    expect(() => except(a, nothing)).toThrow(InvalidArgumentError);
    expect(() => concat(a, nothing)).toThrow(InvalidArgumentError);
  });

  it("rejects a value that is not iterable", () => {
    const notIterable: unknown = 42;
    try {
      distinct(notIterable as Iterable<number>);
      expect.unreachable("distinct should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.operation).toBe("distinct");
        expect(error.argument).toBe("source");
        expect(error.reason).toBe("not_iterable");
      }
    }
  });

  it("rejects an equality without hash", () => {
    const broken: unknown = { equals: () => true, notEquals: () => false };
    expect(() => union(a, b, broken as Equality<string>)).toThrow(
      'union: argument "equality" must provide equals and hash functions'
    );
  });

  it("rejects a missing key selector", () => {
    const noKey: unknown = undefined;
    expect(() => distinctBy(foods, noKey as (f: Food) => string)).toThrow(
      'distinctBy: argument "key" must not be undefined'
    );
  });
});
